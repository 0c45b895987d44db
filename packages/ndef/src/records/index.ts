export type { RecordOptions, TextRecordOptions } from './builders.js';
export {
  emptyRecord,
  externalRecord,
  isEmptyRecord,
  isExternalRecord,
  isMimeRecord,
  isRawRecord,
  isTextRecord,
  isUriRecord,
  mimeRecord,
  rawRecord,
  textRecord,
  uriRecord,
} from './builders.js';

export { TEXT_TYPE, textStrategy } from './text.js';
export { URI_TYPE, uriStrategy } from './uri.js';
export { URI_PREFIXES, selectUriPrefix } from './uri-prefixes.js';
export { emptyStrategy, externalStrategy, mimeStrategy } from './media.js';
