export { RESERVED_TNF, Tnf, isTnf, tnfName } from './tnf.js';

export type {
  BuiltinVariant,
  DecodeResult,
  EmptyVariant,
  ExternalVariant,
  MimeVariant,
  NdefMessage,
  NdefRecord,
  RawVariant,
  TextEncoding,
  TextVariant,
  UriVariant,
  VariantShape,
} from './record.js';
export { decodeFailure, decodeSuccess } from './record.js';
