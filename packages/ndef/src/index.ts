// Codec
export type { NdefCodecConfig, RecordHeader } from './codec/index.js';
export {
  ByteReader,
  HeaderFlag,
  ID_LENGTH_MAX,
  NdefCodec,
  PAYLOAD_LENGTH_MAX,
  SHORT_RECORD_MAX,
  TNF_MASK,
  TYPE_LENGTH_MAX,
  buildHeader,
  decodeMessage,
  encodeMessage,
  fromHex,
  parseHeader,
  toHex,
  utf8Decode,
  utf8Encode,
  utf16Decode,
  utf16Encode,
} from './codec/index.js';

// Types
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
} from './types/index.js';
export {
  RESERVED_TNF,
  Tnf,
  decodeFailure,
  decodeSuccess,
  isTnf,
  tnfName,
} from './types/index.js';

// Registry
export type {
  RecordStrategy,
  RegisterOptions,
  RegistryEntry,
  StrategyContext,
} from './registry/index.js';
export {
  VariantRegistry,
  createBuiltinRegistry,
  registerBuiltins,
} from './registry/index.js';

// Records
export type { RecordOptions, TextRecordOptions } from './records/index.js';
export {
  TEXT_TYPE,
  URI_PREFIXES,
  URI_TYPE,
  emptyRecord,
  emptyStrategy,
  externalRecord,
  externalStrategy,
  isEmptyRecord,
  isExternalRecord,
  isMimeRecord,
  isRawRecord,
  isTextRecord,
  isUriRecord,
  mimeRecord,
  mimeStrategy,
  rawRecord,
  selectUriPrefix,
  textRecord,
  textStrategy,
  uriRecord,
  uriStrategy,
} from './records/index.js';

// Config records
export type { ConfigEntries } from './config/index.js';
export {
  createConfigRecord,
  formatConfigText,
  parseConfigText,
  readConfigRecord,
} from './config/index.js';

// Display
export { describeMessage, describeRecord, readStatus } from './format/index.js';

// Tag sessions
export type {
  FinishOptions,
  PollOptions,
  ReadResult,
  TagControllerConfig,
  TagControllerState,
  TagHandle,
  TagPrompts,
  TagSessionProvider,
  WriteResult,
} from './session/index.js';
export {
  MemoryTagProvider,
  TagController,
  defaultTagControllerConfig,
} from './session/index.js';

// Hooks
export type {
  DecodeErrorContext,
  Logger,
  NdefHooks,
  RawFallbackContext,
  StateChangeContext,
} from './hooks/index.js';
export { SafeHooks, consoleLogger, noopLogger } from './hooks/index.js';

// Errors
export type { HasDescription } from './errors/index.js';
export {
  ConfigFormatError,
  EmptyMessageError,
  InvalidRecordError,
  MalformedPayloadError,
  MalformedRecordError,
  MissingMessageEndError,
  NdefDecodeError,
  NdefEncodeError,
  NdefError,
  NoTagPresentError,
  PayloadTooLargeError,
  RegistryError,
  TagBusyError,
  TagCapacityError,
  TagLostError,
  TagNotWritableError,
  TagProviderMissingError,
  TruncatedBufferError,
  UnsupportedChunkingError,
  VariantMismatchError,
  hasDescription,
  isNdefDecodeError,
  isNdefEncodeError,
  isNdefError,
  isTagBusyError,
} from './errors/index.js';
