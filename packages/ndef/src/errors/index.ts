export type { HasDescription } from './has-description.js';
export { hasDescription } from './has-description.js';

export {
  // Base classes
  NdefError,
  NdefDecodeError,
  NdefEncodeError,
  isNdefError,
  isNdefDecodeError,
  isNdefEncodeError,

  // Decode errors
  UnsupportedChunkingError,
  TruncatedBufferError,
  MalformedPayloadError,
  MalformedRecordError,
  EmptyMessageError,
  MissingMessageEndError,

  // Encode errors
  PayloadTooLargeError,
  VariantMismatchError,
  InvalidRecordError,

  // Registry & configuration errors
  RegistryError,
  ConfigFormatError,

  // Tag session errors
  TagBusyError,
  isTagBusyError,
  TagNotWritableError,
  TagCapacityError,
  TagProviderMissingError,
  NoTagPresentError,
  TagLostError,
} from './ndef-errors.js';
