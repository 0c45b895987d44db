export type { NdefCodecConfig } from './ndef-codec.js';
export { NdefCodec, decodeMessage, encodeMessage } from './ndef-codec.js';

export type { RecordHeader } from './header.js';
export {
  HeaderFlag,
  ID_LENGTH_MAX,
  PAYLOAD_LENGTH_MAX,
  SHORT_RECORD_MAX,
  TNF_MASK,
  TYPE_LENGTH_MAX,
  buildHeader,
  parseHeader,
} from './header.js';

export { ByteReader } from './byte-reader.js';
export {
  asciiDecode,
  asciiEncode,
  concatBytes,
  fromHex,
  toHex,
  utf8Decode,
  utf8Encode,
  utf16Decode,
  utf16Encode,
} from './bytes.js';
