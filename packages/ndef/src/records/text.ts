import {
  asciiDecode,
  asciiEncode,
  concatBytes,
  utf8Decode,
  utf8Encode,
  utf16Decode,
  utf16Encode,
} from '../codec/bytes.js';
import {
  InvalidRecordError,
  MalformedPayloadError,
  PayloadTooLargeError,
} from '../errors/index.js';
import type { RecordStrategy } from '../registry/types.js';
import type { TextVariant } from '../types/index.js';

/** Bit 7 of the status byte selects UTF-16. */
const UTF16_FLAG = 0x80;

/**
 * Bits 0-5 hold the language code length. The NFC Forum Text RTD reserves
 * bit 6 for future use (written as 0, ignored on read), which caps language
 * codes at 63 bytes.
 */
const LANGUAGE_LENGTH_MASK = 0x3f;

export const TEXT_TYPE = 'T';

/**
 * Well-known Text record: status byte, ASCII language code, then the text
 * in UTF-8 or UTF-16.
 */
export const textStrategy: RecordStrategy<TextVariant> = {
  kind: 'text',

  decode(payload, context) {
    if (payload.length === 0) {
      throw new MalformedPayloadError(
        'Text',
        'payload is empty; expected a status byte',
        context.offset,
      );
    }

    const status = payload[0] ?? 0;
    const languageLength = status & LANGUAGE_LENGTH_MASK;
    if (1 + languageLength > payload.length) {
      throw new MalformedPayloadError(
        'Text',
        `language code length ${languageLength} exceeds payload of ${payload.length} bytes`,
        context.offset,
      );
    }

    const languageCode = asciiDecode(payload.subarray(1, 1 + languageLength));
    if (languageCode === undefined) {
      throw new MalformedPayloadError(
        'Text',
        'language code is not ASCII',
        context.offset + 1,
      );
    }

    const encoding = (status & UTF16_FLAG) !== 0 ? 'UTF-16' : 'UTF-8';
    const textBytes = payload.subarray(1 + languageLength);
    const text =
      encoding === 'UTF-16' ? utf16Decode(textBytes) : utf8Decode(textBytes);
    if (text === undefined) {
      throw new MalformedPayloadError(
        'Text',
        `text is not valid ${encoding}`,
        context.offset + 1 + languageLength,
      );
    }

    return { kind: 'text', languageCode, encoding, text };
  },

  encode(variant) {
    const language = asciiEncode(variant.languageCode);
    if (language === undefined) {
      throw new InvalidRecordError(
        `language code "${variant.languageCode}" is not ASCII`,
      );
    }
    if (language.length > LANGUAGE_LENGTH_MASK) {
      throw new PayloadTooLargeError(
        'languageCode',
        language.length,
        LANGUAGE_LENGTH_MASK,
      );
    }

    const utf16 = variant.encoding === 'UTF-16';
    const status = (utf16 ? UTF16_FLAG : 0) | language.length;
    const text = utf16 ? utf16Encode(variant.text) : utf8Encode(variant.text);

    return concatBytes([Uint8Array.of(status), language, text]);
  },
};
