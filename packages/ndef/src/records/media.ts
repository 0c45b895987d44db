import { utf8Decode } from '../codec/bytes.js';
import { MalformedPayloadError } from '../errors/index.js';
import type { RecordStrategy } from '../registry/types.js';
import type {
  EmptyVariant,
  ExternalVariant,
  MimeVariant,
} from '../types/index.js';

/**
 * MIME media record. The media type is carried verbatim in the record type;
 * the payload is opaque.
 */
export const mimeStrategy: RecordStrategy<MimeVariant> = {
  kind: 'mime',

  decode(payload, context) {
    const mimeType = utf8Decode(context.type);
    if (mimeType === undefined) {
      throw new MalformedPayloadError(
        'MIME',
        'media type is not valid UTF-8',
        context.offset,
      );
    }
    return { kind: 'mime', mimeType, data: payload.slice() };
  },

  encode(variant) {
    return variant.data;
  },
};

/**
 * NFC Forum external type record (`example.com:mytype`) with an opaque payload.
 */
export const externalStrategy: RecordStrategy<ExternalVariant> = {
  kind: 'external',

  decode(payload, context) {
    const domainType = utf8Decode(context.type);
    if (domainType === undefined) {
      throw new MalformedPayloadError(
        'External',
        'external type name is not valid UTF-8',
        context.offset,
      );
    }
    return { kind: 'external', domainType, data: payload.slice() };
  },

  encode(variant) {
    return variant.data;
  },
};

/**
 * TNF Empty. The codec has already checked that type, id and payload are empty.
 */
export const emptyStrategy: RecordStrategy<EmptyVariant> = {
  kind: 'empty',

  decode() {
    return { kind: 'empty' };
  },

  encode() {
    return new Uint8Array(0);
  },
};
