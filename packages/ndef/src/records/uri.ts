import { concatBytes, utf8Decode, utf8Encode } from '../codec/bytes.js';
import { MalformedPayloadError } from '../errors/index.js';
import type { RecordStrategy } from '../registry/types.js';
import type { UriVariant } from '../types/index.js';
import { URI_PREFIXES, selectUriPrefix } from './uri-prefixes.js';

export const URI_TYPE = 'U';

/**
 * Well-known URI record: one prefix code byte, then the UTF-8 remainder.
 */
export const uriStrategy: RecordStrategy<UriVariant> = {
  kind: 'uri',

  decode(payload, context) {
    if (payload.length === 0) {
      throw new MalformedPayloadError(
        'URI',
        'payload is empty; expected a prefix code',
        context.offset,
      );
    }

    const code = payload[0] ?? 0;
    const prefix = URI_PREFIXES[code];
    if (prefix === undefined) {
      throw new MalformedPayloadError(
        'URI',
        `prefix code 0x${code.toString(16).padStart(2, '0')} is reserved`,
        context.offset,
      );
    }

    const remainder = utf8Decode(payload.subarray(1));
    if (remainder === undefined) {
      throw new MalformedPayloadError(
        'URI',
        'URI is not valid UTF-8',
        context.offset + 1,
      );
    }

    return { kind: 'uri', uri: prefix + remainder };
  },

  encode(variant) {
    const code = selectUriPrefix(variant.uri);
    const prefix = URI_PREFIXES[code] ?? '';
    return concatBytes([
      Uint8Array.of(code),
      utf8Encode(variant.uri.slice(prefix.length)),
    ]);
  },
};
