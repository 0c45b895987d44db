import {
  EmptyMessageError,
  InvalidRecordError,
  MalformedPayloadError,
  MalformedRecordError,
  MissingMessageEndError,
  NdefDecodeError,
  PayloadTooLargeError,
  UnsupportedChunkingError,
  VariantMismatchError,
} from '../errors/index.js';
import { type NdefHooks, SafeHooks } from '../hooks/index.js';
import {
  isExternalRecord,
  isMimeRecord,
  isRawRecord,
} from '../records/builders.js';
import { createBuiltinRegistry } from '../registry/builtins.js';
import type { VariantRegistry } from '../registry/registry.js';
import type {
  RecordStrategy,
  RegisterOptions,
  StrategyContext,
} from '../registry/types.js';
import {
  type DecodeResult,
  type NdefMessage,
  type NdefRecord,
  type RawVariant,
  Tnf,
  type VariantShape,
  decodeFailure,
  decodeSuccess,
  isTnf,
} from '../types/index.js';
import { ByteReader } from './byte-reader.js';
import {
  concatBytes,
  equalIgnoringAsciiCase,
  toHex,
  utf8Decode,
  utf8Encode,
} from './bytes.js';
import {
  ID_LENGTH_MAX,
  PAYLOAD_LENGTH_MAX,
  SHORT_RECORD_MAX,
  TYPE_LENGTH_MAX,
  buildHeader,
  parseHeader,
} from './header.js';

/**
 * Configuration for an {@link NdefCodec}.
 */
export interface NdefCodecConfig {
  /**
   * Strategy table used for both directions.
   * Defaults to a fresh registry with the built-in strategies.
   */
  readonly registry?: VariantRegistry | undefined;
}

/**
 * Encodes and decodes NDEF messages in the NFC Forum binary format.
 *
 * Single unchunked messages only; short and normal records are both read,
 * and the encoder picks the short form whenever the payload fits one byte.
 *
 * @example
 * ```typescript
 * const codec = new NdefCodec();
 * const bytes = codec.encode([textRecord('hello'), uriRecord('https://example.com')]);
 * const message = codec.decode(bytes);
 * ```
 */
export class NdefCodec {
  readonly registry: VariantRegistry;
  private readonly hooks: SafeHooks;

  constructor(config: NdefCodecConfig = {}, hooks?: NdefHooks) {
    this.registry = config.registry ?? createBuiltinRegistry();
    this.hooks = new SafeHooks(hooks);
  }

  /**
   * Adds a strategy to this codec's registry. Affects subsequent calls only.
   */
  registerVariant<V extends VariantShape>(
    tnf: Tnf,
    type: string | Uint8Array | null,
    strategy: RecordStrategy<V>,
    options?: RegisterOptions,
  ): this {
    this.registry.registerVariant(tnf, type, strategy, options);
    return this;
  }

  /**
   * Decodes a buffer into a message.
   *
   * @throws NdefDecodeError subclasses describing the first problem found
   */
  decode(bytes: Uint8Array): NdefMessage {
    try {
      return this.decodeRecords(bytes);
    } catch (error) {
      if (error instanceof NdefDecodeError) {
        this.hooks.onDecodeError({ error, bytes });
      }
      throw error;
    }
  }

  /**
   * Decodes a buffer without throwing for malformed input.
   */
  tryDecode(bytes: Uint8Array): DecodeResult<NdefDecodeError> {
    try {
      return decodeSuccess(this.decode(bytes));
    } catch (error) {
      if (error instanceof NdefDecodeError) {
        return decodeFailure(error);
      }
      throw error;
    }
  }

  /**
   * Encodes records into a single message. MB goes on the first record and
   * ME on the last; every length field is computed from the variant.
   *
   * @throws EmptyMessageError for an empty list
   * @throws NdefEncodeError subclasses for records that cannot be written
   */
  encode(records: readonly NdefRecord[]): Uint8Array {
    if (records.length === 0) {
      throw new EmptyMessageError('no records to encode');
    }

    const last = records.length - 1;
    return concatBytes(
      records.map((record, index) =>
        this.encodeRecord(record, index === 0, index === last),
      ),
    );
  }

  /**
   * Computes the payload bytes a record would be written with.
   */
  payloadOf(record: NdefRecord): Uint8Array {
    if (isRawRecord(record)) {
      return record.variant.payload;
    }

    const strategy = this.registry.resolve(record.tnf, record.type);
    if (!strategy) {
      throw new VariantMismatchError('raw', record.variant.kind);
    }
    if (strategy.kind !== record.variant.kind) {
      throw new VariantMismatchError(strategy.kind, record.variant.kind);
    }
    return strategy.encode(record.variant);
  }

  private decodeRecords(bytes: Uint8Array): NdefMessage {
    if (bytes.length === 0) {
      throw new EmptyMessageError('buffer is empty');
    }

    const reader = new ByteReader(bytes);
    const records: NdefRecord[] = [];

    while (reader.remaining > 0) {
      const recordOffset = reader.offset;
      const recordIndex = records.length;
      const header = parseHeader(reader.readUint8('record header'));

      if (header.chunked) {
        throw new UnsupportedChunkingError(recordOffset, recordIndex);
      }
      if (recordIndex === 0 && !header.messageBegin) {
        throw new EmptyMessageError(
          'first record has no message-begin flag',
          recordOffset,
        );
      }
      if (recordIndex > 0 && header.messageBegin) {
        throw new MalformedRecordError(
          `message-begin flag set on record ${recordIndex}`,
          recordOffset,
        );
      }

      const tnf = header.tnf;
      if (!isTnf(tnf)) {
        throw new MalformedRecordError(`reserved TNF 0x0${tnf}`, recordOffset);
      }
      if (tnf === Tnf.Unchanged) {
        throw new MalformedRecordError(
          'TNF Unchanged is only valid in chunked records',
          recordOffset,
        );
      }

      const typeLength = reader.readUint8('type length');
      const payloadLength = header.shortRecord
        ? reader.readUint8('payload length')
        : reader.readUint32('payload length');
      const idLength = header.hasId ? reader.readUint8('id length') : 0;

      const type = reader.readBytes('type', typeLength);
      const id = header.hasId ? reader.readBytes('id', idLength) : undefined;
      const payloadOffset = reader.offset;
      const payload = reader.readBytes('payload', payloadLength);

      if (
        tnf === Tnf.Empty &&
        (typeLength > 0 || idLength > 0 || payloadLength > 0)
      ) {
        throw new MalformedRecordError(
          'Empty record carries a type, id or payload',
          recordOffset,
        );
      }

      records.push(
        this.buildRecord(payload, {
          tnf,
          type,
          id,
          recordIndex,
          offset: payloadOffset,
        }),
      );

      if (header.messageEnd) {
        return records;
      }
    }

    throw new MissingMessageEndError(records.length, reader.offset);
  }

  private buildRecord(
    payload: Uint8Array,
    context: StrategyContext,
  ): NdefRecord {
    const { tnf, type, id } = context;
    const base = id === undefined ? { tnf, type } : { tnf, type, id };
    const strategy = this.registry.resolve(tnf, type);

    if (!strategy) {
      this.hooks.logger.debug(
        `[ndef] Record ${context.recordIndex} (TNF ${tnf}, type 0x${toHex(type)}) has no registered strategy, keeping raw payload`,
      );
      this.hooks.onRawFallback({ recordIndex: context.recordIndex, tnf, type });
      const raw: RawVariant = { kind: 'raw', payload };
      return { ...base, variant: raw };
    }

    let variant: VariantShape;
    try {
      variant = strategy.decode(payload, context);
    } catch (error) {
      if (error instanceof NdefDecodeError) throw error;
      throw new MalformedPayloadError(
        strategy.kind,
        error instanceof Error ? error.message : String(error),
        context.offset,
      );
    }

    return { ...base, variant };
  }

  private encodeRecord(
    record: NdefRecord,
    first: boolean,
    last: boolean,
  ): Uint8Array {
    const { tnf, type, id } = record;

    if (!isTnf(tnf)) {
      throw new InvalidRecordError(`TNF ${tnf} is reserved or out of range`);
    }
    if (tnf === Tnf.Unchanged) {
      throw new InvalidRecordError(
        'TNF Unchanged is only valid in chunked records',
      );
    }

    const payload = this.payloadOf(record);
    checkDeclaredType(record);

    if (
      tnf === Tnf.Empty &&
      (type.length > 0 || (id?.length ?? 0) > 0 || payload.length > 0)
    ) {
      throw new InvalidRecordError(
        'Empty records cannot carry a type, id or payload',
      );
    }
    if (type.length > TYPE_LENGTH_MAX) {
      throw new PayloadTooLargeError('type', type.length, TYPE_LENGTH_MAX);
    }
    if (id !== undefined && id.length > ID_LENGTH_MAX) {
      throw new PayloadTooLargeError('id', id.length, ID_LENGTH_MAX);
    }
    if (payload.length > PAYLOAD_LENGTH_MAX) {
      throw new PayloadTooLargeError(
        'payload',
        payload.length,
        PAYLOAD_LENGTH_MAX,
      );
    }

    const shortRecord = payload.length <= SHORT_RECORD_MAX;
    const header = buildHeader({
      messageBegin: first,
      messageEnd: last,
      chunked: false,
      shortRecord,
      hasId: id !== undefined,
      tnf,
    });

    const lengths = [header, type.length];
    if (shortRecord) {
      lengths.push(payload.length);
    } else {
      lengths.push(
        (payload.length >>> 24) & 0xff,
        (payload.length >>> 16) & 0xff,
        (payload.length >>> 8) & 0xff,
        payload.length & 0xff,
      );
    }
    if (id !== undefined) {
      lengths.push(id.length);
    }

    return concatBytes([
      Uint8Array.from(lengths),
      type,
      id ?? new Uint8Array(0),
      payload,
    ]);
  }
}

/**
 * MIME and External variants repeat the record type. The decoder rebuilds
 * them from the type, so the two must agree (ignoring ASCII case).
 */
function checkDeclaredType(record: NdefRecord): void {
  let declared: string | undefined;
  if (record.tnf === Tnf.Mime && isMimeRecord(record)) {
    declared = record.variant.mimeType;
  } else if (record.tnf === Tnf.External && isExternalRecord(record)) {
    declared = record.variant.domainType;
  }

  if (
    declared !== undefined &&
    !equalIgnoringAsciiCase(utf8Encode(declared), record.type)
  ) {
    const actual = utf8Decode(record.type) ?? `0x${toHex(record.type)}`;
    throw new InvalidRecordError(
      `${record.variant.kind} variant names type "${declared}" but the record type is "${actual}"`,
    );
  }
}

const defaultCodec = new NdefCodec();

/**
 * Decodes a message using only the built-in strategies.
 */
export function decodeMessage(bytes: Uint8Array): NdefMessage {
  return defaultCodec.decode(bytes);
}

/**
 * Encodes a message using only the built-in strategies.
 */
export function encodeMessage(records: readonly NdefRecord[]): Uint8Array {
  return defaultCodec.encode(records);
}
