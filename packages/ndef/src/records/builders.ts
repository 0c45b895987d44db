import { toTypeBytes, utf8Encode } from '../codec/bytes.js';
import {
  type EmptyVariant,
  type ExternalVariant,
  type MimeVariant,
  type NdefRecord,
  type RawVariant,
  Tnf,
  type TextEncoding,
  type TextVariant,
  type UriVariant,
  type VariantShape,
} from '../types/index.js';
import { TEXT_TYPE } from './text.js';
import { URI_TYPE } from './uri.js';

/**
 * Options shared by every record builder.
 */
export interface RecordOptions {
  /** Record identifier; sets the IL flag when present */
  readonly id?: string | Uint8Array | undefined;
}

export interface TextRecordOptions extends RecordOptions {
  /** Defaults to 'en' */
  readonly languageCode?: string | undefined;
  /** Defaults to 'UTF-8' */
  readonly encoding?: TextEncoding | undefined;
}

function withId<V extends VariantShape>(
  record: NdefRecord<V>,
  id: string | Uint8Array | undefined,
): NdefRecord<V> {
  return id === undefined ? record : { ...record, id: toTypeBytes(id) };
}

/**
 * Creates a well-known Text record.
 *
 * @example
 * ```typescript
 * const record = textRecord('hello', { languageCode: 'en' });
 * ```
 */
export function textRecord(
  text: string,
  options: TextRecordOptions = {},
): NdefRecord<TextVariant> {
  return withId<TextVariant>(
    {
      tnf: Tnf.WellKnown,
      type: utf8Encode(TEXT_TYPE),
      variant: {
        kind: 'text',
        languageCode: options.languageCode ?? 'en',
        encoding: options.encoding ?? 'UTF-8',
        text,
      },
    },
    options.id,
  );
}

/**
 * Creates a well-known URI record. The prefix abbreviation is chosen on encode.
 */
export function uriRecord(
  uri: string,
  options: RecordOptions = {},
): NdefRecord<UriVariant> {
  return withId<UriVariant>(
    {
      tnf: Tnf.WellKnown,
      type: utf8Encode(URI_TYPE),
      variant: { kind: 'uri', uri },
    },
    options.id,
  );
}

/**
 * Creates a MIME media record, e.g. `mimeRecord('application/json', bytes)`.
 */
export function mimeRecord(
  mimeType: string,
  data: Uint8Array,
  options: RecordOptions = {},
): NdefRecord<MimeVariant> {
  return withId<MimeVariant>(
    {
      tnf: Tnf.Mime,
      type: utf8Encode(mimeType),
      variant: { kind: 'mime', mimeType, data },
    },
    options.id,
  );
}

/**
 * Creates an NFC Forum external type record, e.g. `externalRecord('example.com:cfg', bytes)`.
 */
export function externalRecord(
  domainType: string,
  data: Uint8Array,
  options: RecordOptions = {},
): NdefRecord<ExternalVariant> {
  return withId<ExternalVariant>(
    {
      tnf: Tnf.External,
      type: utf8Encode(domainType),
      variant: { kind: 'external', domainType, data },
    },
    options.id,
  );
}

/**
 * Creates a record whose payload bytes are written verbatim.
 */
export function rawRecord(
  tnf: Tnf,
  type: string | Uint8Array,
  payload: Uint8Array,
  options: RecordOptions = {},
): NdefRecord<RawVariant> {
  return withId<RawVariant>(
    {
      tnf,
      type: toTypeBytes(type),
      variant: { kind: 'raw', payload },
    },
    options.id,
  );
}

/**
 * Creates an Empty record, the conventional content of a blank NDEF tag.
 */
export function emptyRecord(): NdefRecord<EmptyVariant> {
  return {
    tnf: Tnf.Empty,
    type: new Uint8Array(0),
    variant: { kind: 'empty' },
  };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isTextRecord(
  record: NdefRecord,
): record is NdefRecord<TextVariant> {
  return record.variant.kind === 'text';
}

export function isUriRecord(
  record: NdefRecord,
): record is NdefRecord<UriVariant> {
  return record.variant.kind === 'uri';
}

export function isMimeRecord(
  record: NdefRecord,
): record is NdefRecord<MimeVariant> {
  return record.variant.kind === 'mime';
}

export function isExternalRecord(
  record: NdefRecord,
): record is NdefRecord<ExternalVariant> {
  return record.variant.kind === 'external';
}

export function isRawRecord(
  record: NdefRecord,
): record is NdefRecord<RawVariant> {
  return (
    record.variant.kind === 'raw' &&
    'payload' in record.variant &&
    record.variant.payload instanceof Uint8Array
  );
}

export function isEmptyRecord(
  record: NdefRecord,
): record is NdefRecord<EmptyVariant> {
  return record.variant.kind === 'empty';
}
