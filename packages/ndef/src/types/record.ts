import type { Tnf } from './tnf.js';

/**
 * Minimal shape every record variant shares. Custom strategies return
 * their own variants extending this.
 */
export interface VariantShape {
  readonly kind: string;
}

/** Character encoding selected by bit 7 of a Text record status byte. */
export type TextEncoding = 'UTF-8' | 'UTF-16';

/**
 * Well-known Text record (`T`).
 */
export interface TextVariant extends VariantShape {
  readonly kind: 'text';
  /** IANA language code, e.g. "en" or "en-US" */
  readonly languageCode: string;
  readonly encoding: TextEncoding;
  readonly text: string;
}

/**
 * Well-known URI record (`U`). The abbreviation prefix is resolved on decode
 * and chosen again on encode, so `uri` is always the full string.
 */
export interface UriVariant extends VariantShape {
  readonly kind: 'uri';
  readonly uri: string;
}

/**
 * MIME media record. The media type lives in the record `type`.
 */
export interface MimeVariant extends VariantShape {
  readonly kind: 'mime';
  readonly mimeType: string;
  readonly data: Uint8Array;
}

/**
 * NFC Forum external type record (`domain:type`).
 */
export interface ExternalVariant extends VariantShape {
  readonly kind: 'external';
  readonly domainType: string;
  readonly data: Uint8Array;
}

/**
 * Any record whose TNF and type have no registered strategy.
 */
export interface RawVariant extends VariantShape {
  readonly kind: 'raw';
  readonly payload: Uint8Array;
}

/**
 * A record with TNF Empty: no type, id or payload.
 */
export interface EmptyVariant extends VariantShape {
  readonly kind: 'empty';
}

export type BuiltinVariant =
  | TextVariant
  | UriVariant
  | MimeVariant
  | ExternalVariant
  | RawVariant
  | EmptyVariant;

/**
 * A single NDEF record.
 *
 * The payload is not stored: it is always derived from `variant` by the
 * strategy registered for `(tnf, type)`, so length fields written to the tag
 * match the content by construction.
 */
export interface NdefRecord<V extends VariantShape = VariantShape> {
  readonly tnf: Tnf;
  readonly type: Uint8Array;
  readonly id?: Uint8Array | undefined;
  readonly variant: V;
}

/**
 * An NDEF message: an ordered, non-empty list of records.
 */
export type NdefMessage = readonly NdefRecord[];

/**
 * Result of a non-throwing decode.
 */
export type DecodeResult<E extends Error = Error> =
  | { readonly ok: true; readonly message: NdefMessage }
  | { readonly ok: false; readonly error: E };

export function decodeSuccess<E extends Error>(
  message: NdefMessage,
): DecodeResult<E> {
  return { ok: true, message };
}

export function decodeFailure<E extends Error>(error: E): DecodeResult<E> {
  return { ok: false, error };
}
