import { ConfigFormatError } from '../errors/index.js';
import {
  type TextRecordOptions,
  isTextRecord,
  textRecord,
} from '../records/builders.js';
import type { NdefMessage, NdefRecord, TextVariant } from '../types/index.js';

/**
 * Ordered key/value settings stored in a Text record as `k1=v1,k2=v2`.
 */
export type ConfigEntries = Readonly<Record<string, string>>;

const RESERVED = /[,=]/;

/**
 * Formats entries in insertion order.
 *
 * Keys and values are written as given, so surrounding whitespace, which
 * {@link parseConfigText} trims, is refused.
 *
 * @throws ConfigFormatError if a key is empty, contains `,` or `=`, or has surrounding whitespace (likewise for values)
 */
export function formatConfigText(entries: ConfigEntries): string {
  return Object.entries(entries)
    .map(([key, value]) => {
      if (key.length === 0) {
        throw new ConfigFormatError('Config keys must not be empty.');
      }
      if (RESERVED.test(key)) {
        throw new ConfigFormatError(`Config key "${key}" contains "," or "=".`);
      }
      if (key !== key.trim()) {
        throw new ConfigFormatError(
          `Config key "${key}" has leading or trailing whitespace.`,
        );
      }
      if (RESERVED.test(value)) {
        throw new ConfigFormatError(
          `Value of config key "${key}" contains "," or "=".`,
        );
      }
      if (value !== value.trim()) {
        throw new ConfigFormatError(
          `Value of config key "${key}" has leading or trailing whitespace.`,
        );
      }
      return `${key}=${value}`;
    })
    .join(',');
}

/**
 * Parses `k1=v1,k2=v2`. Whitespace around each pair is trimmed and empty
 * segments are skipped; a later duplicate key replaces an earlier value.
 *
 * @throws ConfigFormatError for a segment without `=` or with an empty key
 */
export function parseConfigText(text: string): Record<string, string> {
  const entries = new Map<string, string>();

  for (const segment of text.split(',')) {
    const pair = segment.trim();
    if (pair.length === 0) continue;

    const separator = pair.indexOf('=');
    if (separator === -1) {
      throw new ConfigFormatError(`Config segment "${pair}" has no "=".`);
    }
    const key = pair.slice(0, separator).trim();
    if (key.length === 0) {
      throw new ConfigFormatError(`Config segment "${pair}" has an empty key.`);
    }
    entries.set(key, pair.slice(separator + 1).trim());
  }

  // fromEntries defines own properties, so a "__proto__" key stays an entry
  return Object.fromEntries(entries);
}

/**
 * Creates the UTF-8 Text record that carries a config string.
 *
 * @example
 * ```typescript
 * createConfigRecord({ minpres: '10', maxpres: '90' });
 * // Text record "minpres=10,maxpres=90", language "en"
 * ```
 */
export function createConfigRecord(
  entries: ConfigEntries,
  options: Pick<TextRecordOptions, 'languageCode' | 'id'> = {},
): NdefRecord<TextVariant> {
  return textRecord(formatConfigText(entries), {
    ...options,
    encoding: 'UTF-8',
  });
}

/**
 * Reads config entries from the first Text record of a message.
 * Returns `undefined` when the message has no Text record.
 */
export function readConfigRecord(
  message: NdefMessage,
): Record<string, string> | undefined {
  const record = message.find(isTextRecord);
  return record ? parseConfigText(record.variant.text) : undefined;
}
