import { toHex, utf8Decode } from '../codec/bytes.js';
import {
  isEmptyRecord,
  isExternalRecord,
  isMimeRecord,
  isRawRecord,
  isTextRecord,
  isUriRecord,
} from '../records/builders.js';
import { type NdefMessage, type NdefRecord, tnfName } from '../types/index.js';

/**
 * Status line shown after a successful read.
 *
 * @example
 * ```typescript
 * readStatus(1); // 'Read successful: 1 record found'
 * readStatus(3); // 'Read successful: 3 records found'
 * ```
 */
export function readStatus(count: number): string {
  return `Read successful: ${count} record${count === 1 ? '' : 's'} found`;
}

/**
 * Describes one record as display lines. `index` is zero-based; the
 * heading numbers records from 1. The block ends with a blank line.
 */
export function describeRecord(record: NdefRecord, index: number): string[] {
  return [`• Record ${index + 1}`, `  ${describeContent(record)}`, ''];
}

/**
 * Describes every record of a message, one block per record.
 */
export function describeMessage(message: NdefMessage): string {
  return message
    .flatMap((record, index) => describeRecord(record, index))
    .map((line) => `${line}\n`)
    .join('');
}

function describeContent(record: NdefRecord): string {
  if (isTextRecord(record)) return `Text: ${record.variant.text}`;
  if (isUriRecord(record)) return `URI: ${record.variant.uri}`;
  if (isMimeRecord(record)) {
    return `MIME (${record.variant.mimeType}): ${record.variant.data.length} bytes`;
  }
  if (isExternalRecord(record)) {
    return `External (${record.variant.domainType}): ${record.variant.data.length} bytes`;
  }
  if (isEmptyRecord(record)) return 'Empty';
  if (isRawRecord(record)) {
    return `Raw: ${Buffer.from(record.variant.payload).toString('base64')}`;
  }

  // Variant produced by a custom strategy
  const type = utf8Decode(record.type) ?? toHex(record.type);
  return `${record.variant.kind} (${tnfName(record.tnf)} ${type})`;
}
