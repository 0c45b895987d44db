/**
 * Bit layout of the first byte of every NDEF record.
 *
 *   7    6    5    4    3    2  1  0
 *   MB   ME   CF   SR   IL   TNF
 */
export const HeaderFlag = {
  /** Message begin */
  MB: 0x80,
  /** Message end */
  ME: 0x40,
  /** Chunk flag */
  CF: 0x20,
  /** Short record: 1-byte payload length */
  SR: 0x10,
  /** ID length field present */
  IL: 0x08,
} as const;

export const TNF_MASK = 0x07;

/** Largest payload that still fits the 1-byte short-record length field. */
export const SHORT_RECORD_MAX = 0xff;

/** Largest value of the 4-byte payload length field. */
export const PAYLOAD_LENGTH_MAX = 0xffffffff;

/** Type and ID lengths are single bytes. */
export const TYPE_LENGTH_MAX = 0xff;
export const ID_LENGTH_MAX = 0xff;

export interface RecordHeader {
  readonly messageBegin: boolean;
  readonly messageEnd: boolean;
  readonly chunked: boolean;
  readonly shortRecord: boolean;
  readonly hasId: boolean;
  /** Raw 3-bit TNF; may be the reserved value 7 */
  readonly tnf: number;
}

export function parseHeader(byte: number): RecordHeader {
  return {
    messageBegin: (byte & HeaderFlag.MB) !== 0,
    messageEnd: (byte & HeaderFlag.ME) !== 0,
    chunked: (byte & HeaderFlag.CF) !== 0,
    shortRecord: (byte & HeaderFlag.SR) !== 0,
    hasId: (byte & HeaderFlag.IL) !== 0,
    tnf: byte & TNF_MASK,
  };
}

export function buildHeader(header: RecordHeader): number {
  let byte = header.tnf & TNF_MASK;
  if (header.messageBegin) byte |= HeaderFlag.MB;
  if (header.messageEnd) byte |= HeaderFlag.ME;
  if (header.chunked) byte |= HeaderFlag.CF;
  if (header.shortRecord) byte |= HeaderFlag.SR;
  if (header.hasId) byte |= HeaderFlag.IL;
  return byte;
}
