/**
 * Type Name Format: the 3-bit header field that says how a record's `type`
 * bytes are interpreted.
 */
export const Tnf = {
  Empty: 0x00,
  WellKnown: 0x01,
  Mime: 0x02,
  AbsoluteUri: 0x03,
  External: 0x04,
  Unknown: 0x05,
  Unchanged: 0x06,
} as const;

export type Tnf = (typeof Tnf)[keyof typeof Tnf];

/** 0x07 is reserved by the NFC Forum and never valid on a tag. */
export const RESERVED_TNF = 0x07;

const TNF_NAMES: Record<Tnf, string> = {
  [Tnf.Empty]: 'Empty',
  [Tnf.WellKnown]: 'WellKnown',
  [Tnf.Mime]: 'MIME',
  [Tnf.AbsoluteUri]: 'AbsoluteURI',
  [Tnf.External]: 'External',
  [Tnf.Unknown]: 'Unknown',
  [Tnf.Unchanged]: 'Unchanged',
};

export function isTnf(value: number): value is Tnf {
  return Number.isInteger(value) && value >= 0x00 && value <= 0x06;
}

export function tnfName(tnf: Tnf): string {
  return TNF_NAMES[tnf];
}
