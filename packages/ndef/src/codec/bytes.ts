const utf8Encoder = new TextEncoder();
// ignoreBOM keeps a leading U+FEFF in the text instead of stripping it
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export function utf8Encode(value: string): Uint8Array {
  return utf8Encoder.encode(value);
}

/**
 * Lower-cases ASCII letters, leaving every other byte as is.
 */
export function asciiLowerCase(bytes: Uint8Array): Uint8Array {
  return bytes.map((byte) => (byte >= 0x41 && byte <= 0x5a ? byte + 0x20 : byte));
}

export function equalIgnoringAsciiCase(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  const left = asciiLowerCase(a);
  const right = asciiLowerCase(b);
  return left.every((byte, index) => byte === right[index]);
}

/**
 * Decodes UTF-8, returning undefined for invalid sequences.
 */
export function utf8Decode(bytes: Uint8Array): string | undefined {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    return undefined;
  }
}

/**
 * Encodes a string as UTF-16 big-endian preceded by a FE FF byte-order mark.
 */
export function utf16Encode(value: string): Uint8Array {
  const out = new Uint8Array(2 + value.length * 2);
  out[0] = 0xfe;
  out[1] = 0xff;
  for (let i = 0; i < value.length; i++) {
    const unit = value.charCodeAt(i);
    out[2 + i * 2] = unit >> 8;
    out[3 + i * 2] = unit & 0xff;
  }
  return out;
}

/**
 * Decodes UTF-16. A leading BOM selects the byte order and is dropped;
 * without one the bytes are read big-endian. Returns undefined for an odd
 * byte count.
 */
export function utf16Decode(bytes: Uint8Array): string | undefined {
  if (bytes.length % 2 !== 0) return undefined;

  let start = 0;
  let littleEndian = false;
  if (bytes.length >= 2) {
    if (bytes[0] === 0xfe && bytes[1] === 0xff) {
      start = 2;
    } else if (bytes[0] === 0xff && bytes[1] === 0xfe) {
      start = 2;
      littleEndian = true;
    }
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const units: number[] = [];
  for (let i = start; i < bytes.length; i += 2) {
    units.push(view.getUint16(i, littleEndian));
  }

  let text = '';
  // fromCharCode takes its units as arguments; keep batches well under the stack limit
  for (let i = 0; i < units.length; i += 4096) {
    text += String.fromCharCode(...units.slice(i, i + 4096));
  }
  return text;
}

/**
 * Encodes a string whose characters are all 7-bit ASCII.
 * Returns undefined when any character is outside that range.
 */
export function asciiEncode(value: string): Uint8Array | undefined {
  const out = new Uint8Array(value.length);
  for (let i = 0; i < value.length; i++) {
    const code = value.charCodeAt(i);
    if (code > 0x7f) return undefined;
    out[i] = code;
  }
  return out;
}

export function asciiDecode(bytes: Uint8Array): string | undefined {
  let text = '';
  for (const byte of bytes) {
    if (byte > 0x7f) return undefined;
    text += String.fromCharCode(byte);
  }
  return text;
}

/**
 * Converts a type given as a string (UTF-8) or bytes into bytes.
 */
export function toTypeBytes(type: string | Uint8Array): Uint8Array {
  return typeof type === 'string' ? utf8Encode(type) : type;
}

export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  const length = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function toHex(bytes: Uint8Array, separator = ''): string {
  return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join(
    separator,
  );
}

/**
 * Parses a hex string. Whitespace, colons and an optional 0x prefix are
 * ignored. Returns undefined for odd-length or non-hex input.
 */
export function fromHex(hex: string): Uint8Array | undefined {
  const clean = hex.replace(/^0x/i, '').replace(/[\s:]/g, '');
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    return undefined;
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
