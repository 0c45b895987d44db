import { TruncatedBufferError } from '../errors/index.js';

/**
 * Forward-only cursor over a byte buffer. Every read is checked against the
 * remaining length and throws {@link TruncatedBufferError} instead of
 * reading past the end.
 */
export class ByteReader {
  private position = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.bytes.length - this.position;
  }

  readUint8(field: string): number {
    this.require(field, 1);
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  /** Reads a big-endian unsigned 32-bit integer. */
  readUint32(field: string): number {
    this.require(field, 4);
    const value = this.view.getUint32(this.position, false);
    this.position += 4;
    return value;
  }

  /** Reads `length` bytes into a new buffer that does not alias the input. */
  readBytes(field: string, length: number): Uint8Array {
    this.require(field, length);
    const value = this.bytes.slice(this.position, this.position + length);
    this.position += length;
    return value;
  }

  private require(field: string, length: number): void {
    if (length > this.remaining) {
      throw new TruncatedBufferError(
        field,
        this.position,
        length,
        this.remaining,
      );
    }
  }
}
