/**
 * Base class for every error raised by the NDEF codec and the tag session layer.
 *
 * `name` is pinned to the concrete class name so it survives serialization
 * into logs, and every subclass supplies a `description` telling the reader
 * what happened and what ACTION to take.
 */
export abstract class NdefError extends Error {
  declare readonly name: string;

  abstract readonly description: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.defineProperty(this, 'name', {
      value: this.constructor.name,
      enumerable: true,
      configurable: false,
      writable: false,
    });
  }

  /**
   * Returns a serializable representation for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      description: this.description,
      stack: this.stack,
    };
  }
}

// ============================================================================
// Decode Errors
// ============================================================================

/**
 * Base class for failures while reading an NDEF byte buffer.
 * `offset` is the buffer position at which the problem was detected.
 */
export abstract class NdefDecodeError extends NdefError {
  constructor(
    message: string,
    public readonly offset: number,
  ) {
    super(message);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), offset: this.offset };
  }
}

/**
 * Thrown when a record header has the chunk flag (CF) set.
 */
export class UnsupportedChunkingError extends NdefDecodeError {
  readonly description =
    'The message contains a chunked record, which this codec does not reassemble. ' +
    'ACTION: Rewrite the tag with the payload in a single record. ' +
    'Tags written by phones and common NDEF tooling never chunk records.';

  constructor(
    offset: number,
    public readonly recordIndex: number,
  ) {
    super(
      `Record ${recordIndex} at offset ${offset} is chunked (CF flag set); chunked records are not supported.`,
      offset,
    );
  }
}

/**
 * Thrown when a length field asks for more bytes than the buffer holds.
 */
export class TruncatedBufferError extends NdefDecodeError {
  readonly description =
    'A length field in the message declares more bytes than were read from the tag. ' +
    'ACTION: Read the tag again while holding it still; a partial read is the usual cause. ' +
    'If it keeps failing, the stored message is corrupt and the tag should be rewritten.';

  constructor(
    public readonly field: string,
    offset: number,
    public readonly needed: number,
    public readonly available: number,
  ) {
    super(
      `Truncated buffer reading ${field} at offset ${offset}: needed ${needed} byte(s), ${available} available.`,
      offset,
    );
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      needed: this.needed,
      available: this.available,
    };
  }
}

/**
 * Thrown when a typed payload (Text, URI, ...) breaks its own layout.
 */
export class MalformedPayloadError extends NdefDecodeError {
  readonly description =
    'A record payload does not match the layout its type promises, ' +
    'for example a Text status byte declaring a language code longer than the payload. ' +
    'ACTION: Check the application that wrote the tag. ' +
    'The record framing is intact, so the rest of the message was readable.';

  constructor(
    public readonly recordKind: string,
    public readonly reason: string,
    offset = 0,
  ) {
    super(`Malformed ${recordKind} payload: ${reason}`, offset);
  }
}

/**
 * Thrown when a record header is structurally invalid.
 */
export class MalformedRecordError extends NdefDecodeError {
  readonly description =
    'A record header breaks the NDEF framing rules ' +
    '(reserved TNF, misplaced message-begin flag, or an Empty record carrying data). ' +
    'ACTION: The tag content was not written by a conforming NDEF writer; rewrite the tag.';

  constructor(reason: string, offset: number) {
    super(`Malformed record at offset ${offset}: ${reason}`, offset);
  }
}

/**
 * Thrown when a buffer holds no records, or the first record lacks MB.
 * Also thrown by the encoder for an empty record list.
 */
export class EmptyMessageError extends NdefDecodeError {
  readonly description =
    'No NDEF message was found. ' +
    'ACTION: The tag is blank or not NDEF-formatted. Format it or write a message first. ' +
    'To store an intentionally empty message, write a single Empty record.';

  constructor(reason = 'no records', offset = 0) {
    super(`Empty NDEF message: ${reason}.`, offset);
  }
}

/**
 * Thrown when the buffer ends before a record with ME is read.
 */
export class MissingMessageEndError extends NdefDecodeError {
  readonly description =
    'The buffer ended before the record marked as the end of the message. ' +
    'ACTION: Read the tag again. A persistent failure means the message was cut off ' +
    'when written, and the tag should be rewritten.';

  constructor(
    public readonly recordCount: number,
    offset: number,
  ) {
    super(
      `Buffer ended at offset ${offset} after ${recordCount} record(s) without a message-end flag.`,
      offset,
    );
  }
}

// ============================================================================
// Encode Errors
// ============================================================================

/**
 * Base class for failures while building an NDEF byte buffer.
 */
export abstract class NdefEncodeError extends NdefError {}

/**
 * Thrown when a length does not fit the width of its wire field.
 */
export class PayloadTooLargeError extends NdefEncodeError {
  readonly description =
    'A record field is longer than its NDEF length field can express. ' +
    'ACTION: Shorten the field. Type and ID are limited to 255 bytes, ' +
    'Text language codes to 63 bytes, payloads to 4294967295 bytes; ' +
    'physical tags are usually far smaller.';

  constructor(
    public readonly field: string,
    public readonly length: number,
    public readonly max: number,
  ) {
    super(`${field} is ${length} bytes; the maximum is ${max}.`);
  }
}

/**
 * Thrown when a record's variant does not belong to the strategy registered
 * for its TNF and type.
 */
export class VariantMismatchError extends NdefEncodeError {
  readonly description =
    'The record variant does not match the strategy registered for its type. ' +
    'ACTION: Build records with the record builders (textRecord, uriRecord, ...) ' +
    'or use a raw variant to write arbitrary payload bytes.';

  constructor(
    public readonly expectedKind: string,
    public readonly actualKind: string,
  ) {
    super(
      `Record variant "${actualKind}" cannot be encoded by the "${expectedKind}" strategy registered for its type.`,
    );
  }
}

/**
 * Thrown when a record cannot exist on the wire.
 */
export class InvalidRecordError extends NdefEncodeError {
  readonly description =
    'The record is structurally invalid and cannot be written. ' +
    'ACTION: Use a TNF between 0 and 6 and keep Empty records free of type, id and payload. ' +
    'MIME and External variants must name the same type as the record; build them with mimeRecord() or externalRecord().';

  constructor(reason: string) {
    super(`Invalid record: ${reason}`);
  }
}

// ============================================================================
// Registry & Configuration Errors
// ============================================================================

/**
 * Thrown when a strategy registration conflicts with an existing one.
 */
export class RegistryError extends NdefError {
  readonly description =
    'A record strategy is already registered for this TNF and type. ' +
    'ACTION: Pass { override: true } to replace it deliberately, ' +
    'or register the strategy under a different type.';
}

/**
 * Thrown when a config string cannot be built or parsed.
 */
export class ConfigFormatError extends NdefError {
  readonly description =
    'A config text record is not a comma separated list of key=value pairs. ' +
    'ACTION: Keys must be non-empty, and neither keys nor values may contain "," or "=".';
}

// ============================================================================
// Tag Session Errors
// ============================================================================

/**
 * Thrown when a tag operation starts while another is still running.
 */
export class TagBusyError extends NdefError {
  readonly description =
    'A tag read or write is already in progress. ' +
    'ACTION: Wait for the current operation to finish. Disable read/write controls ' +
    'while the controller is busy.';

  constructor(
    public readonly operation: string,
    public readonly activeState: string,
  ) {
    super(`Cannot start ${operation}: tag controller is busy (${activeState}).`);
  }
}

/**
 * Thrown when the presented tag refuses NDEF writes.
 */
export class TagNotWritableError extends NdefError {
  readonly description =
    'The tag is read-only or not NDEF-formatted. ' +
    'ACTION: Use a different tag, or format the tag for NDEF before writing.';

  constructor(public readonly tagId: string) {
    super(`Tag "${tagId}" is not NDEF writable.`);
  }
}

/**
 * Thrown when an encoded message does not fit on the presented tag.
 */
export class TagCapacityError extends NdefError {
  readonly description =
    'The encoded message is larger than the NDEF area of the tag. ' +
    'ACTION: Shorten the records or use a tag with more memory.';

  constructor(
    public readonly tagId: string,
    public readonly size: number,
    public readonly capacity: number,
  ) {
    super(
      `Message of ${size} bytes does not fit tag "${tagId}" (capacity ${capacity} bytes).`,
    );
  }
}

/**
 * Thrown when a tag operation is requested but no session provider is configured.
 */
export class TagProviderMissingError extends NdefError {
  readonly description =
    'No tag session provider is configured. ' +
    'ACTION: Pass a provider in the module or controller options. ' +
    'Use MemoryTagProvider in tests.';

  constructor(operation: string) {
    super(`Cannot perform ${operation}: no tag session provider configured.`);
  }
}

/**
 * Thrown by a provider when polling ends without a tag in the field.
 */
export class NoTagPresentError extends NdefError {
  readonly description =
    'No tag was presented before the poll timed out. ' +
    'ACTION: Hold the tag against the reader and try again.';

  constructor(public readonly timeoutMs: number) {
    super(`No tag presented within ${timeoutMs}ms.`);
  }
}

/**
 * Thrown by a provider when the tag leaves the field mid-session.
 */
export class TagLostError extends NdefError {
  readonly description =
    'The tag was removed from the reader during the operation. ' +
    'ACTION: Hold the tag still until the operation reports success, then retry. ' +
    'An interrupted write may leave the tag with a partial message.';

  constructor(public readonly tagId: string) {
    super(`Tag "${tagId}" left the field before the operation completed.`);
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isNdefError(error: unknown): error is NdefError {
  return error instanceof NdefError;
}

export function isNdefDecodeError(error: unknown): error is NdefDecodeError {
  return error instanceof NdefDecodeError;
}

export function isNdefEncodeError(error: unknown): error is NdefEncodeError {
  return error instanceof NdefEncodeError;
}

export function isTagBusyError(error: unknown): error is TagBusyError {
  return error instanceof TagBusyError;
}
