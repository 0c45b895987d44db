/**
 * A tag found by a provider's poll. Opaque to the codec.
 */
export interface TagHandle {
  /** Tag UID, hex encoded */
  readonly id: string;

  /** Air interface, e.g. 'ISO 15693' */
  readonly standard?: string | undefined;

  /** Whether the tag accepts NDEF writes */
  readonly ndefWritable: boolean;

  /** Size of the NDEF area in bytes, when the provider knows it */
  readonly ndefCapacity?: number | undefined;
}

/**
 * Options for polling a tag.
 */
export interface PollOptions {
  /** Give up after this many milliseconds */
  readonly timeoutMs: number;

  /** Prompt shown by platforms with a system scan sheet */
  readonly alertMessage?: string | undefined;
}

/**
 * Options for ending a tag session.
 */
export interface FinishOptions {
  /** Success message for platforms with a system scan sheet */
  readonly alertMessage?: string | undefined;

  /** Failure message for platforms with a system scan sheet */
  readonly errorMessage?: string | undefined;
}

/**
 * Capability interface over a platform NFC stack.
 *
 * Implementations move raw NDEF message bytes between the host and a
 * physical tag; they never parse them. At most one session is open at a
 * time and callers must serialise access (see {@link TagController}).
 */
export interface TagSessionProvider {
  /** Provider name for logging (e.g. 'memory') */
  readonly name: string;

  /**
   * Waits for a tag to enter the field.
   */
  poll(options: PollOptions): Promise<TagHandle>;

  /**
   * Reads the NDEF message stored on the tag.
   */
  readRawMessage(tag: TagHandle): Promise<Uint8Array>;

  /**
   * Replaces the NDEF message stored on the tag.
   */
  writeRawMessage(tag: TagHandle, bytes: Uint8Array): Promise<void>;

  /**
   * Ends the current session and releases the reader.
   */
  finish(options?: FinishOptions): Promise<void>;
}

/**
 * Tag controller states. A controller is busy in any state but 'idle'.
 */
export type TagControllerState = 'idle' | 'reading' | 'writing';
