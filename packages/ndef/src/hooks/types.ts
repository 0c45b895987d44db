import type { NdefDecodeError } from '../errors/index.js';
import type { TagControllerState } from '../session/types.js';
import type { Tnf } from '../types/index.js';

/**
 * Logger interface for internal logging.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Default logger that uses console.
 */
export const consoleLogger: Logger = {
  debug: (message, ...args) => console.debug(message, ...args),
  info: (message, ...args) => console.info(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
  error: (message, ...args) => console.error(message, ...args),
};

/**
 * Logger that discards everything. Handy in tests and in the CLI.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Context for the decode error hook.
 */
export interface DecodeErrorContext {
  readonly error: NdefDecodeError;
  /** The buffer that failed to decode */
  readonly bytes: Uint8Array;
}

/**
 * Context for the raw fallback hook, fired when a record has no
 * registered strategy and is kept as raw bytes.
 */
export interface RawFallbackContext {
  readonly recordIndex: number;
  readonly tnf: Tnf;
  readonly type: Uint8Array;
}

/**
 * Context for tag controller state changes.
 */
export interface StateChangeContext {
  readonly previous: TagControllerState;
  readonly current: TagControllerState;
  /** Name of the session provider (e.g. 'memory') */
  readonly provider: string;
}

/**
 * All available hooks. Every hook is optional and synchronous;
 * a throwing hook is logged and ignored.
 */
export interface NdefHooks {
  /**
   * Logger for internal logging.
   * Defaults to console logger if not provided.
   */
  logger?: Logger;

  /**
   * Called when decoding a buffer fails.
   */
  onDecodeError?(context: DecodeErrorContext): void;

  /**
   * Called for each record decoded as raw because its type is unregistered.
   */
  onRawFallback?(context: RawFallbackContext): void;

  /**
   * Called when the tag controller moves between idle, reading and writing.
   */
  onStateChange?(context: StateChangeContext): void;
}
