import {
  type DecodeErrorContext,
  type Logger,
  type NdefHooks,
  type RawFallbackContext,
  type StateChangeContext,
  consoleLogger,
} from './types.js';

/**
 * Wraps hooks so a throwing hook never breaks decoding or a tag session.
 */
export class SafeHooks {
  private readonly hooks: NdefHooks;

  /** The logger instance used by the codec and controller. */
  readonly logger: Logger;

  constructor(hooks: NdefHooks = {}) {
    this.hooks = hooks;
    this.logger = hooks.logger ?? consoleLogger;
  }

  onDecodeError(context: DecodeErrorContext): void {
    this.safeCall('onDecodeError', () => this.hooks.onDecodeError?.(context));
  }

  onRawFallback(context: RawFallbackContext): void {
    this.safeCall('onRawFallback', () => this.hooks.onRawFallback?.(context));
  }

  onStateChange(context: StateChangeContext): void {
    this.safeCall('onStateChange', () => this.hooks.onStateChange?.(context));
  }

  private safeCall(hookName: string, fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.logger.warn(`[ndef] Hook ${hookName} threw an error`, error);
    }
  }
}
