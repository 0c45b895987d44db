export type {
  DecodeErrorContext,
  Logger,
  NdefHooks,
  RawFallbackContext,
  StateChangeContext,
} from './types.js';

export { consoleLogger, noopLogger } from './types.js';
export { SafeHooks } from './safe-hooks.js';
