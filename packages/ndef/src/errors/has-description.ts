/**
 * Errors that carry a longer, operator-facing explanation alongside the
 * short message. The description says what went wrong on the tag or in the
 * bytes, and what to do about it.
 */
export interface HasDescription {
  readonly description: string;
}

/**
 * Type guard for values exposing a string `description`, such as every
 * {@link NdefError} and errors thrown by custom record strategies that
 * follow the same convention.
 */
export function hasDescription(error: unknown): error is HasDescription {
  if (typeof error !== 'object' || error === null) return false;
  if (!('description' in error)) return false;
  return typeof error.description === 'string';
}
