/**
 * Metadata key for the registration options of a decorated strategy class.
 */
export const NDEF_RECORD_STRATEGY = Symbol('NDEF_RECORD_STRATEGY');

/**
 * Injection token for module options.
 */
export const NDEF_OPTIONS = Symbol('NDEF_OPTIONS');
