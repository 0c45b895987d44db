import type { Tnf, VariantShape } from '../types/index.js';

/**
 * What a strategy knows about the record whose payload it decodes.
 */
export interface StrategyContext {
  readonly tnf: Tnf;
  readonly type: Uint8Array;
  readonly id?: Uint8Array | undefined;
  /** Position of the record within its message */
  readonly recordIndex: number;
  /** Buffer offset of the first payload byte, for error reporting */
  readonly offset: number;
}

/**
 * Decode/encode pair for one record variant.
 *
 * `decode` should throw {@link MalformedPayloadError} when the payload breaks
 * its layout; any other error it throws is wrapped into one by the codec.
 *
 * @example
 * ```typescript
 * const counterStrategy: RecordStrategy<CounterVariant> = {
 *   kind: 'counter',
 *   decode: (payload) => ({ kind: 'counter', value: payload[0] ?? 0 }),
 *   encode: (variant) => Uint8Array.of(variant.value),
 * };
 * registry.registerVariant(Tnf.External, 'example.com:counter', counterStrategy);
 * ```
 */
export interface RecordStrategy<V extends VariantShape = VariantShape> {
  /** Must equal the `kind` of every variant this strategy produces */
  readonly kind: V['kind'];

  decode(payload: Uint8Array, context: StrategyContext): V;

  encode(variant: V): Uint8Array;
}

/**
 * Options for strategy registration.
 */
export interface RegisterOptions {
  /** Replace an existing registration for the same key */
  readonly override?: boolean | undefined;
}

/**
 * A registered strategy as reported by {@link VariantRegistry.entries}.
 */
export interface RegistryEntry {
  readonly tnf: Tnf;
  /** null for a strategy covering every type of its TNF */
  readonly type: Uint8Array | null;
  readonly kind: string;
}
