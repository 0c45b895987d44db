import { asciiLowerCase, toHex, toTypeBytes } from '../codec/bytes.js';
import { RegistryError } from '../errors/index.js';
import { Tnf, type VariantShape, isTnf, tnfName } from '../types/index.js';
import type {
  RecordStrategy,
  RegisterOptions,
  RegistryEntry,
} from './types.js';

interface StoredStrategy {
  readonly tnf: Tnf;
  readonly type: Uint8Array | null;
  readonly strategy: RecordStrategy;
}

/**
 * MIME media types and external type names compare case-insensitively;
 * everything else compares byte for byte.
 */
function normalizeType(tnf: Tnf, type: Uint8Array): Uint8Array {
  if (tnf !== Tnf.Mime && tnf !== Tnf.External) return type;
  return asciiLowerCase(type);
}

function keyOf(tnf: Tnf, type: Uint8Array | null): string {
  return type === null ? `${tnf}:*` : `${tnf}:${toHex(normalizeType(tnf, type))}`;
}

/**
 * Table from `(tnf, type)` to the strategy that turns a payload into a typed
 * variant and back.
 *
 * Lookup tries the exact type first, then a strategy registered for the
 * whole TNF (type `null`). Types with no match decode as raw records.
 */
export class VariantRegistry {
  static create(): VariantRegistry {
    return new VariantRegistry();
  }

  private readonly strategies = new Map<string, StoredStrategy>();

  /**
   * Registers a strategy for a TNF and type. Pass `null` as the type to
   * cover every type of the TNF not registered exactly.
   *
   * @throws RegistryError if the key is taken and `override` is not set
   */
  registerVariant<V extends VariantShape>(
    tnf: Tnf,
    type: string | Uint8Array | null,
    strategy: RecordStrategy<V>,
    options: RegisterOptions = {},
  ): this {
    if (!isTnf(tnf)) {
      throw new RegistryError(`TNF ${tnf} is reserved or out of range`);
    }

    const typeBytes = type === null ? null : toTypeBytes(type);
    const key = keyOf(tnf, typeBytes);
    const existing = this.strategies.get(key);

    if (existing && !options.override) {
      throw new RegistryError(
        `A "${existing.strategy.kind}" strategy is already registered for ${describeKey(tnf, typeBytes)}`,
      );
    }

    this.strategies.set(key, { tnf, type: typeBytes, strategy });
    return this;
  }

  /**
   * Finds the strategy for a record, or undefined when it should stay raw.
   */
  resolve(tnf: Tnf, type: Uint8Array): RecordStrategy | undefined {
    return (
      this.strategies.get(keyOf(tnf, type))?.strategy ??
      this.strategies.get(keyOf(tnf, null))?.strategy
    );
  }

  /**
   * Checks whether a strategy is registered under exactly this key.
   */
  has(tnf: Tnf, type: string | Uint8Array | null): boolean {
    const typeBytes = type === null ? null : toTypeBytes(type);
    return this.strategies.has(keyOf(tnf, typeBytes));
  }

  /**
   * Lists all registrations in insertion order.
   */
  entries(): readonly RegistryEntry[] {
    return [...this.strategies.values()].map(({ tnf, type, strategy }) => ({
      tnf,
      type,
      kind: strategy.kind,
    }));
  }

  /**
   * Returns an independent registry with the same registrations.
   */
  clone(): VariantRegistry {
    const copy = new VariantRegistry();
    for (const [key, stored] of this.strategies) {
      copy.strategies.set(key, stored);
    }
    return copy;
  }

  /**
   * Clears all registrations.
   */
  clear(): void {
    this.strategies.clear();
  }
}

function describeKey(tnf: Tnf, type: Uint8Array | null): string {
  if (type === null) return `${tnfName(tnf)} (any type)`;
  return `${tnfName(tnf)} type 0x${toHex(type)}`;
}
