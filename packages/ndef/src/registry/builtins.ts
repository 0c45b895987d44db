import {
  TEXT_TYPE,
  URI_TYPE,
  emptyStrategy,
  externalStrategy,
  mimeStrategy,
  textStrategy,
  uriStrategy,
} from '../records/index.js';
import { Tnf } from '../types/index.js';
import { VariantRegistry } from './registry.js';

/**
 * Registers the Text, URI, MIME, External and Empty strategies.
 */
export function registerBuiltins(registry: VariantRegistry): VariantRegistry {
  return registry
    .registerVariant(Tnf.WellKnown, TEXT_TYPE, textStrategy)
    .registerVariant(Tnf.WellKnown, URI_TYPE, uriStrategy)
    .registerVariant(Tnf.Mime, null, mimeStrategy)
    .registerVariant(Tnf.External, null, externalStrategy)
    .registerVariant(Tnf.Empty, null, emptyStrategy);
}

/**
 * Creates a registry holding only the built-in strategies.
 */
export function createBuiltinRegistry(): VariantRegistry {
  return registerBuiltins(VariantRegistry.create());
}
