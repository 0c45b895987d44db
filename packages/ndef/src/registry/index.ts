export type {
  RecordStrategy,
  RegisterOptions,
  RegistryEntry,
  StrategyContext,
} from './types.js';

export { VariantRegistry } from './registry.js';
export { createBuiltinRegistry, registerBuiltins } from './builtins.js';
