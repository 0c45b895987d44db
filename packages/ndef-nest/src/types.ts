import type { InjectionToken, ModuleMetadata, Type } from '@nestjs/common';
import type {
  NdefHooks,
  RecordStrategy,
  RegisterOptions,
  TagPrompts,
  TagSessionProvider,
  Tnf,
} from '@tagkit/ndef';

/**
 * Options for the @NdefRecordStrategy decorator.
 */
export interface NdefRecordStrategyOptions extends RegisterOptions {
  readonly tnf: Tnf;

  /** Record type; null covers every type of the TNF */
  readonly type: string | Uint8Array | null;
}

/**
 * A strategy registered directly through module options.
 */
export type NdefStrategyRegistration = readonly [
  tnf: Tnf,
  type: string | Uint8Array | null,
  strategy: RecordStrategy,
  options?: RegisterOptions,
];

/**
 * A decorated provider found during discovery.
 */
export interface DiscoveredStrategy extends NdefRecordStrategyOptions {
  readonly strategy: RecordStrategy;

  /** Class name of the provider, for logs and errors */
  readonly source: string;
}

/**
 * Configuration options for NdefModule.
 */
export interface NdefModuleOptions {
  /**
   * Platform NFC stack. Without one, the codec methods work and tag
   * reads/writes throw TagProviderMissingError.
   */
  readonly provider?: TagSessionProvider | undefined;

  /** Strategies to register besides the built-ins and decorated providers */
  readonly strategies?: readonly NdefStrategyRegistration[] | undefined;

  /** Codec and session hooks. Logging defaults to the Nest logger. */
  readonly hooks?: NdefHooks | undefined;

  /** Poll timeout in ms. Default: 20000 */
  readonly pollTimeoutMs?: number | undefined;

  /** Scan sheet prompt overrides */
  readonly prompts?: Partial<TagPrompts> | undefined;

  /**
   * Finish a tag session still in flight when the application shuts down,
   * so the platform reader is released.
   * Default: true
   */
  readonly finishOnShutdown?: boolean | undefined;
}

/**
 * Factory interface for creating NdefModuleOptions.
 */
export interface NdefOptionsFactory {
  createNdefOptions(): Promise<NdefModuleOptions> | NdefModuleOptions;
}

/**
 * Builds the options from injected dependencies.
 */
export interface NdefModuleFactoryOptions
  extends Pick<ModuleMetadata, 'imports'> {
  readonly inject?: readonly InjectionToken[] | undefined;
  readonly useFactory: (
    // biome-ignore lint/suspicious/noExplicitAny: Factory can receive any injected dependencies
    ...args: any[]
  ) => Promise<NdefModuleOptions> | NdefModuleOptions;
}

/**
 * Builds the options with a provider class the module instantiates.
 */
export interface NdefModuleClassOptions
  extends Pick<ModuleMetadata, 'imports'> {
  readonly useClass: Type<NdefOptionsFactory>;
}

/**
 * Async configuration options for NdefModule.forRootAsync().
 */
export type NdefModuleAsyncOptions =
  | NdefModuleFactoryOptions
  | NdefModuleClassOptions;
