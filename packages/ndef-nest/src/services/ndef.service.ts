import {
  type BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
  type OnModuleInit,
} from '@nestjs/common';
import {
  type DecodeResult,
  NdefCodec,
  type NdefDecodeError,
  type NdefHooks,
  type NdefMessage,
  type NdefRecord,
  type ReadResult,
  TagController,
  TagProviderMissingError,
  type WriteResult,
  createBuiltinRegistry,
} from '@tagkit/ndef';
import { NDEF_OPTIONS } from '../constants.js';
import { StrategyDiscoveryService } from '../discovery/strategy-discovery.service.js';
import type { NdefModuleOptions } from '../types.js';

/**
 * Injectable service exposing the NDEF codec and tag sessions.
 *
 * The codec's registry holds the built-in strategies, the strategies passed
 * in module options, then every provider decorated with
 * @NdefRecordStrategy, in that order.
 *
 * @example
 * ```typescript
 * @Injectable()
 * export class ConfigTagService {
 *   constructor(private readonly ndef: NdefService) {}
 *
 *   async writeThresholds(min: number, max: number) {
 *     await this.ndef.writeTag([
 *       createConfigRecord({ minpres: String(min), maxpres: String(max) }),
 *     ]);
 *   }
 * }
 * ```
 */
@Injectable()
export class NdefService implements OnModuleInit, BeforeApplicationShutdown {
  private readonly logger = new Logger(NdefService.name);
  private codec: NdefCodec | undefined;
  private controller: TagController | undefined;

  constructor(
    @Inject(NDEF_OPTIONS) private readonly options: NdefModuleOptions,
    private readonly discoveryService: StrategyDiscoveryService,
  ) {}

  /**
   * Builds the registry and codec once providers are discovered.
   */
  onModuleInit(): void {
    this.getCodec();
  }

  /**
   * Ends a tag session still in flight so the reader is released.
   */
  async beforeApplicationShutdown(): Promise<void> {
    if (this.options.finishOnShutdown === false) {
      return;
    }
    if (!this.controller?.isBusy()) {
      return;
    }

    this.logger.log('[ndef] Finishing in-flight tag session before shutdown');
    await this.controller.abort();
  }

  /**
   * Decodes a raw NDEF message.
   *
   * @throws NdefDecodeError subclasses for malformed input
   */
  decode(bytes: Uint8Array): NdefMessage {
    return this.getCodec().decode(bytes);
  }

  /**
   * Decodes without throwing for malformed input.
   */
  tryDecode(bytes: Uint8Array): DecodeResult<NdefDecodeError> {
    return this.getCodec().tryDecode(bytes);
  }

  /**
   * Encodes records as one NDEF message.
   */
  encode(records: readonly NdefRecord[]): Uint8Array {
    return this.getCodec().encode(records);
  }

  /**
   * Polls for a tag and reads its message.
   *
   * @throws TagProviderMissingError if no provider is configured
   */
  async readTag(): Promise<ReadResult> {
    return this.getController('readTag').readMessage();
  }

  /**
   * Polls for a tag and replaces its message with `records`.
   *
   * @throws TagProviderMissingError if no provider is configured
   */
  async writeTag(records: readonly NdefRecord[]): Promise<WriteResult> {
    return this.getController('writeTag').writeMessage(records);
  }

  /**
   * Whether a tag read or write is in progress.
   */
  isBusy(): boolean {
    return this.controller?.isBusy() ?? false;
  }

  /**
   * Gets the underlying codec for advanced operations.
   */
  getCodec(): NdefCodec {
    if (!this.codec) {
      this.codec = this.createCodec();
    }
    return this.codec;
  }

  private getController(operation: string): TagController {
    const { provider } = this.options;
    if (!provider) {
      throw new TagProviderMissingError(operation);
    }

    if (!this.controller) {
      this.controller = new TagController(
        {
          provider,
          codec: this.getCodec(),
          pollTimeoutMs: this.options.pollTimeoutMs,
          prompts: this.options.prompts,
        },
        this.hooks(),
      );
      this.logger.log(`[ndef] Tag sessions use provider "${provider.name}"`);
    }
    return this.controller;
  }

  private createCodec(): NdefCodec {
    const registry = createBuiltinRegistry();
    const registrations = this.options.strategies ?? [];

    for (const [tnf, type, strategy, options] of registrations) {
      registry.registerVariant(tnf, type, strategy, options);
    }

    const discovered = this.discoveryService.getStrategies();
    for (const { tnf, type, strategy, override, source } of discovered) {
      registry.registerVariant(tnf, type, strategy, { override });
      this.logger.debug(
        `[ndef] Registered "${strategy.kind}" strategy from ${source}`,
      );
    }

    const custom = registrations.length + discovered.length;
    this.logger.log(
      `[ndef] Codec initialized with ${custom} custom record strateg${custom === 1 ? 'y' : 'ies'}`,
    );

    return new NdefCodec({ registry }, this.hooks());
  }

  /**
   * Option hooks, with core log lines routed to the Nest logger unless a
   * logger is given.
   */
  private hooks(): NdefHooks {
    return {
      logger: {
        debug: (message, ...args) => this.logger.debug(message, ...args),
        info: (message, ...args) => this.logger.log(message, ...args),
        warn: (message, ...args) => this.logger.warn(message, ...args),
        error: (message, ...args) => this.logger.error(message, ...args),
      },
      ...this.options.hooks,
    };
  }
}
