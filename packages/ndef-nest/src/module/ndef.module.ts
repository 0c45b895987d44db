import {
  type DynamicModule,
  Global,
  Module,
  type Provider,
} from '@nestjs/common';
import { DiscoveryModule } from '@nestjs/core';
import { NDEF_OPTIONS } from '../constants.js';
import { StrategyDiscoveryService } from '../discovery/strategy-discovery.service.js';
import { NdefService } from '../services/ndef.service.js';
import type {
  NdefModuleAsyncOptions,
  NdefModuleOptions,
  NdefOptionsFactory,
} from '../types.js';

/**
 * NestJS module providing {@link NdefService}.
 *
 * @example Synchronous configuration
 * ```typescript
 * @Module({
 *   imports: [
 *     NdefModule.forRoot({
 *       provider: new MemoryTagProvider(),
 *       strategies: [[Tnf.External, 'example.com:counter', counterStrategy]],
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 *
 * @example Async configuration with ConfigService
 * ```typescript
 * @Module({
 *   imports: [
 *     ConfigModule.forRoot(),
 *     NdefModule.forRootAsync({
 *       imports: [ConfigModule],
 *       inject: [ConfigService],
 *       useFactory: (config: ConfigService) => ({
 *         pollTimeoutMs: config.get('NFC_POLL_TIMEOUT_MS'),
 *       }),
 *     }),
 *   ],
 * })
 * export class AppModule {}
 * ```
 */
@Global()
@Module({})
export class NdefModule {
  /**
   * Configures the NdefModule with static options.
   */
  static forRoot(options: NdefModuleOptions = {}): DynamicModule {
    return {
      module: NdefModule,
      imports: [DiscoveryModule],
      providers: [
        {
          provide: NDEF_OPTIONS,
          useValue: options,
        },
        StrategyDiscoveryService,
        NdefService,
      ],
      exports: [NdefService],
    };
  }

  /**
   * Configures the NdefModule with options resolved at bootstrap, either
   * from a factory with injected dependencies or from an options class.
   */
  static forRootAsync(options: NdefModuleAsyncOptions): DynamicModule {
    return {
      module: NdefModule,
      imports: [DiscoveryModule, ...(options.imports ?? [])],
      providers: [
        ...optionsProviders(options),
        StrategyDiscoveryService,
        NdefService,
      ],
      exports: [NdefService],
    };
  }
}

function optionsProviders(options: NdefModuleAsyncOptions): Provider[] {
  if ('useFactory' in options) {
    return [
      {
        provide: NDEF_OPTIONS,
        useFactory: options.useFactory,
        inject: [...(options.inject ?? [])],
      },
    ];
  }

  return [
    options.useClass,
    {
      provide: NDEF_OPTIONS,
      useFactory: (factory: NdefOptionsFactory) => factory.createNdefOptions(),
      inject: [options.useClass],
    },
  ];
}
