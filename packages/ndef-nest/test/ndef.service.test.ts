import 'reflect-metadata';
import { afterEach, describe, expect, it } from '@jest/globals';
import { Injectable, Module, type ModuleMetadata } from '@nestjs/common';
import { Test, type TestingModule } from '@nestjs/testing';
import {
  MemoryTagProvider,
  type NdefRecord,
  type RecordStrategy,
  TagProviderMissingError,
  type FinishOptions,
  type TagHandle,
  type TagSessionProvider,
  Tnf,
  createConfigRecord,
  encodeMessage,
  noopLogger,
  readConfigRecord,
  textRecord,
  utf8Encode,
} from '@tagkit/ndef';
import { NdefRecordStrategy } from '../src/decorators/ndef-record-strategy.decorator.js';
import { NdefModule } from '../src/module/ndef.module.js';
import { NdefService } from '../src/services/ndef.service.js';
import { NdefTestingModule } from '../src/testing/ndef-testing.module.js';
import type { NdefModuleOptions, NdefOptionsFactory } from '../src/types.js';

interface CounterVariant {
  readonly kind: 'counter';
  readonly value: number;
}

const counterStrategy: RecordStrategy<CounterVariant> = {
  kind: 'counter',
  decode: (payload) => ({ kind: 'counter', value: payload[0] ?? 0 }),
  encode: (variant) => Uint8Array.of(variant.value),
};

function counterRecord(value: number): NdefRecord<CounterVariant> {
  return {
    tnf: Tnf.External,
    type: utf8Encode('example.com:counter'),
    variant: { kind: 'counter', value },
  };
}

interface FlagVariant {
  readonly kind: 'flag';
  readonly on: boolean;
}

@NdefRecordStrategy({ tnf: Tnf.External, type: 'example.com:flag' })
class FlagStrategy implements RecordStrategy<FlagVariant> {
  readonly kind = 'flag';

  decode(payload: Uint8Array): FlagVariant {
    return { kind: 'flag', on: payload[0] === 1 };
  }

  encode(variant: FlagVariant): Uint8Array {
    return Uint8Array.of(variant.on ? 1 : 0);
  }
}

/**
 * Provider whose poll waits until the test releases it.
 */
class PendingPollProvider implements TagSessionProvider {
  readonly name = 'pending';
  readonly finishes: Array<FinishOptions | undefined> = [];
  private rejectPoll: ((error: Error) => void) | undefined;

  poll(): Promise<TagHandle> {
    return new Promise<TagHandle>((_resolve, reject) => {
      this.rejectPoll = reject;
    });
  }

  async readRawMessage(): Promise<Uint8Array> {
    return new Uint8Array(0);
  }

  async writeRawMessage(): Promise<void> {}

  async finish(options?: FinishOptions): Promise<void> {
    this.finishes.push(options);
  }

  fail(message: string): void {
    this.rejectPoll?.(new Error(message));
  }
}

describe('NdefService', () => {
  let module: TestingModule | undefined;

  afterEach(async () => {
    await module?.close();
    module = undefined;
  });

  async function createService(
    imports: ModuleMetadata['imports'],
    providers: Array<new () => object> = [],
  ): Promise<NdefService> {
    module = await Test.createTestingModule({ imports, providers }).compile();
    await module.init();
    return module.get(NdefService);
  }

  describe('codec', () => {
    it('decodes and encodes built-in records without a provider', async () => {
      const service = await createService([NdefModule.forRoot()]);
      const records = [textRecord('hello')];

      expect(service.decode(service.encode(records))).toEqual(records);
    });

    it('registers strategies from options', async () => {
      const service = await createService([
        NdefModule.forRoot({
          strategies: [[Tnf.External, 'example.com:counter', counterStrategy]],
        }),
      ]);

      const encoded = service.encode([counterRecord(5)]);
      expect(service.decode(encoded)).toEqual([counterRecord(5)]);
    });

    it('registers decorated strategy providers', async () => {
      const service = await createService(
        [NdefModule.forRoot()],
        [FlagStrategy],
      );
      const record: NdefRecord<FlagVariant> = {
        tnf: Tnf.External,
        type: utf8Encode('example.com:flag'),
        variant: { kind: 'flag', on: true },
      };

      const encoded = service.encode([record]);
      expect(encoded[encoded.length - 1]).toBe(1);
      expect(service.decode(encoded)[0]?.variant).toEqual({
        kind: 'flag',
        on: true,
      });
    });

    it('returns decode failures from tryDecode', async () => {
      const service = await createService([NdefModule.forRoot()]);
      const result = service.tryDecode(Uint8Array.of(0xd7, 0, 0, 0));
      expect(result.ok).toBe(false);
    });
  });

  describe('forRootAsync', () => {
    it('builds options with useFactory', async () => {
      const service = await createService([
        NdefModule.forRootAsync({
          useFactory: () => ({
            strategies: [
              [Tnf.External, 'example.com:counter', counterStrategy],
            ],
          }),
        }),
      ]);

      const { registry } = service.getCodec();
      expect(registry.has(Tnf.External, 'example.com:counter')).toBe(true);
    });

    it('builds options with useClass', async () => {
      @Injectable()
      class OptionsFactory implements NdefOptionsFactory {
        createNdefOptions(): NdefModuleOptions {
          return {
            strategies: [
              [Tnf.External, 'example.com:counter', counterStrategy],
            ],
          };
        }
      }

      const service = await createService([
        NdefModule.forRootAsync({ useClass: OptionsFactory }),
      ]);

      const { registry } = service.getCodec();
      expect(registry.has(Tnf.External, 'example.com:counter')).toBe(true);
      await expect(service.readTag()).rejects.toBeInstanceOf(
        TagProviderMissingError,
      );
    });

    it('injects dependencies into the factory', async () => {
      const provider = new MemoryTagProvider(noopLogger);

      @Module({
        providers: [{ provide: 'TAG_PROVIDER', useValue: provider }],
        exports: ['TAG_PROVIDER'],
      })
      class ReaderModule {}

      const service = await createService([
        NdefModule.forRootAsync({
          imports: [ReaderModule],
          inject: ['TAG_PROVIDER'],
          useFactory: (tagProvider: MemoryTagProvider) => ({
            provider: tagProvider,
          }),
        }),
      ]);

      provider.present({ id: '04a1' }, encodeMessage([textRecord('hi')]));
      const result = await service.readTag();
      expect(result.status).toBe('Read successful: 1 record found');
    });
  });

  describe('tag sessions', () => {
    it('throws without a provider', async () => {
      const service = await createService([NdefModule.forRoot()]);

      await expect(service.writeTag([textRecord('x')])).rejects.toThrow(
        'Cannot perform writeTag: no tag session provider configured.',
      );
    });

    it('writes and reads a config record', async () => {
      const provider = new MemoryTagProvider(noopLogger);
      const service = await createService([
        NdefTestingModule.forTest({ provider }),
      ]);
      provider.present({ id: '04a1' });

      await service.writeTag([createConfigRecord({ minpres: '10' })]);
      const { message } = await service.readTag();

      expect(readConfigRecord(message)).toEqual({ minpres: '10' });
      expect(service.isBusy()).toBe(false);
    });

    it('finishes an in-flight session before shutdown', async () => {
      const provider = new PendingPollProvider();
      const service = await createService([
        NdefTestingModule.forTest({ provider }),
      ]);

      const reading = service.readTag();
      expect(service.isBusy()).toBe(true);

      await service.beforeApplicationShutdown();
      expect(provider.finishes).toEqual([{ errorMessage: 'Read error' }]);

      provider.fail('tag removed');
      await expect(reading).rejects.toThrow('tag removed');
      expect(service.isBusy()).toBe(false);
    });

    it('leaves the session open when finishOnShutdown is false', async () => {
      const provider = new PendingPollProvider();
      const service = await createService([
        NdefTestingModule.forTest({ provider, finishOnShutdown: false }),
      ]);

      const reading = service.readTag();
      await service.beforeApplicationShutdown();
      expect(provider.finishes).toEqual([]);

      provider.fail('tag removed');
      await expect(reading).rejects.toThrow('tag removed');
    });
  });
});
