import { type DynamicModule, Module } from '@nestjs/common';
import { MemoryTagProvider, noopLogger } from '@tagkit/ndef';
import { NdefModule } from '../module/ndef.module.js';
import type { NdefModuleOptions } from '../types.js';

/**
 * Testing module wired to an in-memory tag provider.
 *
 * Pass your own MemoryTagProvider to present tags from the test.
 *
 * @example
 * ```typescript
 * const provider = new MemoryTagProvider(noopLogger);
 * const module = await Test.createTestingModule({
 *   imports: [NdefTestingModule.forTest({ provider })],
 * }).compile();
 * await module.init();
 *
 * provider.present({ id: '04a2' }, bytes);
 * const { message } = await module.get(NdefService).readTag();
 * ```
 */
@Module({})
export class NdefTestingModule {
  static forTest(overrides: NdefModuleOptions = {}): DynamicModule {
    const defaultOptions: NdefModuleOptions = {
      provider: new MemoryTagProvider(noopLogger),
      pollTimeoutMs: 1_000,
    };

    return NdefModule.forRoot({
      ...defaultOptions,
      ...overrides,
    });
  }
}
