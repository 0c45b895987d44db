import 'reflect-metadata';
import { Injectable, type OnModuleInit } from '@nestjs/common';
import { DiscoveryService } from '@nestjs/core';
import { type RecordStrategy, RegistryError } from '@tagkit/ndef';
import { NDEF_RECORD_STRATEGY } from '../constants.js';
import type { DiscoveredStrategy, NdefRecordStrategyOptions } from '../types.js';

function isRecordStrategy(value: object): value is RecordStrategy {
  return (
    'kind' in value &&
    typeof value.kind === 'string' &&
    'decode' in value &&
    typeof value.decode === 'function' &&
    'encode' in value &&
    typeof value.encode === 'function'
  );
}

/**
 * Finds every provider decorated with @NdefRecordStrategy.
 */
@Injectable()
export class StrategyDiscoveryService implements OnModuleInit {
  private strategies: DiscoveredStrategy[] = [];
  private discovered = false;

  constructor(private readonly discoveryService: DiscoveryService) {}

  onModuleInit(): void {
    this.discoverStrategies();
  }

  /**
   * Gets the discovered strategies in provider order.
   * Runs discovery first if onModuleInit has not been called yet.
   */
  getStrategies(): readonly DiscoveredStrategy[] {
    this.discoverStrategies();
    return this.strategies;
  }

  private discoverStrategies(): void {
    if (this.discovered) {
      return;
    }

    const found: DiscoveredStrategy[] = [];

    for (const wrapper of this.discoveryService.getProviders()) {
      const { instance } = wrapper;
      if (!instance || typeof instance !== 'object') {
        continue;
      }

      const options: NdefRecordStrategyOptions | undefined =
        Reflect.getMetadata(NDEF_RECORD_STRATEGY, instance.constructor);
      if (!options) {
        continue;
      }

      const source = instance.constructor.name;
      if (!isRecordStrategy(instance)) {
        throw new RegistryError(
          `${source} is decorated with @NdefRecordStrategy but does not implement kind, decode and encode`,
        );
      }

      found.push({ ...options, strategy: instance, source });
    }

    this.strategies = found;
    this.discovered = true;
  }
}
