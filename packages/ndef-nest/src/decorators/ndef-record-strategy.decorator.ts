import 'reflect-metadata';
import { Injectable } from '@nestjs/common';
import { NDEF_RECORD_STRATEGY } from '../constants.js';
import type { NdefRecordStrategyOptions } from '../types.js';

/**
 * Class decorator that registers a provider as the record strategy for a
 * TNF and type. The class is made injectable, so it can depend on other
 * providers, and is picked up by NdefModule at startup.
 *
 * @example
 * ```typescript
 * @NdefRecordStrategy({ tnf: Tnf.External, type: 'example.com:sensor' })
 * export class SensorStrategy implements RecordStrategy<SensorVariant> {
 *   readonly kind = 'sensor';
 *
 *   decode(payload: Uint8Array): SensorVariant {
 *     return { kind: 'sensor', reading: payload[0] ?? 0 };
 *   }
 *
 *   encode(variant: SensorVariant): Uint8Array {
 *     return Uint8Array.of(variant.reading);
 *   }
 * }
 * ```
 */
export function NdefRecordStrategy(
  options: NdefRecordStrategyOptions,
): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(NDEF_RECORD_STRATEGY, options, target);
    Injectable()(target);
  };
}
