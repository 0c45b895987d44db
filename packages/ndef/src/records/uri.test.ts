import { describe, expect, it } from '@jest/globals';
import { toHex, utf8Encode } from '../codec/bytes.js';
import { MalformedPayloadError } from '../errors/index.js';
import type { StrategyContext } from '../registry/index.js';
import { Tnf } from '../types/index.js';
import { URI_PREFIXES, selectUriPrefix } from './uri-prefixes.js';
import { uriStrategy } from './uri.js';

const context: StrategyContext = {
  tnf: Tnf.WellKnown,
  type: utf8Encode('U'),
  recordIndex: 0,
  offset: 4,
};

describe('URI prefixes', () => {
  it('should define codes 0x00 to 0x23', () => {
    expect(URI_PREFIXES).toHaveLength(0x24);
    expect(URI_PREFIXES[0x01]).toBe('http://www.');
    expect(URI_PREFIXES[0x23]).toBe('urn:nfc:');
  });

  it('should select the longest matching prefix', () => {
    expect(selectUriPrefix('https://www.example.com')).toBe(0x02);
    expect(selectUriPrefix('https://example.com')).toBe(0x04);
    expect(selectUriPrefix('urn:epc:id:sgtin:1')).toBe(0x1e);
    expect(selectUriPrefix('urn:epc:x')).toBe(0x22);
  });

  it('should fall back to code 0 without a match', () => {
    expect(selectUriPrefix('geo:52.5,13.4')).toBe(0x00);
  });
});

describe('uriStrategy', () => {
  it('should prepend the prefix on decode', () => {
    const payload = Uint8Array.of(0x05, ...utf8Encode('+123'));
    expect(uriStrategy.decode(payload, context)).toEqual({
      kind: 'uri',
      uri: 'tel:+123',
    });
  });

  it('should strip the prefix on encode', () => {
    expect(toHex(uriStrategy.encode({ kind: 'uri', uri: 'tel:1' }))).toBe(
      '0531',
    );
  });

  it('should keep a URI without a known prefix whole', () => {
    const encoded = uriStrategy.encode({ kind: 'uri', uri: 'geo:1,2' });
    expect(encoded[0]).toBe(0x00);
    expect(uriStrategy.decode(encoded, context)).toEqual({
      kind: 'uri',
      uri: 'geo:1,2',
    });
  });

  it('should reject reserved prefix codes', () => {
    expect(() => uriStrategy.decode(Uint8Array.of(0x24), context)).toThrow(
      MalformedPayloadError,
    );
    expect(() => uriStrategy.decode(Uint8Array.of(0xff), context)).toThrow(
      'prefix code 0xff is reserved',
    );
  });

  it('should reject an empty payload', () => {
    expect(() => uriStrategy.decode(new Uint8Array(0), context)).toThrow(
      MalformedPayloadError,
    );
  });
});
