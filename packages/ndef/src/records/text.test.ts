import { describe, expect, it } from '@jest/globals';
import { fromHex, toHex, utf8Encode } from '../codec/bytes.js';
import {
  InvalidRecordError,
  MalformedPayloadError,
  PayloadTooLargeError,
} from '../errors/index.js';
import type { StrategyContext } from '../registry/index.js';
import { Tnf } from '../types/index.js';
import { textStrategy } from './text.js';

const context: StrategyContext = {
  tnf: Tnf.WellKnown,
  type: utf8Encode('T'),
  recordIndex: 0,
  offset: 4,
};

function payload(hex: string): Uint8Array {
  const value = fromHex(hex);
  if (!value) throw new Error(`invalid hex fixture: ${hex}`);
  return value;
}

describe('textStrategy', () => {
  describe('decode', () => {
    it('should read the language code and UTF-8 text', () => {
      expect(textStrategy.decode(payload('02656e6869'), context)).toEqual({
        kind: 'text',
        languageCode: 'en',
        encoding: 'UTF-8',
        text: 'hi',
      });
    });

    it('should read UTF-16 text when bit 7 is set', () => {
      expect(
        textStrategy.decode(payload('82656efeff00680069'), context),
      ).toEqual({
        kind: 'text',
        languageCode: 'en',
        encoding: 'UTF-16',
        text: 'hi',
      });
    });

    it('should ignore the reserved bit 6 of the status byte', () => {
      expect(textStrategy.decode(payload('42656e6869'), context)).toMatchObject(
        { languageCode: 'en', encoding: 'UTF-8', text: 'hi' },
      );
    });

    it('should accept an empty text', () => {
      expect(textStrategy.decode(payload('02656e'), context)).toMatchObject({
        text: '',
      });
    });

    it('should reject a language length past the payload', () => {
      try {
        textStrategy.decode(payload('05656e'), context);
        throw new Error('expected decode to fail');
      } catch (error) {
        expect(error).toBeInstanceOf(MalformedPayloadError);
        expect(error).toMatchObject({ recordKind: 'Text', offset: 4 });
      }
    });

    it('should reject an empty payload', () => {
      expect(() => textStrategy.decode(new Uint8Array(0), context)).toThrow(
        MalformedPayloadError,
      );
    });

    it('should reject invalid UTF-8 text', () => {
      expect(() => textStrategy.decode(payload('02656ec3'), context)).toThrow(
        'Malformed Text payload: text is not valid UTF-8',
      );
    });
  });

  describe('encode', () => {
    it('should write the status byte, language and text', () => {
      const encoded = textStrategy.encode({
        kind: 'text',
        languageCode: 'en-US',
        encoding: 'UTF-8',
        text: 'ok',
      });

      expect(toHex(encoded)).toBe('05656e2d55536f6b');
    });

    it('should set bit 7 for UTF-16', () => {
      const encoded = textStrategy.encode({
        kind: 'text',
        languageCode: 'en',
        encoding: 'UTF-16',
        text: 'hi',
      });

      expect(toHex(encoded)).toBe('82656efeff00680069');
    });

    it('should reject a language code longer than 63 bytes', () => {
      expect(() =>
        textStrategy.encode({
          kind: 'text',
          languageCode: 'x'.repeat(64),
          encoding: 'UTF-8',
          text: '',
        }),
      ).toThrow(PayloadTooLargeError);
    });

    it('should reject a non-ASCII language code', () => {
      expect(() =>
        textStrategy.encode({
          kind: 'text',
          languageCode: 'fr-É',
          encoding: 'UTF-8',
          text: '',
        }),
      ).toThrow(InvalidRecordError);
    });
  });
});
