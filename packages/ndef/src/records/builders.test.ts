import { describe, expect, it } from '@jest/globals';
import { utf8Encode } from '../codec/bytes.js';
import { Tnf } from '../types/index.js';
import {
  emptyRecord,
  externalRecord,
  isEmptyRecord,
  isExternalRecord,
  isMimeRecord,
  isRawRecord,
  isTextRecord,
  isUriRecord,
  mimeRecord,
  rawRecord,
  textRecord,
  uriRecord,
} from './builders.js';

describe('record builders', () => {
  it('should default Text records to English UTF-8', () => {
    expect(textRecord('hello')).toEqual({
      tnf: Tnf.WellKnown,
      type: utf8Encode('T'),
      variant: {
        kind: 'text',
        languageCode: 'en',
        encoding: 'UTF-8',
        text: 'hello',
      },
    });
  });

  it('should only set an id when one is given', () => {
    expect(uriRecord('tel:1')).not.toHaveProperty('id');
    expect(uriRecord('tel:1', { id: 'a' }).id).toEqual(utf8Encode('a'));
    expect(uriRecord('tel:1', { id: Uint8Array.of(1) }).id).toEqual(
      Uint8Array.of(1),
    );
  });

  it('should carry the media type in the record type', () => {
    const record = mimeRecord('application/json', utf8Encode('{}'));
    expect(record.tnf).toBe(Tnf.Mime);
    expect(record.type).toEqual(utf8Encode('application/json'));
  });

  it('should narrow records with the type guards', () => {
    const records = [
      textRecord('a'),
      uriRecord('tel:1'),
      mimeRecord('text/plain', new Uint8Array(0)),
      externalRecord('example.com:x', new Uint8Array(0)),
      rawRecord(Tnf.Unknown, '', new Uint8Array(0)),
      emptyRecord(),
    ];

    expect(records.map(isTextRecord)).toEqual([
      true, false, false, false, false, false,
    ]);
    expect(records.map(isUriRecord)).toEqual([
      false, true, false, false, false, false,
    ]);
    expect(records.map(isMimeRecord)).toEqual([
      false, false, true, false, false, false,
    ]);
    expect(records.map(isExternalRecord)).toEqual([
      false, false, false, true, false, false,
    ]);
    expect(records.map(isRawRecord)).toEqual([
      false, false, false, false, true, false,
    ]);
    expect(records.map(isEmptyRecord)).toEqual([
      false, false, false, false, false, true,
    ]);
  });
});
