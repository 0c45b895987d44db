import { describe, expect, it, jest } from '@jest/globals';
import { encodeMessage, fromHex } from '../codec/index.js';
import { createConfigRecord } from '../config/index.js';
import {
  MalformedRecordError,
  NoTagPresentError,
  TagBusyError,
  TagCapacityError,
  TagLostError,
  TagNotWritableError,
} from '../errors/index.js';
import { type Logger, noopLogger } from '../hooks/index.js';
import { textRecord, uriRecord } from '../records/index.js';
import { MemoryTagProvider } from './memory-provider.js';
import { TagController } from './tag-controller.js';

function createTestLogger(): Logger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

function setup(options: { pollTimeoutMs?: number } = {}) {
  const provider = new MemoryTagProvider(noopLogger);
  const finish = jest.spyOn(provider, 'finish');
  const logger = createTestLogger();
  const controller = new TagController(
    { provider, pollTimeoutMs: options.pollTimeoutMs },
    { logger },
  );
  return { provider, finish, logger, controller };
}

describe('TagController', () => {
  describe('readMessage', () => {
    it('should decode the tag and report the record count', async () => {
      const { provider, finish, controller } = setup();
      provider.present(
        { id: '04a1' },
        encodeMessage([textRecord('hello'), uriRecord('tel:1')]),
      );

      const result = await controller.readMessage();

      expect(result.status).toBe('Read successful: 2 records found');
      expect(result.tag.id).toBe('04a1');
      expect(result.message).toEqual([textRecord('hello'), uriRecord('tel:1')]);
      expect(finish).toHaveBeenCalledWith({ alertMessage: 'Done reading' });
      expect(provider.isSessionOpen()).toBe(false);
      expect(controller.state).toBe('idle');
    });

    it('should report a blank tag as zero records', async () => {
      const { provider, finish, controller } = setup();
      provider.present({ id: '04a1' });

      const result = await controller.readMessage();

      expect(result.status).toBe('Read successful: 0 records found');
      expect(result.message).toEqual([]);
      expect(finish).toHaveBeenCalledWith({ alertMessage: 'Done reading' });
    });

    it('should finish with the error prompt when decoding fails', async () => {
      const { provider, finish, controller } = setup();
      provider.present({ id: '04a1' }, fromHex('d7000000'));

      await expect(controller.readMessage()).rejects.toBeInstanceOf(
        MalformedRecordError,
      );
      expect(finish).toHaveBeenCalledWith({ errorMessage: 'Read error' });
      expect(controller.isBusy()).toBe(false);
    });

    it('should pass the poll timeout and prompt to the provider', async () => {
      const { provider, controller } = setup({ pollTimeoutMs: 500 });
      const poll = jest.spyOn(provider, 'poll');

      await expect(controller.readMessage()).rejects.toThrow(
        'No tag presented within 500ms.',
      );
      expect(poll).toHaveBeenCalledWith({
        timeoutMs: 500,
        alertMessage: 'Hold your tag near the reader',
      });
    });

    it('should keep the original error when finishing fails', async () => {
      const { finish, logger, controller } = setup();
      finish.mockRejectedValue(new Error('reader gone'));

      await expect(controller.readMessage()).rejects.toBeInstanceOf(
        NoTagPresentError,
      );
      expect(logger.warn).toHaveBeenCalledWith(
        '[ndef] Provider "memory" failed to finish the session',
        expect.any(Error),
      );
    });
  });

  describe('writeMessage', () => {
    it('should write the encoded message', async () => {
      const { provider, finish, controller } = setup();
      provider.present({ id: '04a1' });
      const records = [createConfigRecord({ minpres: '10', maxpres: '90' })];

      const result = await controller.writeMessage(records);

      const expected = encodeMessage(records);
      expect(result.bytesWritten).toBe(expected.length);
      expect(provider.contents()).toEqual(expected);
      expect(finish).toHaveBeenCalledWith({ alertMessage: 'Write done' });
    });

    it('should refuse read-only tags', async () => {
      const { provider, finish, controller } = setup();
      provider.present({ id: '04a1', ndefWritable: false });

      await expect(
        controller.writeMessage([textRecord('x')]),
      ).rejects.toBeInstanceOf(TagNotWritableError);
      expect(finish).toHaveBeenCalledWith({ errorMessage: 'Write error' });
    });

    it('should refuse messages larger than the tag', async () => {
      const { provider, controller } = setup();
      provider.present({ id: '04a1', ndefCapacity: 4 });

      await expect(
        controller.writeMessage([textRecord('too long')]),
      ).rejects.toBeInstanceOf(TagCapacityError);
      expect(provider.contents()).toEqual(new Uint8Array(0));
    });

    it('should use prompt overrides', async () => {
      const provider = new MemoryTagProvider(noopLogger);
      const finish = jest.spyOn(provider, 'finish');
      const controller = new TagController(
        { provider, prompts: { writeDone: 'Saved' } },
        { logger: noopLogger },
      );
      provider.present({ id: '04a1' });

      await controller.writeMessage([textRecord('x')]);

      expect(finish).toHaveBeenCalledWith({ alertMessage: 'Saved' });
    });
  });

  describe('busy guard', () => {
    it('should reject a second operation while one is running', async () => {
      const { provider, controller } = setup();
      provider.present({ id: '04a1' }, encodeMessage([textRecord('a')]));

      const reading = controller.readMessage();
      expect(controller.state).toBe('reading');

      await expect(
        controller.writeMessage([textRecord('b')]),
      ).rejects.toBeInstanceOf(TagBusyError);
      await expect(reading).resolves.toMatchObject({
        status: 'Read successful: 1 record found',
      });
      expect(controller.isBusy()).toBe(false);
    });

    it('should report state changes to the hook', async () => {
      const provider = new MemoryTagProvider(noopLogger);
      const onStateChange = jest.fn();
      const controller = new TagController(
        { provider },
        { logger: noopLogger, onStateChange },
      );
      provider.present({ id: '04a1' }, encodeMessage([textRecord('a')]));

      await controller.readMessage();

      expect(onStateChange.mock.calls).toEqual([
        [{ previous: 'idle', current: 'reading', provider: 'memory' }],
        [{ previous: 'reading', current: 'idle', provider: 'memory' }],
      ]);
    });
  });

  describe('abort', () => {
    it('should do nothing when idle', async () => {
      const { finish, controller } = setup();
      await controller.abort();
      expect(finish).not.toHaveBeenCalled();
    });

    it('should finish the running session with the error prompt', async () => {
      const { provider, finish, controller } = setup();
      provider.present({ id: '04a1' }, encodeMessage([textRecord('a')]));

      const reading = controller.readMessage();
      await controller.abort();

      expect(finish).toHaveBeenNthCalledWith(1, { errorMessage: 'Read error' });
      await expect(reading).rejects.toBeInstanceOf(TagLostError);
    });
  });
});
