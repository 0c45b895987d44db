import { NdefCodec } from '../codec/ndef-codec.js';
import {
  TagBusyError,
  TagCapacityError,
  TagNotWritableError,
} from '../errors/index.js';
import { type NdefHooks, SafeHooks } from '../hooks/index.js';
import { readStatus } from '../format/describe.js';
import type { NdefMessage, NdefRecord } from '../types/index.js';
import type {
  FinishOptions,
  TagControllerState,
  TagHandle,
  TagSessionProvider,
} from './types.js';

/**
 * Messages shown by platforms that display a system scan sheet.
 */
export interface TagPrompts {
  readonly poll: string;
  readonly readDone: string;
  readonly readError: string;
  readonly writeDone: string;
  readonly writeError: string;
}

/**
 * Configuration for a {@link TagController}.
 */
export interface TagControllerConfig {
  readonly provider: TagSessionProvider;

  /** Codec used for both directions; defaults to the built-in strategies */
  readonly codec?: NdefCodec | undefined;

  /** Poll timeout passed to the provider (ms) */
  readonly pollTimeoutMs?: number | undefined;

  /** Overrides for individual scan sheet prompts */
  readonly prompts?: Partial<TagPrompts> | undefined;
}

/**
 * Default configuration values.
 */
export const defaultTagControllerConfig = {
  pollTimeoutMs: 20_000,
  prompts: {
    poll: 'Hold your tag near the reader',
    readDone: 'Done reading',
    readError: 'Read error',
    writeDone: 'Write done',
    writeError: 'Write error',
  },
} as const satisfies {
  readonly pollTimeoutMs: number;
  readonly prompts: TagPrompts;
};

/**
 * Outcome of a successful read.
 */
export interface ReadResult {
  readonly tag: TagHandle;
  readonly message: NdefMessage;
  /** e.g. "Read successful: 2 records found" */
  readonly status: string;
}

/**
 * Outcome of a successful write.
 */
export interface WriteResult {
  readonly tag: TagHandle;
  readonly bytesWritten: number;
}

/**
 * Runs complete tag sessions (poll, read or write, finish) over a provider.
 *
 * Only one session runs at a time: a call made while another is in flight
 * throws {@link TagBusyError}. The session is always finished, with the
 * error prompt when the operation fails, and the original error is rethrown.
 *
 * @example
 * ```typescript
 * const controller = new TagController({ provider });
 * const { message, status } = await controller.readMessage();
 * await controller.writeMessage([textRecord('minpres=10,maxpres=90')]);
 * ```
 */
export class TagController {
  private readonly provider: TagSessionProvider;
  private readonly codec: NdefCodec;
  private readonly pollTimeoutMs: number;
  private readonly prompts: TagPrompts;
  private readonly hooks: SafeHooks;
  private currentState: TagControllerState = 'idle';

  constructor(config: TagControllerConfig, hooks?: NdefHooks) {
    this.provider = config.provider;
    this.hooks = new SafeHooks(hooks);
    this.codec = config.codec ?? new NdefCodec({}, hooks);
    this.pollTimeoutMs =
      config.pollTimeoutMs ?? defaultTagControllerConfig.pollTimeoutMs;
    this.prompts = { ...defaultTagControllerConfig.prompts, ...config.prompts };
  }

  get state(): TagControllerState {
    return this.currentState;
  }

  isBusy(): boolean {
    return this.currentState !== 'idle';
  }

  /**
   * Polls for a tag, reads and decodes its message, and finishes the session.
   */
  async readMessage(): Promise<ReadResult> {
    return this.runSession('reading', this.prompts.readError, async () => {
      const tag = await this.poll();
      const bytes = await this.provider.readRawMessage(tag);
      // a blank or freshly formatted tag has an empty NDEF area
      const message: NdefMessage =
        bytes.length === 0 ? [] : this.codec.decode(bytes);
      await this.provider.finish({ alertMessage: this.prompts.readDone });

      const status = readStatus(message.length);
      this.hooks.logger.info(`[ndef] ${status} on tag ${tag.id}`);
      return { tag, message, status };
    });
  }

  /**
   * Polls for a tag, encodes `records` and writes them as its new message.
   *
   * @throws TagNotWritableError if the tag is read-only
   * @throws TagCapacityError if the encoded message does not fit
   */
  async writeMessage(records: readonly NdefRecord[]): Promise<WriteResult> {
    return this.runSession('writing', this.prompts.writeError, async () => {
      const tag = await this.poll();

      if (!tag.ndefWritable) {
        throw new TagNotWritableError(tag.id);
      }

      const bytes = this.codec.encode(records);
      if (tag.ndefCapacity !== undefined && bytes.length > tag.ndefCapacity) {
        throw new TagCapacityError(tag.id, bytes.length, tag.ndefCapacity);
      }

      await this.provider.writeRawMessage(tag, bytes);
      await this.provider.finish({ alertMessage: this.prompts.writeDone });

      this.hooks.logger.info(
        `[ndef] Wrote ${records.length} record(s), ${bytes.length} bytes, to tag ${tag.id}`,
      );
      return { tag, bytesWritten: bytes.length };
    });
  }

  /**
   * Ends a session left open by an interrupted operation.
   */
  async abort(): Promise<void> {
    if (!this.isBusy()) return;
    this.hooks.logger.warn(
      `[ndef] Aborting ${this.currentState} session on provider "${this.provider.name}"`,
    );
    await this.provider.finish({
      errorMessage: this.errorPromptFor(this.currentState),
    });
  }

  private async poll(): Promise<TagHandle> {
    return this.provider.poll({
      timeoutMs: this.pollTimeoutMs,
      alertMessage: this.prompts.poll,
    });
  }

  private async runSession<T>(
    state: Exclude<TagControllerState, 'idle'>,
    errorPrompt: string,
    operation: () => Promise<T>,
  ): Promise<T> {
    if (this.isBusy()) {
      throw new TagBusyError(state, this.currentState);
    }

    this.setState(state);
    try {
      return await operation();
    } catch (error) {
      this.hooks.logger.error(`[ndef] Tag ${state} failed`, error);
      await this.finishQuietly({ errorMessage: errorPrompt });
      throw error;
    } finally {
      this.setState('idle');
    }
  }

  /**
   * Finishes after a failure. A finish error is logged so that it does not
   * replace the error that ended the session.
   */
  private async finishQuietly(options: FinishOptions): Promise<void> {
    try {
      await this.provider.finish(options);
    } catch (finishError) {
      this.hooks.logger.warn(
        `[ndef] Provider "${this.provider.name}" failed to finish the session`,
        finishError,
      );
    }
  }

  private errorPromptFor(state: TagControllerState): string {
    return state === 'writing'
      ? this.prompts.writeError
      : this.prompts.readError;
  }

  private setState(next: TagControllerState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    this.hooks.onStateChange({
      previous,
      current: next,
      provider: this.provider.name,
    });
  }
}
