import {
  NoTagPresentError,
  TagCapacityError,
  TagLostError,
  TagNotWritableError,
} from '../errors/index.js';
import { type Logger, consoleLogger } from '../hooks/index.js';
import type {
  FinishOptions,
  PollOptions,
  TagHandle,
  TagSessionProvider,
} from './types.js';

/**
 * A tag held in memory: its handle and the NDEF bytes stored on it.
 */
interface VirtualTag {
  readonly handle: TagHandle;
  bytes: Uint8Array;
}

/**
 * In-memory tag provider for tests, demos and the CLI.
 * Holds at most one "presented" tag; polling without one fails immediately
 * with {@link NoTagPresentError} rather than waiting for the timeout.
 */
export class MemoryTagProvider implements TagSessionProvider {
  readonly name = 'memory';

  private tag: VirtualTag | undefined;
  private sessionOpen = false;
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? consoleLogger;
  }

  /**
   * Places a tag in the field. Unset handle fields default to a writable
   * ISO 15693 tag of unknown capacity.
   */
  present(
    handle: Partial<TagHandle> & Pick<TagHandle, 'id'>,
    bytes: Uint8Array = new Uint8Array(0),
  ): TagHandle {
    const full: TagHandle = {
      standard: 'ISO 15693',
      ndefWritable: true,
      ...handle,
    };
    this.tag = { handle: full, bytes: bytes.slice() };
    return full;
  }

  /**
   * Takes the tag out of the field.
   */
  remove(): void {
    this.tag = undefined;
  }

  /**
   * Returns a copy of the bytes stored on the presented tag.
   */
  contents(): Uint8Array | undefined {
    return this.tag?.bytes.slice();
  }

  isSessionOpen(): boolean {
    return this.sessionOpen;
  }

  async poll(options: PollOptions): Promise<TagHandle> {
    if (!this.tag) {
      throw new NoTagPresentError(options.timeoutMs);
    }
    this.sessionOpen = true;
    this.logger.debug(`[ndef] memory: tag ${this.tag.handle.id} polled`);
    return this.tag.handle;
  }

  async readRawMessage(tag: TagHandle): Promise<Uint8Array> {
    return this.requireTag(tag).bytes.slice();
  }

  async writeRawMessage(tag: TagHandle, bytes: Uint8Array): Promise<void> {
    const current = this.requireTag(tag);
    const { ndefWritable, ndefCapacity } = current.handle;

    if (!ndefWritable) {
      throw new TagNotWritableError(tag.id);
    }
    if (ndefCapacity !== undefined && bytes.length > ndefCapacity) {
      throw new TagCapacityError(tag.id, bytes.length, ndefCapacity);
    }

    current.bytes = bytes.slice();
    this.logger.debug(
      `[ndef] memory: wrote ${bytes.length} bytes to tag ${tag.id}`,
    );
  }

  async finish(options: FinishOptions = {}): Promise<void> {
    this.sessionOpen = false;
    const note = options.errorMessage ?? options.alertMessage;
    this.logger.debug(
      `[ndef] memory: session finished${note ? ` (${note})` : ''}`,
    );
  }

  private requireTag(tag: TagHandle): VirtualTag {
    if (!this.sessionOpen || !this.tag || this.tag.handle.id !== tag.id) {
      throw new TagLostError(tag.id);
    }
    return this.tag;
  }
}
