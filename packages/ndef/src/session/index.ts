export type {
  FinishOptions,
  PollOptions,
  TagControllerState,
  TagHandle,
  TagSessionProvider,
} from './types.js';

export type {
  ReadResult,
  TagControllerConfig,
  TagPrompts,
  WriteResult,
} from './tag-controller.js';
export {
  TagController,
  defaultTagControllerConfig,
} from './tag-controller.js';

export { MemoryTagProvider } from './memory-provider.js';
