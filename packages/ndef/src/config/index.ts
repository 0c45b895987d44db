export type { ConfigEntries } from './config-record.js';
export {
  createConfigRecord,
  formatConfigText,
  parseConfigText,
  readConfigRecord,
} from './config-record.js';
