// Decorators
export { NdefRecordStrategy } from './decorators/index.js';

// Module
export { NdefModule } from './module/index.js';

// Services
export { NdefService } from './services/index.js';

// Discovery
export { StrategyDiscoveryService } from './discovery/index.js';

// Testing
export { NdefTestingModule } from './testing/index.js';

// Types
export type {
  DiscoveredStrategy,
  NdefModuleAsyncOptions,
  NdefModuleClassOptions,
  NdefModuleFactoryOptions,
  NdefModuleOptions,
  NdefOptionsFactory,
  NdefRecordStrategyOptions,
  NdefStrategyRegistration,
} from './types.js';

// Constants (for advanced use cases)
export { NDEF_OPTIONS, NDEF_RECORD_STRATEGY } from './constants.js';
