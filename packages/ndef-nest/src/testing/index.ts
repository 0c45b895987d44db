export { NdefTestingModule } from './ndef-testing.module.js';
