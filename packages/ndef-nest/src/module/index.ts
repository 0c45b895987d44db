export { NdefModule } from './ndef.module.js';
