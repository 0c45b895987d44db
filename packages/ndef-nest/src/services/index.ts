export { NdefService } from './ndef.service.js';
