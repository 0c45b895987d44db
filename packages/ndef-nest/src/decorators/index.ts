export { NdefRecordStrategy } from './ndef-record-strategy.decorator.js';
