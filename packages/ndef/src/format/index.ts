export { describeMessage, describeRecord, readStatus } from './describe.js';
