export { extractFieldNames, isPlainRecord } from './records.js';
