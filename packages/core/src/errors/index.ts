export { ConnectorError } from './connector-error.js';
export type { ErrorCode, ConnectorErrorDetails } from './connector-error.js';
