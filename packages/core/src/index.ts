/**
 * @gaugelink/core
 *
 * Shared record types, connector interface and errors
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Utilities
export * from './utils/index.js';
