/**
 * @catalogsync/core
 *
 * Domain types, gateway interfaces and shared utilities for catalog reconciliation
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';

// Logging
export * from './logging/index.js';
