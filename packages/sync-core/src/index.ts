/**
 * @catalogsync/sync-core
 *
 * Reconciliation engine: directory cache, state fetchers, diff, remediation,
 * issue ledger and the six fact-type checks
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Caches
export * from './cache/index.js';

// IS / SHOULD state
export * from './state/index.js';

// Diff engine
export * from './diff/index.js';

// Remediation
export * from './remediation/index.js';

// Issue ledger and aggregation
export * from './ledger/index.js';

// Audit trail
export * from './audit/index.js';

// Checks and run orchestration
export * from './checks/index.js';

// Reports
export * from './report/index.js';
