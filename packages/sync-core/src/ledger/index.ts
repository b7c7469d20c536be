export * from './issue-ledger.js';
export * from './run-aggregator.js';
