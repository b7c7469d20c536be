export * from './state.js';
export * from './issues.js';
export * from './checks.js';
