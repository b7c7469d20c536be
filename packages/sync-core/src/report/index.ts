export * from './report-store.js';
export * from './report-formatter.js';
