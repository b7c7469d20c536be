export * from './schemas.js';
export * from './rows.js';
