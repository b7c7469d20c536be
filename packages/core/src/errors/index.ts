export * from './connector-error.js';
export * from './http-error.js';
