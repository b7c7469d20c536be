export * from './retry.js';
export * from './auth.js';
export * from './http-client.js';
