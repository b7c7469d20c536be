export * from './catalog-gateway.js';
export * from './directory-gateway.js';
export * from './mapping-store.js';
