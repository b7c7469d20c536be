/**
 * @catalogsync/connector-api
 *
 * HTTP resilience layer and the catalog and directory API clients
 */

export * from './http/index.js';
export * from './catalog/index.js';
export * from './directory/index.js';
