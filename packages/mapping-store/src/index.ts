/**
 * @catalogsync/mapping-store
 *
 * Identity mapping between external ids and catalog resources
 */

export * from './mapping-table.js';
export * from './persisted-mapping-store.js';
export * from './in-memory-mapping-store.js';
