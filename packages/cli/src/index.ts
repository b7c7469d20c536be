/**
 * @catalogsync/cli
 */

export * from './config.js';
export * from './args.js';
export * from './sync.js';
