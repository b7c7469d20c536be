export * from './entities.js';
export * from './catalog.js';
export * from './directory.js';
