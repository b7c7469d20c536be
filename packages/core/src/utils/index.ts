export * from './strings.js';
export * from './uuid.js';
export * from './async.js';
