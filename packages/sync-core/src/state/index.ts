export * from './catalog-state.js';
export * from './assignment-state.js';
