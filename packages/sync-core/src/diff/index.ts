export * from './assignment-diff.js';
export * from './contact-diff.js';
