export * from './directory-cache.js';
export * from './person-lookup-cache.js';
