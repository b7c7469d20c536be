export * from './context.js';
export * from './unique-person-id.js';
export * from './person-sync.js';
export * from './post-assignment.js';
export * from './post-occupation.js';
export * from './user-accounts.js';
export * from './contact-details.js';
export * from './run-checks.js';
