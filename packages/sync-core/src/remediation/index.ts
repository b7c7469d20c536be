export * from './remediation-executor.js';
