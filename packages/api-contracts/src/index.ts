export * from './envelopes.js';
export * from './error-code.js';
export * from './tasks.js';
export * from './jobs.js';
