/**
 * Result cache module.
 */
export * from './types.js';
export * from './key.js';
export * from './store.js';
