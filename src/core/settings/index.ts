/**
 * User settings module.
 */
export * from './types.js';
export * from './schema.js';
export * from './defaults.js';
export * from './manager.js';
