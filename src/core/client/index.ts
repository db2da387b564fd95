/**
 * External database client module.
 */
export * from './types.js';
export * from './runner.js';
export * from './stats.js';
export * from './mysql.js';
