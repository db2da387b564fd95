/**
 * Column structure module.
 *
 * Parses client output into column records and resolves column filters.
 */
export * from './types.js';
export * from './parser.js';
export * from './filter.js';
