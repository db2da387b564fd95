/**
 * Cache key derivation.
 */
import { createHash } from 'node:crypto';

import { CACHE_VERSION, type CacheKeyInput } from './types.js';

/**
 * SHA-256 hex digest of the query parameters.
 *
 * The column filter participates in its requested order, so `Field,Null`
 * and `Null,Field` are different entries.
 *
 * @example
 * ```typescript
 * cacheKey({ database: 'shop', table: 'orders', columns: null, stats: false })
 * // '3f1c...' (64 hex characters)
 * ```
 */
export function cacheKey(input: CacheKeyInput): string {

    const material = JSON.stringify([
        CACHE_VERSION,
        input.database,
        input.table,
        input.columns ? [...input.columns] : null,
        input.stats,
    ]);

    return createHash('sha256').update(material, 'utf8').digest('hex');

}
