/**
 * File-backed result cache.
 *
 * One JSON file per key under the cache directory. Reads degrade to a miss
 * on any failure; writes never throw.
 *
 * @example
 * ```typescript
 * const cache = new ResultCache({ dir: defaultCacheDir() })
 *
 * const cached = await cache.read(key, 'orders')
 * if (!cached) {
 *     const result = await describe()
 *     await cache.write(key, result)
 * }
 * ```
 */
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { attempt, attemptSync } from '@logosdx/utils';
import dayjs from 'dayjs';

import { observer } from '../observer.js';
import { CacheError } from '../errors.js';
import { userCacheHome } from '../environment.js';
import type { TableResult } from '../describe/types.js';
import { CACHE_TTL_MS, CACHE_VERSION, CacheEntrySchema, type CacheEntry } from './types.js';

/**
 * Options for ResultCache construction.
 */
export interface ResultCacheOptions {

    /** Directory holding the entry files (created on first write) */
    dir: string;

    /** Clock, for tests (default: current time) */
    now?: () => Date;

}

/**
 * Default cache directory: `$XDG_CACHE_HOME/dbstruct` or `~/.cache/dbstruct`.
 */
export function defaultCacheDir(env: NodeJS.ProcessEnv = process.env): string {

    return join(userCacheHome(env), 'dbstruct');

}

function errorCode(error: Error): string | undefined {

    return 'code' in error && typeof error.code === 'string' ? error.code : undefined;

}

/**
 * Time-bounded cache of table results.
 */
export class ResultCache {

    #dir: string;
    #now: () => Date;

    constructor(options: ResultCacheOptions) {

        this.#dir = options.dir;
        this.#now = options.now ?? (() => new Date());

    }

    get dir(): string {

        return this.#dir;

    }

    pathFor(key: string): string {

        return join(this.#dir, `${key}.json`);

    }

    /**
     * Look up a result.
     *
     * Returns null when the entry is absent, unreadable, invalid or at least
     * one hour old. Unreadable and invalid entries emit `cache:skipped`.
     */
    async read(key: string, table: string): Promise<TableResult | null> {

        const path = this.pathFor(key);
        const [content, readErr] = await attempt(() => readFile(path, 'utf8'));

        if (content === null) {

            if (readErr && errorCode(readErr) !== 'ENOENT') {

                this.#skip(key, new CacheError(path, 'read', readErr.message));

            }
            else {

                observer.emit('cache:miss', { key, table, reason: 'absent' });

            }

            return null;

        }

        const [json, jsonErr] = attemptSync((): unknown => JSON.parse(content));

        if (jsonErr) {

            this.#skip(key, new CacheError(path, 'read', jsonErr.message));

            return null;

        }

        const parsed = CacheEntrySchema.safeParse(json);

        if (!parsed.success) {

            const issue = parsed.error.issues[0];
            const reason = issue ? `${issue.path.join('.') || 'entry'}: ${issue.message}` : 'invalid entry';

            this.#skip(key, new CacheError(path, 'read', reason));

            return null;

        }

        const ageMs = dayjs(this.#now()).diff(dayjs(parsed.data.createdAt));

        if (ageMs >= CACHE_TTL_MS) {

            observer.emit('cache:miss', { key, table, reason: 'expired' });

            return null;

        }

        observer.emit('cache:hit', { key, table, ageMs });

        return parsed.data.result;

    }

    /**
     * Store a result, replacing any existing entry.
     *
     * @returns false when the entry could not be written (a `cache:warning`
     * is emitted)
     */
    async write(key: string, result: TableResult): Promise<boolean> {

        const path = this.pathFor(key);
        const entry: CacheEntry = {
            version: CACHE_VERSION,
            key,
            createdAt: this.#now().toISOString(),
            result,
        };

        const [, dirErr] = await attempt(() => mkdir(this.#dir, { recursive: true }));

        if (dirErr) {

            this.#warn(key, new CacheError(path, 'write', dirErr.message));

            return false;

        }

        const [, writeErr] = await attempt(() => writeFile(path, JSON.stringify(entry), 'utf8'));

        if (writeErr) {

            this.#warn(key, new CacheError(path, 'write', writeErr.message));

            return false;

        }

        observer.emit('cache:stored', { key, table: result.table, path });

        return true;

    }

    #skip(key: string, error: CacheError): void {

        observer.emit('cache:skipped', { key, path: error.path, error: error.reason });

    }

    #warn(key: string, error: CacheError): void {

        observer.emit('cache:warning', { key, path: error.path, error: error.reason });

    }

}
