import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { observer } from '../../../src/core/observer.js';
import { ResultCache, defaultCacheDir } from '../../../src/core/cache/store.js';
import type { TableResult } from '../../../src/core/describe/types.js';

const WRITTEN_AT = new Date('2026-03-01T10:00:00.000Z');

const RESULT: TableResult = {
    database: 'shop',
    table: 'orders',
    columns: [
        { Field: 'id', Type: 'int(11)', Null: 'NO', Key: 'PRI', Default: null, Extra: 'auto_increment' },
        { Field: 'status', Type: 'varchar(20)', Null: 'YES', Key: '', Default: 'new', Extra: '' },
    ],
};

function minutesAfter(minutes: number): () => Date {

    return () => new Date(WRITTEN_AT.getTime() + minutes * 60 * 1000);

}

/**
 * Creates a fresh cache directory for each test.
 */
function createTestContext() {

    const tempDir = mkdtempSync(join(tmpdir(), 'dbstruct-cache-test-'));
    const dir = join(tempDir, 'cache');

    const cleanup = () => {

        if (existsSync(tempDir)) {

            rmSync(tempDir, { recursive: true });

        }

    };

    return { tempDir, dir, cleanup };

}

describe('cache: ResultCache', () => {

    it('should default under the XDG cache home', () => {

        expect(defaultCacheDir({ XDG_CACHE_HOME: '/var/cache/me' })).toBe('/var/cache/me/dbstruct');

    });

    it('should return a stored result within the hour', async () => {

        const { dir, cleanup } = createTestContext();
        const hits: unknown[] = [];
        const off = observer.on('cache:hit', (data) => hits.push(data));

        try {

            const writer = new ResultCache({ dir, now: () => WRITTEN_AT });

            expect(await writer.write('abc123', RESULT)).toBe(true);
            expect(existsSync(join(dir, 'abc123.json'))).toBe(true);

            const reader = new ResultCache({ dir, now: minutesAfter(59) });

            expect(await reader.read('abc123', 'orders')).toEqual(RESULT);
            expect(hits).toEqual([{ key: 'abc123', table: 'orders', ageMs: 59 * 60 * 1000 }]);

        }
        finally {

            off();
            cleanup();

        }

    });

    it('should store a versioned entry with its creation time', async () => {

        const { dir, cleanup } = createTestContext();

        try {

            const cache = new ResultCache({ dir, now: () => WRITTEN_AT });
            await cache.write('abc123', RESULT);

            const entry: unknown = JSON.parse(readFileSync(cache.pathFor('abc123'), 'utf8'));

            expect(entry).toEqual({
                version: 1,
                key: 'abc123',
                createdAt: '2026-03-01T10:00:00.000Z',
                result: RESULT,
            });

        }
        finally {

            cleanup();

        }

    });

    it('should treat an entry one hour old as expired', async () => {

        const { dir, cleanup } = createTestContext();
        const misses: unknown[] = [];
        const off = observer.on('cache:miss', (data) => misses.push(data));

        try {

            await new ResultCache({ dir, now: () => WRITTEN_AT }).write('abc123', RESULT);

            const reader = new ResultCache({ dir, now: minutesAfter(60) });

            expect(await reader.read('abc123', 'orders')).toBeNull();
            expect(misses).toEqual([{ key: 'abc123', table: 'orders', reason: 'expired' }]);

        }
        finally {

            off();
            cleanup();

        }

    });

    it('should report an absent entry as a miss', async () => {

        const { dir, cleanup } = createTestContext();
        const misses: unknown[] = [];
        const off = observer.on('cache:miss', (data) => misses.push(data));

        try {

            const cache = new ResultCache({ dir });

            expect(await cache.read('missing', 'orders')).toBeNull();
            expect(misses).toEqual([{ key: 'missing', table: 'orders', reason: 'absent' }]);

        }
        finally {

            off();
            cleanup();

        }

    });

    it('should skip a corrupt entry', async () => {

        const { tempDir, cleanup } = createTestContext();
        const skipped: unknown[] = [];
        const off = observer.on('cache:skipped', (data) => skipped.push(data));

        try {

            const cache = new ResultCache({ dir: tempDir });
            writeFileSync(cache.pathFor('broken'), '{"version": 1,');

            expect(await cache.read('broken', 'orders')).toBeNull();
            expect(skipped).toHaveLength(1);
            expect(skipped[0]).toMatchObject({ key: 'broken', path: cache.pathFor('broken') });

        }
        finally {

            off();
            cleanup();

        }

    });

    it('should skip an entry that does not match the schema', async () => {

        const { tempDir, cleanup } = createTestContext();
        const skipped: unknown[] = [];
        const off = observer.on('cache:skipped', (data) => skipped.push(data));

        try {

            const cache = new ResultCache({ dir: tempDir, now: () => WRITTEN_AT });
            writeFileSync(cache.pathFor('old'), JSON.stringify({
                version: 0,
                key: 'old',
                createdAt: WRITTEN_AT.toISOString(),
                result: RESULT,
            }));

            expect(await cache.read('old', 'orders')).toBeNull();
            expect(skipped).toHaveLength(1);

        }
        finally {

            off();
            cleanup();

        }

    });

    it('should warn and return false when the entry cannot be written', async () => {

        const { tempDir, cleanup } = createTestContext();
        const warnings: unknown[] = [];
        const off = observer.on('cache:warning', (data) => warnings.push(data));

        try {

            const blocker = join(tempDir, 'not-a-dir');
            writeFileSync(blocker, 'file');

            const cache = new ResultCache({ dir: blocker });

            expect(await cache.write('abc123', RESULT)).toBe(false);
            expect(warnings).toHaveLength(1);
            expect(warnings[0]).toMatchObject({ key: 'abc123', path: join(blocker, 'abc123.json') });

        }
        finally {

            off();
            cleanup();

        }

    });

});
