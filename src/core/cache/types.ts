/**
 * Cache entry schemas.
 *
 * Entries are validated on read, so a hand-edited or truncated file is a
 * miss rather than a crash.
 */
import { z } from 'zod';

/**
 * Bump when the entry layout changes; older entries then fail validation.
 */
export const CACHE_VERSION = 1;

/**
 * Entries expire one hour after they were written.
 */
export const CACHE_TTL_MS = 60 * 60 * 1000;

const ColumnRecordSchema = z.object({
    Field: z.string(),
    Type: z.string(),
    Null: z.string(),
    Key: z.string(),
    Default: z.string().nullable(),
    Extra: z.string(),
});

const IndexInfoSchema = z.object({
    name: z.string(),
    unique: z.boolean(),
    columns: z.array(z.string()),
});

const TableStatsSchema = z.object({
    rowCount: z.number().nullable(),
    sizeMb: z.number().nullable(),
    indexCount: z.number().int().nullable(),
    indexes: z.array(IndexInfoSchema),
});

export const TableResultSchema = z.object({
    database: z.string().nullable(),
    table: z.string(),
    columns: z.array(ColumnRecordSchema),
    stats: TableStatsSchema.optional(),
});

export const CacheEntrySchema = z.object({
    version: z.literal(CACHE_VERSION),
    key: z.string(),
    createdAt: z.string().datetime({ offset: true }),
    result: TableResultSchema,
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

/**
 * Parameters that identify one cached result.
 */
export interface CacheKeyInput {

    database: string;
    table: string;

    /** Column filter in requested order, null for all columns */
    columns: readonly string[] | null;

    stats: boolean;

}
