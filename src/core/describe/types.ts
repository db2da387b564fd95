/**
 * Column structure types.
 *
 * Defines the records produced by parsing `SHOW COLUMNS` output and the
 * per-table result that flows through caching and rendering.
 */

/**
 * Column names of a `SHOW COLUMNS` row, in source order.
 */
export const FIELD_NAMES = ['Field', 'Type', 'Null', 'Key', 'Default', 'Extra'] as const;

/**
 * One of the six column-description fields.
 */
export type FieldName = typeof FIELD_NAMES[number];

/**
 * One row of table-structure metadata.
 *
 * `Default` is null when the client reports `NULL`.
 */
export interface ColumnRecord {

    readonly Field: string;
    readonly Type: string;
    readonly Null: string;
    readonly Key: string;
    readonly Default: string | null;
    readonly Extra: string;

}

/**
 * One index on a table, as listed by `SHOW INDEX`.
 */
export interface IndexInfo {

    name: string;
    unique: boolean;

    /** Column names in index order */
    columns: string[];

}

/**
 * Supplementary table statistics.
 *
 * A statistic the client could not provide is null.
 */
export interface TableStats {

    rowCount: number | null;
    sizeMb: number | null;
    indexCount: number | null;
    indexes: IndexInfo[];

}

/**
 * Parsed structure of one table.
 */
export interface TableResult {

    /** Null in pipe mode */
    database: string | null;
    table: string;
    columns: ColumnRecord[];
    stats?: TableStats;

}

/**
 * Check whether a string is one of the six field names (case-sensitive).
 */
export function isFieldName(name: string): name is FieldName {

    return FIELD_NAMES.some((field) => field === name);

}

/**
 * Display value of a record cell.
 *
 * A null Default shows as `NULL`, the way the client prints it.
 */
export function cellValue(record: ColumnRecord, field: FieldName): string {

    const value = record[field];

    return value === null ? 'NULL' : value;

}
