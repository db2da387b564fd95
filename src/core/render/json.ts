/**
 * JSON renderer.
 *
 * One array entry per table; column keys follow the filter order and a
 * missing Default stays null.
 */
import type { ColumnRecord, FieldName, TableResult, TableStats } from '../describe/types.js';
import type { RenderOptions } from './types.js';

/**
 * Shape of one table in the JSON document.
 */
export interface JsonTable {

    database: string | null;
    table: string;
    columns: Partial<Record<FieldName, string | null>>[];
    stats?: TableStats;

}

/**
 * Keep only the requested fields, in the requested order.
 */
export function projectRecord(
    record: ColumnRecord,
    fields: readonly FieldName[],
): Partial<Record<FieldName, string | null>> {

    const projected: Partial<Record<FieldName, string | null>> = {};

    for (const field of fields) {

        projected[field] = record[field];

    }

    return projected;

}

export function toJsonTable(result: TableResult, options: RenderOptions): JsonTable {

    const table: JsonTable = {
        database: result.database,
        table: result.table,
        columns: result.columns.map((record) => projectRecord(record, options.columns)),
    };

    if (options.includeStats && result.stats) {

        table.stats = result.stats;

    }

    return table;

}

/**
 * Render results as an indented JSON array.
 */
export function renderJson(results: readonly TableResult[], options: RenderOptions): string {

    return JSON.stringify(results.map((result) => toJsonTable(result, options)), null, 2) + '\n';

}
