/**
 * CSV renderer.
 *
 * Quoting follows RFC 4180 via csv-stringify. Several tables share one
 * document with a leading `Table` column.
 */
import { stringify } from 'csv-stringify/sync';

import { cellValue, type TableResult } from '../describe/types.js';
import type { RenderOptions } from './types.js';

export const STATS_HEADERS = ['Row Count', 'Size (MB)', 'Index Count'] as const;

function statCell(value: number | null | undefined): string {

    return value === null || value === undefined ? '' : String(value);

}

/**
 * Header row plus one row per record.
 */
export function csvRows(results: readonly TableResult[], options: RenderOptions): string[][] {

    const withTable = results.length > 1;
    const header = [
        ...(withTable ? ['Table'] : []),
        ...options.columns,
        ...(options.includeStats ? STATS_HEADERS : []),
    ];

    const rows = results.flatMap((result) => result.columns.map((record) => [
        ...(withTable ? [result.table] : []),
        ...options.columns.map((field) => cellValue(record, field)),
        ...(options.includeStats
            ? [
                statCell(result.stats?.rowCount),
                statCell(result.stats?.sizeMb),
                statCell(result.stats?.indexCount),
            ]
            : []),
    ]));

    return [header, ...rows];

}

/**
 * Render results as CSV.
 */
export function renderCsv(results: readonly TableResult[], options: RenderOptions): string {

    return stringify(csvRows(results, options));

}
