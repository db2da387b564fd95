/**
 * Statistics queries and their batch-output parsers.
 */
import type { IndexInfo } from '../describe/types.js';

/**
 * Quote an identifier with backticks, doubling embedded backticks.
 *
 * @example
 * ```typescript
 * quoteIdentifier('order')      // '`order`'
 * quoteIdentifier('odd`name')   // '`odd``name`'
 * ```
 */
export function quoteIdentifier(name: string): string {

    return '`' + name.replaceAll('`', '``') + '`';

}

/**
 * Quote a string literal for the client's SQL dialect.
 */
export function quoteLiteral(value: string): string {

    return '\'' + value.replaceAll('\\', '\\\\').replaceAll('\'', '\'\'') + '\'';

}

export function showColumnsQuery(table: string): string {

    return `SHOW COLUMNS FROM ${quoteIdentifier(table)}`;

}

export function rowCountQuery(table: string): string {

    return `SELECT COUNT(*) FROM ${quoteIdentifier(table)}`;

}

export function sizeQuery(database: string, table: string): string {

    return 'SELECT ROUND((DATA_LENGTH + INDEX_LENGTH) / 1024 / 1024, 2) AS size_mb'
        + ' FROM information_schema.TABLES'
        + ` WHERE TABLE_SCHEMA = ${quoteLiteral(database)} AND TABLE_NAME = ${quoteLiteral(table)}`;

}

export function showIndexQuery(table: string): string {

    return `SHOW INDEX FROM ${quoteIdentifier(table)}`;

}

// ─────────────────────────────────────────────────────────────
// Parsers
// ─────────────────────────────────────────────────────────────

function dataLines(stdout: string): string[] {

    return stdout.split(/\r?\n/).filter((line) => line.trim() !== '');

}

/**
 * Read the single value of a one-column batch result.
 *
 * `NULL` (or no row at all) is null.
 *
 * @throws Error when the value is not a number
 *
 * @example
 * ```typescript
 * parseScalar('COUNT(*)\n42\n')    // 42
 * parseScalar('size_mb\nNULL\n')   // null
 * ```
 */
export function parseScalar(stdout: string): number | null {

    const value = dataLines(stdout)[1]?.trim();

    if (value === undefined || value === 'NULL') {

        return null;

    }

    const parsed = Number(value);

    if (!Number.isFinite(parsed)) {

        throw new Error(`Expected a number, got '${value}'`);

    }

    return parsed;

}

/**
 * Group `SHOW INDEX` rows into indexes.
 *
 * Indexes keep the order they are first listed in; columns are ordered by
 * `Seq_in_index`.
 *
 * @throws Error when the header lacks Key_name or Column_name
 */
export function parseIndexes(stdout: string): IndexInfo[] {

    const [header, ...rows] = dataLines(stdout);

    if (header === undefined) {

        return [];

    }

    const names = header.split('\t').map((cell) => cell.trim());
    const keyAt = names.indexOf('Key_name');
    const columnAt = names.indexOf('Column_name');
    const nonUniqueAt = names.indexOf('Non_unique');
    const seqAt = names.indexOf('Seq_in_index');

    if (keyAt < 0 || columnAt < 0) {

        throw new Error('Unrecognized SHOW INDEX output');

    }

    const grouped = new Map<string, { unique: boolean; parts: { seq: number; column: string }[] }>();

    rows.forEach((row, position) => {

        const cells = row.split('\t');
        const name = cells[keyAt];
        const column = cells[columnAt];

        if (name === undefined || column === undefined) {

            return;

        }

        const seq = seqAt >= 0 ? Number(cells[seqAt]) : position;
        const entry = grouped.get(name) ?? { unique: cells[nonUniqueAt] === '0', parts: [] };

        entry.parts.push({ seq: Number.isFinite(seq) ? seq : position, column });
        grouped.set(name, entry);

    });

    return [...grouped].map(([name, entry]) => ({
        name,
        unique: entry.unique,
        columns: entry.parts.sort((a, b) => a.seq - b.seq).map((part) => part.column),
    }));

}
