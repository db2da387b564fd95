/**
 * Aligned text table renderer.
 *
 * @example
 * ```
 * Database: shop, Table: users
 * +-------+-------------+------+-----+---------+----------------+
 * | Field | Type        | Null | Key | Default | Extra          |
 * +-------+-------------+------+-----+---------+----------------+
 * | id    | int(11)     | NO   | PRI | NULL    | auto_increment |
 * | email | varchar(64) | YES  |     | NULL    |                |
 * +-------+-------------+------+-----+---------+----------------+
 * ```
 */
import { theme, icons } from '../theme.js';
import { cellValue, type ColumnRecord, type FieldName, type TableResult, type TableStats } from '../describe/types.js';
import { colorCell, colorHeader } from './color.js';
import { minTypeWidth, wrapEnumType } from './enum.js';
import type { RenderOptions } from './types.js';

/**
 * Line printed between tables.
 */
export const TABLE_DIVIDER = '='.repeat(80);

/**
 * Column widths for a set of records.
 *
 * Each column is as wide as its widest cell or header. When `width` is set
 * and the table would be wider, the Type column gives up the difference,
 * down to the narrowest width that still shows every value whole.
 */
export function columnWidths(
    records: readonly ColumnRecord[],
    fields: readonly FieldName[],
    width: number | null,
): number[] {

    const widths = fields.map((field) => Math.max(
        field.length,
        ...records.map((record) => cellValue(record, field).length),
    ));

    const typeAt = fields.indexOf('Type');
    const typeWidth = widths[typeAt];

    if (width === null || typeWidth === undefined) {

        return widths;

    }

    const total = widths.reduce((sum, w) => sum + w, 0) + fields.length * 3 + 1;

    if (total <= width) {

        return widths;

    }

    const minimum = Math.max('Type'.length, ...records.map((record) => minTypeWidth(record.Type)));
    const available = typeWidth - (total - width);

    widths[typeAt] = Math.max(minimum, available);

    return widths;

}

function border(widths: number[]): string {

    return '+' + widths.map((w) => '-'.repeat(w + 2)).join('+') + '+';

}

/**
 * One `| a | b |` line; `colored[i]` is shown, `raw[i]` is measured.
 */
function line(raw: string[], colored: string[], widths: number[]): string {

    const cells = widths.map((w, i) => {

        const text = raw[i] ?? '';
        const shown = colored[i] ?? text;

        return ` ${shown}${' '.repeat(Math.max(0, w - text.length))} `;

    });

    return `|${cells.join('|')}|`;

}

/**
 * Lines for one record; a wrapped Type adds continuation lines with the
 * other cells blank.
 */
function recordLines(
    record: ColumnRecord,
    fields: readonly FieldName[],
    widths: number[],
    colorize: boolean,
): string[] {

    const cells = fields.map((field, i) => {

        const value = cellValue(record, field);
        const w = widths[i] ?? value.length;

        return field === 'Type' ? wrapEnumType(value, w) : [value];

    });

    const height = Math.max(...cells.map((cell) => cell.length));
    const lines: string[] = [];

    for (let row = 0; row < height; row++) {

        const raw = cells.map((cell) => cell[row] ?? '');
        const colored = colorize
            ? raw.map((text, i) => {

                const field = fields[i];

                return field && text ? colorCell(field, text, record) : text;

            })
            : raw;

        lines.push(line(raw, colored, widths));

    }

    return lines;

}

function formatStat(value: number | null, unit = ''): string {

    return value === null ? 'N/A' : `${value}${unit}`;

}

/**
 * The `Table Statistics:` block.
 */
export function renderStats(stats: TableStats, colorize: boolean): string[] {

    const value = (text: string) => colorize ? theme.primary(text) : text;
    const lines = [
        colorize ? theme.bold('Table Statistics:') : 'Table Statistics:',
        `${icons.bullet} Row Count: ${value(formatStat(stats.rowCount))}`,
        `${icons.bullet} Size: ${value(formatStat(stats.sizeMb, ' MB'))}`,
        `${icons.bullet} Index Count: ${value(formatStat(stats.indexCount))}`,
    ];

    for (const index of stats.indexes) {

        const unique = index.unique ? ' (unique)' : '';

        lines.push(`    ${index.name}${unique}: ${index.columns.join(', ')}`);

    }

    return lines;

}

/**
 * `Database: <db>, Table: <table>` heading.
 */
export function renderTitle(database: string, table: string, colorize: boolean): string {

    if (!colorize) {

        return `Database: ${database}, Table: ${table}`;

    }

    return `${theme.bold('Database:')} ${database}, ${theme.bold('Table:')} ${table}`;

}

/**
 * Render one table result.
 */
export function renderTable(result: TableResult, options: RenderOptions): string {

    const fields = options.columns;
    const widths = columnWidths(result.columns, fields, options.width);
    const separator = border(widths);
    const headerRaw = [...fields];
    const headerShown = options.colorize ? headerRaw.map(colorHeader) : headerRaw;
    const lines: string[] = [];

    if (result.database !== null) {

        lines.push(renderTitle(result.database, result.table, options.colorize));

    }

    if (options.includeStats && result.stats) {

        lines.push(...renderStats(result.stats, options.colorize), '');

    }

    lines.push(separator, line(headerRaw, headerShown, widths), separator);

    for (const record of result.columns) {

        lines.push(...recordLines(record, fields, widths, options.colorize));

    }

    lines.push(separator);

    return lines.join('\n');

}

/**
 * Render several tables, divided by a line of `=`.
 */
export function renderTables(results: readonly TableResult[], options: RenderOptions): string {

    return results.map((result) => renderTable(result, options)).join(`\n\n${TABLE_DIVIDER}\n\n`) + '\n';

}
