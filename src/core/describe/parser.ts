/**
 * Column structure parser.
 *
 * Turns the text a database client prints for `SHOW COLUMNS` into
 * `ColumnRecord` values. Three input shapes are accepted:
 *
 * - tab-delimited (`mysql --batch`)
 * - pipe-delimited (`mysql` table mode, `| Field | Type | ... |`)
 * - whitespace-aligned (sliced at the header's column offsets)
 *
 * Each line is classified into a category and fed through a small state
 * machine, so preambles, borders and footers such as `6 rows in set` are
 * skipped deterministically.
 *
 * @example
 * ```typescript
 * const records = parseColumns('Field\tType\tNull\tKey\tDefault\tExtra\nid\tint\tNO\tPRI\tNULL\t')
 * // [{ Field: 'id', Type: 'int', Null: 'NO', Key: 'PRI', Default: null, Extra: '' }]
 * ```
 */
import { observer } from '../observer.js';
import { ParseError } from '../errors.js';
import { FIELD_NAMES, type ColumnRecord, type FieldName } from './types.js';

// ─────────────────────────────────────────────────────────────
// State Machine
// ─────────────────────────────────────────────────────────────

/**
 * Category of a single input line.
 */
export type LineCategory = 'header' | 'separator' | 'data' | 'blank' | 'noise';

/**
 * Parser state.
 *
 * `trailing` is terminal: once the data block has ended, everything after
 * it (borders, row counts, stray output) is ignored. A noise line inside
 * the data block is skipped with a `parse:warning` and does not end it.
 */
export type ParserState = 'start' | 'header' | 'separator' | 'data' | 'trailing';

/**
 * Transition table: current state x line category -> next state.
 */
export const TRANSITIONS: Readonly<Record<ParserState, Readonly<Record<LineCategory, ParserState>>>> = {
    start: { header: 'header', separator: 'start', data: 'data', blank: 'start', noise: 'start' },
    header: { header: 'header', separator: 'separator', data: 'data', blank: 'header', noise: 'header' },
    separator: { header: 'header', separator: 'separator', data: 'data', blank: 'separator', noise: 'separator' },
    data: { header: 'trailing', separator: 'trailing', data: 'data', blank: 'trailing', noise: 'data' },
    trailing: { header: 'trailing', separator: 'trailing', data: 'trailing', blank: 'trailing', noise: 'trailing' },
};

// ─────────────────────────────────────────────────────────────
// Line Classification
// ─────────────────────────────────────────────────────────────

/**
 * How the cells of a line are delimited.
 */
export type DelimiterMode = 'tab' | 'pipe' | 'space';

/**
 * Column layout established by a header line.
 */
export interface ColumnLayout {

    mode: DelimiterMode;

    /** Field for each cell position, null for columns we don't keep */
    fields: (FieldName | null)[];

    /** Type cell position */
    typeIndex: number;

    /** Cell start offsets, for whitespace-aligned input */
    offsets: number[] | null;

}

/**
 * A cell and where it starts in its line.
 */
interface Cell {

    text: string;
    start: number;

}

/**
 * Result of classifying one line.
 */
export interface ClassifiedLine {

    category: LineCategory;
    mode: DelimiterMode;
    cells: string[];

    /** Cells are whitespace tokens to map by position, not header-aligned */
    byPosition: boolean;

}

/**
 * Leading SQL type tokens recognized in the Type position.
 */
const TYPE_PATTERN = new RegExp([
    '^(tiny|small|medium|big)?int(eger)?\\b',
    '^(decimal|numeric|dec|fixed|float|double|real|bit|bool|boolean|serial)\\b',
    '^(var)?(char|binary)\\b',
    '^(tiny|medium|long)?(text|blob)\\b',
    '^(enum|set)\\(',
    '^(date|datetime|timestamp|time|year)\\b',
    '^(json|uuid|inet[46]|vector)\\b',
    '^(geometry|point|linestring|polygon|multipoint|multilinestring|multipolygon|geometrycollection|geomcollection)\\b',
].join('|'), 'i');

const SEPARATOR_PATTERN = /^[\s+|=-]+$/;

/**
 * Check whether a cell looks like a SQL column type.
 *
 * @example
 * ```typescript
 * isTypeToken('varchar(255)')       // true
 * isTypeToken("enum('a','b')")      // true
 * isTypeToken('Type')               // false
 * ```
 */
export function isTypeToken(cell: string): boolean {

    return TYPE_PATTERN.test(cell.trim());

}

/**
 * Split a line into whitespace-separated cells, keeping parenthesized and
 * quoted runs together (`enum('a b','c')` stays one cell).
 */
function tokenize(line: string): Cell[] {

    const cells: Cell[] = [];
    let depth = 0;
    let quote: string | null = null;
    let start = -1;

    for (let i = 0; i < line.length; i++) {

        const ch = line.charAt(i);

        if (quote) {

            if (ch === quote) {

                quote = null;

            }

            continue;

        }

        const isSpace = ch === ' ' || ch === '\t';

        if (isSpace && depth === 0) {

            if (start >= 0) {

                cells.push({ text: line.slice(start, i), start });
                start = -1;

            }

            continue;

        }

        if (start < 0) {

            start = i;

        }

        if (ch === '\'' || ch === '"') {

            quote = ch;

        }
        else if (ch === '(') {

            depth++;

        }
        else if (ch === ')') {

            depth = Math.max(0, depth - 1);

        }

    }

    if (start >= 0) {

        cells.push({ text: line.slice(start), start });

    }

    return cells;

}

/**
 * Split a pipe-delimited table row: `| id | int(11) | NO  | PRI |`.
 *
 * Cell borders are a pipe with whitespace around it, so a `|` inside an
 * enum value does not split the cell.
 */
function splitPipes(line: string): string[] {

    const inner = line.trim().replace(/^\|\s?/, '').replace(/\s?\|$/, '');

    return inner.split(/\s\|(?=\s|$)\s?/).map((cell) => cell.trim());

}

/**
 * Slice a whitespace-aligned line at fixed column offsets.
 */
function sliceAt(line: string, offsets: number[]): Cell[] {

    return offsets.map((start, i) => {

        const end = offsets[i + 1];

        return { text: line.slice(start, end).trim(), start };

    });

}

function unpositioned(texts: string[]): Cell[] {

    return texts.map((text) => ({ text, start: 0 }));

}

function detectMode(line: string): DelimiterMode {

    if (line.includes('\t')) {

        return 'tab';

    }

    return line.trimStart().startsWith('|') ? 'pipe' : 'space';

}

function splitLine(line: string, mode: DelimiterMode, layout: ColumnLayout | null): Cell[] {

    if (mode === 'tab') {

        return unpositioned(line.split('\t').map((cell) => cell.trim()));

    }

    if (mode === 'pipe') {

        return unpositioned(splitPipes(line));

    }

    if (layout?.mode === 'space' && layout.offsets) {

        return sliceAt(line, layout.offsets);

    }

    return tokenize(line);

}

function cellTexts(cells: Cell[]): string[] {

    return cells.map((cell) => cell.text);

}

function isHeader(cells: string[]): boolean {

    const first = cells[0];

    return first !== undefined
        && first.toLowerCase() === 'field'
        && cells.some((cell) => cell.toLowerCase() === 'type');

}

function isSeparator(line: string): boolean {

    if (!SEPARATOR_PATTERN.test(line)) {

        return false;

    }

    return (line.match(/[-=]/g)?.length ?? 0) >= 3;

}

/**
 * Header-aligned data check.
 *
 * Delimited rows only need the header's cell count and a field name, so
 * types this parser does not know still come through. Offset-sliced rows
 * always have the header's cell count and need a type token instead.
 */
function isLayoutData(cells: string[], mode: DelimiterMode, layout: ColumnLayout): boolean {

    if (mode !== layout.mode || cells.length !== layout.fields.length) {

        return false;

    }

    if (layout.mode !== 'space') {

        const fieldCell = cells[layout.fields.indexOf('Field')] ?? cells[0];

        return fieldCell !== undefined && fieldCell !== '';

    }

    const typeCell = cells[layout.typeIndex];

    return typeCell !== undefined && isTypeToken(typeCell);

}

function isPositionalData(cells: string[], mode: DelimiterMode): boolean {

    const minimum = mode === 'space' ? 3 : 4;
    const maximum = mode === 'space' ? Number.POSITIVE_INFINITY : FIELD_NAMES.length;
    const typeCell = cells[1];

    return cells.length >= minimum
        && cells.length <= maximum
        && typeCell !== undefined
        && isTypeToken(typeCell);

}

/**
 * Classify one line of input.
 *
 * @example
 * ```typescript
 * classifyLine('+-------+------+', null).category  // 'separator'
 * classifyLine('| Field | Type |', null).category  // 'header'
 * classifyLine('6 rows in set', null).category     // 'noise'
 * ```
 */
export function classifyLine(line: string, layout: ColumnLayout | null): ClassifiedLine {

    const mode = detectMode(line);

    if (line.trim() === '') {

        return { category: 'blank', mode, cells: [], byPosition: false };

    }

    if (isSeparator(line)) {

        return { category: 'separator', mode, cells: [], byPosition: false };

    }

    const cells = cellTexts(splitLine(line, mode, layout));

    if (isHeader(cells)) {

        return { category: 'header', mode, cells, byPosition: false };

    }

    if (layout ? isLayoutData(cells, mode, layout) : isPositionalData(cells, mode)) {

        return { category: 'data', mode, cells, byPosition: layout === null };

    }

    // Single-space rows under an aligned header do not line up with its offsets
    if (layout?.mode === 'space' && mode === 'space') {

        const tokens = cellTexts(tokenize(line));

        if (isPositionalData(tokens, mode)) {

            return { category: 'data', mode, cells: tokens, byPosition: true };

        }

    }

    return { category: 'noise', mode, cells, byPosition: false };

}

// ─────────────────────────────────────────────────────────────
// Layout & Records
// ─────────────────────────────────────────────────────────────

function fieldFor(header: string): FieldName | null {

    const lower = header.toLowerCase();

    return FIELD_NAMES.find((name) => name.toLowerCase() === lower) ?? null;

}

/**
 * Build the column layout from a header line.
 */
function buildLayout(line: string, mode: DelimiterMode): ColumnLayout {

    const split = splitLine(line, mode, null);
    const cells = cellTexts(split);
    const fields = cells.map(fieldFor);
    const offsets = mode === 'space' ? split.map((cell) => cell.start) : null;

    return {
        mode,
        fields,
        typeIndex: fields.indexOf('Type'),
        offsets,
    };

}

function nullable(value: string): string | null {

    return value === 'NULL' ? null : value;

}

/**
 * Map header-aligned cells onto a record.
 */
function fromLayout(cells: string[], layout: ColumnLayout): ColumnRecord {

    const values: Record<FieldName, string> = {
        Field: '',
        Type: '',
        Null: '',
        Key: '',
        Default: 'NULL',
        Extra: '',
    };

    layout.fields.forEach((field, i) => {

        const cell = cells[i];

        if (field && cell !== undefined) {

            values[field] = cell;

        }

    });

    return { ...values, Default: nullable(values.Default) };

}

const KEY_ROLES = new Set(['PRI', 'UNI', 'MUL']);

/**
 * Map headerless cells onto a record by position.
 *
 * Whitespace-split lines cannot carry empty cells, so after Field, Type
 * and Null the Key is only taken when it is a known key role, the next
 * token is the Default and anything left is Extra.
 */
function fromPosition(cells: string[], mode: DelimiterMode): ColumnRecord {

    const [field = '', type = '', isNull = '', ...rest] = cells;

    if (mode !== 'space') {

        const [key = '', defaultValue = 'NULL', extra = ''] = rest;

        return { Field: field, Type: type, Null: isNull, Key: key, Default: nullable(defaultValue), Extra: extra };

    }

    const key = rest[0] !== undefined && KEY_ROLES.has(rest[0]) ? rest.shift() ?? '' : '';
    const defaultValue = rest.shift() ?? 'NULL';

    return {
        Field: field,
        Type: type,
        Null: isNull,
        Key: key,
        Default: nullable(defaultValue),
        Extra: rest.join(' '),
    };

}

// ─────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────

/**
 * Parse column-description text into records, in source order.
 *
 * @param text - Raw client output
 * @param source - Where the text came from, for messages (table name or 'stdin')
 * @throws ParseError if no column rows are found
 */
export function parseColumns(text: string, source = 'input'): ColumnRecord[] {

    const lines = text.split(/\r?\n/);
    const records: ColumnRecord[] = [];
    let state: ParserState = 'start';
    let layout: ColumnLayout | null = null;
    let ignoredLines = 0;

    for (const [index, line] of lines.entries()) {

        const classified = classifyLine(line, layout);
        const next: ParserState = TRANSITIONS[state][classified.category];

        if (classified.category === 'header' && next === 'header') {

            layout = buildLayout(line, classified.mode);

        }
        else if (classified.category === 'data' && next === 'data') {

            records.push(layout && !classified.byPosition
                ? fromLayout(classified.cells, layout)
                : fromPosition(classified.cells, classified.mode));

        }
        else if (classified.category !== 'blank' && classified.category !== 'separator') {

            if (state === 'data' && next === 'data') {

                observer.emit('parse:warning', { source, line: index + 1, text: line.trim() });

            }

            ignoredLines++;

        }

        state = next;

    }

    if (records.length === 0) {

        throw new ParseError(source, lines.length);

    }

    observer.emit('parse:complete', { source, records: records.length, ignoredLines });

    return records;

}
