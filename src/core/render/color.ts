/**
 * Semantic cell colors for the table renderer.
 *
 * Each function takes the raw cell text and returns it colored; callers pad
 * using the raw text length, never the colored one.
 */
import { theme } from '../theme.js';
import type { ColumnRecord, FieldName } from '../describe/types.js';

/**
 * Color for a column type, by family.
 */
export function colorType(text: string): string {

    const lower = text.trimStart().toLowerCase();

    if (/^(enum|set)\(/.test(lower) || lower.startsWith('\'')) {

        return theme.info(text);

    }

    if (/^(tiny|small|medium|big)?int/.test(lower)) {

        return theme.primary(text);

    }

    if (/char|text/.test(lower)) {

        return theme.success(text);

    }

    if (/date|time|year/.test(lower)) {

        return theme.warning(text);

    }

    return text;

}

function colorKey(text: string): string {

    switch (text) {

    case 'PRI':
        return theme.bold(theme.error(text));

    case 'UNI':
        return theme.bold(theme.primary(text));

    case 'MUL':
        return theme.bold(theme.success(text));

    default:
        return text;

    }

}

function colorNull(text: string): string {

    if (text === 'NO') {

        return theme.bold(theme.error(text));

    }

    return text === 'YES' ? theme.success(text) : text;

}

function colorExtra(text: string): string {

    return text.toLowerCase().includes('auto_increment') ? theme.bold(theme.warning(text)) : text;

}

/**
 * Color one cell of a record.
 *
 * `text` is what is displayed, which for a wrapped Type is one line of it.
 *
 * @example
 * ```typescript
 * colorCell('Key', 'PRI', record)   // bold red 'PRI'
 * colorCell('Field', 'id', record)  // bold 'id' when record.Key is 'PRI'
 * ```
 */
export function colorCell(field: FieldName, text: string, record: ColumnRecord): string {

    switch (field) {

    case 'Field':
        return record.Key === 'PRI' ? theme.bold(text) : text;

    case 'Type':
        return colorType(text);

    case 'Null':
        return colorNull(text);

    case 'Key':
        return colorKey(text);

    case 'Extra':
        return colorExtra(text);

    default:
        return text;

    }

}

/**
 * Header cells are bold.
 */
export function colorHeader(text: string): string {

    return theme.bold(text);

}
