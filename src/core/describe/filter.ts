/**
 * Column filter.
 *
 * Resolves `--columns Field,Null` into the ordered list of fields every
 * renderer shows. Matching is case-sensitive; names that only differ by
 * case get a suggestion in the warning or error.
 */
import { observer } from '../observer.js';
import { ConfigurationError } from '../errors.js';
import { FIELD_NAMES, isFieldName, type FieldName } from './types.js';

/**
 * Options for parseColumnFilter.
 */
export interface ColumnFilterOptions {

    /** Unknown names are errors instead of warnings */
    strict?: boolean;

}

/**
 * Known field that matches a name ignoring case, if any.
 *
 * @example
 * ```typescript
 * suggestField('null')   // 'Null'
 * suggestField('size')   // null
 * ```
 */
export function suggestField(name: string): FieldName | null {

    const lower = name.toLowerCase();

    return FIELD_NAMES.find((field) => field.toLowerCase() === lower) ?? null;

}

/**
 * Parse a comma-separated column list.
 *
 * Order is kept and duplicates collapse to their first occurrence.
 *
 * @throws ConfigurationError on an empty list, an empty entry, no known
 * names, or (strict) any unknown name
 *
 * @example
 * ```typescript
 * parseColumnFilter('Field,Null')             // ['Field', 'Null']
 * parseColumnFilter('Null,Field,Null')        // ['Null', 'Field']
 * parseColumnFilter('Field,size')             // ['Field'], emits filter:warning
 * ```
 */
export function parseColumnFilter(input: string, options: ColumnFilterOptions = {}): FieldName[] {

    if (input.trim() === '') {

        throw new ConfigurationError('Column filter is empty', 'columns');

    }

    const names = input.split(',').map((name) => name.trim());

    if (names.some((name) => name === '')) {

        throw new ConfigurationError(`Column filter '${input}' has an empty entry`, 'columns');

    }

    const selected: FieldName[] = [];

    for (const name of names) {

        if (isFieldName(name)) {

            if (!selected.includes(name)) {

                selected.push(name);

            }

            continue;

        }

        const suggestion = suggestField(name);

        if (options.strict) {

            const hint = suggestion ? ` (did you mean '${suggestion}'?)` : '';

            throw new ConfigurationError(
                `Unknown column '${name}'${hint}. Known columns: ${FIELD_NAMES.join(', ')}`,
                'columns',
            );

        }

        observer.emit('filter:warning', { name, suggestion });

    }

    if (selected.length === 0) {

        throw new ConfigurationError(
            `Column filter '${input}' names no known columns. Known columns: ${FIELD_NAMES.join(', ')}`,
            'columns',
        );

    }

    return selected;

}

/**
 * Fields to show: the filter, or all six in source order.
 */
export function visibleFields(filter: readonly FieldName[] | null): FieldName[] {

    return filter ? [...filter] : [...FIELD_NAMES];

}
