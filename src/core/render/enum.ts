/**
 * Enum and set type wrapping.
 *
 * Long `enum(...)` and `set(...)` types are wrapped inside the Type column:
 *
 * ```
 * enum('a', 'b', 'c',
 *   'd', 'e', 'f',
 *   'g')
 * ```
 *
 * Values are never split; the column is kept at least as wide as the
 * widest wrapped line can need.
 */

const CONTINUATION_INDENT = '  ';

/**
 * A parsed enum or set type.
 */
export interface EnumType {

    kind: string;

    /** Values as written, quotes included */
    values: string[];

}

/**
 * Split the list inside `enum(...)` on commas outside quotes.
 *
 * A doubled quote (`'it''s'`) stays inside its value.
 */
function splitValues(list: string): string[] {

    const values: string[] = [];
    let current = '';
    let quoted = false;

    for (let i = 0; i < list.length; i++) {

        const ch = list.charAt(i);

        if (ch === '\'') {

            if (quoted && list.charAt(i + 1) === '\'') {

                current += '\'\'';
                i++;
                continue;

            }

            quoted = !quoted;

        }

        if (ch === ',' && !quoted) {

            values.push(current.trim());
            current = '';
            continue;

        }

        current += ch;

    }

    values.push(current.trim());

    return values.filter((value) => value !== '');

}

/**
 * Parse an `enum(...)` or `set(...)` type.
 *
 * @example
 * ```typescript
 * parseEnumType("enum('draft','paid')")
 * // { kind: 'enum', values: ["'draft'", "'paid'"] }
 *
 * parseEnumType('varchar(20)')   // null
 * ```
 */
export function parseEnumType(type: string): EnumType | null {

    const match = /^(enum|set)\((.*)\)$/is.exec(type.trim());

    if (!match?.[1] || match[2] === undefined) {

        return null;

    }

    const values = splitValues(match[2]);

    return values.length > 0 ? { kind: match[1], values } : null;

}

function tokensOf(values: string[]): string[] {

    return values.map((value, i) => value + (i === values.length - 1 ? ')' : ','));

}

/**
 * Narrowest column that can show a type without splitting a value.
 *
 * For enum and set types this is the wider of the first line
 * (`enum('first',`) and the longest indented value; other types need their
 * full length.
 */
export function minTypeWidth(type: string): number {

    const parsed = parseEnumType(type);

    if (!parsed) {

        return type.length;

    }

    const tokens = tokensOf(parsed.values);
    const [first = ''] = tokens;
    const firstLine = `${parsed.kind}(`.length + first.length;
    const longest = Math.max(...tokens.slice(1).map((token) => CONTINUATION_INDENT.length + token.length), 0);

    return Math.max(firstLine, longest);

}

/**
 * Wrap an enum or set type to a width.
 *
 * Types that fit, and types that are not enums or sets, come back as a
 * single line unchanged.
 *
 * @example
 * ```typescript
 * wrapEnumType("enum('a','b','c','d')", 12)
 * // ["enum('a',", "  'b', 'c',", "  'd')"]
 * ```
 */
export function wrapEnumType(type: string, width: number): string[] {

    const parsed = parseEnumType(type);

    if (!parsed || type.length <= width) {

        return [type];

    }

    const [first = '', ...rest] = tokensOf(parsed.values);
    const lines: string[] = [];
    let current = `${parsed.kind}(${first}`;

    for (const token of rest) {

        if (current.length + 1 + token.length <= width) {

            current += ` ${token}`;

        }
        else {

            lines.push(current);
            current = CONTINUATION_INDENT + token;

        }

    }

    lines.push(current);

    return lines;

}
