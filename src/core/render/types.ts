/**
 * Render option types.
 */
import type { FieldName } from '../describe/types.js';
import { FIELD_NAMES } from '../describe/types.js';
import type { OutputFormat } from '../settings/types.js';

/**
 * Everything a renderer needs to know, passed explicitly on every call.
 */
export interface RenderOptions {

    readonly format: OutputFormat;

    /** Emit terminal colors (table format only) */
    readonly colorize: boolean;

    /** Wrap width in characters, null for no limit */
    readonly width: number | null;

    /** Fields to show, in display order */
    readonly columns: readonly FieldName[];

    /** Show table statistics when results carry them */
    readonly includeStats: boolean;

}

/**
 * Build frozen render options, filling unset values.
 *
 * @example
 * ```typescript
 * const options = createRenderOptions({ format: 'json', columns: ['Field', 'Type'] })
 * // { format: 'json', colorize: false, width: null, columns: ['Field', 'Type'], includeStats: false }
 * ```
 */
export function createRenderOptions(options: Partial<RenderOptions> = {}): RenderOptions {

    return Object.freeze({
        format: options.format ?? 'table',
        colorize: options.colorize ?? false,
        width: options.width ?? null,
        columns: Object.freeze([...(options.columns ?? FIELD_NAMES)]),
        includeStats: options.includeStats ?? false,
    });

}
