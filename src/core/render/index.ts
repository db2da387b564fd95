/**
 * Output rendering.
 *
 * @example
 * ```typescript
 * const options = createRenderOptions({ format: 'table', colorize: true, width: 100 })
 * process.stdout.write(render(results, options))
 * ```
 */
import type { TableResult } from '../describe/types.js';
import { renderCsv } from './csv.js';
import { renderJson } from './json.js';
import { renderTables } from './table.js';
import type { RenderOptions } from './types.js';

export * from './types.js';
export * from './enum.js';
export * from './color.js';
export * from './table.js';
export * from './json.js';
export * from './csv.js';

/**
 * Render results in the format the options name.
 */
export function render(results: readonly TableResult[], options: RenderOptions): string {

    switch (options.format) {

    case 'json':
        return renderJson(results, options);

    case 'csv':
        return renderCsv(results, options);

    default:
        return renderTables(results, options);

    }

}
