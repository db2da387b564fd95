/**
 * Run configuration.
 *
 * Merges flags over settings and validates the result. Every check that
 * can fail happens here, before any table is touched.
 */
import {
    ConfigurationError,
    defaultCacheDir,
    OutputFormatSchema,
    parseColumnFilter,
    type LogLevel,
    type Settings,
} from '../core/index.js'

import type { CliFlags, RunConfig } from './types.js'


/**
 * Narrowest accepted --width.
 */
export const MIN_WIDTH = 20


/**
 * Log level of a run: --verbose wins over settings.
 */
export function resolveLogLevel(flags: Pick<CliFlags, 'verbose'>, settings: Settings): LogLevel {

    return flags.verbose ? 'verbose' : settings.logging.level
}


/**
 * Build the run configuration.
 *
 * @param input - Positional arguments: database then tables, or none for stdin
 * @throws ConfigurationError on invalid flags or arguments
 *
 * @example
 * ```typescript
 * const config = resolveRunConfig(['shop', 'orders'], flags, settings)
 * // { mode: 'client', database: 'shop', tables: ['orders'], ... }
 * ```
 */
export function resolveRunConfig(
    input: string[],
    flags: CliFlags,
    settings: Settings,
    env: NodeJS.ProcessEnv = process.env,
): RunConfig {

    const [database, ...tables] = input

    if (database !== undefined && tables.length === 0) {

        throw new ConfigurationError(`Please provide at least one table name after '${database}'`, 'table')
    }

    const requestedFormat = flags.format ?? settings.output.format
    const format = OutputFormatSchema.safeParse(requestedFormat)

    if (!format.success) {

        throw new ConfigurationError(
            `Unknown format '${requestedFormat}'. Expected one of: ${OutputFormatSchema.options.join(', ')}`,
            'format',
        )
    }

    const columns = flags.columns !== undefined
        ? parseColumnFilter(flags.columns, { strict: flags.strictColumns })
        : null

    if (flags.width !== undefined && (!Number.isInteger(flags.width) || flags.width < MIN_WIDTH)) {

        throw new ConfigurationError(`--width must be a whole number of at least ${MIN_WIDTH}`, 'width')
    }

    if (flags.output !== undefined && flags.output.trim() === '') {

        throw new ConfigurationError('--output needs a file path', 'output')
    }

    return {
        mode: database === undefined ? 'stdin' : 'client',
        database: database ?? null,
        tables,
        columns,
        format: format.data,
        stats: flags.stats,
        output: flags.output ?? null,
        color: settings.output.color && !flags.noColor,
        readCache: !flags.noCache,
        width: flags.width ?? null,
        logLevel: resolveLogLevel(flags, settings),
        client: {
            command: settings.client.command,
            args: [...settings.client.args],
        },
        cacheDir: settings.cache.dir ?? defaultCacheDir(env),
    }
}
