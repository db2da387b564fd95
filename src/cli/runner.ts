/**
 * Describe runner.
 *
 * Executes one run: acquire column text per table (cache, client or
 * stdin), parse, render and write. Tables are processed one after another;
 * a failing table is reported and the rest still run.
 *
 * @example
 * ```typescript
 * const exitCode = await runDescribe(config, {
 *     client: new MysqlClient(),
 *     cache: new ResultCache({ dir: config.cacheDir }),
 *     logger,
 *     stdin: process.stdin,
 *     stdout: process.stdout,
 *     stderr: process.stderr,
 *     readStdin: () => text(process.stdin),
 * })
 * ```
 */
import { writeFile } from 'node:fs/promises'
import { attempt } from '@logosdx/utils'

import {
    ConfigurationError,
    OutputError,
    cacheKey,
    createRenderOptions,
    isTerminal,
    observer,
    parseColumns,
    render,
    status,
    terminalWidth,
    visibleFields,
    type Logger,
    type RenderOptions,
    type ResultCache,
    type SchemaClient,
    type TableResult,
    type TerminalLike,
} from '../core/index.js'

import type { RunConfig } from './types.js'


/**
 * Process exit codes.
 */
export const EXIT = {
    ok: 0,
    tableFailed: 1,
    configuration: 2,
    output: 3,
} as const


/**
 * A stream the runner writes text to.
 */
export interface TextOutput extends TerminalLike {

    write(chunk: string): unknown
}


/**
 * Everything runDescribe talks to.
 */
export interface RunnerDeps {

    client: SchemaClient
    cache: Pick<ResultCache, 'read' | 'write'>
    logger: Logger
    stdin: TerminalLike
    stdout: TextOutput
    stderr: TextOutput

    /** Read all of standard input */
    readStdin: () => Promise<string>

    /** Write the output file (default: fs writeFile) */
    writeFile?: (path: string, data: string) => Promise<void>
}


interface Collected {

    results: TableResult[]
    failures: number
}


/**
 * Options for rendering, from the run config and where output goes.
 */
export function renderOptionsFor(config: RunConfig, stdout: TerminalLike): RenderOptions {

    const toTerminal = config.output === null && isTerminal(stdout)

    return createRenderOptions({
        format: config.format,
        colorize: config.color && toTerminal && config.format === 'table',
        width: config.width ?? (toTerminal ? terminalWidth(stdout) : null),
        columns: visibleFields(config.columns),
        includeStats: config.stats && config.mode === 'client',
    })
}


/**
 * Describe one table through the cache and the client.
 */
export async function describeTable(
    database: string,
    table: string,
    config: RunConfig,
    deps: Pick<RunnerDeps, 'client' | 'cache'>,
): Promise<TableResult> {

    const started = Date.now()
    const key = cacheKey({ database, table, columns: config.columns, stats: config.stats })

    observer.emit('describe:start', { database, table, source: 'client' })

    if (config.readCache) {

        const cached = await deps.cache.read(key, table)

        if (cached) {

            observer.emit('describe:complete', {
                database,
                table,
                columnCount: cached.columns.length,
                cached: true,
                durationMs: Date.now() - started,
            })

            return cached
        }
    }
    else {

        observer.emit('cache:miss', { key, table, reason: 'bypassed' })
    }

    const text = await deps.client.describeColumns(database, table)
    const result: TableResult = { database, table, columns: parseColumns(text, table) }

    if (config.stats) {

        result.stats = await deps.client.tableStats(database, table)
    }

    await deps.cache.write(key, result)

    observer.emit('describe:complete', {
        database,
        table,
        columnCount: result.columns.length,
        cached: false,
        durationMs: Date.now() - started,
    })

    return result
}


/**
 * Parse piped client output.
 */
async function describeStdin(deps: RunnerDeps): Promise<TableResult> {

    const started = Date.now()

    observer.emit('describe:start', { database: null, table: 'stdin', source: 'stdin' })

    const columns = parseColumns(await deps.readStdin(), 'stdin')

    observer.emit('describe:complete', {
        database: null,
        table: 'stdin',
        columnCount: columns.length,
        cached: false,
        durationMs: Date.now() - started,
    })

    return { database: null, table: 'stdin', columns }
}


async function collect(config: RunConfig, deps: RunnerDeps, color: boolean): Promise<Collected> {

    const results: TableResult[] = []
    let failures = 0

    const fail = (table: string, error: Error) => {

        failures++
        observer.emit('table:failed', { table, error })
        deps.stderr.write(status.error(`${table}: ${error.message}`, color) + '\n')
    }

    if (config.mode === 'stdin') {

        if (isTerminal(deps.stdin)) {

            throw new ConfigurationError(
                'No database or table given and nothing piped on standard input. Run with --help for usage.',
                'table',
            )
        }

        if (config.stats) {

            deps.logger.warn('Statistics need a database connection; --stats is ignored for piped input')
        }

        const [result, err] = await attempt(() => describeStdin(deps))

        if (result) {

            results.push(result)
        }
        else if (err) {

            fail('stdin', err)
        }

        return { results, failures }
    }

    const database = config.database ?? ''

    for (const table of config.tables) {

        const [result, err] = await attempt(() => describeTable(database, table, config, deps))

        if (result) {

            results.push(result)
        }
        else if (err) {

            fail(table, err)
        }
    }

    return { results, failures }
}


/**
 * Write rendered text to stdout, or to the output file with a summary.
 *
 * @throws OutputError when the file cannot be written
 */
async function emit(text: string, config: RunConfig, tableCount: number, deps: RunnerDeps): Promise<void> {

    if (config.output === null) {

        deps.stdout.write(text)

        return
    }

    const path = config.output
    const write = deps.writeFile ?? ((target: string, data: string) => writeFile(target, data, 'utf8'))
    const [, err] = await attempt(() => write(path, text))

    if (err) {

        throw new OutputError(path, err.message)
    }

    observer.emit('output:written', { path, bytes: Buffer.byteLength(text, 'utf8'), format: config.format })

    const tables = tableCount === 1 ? '1 table' : `${tableCount} tables`
    const color = config.color && isTerminal(deps.stdout)

    deps.stdout.write(status.success(`Wrote ${config.format} for ${tables} to ${path}`, color) + '\n')
}


/**
 * Report a run-level error and pick its exit code.
 *
 * @throws the error itself when it is not a configuration or output error
 */
export function reportFatal(error: Error, stderr: TextOutput, color: boolean): number {

    if (error instanceof ConfigurationError) {

        stderr.write(status.error(error.message, color) + '\n')

        return EXIT.configuration
    }

    if (error instanceof OutputError) {

        stderr.write(status.error(error.message, color) + '\n')

        return EXIT.output
    }

    throw error
}


/**
 * Run a describe.
 *
 * @returns the process exit code
 */
export async function runDescribe(config: RunConfig, deps: RunnerDeps): Promise<number> {

    const stderrColor = config.color && isTerminal(deps.stderr)
    const [collected, collectErr] = await attempt(() => collect(config, deps, stderrColor))

    if (!collected) {

        return reportFatal(collectErr ?? new Error('Run failed'), deps.stderr, stderrColor)
    }

    const { results, failures } = collected

    if (results.length > 0) {

        const text = render(results, renderOptionsFor(config, deps.stdout))
        const [, emitErr] = await attempt(() => emit(text, config, results.length, deps))

        if (emitErr) {

            return reportFatal(emitErr, deps.stderr, stderrColor)
        }
    }

    return failures > 0 ? EXIT.tableFailed : EXIT.ok
}
