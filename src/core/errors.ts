/**
 * Error taxonomy for dbstruct.
 *
 * Each class maps to one way a run can go wrong, which decides whether the
 * run aborts, skips a table, or quietly carries on:
 *
 * - ConfigurationError: bad flags, arguments or settings. Aborts the run.
 * - ExternalToolError: client missing or failed. Skips the table.
 * - ParseError: no column rows recognized. Skips the table.
 * - CacheError: unreadable or unwritable entry. Treated as a cache miss.
 * - OutputError: destination file cannot be written. Aborts the run.
 */


/**
 * Invalid command-line flags, arguments or settings.
 *
 * @example
 * ```typescript
 * throw new ConfigurationError('Unknown format: xml', 'format')
 * ```
 */
export class ConfigurationError extends Error {

    override readonly name = 'ConfigurationError' as const

    constructor(
        message: string,
        public readonly option?: string,
    ) {

        super(message)
    }
}


/**
 * Why an external client invocation failed.
 */
export type ExternalToolFailure = 'not-found' | 'exit-code' | 'spawn-failed'


/**
 * The external database client is missing or exited non-zero.
 *
 * @example
 * ```typescript
 * const [output, err] = await attempt(() => client.describeColumns('shop', 'users'))
 * if (err instanceof ExternalToolError && err.reason === 'not-found') {
 *     console.error(`Install ${err.command} or set DBSTRUCT_CLIENT`)
 * }
 * ```
 */
export class ExternalToolError extends Error {

    override readonly name = 'ExternalToolError' as const

    constructor(
        public readonly command: string,
        public readonly reason: ExternalToolFailure,
        public readonly exitCode: number | null = null,
        public readonly stderr = '',
    ) {

        super(describeToolFailure(command, reason, exitCode, stderr))
    }
}


function describeToolFailure(
    command: string,
    reason: ExternalToolFailure,
    exitCode: number | null,
    stderr: string,
): string {

    if (reason === 'not-found') {

        return `Database client '${command}' not found. Is it installed and on PATH?`
    }

    const detail = stderr.trim() ? `: ${stderr.trim()}` : ''

    if (reason === 'exit-code') {

        return `Database client '${command}' exited with code ${exitCode}${detail}`
    }

    return `Could not start database client '${command}'${detail}`
}


/**
 * No column-description rows could be recognized in the input.
 */
export class ParseError extends Error {

    override readonly name = 'ParseError' as const

    constructor(
        public readonly source: string,
        public readonly lineCount: number,
    ) {

        super(`Could not parse column structure from ${source} (${lineCount} lines, no column rows found)`)
    }
}


/**
 * A cache entry could not be read or written.
 *
 * Never fatal: the pipeline treats it as a cache miss.
 */
export class CacheError extends Error {

    override readonly name = 'CacheError' as const

    constructor(
        public readonly path: string,
        public readonly operation: 'read' | 'write',
        public readonly reason: string,
    ) {

        super(`Cache ${operation} failed for ${path}: ${reason}`)
    }
}


/**
 * The output destination could not be written.
 */
export class OutputError extends Error {

    override readonly name = 'OutputError' as const

    constructor(
        public readonly path: string,
        public readonly reason: string,
    ) {

        super(`Cannot write output to ${path}: ${reason}`)
    }
}
