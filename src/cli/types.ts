/**
 * CLI type definitions for dbstruct.
 */
import type { FieldName, LogLevel, OutputFormat } from '../core/index.js'


/**
 * Parsed command-line flags, before validation.
 */
export interface CliFlags {

    columns?: string
    format?: string
    stats: boolean
    output?: string
    noColor: boolean
    noCache: boolean
    width?: number
    strictColumns: boolean
    verbose: boolean
    version: boolean
    help: boolean
}


/**
 * Where column descriptions come from.
 *
 * - client: the database client is run once per table
 * - stdin: client output was piped in
 */
export type RunMode = 'client' | 'stdin'


/**
 * Validated configuration of one run.
 *
 * Built from flags, settings and the environment by resolveRunConfig.
 */
export interface RunConfig {

    mode: RunMode

    /** Null in stdin mode */
    database: string | null

    /** Tables to describe, in argument order (empty in stdin mode) */
    tables: string[]

    /** Column filter in requested order, null for all columns */
    columns: FieldName[] | null

    format: OutputFormat
    stats: boolean

    /** Output file, null for stdout */
    output: string | null

    /** Colors wanted; still off when stdout is not a terminal */
    color: boolean

    /** Read the cache before running the client */
    readCache: boolean

    /** Forced wrap width, null to use the terminal width */
    width: number | null

    logLevel: LogLevel

    client: {
        command: string
        args: string[]
    }

    cacheDir: string
}
