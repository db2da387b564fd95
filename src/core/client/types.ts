/**
 * External client types.
 */
import type { TableStats } from '../describe/types.js';

/**
 * Captured result of one client invocation.
 */
export interface CommandOutput {

    stdout: string;
    stderr: string;
    exitCode: number;

}

/**
 * Runs an executable and captures its output.
 *
 * Resolves for any exit code; rejects with ExternalToolError when the
 * executable cannot be started.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandOutput>;

/**
 * Source of column descriptions and table statistics.
 */
export interface SchemaClient {

    /** Raw `SHOW COLUMNS` output for one table */
    describeColumns(database: string, table: string): Promise<string>;

    /** Row count, size and indexes; unavailable statistics are null */
    tableStats(database: string, table: string): Promise<TableStats>;

}

/**
 * Options for MysqlClient construction.
 */
export interface ClientOptions {

    /** Executable name or path (default: mysql) */
    command?: string;

    /** Arguments placed before the query, e.g. ['-h', 'db.local', '-u', 'reader'] */
    args?: string[];

    /** Process runner (default: spawnCommand) */
    runner?: CommandRunner;

}
