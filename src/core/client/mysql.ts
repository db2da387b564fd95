/**
 * MySQL command-line client adapter.
 *
 * Every query runs as `<command> [...args] --batch -e "<sql>" <database>`,
 * so connection details come from the client's own option files or the
 * configured arguments.
 *
 * @example
 * ```typescript
 * const client = new MysqlClient({ args: ['-h', 'db.local'] })
 * const text = await client.describeColumns('shop', 'orders')
 * ```
 */
import { attempt } from '@logosdx/utils';

import { observer } from '../observer.js';
import { ExternalToolError } from '../errors.js';
import type { TableStats } from '../describe/types.js';
import { spawnCommand } from './runner.js';
import {
    parseIndexes,
    parseScalar,
    rowCountQuery,
    showColumnsQuery,
    showIndexQuery,
    sizeQuery,
} from './stats.js';
import type { ClientOptions, CommandRunner, SchemaClient } from './types.js';

export const DEFAULT_CLIENT_COMMAND = 'mysql';

/**
 * Schema client backed by the `mysql` executable.
 */
export class MysqlClient implements SchemaClient {

    #command: string;
    #args: string[];
    #runner: CommandRunner;

    constructor(options: ClientOptions = {}) {

        this.#command = options.command ?? DEFAULT_CLIENT_COMMAND;
        this.#args = options.args ?? [];
        this.#runner = options.runner ?? spawnCommand;

    }

    get command(): string {

        return this.#command;

    }

    /**
     * Argument vector for one query.
     */
    buildArgs(database: string, sql: string): string[] {

        return [...this.#args, '--batch', '-e', sql, database];

    }

    /**
     * Run one query and return its stdout.
     *
     * @throws ExternalToolError when the client is missing or exits non-zero
     */
    async query(database: string, sql: string): Promise<string> {

        const command = this.#command;
        const args = this.buildArgs(database, sql);
        const started = Date.now();

        observer.emit('client:spawn', { command, args });

        const [output, err] = await attempt(() => this.#runner(command, args));

        if (!output) {

            const error = err instanceof ExternalToolError
                ? err
                : new ExternalToolError(command, 'spawn-failed', null, err?.message ?? '');

            observer.emit('client:error', { command, error: error.message });

            throw error;

        }

        observer.emit('client:exit', { command, exitCode: output.exitCode, durationMs: Date.now() - started });

        if (output.exitCode !== 0) {

            const error = new ExternalToolError(command, 'exit-code', output.exitCode, output.stderr);

            observer.emit('client:error', { command, error: error.message });

            throw error;

        }

        return output.stdout;

    }

    async describeColumns(database: string, table: string): Promise<string> {

        return this.query(database, showColumnsQuery(table));

    }

    /**
     * Fetch statistics with three independent queries.
     *
     * A failed query leaves its statistic null and emits `stats:warning`.
     */
    async tableStats(database: string, table: string): Promise<TableStats> {

        const warn = (statistic: string, error: Error) => {

            observer.emit('stats:warning', { table, statistic, error: error.message });

        };

        const [rowCount, countErr] = await attempt(async () =>
            parseScalar(await this.query(database, rowCountQuery(table))),
        );

        if (countErr) {

            warn('row count', countErr);

        }

        const [sizeMb, sizeErr] = await attempt(async () =>
            parseScalar(await this.query(database, sizeQuery(database, table))),
        );

        if (sizeErr) {

            warn('size', sizeErr);

        }

        const [indexes, indexErr] = await attempt(async () =>
            parseIndexes(await this.query(database, showIndexQuery(table))),
        );

        if (indexErr) {

            warn('indexes', indexErr);

        }

        return {
            rowCount: rowCount ?? null,
            sizeMb: sizeMb ?? null,
            indexCount: indexes ? indexes.length : null,
            indexes: indexes ?? [],
        };

    }

}
