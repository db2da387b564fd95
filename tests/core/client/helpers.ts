import type { CommandOutput, CommandRunner } from '../../../src/core/client/types.js';

export interface RecordedCall {

    command: string;
    args: string[];

}

/**
 * Stand-in for the database client: answers each query by its SQL.
 */
export function fakeRunner(
    answer: (sql: string) => CommandOutput | Error,
): { runner: CommandRunner; calls: RecordedCall[] } {

    const calls: RecordedCall[] = [];

    const runner: CommandRunner = async (command, args) => {

        calls.push({ command, args });

        const sql = args[args.indexOf('-e') + 1] ?? '';
        const result = answer(sql);

        if (result instanceof Error) {

            throw result;

        }

        return result;

    };

    return { runner, calls };

}

export function ok(stdout: string): CommandOutput {

    return { stdout, stderr: '', exitCode: 0 };

}
