/**
 * Subprocess runner.
 *
 * Spawns the database client without a shell, so table and database names
 * reach it as plain arguments.
 */
import { spawn } from 'node:child_process';

import { ExternalToolError } from '../errors.js';
import type { CommandOutput } from './types.js';

function errorCode(error: Error): string | undefined {

    return 'code' in error && typeof error.code === 'string' ? error.code : undefined;

}

/**
 * Run a command and collect stdout, stderr and the exit code.
 *
 * @throws ExternalToolError with reason 'not-found' when the executable
 * does not exist, 'spawn-failed' for other start failures
 *
 * @example
 * ```typescript
 * const { stdout, exitCode } = await spawnCommand('mysql', ['--batch', '-e', 'SELECT 1'])
 * ```
 */
export function spawnCommand(command: string, args: string[]): Promise<CommandOutput> {

    return new Promise((resolve, reject) => {

        const child = spawn(command, args, {
            stdio: ['ignore', 'pipe', 'pipe'],
            shell: false,
        });

        let stdout = '';
        let stderr = '';

        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');

        child.stdout.on('data', (chunk: string) => {

            stdout += chunk;

        });

        child.stderr.on('data', (chunk: string) => {

            stderr += chunk;

        });

        child.on('error', (err) => {

            const reason = errorCode(err) === 'ENOENT' ? 'not-found' : 'spawn-failed';

            reject(new ExternalToolError(command, reason, null, err.message));

        });

        child.on('close', (code) => {

            resolve({ stdout, stderr, exitCode: code ?? 1 });

        });

    });

}
