/**
 * Environment Detection
 *
 * Utilities for detecting how dbstruct was launched: whether stdout is a
 * terminal, how wide it is, and whether colors were switched off.
 */
import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Minimal view of a stream that may be attached to a terminal.
 */
export interface TerminalLike {
    isTTY?: boolean;
    columns?: number;
}

/**
 * Check whether a stream is attached to a terminal.
 *
 * @example
 * ```typescript
 * if (isTerminal(process.stdout)) {
 *     // colors and width-aware wrapping
 * }
 * ```
 */
export function isTerminal(stream: TerminalLike): boolean {

    return stream.isTTY === true;

}

/**
 * Get the terminal width of a stream.
 *
 * Returns null when the stream is not a terminal, so callers never wrap
 * piped output.
 */
export function terminalWidth(stream: TerminalLike): number | null {

    if (!isTerminal(stream)) {

        return null;

    }

    return stream.columns && stream.columns > 0 ? stream.columns : 80;

}

/**
 * Check whether the NO_COLOR convention asks for plain output.
 *
 * @see https://no-color.org
 */
export function isColorDisabled(env: NodeJS.ProcessEnv = process.env): boolean {

    const value = env['NO_COLOR'];

    return value !== undefined && value !== '';

}

/**
 * Per-user cache base directory (XDG aware).
 */
export function userCacheHome(env: NodeJS.ProcessEnv = process.env): string {

    return env['XDG_CACHE_HOME'] || join(homedir(), '.cache');

}

/**
 * Per-user config base directory (XDG aware).
 */
export function userConfigHome(env: NodeJS.ProcessEnv = process.env): string {

    return env['XDG_CONFIG_HOME'] || join(homedir(), '.config');

}
