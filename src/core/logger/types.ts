/**
 * Logger Types
 *
 * Type definitions for the dbstruct logging system.
 * The logger captures observer events and writes them to stderr
 * with configurable verbosity.
 */

/**
 * Log verbosity levels.
 *
 * - silent: No logging
 * - error: Errors only
 * - warn: Errors + warnings (default)
 * - info: Errors + warnings + info
 * - verbose: All events including debug
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'verbose';

/**
 * All log levels, in order of increasing verbosity.
 */
export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'verbose'] as const satisfies readonly LogLevel[];

/**
 * Numeric priority for log levels.
 * Higher numbers = more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    verbose: 4,
};

/**
 * Entry level of a single log line.
 * Maps to standard logging conventions.
 */
export type EntryLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * A single log entry, as handed to the line formatter.
 */
export interface LogEntry {
    /** ISO 8601 timestamp */
    timestamp: string;

    /** Entry severity level */
    level: EntryLevel;

    /** Observer event name, or null for direct messages */
    event: string | null;

    /** Human-readable summary */
    message: string;

    /** Event payload (included at verbose level) */
    data?: Record<string, unknown>;
}

/**
 * Logger configuration.
 */
export interface LoggerConfig {
    /** Minimum level to write */
    level: LogLevel;
}

/**
 * Default logger configuration.
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
    level: 'warn',
};

/**
 * Logger state for lifecycle management.
 */
export type LoggerState = 'idle' | 'running' | 'stopped';
