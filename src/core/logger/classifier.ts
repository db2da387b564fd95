/**
 * Event Classifier
 *
 * Classifies observer events by log level based on naming patterns.
 *
 * Classification rules:
 * - 'error' or '*:error', '*:failed' -> error
 * - '*:warning' -> warn
 * - '*:complete', '*:hit', '*:stored', etc. -> info
 * - Everything else -> debug
 */
import type { EntryLevel, LogLevel } from './types.js';
import { LOG_LEVEL_PRIORITY } from './types.js';

/**
 * Patterns that classify an event as error level.
 */
const ERROR_PATTERNS = [/^error$/, /:error$/, /:failed$/];

/**
 * Patterns that classify an event as warn level.
 */
const WARN_PATTERNS = [/:warning$/];

/**
 * Patterns that classify an event as info level.
 * These are significant lifecycle events worth logging at default verbosity.
 */
const INFO_PATTERNS = [
    /:start$/,
    /:complete$/,
    /:loaded$/,
    /:hit$/,
    /:miss$/,
    /:stored$/,
    /:written$/,
];

/**
 * Classify an event name to determine its log level.
 *
 * @example
 * ```typescript
 * classifyEvent('error')           // 'error'
 * classifyEvent('client:error')    // 'error'
 * classifyEvent('cache:warning')   // 'warn'
 * classifyEvent('describe:start')  // 'info'
 * classifyEvent('client:spawn')    // 'debug'
 * ```
 */
export function classifyEvent(event: string): EntryLevel {

    if (ERROR_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'error';

    }

    if (WARN_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'warn';

    }

    if (INFO_PATTERNS.some((pattern) => pattern.test(event))) {

        return 'info';

    }

    return 'debug';

}

/**
 * Check if an entry level should be written at the configured verbosity.
 *
 * @example
 * ```typescript
 * shouldWrite('error', 'warn')   // true
 * shouldWrite('info', 'warn')    // false
 * shouldWrite('debug', 'verbose') // true
 * ```
 */
export function shouldWrite(level: EntryLevel, configLevel: LogLevel): boolean {

    return getEntryLevelPriority(level) <= LOG_LEVEL_PRIORITY[configLevel];

}

/**
 * Check if an event should be logged at the given verbosity level.
 *
 * @example
 * ```typescript
 * shouldLog('error', 'warn')           // true (errors always logged)
 * shouldLog('cache:hit', 'warn')       // false (info event at warn level)
 * shouldLog('client:spawn', 'verbose') // true (everything at verbose)
 * ```
 */
export function shouldLog(event: string, configLevel: LogLevel): boolean {

    return shouldWrite(classifyEvent(event), configLevel);

}

/**
 * Map entry level to priority for comparison.
 * Lower priority = more severe/important.
 */
function getEntryLevelPriority(level: EntryLevel): number {

    switch (level) {

    case 'error':
        return 1;
    case 'warn':
        return 2;
    case 'info':
        return 3;
    case 'debug':
        return 4;

    }

}
