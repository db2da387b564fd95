/**
 * Central event system for dbstruct.
 *
 * Core modules emit events, the CLI and logger subscribe. Keeps the
 * describe pipeline free of any knowledge about where messages end up.
 *
 * @example
 * ```typescript
 * // In core module - emit events at key points
 * observer.emit('cache:hit', { key, table, ageMs })
 *
 * // In CLI - subscribe to events
 * const cleanup = observer.on('table:failed', (data) => report(data))
 *
 * // Pattern matching for multiple events
 * observer.on(/^cache:/, ({ event, data }) => logCacheEvent(event, data))
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'


/**
 * All events emitted by dbstruct core modules.
 *
 * Events are namespaced by module:
 * - `describe:*` - Per-table pipeline lifecycle
 * - `client:*` - External client invocation
 * - `cache:*` - Result cache lookups and writes
 * - `parse:*` - Column text parsing
 * - `filter:*` - Column filter resolution
 * - `stats:*` - Table statistics
 * - `settings:*` - User settings
 * - `output:*` - Output destination
 * - `error` - Catch-all errors
 */
export interface DbstructEvents {

    // Pipeline
    'describe:start': { database: string | null; table: string; source: 'client' | 'stdin' }
    'describe:complete': { database: string | null; table: string; columnCount: number; cached: boolean; durationMs: number }
    'table:failed': { table: string; error: Error }

    // External client
    'client:spawn': { command: string; args: string[] }
    'client:exit': { command: string; exitCode: number; durationMs: number }
    'client:error': { command: string; error: string }

    // Cache
    'cache:hit': { key: string; table: string; ageMs: number }
    'cache:miss': { key: string; table: string; reason: 'absent' | 'expired' | 'bypassed' }
    'cache:stored': { key: string; table: string; path: string }
    'cache:skipped': { key: string; path: string; error: string }
    'cache:warning': { key: string; path: string; error: string }

    // Parsing
    'parse:complete': { source: string; records: number; ignoredLines: number }
    'parse:warning': { source: string; line: number; text: string }

    // Filter
    'filter:warning': { name: string; suggestion: string | null }

    // Statistics
    'stats:warning': { table: string; statistic: string; error: string }

    // Settings
    'settings:loaded': { path: string; fromFile: boolean }

    // Output
    'output:written': { path: string; bytes: number; format: string }

    // Errors
    'error': { source: string; error: Error; context?: Record<string, unknown> }
}

export type DbstructEventNames = Events<DbstructEvents>;
export type DbstructEventCallback<E extends DbstructEventNames> = ObserverEngine.EventCallback<DbstructEvents[E]>

/**
 * Global observer instance for dbstruct.
 *
 * Enable debug mode with `DBSTRUCT_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<DbstructEvents>({
    name: 'dbstruct',
    spy: process.env['DBSTRUCT_DEBUG']
        ? (action) => console.error(`[dbstruct:${action.fn}] ${String(action.event)}`)
        : undefined
});

export type { ObserverEngine }
