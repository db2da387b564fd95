/**
 * Log Formatter
 *
 * Converts observer events into log entries and renders them as single
 * lines for stderr.
 */
import dayjs from 'dayjs'
import relativeTime from 'dayjs/plugin/relativeTime.js'

import type { EntryLevel, LogEntry } from './types.js'
import { classifyEvent } from './classifier.js'

dayjs.extend(relativeTime)


/**
 * Human-readable message templates for common events.
 * Keys are event names, values are functions that generate messages from event data.
 */
const MESSAGE_TEMPLATES: Record<string, (data: Record<string, unknown>) => string> = {

    // Pipeline
    'describe:start': (d) => d['source'] === 'stdin'
        ? 'Reading column structure from stdin'
        : `Describing ${d['database']}.${d['table']}`,
    'describe:complete': (d) => `Described ${d['table']}: ${d['columnCount']} columns${d['cached'] ? ' (cached)' : ''} (${d['durationMs']}ms)`,
    'table:failed': (d) => `Failed ${d['table']}: ${errorMessage(d['error'])}`,

    // External client
    'client:spawn': (d) => `Running ${d['command']} ${Array.isArray(d['args']) ? d['args'].join(' ') : ''}`.trimEnd(),
    'client:exit': (d) => `${d['command']} exited with code ${d['exitCode']} (${d['durationMs']}ms)`,
    'client:error': (d) => `Client ${d['command']} failed: ${d['error']}`,

    // Cache
    'cache:hit': (d) => `Cache hit for ${d['table']} (written ${ago(d['ageMs'])})`,
    'cache:miss': (d) => `Cache miss for ${d['table']} (${d['reason']})`,
    'cache:stored': (d) => `Cached ${d['table']} at ${d['path']}`,
    'cache:skipped': (d) => `Ignoring unreadable cache entry ${d['path']}: ${d['error']}`,
    'cache:warning': (d) => `Could not write cache entry ${d['path']}: ${d['error']}`,

    // Parsing
    'parse:complete': (d) => `Parsed ${d['records']} columns from ${d['source']} (${d['ignoredLines']} lines ignored)`,
    'parse:warning': (d) => `Skipped unrecognized line ${d['line']} in ${d['source']}: ${d['text']}`,

    // Filter
    'filter:warning': (d) => d['suggestion']
        ? `Unknown column '${d['name']}' dropped from filter (did you mean '${d['suggestion']}'?)`
        : `Unknown column '${d['name']}' dropped from filter`,

    // Statistics
    'stats:warning': (d) => `Could not fetch ${d['statistic']} for ${d['table']}: ${d['error']}`,

    // Settings
    'settings:loaded': (d) => d['fromFile']
        ? `Settings loaded from ${d['path']}`
        : `No settings at ${d['path']}, using defaults`,

    // Output
    'output:written': (d) => `Wrote ${d['bytes']} bytes of ${d['format']} to ${d['path']}`,

    // Generic error
    'error': (d) => `Error in ${d['source']}: ${errorMessage(d['error'])}`,
}


function errorMessage(value: unknown): string {

    return value instanceof Error ? value.message : String(value)
}


function ago(ms: unknown): string {

    return typeof ms === 'number' ? dayjs().subtract(ms, 'millisecond').fromNow() : 'earlier'
}


/**
 * Generate a human-readable message for an event.
 *
 * Uses templates for known events, falls back to generic format.
 */
export function generateMessage(event: string, data: Record<string, unknown>): string {

    const template = MESSAGE_TEMPLATES[event]

    if (template) {

        return template(data)
    }

    // Generic format: "event name" or "event name: key=value, ..."
    const parts = Object.entries(data)
        .slice(0, 3)
        .map(([k, v]) => `${k}=${summarizeValue(v)}`)

    if (parts.length === 0) {

        return event.replace(/:/g, ' ')
    }

    return `${event.replace(/:/g, ' ')}: ${parts.join(', ')}`
}


/**
 * Summarize a value for log message display.
 * Truncates long strings and formats objects.
 */
function summarizeValue(value: unknown): string {

    if (value === null || value === undefined) {

        return String(value)
    }

    if (typeof value === 'string') {

        return value.length > 50 ? `"${value.slice(0, 47)}..."` : `"${value}"`
    }

    if (typeof value === 'number' || typeof value === 'boolean') {

        return String(value)
    }

    if (Array.isArray(value)) {

        return `[${value.length} items]`
    }

    if (typeof value === 'object') {

        return `{${Object.keys(value).length} keys}`
    }

    return String(value)
}


/**
 * Build a log entry for an observer event.
 *
 * @example
 * ```typescript
 * const entry = formatEntry('cache:miss', { key: 'ab12', table: 'users', reason: 'expired' })
 * // { level: 'info', event: 'cache:miss', message: 'Cache miss for users (expired)', ... }
 * ```
 */
export function formatEntry(
    event: string,
    data: Record<string, unknown>,
    includeData = false,
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level: classifyEvent(event),
        event,
        message: generateMessage(event, data),
    }

    if (includeData && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    return entry
}


/**
 * Build a log entry for a direct logger call.
 */
export function formatMessageEntry(
    level: EntryLevel,
    message: string,
    data?: Record<string, unknown>,
): LogEntry {

    const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        event: null,
        message,
    }

    if (data && Object.keys(data).length > 0) {

        entry.data = sanitizeData(data)
    }

    return entry
}


/**
 * Make event data safe to serialize.
 *
 * Errors become name/message pairs and dates become ISO strings.
 */
function sanitizeData(data: Record<string, unknown>): Record<string, unknown> {

    const result: Record<string, unknown> = {}

    for (const [key, value] of Object.entries(data)) {

        if (value instanceof Error) {

            result[key] = { name: value.name, message: value.message }
            continue
        }

        if (value instanceof Date) {

            result[key] = value.toISOString()
            continue
        }

        result[key] = value
    }

    return result
}


/**
 * Render a log entry as one line (with trailing newline).
 *
 * Format: `[timestamp] [LEVEL] [event] message {data}`
 */
export function serializeEntry(entry: LogEntry): string {

    const levelLabel = entry.level.toUpperCase().padEnd(5)
    const eventLabel = entry.event ? ` [${entry.event}]` : ''

    let line = `[${entry.timestamp}] [${levelLabel}]${eventLabel} ${entry.message}`

    if (entry.data) {

        line += ` ${JSON.stringify(entry.data)}`
    }

    return line + '\n'
}
