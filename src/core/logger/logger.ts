/**
 * Logger
 *
 * Stream-based logger that subscribes to every observer event and writes
 * the ones allowed by the configured level to a writable stream (stderr by
 * default).
 *
 * @example
 * ```typescript
 * const logger = new Logger({ config: { level: 'info' } })
 * logger.start()
 *
 * // Logger automatically captures observer events
 * observer.emit('cache:hit', { key, table: 'users', ageMs: 1200 })
 *
 * logger.stop()
 * ```
 */
import type { Writable } from 'node:stream';

import { observer } from '../observer.js';
import { classifyEvent, shouldWrite } from './classifier.js';
import { formatEntry, formatMessageEntry, serializeEntry } from './formatter.js';
import type { EntryLevel, LogLevel, LoggerConfig, LoggerState } from './types.js';
import { DEFAULT_LOGGER_CONFIG } from './types.js';

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {
    /** Logger configuration */
    config?: Partial<LoggerConfig>;

    /** Stream to write to (defaults to stderr) */
    stream?: Writable;
}

/**
 * Logger that captures observer events and writes them as lines.
 */
export class Logger {

    #config: LoggerConfig;
    #stream: Writable;
    #state: LoggerState = 'idle';
    #cleanup: (() => void) | null = null;

    constructor(options: LoggerOptions = {}) {

        this.#config = { ...DEFAULT_LOGGER_CONFIG, ...options.config };
        this.#stream = options.stream ?? process.stderr;

    }

    /**
     * Get the current logger state.
     */
    get state(): LoggerState {

        return this.#state;

    }

    /**
     * Get the current log level.
     */
    get level(): LogLevel {

        return this.#config.level;

    }

    /**
     * Check if logging is enabled.
     */
    get isEnabled(): boolean {

        return this.#config.level !== 'silent';

    }

    /**
     * Start capturing observer events.
     */
    start(): void {

        if (this.#state !== 'idle' || !this.isEnabled) {

            return;

        }

        this.#cleanup = observer.on(/./, ({ event, data }) => {

            this.#handleEvent(String(event), toRecord(data));

        });

        this.#state = 'running';

    }

    /**
     * Stop capturing observer events.
     */
    stop(): void {

        if (this.#state !== 'running') {

            return;

        }

        if (this.#cleanup) {

            this.#cleanup();
            this.#cleanup = null;

        }

        this.#state = 'stopped';

    }

    /**
     * Handle an observer event.
     */
    #handleEvent(event: string, data: Record<string, unknown>): void {

        if (!shouldWrite(classifyEvent(event), this.#config.level)) {

            return;

        }

        const entry = formatEntry(event, data, this.#config.level === 'verbose');

        this.#stream.write(serializeEntry(entry));

    }

    // ─────────────────────────────────────────────────────────────
    // Direct logging methods
    // ─────────────────────────────────────────────────────────────

    /**
     * Log an info message directly.
     */
    info(message: string, data?: Record<string, unknown>): void {

        this.#log('info', message, data);

    }

    /**
     * Log a warning message directly.
     */
    warn(message: string, data?: Record<string, unknown>): void {

        this.#log('warn', message, data);

    }

    /**
     * Log an error message directly.
     */
    error(message: string, data?: Record<string, unknown>): void {

        this.#log('error', message, data);

    }

    /**
     * Log a debug message directly.
     */
    debug(message: string, data?: Record<string, unknown>): void {

        this.#log('debug', message, data);

    }

    /**
     * Internal log method.
     *
     * Direct messages are written whether or not the logger has been
     * started, so early failures still reach stderr.
     */
    #log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {

        if (!shouldWrite(level, this.#config.level)) {

            return;

        }

        const includeData = this.#config.level === 'verbose' ? data : undefined;
        const entry = formatMessageEntry(level, message, includeData);

        this.#stream.write(serializeEntry(entry));

    }

}

/**
 * Observer payloads are typed per event; the logger treats them uniformly.
 */
function toRecord(data: unknown): Record<string, unknown> {

    if (data !== null && typeof data === 'object' && !Array.isArray(data)) {

        const record: Record<string, unknown> = {};

        for (const [key, value] of Object.entries(data)) {

            record[key] = value;

        }

        return record;

    }

    return data === undefined ? {} : { value: data };

}
