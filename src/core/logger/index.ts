/**
 * Logger Module
 *
 * Captures observer events and writes them to stderr, filtered by level.
 */

// Types
export type {
    LogLevel,
    EntryLevel,
    LogEntry,
    LoggerConfig,
    LoggerState,
} from './types.js';

export { LOG_LEVELS, LOG_LEVEL_PRIORITY, DEFAULT_LOGGER_CONFIG } from './types.js';

// Classifier
export { classifyEvent, shouldLog, shouldWrite } from './classifier.js';

// Formatter
export { generateMessage, formatEntry, formatMessageEntry, serializeEntry } from './formatter.js';

// Logger
export { Logger, type LoggerOptions } from './logger.js';
