/**
 * Core module exports.
 *
 * All describe logic is exported from here.
 * The CLI imports from this barrel file.
 */

// Observer
export { observer } from './observer.js'
export type { DbstructEvents, DbstructEventNames, ObserverEngine } from './observer.js'

// Errors
export {
    ConfigurationError,
    ExternalToolError,
    ParseError,
    CacheError,
    OutputError,
} from './errors.js'
export type { ExternalToolFailure } from './errors.js'

// Environment
export {
    isTerminal,
    terminalWidth,
    isColorDisabled,
    userCacheHome,
    userConfigHome,
} from './environment.js'
export type { TerminalLike } from './environment.js'

// Theme
export { palette, theme, icons, status, stripColor } from './theme.js'

// Logger
export { Logger } from './logger/index.js'
export type { LogLevel, LoggerConfig } from './logger/index.js'

// Column structure
export {
    FIELD_NAMES,
    isFieldName,
    cellValue,
    parseColumns,
    classifyLine,
    isTypeToken,
    parseColumnFilter,
    visibleFields,
} from './describe/index.js'
export type {
    FieldName,
    ColumnRecord,
    IndexInfo,
    TableStats,
    TableResult,
} from './describe/index.js'

// Client
export { MysqlClient, spawnCommand, DEFAULT_CLIENT_COMMAND } from './client/index.js'
export type { SchemaClient, CommandRunner, CommandOutput, ClientOptions } from './client/index.js'

// Cache
export { ResultCache, cacheKey, defaultCacheDir, CACHE_TTL_MS } from './cache/index.js'
export type { CacheKeyInput, ResultCacheOptions } from './cache/index.js'

// Settings
export {
    SettingsManager,
    applyEnvironment,
    createDefaultSettings,
    parseSettings,
    settingsFilePath,
    OutputFormatSchema,
} from './settings/index.js'
export type { Settings, OutputFormat } from './settings/index.js'

// Rendering
export { render, renderTables, renderJson, renderCsv, createRenderOptions } from './render/index.js'
export type { RenderOptions } from './render/index.js'
