/**
 * CLI help and version text.
 */
import { formatHelp } from '../core/help-formatter.js'


/**
 * Usage text shown by --help.
 */
export const HELP_TEXT = `
  Usage
    $ dbstruct <database> <table...> [options]
    $ mysql shop -e "SHOW COLUMNS FROM orders" | dbstruct [options]

  Options
    --columns, -c <list>    Only show these columns, in this order (e.g. Field,Type,Null)
    --format, -f <format>   Output format: table, json or csv (default: table)
    --stats, -s             Include row count, size and indexes
    --output, -o <path>     Write output to a file instead of stdout
    --no-color, -n          Disable colors
    --no-cache, -N          Skip the cache and query the database
    --width, -w <n>         Wrap the table to this many characters
    --strict-columns        Fail on unknown names in --columns
    --verbose               Log every step to stderr
    --version, -V           Show version
    --help, -h              Show this help

  Environment
    DBSTRUCT_CLIENT         Database client executable (default: mysql)
    DBSTRUCT_CACHE_DIR      Cache directory (default: ~/.cache/dbstruct)
    DBSTRUCT_SETTINGS       Settings file (default: ~/.config/dbstruct/settings.yml)
    DBSTRUCT_LOG_LEVEL      silent, error, warn, info or verbose
    NO_COLOR                Disable colors

  Examples
    $ dbstruct shop orders customers
    $ dbstruct shop orders -c Field,Type -f csv -o orders.csv
    $ dbstruct shop orders --stats --no-cache
`


/**
 * One-line description of the tool.
 */
export const DESCRIPTION = 'Formats MySQL table structure as aligned tables, JSON or CSV.'


/**
 * Help text, colored when the terminal takes colors.
 */
export function helpText(color: boolean): string {

    return color ? formatHelp(HELP_TEXT) : HELP_TEXT
}


/**
 * Version banner.
 *
 * @example
 * ```typescript
 * versionText({ version: '1.0.0', license: 'MIT' })
 * // 'dbstruct v1.0.0\nLicense: MIT\n\nFormats MySQL table structure ...\n'
 * ```
 */
export function versionText(pkg: { version?: string; license?: string }): string {

    return [
        `dbstruct v${pkg.version ?? '0.0.0'}`,
        `License: ${pkg.license ?? 'UNLICENSED'}`,
        '',
        DESCRIPTION,
        '',
    ].join('\n')
}
