#!/usr/bin/env node
/**
 * CLI entry point for dbstruct.
 *
 * Parses command line arguments with meow, loads settings, starts the
 * logger and hands the validated run configuration to the describe runner.
 *
 * @example
 * ```bash
 * dbstruct shop orders                        # Table for one table
 * dbstruct shop orders customers -f json      # JSON for two tables
 * dbstruct shop orders -c Field,Type --stats  # Filtered, with statistics
 * mysql shop -e "SHOW COLUMNS FROM orders" | dbstruct
 * ```
 */
import { text } from 'node:stream/consumers'
import meow from 'meow'
import { attempt, attemptSync } from '@logosdx/utils'

import {
    Logger,
    MysqlClient,
    ResultCache,
    SettingsManager,
    isColorDisabled,
    isTerminal,
    observer,
} from '../core/index.js'

import type { CliFlags } from './types.js'
import { HELP_TEXT, helpText, versionText } from './help.js'
import { resolveLogLevel, resolveRunConfig } from './config.js'
import { EXIT, reportFatal, runDescribe } from './runner.js'


/**
 * Parse CLI arguments with meow.
 *
 * `--no-color` and `--no-cache` arrive as negated `color` and `cache`;
 * their short forms `-n` and `-N` as `noColor` and `noCache`.
 */
function parseCli() {

    const cli = meow(HELP_TEXT, {
        importMeta: import.meta,
        autoHelp: false,
        autoVersion: false,
        flags: {
            columns: {
                type: 'string',
                shortFlag: 'c'
            },
            format: {
                type: 'string',
                shortFlag: 'f'
            },
            stats: {
                type: 'boolean',
                shortFlag: 's',
                default: false
            },
            output: {
                type: 'string',
                shortFlag: 'o'
            },
            color: {
                type: 'boolean',
                default: true
            },
            noColor: {
                type: 'boolean',
                shortFlag: 'n',
                default: false
            },
            cache: {
                type: 'boolean',
                default: true
            },
            noCache: {
                type: 'boolean',
                shortFlag: 'N',
                default: false
            },
            width: {
                type: 'number',
                shortFlag: 'w'
            },
            strictColumns: {
                type: 'boolean',
                default: false
            },
            verbose: {
                type: 'boolean',
                default: false
            },
            version: {
                type: 'boolean',
                shortFlag: 'V',
                default: false
            },
            help: {
                type: 'boolean',
                shortFlag: 'h',
                default: false
            }
        }
    })

    const flags: CliFlags = {
        columns: cli.flags.columns,
        format: cli.flags.format,
        stats: cli.flags.stats,
        output: cli.flags.output,
        noColor: cli.flags.noColor || !cli.flags.color,
        noCache: cli.flags.noCache || !cli.flags.cache,
        width: cli.flags.width,
        strictColumns: cli.flags.strictColumns,
        verbose: cli.flags.verbose,
        version: cli.flags.version,
        help: cli.flags.help
    }

    return { input: cli.input, flags, pkg: cli.pkg }
}


/**
 * Main entry point.
 */
async function main(): Promise<number> {

    const { input, flags, pkg } = parseCli()
    const stdoutColor = isTerminal(process.stdout) && !isColorDisabled() && !flags.noColor
    const stderrColor = isTerminal(process.stderr) && !isColorDisabled() && !flags.noColor

    if (flags.help) {

        process.stdout.write(helpText(stdoutColor))

        return EXIT.ok
    }

    if (flags.version) {

        process.stdout.write(versionText(pkg))

        return EXIT.ok
    }

    const [settings, settingsErr] = await attempt(() => new SettingsManager().load())

    if (!settings) {

        return reportFatal(settingsErr ?? new Error('Could not load settings'), process.stderr, stderrColor)
    }

    const logger = new Logger({ config: { level: resolveLogLevel(flags, settings) } })

    logger.start()

    try {

        const [config, configErr] = attemptSync(() => resolveRunConfig(input, flags, settings))

        if (!config) {

            return reportFatal(configErr ?? new Error('Invalid configuration'), process.stderr, stderrColor)
        }

        const [exitCode, runErr] = await attempt(() => runDescribe(config, {
            client: new MysqlClient(config.client),
            cache: new ResultCache({ dir: config.cacheDir }),
            logger,
            stdin: process.stdin,
            stdout: process.stdout,
            stderr: process.stderr,
            readStdin: () => text(process.stdin),
        }))

        if (exitCode === null) {

            observer.emit('error', { source: 'describe', error: runErr ?? new Error('Run failed') })

            return EXIT.tableFailed
        }

        return exitCode
    }
    finally {

        logger.stop()
    }
}


// Run main
main()
    .then((exitCode) => {

        process.exitCode = exitCode
    })
    .catch((error: unknown) => {

        console.error('Fatal error:', error)
        process.exitCode = 1
    })
