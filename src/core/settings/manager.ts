/**
 * Settings Manager
 *
 * Loads and validates user settings from settings.yml, then layers
 * environment overrides on top. Command-line flags are applied later by
 * the CLI.
 */
import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { attempt, attemptSync } from '@logosdx/utils';

import { observer } from '../observer.js';
import { ConfigurationError } from '../errors.js';
import { isColorDisabled } from '../environment.js';
import { LogLevelSchema, parseSettings } from './schema.js';
import { createDefaultSettings, settingsFilePath } from './defaults.js';
import type { LoadedSettings, Settings } from './types.js';

/**
 * Options for SettingsManager construction.
 */
export interface SettingsManagerOptions {

    /** Override the settings file (default: settingsFilePath(env)) */
    path?: string;

    /** Environment to read overrides from (default: process.env) */
    env?: NodeJS.ProcessEnv;

}

function errorCode(error: Error): string | undefined {

    return 'code' in error && typeof error.code === 'string' ? error.code : undefined;

}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string): string {

    if (path === '~') {

        return homedir();

    }

    return path.startsWith('~/') ? join(homedir(), path.slice(2)) : path;

}

/**
 * Apply environment overrides to settings.
 *
 * @throws ConfigurationError when DBSTRUCT_LOG_LEVEL is not a known level
 *
 * @example
 * ```typescript
 * applyEnvironment(settings, { DBSTRUCT_CLIENT: 'mariadb', NO_COLOR: '1' })
 * // client.command === 'mariadb', output.color === false
 * ```
 */
export function applyEnvironment(settings: Settings, env: NodeJS.ProcessEnv): Settings {

    const client = env['DBSTRUCT_CLIENT'];
    const cacheDir = env['DBSTRUCT_CACHE_DIR'];
    const logLevel = env['DBSTRUCT_LOG_LEVEL'];

    let level = settings.logging.level;

    if (logLevel) {

        const parsed = LogLevelSchema.safeParse(logLevel);

        if (!parsed.success) {

            throw new ConfigurationError(
                `Invalid DBSTRUCT_LOG_LEVEL '${logLevel}'. Expected one of: ${LogLevelSchema.options.join(', ')}`,
                'DBSTRUCT_LOG_LEVEL',
            );

        }

        level = parsed.data;

    }

    const dir = cacheDir || settings.cache.dir;

    return {
        client: {
            command: client || settings.client.command,
            args: [...settings.client.args],
        },
        cache: dir ? { dir: expandHome(dir) } : {},
        output: {
            format: settings.output.format,
            color: settings.output.color && !isColorDisabled(env),
        },
        logging: { level },
    };

}

/**
 * Manages user settings.
 *
 * @example
 * ```typescript
 * const manager = new SettingsManager()
 * const settings = await manager.load()
 *
 * console.log(settings.client.command)   // 'mysql'
 * ```
 */
export class SettingsManager {

    #path: string;
    #env: NodeJS.ProcessEnv;
    #loaded: LoadedSettings | null = null;

    constructor(options: SettingsManagerOptions = {}) {

        this.#env = options.env ?? process.env;
        this.#path = options.path ?? settingsFilePath(this.#env);

    }

    get settingsFilePath(): string {

        return this.#path;

    }

    get isLoaded(): boolean {

        return this.#loaded !== null;

    }

    /**
     * Settings from the last load, or null before the first.
     */
    get settings(): Settings | null {

        return this.#loaded?.settings ?? null;

    }

    /**
     * Load settings from disk and apply environment overrides.
     *
     * A missing or empty file yields the defaults.
     *
     * @throws ConfigurationError on unreadable files, invalid YAML or
     * schema violations
     */
    async load(): Promise<Settings> {

        const path = this.#path;
        const [content, readErr] = await attempt(() => readFile(path, { encoding: 'utf8' }));

        let fromFile = false;
        let settings: Settings;

        if (content === null) {

            if (readErr && errorCode(readErr) !== 'ENOENT') {

                throw new ConfigurationError(`Failed to read settings ${path}: ${readErr.message}`, 'settings');

            }

            settings = createDefaultSettings();

        }
        else if (!content.trim()) {

            settings = createDefaultSettings();

        }
        else {

            const [raw, parseErr] = attemptSync((): unknown => parseYaml(content));

            if (parseErr) {

                throw new ConfigurationError(`Failed to parse settings ${path}: ${parseErr.message}`, 'settings');

            }

            settings = parseSettings(raw);
            fromFile = true;

        }

        const resolved = applyEnvironment(settings, this.#env);

        this.#loaded = { settings: resolved, path, fromFile };

        observer.emit('settings:loaded', { path, fromFile });

        return resolved;

    }

}
