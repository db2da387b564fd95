/**
 * Default settings and well-known paths.
 */
import { join } from 'node:path';

import { userConfigHome } from '../environment.js';
import { parseSettings } from './schema.js';
import type { Settings } from './types.js';

/**
 * Settings file name inside the config directory.
 */
export const SETTINGS_FILE_NAME = 'settings.yml';

/**
 * Path of the user settings file.
 *
 * `DBSTRUCT_SETTINGS` points at another file; otherwise
 * `$XDG_CONFIG_HOME/dbstruct/settings.yml`.
 */
export function settingsFilePath(env: NodeJS.ProcessEnv = process.env): string {

    return env['DBSTRUCT_SETTINGS'] || join(userConfigHome(env), 'dbstruct', SETTINGS_FILE_NAME);

}

/**
 * Create a fresh default settings object.
 */
export function createDefaultSettings(): Settings {

    return parseSettings({});

}
