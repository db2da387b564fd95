/**
 * Settings types.
 */
import type { z } from 'zod';

import type { LogLevelSchema, OutputFormatSchema, SettingsSchemaType } from './schema.js';

/**
 * Output format of a run.
 */
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * Logger verbosity.
 */
export type SettingsLogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Validated user settings with defaults applied.
 */
export type Settings = SettingsSchemaType;

/**
 * Result of loading settings.
 */
export interface LoadedSettings {

    settings: Settings;

    /** File the settings were read from (or would have been) */
    path: string;

    /** False when the file was absent and defaults were used */
    fromFile: boolean;

}
