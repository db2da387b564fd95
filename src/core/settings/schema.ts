/**
 * Settings Zod schemas and validation.
 *
 * User settings are validated on load so a typo in settings.yml fails the
 * run up front instead of surfacing halfway through a table.
 */
import { z } from 'zod';

import { ConfigurationError } from '../errors.js';

// ─────────────────────────────────────────────────────────────
// Base Schemas
// ─────────────────────────────────────────────────────────────

export const OutputFormatSchema = z.enum(['table', 'json', 'csv']);

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'verbose']);

// ─────────────────────────────────────────────────────────────
// Section Schemas
// ─────────────────────────────────────────────────────────────

const ClientSettingsSchema = z.object({
    command: z.string().min(1, 'Client command is required').default('mysql'),
    args: z.array(z.string()).default([]),
});

const CacheSettingsSchema = z.object({
    dir: z.string().min(1).optional(),
});

const OutputSettingsSchema = z.object({
    format: OutputFormatSchema.default('table'),
    color: z.boolean().default(true),
});

const LoggingSettingsSchema = z.object({
    level: LogLevelSchema.default('warn'),
});

// ─────────────────────────────────────────────────────────────
// Root Schema
// ─────────────────────────────────────────────────────────────

export const SettingsSchema = z.object({
    client: ClientSettingsSchema.default({}),
    cache: CacheSettingsSchema.default({}),
    output: OutputSettingsSchema.default({}),
    logging: LoggingSettingsSchema.default({}),
}).strict();

export type SettingsSchemaType = z.infer<typeof SettingsSchema>;

// ─────────────────────────────────────────────────────────────
// Validation Functions
// ─────────────────────────────────────────────────────────────

/**
 * Parse and validate settings, filling defaults for missing fields.
 *
 * @throws ConfigurationError naming the first invalid field
 *
 * @example
 * ```typescript
 * const settings = parseSettings({ output: { format: 'json' } })
 * // settings.logging.level === 'warn' (default)
 * ```
 */
export function parseSettings(raw: unknown): SettingsSchemaType {

    const result = SettingsSchema.safeParse(raw ?? {});

    if (!result.success) {

        const firstIssue = result.error.issues[0];
        const field = firstIssue?.path.join('.') || 'settings';

        throw new ConfigurationError(
            `Invalid setting ${field}: ${firstIssue?.message ?? 'validation failed'}`,
            field,
        );

    }

    return result.data;

}
