/**
 * Modern Slate Color Theme
 *
 * Centralized color scheme for table cells, status lines and help text.
 * Uses ansis for truecolor (hex) support.
 *
 * @example
 * ```typescript
 * import { theme, status } from '../core/theme.js'
 *
 * console.log(status.success('Wrote 2 tables'))
 * console.log(status.error('users: client exited with code 1'))
 * console.log(theme.bold(theme.error('PRI')))
 * ```
 */
import ansis from 'ansis';

// ─────────────────────────────────────────────────────────────
// Color Palette
// ─────────────────────────────────────────────────────────────

/**
 * Modern Slate color palette.
 * Hex values used directly with ansis truecolor support.
 */
export const palette = {

    // Brand
    primary: '#3B82F6',      // Bright Blue

    // Status
    success: '#10B981',      // Emerald Green
    warning: '#F59E0B',      // Amber
    error: '#EF4444',        // Red
    info: '#8B5CF6',         // Purple

    // UI Elements
    muted: '#9CA3AF',        // Gray-400

    // Neutrals
    text: '#F3F4F6',         // Gray-100 (light text on dark bg)
    textDim: '#D1D5DB',      // Gray-300

} as const;

// ─────────────────────────────────────────────────────────────
// Color Functions (Truecolor)
// ─────────────────────────────────────────────────────────────

/**
 * Theme color functions for direct use.
 * Uses ansis hex() for truecolor output.
 */
export const theme = {

    // Brand
    primary: (text: string) => ansis.hex(palette.primary)(text),

    // Status
    success: (text: string) => ansis.hex(palette.success)(text),
    warning: (text: string) => ansis.hex(palette.warning)(text),
    error: (text: string) => ansis.hex(palette.error)(text),
    info: (text: string) => ansis.hex(palette.info)(text),

    // UI
    muted: (text: string) => ansis.hex(palette.muted)(text),

    // Text
    text: (text: string) => ansis.hex(palette.text)(text),
    textDim: (text: string) => ansis.hex(palette.textDim)(text),

    // Utility
    bold: ansis.bold,
    dim: ansis.dim,
    italic: ansis.italic,

} as const;

// ─────────────────────────────────────────────────────────────
// Status Message Helpers
// ─────────────────────────────────────────────────────────────

/**
 * Icons for status messages.
 */
export const icons = {
    success: '✓',
    error: '✗',
    warning: '⚠',
    bullet: '•',
} as const;

/**
 * Status message formatters with icons.
 *
 * Pass `color = false` for streams that are not terminals; the text is
 * then returned without escape codes.
 */
export const status = {

    /**
     * Success message with checkmark.
     * @example status.success('Wrote 2 tables to out.json')
     */
    success(message: string, color = true): string {

        const line = `${icons.success} ${message}`;

        return color ? theme.success(line) : line;

    },

    /**
     * Error message with X icon.
     * @example status.error('users: Database client exited with code 1')
     */
    error(message: string, color = true): string {

        const line = `${icons.error} ${message}`;

        return color ? theme.error(line) : line;

    },

    /**
     * Warning message with warning icon.
     */
    warning(message: string, color = true): string {

        const line = `${icons.warning} ${message}`;

        return color ? theme.warning(line) : line;

    },

} as const;

/**
 * Remove escape codes from a string.
 */
export function stripColor(text: string): string {

    return ansis.strip(text);

}
