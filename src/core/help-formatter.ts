/**
 * Help Text Formatter
 *
 * Applies terminal colors to meow-style help text using the Modern Slate
 * theme.
 *
 * Supported layout:
 * - `  Section` (two-space indent) → bold section title
 * - `    $ dbstruct ...` → command highlighting
 * - `    --flag, -f <arg>   description` → option highlighting
 * - `code`, `<required>` and `[optional]` inside any line
 *
 * Command syntax highlighting:
 * - `dbstruct` → primary (command)
 * - `-flag`, `--flag` → warning (amber)
 * - `<required>` → warning, `[optional]` → muted
 */
import ansis from 'ansis';

import { palette } from './theme.js';

// ─────────────────────────────────────────────────────────────
// Color Functions
// ─────────────────────────────────────────────────────────────

const colors = {
    // Headings
    section: (s: string) => ansis.bold(ansis.hex(palette.text)(s)),

    // Code
    code: (s: string) => ansis.hex(palette.info)(s),

    // Text
    text: (s: string) => ansis.hex(palette.text)(s),
    muted: (s: string) => ansis.hex(palette.muted)(s),

    // Commands
    command: (s: string) => ansis.hex(palette.primary)(s),
    flag: (s: string) => ansis.hex(palette.warning)(s),
    placeholder: (s: string) => ansis.hex(palette.muted)(s),
    required: (s: string) => ansis.hex(palette.warning)(s),

    // Examples
    example: (s: string) => ansis.hex(palette.textDim)(s),
};

const COMMAND_NAME = 'dbstruct';

// ─────────────────────────────────────────────────────────────
// Inline Formatting
// ─────────────────────────────────────────────────────────────

/**
 * Apply inline formatting to a line of text.
 * Handles: `code`, [optional], <required>
 */
function formatInline(line: string): string {

    let result = line;

    // Inline code first, so nothing else is formatted inside it
    result = result.replace(/`([^`]+)`/g, (_, code: string) => colors.code(code));

    result = result.replace(/\[([^\]]+)\]/g, (_, content: string) =>
        colors.placeholder(`[${content}]`));

    result = result.replace(/<([^>]+)>/g, (_, content: string) =>
        colors.muted('<') + colors.required(content) + colors.muted('>'));

    return result;

}

/**
 * Format a command example (`$ dbstruct shop orders -f json`).
 */
function formatCommand(line: string): string {

    const leadingSpace = /^(\s*)/.exec(line)?.[1] ?? '';
    let content = line.trim();
    let prefix = '';

    if (content.startsWith('$')) {

        prefix = colors.muted('$ ');
        content = content.slice(1).trim();

    }

    const formatted = content.split(/\s+/).map((token) => {

        if (token === COMMAND_NAME) {

            return colors.command(token);

        }

        if (token.startsWith('-')) {

            return colors.flag(token);

        }

        if (token.startsWith('<') || token.startsWith('[')) {

            return formatInline(token);

        }

        return colors.text(token);

    });

    return leadingSpace + prefix + formatted.join(' ');

}

/**
 * Format an option line: flags, then two or more spaces, then the description.
 */
function formatOption(line: string): string {

    const match = /^(\s+)(\S.*?)(\s{2,})(.*)$/.exec(line);

    if (!match) {

        return colors.flag(line);

    }

    const [, indent = '', flags = '', gap = '', description = ''] = match;
    const coloredFlags = flags
        .split(/(\s+|,)/)
        .map((part) => part.startsWith('-') ? colors.flag(part) : formatInline(part))
        .join('');

    return indent + coloredFlags + gap + colors.text(formatInline(description));

}

// ─────────────────────────────────────────────────────────────
// Block Formatting
// ─────────────────────────────────────────────────────────────

/**
 * Format a complete help text with colors.
 *
 * @example
 * ```typescript
 * process.stdout.write(formatHelp(HELP_TEXT))
 * ```
 */
export function formatHelp(text: string): string {

    return text.split('\n').map((line) => {

        const trimmed = line.trim();

        if (trimmed === '') {

            return '';

        }

        if (/^ {2}\S/.test(line)) {

            return colors.section(line);

        }

        if (trimmed.startsWith('$')) {

            return formatCommand(line);

        }

        if (trimmed.startsWith('-')) {

            return formatOption(line);

        }

        return colors.example(formatInline(line));

    }).join('\n');

}
