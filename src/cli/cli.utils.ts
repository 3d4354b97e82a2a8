/**
 * CLI Utilities for console output
 */

import type { ParseWarning } from '../types';

// ============================================================================
// BRANDING
// ============================================================================

export const BANNER = `
╔════════════════════════════════════════════╗
║   chatlog-stats · chat export statistics   ║
╚════════════════════════════════════════════╝
`;

export const SUCCESS_ICON = "✓";
export const ERROR_ICON = "✗";
export const INFO_ICON = "ℹ";
export const WARNING_ICON = "⚠";

// ============================================================================
// COLOR UTILITIES
// ============================================================================

export const colors = {
    reset: '\x1b[0m',
    bright: '\x1b[1m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    magenta: '\x1b[35m',
    cyan: '\x1b[36m'
};

export function colorize(text: string, color: keyof typeof colors): string {
    return `${colors[color]}${text}${colors.reset}`;
}

// ============================================================================
// FORMATTING UTILITIES
// ============================================================================

export function formatNumber(num: number): string {
    return num.toLocaleString('en-US');
}

export function formatBytes(bytes: number): string {
    const sizes = ['Bytes', 'KB', 'MB', 'GB'];
    if (bytes === 0) return '0 Bytes';
    const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), sizes.length - 1);
    return Math.round(bytes / Math.pow(1024, i) * 100) / 100 + ' ' + sizes[i];
}

/**
 * One-line description of a parse warning, e.g. "line 4 [orphan-line] ..."
 */
export function formatWarning(warning: ParseWarning): string {
    return `line ${warning.line} [${warning.kind}] ${warning.message}`;
}

// ============================================================================
// MESSAGE UTILITIES
// ============================================================================

export function logSuccess(message: string): void {
    console.log(`${colorize(SUCCESS_ICON, 'green')} ${colorize(message, 'green')}`);
}

export function logError(message: string): void {
    console.log(`${colorize(ERROR_ICON, 'red')} ${colorize(message, 'red')}`);
}

export function logInfo(message: string): void {
    console.log(`${colorize(INFO_ICON, 'blue')} ${colorize(message, 'blue')}`);
}

export function logWarning(message: string): void {
    console.log(`${colorize(WARNING_ICON, 'yellow')} ${colorize(message, 'yellow')}`);
}

export function logHeader(message: string): void {
    const line = '═'.repeat(message.length + 4);
    console.log(`\n${colorize(line, 'cyan')}`);
    console.log(`${colorize('  ' + message + '  ', 'cyan')}`);
    console.log(`${colorize(line, 'cyan')}\n`);
}

// ============================================================================
// TABLE UTILITIES
// ============================================================================

export interface TableColumn {
    header: string;
    width: number;
    align?: 'left' | 'right' | 'center';
}

/**
 * Renders rows as a box-drawn table, truncating cells wider than a column
 */
export function renderTable(columns: TableColumn[], data: string[][]): string[] {
    const headerRow = columns.map(col => col.header.padEnd(col.width)).join(' │ ');
    const rule = (joint: string): string => columns.map(col => '─'.repeat(col.width)).join(`─${joint}─`);

    const lines = [
        `┌─${rule('┬')}─┐`,
        `│ ${headerRow} │`,
        `├─${rule('┼')}─┤`
    ];

    for (const row of data) {
        const formattedRow = columns.map((col, i) => {
            const cell = row[i] ?? '';
            const truncated = cell.length > col.width ? cell.substring(0, col.width - 3) + '...' : cell;

            switch (col.align) {
                case 'right':
                    return truncated.padStart(col.width);
                case 'center':
                    return truncated.padStart(Math.floor((col.width + truncated.length) / 2)).padEnd(col.width);
                default:
                    return truncated.padEnd(col.width);
            }
        }).join(' │ ');

        lines.push(`│ ${formattedRow} │`);
    }

    lines.push(`└─${rule('┴')}─┘`);
    return lines;
}

export function createTable(columns: TableColumn[], data: string[][]): void {
    for (const line of renderTable(columns, data)) {
        console.log(line);
    }
}

// ============================================================================
// USAGE & ERRORS
// ============================================================================

export function showUsage(): void {
    console.log(BANNER);

    console.log(`${colorize('USAGE:', 'bright')}`);
    console.log(`  ${colorize('chatlog-stats', 'cyan')} ${colorize('<chat.txt>', 'yellow')} ${colorize('[output.json]', 'dim')} ${colorize('[options]', 'yellow')}`);
    console.log();

    console.log(`${colorize('OPTIONS:', 'bright')}`);
    console.log(`  ${colorize('--date-order <auto|dmy|mdy>', 'cyan')}   Date field order (default: auto)`);
    console.log(`  ${colorize('--variants <list>', 'cyan')}             Header variants to try, comma separated (dash,bracket,dot,iso)`);
    console.log(`  ${colorize('--media <token>', 'cyan')}               Media placeholder, repeatable (default: "<Media omitted>")`);
    console.log(`  ${colorize('--stopwords <file>', 'cyan')}            One stopword per line, replaces the English list`);
    console.log(`  ${colorize('--no-stopwords', 'cyan')}                Keep every word`);
    console.log(`  ${colorize('--keep-numbers', 'cyan')}                Keep digit-only tokens in word counts`);
    console.log(`  ${colorize('--include-system', 'cyan')}              Count system notifications in timelines`);
    console.log(`  ${colorize('--user <name>', 'cyan')}                 Restrict statistics to one participant`);
    console.log(`  ${colorize('--encoding <name>', 'cyan')}             Fallback when the file is not UTF-8 (default: latin1)`);
    console.log(`  ${colorize('--help, -h', 'cyan')}                    Show this help message`);
    console.log();

    console.log(`${colorize('OUTPUT:', 'bright')}`);
    console.log(`  JSON report next to the input (${colorize('<name>.stats.json', 'dim')}) unless a path is given`);
}

export function showError(message: string, details?: string): void {
    console.log();
    logError(message);
    if (details) {
        console.log(`${colorize('Details:', 'dim')} ${details}`);
    }
    console.log();
    console.log(`${colorize('Run with --help to see usage information.', 'dim')}`);
    console.log();
}
