/**
 * CLI Logger
 *
 * Colored stderr output for the linepipe CLI. Implements the linepipe-core
 * Logger interface and adds user-facing print helpers. Standard output is
 * left to the pipeline.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import type { Logger } from 'linepipe-core';

// ============================================================================
// ANSI Color Codes
// ============================================================================

const COLORS = {
    reset: '\x1b[0m',
    bold: '\x1b[1m',
    red: '\x1b[31m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m',
} as const;

// ============================================================================
// Color Helpers
// ============================================================================

let colorEnabled = Boolean(process.stderr.isTTY);

/**
 * Enable or disable colored output
 */
export function setColorEnabled(enabled: boolean): void {
    colorEnabled = enabled;
}

export function isColorEnabled(): boolean {
    return colorEnabled;
}

function colorize(color: string, text: string): string {
    if (!colorEnabled) { return text; }
    return `${color}${text}${COLORS.reset}`;
}

export function red(text: string): string { return colorize(COLORS.red, text); }
export function yellow(text: string): string { return colorize(COLORS.yellow, text); }
export function blue(text: string): string { return colorize(COLORS.blue, text); }
export function cyan(text: string): string { return colorize(COLORS.cyan, text); }
export function gray(text: string): string { return colorize(COLORS.gray, text); }
export function bold(text: string): string { return colorize(COLORS.bold, text); }

// ============================================================================
// Symbols (cross-platform)
// ============================================================================

const isWindows = process.platform === 'win32';

export const SYMBOLS = {
    error: isWindows ? '×' : '✗',
} as const;

// ============================================================================
// CLI Logger (implements linepipe-core Logger interface)
// ============================================================================

/**
 * Verbosity level for CLI output
 */
export type VerbosityLevel = 'quiet' | 'normal' | 'verbose';

let verbosity: VerbosityLevel = 'normal';

export function setVerbosity(level: VerbosityLevel): void {
    verbosity = level;
}

export function getVerbosity(): VerbosityLevel {
    return verbosity;
}

/**
 * Create a linepipe-core compatible Logger for CLI usage
 */
export function createCLILogger(): Logger {
    return {
        debug(category: string, message: string): void {
            if (verbosity === 'verbose') {
                process.stderr.write(`${gray(`[DEBUG] [${category}]`)} ${message}\n`);
            }
        },
        info(category: string, message: string): void {
            if (verbosity !== 'quiet') {
                process.stderr.write(`${blue(`[${category}]`)} ${message}\n`);
            }
        },
        warn(category: string, message: string): void {
            process.stderr.write(`${yellow(`[WARN] [${category}]`)} ${message}\n`);
        },
        error(category: string, message: string, error?: Error): void {
            process.stderr.write(`${red(`[ERROR] [${category}]`)} ${message}\n`);
            if (error && verbosity === 'verbose') {
                process.stderr.write(`${gray(error.stack || error.message)}\n`);
            }
        },
    };
}

// ============================================================================
// Print Helpers (user-facing output)
// ============================================================================

/**
 * Print an error message to stderr
 */
export function printError(message: string): void {
    process.stderr.write(`${red(`${SYMBOLS.error} ${message}`)}\n`);
}

/**
 * Print a header/title to stderr
 */
export function printHeader(title: string): void {
    process.stderr.write(`${bold(title)}\n`);
}
