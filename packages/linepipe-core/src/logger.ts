/**
 * Logger abstraction for linepipe-core.
 *
 * The core never writes diagnostics directly; it goes through a logger the
 * host installs (the CLI, tests, ...).
 *
 * Usage:
 *   import { getLogger, setLogger } from 'linepipe-core';
 *
 *   getLogger().debug(LogCategory.PIPELINE, 'Built stage :sort');
 *   setLogger(myLogger);
 */

/**
 * Log categories for different subsystems
 */
export enum LogCategory {
    /** Grammar and token reading */
    PARSE = 'Parse',
    /** Pipeline construction and execution */
    PIPELINE = 'Pipeline',
    /** Sources and sinks */
    IO = 'IO',
    /** General operations */
    GENERAL = 'General',
}

/**
 * Logger interface that can be implemented by different environments.
 */
export interface Logger {
    /**
     * Log a debug message (verbose, for development)
     */
    debug(category: string, message: string): void;

    info(category: string, message: string): void;

    warn(category: string, message: string): void;

    /**
     * Log an error message with optional Error object
     */
    error(category: string, message: string, error?: Error): void;
}

/**
 * Console-based logger. Everything goes to stderr so that stdout carries
 * only pipeline output.
 */
export const consoleLogger: Logger = {
    debug: (cat, msg) => console.error(`[DEBUG] [${cat}] ${msg}`),
    info: (cat, msg) => console.error(`[INFO] [${cat}] ${msg}`),
    warn: (cat, msg) => console.error(`[WARN] [${cat}] ${msg}`),
    error: (cat, msg, err) => console.error(`[ERROR] [${cat}] ${msg}`, err ?? ''),
};

/**
 * Null logger that discards all messages.
 */
export const nullLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};

let globalLogger: Logger = consoleLogger;

/**
 * Set the global logger instance.
 */
export function setLogger(logger: Logger): void {
    globalLogger = logger;
}

export function getLogger(): Logger {
    return globalLogger;
}

/**
 * Reset the logger to the default console logger.
 * Primarily useful for testing.
 */
export function resetLogger(): void {
    globalLogger = consoleLogger;
}
