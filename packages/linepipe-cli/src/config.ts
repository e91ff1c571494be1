/**
 * CLI Configuration
 *
 * Resolves CLI configuration from the config file.
 * Configuration file: ~/.linepipe.yaml
 *
 * Example:
 *   nocase: true
 *   skipOnError: false
 *   lineEnding: crlf
 *   color: false
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'js-yaml';
import type { LineEnding } from 'linepipe-core';

// ============================================================================
// Types
// ============================================================================

/**
 * CLI configuration as stored in the config file
 */
export interface CLIConfig {
    /** Case-insensitive default for every case-aware operator */
    nocase?: boolean;
    /** Skip unreadable input files instead of failing */
    skipOnError?: boolean;
    /** Line ending for file and clipboard output */
    lineEnding?: LineEnding;
    /** Colored diagnostics */
    color?: boolean;
}

/**
 * Resolved CLI configuration with all defaults applied
 */
export interface ResolvedCLIConfig {
    nocase: boolean;
    skipOnError: boolean;
    lineEnding: LineEnding;
    color: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const CONFIG_FILE_NAME = '.linepipe.yaml';

export const DEFAULT_CONFIG: ResolvedCLIConfig = {
    nocase: false,
    skipOnError: false,
    lineEnding: 'lf',
    color: true,
};

// ============================================================================
// Config Resolution
// ============================================================================

export function getConfigFilePath(): string {
    return path.join(os.homedir(), CONFIG_FILE_NAME);
}

/**
 * Load CLI configuration from the config file.
 * Returns undefined if the file doesn't exist or can't be parsed.
 */
export function loadConfigFile(configPath?: string): CLIConfig | undefined {
    const filePath = configPath || getConfigFilePath();
    if (!fs.existsSync(filePath)) {
        return undefined;
    }
    try {
        const content = fs.readFileSync(filePath, 'utf-8');
        return validateConfig(yaml.load(content));
    } catch {
        return undefined;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate and sanitize a config object; unknown or mistyped fields are dropped.
 */
export function validateConfig(config: unknown): CLIConfig | undefined {
    if (!isRecord(config)) {
        return undefined;
    }

    const result: CLIConfig = {};

    if (typeof config.nocase === 'boolean') {
        result.nocase = config.nocase;
    }

    if (typeof config.skipOnError === 'boolean') {
        result.skipOnError = config.skipOnError;
    }

    if (config.lineEnding === 'lf' || config.lineEnding === 'crlf') {
        result.lineEnding = config.lineEnding;
    }

    if (typeof config.color === 'boolean') {
        result.color = config.color;
    }

    return result;
}

/**
 * Resolve CLI configuration by merging the config file with defaults.
 * Command-line options are applied on top of the result.
 */
export function resolveConfig(configPath?: string): ResolvedCLIConfig {
    return mergeConfig(DEFAULT_CONFIG, loadConfigFile(configPath));
}

/**
 * Merge a partial config on top of a base config
 */
export function mergeConfig(base: ResolvedCLIConfig, override?: CLIConfig): ResolvedCLIConfig {
    if (!override) {
        return { ...base };
    }

    return {
        nocase: override.nocase ?? base.nocase,
        skipOnError: override.skipOnError ?? base.skipOnError,
        lineEnding: override.lineEnding ?? base.lineEnding,
        color: override.color ?? base.color,
    };
}
