/**
 * CLI Argument Parser
 *
 * Defines the linepipe command line using Commander and routes it to the
 * run or topic handlers. Options are only recognized before the first
 * pipeline word, so pipeline arguments such as "-5" reach the grammar
 * untouched.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { Command, Option } from 'commander';
import { setLogger } from 'linepipe-core';
import { executeRun, INTERNAL_ERROR_EXIT } from './commands/run';
import { executeTopic, HELP_TOPICS, isHelpTopic } from './commands/topic';
import { resolveConfig } from './config';
import type { ResolvedCLIConfig } from './config';
import { createCLILogger, setColorEnabled, setVerbosity } from './logger';

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Exit statuses owned by the CLI itself. Pipeline failures exit with the
 * status of their error code (see `--topic code`).
 */
export const EXIT_CODES = {
    SUCCESS: 0,
    INTERNAL_ERROR: INTERNAL_ERROR_EXIT,
} as const;

export const VERSION = '1.0.0';

// ============================================================================
// Types
// ============================================================================

/**
 * Parsed global options
 */
export interface ProgramOptions {
    eval?: string;
    nocase?: boolean;
    skipErr?: boolean;
    verbose?: boolean;
    dryRun?: boolean;
    topic?: string;
    color: boolean;
}

// ============================================================================
// CLI Setup
// ============================================================================

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
    const program = new Command();

    program
        .name('linepipe')
        .description('Stream lines through a chain of commands, e.g. linepipe :gen 1,=5 :join ,')
        .version(VERSION, '-V, --version')
        .argument('[pipeline...]', 'input, operator and output commands')
        .option('-e, --eval <token>', 'read the pipeline from one token string')
        .option('-n, --nocase', 'ignore case in every case-aware operator')
        .option('-s, --skip-err', 'skip input files that cannot be read')
        .option('-v, --verbose', 'print the parsed pipeline and debug logs to stderr')
        .option('-d, --dry-run', 'parse the pipeline without running it')
        .addOption(new Option('-t, --topic <topic>', 'print a help topic').choices(HELP_TOPICS))
        .option('--no-color', 'disable colored output')
        .passThroughOptions()
        .action(async (words: string[], opts: ProgramOptions) => {
            const config = resolveConfig();
            applyGlobalOptions(opts, config);

            if (opts.topic !== undefined && isHelpTopic(opts.topic)) {
                process.exitCode = executeTopic(opts.topic);
                return;
            }

            process.exitCode = await executeRun(words, {
                eval: opts.eval,
                nocase: Boolean(opts.nocase) || config.nocase,
                skipOnError: Boolean(opts.skipErr) || config.skipOnError,
                lineEnding: config.lineEnding,
                verbose: Boolean(opts.verbose),
                dryRun: Boolean(opts.dryRun),
            });
        });

    return program;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Apply global options (colors, verbosity, logger) based on CLI flags and config
 */
export function applyGlobalOptions(opts: ProgramOptions, config: ResolvedCLIConfig): void {
    // commander sets color: false when --no-color is used
    if (opts.color === false || !config.color) {
        setColorEnabled(false);
    }

    if (process.env.NO_COLOR !== undefined) {
        setColorEnabled(false);
    }

    setVerbosity(opts.verbose ? 'verbose' : 'normal');
    setLogger(createCLILogger());
}
