/**
 * Run Command
 *
 * Parses a pipeline from argv words or a single token string and runs it
 * against standard streams, files and the clipboard.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import {
    createPipeConfig,
    describePipeline,
    ErrorCode,
    isLinepipeError,
    LinepipeError,
    parseEvalToken,
    parsePipeline,
    runPipeline,
} from 'linepipe-core';
import type { LineEnding, PipeIO, Pipeline } from 'linepipe-core';
import { createNodeIO } from '../node-io';
import { cyan, gray, printError, printHeader } from '../logger';

// ============================================================================
// Types
// ============================================================================

export interface RunCommandOptions {
    /** Pipeline as one token string; excludes positional words */
    eval?: string;
    nocase: boolean;
    skipOnError: boolean;
    lineEnding: LineEnding;
    /** Print the parsed pipeline to stderr before running */
    verbose: boolean;
    /** Parse only */
    dryRun: boolean;
    /** I/O to run against; defaults to the process' own */
    io?: PipeIO;
}

/** Exit status for failures that are not linepipe errors */
export const INTERNAL_ERROR_EXIT = 100;

// ============================================================================
// Run Command
// ============================================================================

/**
 * Parse the pipeline from either source.
 */
export function parseCommandLine(words: readonly string[], evalToken: string | undefined): Pipeline {
    if (evalToken === undefined) {
        return parsePipeline(words);
    }
    if (words.length > 0) {
        throw new LinepipeError(`unexpected words after --eval: ${words.join(' ')}`, {
            code: ErrorCode.UNEXPECTED_REMAINING,
            meta: { value: words.join(' ') },
        });
    }
    return parseEvalToken(evalToken);
}

function isBrokenPipe(error: unknown): boolean {
    const cause = isLinepipeError(error) ? error.cause : error;
    return cause instanceof Error && Reflect.get(cause, 'code') === 'EPIPE';
}

/**
 * Execute the run command
 *
 * @returns process exit status (0 on success, the error's status otherwise)
 */
export async function executeRun(words: readonly string[], options: RunCommandOptions): Promise<number> {
    try {
        const pipeline = parseCommandLine(words, options.eval);

        if (options.verbose) {
            printHeader('Pipeline');
            for (const line of describePipeline(pipeline)) {
                process.stderr.write(`  ${cyan(line)}\n`);
            }
        }
        if (options.dryRun) {
            if (options.verbose) {
                process.stderr.write(`${gray('(dry run, nothing executed)')}\n`);
            }
            return 0;
        }

        await runPipeline(pipeline, {
            io: options.io ?? createNodeIO(),
            config: createPipeConfig({
                nocase: options.nocase,
                skipOnError: options.skipOnError,
                lineEnding: options.lineEnding,
            }),
        });
        return 0;
    } catch (error) {
        if (isBrokenPipe(error)) {
            return 0;
        }
        if (isLinepipeError(error)) {
            printError(`[${error.code}:${error.exitCode}] ${error.message}`);
            return error.exitCode;
        }
        printError(error instanceof Error ? error.message : String(error));
        return INTERNAL_ERROR_EXIT;
    }
}
