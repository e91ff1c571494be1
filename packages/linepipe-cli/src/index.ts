#!/usr/bin/env node

/**
 * linepipe CLI Entry Point
 *
 * Usage:
 *   linepipe [options] [pipeline...]
 *   linepipe :file in.txt :trim :uniq :to file out.txt
 *   linepipe -e ':gen 1,=10 :take num 3,5 :join ,'
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { createProgram, EXIT_CODES } from './cli';
import { printError } from './logger';

async function main(): Promise<void> {
    try {
        const program = createProgram();
        await program.parseAsync(process.argv);
    } catch (error) {
        if (error instanceof Error) {
            printError(error.message);
        } else {
            printError(String(error));
        }
        process.exitCode = EXIT_CODES.INTERNAL_ERROR;
    }
}

void main();
