/**
 * CLI Tests
 *
 * Tests for the CLI argument parser and program creation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { resetLogger } from 'linepipe-core';
import { applyGlobalOptions, createProgram, EXIT_CODES, VERSION } from '../src/cli';
import { DEFAULT_CONFIG } from '../src/config';
import { getVerbosity, isColorEnabled, setColorEnabled, setVerbosity } from '../src/logger';

describe('CLI', () => {
    // ========================================================================
    // Exit Codes
    // ========================================================================

    describe('EXIT_CODES', () => {
        it('should define SUCCESS as 0', () => {
            expect(EXIT_CODES.SUCCESS).toBe(0);
        });

        it('should define INTERNAL_ERROR as 100', () => {
            expect(EXIT_CODES.INTERNAL_ERROR).toBe(100);
        });
    });

    // ========================================================================
    // Program Creation
    // ========================================================================

    describe('createProgram', () => {
        it('should have the correct name and version', () => {
            const program = createProgram();
            expect(program.name()).toBe('linepipe');
            expect(program.version()).toBe(VERSION);
        });

        it('should have the expected options', () => {
            const optionNames = createProgram().options.map(o => o.long);
            expect(optionNames).toEqual([
                '--version',
                '--eval',
                '--nocase',
                '--skip-err',
                '--verbose',
                '--dry-run',
                '--topic',
                '--no-color',
            ]);
        });
    });

    // ========================================================================
    // applyGlobalOptions
    // ========================================================================

    describe('applyGlobalOptions', () => {
        afterEach(() => {
            setColorEnabled(true);
            setVerbosity('normal');
            resetLogger();
        });

        it('should disable colors for --no-color', () => {
            setColorEnabled(true);
            applyGlobalOptions({ color: false }, DEFAULT_CONFIG);
            expect(isColorEnabled()).toBe(false);
        });

        it('should disable colors from the config file', () => {
            setColorEnabled(true);
            applyGlobalOptions({ color: true }, { ...DEFAULT_CONFIG, color: false });
            expect(isColorEnabled()).toBe(false);
        });

        it('should set verbosity', () => {
            applyGlobalOptions({ color: true, verbose: true }, DEFAULT_CONFIG);
            expect(getVerbosity()).toBe('verbose');
        });
    });

    // ========================================================================
    // Parsing
    // ========================================================================

    describe('parseAsync', () => {
        let stdoutSpy: MockInstance;
        let stderrSpy: MockInstance;

        function stdoutText(): string {
            return stdoutSpy.mock.calls.map(call => String(call[0])).join('');
        }

        beforeEach(() => {
            stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
            stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
        });

        afterEach(() => {
            stdoutSpy.mockRestore();
            stderrSpy.mockRestore();
            process.exitCode = undefined;
            setColorEnabled(true);
            setVerbosity('normal');
            resetLogger();
        });

        it('should run an eval pipeline', async () => {
            await createProgram().parseAsync(['node', 'linepipe', '-e', ':gen 1,=3 :join ,']);
            expect(stdoutText()).toBe('1,2,3\n');
            expect(process.exitCode).toBe(0);
        });

        it('should pass pipeline words through untouched', async () => {
            await createProgram().parseAsync(['node', 'linepipe', ':of', '-x', '--y', ':upper']);
            expect(stdoutText()).toBe('-X\n--Y\n');
        });

        it('should apply flags given before the pipeline', async () => {
            await createProgram().parseAsync(['node', 'linepipe', '-n', ':of', 'A', 'a', ':uniq']);
            expect(stdoutText()).toBe('A\n');
        });

        it('should print a topic', async () => {
            await createProgram().parseAsync(['node', 'linepipe', '--topic', 'output']);
            expect(stdoutText()).toContain(':to clip[ lf|crlf]');
            expect(process.exitCode).toBe(0);
        });

        it('should set the exit status of a failed pipeline', async () => {
            await createProgram().parseAsync(['node', 'linepipe', ':slice', '-1']);
            expect(process.exitCode).toBe(2);
        });

        it('should reject unknown topics', async () => {
            const program = createProgram()
                .exitOverride()
                .configureOutput({ writeErr: () => {} });
            await expect(program.parseAsync(['node', 'linepipe', '--topic', 'nope']))
                .rejects.toMatchObject({ code: 'commander.invalidArgument' });
        });
    });
});
