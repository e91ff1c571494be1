/**
 * Run Command Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { ErrorCode, nullLogger, resetLogger, setLogger } from 'linepipe-core';
import type { PipeIO } from 'linepipe-core';
import { executeRun, parseCommandLine } from '../../src/commands/run';
import type { RunCommandOptions } from '../../src/commands/run';
import { setColorEnabled, SYMBOLS } from '../../src/logger';
import { createMemoryIO } from '../helpers/memory-io';
import { catchError } from '../helpers/errors';

function options(io: PipeIO, overrides: Partial<RunCommandOptions> = {}): RunCommandOptions {
    return {
        nocase: false,
        skipOnError: false,
        lineEnding: 'lf',
        verbose: false,
        dryRun: false,
        io,
        ...overrides,
    };
}

describe('Run Command', () => {
    let stderrSpy: MockInstance;

    function stderrText(): string {
        return stderrSpy.mock.calls.map(call => String(call[0])).join('');
    }

    beforeEach(() => {
        setColorEnabled(false);
        setLogger(nullLogger);
        stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
        stderrSpy.mockRestore();
        resetLogger();
        setColorEnabled(true);
    });

    // ========================================================================
    // parseCommandLine
    // ========================================================================

    describe('parseCommandLine', () => {
        it('should parse positional words', () => {
            const pipeline = parseCommandLine([':of', 'a', ':upper'], undefined);
            expect(pipeline.input).toEqual({ kind: 'of', values: ['a'] });
            expect(pipeline.ops).toEqual([{ kind: 'case', mode: 'upper' }]);
        });

        it('should parse an eval token', () => {
            const pipeline = parseCommandLine([], ':of "a b"');
            expect(pipeline.input).toEqual({ kind: 'of', values: ['a b'] });
        });

        it('should reject words next to an eval token', () => {
            const error = catchError(() => parseCommandLine([':upper'], ':of a'));
            expect(error.code).toBe(ErrorCode.UNEXPECTED_REMAINING);
            expect(error.message).toBe('unexpected words after --eval: :upper');
        });
    });

    // ========================================================================
    // executeRun
    // ========================================================================

    describe('executeRun', () => {
        it('should run positional pipelines', async () => {
            const io = createMemoryIO();
            expect(await executeRun([':of', 'a', 'b', ':upper'], options(io))).toBe(0);
            expect(io.stdoutText()).toBe('A\nB\n');
        });

        it('should run eval pipelines', async () => {
            const io = createMemoryIO();
            expect(await executeRun([], options(io, { eval: ':gen 1,=3 :join ,' }))).toBe(0);
            expect(io.stdoutText()).toBe('1,2,3\n');
        });

        it('should read standard input by default', async () => {
            const io = createMemoryIO({}, ['x', 'y']);
            expect(await executeRun([':count'], options(io))).toBe(0);
            expect(io.stdoutText()).toBe('2\n');
        });

        it('should apply the global nocase flag', async () => {
            const io = createMemoryIO();
            expect(await executeRun([':of', 'A', 'a', ':uniq'], options(io, { nocase: true }))).toBe(0);
            expect(io.stdoutText()).toBe('A\n');
        });

        it('should use the configured line ending for files', async () => {
            const io = createMemoryIO();
            const words = [':of', 'a', 'b', ':to', 'file', 'out.txt'];
            expect(await executeRun(words, options(io, { lineEnding: 'crlf' }))).toBe(0);
            expect(io.files.get('out.txt')).toBe('a\r\nb\r\n');
        });

        it('should skip unreadable files when asked', async () => {
            const io = createMemoryIO({ 'b.txt': 'kept\n' });
            const words = [':file', 'missing.txt', 'b.txt'];
            expect(await executeRun(words, options(io, { skipOnError: true }))).toBe(0);
            expect(io.stdoutText()).toBe('kept\n');
        });

        it('should not run anything on a dry run', async () => {
            const io = createMemoryIO();
            const words = [':of', 'a', ':to', 'file', 'out.txt'];
            expect(await executeRun(words, options(io, { dryRun: true }))).toBe(0);
            expect(io.files.has('out.txt')).toBe(false);
            expect(stderrText()).toBe('');
        });

        it('should print the parsed pipeline when verbose', async () => {
            const io = createMemoryIO();
            const words = [':of', 'a', ':upper'];
            expect(await executeRun(words, options(io, { verbose: true, dryRun: true }))).toBe(0);
            expect(stderrText()).toBe('Pipeline\n  :of a\n  :upper\n  :to out\n(dry run, nothing executed)\n');
        });

        it('should report parse errors with their exit status', async () => {
            const io = createMemoryIO();
            expect(await executeRun([':upper', ':bogus'], options(io))).toBe(5);
            expect(stderrText()).toBe(`${SYMBOLS.error} [UNKNOWN_ARGS:5] unknown arguments: :bogus\n`);
        });

        it('should report input errors with their exit status', async () => {
            const io = createMemoryIO();
            expect(await executeRun([':file', 'missing.txt'], options(io))).toBe(7);
            expect(stderrText()).toBe(`${SYMBOLS.error} [READ_FILE:7] missing.txt: no such file or directory\n`);
        });

        it('should treat a closed stdout as success', async () => {
            const io: PipeIO = {
                ...createMemoryIO(),
                stdout: {
                    write: async () => {
                        throw Object.assign(new Error('write EPIPE'), { code: 'EPIPE' });
                    },
                    close: async () => {},
                },
            };
            expect(await executeRun([':repeat', 'y'], options(io))).toBe(0);
            expect(stderrText()).toBe('');
        });
    });
});
