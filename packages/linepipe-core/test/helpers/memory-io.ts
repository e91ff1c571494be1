/**
 * In-memory PipeIO for tests: files, stdin and clipboard live in plain
 * objects, and every write is recorded.
 */

import { PipeIO, TextWriter } from '../../src/io/types';

export interface MemoryIO extends PipeIO {
    files: Map<string, string>;
    stdoutText(): string;
    clipboard: string;
    /** Number of lines pulled from each input, keyed by path ('<stdin>' for stdin) */
    reads: Map<string, number>;
}

export interface MemoryIOOptions {
    stdin?: string[];
    files?: Record<string, string>;
    clipboard?: string;
    /** Paths whose open should fail */
    unwritable?: string[];
}

function enoent(path: string): Error {
    return Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
}

export function createMemoryIO(options: MemoryIOOptions = {}): MemoryIO {
    const files = new Map(Object.entries(options.files ?? {}));
    const reads = new Map<string, number>();
    let stdout = '';
    const unwritable = new Set(options.unwritable ?? []);

    async function* lines(key: string, source: readonly string[]): AsyncGenerator<string> {
        for (const line of source) {
            reads.set(key, (reads.get(key) ?? 0) + 1);
            yield line;
        }
    }

    const io: MemoryIO = {
        files,
        reads,
        clipboard: options.clipboard ?? '',
        stdoutText: () => stdout,
        readStdin: () => lines('<stdin>', options.stdin ?? []),
        readFileLines: (path: string) => {
            const content = files.get(path);
            if (content === undefined) {
                return (async function* (): AsyncGenerator<string> {
                    throw enoent(path);
                })();
            }
            return lines(path, content.split('\n').filter((line, i, all) => i < all.length - 1 || line !== ''));
        },
        readClipboard: async () => io.clipboard,
        writeClipboard: async (text: string) => {
            io.clipboard = text;
        },
        openFile: async (path: string, append: boolean): Promise<TextWriter> => {
            if (unwritable.has(path)) {
                throw Object.assign(new Error(`EACCES: permission denied, open '${path}'`), { code: 'EACCES' });
            }
            if (!append || !files.has(path)) {
                files.set(path, '');
            }
            return {
                write: async (text: string) => {
                    files.set(path, (files.get(path) ?? '') + text);
                },
                close: async () => {},
            };
        },
        stdout: {
            write: async (text: string) => {
                stdout += text;
            },
            close: async () => {},
        },
    };
    return io;
}
