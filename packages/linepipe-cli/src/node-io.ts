/**
 * Node.js PipeIO
 *
 * Standard streams, the file system and the OS clipboard for the CLI.
 * Clipboard access shells out to the platform tool: pbcopy/pbpaste on macOS,
 * clip/PowerShell on Windows, wl-clipboard under Wayland and xclip elsewhere.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import * as fs from 'fs';
import * as readline from 'readline';
import { spawn } from 'child_process';
import { once } from 'events';
import { Readable, Writable } from 'stream';
import { finished } from 'stream/promises';
import type { PipeIO, TextWriter } from 'linepipe-core';

// ============================================================================
// Writers
// ============================================================================

/**
 * TextWriter over a Node.js writable stream. Honors backpressure and
 * surfaces asynchronous stream errors on the next call.
 */
export class StreamWriter implements TextWriter {
    private failure: Error | undefined;

    constructor(private readonly stream: Writable, private readonly ownsStream: boolean) {
        stream.on('error', error => {
            this.failure = error;
        });
    }

    async write(text: string): Promise<void> {
        this.throwIfFailed();
        if (!this.stream.write(text)) {
            await once(this.stream, 'drain');
        }
    }

    async close(): Promise<void> {
        this.throwIfFailed();
        if (this.ownsStream) {
            this.stream.end();
            await finished(this.stream);
        }
    }

    private throwIfFailed(): void {
        if (this.failure) {
            throw this.failure;
        }
    }
}

// ============================================================================
// Readers
// ============================================================================

async function* readLines(input: Readable): AsyncGenerator<string> {
    const lines = readline.createInterface({ input, crlfDelay: Infinity });
    try {
        yield* lines;
    } finally {
        lines.close();
    }
}

async function* readFileLines(filePath: string): AsyncGenerator<string> {
    const handle = await fs.promises.open(filePath, 'r');
    const stream = handle.createReadStream({ encoding: 'utf8' });
    try {
        yield* readLines(stream);
    } finally {
        stream.destroy();
    }
}

// ============================================================================
// Clipboard
// ============================================================================

interface ClipboardCommands {
    read: [string, ...string[]];
    write: [string, ...string[]];
}

export function clipboardCommands(platform: NodeJS.Platform = process.platform, env: NodeJS.ProcessEnv = process.env): ClipboardCommands {
    if (platform === 'darwin') {
        return { read: ['pbpaste'], write: ['pbcopy'] };
    }
    if (platform === 'win32') {
        return {
            read: ['powershell', '-NoProfile', '-Command', 'Get-Clipboard -Raw'],
            write: ['clip'],
        };
    }
    if (env.WAYLAND_DISPLAY) {
        return { read: ['wl-paste', '--no-newline'], write: ['wl-copy'] };
    }
    return {
        read: ['xclip', '-selection', 'clipboard', '-o'],
        write: ['xclip', '-selection', 'clipboard'],
    };
}

/**
 * Run a command, optionally feeding it `input`, and resolve with its stdout.
 */
export function runCommand([command, ...args]: [string, ...string[]], input?: string): Promise<string> {
    return new Promise((resolve, reject) => {
        const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
        child.on('error', reject);
        child.stdin.on('error', reject);
        child.on('close', code => {
            if (code === 0) {
                resolve(Buffer.concat(stdout).toString('utf8'));
            } else {
                const detail = Buffer.concat(stderr).toString('utf8').trim();
                reject(new Error(`${command} exited with code ${code}${detail ? `: ${detail}` : ''}`));
            }
        });

        child.stdin.end(input ?? '');
    });
}

// ============================================================================
// Factory
// ============================================================================

export function createNodeIO(): PipeIO {
    const clipboard = clipboardCommands();

    return {
        readStdin: () => readLines(process.stdin),
        readFileLines,
        readClipboard: () => runCommand(clipboard.read),
        writeClipboard: async text => {
            await runCommand(clipboard.write, text);
        },
        openFile: async (filePath, append) => {
            const handle = await fs.promises.open(filePath, append ? 'a' : 'w');
            return new StreamWriter(handle.createWriteStream({ encoding: 'utf8' }), true);
        },
        stdout: new StreamWriter(process.stdout, false),
    };
}
