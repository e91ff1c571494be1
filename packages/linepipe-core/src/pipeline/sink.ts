/**
 * Sinks
 *
 * A sink consumes the final stream. `finish()` runs only after the stream
 * was drained successfully; `close()` always runs and releases handles.
 */

import { lineEndingText, PipeConfig } from '../config';
import { ErrorCode, toLinepipeError } from '../errors';
import { PipeIO, TextWriter } from '../io/types';
import { Item, itemText } from '../item';
import { FileTarget, OutputSpec } from './types';

export interface Sink {
    write(item: Item): Promise<void>;
    finish(): Promise<void>;
    close(): Promise<void>;
}

/**
 * Writes each item as one line through a TextWriter.
 */
export class LineSink implements Sink {
    constructor(
        private readonly writer: TextWriter,
        private readonly ending: string,
        private readonly label: string,
    ) {}

    async write(item: Item): Promise<void> {
        try {
            await this.writer.write(itemText(item) + this.ending);
        } catch (error) {
            throw toLinepipeError(error, ErrorCode.WRITE_FILE, { filePath: this.label });
        }
    }

    async finish(): Promise<void> {}

    async close(): Promise<void> {
        try {
            await this.writer.close();
        } catch (error) {
            throw toLinepipeError(error, ErrorCode.WRITE_FILE, { filePath: this.label });
        }
    }
}

/**
 * Collects items and writes them to the clipboard, joined by the line
 * ending, once the stream completes.
 */
export class ClipboardSink implements Sink {
    private readonly lines: string[] = [];

    constructor(private readonly io: PipeIO, private readonly ending: string) {}

    async write(item: Item): Promise<void> {
        this.lines.push(itemText(item));
    }

    async finish(): Promise<void> {
        try {
            await this.io.writeClipboard(this.lines.join(this.ending));
        } catch (error) {
            throw toLinepipeError(error, ErrorCode.WRITE_CLIPBOARD);
        }
    }

    async close(): Promise<void> {}
}

/**
 * Open a file for line output (used by `:to file` and `:peek <file>`).
 */
export async function openFileSink(io: PipeIO, target: FileTarget, config: PipeConfig): Promise<LineSink> {
    let writer: TextWriter;
    try {
        writer = await io.openFile(target.path, target.append);
    } catch (error) {
        throw toLinepipeError(error, ErrorCode.OPEN_FILE, { filePath: target.path });
    }
    return new LineSink(writer, lineEndingText(target.lineEnding ?? config.lineEnding), target.path);
}

export function stdoutSink(io: PipeIO): LineSink {
    return new LineSink(io.stdout, '\n', '<stdout>');
}

export async function openSink(output: OutputSpec, io: PipeIO, config: PipeConfig): Promise<Sink> {
    switch (output.kind) {
        case 'stdout':
            return stdoutSink(io);
        case 'file':
            return openFileSink(io, output.target, config);
        case 'clip':
            return new ClipboardSink(io, lineEndingText(output.lineEnding ?? config.lineEnding));
    }
}
