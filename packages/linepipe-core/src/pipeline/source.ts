/**
 * Sources
 *
 * Turn an input description into a lazy item stream. Nothing is read until
 * the first item is pulled.
 */

import { PipeConfig } from '../config';
import { ErrorCode, toLinepipeError } from '../errors';
import { CompiledFormat, renderFormat } from '../format/format-engine';
import { PipeIO } from '../io/types';
import { Item, splitLines } from '../item';
import { getLogger, LogCategory } from '../logger';
import { RangeIter } from './range-iter';
import { GenRange, InputSpec } from './types';

async function* readStdin(io: PipeIO): AsyncGenerator<Item> {
    try {
        yield* io.readStdin();
    } catch (error) {
        throw toLinepipeError(error, ErrorCode.READ_STDIN);
    }
}

async function* readFiles(io: PipeIO, paths: readonly string[], config: PipeConfig): AsyncGenerator<Item> {
    for (const filePath of paths) {
        let line = 0;
        try {
            for await (const text of io.readFileLines(filePath)) {
                line += 1;
                yield text;
            }
        } catch (error) {
            const wrapped = toLinepipeError(error, ErrorCode.READ_FILE, { filePath, line: line + 1 });
            if (!config.skipOnError) {
                throw wrapped;
            }
            getLogger().warn(LogCategory.IO, `Skipping rest of ${filePath}: ${wrapped.message}`);
        }
    }
}

async function* readClipboard(io: PipeIO): AsyncGenerator<Item> {
    let text: string;
    try {
        text = await io.readClipboard();
    } catch (error) {
        throw toLinepipeError(error, ErrorCode.READ_CLIPBOARD);
    }
    yield* splitLines(text);
}

async function* generate(range: GenRange, format: CompiledFormat | undefined): AsyncGenerator<Item> {
    for (const value of new RangeIter(range)) {
        yield format === undefined ? value : renderFormat(format, value);
    }
}

async function* repeat(value: string, count: number | undefined): AsyncGenerator<Item> {
    for (let i = 0; count === undefined || i < count; i++) {
        yield value;
    }
}

async function* values(items: readonly string[]): AsyncGenerator<Item> {
    yield* items;
}

export function openSource(input: InputSpec, io: PipeIO, config: PipeConfig): AsyncIterable<Item> {
    switch (input.kind) {
        case 'stdin':
            return readStdin(io);
        case 'file':
            return readFiles(io, input.paths, config);
        case 'clip':
            return readClipboard(io);
        case 'of':
            return values(input.values);
        case 'gen':
            return generate(input.range, input.format);
        case 'repeat':
            return repeat(input.value, input.count);
    }
}
