/**
 * Stages
 *
 * Each operator becomes a function from an upstream item stream to a
 * downstream one. Streams are lazy: a stage pulls from upstream only when
 * its own consumer asks for the next item, and whole-stream stages (sort,
 * count) are the only ones that read their input to the end first.
 */

import { testCondition } from '../condition/condition';
import { PipeConfig } from '../config';
import { PipeIO } from '../io/types';
import { Item, itemText } from '../item';
import { convertCase, createReplacer } from '../ops/text-ops';
import { sortItems } from '../ops/sort';
import { createTrimmer } from '../ops/trim';
import { chunkJoin, joinTexts } from './chunk-join';
import { openFileSink, Sink, stdoutSink } from './sink';
import { sliceStream } from './slice';
import { OpSpec } from './types';

export type Stream = AsyncIterable<Item>;
export type Stage = (upstream: Stream) => Stream;

export interface StageContext {
    io: PipeIO;
    config: PipeConfig;
    /** Sinks opened by stages; closed by the driver when the run ends */
    resources: Sink[];
    /** Random source for `:sort random` */
    random?: () => number;
}

// ============================================================================
// Stage kinds
// ============================================================================

function mapStage(fn: (item: Item) => Item): Stage {
    return async function* (upstream) {
        for await (const item of upstream) {
            yield fn(item);
        }
    };
}

function filterStage(predicate: (item: Item) => boolean): Stage {
    return async function* (upstream) {
        for await (const item of upstream) {
            if (predicate(item)) {
                yield item;
            }
        }
    };
}

function textStage(fn: (text: string) => string): Stage {
    return mapStage(item => fn(itemText(item)));
}

function peekStage(sink: Sink): Stage {
    return async function* (upstream) {
        for await (const item of upstream) {
            await sink.write(item);
            yield item;
        }
    };
}

function takeWhileStage(predicate: (item: Item) => boolean): Stage {
    return async function* (upstream) {
        for await (const item of upstream) {
            if (!predicate(item)) {
                return;
            }
            yield item;
        }
    };
}

function dropWhileStage(predicate: (item: Item) => boolean): Stage {
    return async function* (upstream) {
        let dropping = true;
        for await (const item of upstream) {
            if (dropping && predicate(item)) {
                continue;
            }
            dropping = false;
            yield item;
        }
    };
}

function wholeStreamStage(fn: (items: Item[]) => Item[]): Stage {
    return async function* (upstream) {
        const items: Item[] = [];
        for await (const item of upstream) {
            items.push(item);
        }
        yield* fn(items);
    };
}

async function* countStage(upstream: Stream): AsyncGenerator<Item> {
    let count = 0n;
    for await (const _ of upstream) {
        count += 1n;
    }
    yield count;
}

function uniqStage(nocase: boolean): Stage {
    const seen = new Set<string>();
    return filterStage(item => {
        const text = itemText(item);
        const key = nocase ? text.toLowerCase() : text;
        if (seen.has(key)) {
            return false;
        }
        seen.add(key);
        return true;
    });
}

async function* texts(upstream: Stream): AsyncGenerator<string> {
    for await (const item of upstream) {
        yield itemText(item);
    }
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Build the stage for one operator. Peek files are opened here, before any
 * item is read.
 */
export async function buildStage(op: OpSpec, context: StageContext): Promise<Stage> {
    const globalNocase = context.config.nocase;

    switch (op.kind) {
        case 'peek': {
            const sink = op.target === undefined
                ? stdoutSink(context.io)
                : await openFileSink(context.io, op.target, context.config);
            context.resources.push(sink);
            return peekStage(sink);
        }
        case 'case': {
            const { mode } = op;
            return mapStage(item => typeof item === 'bigint' ? item : convertCase(item, mode));
        }
        case 'replace':
            return textStage(createReplacer(op.from, op.to, {
                count: op.count,
                nocase: op.nocase || globalNocase,
            }));
        case 'trim':
            return textStage(createTrimmer(op.target, op.position, op.nocase || globalNocase));
        case 'uniq':
            return uniqStage(op.nocase || globalNocase);
        case 'join': {
            const { batch } = op;
            if (batch !== undefined) {
                return upstream => chunkJoin(texts(upstream), batch, op);
            }
            return wholeStreamStage(items => [joinTexts(items.map(itemText), op)]);
        }
        case 'slice':
            return upstream => sliceStream(upstream, op.ranges);
        case 'take-drop': {
            const { condition } = op;
            const predicate = (item: Item): boolean => testCondition(condition, item);
            if (op.mode === 'take') {
                return op.whileMode ? takeWhileStage(predicate) : filterStage(predicate);
            }
            return op.whileMode ? dropWhileStage(predicate) : filterStage(item => !predicate(item));
        }
        case 'count':
            return countStage;
        case 'sort': {
            const spec = op.sort.kind === 'text'
                ? { ...op.sort, nocase: op.sort.nocase || globalNocase }
                : op.sort;
            return wholeStreamStage(items => sortItems(items, spec, context.random));
        }
    }
}
