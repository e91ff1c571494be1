/**
 * Index slicing for `:slice`, `:limit` and `:skip`.
 *
 * Ranges are inclusive on both ends. Inverted ranges are dropped and the
 * rest merged, so each upstream item whose index lies in any range is
 * yielded exactly once, in upstream order. Once the last range is behind
 * the current index the upstream is no longer pulled, which is what lets
 * `:limit` end an infinite source.
 */

import { SliceRange } from './types';

interface Span {
    min: number;
    max: number;
}

/**
 * Drop inverted ranges, then sort and merge overlapping or adjacent ones.
 */
export function normalizeRanges(ranges: readonly SliceRange[]): Span[] {
    const spans = ranges
        .map(range => ({ min: range.min ?? 0, max: range.max ?? Infinity }))
        .filter(span => span.min <= span.max)
        .sort((a, b) => a.min - b.min);

    const merged: Span[] = [];
    for (const span of spans) {
        const last = merged[merged.length - 1];
        if (last !== undefined && span.min <= last.max + 1) {
            last.max = Math.max(last.max, span.max);
        } else {
            merged.push({ ...span });
        }
    }
    return merged;
}

export async function* sliceStream<T>(upstream: AsyncIterable<T>, ranges: readonly SliceRange[]): AsyncGenerator<T> {
    const spans = normalizeRanges(ranges);
    if (spans.length === 0) {
        return;
    }

    let current = 0;
    let index = 0;
    for await (const item of upstream) {
        while (spans[current].max < index) {
            current += 1;
            if (current >= spans.length) {
                return;
            }
        }
        if (index >= spans[current].min) {
            yield item;
        }
        if (index === spans[spans.length - 1].max) {
            return;
        }
        index += 1;
    }
}
