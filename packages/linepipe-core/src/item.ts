/**
 * Item model
 *
 * An item is either a line of text or a 64-bit integer (produced by `:gen`
 * and `:count`).
 */

export type Item = string | bigint;

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;

/**
 * Text form of an item.
 */
export function itemText(item: Item): string {
    return typeof item === 'bigint' ? item.toString() : item;
}

/**
 * Number of Unicode scalar values in `text`.
 */
export function charLength(text: string): number {
    let count = 0;
    for (const _ of text) {
        count++;
    }
    return count;
}

/**
 * Compare two strings by code point.
 */
export function compareCodePoints(a: string, b: string): number {
    const left = a[Symbol.iterator]();
    const right = b[Symbol.iterator]();
    for (;;) {
        const l = left.next();
        const r = right.next();
        if (l.done || r.done) {
            return l.done ? (r.done ? 0 : -1) : 1;
        }
        const diff = (l.value.codePointAt(0) ?? 0) - (r.value.codePointAt(0) ?? 0);
        if (diff !== 0) {
            return diff;
        }
    }
}

/**
 * Split text into lines the way line readers do: `\n` or `\r\n` terminate a
 * line, and a trailing terminator does not start an extra empty line.
 */
export function splitLines(text: string): string[] {
    if (text === '') {
        return [];
    }
    const lines = text.split('\n').map(line => line.endsWith('\r') ? line.slice(0, -1) : line);
    if (text.endsWith('\n')) {
        lines.pop();
    }
    return lines;
}
