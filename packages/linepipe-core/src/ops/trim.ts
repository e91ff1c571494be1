/**
 * Trim operator family
 *
 * Strips whitespace, a literal substring, or characters of a set from the
 * start, the end or both ends of an item. A substring is stripped as long
 * as the boundary still begins (or ends) with the whole pattern. With
 * `nocase` the pattern is folded once, when the trimmer is built.
 */

import { TrimPosition, TrimTarget } from '../pipeline/types';

const LEADING_SPACE = /^\p{White_Space}+/u;
const TRAILING_SPACE = /\p{White_Space}+$/u;

function fold(ch: string): string {
    return ch.toLowerCase();
}

function trimWhitespace(text: string, position: TrimPosition): string {
    let result = text;
    if (position !== 'end') {
        result = result.replace(LEADING_SPACE, '');
    }
    if (position !== 'start') {
        result = result.replace(TRAILING_SPACE, '');
    }
    return result;
}

function createSubstringTrimmer(pattern: string, position: TrimPosition, nocase: boolean): (text: string) => string {
    const normalize = nocase ? fold : (ch: string) => ch;
    const needle = Array.from(pattern, normalize);

    return text => {
        const chars = Array.from(text);
        const matchesAt = (offset: number): boolean =>
            needle.every((ch, i) => normalize(chars[offset + i]) === ch);

        let start = 0;
        let end = chars.length;
        if (position !== 'end') {
            while (end - start >= needle.length && matchesAt(start)) {
                start += needle.length;
            }
        }
        if (position !== 'start') {
            while (end - start >= needle.length && matchesAt(end - needle.length)) {
                end -= needle.length;
            }
        }
        return chars.slice(start, end).join('');
    };
}

function createCharTrimmer(pattern: string, position: TrimPosition, nocase: boolean): (text: string) => string {
    const normalize = nocase ? fold : (ch: string) => ch;
    const set = new Set(Array.from(pattern, normalize));

    return text => {
        const chars = Array.from(text);
        let start = 0;
        let end = chars.length;
        if (position !== 'end') {
            while (start < end && set.has(normalize(chars[start]))) {
                start += 1;
            }
        }
        if (position !== 'start') {
            while (end > start && set.has(normalize(chars[end - 1]))) {
                end -= 1;
            }
        }
        return chars.slice(start, end).join('');
    };
}

export function createTrimmer(target: TrimTarget, position: TrimPosition, nocase: boolean): (text: string) => string {
    if (target.kind !== 'whitespace' && target.pattern === '') {
        return text => trimWhitespace(text, position);
    }
    switch (target.kind) {
        case 'whitespace':
            return text => trimWhitespace(text, position);
        case 'substring':
            return createSubstringTrimmer(target.pattern, position, nocase);
        case 'chars':
            return createCharTrimmer(target.pattern, position, nocase);
    }
}
