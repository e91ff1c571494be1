/**
 * Range literals for `:gen` and `:slice`.
 */

import { I64_MAX, I64_MIN } from '../item';
import { GenRange, SliceRange } from '../pipeline/types';
import { invalidArg } from './args';

const GEN_RANGE_PATTERN = /^([+-]?\d+)(?:,(=)?([+-]?\d+)?(?:,([+-]?\d+))?)?$/;
const SLICE_RANGE_PATTERN = /^(\d+)?,(\d+)?$/;
const INDEX_PATTERN = /^\d+$/;

function toI64(text: string, command: string, word: string): bigint {
    const value = BigInt(text);
    if (value < I64_MIN || value > I64_MAX) {
        throw invalidArg(command, 'range', word, 'out of range value in');
    }
    return value;
}

/**
 * `start[,[=][end][,step]]`; end defaults to the largest 64-bit integer,
 * step to 1. A leading "=" on end makes it inclusive.
 */
export function parseGenRange(word: string, command: string): GenRange {
    const match = GEN_RANGE_PATTERN.exec(word);
    if (!match) {
        throw invalidArg(command, 'range', word, 'invalid range');
    }
    const [, start, inclusive, end, step] = match;

    const range: GenRange = {
        start: toI64(start, command, word),
        end: end === undefined ? I64_MAX : toI64(end, command, word),
        inclusive: inclusive !== undefined,
        step: step === undefined ? 1n : toI64(step, command, word),
    };
    if (range.step === 0n) {
        throw invalidArg(command, 'range', word, 'step must not be zero in');
    }
    return range;
}

/**
 * `min,max`, `min,`, `,max` or a single index `n`.
 */
export function parseSliceRange(word: string, command: string): SliceRange {
    if (INDEX_PATTERN.test(word)) {
        const index = Number(word);
        return { min: index, max: index };
    }
    const match = SLICE_RANGE_PATTERN.exec(word);
    if (!match || (match[1] === undefined && match[2] === undefined)) {
        throw invalidArg(command, 'range', word, 'invalid range');
    }
    return {
        min: match[1] === undefined ? undefined : Number(match[1]),
        max: match[2] === undefined ? undefined : Number(match[2]),
    };
}
