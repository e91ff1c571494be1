/**
 * Condition Engine
 *
 * Predicates over items used by `:take` and `:drop`. A condition is a
 * selector plus a `not` flag; the selector is evaluated to a plain boolean
 * first (input that is not a number simply fails numeric selectors) and
 * `not` then inverts that result.
 *
 * Evaluation never throws.
 */

import { charLength, Item, itemText } from '../item';
import { compareNum, Num, parseFloatLiteral, parseInteger, parseNum } from './num';

// ============================================================================
// Types
// ============================================================================

export type NumberClass = 'integer' | 'float' | 'any';

export type Select =
    | { kind: 'text-len-range'; min?: number; max?: number }
    | { kind: 'text-len-spec'; len: number }
    | { kind: 'num-range'; min?: Num; max?: Num }
    | { kind: 'num-spec'; value: Num }
    | { kind: 'number'; numberClass: NumberClass }
    | { kind: 'text-case'; textCase: 'upper' | 'lower' }
    | { kind: 'asciiness'; ascii: boolean }
    | { kind: 'empty-or-blank'; blank: boolean }
    | { kind: 'regex'; pattern: string; regex: RegExp };

export interface Condition {
    readonly select: Select;
    readonly not: boolean;
}

// ============================================================================
// Evaluation
// ============================================================================

function inRange<T>(value: T, min: T | undefined, max: T | undefined, compare: (a: T, b: T) => number): boolean {
    return (min === undefined || compare(value, min) >= 0)
        && (max === undefined || compare(value, max) <= 0);
}

function compareCounts(a: number, b: number): number {
    return a - b;
}

function testNumberClass(text: string, numberClass: NumberClass): boolean {
    switch (numberClass) {
        case 'integer':
            return parseInteger(text) !== undefined;
        case 'float':
            return parseInteger(text) === undefined && parseFloatLiteral(text) !== undefined;
        case 'any':
            return parseFloatLiteral(text) !== undefined;
    }
}

/**
 * Evaluate a selector, ignoring `not`.
 */
export function testSelect(select: Select, text: string): boolean {
    switch (select.kind) {
        case 'text-len-range':
            return inRange(charLength(text), select.min, select.max, compareCounts);
        case 'text-len-spec':
            return charLength(text) === select.len;
        case 'num-range': {
            const value = parseNum(text);
            return value !== undefined && inRange(value, select.min, select.max, compareNum);
        }
        case 'num-spec': {
            const value = parseNum(text);
            return value !== undefined && compareNum(value, select.value) === 0;
        }
        case 'number':
            return testNumberClass(text, select.numberClass);
        case 'text-case':
            return select.textCase === 'upper'
                ? !/\p{Lowercase}/u.test(text)
                : !/\p{Uppercase}/u.test(text);
        case 'asciiness':
            return select.ascii
                ? /^[\x00-\x7F]*$/.test(text)
                : /^[^\x00-\x7F]*$/u.test(text);
        case 'empty-or-blank':
            return select.blank ? /^\p{White_Space}*$/u.test(text) : text.length === 0;
        case 'regex':
            return select.regex.test(text);
    }
}

export function testCondition(condition: Condition, item: Item): boolean {
    return testSelect(condition.select, itemText(item)) !== condition.not;
}

// ============================================================================
// Description
// ============================================================================

function describeBounds(min: Num | undefined, max: Num | undefined): string {
    return `${min === undefined ? '' : min.toString()},${max === undefined ? '' : max.toString()}`;
}

/**
 * Render a condition back into command-language form.
 */
export function describeCondition(condition: Condition): string {
    const { select } = condition;
    let text: string;
    switch (select.kind) {
        case 'text-len-range':
            text = `len ${describeBounds(select.min, select.max)}`;
            break;
        case 'text-len-spec':
            text = `len ${select.len}`;
            break;
        case 'num-range':
            text = `num ${describeBounds(select.min, select.max)}`;
            break;
        case 'num-spec':
            text = `num ${select.value.toString()}`;
            break;
        case 'number':
            text = select.numberClass === 'any' ? 'num' : `num ${select.numberClass}`;
            break;
        case 'text-case':
            text = select.textCase;
            break;
        case 'asciiness':
            text = select.ascii ? 'ascii' : 'nonascii';
            break;
        case 'empty-or-blank':
            text = select.blank ? 'blank' : 'empty';
            break;
        case 'regex':
            text = `reg ${select.pattern}`;
            break;
    }
    return condition.not ? `not ${text}` : text;
}
