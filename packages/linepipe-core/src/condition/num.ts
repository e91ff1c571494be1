/**
 * Numeric literals
 *
 * A number is an integer when the text is a decimal integer within the
 * signed 64-bit range, otherwise a float when it is a finite float literal.
 * NaN and infinities are never numbers.
 */

import { ErrorCode, LinepipeError } from '../errors';
import { I64_MAX, I64_MIN } from '../item';

export type Num = bigint | number;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a signed 64-bit integer, or undefined.
 */
export function parseInteger(text: string): bigint | undefined {
    if (!INTEGER_PATTERN.test(text)) {
        return undefined;
    }
    const value = BigInt(text);
    return value >= I64_MIN && value <= I64_MAX ? value : undefined;
}

/**
 * Parse a finite float literal, or undefined.
 */
export function parseFloatLiteral(text: string): number | undefined {
    if (!FLOAT_PATTERN.test(text)) {
        return undefined;
    }
    const value = Number(text);
    return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse text as a number: integer first, then float.
 */
export function parseNum(text: string): Num | undefined {
    return parseInteger(text) ?? parseFloatLiteral(text);
}

/**
 * Like {@link parseNum} but raises PARSE_NUM for invalid text.
 */
export function parseNumArg(text: string, command: string, arg: string): Num {
    const value = parseNum(text);
    if (value === undefined) {
        throw new LinepipeError(`${command}: invalid number "${text}" for <${arg}>`, {
            code: ErrorCode.PARSE_NUM,
            meta: { command, arg, value: text },
        });
    }
    return value;
}

/**
 * Three-way comparison; mixed integer/float operands widen to float.
 */
export function compareNum(a: Num, b: Num): number {
    if (typeof a === 'bigint' && typeof b === 'bigint') {
        return a < b ? -1 : a > b ? 1 : 0;
    }
    const x = Number(a);
    const y = Number(b);
    return x < y ? -1 : x > y ? 1 : 0;
}
