/**
 * Argument helpers shared by the command parsers.
 */

import { LineEnding } from '../config';
import { ErrorCode, LinepipeError } from '../errors';
import { FileTarget } from '../pipeline/types';
import { unescapeArg } from '../token/reader';
import { TokenCursor } from './cursor';

const INTEGER_PATTERN = /^[+-]?\d+$/;

export function missingArg(command: string, arg: string): LinepipeError {
    return new LinepipeError(`${command}: missing <${arg}>`, {
        code: ErrorCode.MISSING_ARG,
        meta: { command, arg },
    });
}

export function invalidArg(command: string, arg: string, value: string, reason: string): LinepipeError {
    return new LinepipeError(`${command}: ${reason} "${value}" for <${arg}>`, {
        code: ErrorCode.ARG_PARSE,
        meta: { command, arg, value },
    });
}

export function isIntegerWord(word: string): boolean {
    return INTEGER_PATTERN.test(word);
}

export function requireArg(cursor: TokenCursor, command: string, arg: string): string {
    const value = cursor.acceptArg();
    if (value === undefined) {
        throw missingArg(command, arg);
    }
    return value;
}

function unescapeBracket(word: string): string {
    return word === '\\[' || word === '\\]' ? word.slice(1) : word;
}

/**
 * One or more values: either bare words up to the next command, or a
 * bracketed list `[ a b c ]` which may contain anything but a lone "]".
 */
export function parseArgList(cursor: TokenCursor, command: string, arg: string): string[] {
    const values: string[] = [];

    if (cursor.peek() === '[') {
        cursor.next();
        for (;;) {
            const word = cursor.next();
            if (word === undefined) {
                throw new LinepipeError(`${command}: "[" list for <${arg}> is not closed`, {
                    code: ErrorCode.MISSING_ARG,
                    meta: { command, arg },
                });
            }
            if (word === ']') {
                break;
            }
            values.push(unescapeBracket(unescapeArg(word)));
        }
    } else {
        for (let word = cursor.acceptArg(); word !== undefined; word = cursor.acceptArg()) {
            values.push(unescapeBracket(word));
        }
    }

    if (values.length === 0) {
        throw missingArg(command, arg);
    }
    return values;
}

/**
 * A count that must be zero or more.
 */
export function parseCount(word: string, command: string, arg: string): number {
    if (!isIntegerWord(word)) {
        throw invalidArg(command, arg, word, 'invalid count');
    }
    const value = Number(word);
    if (value < 0) {
        throw new LinepipeError(`${command}: <${arg}> must not be negative, got ${word}`, {
            code: ErrorCode.INVALID_NON_NEGATIVE_INT,
            meta: { command, arg, value: word },
        });
    }
    return value;
}

/**
 * A count that must be one or more.
 */
export function parsePositiveCount(word: string, command: string, arg: string): number {
    if (!isIntegerWord(word)) {
        throw invalidArg(command, arg, word, 'invalid count');
    }
    const value = Number(word);
    if (value <= 0) {
        throw new LinepipeError(`${command}: <${arg}> must be positive, got ${word}`, {
            code: ErrorCode.INVALID_POSITIVE_INT,
            meta: { command, arg, value: word },
        });
    }
    return value;
}

/**
 * An optional count: consumed only when the next word looks like an integer.
 */
export function acceptCount(cursor: TokenCursor, command: string, arg: string): number | undefined {
    const word = cursor.acceptIf(isIntegerWord);
    return word === undefined ? undefined : parseCount(word, command, arg);
}

export function acceptLineEnding(cursor: TokenCursor): LineEnding | undefined {
    return cursor.acceptOneOf(['lf', 'crlf'] as const);
}

/**
 * `<name>[ append][ lf|crlf]`
 */
export function parseFileTarget(cursor: TokenCursor, command: string): FileTarget {
    const path = requireArg(cursor, command, 'file');
    const append = cursor.acceptKeyword('append');
    return { path, append, lineEnding: acceptLineEnding(cursor) };
}
