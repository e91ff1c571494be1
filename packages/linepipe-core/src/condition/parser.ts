/**
 * Condition grammar
 *
 *   condition := 'not'? selector
 *   selector  := 'len' (range | spec) | 'num' (range | spec | 'integer' | 'float')?
 *              | 'upper' | 'lower' | 'ascii' | 'nonascii' | 'empty' | 'blank'
 *              | 'reg' pattern
 *   range     := min? ',' max?      (at least one bound)
 *   spec      := '='? value
 */

import { ErrorCode, LinepipeError } from '../errors';
import { TokenCursor } from '../parse/cursor';
import { isCommandToken } from '../token/reader';
import { Condition, Select } from './condition';
import { Num, parseNum, parseNumArg } from './num';
import { compileFullMatch } from './regex';

const LENGTH_PATTERN = /^\d+$/;

interface SelectParser {
    keyword: string;
    parse(cursor: TokenCursor, command: string): Select;
}

function missing(command: string, arg: string): LinepipeError {
    return new LinepipeError(`${command}: missing <${arg}>`, {
        code: ErrorCode.MISSING_ARG,
        meta: { command, arg },
    });
}

function parseLength(text: string, command: string): number {
    if (!LENGTH_PATTERN.test(text)) {
        throw new LinepipeError(`${command}: invalid number "${text}" for <len>`, {
            code: ErrorCode.PARSE_NUM,
            meta: { command, arg: 'len', value: text },
        });
    }
    return Number(text);
}

/**
 * Split "min,max" into optional bounds. Returns undefined when the word is
 * not a range (no comma).
 */
function splitBounds(word: string, command: string, arg: string): [string | undefined, string | undefined] | undefined {
    const comma = word.indexOf(',');
    if (comma < 0) {
        return undefined;
    }
    const min = word.slice(0, comma);
    const max = word.slice(comma + 1);
    if ((min === '' && max === '') || max.includes(',')) {
        throw new LinepipeError(`${command}: invalid range "${word}" for <${arg}>`, {
            code: ErrorCode.ARG_PARSE,
            meta: { command, arg, value: word },
        });
    }
    return [min === '' ? undefined : min, max === '' ? undefined : max];
}

function parseLen(cursor: TokenCursor, command: string): Select {
    const word = cursor.acceptArg();
    if (word === undefined) {
        throw missing(command, 'len');
    }
    const bounds = splitBounds(word, command, 'len');
    if (bounds) {
        const [min, max] = bounds;
        return {
            kind: 'text-len-range',
            min: min === undefined ? undefined : parseLength(min, command),
            max: max === undefined ? undefined : parseLength(max, command),
        };
    }
    return { kind: 'text-len-spec', len: parseLength(word.startsWith('=') ? word.slice(1) : word, command) };
}

function isNumOperand(word: string): boolean {
    if (word.includes(',')) {
        return true;
    }
    return parseNum(word.startsWith('=') ? word.slice(1) : word) !== undefined;
}

function parseNumSelect(cursor: TokenCursor, command: string): Select {
    const numberClass = cursor.acceptOneOf(['integer', 'float'] as const);
    if (numberClass !== undefined) {
        return { kind: 'number', numberClass };
    }

    const word = cursor.acceptIf(isNumOperand);
    if (word === undefined) {
        return { kind: 'number', numberClass: 'any' };
    }

    const bounds = splitBounds(word, command, 'num');
    if (bounds) {
        const [min, max] = bounds;
        const parseBound = (text: string | undefined): Num | undefined =>
            text === undefined ? undefined : parseNumArg(text, command, 'num');
        return { kind: 'num-range', min: parseBound(min), max: parseBound(max) };
    }
    return { kind: 'num-spec', value: parseNumArg(word.startsWith('=') ? word.slice(1) : word, command, 'num') };
}

const SELECT_PARSERS: readonly SelectParser[] = [
    { keyword: 'len', parse: parseLen },
    { keyword: 'num', parse: parseNumSelect },
    { keyword: 'upper', parse: () => ({ kind: 'text-case', textCase: 'upper' }) },
    { keyword: 'lower', parse: () => ({ kind: 'text-case', textCase: 'lower' }) },
    { keyword: 'ascii', parse: () => ({ kind: 'asciiness', ascii: true }) },
    { keyword: 'nonascii', parse: () => ({ kind: 'asciiness', ascii: false }) },
    { keyword: 'empty', parse: () => ({ kind: 'empty-or-blank', blank: false }) },
    { keyword: 'blank', parse: () => ({ kind: 'empty-or-blank', blank: true }) },
    {
        keyword: 'reg',
        parse: (cursor, command) => {
            const pattern = cursor.acceptArg();
            if (pattern === undefined) {
                throw missing(command, 'pattern');
            }
            return { kind: 'regex', pattern, regex: compileFullMatch(pattern) };
        },
    },
];

/**
 * Parse a condition for `command` (used in error messages).
 */
export function parseCondition(cursor: TokenCursor, command: string): Condition {
    const not = cursor.acceptKeyword('not');

    for (const parser of SELECT_PARSERS) {
        if (cursor.acceptKeyword(parser.keyword)) {
            return Object.freeze({ select: parser.parse(cursor, command), not });
        }
    }

    const word = cursor.peek();
    if (word === undefined || isCommandToken(word)) {
        throw missing(command, 'condition');
    }
    throw new LinepipeError(`${command}: unknown condition "${word}"`, {
        code: ErrorCode.ARG_PARSE,
        meta: { command, arg: 'condition', value: word },
    });
}
