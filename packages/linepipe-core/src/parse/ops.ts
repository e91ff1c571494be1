/**
 * Operator commands
 *
 *   :peek[ <file>[ append][ lf|crlf]]
 *   :upper | :lower | :case
 *   :replace <from> <to>[ <count>][ nocase]
 *   :trim | :ltrim | :rtrim | :trimc | :ltrimc | :rtrimc [<pattern>[ nocase]]
 *   :uniq[ nocase]
 *   :join[ <delimiter>[ <prefix>[ <postfix>[ <batch>]]]]
 *   :limit <count> | :skip <count> | :slice <range>+
 *   :take[ while] <condition> | :drop[ while] <condition>
 *   :count
 *   :sort[ nocase][ desc] | :sort num[ <default>][ desc] | :sort random
 */

import { parseCondition } from '../condition/parser';
import { ErrorCode, LinepipeError } from '../errors';
import { parseFloatLiteral, parseInteger, parseNum } from '../condition/num';
import { OpSpec, SortSpec, TrimPosition, TrimTarget } from '../pipeline/types';
import {
    acceptCount,
    parseArgList,
    parseCount,
    parseFileTarget,
    parsePositiveCount,
    requireArg,
} from './args';
import { CommandParser, matchCommand } from './command';
import { TokenCursor } from './cursor';
import { parseSliceRange } from './range';

function trimParser(keyword: string, position: TrimPosition, chars: boolean): CommandParser<OpSpec> {
    return {
        keyword,
        parse: cursor => {
            const pattern = cursor.acceptArg();
            let target: TrimTarget = { kind: 'whitespace' };
            let nocase = false;
            if (pattern !== undefined) {
                nocase = cursor.acceptKeyword('nocase');
                if (pattern !== '') {
                    target = chars ? { kind: 'chars', pattern } : { kind: 'substring', pattern };
                }
            }
            return { kind: 'trim', position, target, nocase };
        },
    };
}

function takeDropParser(mode: 'take' | 'drop'): CommandParser<OpSpec> {
    return {
        keyword: `:${mode}`,
        parse: (cursor, command) => {
            const whileMode = cursor.acceptKeyword('while');
            return { kind: 'take-drop', mode, whileMode, condition: parseCondition(cursor, command) };
        },
    };
}

function parseSort(cursor: TokenCursor): SortSpec {
    if (cursor.acceptKeyword('random')) {
        return { kind: 'random' };
    }

    const numeric = cursor.acceptKeyword('num');
    const defaultWord = numeric ? cursor.acceptIf(word => parseNum(word) !== undefined) : undefined;

    let nocase = false;
    let desc = false;
    for (;;) {
        if (!nocase && cursor.acceptKeyword('nocase')) {
            if (numeric) {
                throw new LinepipeError(':sort: nocase does not apply to num', {
                    code: ErrorCode.ARG_PARSE,
                    meta: { command: ':sort', value: 'nocase' },
                });
            }
            nocase = true;
        } else if (!desc && cursor.acceptKeyword('desc')) {
            desc = true;
        } else {
            break;
        }
    }

    if (!numeric) {
        return { kind: 'text', nocase, desc };
    }
    const defaultValue = defaultWord === undefined
        ? undefined
        : parseInteger(defaultWord) ?? parseFloatLiteral(defaultWord);
    return { kind: 'num', defaultValue, desc };
}

export const OP_PARSERS: readonly CommandParser<OpSpec>[] = [
    {
        keyword: ':peek',
        parse: (cursor, command) => cursor.hasArg()
            ? { kind: 'peek', target: parseFileTarget(cursor, command) }
            : { kind: 'peek' },
    },
    { keyword: ':upper', parse: () => ({ kind: 'case', mode: 'upper' }) },
    { keyword: ':lower', parse: () => ({ kind: 'case', mode: 'lower' }) },
    { keyword: ':case', parse: () => ({ kind: 'case', mode: 'switch' }) },
    {
        keyword: ':replace',
        parse: (cursor, command) => {
            const from = requireArg(cursor, command, 'from');
            const to = requireArg(cursor, command, 'to');
            const count = acceptCount(cursor, command, 'count');
            return { kind: 'replace', from, to, count, nocase: cursor.acceptKeyword('nocase') };
        },
    },
    trimParser(':trim', 'both', false),
    trimParser(':ltrim', 'start', false),
    trimParser(':rtrim', 'end', false),
    trimParser(':trimc', 'both', true),
    trimParser(':ltrimc', 'start', true),
    trimParser(':rtrimc', 'end', true),
    { keyword: ':uniq', parse: cursor => ({ kind: 'uniq', nocase: cursor.acceptKeyword('nocase') }) },
    {
        keyword: ':join',
        parse: (cursor, command) => {
            const delimiter = cursor.acceptArg();
            const prefix = delimiter === undefined ? undefined : cursor.acceptArg();
            const postfix = prefix === undefined ? undefined : cursor.acceptArg();
            const batch = postfix === undefined ? undefined : cursor.acceptArg();
            return {
                kind: 'join',
                delimiter: delimiter ?? '',
                prefix: prefix ?? '',
                postfix: postfix ?? '',
                batch: batch === undefined ? undefined : parsePositiveCount(batch, command, 'batch'),
            };
        },
    },
    {
        keyword: ':limit',
        parse: (cursor, command) => {
            const count = parseCount(requireArg(cursor, command, 'count'), command, 'count');
            return { kind: 'slice', ranges: [{ max: count - 1 }] };
        },
    },
    {
        keyword: ':skip',
        parse: (cursor, command) => {
            const count = parseCount(requireArg(cursor, command, 'count'), command, 'count');
            return { kind: 'slice', ranges: [{ min: count }] };
        },
    },
    {
        keyword: ':slice',
        parse: (cursor, command) => ({
            kind: 'slice',
            ranges: parseArgList(cursor, command, 'range').map(word => parseSliceRange(word, command)),
        }),
    },
    takeDropParser('take'),
    takeDropParser('drop'),
    { keyword: ':count', parse: () => ({ kind: 'count' }) },
    { keyword: ':sort', parse: cursor => ({ kind: 'sort', sort: parseSort(cursor) }) },
];

/**
 * Parse zero or more operators.
 */
export function parseOps(cursor: TokenCursor): OpSpec[] {
    const ops: OpSpec[] = [];
    for (let op = matchCommand(cursor, OP_PARSERS); op !== undefined; op = matchCommand(cursor, OP_PARSERS)) {
        ops.push(op);
    }
    return ops;
}
