/**
 * Input commands
 *
 *   :in | :file <name>+ | :clip | :of <value>+ | :gen <range>[ <fmt>] | :repeat <value>[ <count>]
 */

import { compileFormat } from '../format/format-engine';
import { InputSpec } from '../pipeline/types';
import { acceptCount, parseArgList, requireArg } from './args';
import { CommandParser, matchCommand } from './command';
import { TokenCursor } from './cursor';
import { parseGenRange } from './range';

export const INPUT_PARSERS: readonly CommandParser<InputSpec>[] = [
    { keyword: ':in', parse: () => ({ kind: 'stdin' }) },
    { keyword: ':file', parse: (cursor, command) => ({ kind: 'file', paths: parseArgList(cursor, command, 'file') }) },
    { keyword: ':clip', parse: () => ({ kind: 'clip' }) },
    { keyword: ':of', parse: (cursor, command) => ({ kind: 'of', values: parseArgList(cursor, command, 'value') }) },
    {
        keyword: ':gen',
        parse: (cursor, command) => {
            const range = parseGenRange(requireArg(cursor, command, 'range'), command);
            const template = cursor.acceptArg();
            return template === undefined
                ? { kind: 'gen', range }
                : { kind: 'gen', range, format: compileFormat(template) };
        },
    },
    {
        keyword: ':repeat',
        parse: (cursor, command) => {
            const value = requireArg(cursor, command, 'value');
            return { kind: 'repeat', value, count: acceptCount(cursor, command, 'count') };
        },
    },
];

/**
 * Parse the input command, defaulting to standard input.
 */
export function parseInput(cursor: TokenCursor): InputSpec {
    return matchCommand(cursor, INPUT_PARSERS) ?? { kind: 'stdin' };
}
