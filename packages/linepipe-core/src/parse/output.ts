/**
 * Output commands
 *
 *   :to out | :to file <name>[ append][ lf|crlf] | :to clip[ lf|crlf]
 */

import { ErrorCode, LinepipeError } from '../errors';
import { OutputSpec } from '../pipeline/types';
import { acceptLineEnding, missingArg, parseFileTarget } from './args';
import { CommandParser, matchCommand } from './command';
import { TokenCursor } from './cursor';

export const OUTPUT_PARSERS: readonly CommandParser<OutputSpec>[] = [
    {
        keyword: ':to',
        parse: (cursor, command) => {
            const target = cursor.acceptOneOf(['out', 'file', 'clip'] as const);
            switch (target) {
                case 'out':
                    return { kind: 'stdout' };
                case 'file':
                    return { kind: 'file', target: parseFileTarget(cursor, `${command} file`) };
                case 'clip':
                    return { kind: 'clip', lineEnding: acceptLineEnding(cursor) };
                case undefined: {
                    const word = cursor.peek();
                    if (word === undefined) {
                        throw missingArg(command, 'target');
                    }
                    throw new LinepipeError(`${command}: unknown target "${word}"`, {
                        code: ErrorCode.ARG_PARSE,
                        meta: { command, arg: 'target', value: word },
                    });
                }
            }
        },
    },
];

/**
 * Parse the output command, defaulting to standard output.
 */
export function parseOutput(cursor: TokenCursor): OutputSpec {
    return matchCommand(cursor, OUTPUT_PARSERS) ?? { kind: 'stdout' };
}
