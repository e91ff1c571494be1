/**
 * Pipeline parser
 *
 *   pipeline := input? op* output?
 *
 * Every parse error surfaces here, before any item is read.
 */

import { ErrorCode, LinepipeError } from '../errors';
import { Pipeline } from '../pipeline/types';
import { tokenize } from '../token/reader';
import { TokenCursor } from './cursor';
import { parseInput } from './input';
import { parseOps } from './ops';
import { parseOutput } from './output';

/**
 * Parse already-split words (e.g. shell argv).
 */
export function parsePipeline(words: readonly string[]): Pipeline {
    const cursor = new TokenCursor(words);

    const input = parseInput(cursor);
    const ops = parseOps(cursor);
    const output = parseOutput(cursor);

    if (!cursor.done) {
        const rest = cursor.remaining();
        throw new LinepipeError(`unknown arguments: ${rest.join(' ')}`, {
            code: ErrorCode.UNKNOWN_ARGS,
            meta: { value: rest.join(' ') },
        });
    }

    return Object.freeze({
        input,
        ops: Object.freeze(ops),
        output,
    });
}

/**
 * Parse a pipeline written as one token string.
 */
export function parseEvalToken(text: string): Pipeline {
    return parsePipeline(tokenize(text));
}
