/**
 * Keyword tables
 *
 * Each command family is an ordered list of `(keyword, parser)` entries.
 * The first keyword that matches the next word commits the parse; an error
 * raised after that point is final.
 */

import { TokenCursor } from './cursor';

export interface CommandParser<T> {
    /** Command word, e.g. ":gen" (matched case-insensitively) */
    keyword: string;
    parse(cursor: TokenCursor, command: string): T;
}

export function matchCommand<T>(cursor: TokenCursor, parsers: readonly CommandParser<T>[]): T | undefined {
    for (const parser of parsers) {
        if (cursor.acceptKeyword(parser.keyword)) {
            return parser.parse(cursor, parser.keyword);
        }
    }
    return undefined;
}
