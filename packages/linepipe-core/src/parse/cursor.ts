/**
 * TokenCursor
 *
 * Forward-only cursor over the words of a pipeline. Parsers peek, commit to
 * a keyword, and consume arguments through it.
 */

import { isCommandToken, unescapeArg } from '../token/reader';

export class TokenCursor {
    private pos = 0;

    constructor(private readonly words: readonly string[]) {}

    get done(): boolean {
        return this.pos >= this.words.length;
    }

    /** Words not yet consumed */
    remaining(): string[] {
        return this.words.slice(this.pos);
    }

    peek(): string | undefined {
        return this.words[this.pos];
    }

    next(): string | undefined {
        const word = this.words[this.pos];
        if (word !== undefined) {
            this.pos += 1;
        }
        return word;
    }

    /** Whether the next word is a plain argument rather than a command */
    hasArg(): boolean {
        const word = this.peek();
        return word !== undefined && !isCommandToken(word);
    }

    /**
     * Consume the next word if it equals `keyword` (case-insensitive).
     */
    acceptKeyword(keyword: string): boolean {
        const word = this.peek();
        if (word !== undefined && word.toLowerCase() === keyword.toLowerCase()) {
            this.pos += 1;
            return true;
        }
        return false;
    }

    /**
     * Consume one of `keywords`, returning the canonical (table) spelling.
     */
    acceptOneOf<K extends string>(keywords: readonly K[]): K | undefined {
        const word = this.peek()?.toLowerCase();
        const match = keywords.find(k => k.toLowerCase() === word);
        if (match !== undefined) {
            this.pos += 1;
        }
        return match;
    }

    /**
     * Consume the next word when it is a plain argument (not a command),
     * with its leading-colon escape removed.
     */
    acceptArg(): string | undefined {
        const word = this.peek();
        if (word === undefined || isCommandToken(word)) {
            return undefined;
        }
        this.pos += 1;
        return unescapeArg(word);
    }

    /**
     * Consume the next word when `test` accepts it.
     */
    acceptIf(test: (word: string) => boolean): string | undefined {
        const word = this.peek();
        if (word === undefined || isCommandToken(word) || !test(word)) {
            return undefined;
        }
        this.pos += 1;
        return word;
    }
}
