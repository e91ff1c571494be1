/**
 * Per-item text operators: case conversion and replacement.
 */

import { CaseMode } from '../pipeline/types';

export function convertCase(text: string, mode: CaseMode): string {
    switch (mode) {
        case 'upper':
            return text.toUpperCase();
        case 'lower':
            return text.toLowerCase();
        case 'switch':
            return Array.from(text, ch => {
                if (/\p{Lowercase}/u.test(ch)) {
                    return ch.toUpperCase();
                }
                return /\p{Uppercase}/u.test(ch) ? ch.toLowerCase() : ch;
            }).join('');
    }
}

export interface ReplaceOptions {
    /** Maximum number of replacements; undefined replaces every match */
    count?: number;
    nocase?: boolean;
}

function escapeRegExp(text: string): string {
    return text.replace(/[\\^$.*+?()[\]{}|/]/g, '\\$&');
}

/**
 * Build a replacer for `from` -> `to`. Matches are found left to right
 * without overlap; an empty `from` matches at every character boundary.
 */
export function createReplacer(from: string, to: string, options: ReplaceOptions = {}): (text: string) => string {
    const { count } = options;
    if (count === 0) {
        return text => text;
    }
    const pattern = new RegExp(escapeRegExp(from), options.nocase ? 'giu' : 'gu');

    return text => {
        let replaced = 0;
        return text.replace(pattern, match => {
            if (count !== undefined && replaced >= count) {
                return match;
            }
            replaced += 1;
            return to;
        });
    };
}
