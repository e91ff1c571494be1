/**
 * Token Reader
 *
 * Splits a single token string into words using shell-like quoting rules:
 *
 * - unquoted runs end at whitespace or a quote
 * - "double quotes" keep whitespace and understand backslash escapes
 * - 'single quotes' are taken literally
 * - adjacent parts join into one word (he""llo -> hello)
 *
 * Recognized escapes are \\ \" \' \<space> \n \r \t. Any other backslash
 * sequence is kept as written, so \[ and \: reach the grammar untouched.
 */

import { ErrorCode, LinepipeError } from '../errors';

const ESCAPES: Readonly<Record<string, string>> = {
    '\\': '\\',
    '"': '"',
    '\'': '\'',
    ' ': ' ',
    n: '\n',
    r: '\r',
    t: '\t',
};

const COMMAND_PATTERN = /^:[A-Za-z0-9_.-]+$/;

function isWhitespace(ch: string): boolean {
    return /\s/u.test(ch);
}

/**
 * Split `input` into words.
 *
 * @throws LinepipeError (PARSE_TOKEN) on an unterminated quote
 */
export function tokenize(input: string): string[] {
    const chars = Array.from(input);
    const words: string[] = [];
    let pos = 0;

    const readEscape = (): string => {
        // chars[pos] is the backslash
        const next = chars[pos + 1];
        if (next === undefined) {
            pos += 1;
            return '\\';
        }
        pos += 2;
        return ESCAPES[next] ?? `\\${next}`;
    };

    const readQuoted = (quote: string): string => {
        const start = pos;
        let text = '';
        pos += 1;
        while (pos < chars.length) {
            const ch = chars[pos];
            if (ch === quote) {
                pos += 1;
                return text;
            }
            if (ch === '\\' && quote === '"') {
                text += readEscape();
            } else {
                text += ch;
                pos += 1;
            }
        }
        throw new LinepipeError(`unterminated ${quote} quote starting at column ${start + 1}`, {
            code: ErrorCode.PARSE_TOKEN,
            meta: { value: input },
        });
    };

    while (pos < chars.length) {
        if (isWhitespace(chars[pos])) {
            pos += 1;
            continue;
        }

        let word = '';
        while (pos < chars.length && !isWhitespace(chars[pos])) {
            const ch = chars[pos];
            if (ch === '"' || ch === '\'') {
                word += readQuoted(ch);
            } else if (ch === '\\') {
                word += readEscape();
            } else {
                word += ch;
                pos += 1;
            }
        }
        words.push(word);
    }

    return words;
}

/**
 * Whether `word` names a command (":" followed by letters, digits, "_", "." or "-").
 */
export function isCommandToken(word: string): boolean {
    return COMMAND_PATTERN.test(word);
}

/**
 * Undo the leading-colon escape of an argument value: "::x" and "\:x" both
 * become ":x". Other values are returned unchanged.
 */
export function unescapeArg(word: string): string {
    if (word.startsWith('::') || word.startsWith('\\:')) {
        return word.slice(1);
    }
    return word;
}
