/**
 * Whole-item regular expressions
 *
 * `reg <pattern>` must match the entire item. A leading inline flag group
 * such as `(?i)`, `(?m)`, `(?s)` or `(?ms)` turns on the corresponding
 * RegExp flags; the anchors are lookarounds, so `m` cannot loosen them.
 * Flag groups anywhere else are rejected.
 *
 * Escaped punctuation that is not regex syntax (`\-`, `\#`, `\:`, `\ `)
 * matches the bare character.
 */

import { ErrorCode, LinepipeError } from '../errors';

const INLINE_FLAGS = /^\(\?([a-zA-Z]+)\)/;
const SUPPORTED_FLAGS = new Set(['i', 'm', 's']);
const FLAG_GROUP = /^\(\?[a-zA-Z-]+[:)]/;
const SYNTAX_CHARACTERS = new Set('^$\\.*+?()[]{}|/');
const ALPHANUMERIC = /^[A-Za-z0-9]$/;

function regexError(message: string, pattern: string, cause?: unknown): LinepipeError {
    return new LinepipeError(message, {
        code: ErrorCode.PARSE_REGEX,
        cause,
        meta: { value: pattern },
    });
}

function isRedundantEscape(char: string, inClass: boolean): boolean {
    if (ALPHANUMERIC.test(char) || SYNTAX_CHARACTERS.has(char)) {
        return false;
    }
    return !(inClass && char === '-');
}

/**
 * Drop escapes the `u` flag would reject and refuse flag groups past the start.
 */
function normalizeBody(body: string, pattern: string): string {
    let result = '';
    let inClass = false;
    for (let i = 0; i < body.length; i++) {
        const char = body[i];
        if (char === '\\' && i + 1 < body.length) {
            const next = body[i + 1];
            result += isRedundantEscape(next, inClass) ? next : char + next;
            i++;
            continue;
        }
        if (inClass) {
            inClass = char !== ']';
        } else if (char === '[') {
            inClass = true;
        } else if (char === '(' && FLAG_GROUP.test(body.slice(i))) {
            throw regexError(`inline flags are only supported as a leading (?ims) group in regex "${pattern}"`, pattern);
        }
        result += char;
    }
    return result;
}

export function compileFullMatch(pattern: string): RegExp {
    let body = pattern;
    let flags = 'u';

    const inline = INLINE_FLAGS.exec(pattern);
    if (inline) {
        for (const flag of inline[1]) {
            if (!SUPPORTED_FLAGS.has(flag)) {
                throw regexError(`unsupported inline flag "${flag}" in regex "${pattern}"`, pattern);
            }
            if (!flags.includes(flag)) {
                flags += flag;
            }
        }
        body = pattern.slice(inline[0].length);
    }

    body = normalizeBody(body, pattern);

    try {
        return new RegExp(`(?<![\\s\\S])(?:${body})(?![\\s\\S])`, flags);
    } catch (error) {
        throw regexError(`invalid regex "${pattern}"`, pattern, error);
    }
}
