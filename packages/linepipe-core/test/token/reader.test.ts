import { describe, it, expect } from 'vitest';
import { tokenize, isCommandToken, unescapeArg } from '../../src/token/reader';
import { ErrorCode, LinepipeError } from '../../src/errors';
import { catchError } from '../helpers/errors';

describe('tokenize', () => {
    it('should split on whitespace', () => {
        expect(tokenize('  :of  a\tb\nc ')).toEqual([':of', 'a', 'b', 'c']);
    });

    it('should return no words for blank input', () => {
        expect(tokenize('')).toEqual([]);
        expect(tokenize('   ')).toEqual([]);
    });

    it('should keep whitespace inside double quotes and decode escapes', () => {
        expect(tokenize('"a b" "x\\ty" "q\\"q"')).toEqual(['a b', 'x\ty', 'q"q']);
    });

    it('should take single quotes literally', () => {
        expect(tokenize(`'a\\tb' 'c "d"'`)).toEqual(['a\\tb', 'c "d"']);
    });

    it('should concatenate adjacent parts', () => {
        expect(tokenize(`he""llo a'b'"c"`)).toEqual(['hello', 'abc']);
    });

    it('should produce empty words from empty quotes', () => {
        expect(tokenize(':join "" [ ]')).toEqual([':join', '', '[', ']']);
    });

    it('should decode escapes outside quotes', () => {
        expect(tokenize('a\\ b c\\\\d e\\n')).toEqual(['a b', 'c\\d', 'e\n']);
    });

    it('should keep unknown escapes verbatim', () => {
        expect(tokenize('\\[ \\:x \\q')).toEqual(['\\[', '\\:x', '\\q']);
    });

    it('should keep a trailing backslash', () => {
        expect(tokenize('abc\\')).toEqual(['abc\\']);
    });

    it('should reject an unterminated quote', () => {
        expect(() => tokenize(':of "abc')).toThrow(LinepipeError);
        const error = catchError(() => tokenize(`:of 'abc`));
        expect(error.code).toBe(ErrorCode.PARSE_TOKEN);
        expect(error.message).toBe('unterminated \' quote starting at column 5');
    });
});

describe('isCommandToken', () => {
    it('should accept colon-prefixed names', () => {
        expect(isCommandToken(':gen')).toBe(true);
        expect(isCommandToken(':L-trim_2.x')).toBe(true);
    });

    it('should reject other words', () => {
        expect(isCommandToken(':')).toBe(false);
        expect(isCommandToken('::gen')).toBe(false);
        expect(isCommandToken('gen')).toBe(false);
        expect(isCommandToken(':a b')).toBe(false);
    });
});

describe('unescapeArg', () => {
    it('should unescape a leading colon', () => {
        expect(unescapeArg('::gen')).toBe(':gen');
        expect(unescapeArg('\\:gen')).toBe(':gen');
    });

    it('should leave other values alone', () => {
        expect(unescapeArg(':gen')).toBe(':gen');
        expect(unescapeArg('a::b')).toBe('a::b');
    });
});
