import { describe, it, expect } from 'vitest';
import { Condition, describeCondition, testCondition } from '../../src/condition/condition';
import { parseCondition } from '../../src/condition/parser';
import { ErrorCode } from '../../src/errors';
import { TokenCursor } from '../../src/parse/cursor';
import { tokenize } from '../../src/token/reader';
import { catchError } from '../helpers/errors';

function cond(text: string): Condition {
    const cursor = new TokenCursor(tokenize(text));
    const condition = parseCondition(cursor, ':take');
    expect(cursor.done).toBe(true);
    return condition;
}

function matches(text: string, ...items: string[]): boolean[] {
    const condition = cond(text);
    return items.map(item => testCondition(condition, item));
}

describe('length conditions', () => {
    it('should count Unicode scalar values', () => {
        expect(matches('len 3', 'abc', 'ab', 'äö😀')).toEqual([true, false, true]);
    });

    it('should accept the =n spelling', () => {
        expect(matches('len =2', 'ab', 'abc')).toEqual([true, false]);
    });

    it('should test inclusive ranges with optional bounds', () => {
        expect(matches('len 2,3', 'a', 'ab', 'abc', 'abcd')).toEqual([false, true, true, false]);
        expect(matches('len ,1', '', 'a', 'ab')).toEqual([true, true, false]);
        expect(matches('len 2,', 'a', 'abcdef')).toEqual([false, true]);
    });

    it('should reject a range without bounds', () => {
        expect(catchError(() => cond('len ,')).code).toBe(ErrorCode.ARG_PARSE);
    });

    it('should reject a negative length', () => {
        expect(catchError(() => cond('len -1')).code).toBe(ErrorCode.PARSE_NUM);
    });

    it('should report a non-numeric length as an invalid number', () => {
        const error = catchError(() => cond('len abc'));
        expect(error.code).toBe(ErrorCode.PARSE_NUM);
        expect(error.message).toBe(':take: invalid number "abc" for <len>');
        expect(catchError(() => cond('len 1,x')).code).toBe(ErrorCode.PARSE_NUM);
    });
});

describe('numeric conditions', () => {
    it('should compare integers and floats', () => {
        expect(matches('num 1,5', '1', '5', '5.0', '5.5', '0', 'abc')).toEqual([true, true, true, false, false, false]);
        expect(matches('num 2.5,', '2', '3', '2.5')).toEqual([false, true, true]);
    });

    it('should match an exact number across representations', () => {
        expect(matches('num 10', '10', '10.0', '1e1', '11')).toEqual([true, true, true, false]);
    });

    it('should classify integers and floats', () => {
        expect(matches('num integer', '12', '-3', '1.5', 'x')).toEqual([true, true, false, false]);
        expect(matches('num float', '12', '1.5', 'NaN', 'x')).toEqual([false, true, false, false]);
        expect(matches('num', '12', '1.5', 'inf', '')).toEqual([true, true, false, false]);
    });

    it('should invert the final result with not, including unparsable input', () => {
        expect(matches('not num 1,5', '3', '9', 'abc')).toEqual([false, true, true]);
    });

    it('should raise PARSE_NUM for a bad bound', () => {
        expect(catchError(() => cond('num 1,x')).code).toBe(ErrorCode.PARSE_NUM);
    });

    it('should leave a following word alone when it is not numeric', () => {
        const cursor = new TokenCursor(['num', 'desc']);
        const condition = parseCondition(cursor, ':take');
        expect(condition.select).toEqual({ kind: 'number', numberClass: 'any' });
        expect(cursor.remaining()).toEqual(['desc']);
    });
});

describe('text class conditions', () => {
    it('should test letter case', () => {
        expect(matches('upper', 'ABC', 'AbC', '123', 'ÄÖ')).toEqual([true, false, true, true]);
        expect(matches('lower', 'abc', 'aBc', '12', 'äö')).toEqual([true, false, true, true]);
    });

    it('should test ASCII-ness', () => {
        expect(matches('ascii', 'abc', 'abé', '')).toEqual([true, false, true]);
        expect(matches('nonascii', 'éü', 'abé', '')).toEqual([true, false, true]);
    });

    it('should test empty and blank', () => {
        expect(matches('empty', '', ' ', 'a')).toEqual([true, false, false]);
        expect(matches('blank', '', ' \t', ' a')).toEqual([true, true, false]);
    });

    it('should be case-insensitive on keywords', () => {
        expect(matches('NOT Upper', 'abc')).toEqual([true]);
    });
});

describe('regex conditions', () => {
    it('should match the whole item', () => {
        expect(matches('reg \\d+', '123', 'a123', '123a')).toEqual([true, false, false]);
    });

    it('should not let alternation escape the anchors', () => {
        expect(matches('reg a|b', 'a', 'b', 'ab')).toEqual([true, true, false]);
    });

    it('should keep full-item anchoring under the multiline flag', () => {
        expect(matches('reg (?m)\\d+', '123\n456')).toEqual([false]);
        expect(matches('reg (?m)[\\d\\n]+', '123\n456')).toEqual([true]);
    });

    it('should honor the case-insensitive flag', () => {
        expect(matches('reg (?i)abc', 'ABC')).toEqual([true]);
    });

    it('should treat escaped punctuation as the bare character', () => {
        expect(matches('reg a\\-b', 'a-b', 'a\\-b')).toEqual([true, false]);
        expect(matches('reg \\#\\:x', '#:x')).toEqual([true]);
        expect(matches("reg 'a\\ b'", 'a b')).toEqual([true]);
    });

    it('should keep escapes that carry meaning', () => {
        expect(matches('reg a\\.b', 'a.b', 'axb')).toEqual([true, false]);
        expect(matches('reg [a\\-c]+', 'a-c', 'b')).toEqual([true, false]);
    });

    it('should reject inline flags after the start of the pattern', () => {
        const error = catchError(() => cond('reg a(?i)b'));
        expect(error.code).toBe(ErrorCode.PARSE_REGEX);
        expect(error.message).toBe('inline flags are only supported as a leading (?ims) group in regex "a(?i)b"');
        expect(catchError(() => cond('reg (?i:a)b')).code).toBe(ErrorCode.PARSE_REGEX);
    });

    it('should reject invalid patterns', () => {
        expect(catchError(() => cond('reg (')).code).toBe(ErrorCode.PARSE_REGEX);
        expect(catchError(() => cond('reg (?x)a')).code).toBe(ErrorCode.PARSE_REGEX);
    });
});

describe('condition errors', () => {
    it('should report a missing condition', () => {
        const error = catchError(() => parseCondition(new TokenCursor([':upper']), ':take'));
        expect(error.code).toBe(ErrorCode.MISSING_ARG);
        expect(error.message).toBe(':take: missing <condition>');
    });

    it('should report an unknown condition', () => {
        const error = catchError(() => cond('bogus'));
        expect(error.code).toBe(ErrorCode.ARG_PARSE);
        expect(error.message).toBe(':take: unknown condition "bogus"');
    });
});

describe('describeCondition', () => {
    it('should render conditions back to their command form', () => {
        expect(describeCondition(cond('not len ,3'))).toBe('not len ,3');
        expect(describeCondition(cond('num 1.5'))).toBe('num 1.5');
        expect(describeCondition(cond('num integer'))).toBe('num integer');
        expect(describeCondition(cond('reg a+'))).toBe('reg a+');
    });

    it('should invert exactly once per not', () => {
        const base = cond('len 2');
        const negated: Condition = { select: base.select, not: true };
        const doubled: Condition = { select: negated.select, not: !negated.not };
        for (const item of ['ab', 'abc', '']) {
            expect(testCondition(negated, item)).toBe(!testCondition(base, item));
            expect(testCondition(doubled, item)).toBe(testCondition(base, item));
        }
    });
});
