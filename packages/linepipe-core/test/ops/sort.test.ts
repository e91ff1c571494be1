import { describe, it, expect } from 'vitest';
import { shuffle, sortItems } from '../../src/ops/sort';

describe('sortItems', () => {
    it('should sort text by code point', () => {
        expect(sortItems(['b', 'B', 'a', 'A'], { kind: 'text', nocase: false, desc: false })).toEqual(['A', 'B', 'a', 'b']);
    });

    it('should keep equal keys stable when folding case', () => {
        expect(sortItems(['b', 'A', 'a', 'B'], { kind: 'text', nocase: true, desc: false })).toEqual(['A', 'a', 'b', 'B']);
    });

    it('should reverse for desc', () => {
        expect(sortItems(['a', 'c', 'b'], { kind: 'text', nocase: false, desc: true })).toEqual(['c', 'b', 'a']);
    });

    it('should sort numbers with a float default of +max', () => {
        expect(sortItems(['10', 'x', '9', '1.5', 3n], { kind: 'num', desc: false })).toEqual(['1.5', 3n, '9', '10', 'x']);
    });

    it('should use an integer default for items that are not integers', () => {
        expect(sortItems(['20', 'x', '1.5', '5'], { kind: 'num', defaultValue: 10n, desc: true }))
            .toEqual(['20', 'x', '1.5', '5']);
    });

    it('should use a float default for unparsable items', () => {
        expect(sortItems(['3', 'x', '1'], { kind: 'num', defaultValue: 2.5, desc: false })).toEqual(['1', 'x', '3']);
    });

    it('should shuffle with the given random source', () => {
        expect(sortItems(['a', 'b', 'c'], { kind: 'random' }, () => 0)).toEqual(['b', 'c', 'a']);
    });
});

describe('shuffle', () => {
    it('should keep every element', () => {
        const items = [1, 2, 3, 4, 5];
        expect([...shuffle([...items])].sort()).toEqual(items);
    });
});
