/**
 * RangeIter
 *
 * Double-ended integer range behind `:gen`. Values are produced from the
 * front with `next()` or the back with `nextBack()`; the two ends meet in
 * the middle without yielding a value twice.
 *
 * A positive step walks up from `start`; iterating a negative-step range
 * walks down from the last in-bound value (`end`, or `end - 1` when the end
 * is exclusive). A zero step repeats `start` forever when it is in bounds.
 */

import { GenRange } from './types';

export class RangeIter implements IterableIterator<bigint> {
    private front: bigint;
    private back: bigint;
    private readonly stride: bigint;
    private readonly reversed: boolean;

    constructor(range: GenRange) {
        this.front = range.start;
        this.back = range.inclusive ? range.end : range.end - 1n;
        this.stride = range.step < 0n ? -range.step : range.step;
        this.reversed = range.step < 0n;
    }

    [Symbol.iterator](): IterableIterator<bigint> {
        return this;
    }

    next(): IteratorResult<bigint> {
        return this.reversed ? this.takeBack() : this.takeFront();
    }

    /** Take a value from the far end of the enumeration order */
    nextBack(): IteratorResult<bigint> {
        return this.reversed ? this.takeFront() : this.takeBack();
    }

    private takeFront(): IteratorResult<bigint> {
        if (this.front > this.back) {
            return { done: true, value: undefined };
        }
        const value = this.front;
        this.front += this.stride;
        return { done: false, value };
    }

    private takeBack(): IteratorResult<bigint> {
        if (this.back < this.front) {
            return { done: true, value: undefined };
        }
        const value = this.back;
        this.back -= this.stride;
        return { done: false, value };
    }
}
