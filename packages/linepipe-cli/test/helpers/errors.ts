import { isLinepipeError } from 'linepipe-core';
import type { LinepipeError } from 'linepipe-core';

export function catchError(fn: () => unknown): LinepipeError {
    try {
        fn();
    } catch (error) {
        if (isLinepipeError(error)) {
            return error;
        }
        throw error;
    }
    throw new Error('expected a LinepipeError');
}
