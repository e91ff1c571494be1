/**
 * Errors Module
 *
 * Structured error types and the exit-code taxonomy.
 */

export {
    ErrorCode,
    EXIT_STATUS,
    ERROR_DESCRIPTIONS,
    listErrorCodes,
    describeSystemError,
} from './error-codes';
export type { ErrorCodeType } from './error-codes';

export {
    LinepipeError,
    isLinepipeError,
    toLinepipeError,
    wrapError,
    getErrorCauseMessage,
    logError,
} from './linepipe-error';
export type { ErrorMetadata } from './linepipe-error';
