/**
 * LinepipeError
 *
 * Base error class for all linepipe errors.
 * Provides structured error information with:
 * - code: Well-known error code, which also fixes the process exit status
 * - cause: Original error that caused this error (error chaining)
 * - meta: Additional context metadata
 */

import { describeSystemError, ErrorCodeType, EXIT_STATUS } from './error-codes';
import { getLogger } from '../logger';

/**
 * Metadata that can be attached to errors for diagnostics
 */
export interface ErrorMetadata {
    /** Command word the error belongs to (e.g. ":gen") */
    command?: string;
    /** Argument name within the command */
    arg?: string;
    /** Offending argument value */
    value?: string;
    /** File path related to the error */
    filePath?: string;
    /** 1-based line number in an input file */
    line?: number;
    /** Additional custom metadata */
    [key: string]: unknown;
}

/**
 * Base error class for linepipe.
 *
 * @example
 * ```typescript
 * throw new LinepipeError('invalid range "1,x"', {
 *     code: ErrorCode.ARG_PARSE,
 *     meta: { command: ':gen', arg: 'range', value: '1,x' }
 * });
 * ```
 */
export class LinepipeError extends Error {
    /** Well-known error code for programmatic handling */
    readonly code: ErrorCodeType;

    /** Original error that caused this error */
    readonly cause?: unknown;

    /** Additional context metadata */
    readonly meta?: ErrorMetadata;

    constructor(
        message: string,
        options: {
            code: ErrorCodeType;
            cause?: unknown;
            meta?: ErrorMetadata;
        }
    ) {
        super(message);

        this.name = 'LinepipeError';
        this.code = options.code;
        this.cause = options.cause;
        this.meta = options.meta;

        // Ensure proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /** Process exit status for this error */
    get exitCode(): number {
        return EXIT_STATUS[this.code];
    }

    /**
     * Get a formatted string representation including code and cause
     */
    toDetailedString(): string {
        const parts = [`[${this.code}:${this.exitCode}] ${this.message}`];

        if (this.cause instanceof Error) {
            parts.push(`Caused by: ${this.cause.message}`);
        } else if (this.cause !== undefined) {
            parts.push(`Caused by: ${String(this.cause)}`);
        }

        return parts.join('\n');
    }

    /**
     * Convert to a plain object for serialization
     */
    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            exitCode: this.exitCode,
            message: this.message,
            meta: this.meta,
            cause: this.cause instanceof Error
                ? { name: this.cause.name, message: this.cause.message }
                : this.cause,
        };
    }
}

/**
 * Type guard to check if an error is a LinepipeError
 */
export function isLinepipeError(error: unknown): error is LinepipeError {
    return error instanceof LinepipeError;
}

function systemErrorCode(error: Error): string | undefined {
    const code: unknown = Reflect.get(error, 'code');
    return typeof code === 'string' ? code : undefined;
}

/**
 * Convert any error to a LinepipeError.
 * If already a LinepipeError, returns it (with extra meta merged in).
 * Otherwise wraps it under `code`, describing Node.js system errors.
 */
export function toLinepipeError(
    error: unknown,
    code: ErrorCodeType,
    meta?: ErrorMetadata
): LinepipeError {
    if (isLinepipeError(error)) {
        if (meta) {
            return new LinepipeError(error.message, {
                code: error.code,
                cause: error.cause,
                meta: { ...error.meta, ...meta },
            });
        }
        return error;
    }

    if (error instanceof Error) {
        const nodeCode = systemErrorCode(error);
        const described = nodeCode ? describeSystemError(nodeCode) : undefined;
        const subject = meta?.filePath ? `${meta.filePath}: ` : '';

        return new LinepipeError(`${subject}${described ?? error.message}`, {
            code,
            cause: error,
            meta,
        });
    }

    const message = typeof error === 'string' ? error : String(error);
    return new LinepipeError(message, { code, cause: error, meta });
}

/**
 * Wrap an error with a new message while preserving the original as cause.
 */
export function wrapError(
    message: string,
    cause: unknown,
    code?: ErrorCodeType,
    meta?: ErrorMetadata
): LinepipeError {
    const causeError = isLinepipeError(cause) ? cause : undefined;
    const effectiveCode = code ?? causeError?.code;
    if (effectiveCode === undefined) {
        throw new TypeError('wrapError needs a code when the cause is not a LinepipeError');
    }

    return new LinepipeError(message, {
        code: effectiveCode,
        cause,
        meta: meta ?? causeError?.meta,
    });
}

/**
 * Extract a human-readable message from an error's cause chain
 */
export function getErrorCauseMessage(error: unknown, maxDepth = 5): string {
    const messages: string[] = [];
    let current: unknown = error;
    let depth = 0;

    while (current && depth < maxDepth) {
        if (current instanceof Error) {
            messages.push(current.message);
            current = isLinepipeError(current) ? current.cause : undefined;
        } else if (typeof current === 'string') {
            messages.push(current);
            break;
        } else {
            messages.push(String(current));
            break;
        }
        depth++;
    }

    return messages.join(' -> ');
}

/**
 * Log an error with structured information through the global logger.
 */
export function logError(category: string, message: string, error: unknown): void {
    const logger = getLogger();

    if (isLinepipeError(error)) {
        logger.error(category, `${message}: [${error.code}] ${error.message}`, error);
    } else if (error instanceof Error) {
        logger.error(category, `${message}: ${error.message}`, error);
    } else {
        logger.error(category, `${message}: ${String(error)}`);
    }
}
