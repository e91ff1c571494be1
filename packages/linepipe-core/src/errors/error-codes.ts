/**
 * Error Codes for linepipe
 *
 * Every failure the tool reports maps to exactly one code, and every code to
 * a stable process exit status (0 is reserved for success).
 *
 * Categories:
 * - Parsing: PARSE_TOKEN, ARG_PARSE, MISSING_ARG, UNEXPECTED_REMAINING, UNKNOWN_ARGS
 * - Input/output: READ_*, WRITE_*, OPEN_FILE
 * - Argument values: FORMAT_STRING, PARSE_REGEX, PARSE_NUM, INVALID_*_INT
 */

/**
 * Error codes as a const object for type safety and autocompletion
 */
export const ErrorCode = {
    // =========================================================================
    // Parsing
    // =========================================================================
    /** Token string could not be split into words */
    PARSE_TOKEN: 'PARSE_TOKEN',
    /** An argument value could not be parsed */
    ARG_PARSE: 'ARG_PARSE',
    /** A required argument is missing */
    MISSING_ARG: 'MISSING_ARG',
    /** An argument was only partially consumed */
    UNEXPECTED_REMAINING: 'UNEXPECTED_REMAINING',
    /** Words were left over after the pipeline was parsed */
    UNKNOWN_ARGS: 'UNKNOWN_ARGS',

    // =========================================================================
    // Input / Output
    // =========================================================================
    /** Reading the clipboard failed */
    READ_CLIPBOARD: 'READ_CLIPBOARD',
    /** Opening or reading an input file failed */
    READ_FILE: 'READ_FILE',
    /** Writing the clipboard failed */
    WRITE_CLIPBOARD: 'WRITE_CLIPBOARD',
    /** Opening an output file failed */
    OPEN_FILE: 'OPEN_FILE',
    /** Writing an output file failed */
    WRITE_FILE: 'WRITE_FILE',

    // =========================================================================
    // Argument Values
    // =========================================================================
    /** Format template is invalid */
    FORMAT_STRING: 'FORMAT_STRING',
    /** Regular expression is invalid */
    PARSE_REGEX: 'PARSE_REGEX',
    /** Numeric literal is invalid */
    PARSE_NUM: 'PARSE_NUM',
    /** Count must not be negative */
    INVALID_NON_NEGATIVE_INT: 'INVALID_NON_NEGATIVE_INT',
    /** Count must be greater than zero */
    INVALID_POSITIVE_INT: 'INVALID_POSITIVE_INT',

    // =========================================================================
    // Input / Output (continued)
    // =========================================================================
    /** Reading standard input failed */
    READ_STDIN: 'READ_STDIN',
} as const;

/**
 * Type for error code values
 */
export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Process exit status for each error code.
 */
export const EXIT_STATUS: Readonly<Record<ErrorCodeType, number>> = {
    PARSE_TOKEN: 1,
    ARG_PARSE: 2,
    MISSING_ARG: 3,
    UNEXPECTED_REMAINING: 4,
    UNKNOWN_ARGS: 5,
    READ_CLIPBOARD: 6,
    READ_FILE: 7,
    WRITE_CLIPBOARD: 8,
    OPEN_FILE: 9,
    WRITE_FILE: 10,
    FORMAT_STRING: 11,
    PARSE_REGEX: 12,
    PARSE_NUM: 13,
    INVALID_NON_NEGATIVE_INT: 14,
    INVALID_POSITIVE_INT: 15,
    READ_STDIN: 16,
};

/**
 * One-line description of each error code, used by the `code` help topic.
 */
export const ERROR_DESCRIPTIONS: Readonly<Record<ErrorCodeType, string>> = {
    PARSE_TOKEN: 'token string cannot be split into words',
    ARG_PARSE: 'argument value cannot be parsed',
    MISSING_ARG: 'required argument is missing',
    UNEXPECTED_REMAINING: 'argument was only partially parsed',
    UNKNOWN_ARGS: 'unrecognized words after the pipeline',
    READ_CLIPBOARD: 'failed to read the clipboard',
    READ_FILE: 'failed to open or read an input file',
    WRITE_CLIPBOARD: 'failed to write the clipboard',
    OPEN_FILE: 'failed to open an output file',
    WRITE_FILE: 'failed to write an output file',
    FORMAT_STRING: 'invalid format template',
    PARSE_REGEX: 'invalid regular expression',
    PARSE_NUM: 'invalid number',
    INVALID_NON_NEGATIVE_INT: 'count must be a non-negative integer',
    INVALID_POSITIVE_INT: 'count must be a positive integer',
    READ_STDIN: 'failed to read standard input',
};

/**
 * All error codes ordered by exit status.
 */
export function listErrorCodes(): ErrorCodeType[] {
    return Object.values(ErrorCode).sort((a, b) => EXIT_STATUS[a] - EXIT_STATUS[b]);
}

/**
 * Short description of a Node.js system error code (errno string),
 * or undefined for codes without one.
 */
export function describeSystemError(nodeCode: string): string | undefined {
    switch (nodeCode) {
        case 'ENOENT':
            return 'no such file or directory';
        case 'EACCES':
        case 'EPERM':
            return 'permission denied';
        case 'EISDIR':
            return 'is a directory';
        case 'ENOTDIR':
            return 'not a directory';
        case 'EEXIST':
            return 'already exists';
        case 'EMFILE':
            return 'too many open files';
        case 'ENOSPC':
            return 'no space left on device';
        default:
            return undefined;
    }
}
