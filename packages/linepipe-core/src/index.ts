/**
 * linepipe-core
 *
 * Parser and streaming execution engine for linepipe pipelines.
 * All I/O goes through an injected PipeIO, so the package runs the same
 * under the CLI and under tests.
 *
 * @example
 * ```typescript
 * import { parseEvalToken, runPipeline, createPipeConfig } from 'linepipe-core';
 *
 * const pipeline = parseEvalToken(':gen 1,=3 :join ,');
 * await runPipeline(pipeline, { io, config: createPipeConfig() });
 * ```
 */

// ============================================================================
// Logger
// ============================================================================

export {
    LogCategory,
    consoleLogger,
    nullLogger,
    setLogger,
    getLogger,
    resetLogger,
} from './logger';
export type { Logger } from './logger';

// ============================================================================
// Errors
// ============================================================================

export {
    ErrorCode,
    EXIT_STATUS,
    ERROR_DESCRIPTIONS,
    listErrorCodes,
    describeSystemError,
    LinepipeError,
    isLinepipeError,
    toLinepipeError,
    wrapError,
    getErrorCauseMessage,
    logError,
} from './errors';
export type { ErrorCodeType, ErrorMetadata } from './errors';

// ============================================================================
// Configuration and items
// ============================================================================

export { createPipeConfig, DEFAULT_PIPE_CONFIG, lineEndingText } from './config';
export type { PipeConfig, LineEnding } from './config';

export { itemText, charLength, compareCodePoints, splitLines, I64_MIN, I64_MAX } from './item';
export type { Item } from './item';

// ============================================================================
// Token reader and grammar
// ============================================================================

export { tokenize, isCommandToken, unescapeArg } from './token/reader';
export { TokenCursor } from './parse/cursor';
export { parsePipeline, parseEvalToken } from './parse/pipeline';
export { INPUT_PARSERS } from './parse/input';
export { OP_PARSERS } from './parse/ops';
export { OUTPUT_PARSERS } from './parse/output';
export type { CommandParser } from './parse/command';

// ============================================================================
// Conditions and numbers
// ============================================================================

export { testCondition, testSelect, describeCondition } from './condition/condition';
export type { Condition, Select, NumberClass } from './condition/condition';
export { parseCondition } from './condition/parser';
export { compileFullMatch } from './condition/regex';
export { parseNum, parseInteger, parseFloatLiteral, compareNum } from './condition/num';
export type { Num } from './condition/num';

// ============================================================================
// Format engine
// ============================================================================

export { compileFormat, renderFormat, formatValue } from './format/format-engine';
export type { CompiledFormat, FormatSpec } from './format/format-engine';

// ============================================================================
// Pipeline
// ============================================================================

export type {
    Pipeline,
    InputSpec,
    OpSpec,
    OutputSpec,
    GenRange,
    SliceRange,
    FileTarget,
    TrimTarget,
    TrimPosition,
    CaseMode,
    SortSpec,
} from './pipeline/types';
export { RangeIter } from './pipeline/range-iter';
export { sliceStream, normalizeRanges } from './pipeline/slice';
export { chunkJoin, joinTexts } from './pipeline/chunk-join';
export { buildStage } from './pipeline/stages';
export type { Stage, Stream, StageContext } from './pipeline/stages';
export { openSource } from './pipeline/source';
export { openSink, LineSink, ClipboardSink } from './pipeline/sink';
export type { Sink } from './pipeline/sink';
export { runPipeline } from './pipeline/driver';
export type { RunOptions } from './pipeline/driver';
export { describePipeline, describeInput, describeOp, describeOutput } from './pipeline/describe';

// ============================================================================
// Operators
// ============================================================================

export { convertCase, createReplacer } from './ops/text-ops';
export type { ReplaceOptions } from './ops/text-ops';
export { createTrimmer } from './ops/trim';
export { sortItems, shuffle } from './ops/sort';

// ============================================================================
// I/O
// ============================================================================

export type { PipeIO, TextWriter } from './io/types';
