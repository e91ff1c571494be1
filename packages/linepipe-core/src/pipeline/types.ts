/**
 * Pipeline model
 *
 * The immutable description produced by the grammar: one input, an ordered
 * list of operators and one output. Built once, never mutated during a run.
 */

import type { Condition } from '../condition/condition';
import type { Num } from '../condition/num';
import type { LineEnding } from '../config';
import type { CompiledFormat } from '../format/format-engine';

// ============================================================================
// Shared pieces
// ============================================================================

/**
 * Integer range for `:gen`. `step` is never zero when parsed.
 */
export interface GenRange {
    start: bigint;
    end: bigint;
    inclusive: boolean;
    step: bigint;
}

/**
 * Inclusive item index range for `:slice`; an absent bound is open.
 */
export interface SliceRange {
    min?: number;
    max?: number;
}

export interface FileTarget {
    path: string;
    append: boolean;
    /** Line ending; undefined means the configured default */
    lineEnding?: LineEnding;
}

// ============================================================================
// Input
// ============================================================================

export type InputSpec =
    | { kind: 'stdin' }
    | { kind: 'file'; paths: string[] }
    | { kind: 'clip' }
    | { kind: 'of'; values: string[] }
    | { kind: 'gen'; range: GenRange; format?: CompiledFormat }
    | { kind: 'repeat'; value: string; count?: number };

// ============================================================================
// Operators
// ============================================================================

export type CaseMode = 'upper' | 'lower' | 'switch';

export type TrimPosition = 'both' | 'start' | 'end';

/**
 * What `:trim` strips: whitespace, a literal substring, or any character of a set.
 */
export type TrimTarget =
    | { kind: 'whitespace' }
    | { kind: 'substring'; pattern: string }
    | { kind: 'chars'; pattern: string };

export type SortSpec =
    | { kind: 'text'; nocase: boolean; desc: boolean }
    | { kind: 'num'; defaultValue?: Num; desc: boolean }
    | { kind: 'random' };

export type OpSpec =
    | { kind: 'peek'; target?: FileTarget }
    | { kind: 'case'; mode: CaseMode }
    | { kind: 'replace'; from: string; to: string; count?: number; nocase: boolean }
    | { kind: 'trim'; position: TrimPosition; target: TrimTarget; nocase: boolean }
    | { kind: 'uniq'; nocase: boolean }
    | { kind: 'join'; delimiter: string; prefix: string; postfix: string; batch?: number }
    | { kind: 'slice'; ranges: SliceRange[] }
    | { kind: 'take-drop'; mode: 'take' | 'drop'; whileMode: boolean; condition: Condition }
    | { kind: 'count' }
    | { kind: 'sort'; sort: SortSpec };

// ============================================================================
// Output
// ============================================================================

export type OutputSpec =
    | { kind: 'stdout' }
    | { kind: 'file'; target: FileTarget }
    | { kind: 'clip'; lineEnding?: LineEnding };

export interface Pipeline {
    readonly input: InputSpec;
    readonly ops: readonly OpSpec[];
    readonly output: OutputSpec;
}
