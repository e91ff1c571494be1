/**
 * Run configuration
 *
 * A frozen snapshot created once, before the pipeline is built, and passed
 * explicitly to every stage that needs it. Nothing reads process-wide state.
 */

export interface PipeConfig {
    /** Case-insensitive default for every case-aware operator */
    readonly nocase: boolean;
    /** Skip unreadable input files with a warning instead of aborting */
    readonly skipOnError: boolean;
    /** Line ending for file and clipboard sinks that do not name one */
    readonly lineEnding: LineEnding;
}

export type LineEnding = 'lf' | 'crlf';

export const DEFAULT_PIPE_CONFIG: PipeConfig = Object.freeze({
    nocase: false,
    skipOnError: false,
    lineEnding: 'lf',
});

export function createPipeConfig(overrides: Partial<PipeConfig> = {}): PipeConfig {
    return Object.freeze({
        nocase: overrides.nocase ?? DEFAULT_PIPE_CONFIG.nocase,
        skipOnError: overrides.skipOnError ?? DEFAULT_PIPE_CONFIG.skipOnError,
        lineEnding: overrides.lineEnding ?? DEFAULT_PIPE_CONFIG.lineEnding,
    });
}

export function lineEndingText(ending: LineEnding): string {
    return ending === 'crlf' ? '\r\n' : '\n';
}
