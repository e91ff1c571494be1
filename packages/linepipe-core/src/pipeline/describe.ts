/**
 * Render a parsed pipeline back into command-language form, one command
 * per line. Used by `--verbose` and in debug logs.
 */

import { describeCondition } from '../condition/condition';
import { I64_MAX } from '../item';
import { FileTarget, GenRange, InputSpec, OpSpec, OutputSpec, Pipeline, SliceRange, TrimPosition } from './types';

function quote(text: string): string {
    return /^[^\s"'\\]+$/u.test(text) ? text : JSON.stringify(text);
}

function describeGenRange(range: GenRange): string {
    const end = range.end === I64_MAX && !range.inclusive ? '' : `${range.inclusive ? '=' : ''}${range.end}`;
    return `${range.start},${end},${range.step}`;
}

function describeSliceRange(range: SliceRange): string {
    return `${range.min ?? ''},${range.max ?? ''}`;
}

function describeFileTarget(target: FileTarget): string {
    const parts = [quote(target.path)];
    if (target.append) {
        parts.push('append');
    }
    if (target.lineEnding) {
        parts.push(target.lineEnding);
    }
    return parts.join(' ');
}

export function describeInput(input: InputSpec): string {
    switch (input.kind) {
        case 'stdin':
            return ':in';
        case 'file':
            return `:file ${input.paths.map(quote).join(' ')}`;
        case 'clip':
            return ':clip';
        case 'of':
            return `:of ${input.values.map(quote).join(' ')}`;
        case 'gen':
            return input.format === undefined
                ? `:gen ${describeGenRange(input.range)}`
                : `:gen ${describeGenRange(input.range)} ${quote(input.format.source)}`;
        case 'repeat':
            return input.count === undefined
                ? `:repeat ${quote(input.value)}`
                : `:repeat ${quote(input.value)} ${input.count}`;
    }
}

const TRIM_PREFIX: Readonly<Record<TrimPosition, string>> = { both: '', start: 'l', end: 'r' };

export function describeOp(op: OpSpec): string {
    const nocase = (flag: boolean): string => flag ? ' nocase' : '';
    switch (op.kind) {
        case 'peek':
            return op.target === undefined ? ':peek' : `:peek ${describeFileTarget(op.target)}`;
        case 'case':
            return op.mode === 'switch' ? ':case' : `:${op.mode}`;
        case 'replace':
            return `:replace ${quote(op.from)} ${quote(op.to)}${op.count === undefined ? '' : ` ${op.count}`}${nocase(op.nocase)}`;
        case 'trim': {
            const command = `:${TRIM_PREFIX[op.position]}trim${op.target.kind === 'chars' ? 'c' : ''}`;
            return op.target.kind === 'whitespace'
                ? command
                : `${command} ${quote(op.target.pattern)}${nocase(op.nocase)}`;
        }
        case 'uniq':
            return `:uniq${nocase(op.nocase)}`;
        case 'join': {
            const args = [op.delimiter, op.prefix, op.postfix].map(quote);
            return op.batch === undefined ? `:join ${args.join(' ')}` : `:join ${args.join(' ')} ${op.batch}`;
        }
        case 'slice':
            return `:slice ${op.ranges.map(describeSliceRange).join(' ')}`;
        case 'take-drop':
            return `:${op.mode}${op.whileMode ? ' while' : ''} ${describeCondition(op.condition)}`;
        case 'count':
            return ':count';
        case 'sort': {
            const { sort } = op;
            switch (sort.kind) {
                case 'random':
                    return ':sort random';
                case 'text':
                    return `:sort${nocase(sort.nocase)}${sort.desc ? ' desc' : ''}`;
                case 'num':
                    return `:sort num${sort.defaultValue === undefined ? '' : ` ${sort.defaultValue}`}${sort.desc ? ' desc' : ''}`;
            }
        }
    }
}

export function describeOutput(output: OutputSpec): string {
    switch (output.kind) {
        case 'stdout':
            return ':to out';
        case 'file':
            return `:to file ${describeFileTarget(output.target)}`;
        case 'clip':
            return output.lineEnding === undefined ? ':to clip' : `:to clip ${output.lineEnding}`;
    }
}

export function describePipeline(pipeline: Pipeline): string[] {
    return [
        describeInput(pipeline.input),
        ...pipeline.ops.map(describeOp),
        describeOutput(pipeline.output),
    ];
}
