/**
 * Format Engine
 *
 * Renders generated integers through a template such as "item-{:>04}".
 *
 * Placeholders are `{}` or `{v}`, optionally followed by `:spec` where
 *
 *   spec := [[fill]align][+][#][0][width][type]
 *   align := '<' | '^' | '>'
 *   type  := 'd' | 'x' | 'X' | 'o' | 'b' | 'e' | 'E'
 *
 * `{{` and `}}` produce literal braces. Templates are compiled once, at
 * parse time, so a bad template is reported before any item is produced.
 */

import { ErrorCode, LinepipeError } from '../errors';

// ============================================================================
// Types
// ============================================================================

export type FormatAlign = '<' | '^' | '>';
export type FormatType = 'd' | 'x' | 'X' | 'o' | 'b' | 'e' | 'E';

export interface FormatSpec {
    fill: string;
    align: FormatAlign;
    sign: boolean;
    alternate: boolean;
    zeroPad: boolean;
    width: number;
    type: FormatType;
}

type TemplatePart = string | FormatSpec;

/**
 * A parsed template, ready to render values.
 */
export interface CompiledFormat {
    readonly source: string;
    readonly parts: readonly TemplatePart[];
}

const SPEC_PATTERN = /^(?:(.)?([<^>]))?(\+)?(#)?(0)?(\d+)?([dxXobeE])?$/u;

// ============================================================================
// Compilation
// ============================================================================

function formatError(template: string, message: string): LinepipeError {
    return new LinepipeError(`invalid format "${template}": ${message}`, {
        code: ErrorCode.FORMAT_STRING,
        meta: { value: template },
    });
}

function parseSpec(template: string, body: string): FormatSpec {
    const colon = body.indexOf(':');
    const name = colon < 0 ? body : body.slice(0, colon);
    const specText = colon < 0 ? '' : body.slice(colon + 1);

    if (name !== '' && name !== 'v') {
        throw formatError(template, `unknown placeholder name "${name}"`);
    }

    const match = SPEC_PATTERN.exec(specText);
    if (!match) {
        throw formatError(template, `invalid spec "${specText}"`);
    }
    const [, fill, align, sign, alternate, zero, width, type] = match;

    return {
        fill: fill ?? ' ',
        align: parseAlign(align),
        sign: sign !== undefined,
        alternate: alternate !== undefined,
        zeroPad: zero !== undefined,
        width: width === undefined ? 0 : Number(width),
        type: parseType(type),
    };
}

function parseAlign(text: string | undefined): FormatAlign {
    return text === '<' || text === '^' ? text : '>';
}

function parseType(text: string | undefined): FormatType {
    switch (text) {
        case 'x':
        case 'X':
        case 'o':
        case 'b':
        case 'e':
        case 'E':
            return text;
        default:
            return 'd';
    }
}

/**
 * Compile a template.
 *
 * @throws LinepipeError (FORMAT_STRING)
 */
export function compileFormat(template: string): CompiledFormat {
    const parts: TemplatePart[] = [];
    let literal = '';
    let pos = 0;

    while (pos < template.length) {
        const ch = template[pos];
        if (ch === '{') {
            if (template[pos + 1] === '{') {
                literal += '{';
                pos += 2;
                continue;
            }
            const close = template.indexOf('}', pos + 1);
            if (close < 0) {
                throw formatError(template, `unclosed "{" at ${pos}`);
            }
            if (literal !== '') {
                parts.push(literal);
                literal = '';
            }
            parts.push(parseSpec(template, template.slice(pos + 1, close)));
            pos = close + 1;
        } else if (ch === '}') {
            if (template[pos + 1] !== '}') {
                throw formatError(template, `unmatched "}" at ${pos}`);
            }
            literal += '}';
            pos += 2;
        } else {
            literal += ch;
            pos += 1;
        }
    }

    if (literal !== '') {
        parts.push(literal);
    }
    return Object.freeze({ source: template, parts: Object.freeze(parts) });
}

// ============================================================================
// Rendering
// ============================================================================

function exponential(digits: string, upper: boolean): string {
    const exponent = digits.length - 1;
    const fraction = digits.slice(1).replace(/0+$/, '');
    const mantissa = fraction === '' ? digits[0] : `${digits[0]}.${fraction}`;
    return `${mantissa}${upper ? 'E' : 'e'}${exponent}`;
}

function renderDigits(magnitude: bigint, type: FormatType): string {
    switch (type) {
        case 'x':
            return magnitude.toString(16);
        case 'X':
            return magnitude.toString(16).toUpperCase();
        case 'o':
            return magnitude.toString(8);
        case 'b':
            return magnitude.toString(2);
        case 'e':
        case 'E':
            return exponential(magnitude.toString(), type === 'E');
        case 'd':
            return magnitude.toString();
    }
}

function radixPrefix(type: FormatType): string {
    switch (type) {
        case 'x':
        case 'X':
            return '0x';
        case 'o':
            return '0o';
        case 'b':
            return '0b';
        default:
            return '';
    }
}

/**
 * Render one value through a single placeholder spec.
 */
export function formatValue(value: bigint, spec: FormatSpec): string {
    const negative = value < 0n;
    const magnitude = negative ? -value : value;
    const sign = negative ? '-' : spec.sign ? '+' : '';
    const prefix = spec.alternate ? radixPrefix(spec.type) : '';
    const digits = renderDigits(magnitude, spec.type);

    const length = sign.length + prefix.length + Array.from(digits).length;
    const padding = Math.max(0, spec.width - length);

    if (spec.zeroPad) {
        return `${sign}${prefix}${'0'.repeat(padding)}${digits}`;
    }

    const body = `${sign}${prefix}${digits}`;
    switch (spec.align) {
        case '<':
            return body + spec.fill.repeat(padding);
        case '^': {
            const left = Math.floor(padding / 2);
            return spec.fill.repeat(left) + body + spec.fill.repeat(padding - left);
        }
        case '>':
            return spec.fill.repeat(padding) + body;
    }
}

/**
 * Render `value` through every placeholder of a compiled template.
 */
export function renderFormat(format: CompiledFormat, value: bigint): string {
    return format.parts
        .map(part => typeof part === 'string' ? part : formatValue(value, part))
        .join('');
}
