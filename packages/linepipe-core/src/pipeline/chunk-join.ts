/**
 * Chunked join for `:join ... <batch>`: one joined item per `size` upstream
 * items; a trailing partial chunk is still emitted.
 */

export interface JoinParts {
    delimiter: string;
    prefix: string;
    postfix: string;
}

export function joinTexts(texts: readonly string[], parts: JoinParts): string {
    return `${parts.prefix}${texts.join(parts.delimiter)}${parts.postfix}`;
}

export async function* chunkJoin(upstream: AsyncIterable<string>, size: number, parts: JoinParts): AsyncGenerator<string> {
    let chunk: string[] = [];
    for await (const text of upstream) {
        chunk.push(text);
        if (chunk.length === size) {
            yield joinTexts(chunk, parts);
            chunk = [];
        }
    }
    if (chunk.length > 0) {
        yield joinTexts(chunk, parts);
    }
}
