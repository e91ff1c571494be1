/**
 * Driver
 *
 * Builds the source, folds every operator stage over it, opens the sink and
 * drains the stream item by item. Resources opened along the way are closed
 * whether the run succeeds or fails.
 */

import { PipeConfig } from '../config';
import { PipeIO } from '../io/types';
import { getLogger, LogCategory } from '../logger';
import { describeOp, describePipeline } from './describe';
import { openSink, Sink } from './sink';
import { openSource } from './source';
import { buildStage, StageContext, Stream } from './stages';
import { Pipeline } from './types';

export interface RunOptions {
    io: PipeIO;
    config: PipeConfig;
    /** Random source for `:sort random`; defaults to Math.random */
    random?: () => number;
}

/**
 * Close every sink, then rethrow the first close failure.
 */
async function closeAll(sinks: readonly Sink[]): Promise<void> {
    const results = await Promise.allSettled(sinks.map(sink => sink.close()));
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
        throw failure.reason;
    }
}

/**
 * Run a parsed pipeline to completion.
 */
export async function runPipeline(pipeline: Pipeline, options: RunOptions): Promise<void> {
    const logger = getLogger();
    const context: StageContext = {
        io: options.io,
        config: options.config,
        resources: [],
        random: options.random,
    };

    logger.debug(LogCategory.PIPELINE, `Running ${describePipeline(pipeline).join(' ')}`);

    let completed = false;
    try {
        let stream: Stream = openSource(pipeline.input, options.io, options.config);
        for (const op of pipeline.ops) {
            const stage = await buildStage(op, context);
            stream = stage(stream);
            logger.debug(LogCategory.PIPELINE, `Built stage ${describeOp(op)}`);
        }

        const sink = await openSink(pipeline.output, options.io, options.config);
        context.resources.push(sink);

        let count = 0;
        for await (const item of stream) {
            await sink.write(item);
            count++;
        }
        await sink.finish();
        completed = true;
        logger.debug(LogCategory.PIPELINE, `Wrote ${count} item(s)`);
    } finally {
        if (completed) {
            await closeAll(context.resources);
        } else {
            await closeAll(context.resources).catch((error: unknown) => {
                logger.debug(LogCategory.PIPELINE, `Close after failure also failed: ${String(error)}`);
            });
        }
    }
}
