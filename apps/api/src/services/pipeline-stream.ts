import { Readable } from 'stream';
import { isClientVisible, PipelineError } from '../domain/errors';
import type { Logger } from '../config/logger';
import {
    type EventSink,
    PhaseNarrator,
    PipelineAbortedError,
    type PipelineEvent,
    type PipelinePhase,
} from './pipeline-events';

export type PipelineOutcome =
    | { status: 'success'; durationMs: number }
    | { status: 'error'; durationMs: number; error: unknown };

export interface StreamPipelineOptions {
    requestId: string;
    logger: Logger;
    /** Shown to the caller when the failure detail must stay server-side. */
    failureMessage: string;
    onSettled?: (outcome: PipelineOutcome) => void;
}

/**
 * Buffers events until the consumer pulls them. Closing pushes the terminal
 * event; anything emitted afterwards is dropped.
 */
class EventChannel implements EventSink, AsyncIterable<PipelineEvent> {
    private readonly buffer: PipelineEvent[] = [];
    private closed = false;
    private wake: (() => void) | null = null;

    emit(event: PipelineEvent): void {
        if (this.closed) return;
        this.buffer.push(event);
        this.notify();
    }

    close(terminal: PipelineEvent): void {
        if (this.closed) return;
        this.buffer.push(terminal);
        this.closed = true;
        this.notify();
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<PipelineEvent> {
        while (true) {
            const next = this.buffer.shift();
            if (next !== undefined) {
                yield next;
                continue;
            }
            if (this.closed) return;
            await new Promise<void>((resolve) => {
                this.wake = resolve;
            });
        }
    }

    private notify(): void {
        const wake = this.wake;
        this.wake = null;
        wake?.();
    }
}

export function describeFailure(error: unknown, failureMessage: string): string {
    return isClientVisible(error) ? error.message : failureMessage;
}

/** Rejections log at warn, consumer aborts at info, everything else at error. */
export function logPipelineFailure(logger: Logger, error: unknown, phase: PipelinePhase, requestId: string): void {
    const context = { requestId, phase, err: error };

    if (error instanceof PipelineAbortedError) {
        logger.info(context, 'Stream consumer went away, pipeline stopped');
    } else if (isClientVisible(error)) {
        logger.warn({ ...context, code: error.code }, 'Pipeline rejected request');
    } else {
        const code = error instanceof PipelineError ? error.code : undefined;
        logger.error({ ...context, code }, 'Pipeline failed');
    }
}

/**
 * Runs one stage and yields its narration as it happens. The stream always
 * ends with exactly one `result` or one `error` event.
 */
export async function* streamPipeline<T>(
    phase: PipelinePhase,
    run: (narrator: PhaseNarrator) => Promise<T>,
    options: StreamPipelineOptions
): AsyncGenerator<PipelineEvent, void, undefined> {
    const channel = new EventChannel();
    const abort = new AbortController();
    const narrator = new PhaseNarrator(phase, channel, abort.signal);
    const startedAt = Date.now();

    const settled = Promise.resolve()
        .then(() => run(narrator))
        .then(
            (payload) => {
                channel.close({ event: 'result', data: { phase, payload } });
                options.onSettled?.({ status: 'success', durationMs: Date.now() - startedAt });
            },
            (error: unknown) => {
                logPipelineFailure(options.logger, error, phase, options.requestId);
                channel.close({ event: 'error', data: { message: describeFailure(error, options.failureMessage) } });
                options.onSettled?.({ status: 'error', durationMs: Date.now() - startedAt, error });
            }
        );

    try {
        yield* channel;
    } finally {
        abort.abort();
        await settled;
    }
}

export function formatSseEvent(event: PipelineEvent): string {
    return `event: ${event.event}\ndata: ${JSON.stringify(event.data)}\n\n`;
}

async function* sseFrames(events: AsyncIterable<PipelineEvent>): AsyncGenerator<string> {
    for await (const event of events) {
        yield formatSseEvent(event);
    }
}

/** Readable body for a `text/event-stream` reply. */
export function toSseStream(events: AsyncIterable<PipelineEvent>): Readable {
    return Readable.from(sseFrames(events), { objectMode: false });
}
