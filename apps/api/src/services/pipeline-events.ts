import type { GenerationResponse } from '../domain/ai/interfaces';

export type PipelinePhase = 'vision' | 'rag';

export type StepStatus = 'start' | 'done';

export type LogMeta = Record<string, unknown>;

export type PipelineEvent =
    | { event: 'log'; data: { code: string; meta?: LogMeta } }
    | { event: 'step'; data: { phase: PipelinePhase; index: number; status: StepStatus } }
    | { event: 'result'; data: { phase: PipelinePhase; payload: unknown } }
    | { event: 'error'; data: { message: string } };

export interface EventSink {
    emit(event: PipelineEvent): void;
}

export const noopSink: EventSink = {
    emit: () => undefined,
};

export class PipelineAbortedError extends Error {
    constructor(public readonly phase: PipelinePhase) {
        super(`Pipeline ${phase} aborted by consumer`);
        this.name = 'PipelineAbortedError';
    }
}

/**
 * Narrates one request's pass through a stage. Steps run one at a time and
 * get consecutive zero-based indices, so each `start` is followed by its own
 * `done` before the next index starts.
 */
export class PhaseNarrator {
    private nextIndex = 0;
    private stepRunning = false;

    constructor(
        public readonly phase: PipelinePhase,
        private readonly sink: EventSink = noopSink,
        private readonly signal?: AbortSignal
    ) { }

    log(code: string, meta?: LogMeta): void {
        this.sink.emit({ event: 'log', data: meta ? { code, meta } : { code } });
    }

    async step<T>(work: () => T | Promise<T>): Promise<T> {
        if (this.signal?.aborted) {
            throw new PipelineAbortedError(this.phase);
        }
        if (this.stepRunning) {
            throw new Error(`Step ${this.nextIndex - 1} of ${this.phase} is still running`);
        }

        const index = this.nextIndex++;
        this.stepRunning = true;
        this.sink.emit({ event: 'step', data: { phase: this.phase, index, status: 'start' } });

        try {
            const value = await work();
            this.sink.emit({ event: 'step', data: { phase: this.phase, index, status: 'done' } });
            return value;
        } finally {
            this.stepRunning = false;
        }
    }
}

/** Usage counters and reasoning summary of a provider call, as log events. */
export function narrateGeneration(narrator: PhaseNarrator, response: GenerationResponse): void {
    if (response.usage) {
        narrator.log(`${narrator.phase}.usage`, { ...response.usage });
    }
    if (response.reasoningSummary.length > 0) {
        narrator.log(`${narrator.phase}.reasoning_summary`, { lines: response.reasoningSummary });
    }
}
