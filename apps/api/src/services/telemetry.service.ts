import { PipelineError } from '../domain/errors';
import type { PipelinePhase } from './pipeline-events';

export type TelemetryRun = Pick<TelemetryEvent, 'requestId' | 'phase' | 'mode' | 'durationMs'>;

export interface TelemetryEvent {
    requestId: string;
    phase: PipelinePhase;
    mode: 'sync' | 'stream';
    timestamp: string;
    durationMs: number;
    outcome: 'success' | 'error';
    errorCode: string | null;
}

/**
 * In-memory telemetry service with a Ring Buffer.
 * Keeps the last N pipeline runs for debugging.
 */
export class TelemetryService {
    private events: TelemetryEvent[] = [];

    constructor(private readonly maxEvents = 50) { }

    /**
     * Records a new telemetry event.
     * If the buffer is full, removes the oldest event.
     */
    public record(event: Omit<TelemetryEvent, 'timestamp'>): void {
        const fullEvent: TelemetryEvent = {
            ...event,
            timestamp: new Date().toISOString()
        };

        this.events.unshift(fullEvent); // Add to beginning

        if (this.events.length > this.maxEvents) {
            this.events.pop(); // Remove from end
        }
    }

    /** Records a finished run; pass the failure when there was one. */
    public recordRun(run: TelemetryRun, error?: unknown): void {
        this.record({
            ...run,
            outcome: error === undefined ? 'success' : 'error',
            errorCode: error === undefined ? null : error instanceof PipelineError ? error.code : 'INTERNAL_ERROR',
        });
    }

    /**
     * Returns all stored events, newest first.
     */
    public getEvents(): TelemetryEvent[] {
        return [...this.events];
    }
}
