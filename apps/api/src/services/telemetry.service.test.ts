import { describe, it, expect } from 'vitest';
import { TelemetryService } from './telemetry.service';
import { parseError } from '../domain/errors';

const run = (requestId: string) => ({ requestId, phase: 'rag' as const, mode: 'sync' as const, durationMs: 12 });

describe('TelemetryService', () => {
    it('should keep the newest events first and drop the oldest past capacity', () => {
        const telemetry = new TelemetryService(2);

        telemetry.recordRun(run('a'));
        telemetry.recordRun(run('b'));
        telemetry.recordRun(run('c'));

        expect(telemetry.getEvents().map((event) => event.requestId)).toEqual(['c', 'b']);
    });

    it('should record the outcome and error code of a run', () => {
        const telemetry = new TelemetryService();

        telemetry.recordRun(run('ok'));
        telemetry.recordRun(run('parse'), parseError('Empty response'));
        telemetry.recordRun(run('crash'), new Error('boom'));

        const [crash, parse, success] = telemetry.getEvents();
        expect(success).toMatchObject({ outcome: 'success', errorCode: null });
        expect(parse).toMatchObject({ outcome: 'error', errorCode: 'PARSE_ERROR' });
        expect(crash).toMatchObject({ outcome: 'error', errorCode: 'INTERNAL_ERROR' });
        expect(Date.parse(success.timestamp)).not.toBeNaN();
    });

    it('should hand out copies of the buffer', () => {
        const telemetry = new TelemetryService();
        telemetry.recordRun(run('a'));

        telemetry.getEvents().pop();
        expect(telemetry.getEvents()).toHaveLength(1);
    });
});
