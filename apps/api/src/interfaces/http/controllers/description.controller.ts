import type { FastifyReply, FastifyRequest } from 'fastify';
import sharp from 'sharp';
import type { ImageUpload } from '../../../services/description.service';
import type { DescriptionService } from '../../../services/description.service';
import { logPipelineFailure, streamPipeline, toSseStream } from '../../../services/pipeline-stream';
import type { TelemetryService } from '../../../services/telemetry.service';
import { fail, ok, pipelineFailure } from '../responses';

export const DESCRIPTION_FAILURE_MESSAGE = 'Description request failed';

export const SSE_HEADERS = {
    'Content-Type': 'text/event-stream; charset=utf-8',
    'Cache-Control': 'no-cache',
    'X-Accel-Buffering': 'no',
} as const;

type UploadResult =
    | { ok: true; upload: ImageUpload }
    | { ok: false; code: string; message: string };

export class DescriptionController {
    constructor(
        private readonly descriptionService: DescriptionService,
        private readonly telemetryService: TelemetryService
    ) { }

    /**
     * Reads the `image` part of a multipart body. Other parts are drained and
     * ignored; MIME checking is left to the pipeline.
     */
    private async readUpload(request: FastifyRequest): Promise<UploadResult> {
        if (!request.isMultipart()) {
            return { ok: false, code: 'VALIDATION_MULTIPART', message: 'Expected multipart/form-data' };
        }

        let upload: ImageUpload | null = null;
        for await (const part of request.parts()) {
            if (part.type !== 'file') continue;
            if (part.fieldname === 'image' && !upload) {
                upload = { bytes: await part.toBuffer(), mimeType: part.mimetype };
            } else {
                part.file.resume();
            }
        }

        if (!upload) {
            return { ok: false, code: 'VALIDATION_MISSING_IMAGE', message: 'Missing image file in multipart body' };
        }

        return { ok: true, upload: { ...upload, bytes: await this.normalizeImage(request, upload) } };
    }

    // Apply EXIF orientation and drop metadata before the photo leaves the server.
    private async normalizeImage(request: FastifyRequest, upload: ImageUpload): Promise<Buffer> {
        if (!upload.mimeType.toLowerCase().startsWith('image/') || upload.bytes.length === 0) {
            return upload.bytes;
        }
        try {
            return await sharp(upload.bytes).rotate().toBuffer();
        } catch (error) {
            request.log.warn({ requestId: request.id, err: error }, 'Failed to normalise image, using original bytes');
            return upload.bytes;
        }
    }

    async describe(request: FastifyRequest, reply: FastifyReply) {
        const requestId = request.id;
        const result = await this.readUpload(request);
        if (!result.ok) {
            return reply.code(400).send(fail(requestId, { code: result.code, message: result.message }));
        }

        const startedAt = Date.now();
        try {
            const description = await this.descriptionService.describe(result.upload, { requestId });
            this.telemetryService.recordRun({ requestId, phase: 'vision', mode: 'sync', durationMs: Date.now() - startedAt });
            return reply.code(200).send(ok(requestId, description));
        } catch (error) {
            this.telemetryService.recordRun(
                { requestId, phase: 'vision', mode: 'sync', durationMs: Date.now() - startedAt },
                error
            );
            logPipelineFailure(request.log, error, 'vision', requestId);

            const { status, body } = pipelineFailure(error, DESCRIPTION_FAILURE_MESSAGE);
            return reply.code(status).send(fail(requestId, body));
        }
    }

    async describeStream(request: FastifyRequest, reply: FastifyReply) {
        const requestId = request.id;
        const result = await this.readUpload(request);
        if (!result.ok) {
            return reply.code(400).send(fail(requestId, { code: result.code, message: result.message }));
        }

        const { upload } = result;
        const events = streamPipeline(
            'vision',
            (narrator) => this.descriptionService.describe(upload, { narrator, requestId }),
            {
                requestId,
                logger: request.log,
                failureMessage: DESCRIPTION_FAILURE_MESSAGE,
                onSettled: (outcome) => this.telemetryService.recordRun(
                    { requestId, phase: 'vision', mode: 'stream', durationMs: outcome.durationMs },
                    outcome.status === 'error' ? outcome.error : undefined
                ),
            }
        );

        return reply.code(200).headers(SSE_HEADERS).send(toSseStream(events));
    }
}
