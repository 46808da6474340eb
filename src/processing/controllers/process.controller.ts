import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Inject,
  Post,
  Query,
  Req,
  Res,
} from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { PROCESS_DOCUMENT_PORT } from '../../application/ports/tokens';
import type { ProcessDocumentPort } from '../../application/ports/input/process-document.port';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import type { ArtifactMetadata } from '../../shared/interfaces/document-job.interface';
import { parseProcessRequest } from '../dto/process-request.dto';

export const PROCESSING_TIME_HEADER = 'x-processing-time-ms';
export const QUEUE_TIME_HEADER = 'x-queue-time-ms';
export const JOB_METADATA_HEADER = 'x-job-metadata';

/**
 * Header values must stay within Latin-1, so the metadata JSON is
 * percent-encoded; clients read it back with `decodeURIComponent`.
 */
export function encodeJobMetadata(metadata: ArtifactMetadata): string {
  return encodeURIComponent(JSON.stringify(metadata));
}

/**
 * POST /process
 *
 * One request is one job. The response body is the artifact; failures are
 * thrown as JobErrors and rendered by JobExceptionFilter.
 */
@Controller()
export class ProcessController {
  constructor(
    @Inject(PROCESS_DOCUMENT_PORT) private readonly processDocument: ProcessDocumentPort,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(ProcessController.name);
  }

  @Post('process')
  @HttpCode(HttpStatus.OK)
  async process(
    @Body() body: unknown,
    @Query() query: unknown,
    @Req() request: FastifyRequest,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<Buffer> {
    const jobId = request.id;
    const payload = parseProcessRequest(body, query);

    // The response socket closing before we have written anything means the
    // client gave up; cancel the job so its worker is freed.
    const abortController = new AbortController();
    const onClose = (): void => {
      if (!reply.raw.writableEnded) {
        this.logger.withJobId(jobId).warn('Client disconnected before the job finished');
        abortController.abort();
      }
    };
    reply.raw.on('close', onClose);

    try {
      const result = await this.processDocument.execute({
        jobId,
        document: payload.document,
        fileName: payload.fileName,
        options: payload.options,
        signal: abortController.signal,
      });

      reply.type(result.contentType);
      reply.header(PROCESSING_TIME_HEADER, String(result.processingTimeMs));
      reply.header(QUEUE_TIME_HEADER, String(result.queueTimeMs));
      if (result.metadata) {
        reply.header(JOB_METADATA_HEADER, encodeJobMetadata(result.metadata));
      }

      return result.artifact;
    } finally {
      reply.raw.off('close', onClose);
    }
  }
}
