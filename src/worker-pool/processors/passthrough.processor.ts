import { createHash } from 'crypto';
import type {
  DocumentProcessor,
  ProcessedArtifact,
} from '../interfaces/document-processor.interface';
import type { JobOptions } from '../../shared/interfaces/document-job.interface';

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * Returns the document unchanged. Stands in for a real transformation so the
 * service can be deployed and exercised end to end before one is plugged in
 * through DOCUMENT_PROCESSOR.
 *
 * Options: `contentType` overrides the artifact content type.
 */
export const passthroughProcessor: DocumentProcessor = {
  name: 'passthrough',

  process(document: Uint8Array, options: JobOptions): ProcessedArtifact {
    const contentType =
      typeof options.contentType === 'string' && options.contentType.length > 0
        ? options.contentType
        : DEFAULT_CONTENT_TYPE;

    return {
      data: document,
      contentType,
      metadata: {
        processor: 'passthrough',
        sizeBytes: document.byteLength,
        sha256: createHash('sha256').update(document).digest('hex'),
      },
    };
  },
};
