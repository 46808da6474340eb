import { z } from 'zod';
import { TransportError } from '../../shared/errors/job.errors';
import type { JobOptions } from '../../shared/interfaces/document-job.interface';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const FileNameSchema = z.string().trim().min(1).max(255);

export const JobOptionsSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const ProcessJsonBodySchema = z
  .object({
    document: z
      .string()
      .transform((value) => value.replace(/\s+/g, ''))
      .refine((value) => value.length % 4 === 0 && BASE64_PATTERN.test(value), {
        message: 'document must be base64-encoded',
      }),
    fileName: FileNameSchema.optional(),
    options: JobOptionsSchema.optional(),
  })
  .strict();

export type ProcessJsonBodyDto = z.infer<typeof ProcessJsonBodySchema>;

/**
 * Query string of a binary upload. Repeated parameters arrive as arrays; the
 * last value wins.
 */
export const ProcessQuerySchema = z
  .record(z.union([z.string(), z.array(z.string())]))
  .transform((query) =>
    Object.fromEntries(
      Object.entries(query).map(([key, value]) => [
        key,
        Array.isArray(value) ? value[value.length - 1] ?? '' : value,
      ]),
    ),
  );

export interface ProcessRequestDto {
  document: Buffer;
  fileName?: string;
  options: JobOptions;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'body'}: ${issue.message}`)
    .join('; ');
}

function parseQuery(query: unknown): { fileName?: string; options: JobOptions } {
  const parsed = ProcessQuerySchema.safeParse(query ?? {});
  if (!parsed.success) {
    throw new TransportError('INVALID_REQUEST', `Invalid query: ${formatIssues(parsed.error)}`);
  }

  const { fileName, ...options } = parsed.data;
  if (fileName === undefined) {
    return { options };
  }

  const name = FileNameSchema.safeParse(fileName);
  if (!name.success) {
    throw new TransportError('INVALID_REQUEST', `Invalid query: fileName: ${name.error.issues[0]?.message}`);
  }
  return { fileName: name.data, options };
}

/**
 * Turn a parsed POST /process body into a document and its options.
 *
 * - `Buffer` body (application/pdf, application/octet-stream): the document
 *   itself, with options taken from the query string.
 * - Object body (application/json): `{ document: base64, fileName?, options? }`.
 *
 * @throws TransportError EMPTY_DOCUMENT when there is no body,
 *   UNSUPPORTED_MEDIA_TYPE for any other body, INVALID_REQUEST when the JSON
 *   or query does not validate
 */
export function parseProcessRequest(body: unknown, query: unknown): ProcessRequestDto {
  if (Buffer.isBuffer(body)) {
    return { document: body, ...parseQuery(query) };
  }

  if (body === undefined || body === null) {
    throw new TransportError('EMPTY_DOCUMENT', 'Request has no document');
  }

  if (typeof body !== 'object' || Array.isArray(body)) {
    throw new TransportError(
      'UNSUPPORTED_MEDIA_TYPE',
      'Send the document as application/pdf, application/octet-stream or base64 in application/json',
    );
  }

  const parsed = ProcessJsonBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new TransportError('INVALID_REQUEST', formatIssues(parsed.error));
  }

  return {
    document: Buffer.from(parsed.data.document, 'base64'),
    fileName: parsed.data.fileName,
    options: parsed.data.options ?? {},
  };
}
