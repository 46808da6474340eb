import * as path from 'path';
import type { DocumentProcessor } from '../interfaces/document-processor.interface';
import { BUILTIN_PROCESSORS } from '../processors';

type ProcessFn = DocumentProcessor['process'];

interface ProcessorLike {
  name?: unknown;
  process: ProcessFn;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' || typeof value === 'function') && value !== null;
}

function isProcessorLike(value: unknown): value is ProcessorLike {
  return isRecord(value) && typeof value.process === 'function';
}

/**
 * Picks the processor out of a loaded module. Accepted shapes, in order:
 * a `default` export, a `processor` export, or a module that exports
 * `process` itself.
 */
export function resolveProcessor(loaded: unknown, source: string): DocumentProcessor {
  if (!isRecord(loaded)) {
    throw new Error(`Processor module ${source} did not load to an object`);
  }

  const candidates = [loaded.default, loaded.processor, loaded];
  const found = candidates.find(isProcessorLike);
  if (!found) {
    throw new Error(
      `Processor module ${source} exports no process() function (looked at default, processor and the module itself)`,
    );
  }

  return {
    name: typeof found.name === 'string' ? found.name : path.basename(source),
    process: (document, options, context) => found.process(document, options, context),
  };
}

/**
 * Resolve DOCUMENT_PROCESSOR: a built-in name, or a path (relative to the
 * working directory) to a CommonJS module. The service compiles to CommonJS,
 * so `import()` here is a `require()`.
 */
export async function loadProcessor(specifier: string): Promise<DocumentProcessor> {
  const builtin = BUILTIN_PROCESSORS.get(specifier);
  if (builtin) {
    return builtin;
  }

  const modulePath = path.resolve(specifier);
  if (path.extname(modulePath) === '.mjs') {
    throw new Error(
      `Processor module ${modulePath} is an ES module; processors are loaded with require() and must be CommonJS`,
    );
  }
  const loaded: unknown = await import(modulePath);
  return resolveProcessor(loaded, modulePath);
}
