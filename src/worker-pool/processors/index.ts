import type { DocumentProcessor } from '../interfaces/document-processor.interface';
import { passthroughProcessor } from './passthrough.processor';

export const BUILTIN_PROCESSORS: ReadonlyMap<string, DocumentProcessor> = new Map([
  [passthroughProcessor.name, passthroughProcessor],
]);

export { passthroughProcessor };
