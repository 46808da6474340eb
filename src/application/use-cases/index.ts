/**
 * Use Cases Barrel Export
 */
export { ProcessDocumentUseCase } from './process-document.use-case';
