export type {
  ProcessDocumentCommand,
  ProcessDocumentResult,
  ProcessDocumentPort,
} from './process-document.port';
