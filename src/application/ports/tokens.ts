// Injection tokens for ports (string tokens for DI)
export const WORKER_POOL_PORT = 'WorkerPoolPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
export const PROCESS_DOCUMENT_PORT = 'ProcessDocumentPort';
