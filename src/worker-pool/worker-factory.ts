import { Worker } from 'worker_threads';
import * as path from 'path';
import type {
  MainToWorkerMessage,
  WorkerBootData,
  WorkerToMainMessage,
} from './interfaces/worker-message.interface';

export const WORKER_FACTORY = 'WorkerFactory';

/**
 * The slice of `worker_threads.Worker` the pool relies on. Tests substitute an
 * in-process implementation.
 */
export interface PoolWorker {
  postMessage(message: MainToWorkerMessage): void;
  terminate(): Promise<number>;
  on(event: 'online', listener: () => void): unknown;
  on(event: 'message', listener: (message: WorkerToMainMessage) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'exit', listener: (exitCode: number) => void): unknown;
  once(event: 'exit', listener: (exitCode: number) => void): unknown;
}

export interface WorkerLimits {
  maxMemoryMb?: number;
}

export type WorkerFactory = (bootData: WorkerBootData, limits: WorkerLimits) => PoolWorker;

export const threadWorkerFactory: WorkerFactory = (bootData, limits) =>
  new Worker(path.join(__dirname, 'threads', 'worker-thread.js'), {
    workerData: bootData,
    ...(limits.maxMemoryMb !== undefined && {
      resourceLimits: { maxOldGenerationSizeMb: limits.maxMemoryMb },
    }),
  });
