import { EventEmitter } from 'events';
import type { DocumentProcessor } from '../../../../src/worker-pool/interfaces/document-processor.interface';
import {
  MainToWorkerMessage,
  WorkerBootData,
  WorkerMessageType,
} from '../../../../src/worker-pool/interfaces/worker-message.interface';
import type { PoolWorker, WorkerFactory } from '../../../../src/worker-pool/worker-factory';
import { runJob } from '../../../../src/worker-pool/threads/job-runner';

export type StartupBehaviour = 'online' | 'error' | 'silent';

/**
 * In-process stand-in for a worker thread. Speaks the same message protocol
 * and runs the processor on the main thread through the same job runner the
 * real thread uses.
 */
export class FakeWorker extends EventEmitter implements PoolWorker {
  readonly received: MainToWorkerMessage[] = [];
  terminated = false;
  exited = false;
  /** When set, postMessage throws it, as a message that cannot be cloned does. */
  postError?: Error;

  constructor(
    readonly bootData: WorkerBootData,
    private readonly processor: DocumentProcessor,
    startup: StartupBehaviour = 'online',
  ) {
    super();

    queueMicrotask(() => {
      if (startup === 'online') {
        this.emit('online');
      } else if (startup === 'error') {
        this.emit('error', new Error('processor failed to load'));
        this.exit(1);
      }
    });
  }

  postMessage(message: MainToWorkerMessage): void {
    if (this.postError) {
      throw this.postError;
    }
    this.received.push(message);

    switch (message.type) {
      case WorkerMessageType.PROCESS_JOB:
        void runJob(this.processor, message.payload).then((reply) => {
          if (!this.exited) {
            this.emit('message', reply);
          }
        });
        break;

      case WorkerMessageType.SHUTDOWN:
        queueMicrotask(() => this.exit(0));
        break;
    }
  }

  async terminate(): Promise<number> {
    this.terminated = true;
    queueMicrotask(() => this.exit(1));
    return 1;
  }

  /**
   * Simulate the thread dying on its own, e.g. out of memory
   */
  crash(error: Error): void {
    this.emit('error', error);
    this.exit(1);
  }

  /**
   * Simulate the thread exiting without an error event, e.g. a native abort
   */
  kill(code: number): void {
    this.exit(code);
  }

  private exit(code: number): void {
    if (this.exited) return;
    this.exited = true;
    this.emit('exit', code);
  }
}

export interface FakeWorkerFactory {
  factory: WorkerFactory;
  workers: FakeWorker[];
}

/**
 * Worker factory producing FakeWorkers. `startups` scripts how successive
 * workers come up; workers beyond the script come online normally.
 */
export function createFakeWorkerFactory(
  processor: DocumentProcessor,
  startups: StartupBehaviour[] = [],
): FakeWorkerFactory {
  const workers: FakeWorker[] = [];
  const factory: WorkerFactory = (bootData) => {
    const worker = new FakeWorker(bootData, processor, startups[workers.length] ?? 'online');
    workers.push(worker);
    return worker;
  };
  return { factory, workers };
}
