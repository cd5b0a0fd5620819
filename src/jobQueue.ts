import { createRequire } from 'module';
import type { JobResolveReject } from './types.js';

const require = createRequire(import.meta.url);

type QueueJob = () => Promise<unknown>;

interface Queue {
  push(job: QueueJob): void;
  on(event: 'success', callback: (result: unknown, job: QueueJob) => void): void;
  on(event: 'error', callback: (error: unknown, job: QueueJob) => void): void;
}

type QueueFactory = (options: { concurrency: number; autostart: boolean }) => Queue;

const queue: QueueFactory = require('queue');

/**
 * Runs jobs one at a time, in submission order.
 * The session is not safe for interleaved calls; every front-end request goes through here.
 */
export class JobQueue {
  private readonly theQueue: Queue;
  private readonly jobResolveRejectMap = new Map<QueueJob, JobResolveReject>();

  constructor() {
    this.theQueue = queue({ concurrency: 1, autostart: true });

    this.theQueue.on('success', this.onJobComplete.bind(this));
    this.theQueue.on('error', this.onJobFailed.bind(this));
  }

  /** Jobs waiting or running */
  get pending(): number {
    return this.jobResolveRejectMap.size;
  }

  addJob<T>(job: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      let outcome: { value: T } | undefined;
      // a fresh wrapper per call, so the same function can be queued twice
      const queued: QueueJob = async () => {
        outcome = { value: await job() };
      };
      this.jobResolveRejectMap.set(queued, {
        resolve: () => {
          if (outcome) {
            resolve(outcome.value);
          }
        },
        reject,
      });
      this.theQueue.push(queued);
    });
  }

  private onJobComplete(_result: unknown, job: QueueJob): void {
    const resolveReject = this.jobResolveRejectMap.get(job);
    if (resolveReject) {
      const { resolve } = resolveReject;
      this.jobResolveRejectMap.delete(job);
      resolve();
    }
  }

  private onJobFailed(error: unknown, job: QueueJob): void {
    const resolveReject = this.jobResolveRejectMap.get(job);
    if (resolveReject) {
      const { reject } = resolveReject;
      this.jobResolveRejectMap.delete(job);
      reject(error);
    }
  }
}
