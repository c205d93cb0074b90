import type { Job } from "../contracts.js";
import { AdmissionRejectedError } from "../errors.js";

/**
 * Bounded FIFO of jobs waiting for a worker. Full means rejected: the proxy
 * never buffers past `capacity`.
 */
export class QueueManager {
  private jobs: Job[] = [];

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.jobs.length;
  }

  isFull(): boolean {
    return this.jobs.length >= this.capacity;
  }

  enqueue(job: Job): void {
    if (this.isFull()) {
      throw new AdmissionRejectedError(job.jobId, this.capacity, job.retryCount, job.lastFailure);
    }
    job.state = "queued";
    this.jobs.push(job);
  }

  /**
   * Puts a retried job back at the front. Retried jobs sit ahead of fresh ones,
   * higher retry count first; equal retry counts keep arrival order.
   */
  requeueFront(job: Job): void {
    if (this.isFull()) {
      throw new AdmissionRejectedError(job.jobId, this.capacity, job.retryCount, job.lastFailure);
    }
    job.state = "queued";
    const idx = this.jobs.findIndex(
      (queued) =>
        queued.retryCount < job.retryCount ||
        (queued.retryCount === job.retryCount && queued.arrivedAt > job.arrivedAt)
    );
    if (idx < 0) this.jobs.push(job);
    else this.jobs.splice(idx, 0, job);
  }

  dequeue(): Job | undefined {
    return this.jobs.shift();
  }

  peek(): Job | undefined {
    return this.jobs[0];
  }

  clear(): Job[] {
    const dropped = this.jobs;
    this.jobs = [];
    return dropped;
  }

  snapshot(): Job[] {
    return [...this.jobs];
  }
}
