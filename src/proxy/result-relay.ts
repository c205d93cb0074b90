import type { Job, JobSummary } from "../contracts.js";
import type { TerminalJobError } from "../errors.js";
import type { ProxyLogger } from "../logger.js";
import type { ProxyPluginContext } from "../plugins/types.js";
import type { ReleaseOutcome } from "./worker-registry.js";

export type JobOutcome =
  | { ok: true; job: Job; workerId: string; proof: string }
  | { ok: false; job: Job; error: TerminalJobError };

export type Delivery = "delivered" | "discarded";

export interface WorkerReleaser {
  markIdle(workerId: string, options?: { completed?: boolean }): ReleaseOutcome;
}

type Deliver = (outcome: JobOutcome) => void;

export class ResultRelay {
  private waiters = new Map<string, Deliver>();
  private settled = new WeakSet<Job>();
  private history = new Map<string, JobSummary>();
  private readonly historyLimit: number;

  constructor(
    private readonly options: {
      ctx: ProxyPluginContext;
      log: ProxyLogger;
      historyLimit?: number;
    }
  ) {
    this.historyLimit = options.historyLimit ?? 500;
  }

  attach(jobId: string, deliver: Deliver): void {
    this.waiters.set(jobId, deliver);
  }

  /** The client went away. The job keeps running; only delivery is skipped. */
  detach(jobId: string): boolean {
    return this.waiters.delete(jobId);
  }

  isAwaited(jobId: string): boolean {
    return this.waiters.has(jobId);
  }

  /**
   * Frees the worker first, whether or not anyone is still waiting, then hands
   * the proof over.
   */
  complete(
    job: Job,
    workerId: string,
    proof: string,
    workers: WorkerReleaser
  ): { delivery: Delivery; release: ReleaseOutcome | null } {
    if (this.alreadySettled(job)) return { delivery: "discarded", release: null };
    const release = workers.markIdle(workerId, { completed: true });
    job.state = "completed";
    job.assignedWorkerId = undefined;
    const delivery = this.settle({ ok: true, job, workerId, proof }, workerId);
    return { delivery, release };
  }

  fail(job: Job, error: TerminalJobError): Delivery {
    if (this.alreadySettled(job)) return "discarded";
    job.state = "failed";
    job.assignedWorkerId = undefined;
    return this.settle({ ok: false, job, error });
  }

  summary(jobId: string): JobSummary | undefined {
    return this.history.get(jobId);
  }

  recent(): JobSummary[] {
    return [...this.history.values()];
  }

  private settle(outcome: JobOutcome, workerId?: string): Delivery {
    const { job } = outcome;
    this.settled.add(job);

    const now = Date.now();
    this.remember({
      jobId: job.jobId,
      state: job.state,
      retryCount: job.retryCount,
      attempts: job.attempts,
      arrivedAt: job.arrivedAt,
      finishedAt: now,
      workerId,
      failureCode: outcome.ok ? undefined : outcome.error.code,
    });

    this.options.ctx.emit(
      outcome.ok
        ? { type: "job.completed", at: now, jobId: job.jobId, workerId }
        : {
            type: "job.failed",
            at: now,
            jobId: job.jobId,
            detail: { error: outcome.error.code, retryCount: job.retryCount },
          }
    );

    const deliver = this.waiters.get(job.jobId);
    this.waiters.delete(job.jobId);
    if (!deliver) {
      this.options.log.debug({ jobId: job.jobId }, "client gone; discarding job outcome");
      this.options.ctx.emit({ type: "job.discarded", at: now, jobId: job.jobId });
      return "discarded";
    }
    deliver(outcome);
    return "delivered";
  }

  private alreadySettled(job: Job): boolean {
    if (!this.settled.has(job)) return false;
    this.options.log.error({ jobId: job.jobId }, "job outcome settled twice; ignoring");
    return true;
  }

  private remember(summary: JobSummary) {
    this.history.delete(summary.jobId);
    this.history.set(summary.jobId, summary);
    if (this.history.size > this.historyLimit) {
      const oldest = this.history.keys().next().value;
      if (oldest !== undefined) this.history.delete(oldest);
    }
  }
}
