import { randomUUID } from "node:crypto";
import type { Mutex } from "async-mutex";
import type { FailureCause, Job, JobSubmission, ProveReply } from "../contracts.js";
import {
  AdmissionRejectedError,
  JobConflictError,
  JobTimeoutError,
  RetryExhaustedError,
  TransportError,
  WorkerJobError,
  isProxyError,
  toFailureCause,
  type ProxyError,
} from "../errors.js";
import type { ProxyLogger } from "../logger.js";
import type { ProxyPluginContext } from "../plugins/types.js";
import type { WorkerTransport } from "../transport/types.js";
import type { QueueManager } from "./queue-manager.js";
import type { JobOutcome, ResultRelay } from "./result-relay.js";
import type { RetryCoordinator } from "./retry-coordinator.js";
import type { WorkerRegistry } from "./worker-registry.js";

const SCHEMA_VERSION = "1.0" as const;

export interface Submission {
  job: Job;
  /** Settles exactly once; never rejects. */
  outcome: Promise<JobOutcome>;
}

export interface DispatcherOptions {
  registry: WorkerRegistry;
  queue: QueueManager;
  retry: RetryCoordinator;
  relay: ResultRelay;
  transport: WorkerTransport;
  /** Serializes every registry and queue mutation. */
  mutex: Mutex;
  jobTimeoutMs: number;
  ctx: ProxyPluginContext;
  log: ProxyLogger;
  /** Called when a worker is held back after a timeout or transport failure. */
  onHeldForProbe?: (workerId: string) => Promise<void>;
}

function isTerminal(job: Job): boolean {
  return job.state === "completed" || job.state === "failed";
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class Dispatcher {
  private jobs = new Map<string, Job>();
  private controllers = new Set<AbortController>();
  private closed = false;

  constructor(private readonly options: DispatcherOptions) {}

  /**
   * Admits a job: straight to an idle worker when there is one, otherwise into
   * the queue. Throws `AdmissionRejectedError` when neither has room.
   */
  async submit(input: JobSubmission): Promise<Submission> {
    const { registry, queue, relay, mutex, ctx, log } = this.options;

    return mutex.runExclusive(() => {
      this.forgetFinished();
      const jobId = input.jobId ?? randomUUID();
      if (this.jobs.has(jobId)) throw new JobConflictError(jobId);

      const now = Date.now();
      const [worker] = registry.listIdle();
      if (this.closed || (!worker && queue.isFull())) {
        ctx.emit({ type: "job.rejected", at: now, jobId, detail: { queueDepth: queue.size } });
        log.warn({ jobId, queueDepth: queue.size }, "queue full; job rejected");
        throw new AdmissionRejectedError(jobId, queue.capacity);
      }

      const job: Job = {
        schemaVersion: SCHEMA_VERSION,
        jobId,
        payload: input.payload,
        arrivedAt: now,
        retryCount: 0,
        attempts: 0,
        state: "queued",
      };
      const outcome = new Promise<JobOutcome>((resolve) => relay.attach(jobId, resolve));
      this.jobs.set(jobId, job);
      ctx.emit({ type: "job.submitted", at: now, jobId });

      if (worker) {
        this.assign(job, worker.workerId, now);
      } else {
        queue.enqueue(job);
        ctx.emit({ type: "job.queued", at: now, jobId, detail: { queueDepth: queue.size } });
      }
      return { job, outcome };
    });
  }

  getJob(jobId: string): Job | undefined {
    const job = this.jobs.get(jobId);
    return job && !isTerminal(job) ? job : undefined;
  }

  listJobs(): Job[] {
    return [...this.jobs.values()].filter((job) => !isTerminal(job));
  }

  /**
   * A worker was just released: hand it the oldest waiting job if it is still
   * idle, then fill any other idle workers. A worker removed on release still
   * frees its requeued job for the others. Caller must hold the state lock.
   */
  onWorkerIdle(workerId: string): void {
    const { registry, queue } = this.options;
    if (this.closed) return;
    if (registry.has(workerId) && registry.get(workerId).status === "idle") {
      const job = queue.dequeue();
      if (job) this.assign(job, workerId);
    }
    this.dispatchPending();
  }

  /** Pairs queued jobs with idle workers until one side runs out. Caller holds the lock. */
  dispatchPending(): void {
    const { registry, queue } = this.options;
    while (!this.closed && queue.size > 0) {
      const [worker] = registry.listIdle();
      if (!worker) return;
      const job = queue.dequeue();
      if (!job) return;
      this.assign(job, worker.workerId);
    }
  }

  /** Fails every live job and aborts in-flight forwards. */
  async close(): Promise<void> {
    const { queue, relay, mutex, log } = this.options;
    await mutex.runExclusive(() => {
      this.closed = true;
      const cause: FailureCause = {
        code: "transport_error",
        message: "proxy shutting down",
        at: Date.now(),
      };
      queue.clear();
      for (const job of this.listJobs()) {
        relay.fail(job, new RetryExhaustedError(job.jobId, job.retryCount, cause));
      }
      this.jobs.clear();
    });
    for (const controller of this.controllers) controller.abort(new Error("proxy shutting down"));
    this.controllers.clear();
    log.info("dispatcher closed");
  }

  /** Job→Dispatched and Worker→Busy in one step, under the lock. */
  private assign(job: Job, workerId: string, now = Date.now()): void {
    const { registry, ctx, log, jobTimeoutMs } = this.options;
    registry.markBusy(workerId, job, now);
    job.state = "dispatched";
    job.assignedWorkerId = workerId;
    job.attempts += 1;
    job.dispatchedAt = now;
    job.deadline = now + jobTimeoutMs;

    log.info(
      { jobId: job.jobId, workerId, attempt: job.attempts, retryCount: job.retryCount },
      "job dispatched"
    );
    ctx.emit({
      type: "job.dispatched",
      at: now,
      jobId: job.jobId,
      workerId,
      detail: { attempt: job.attempts, retryCount: job.retryCount },
    });

    const attempt = job.attempts;
    const address = registry.get(workerId).address;
    void this.execute(job, workerId, address, attempt).catch((err) => {
      log.error({ err, jobId: job.jobId, workerId }, "job execution crashed");
    });
  }

  /** One per dispatch attempt; the lock is only taken to record the outcome. */
  private async execute(job: Job, workerId: string, address: string, attempt: number) {
    const { transport, mutex, jobTimeoutMs } = this.options;
    const controller = new AbortController();
    this.controllers.add(controller);
    const timer = setTimeout(
      () => controller.abort(new JobTimeoutError(job.jobId, workerId, jobTimeoutMs)),
      jobTimeoutMs
    );

    let reply: ProveReply | undefined;
    let failure: ProxyError | undefined;
    try {
      const request = { jobId: job.jobId, payload: job.payload };
      // a transport that ignores the signal still loses the race to the deadline
      reply = await Promise.race([
        transport.prove(address, request, controller.signal),
        new Promise<never>((_, reject) => {
          controller.signal.addEventListener("abort", () => reject(controller.signal.reason), {
            once: true,
          });
        }),
      ]);
    } catch (err) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : err;
      failure = isProxyError(reason)
        ? reason
        : new TransportError(workerId, describe(reason), { cause: reason });
    } finally {
      clearTimeout(timer);
      this.controllers.delete(controller);
    }

    await mutex.runExclusive(() => this.settleAttempt(job, workerId, attempt, reply, failure));
  }

  private settleAttempt(
    job: Job,
    workerId: string,
    attempt: number,
    reply: ProveReply | undefined,
    failure: ProxyError | undefined
  ): void {
    const { registry, relay, retry, log } = this.options;
    const current =
      job.state === "dispatched" && job.assignedWorkerId === workerId && job.attempts === attempt;
    if (this.closed || !current) {
      log.debug({ jobId: job.jobId, workerId, attempt }, "ignoring result of a superseded attempt");
      return;
    }

    if (reply?.ok) {
      const { release } = relay.complete(job, workerId, reply.proof, registry);
      this.jobs.delete(job.jobId);
      log.info({ jobId: job.jobId, workerId, attempt }, "job completed");
      if (release === "idle") this.onWorkerIdle(workerId);
      return;
    }

    const error = failure ?? new WorkerJobError(workerId, reply ? reply.error : "no reply");
    const cause = toFailureCause(error);
    log.warn({ jobId: job.jobId, workerId, attempt, cause: cause.code }, "job attempt failed");

    // A worker that answered is fine; one that timed out or vanished waits for a probe.
    let heldForProbe = false;
    if (error instanceof WorkerJobError) {
      registry.markIdle(workerId);
    } else {
      heldForProbe = registry.holdForProbe(workerId) !== "removed";
    }

    retry.handleFailure(job, cause);
    if (isTerminal(job)) this.jobs.delete(job.jobId);

    if (heldForProbe) {
      void this.options.onHeldForProbe?.(workerId).catch((err) => {
        log.error({ err, workerId }, "follow-up probe crashed");
      });
    }
    this.onWorkerIdle(workerId);
  }

  private forgetFinished() {
    for (const [jobId, job] of this.jobs) {
      if (isTerminal(job)) this.jobs.delete(jobId);
    }
  }
}
