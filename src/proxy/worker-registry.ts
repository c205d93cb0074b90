import type { FailureCause, Job, WorkerStatus, WorkerView } from "../contracts.js";
import { InvalidWorkerTransitionError, UnknownWorkerError } from "../errors.js";
import type { ProxyLogger } from "../logger.js";
import type { ProxyPluginContext } from "../plugins/types.js";
import type { LoadBalancer } from "./load-balancer.js";

export interface WorkerRecord {
  workerId: string;
  address: string;
  /** Registration order; the tiebreak for every balancing policy. */
  seq: number;
  status: WorkerStatus;
  registeredAt: number;
  lastHeartbeat?: number;
  consecutiveFailures: number;
  currentJob?: Job;
  heldForProbe: boolean;
  drainRequested: boolean;
  removeWhenIdle: boolean;
  dispatchCount: number;
  completedCount: number;
  lastAssignment: number;
  lastAssignedAt?: number;
  unhealthySince?: number;
}

/** Receives jobs pulled off a worker that was declared unhealthy. */
export interface EvictionSink {
  evict(job: Job, cause: FailureCause): void;
}

export type ReleaseOutcome = WorkerStatus | "removed";

export type ProbeSuccessOutcome = "recovered" | "released" | "unchanged";

/**
 * Source of truth for worker state. Every status change goes through here;
 * callers are expected to hold the proxy state lock.
 */
export class WorkerRegistry {
  private workers = new Map<string, WorkerRecord>();
  private nextSeq = 0;
  private assignmentClock = 0;

  constructor(
    private readonly options: {
      balancer: LoadBalancer;
      evictions: EvictionSink;
      ctx: ProxyPluginContext;
      log: ProxyLogger;
    }
  ) {}

  get size(): number {
    return this.workers.size;
  }

  register(address: string, now = Date.now()): WorkerView {
    const existing = this.workers.get(address);
    if (existing) return this.toView(existing);

    const record: WorkerRecord = {
      workerId: address,
      address,
      seq: this.nextSeq++,
      status: "idle",
      registeredAt: now,
      consecutiveFailures: 0,
      heldForProbe: false,
      drainRequested: false,
      removeWhenIdle: false,
      dispatchCount: 0,
      completedCount: 0,
      lastAssignment: 0,
    };
    this.workers.set(address, record);
    this.options.log.info({ workerId: address }, "worker registered");
    this.options.ctx.emit({ type: "worker.registered", at: now, workerId: address });
    return this.toView(record);
  }

  /** A worker still holding a job is drained and removed when the job ends. */
  deregister(workerId: string): "removed" | "draining" {
    const worker = this.get(workerId);
    if (worker.currentJob) {
      worker.drainRequested = true;
      worker.removeWhenIdle = true;
      worker.status = "draining";
      this.options.ctx.emit({ type: "worker.draining", at: Date.now(), workerId });
      return "draining";
    }
    this.remove(worker);
    return "removed";
  }

  has(workerId: string): boolean {
    return this.workers.has(workerId);
  }

  get(workerId: string): WorkerRecord {
    const worker = this.workers.get(workerId);
    if (!worker) throw new UnknownWorkerError(workerId);
    return worker;
  }

  view(workerId: string): WorkerView {
    return this.toView(this.get(workerId));
  }

  list(): WorkerView[] {
    return [...this.workers.values()].map((w) => this.toView(w));
  }

  listIdle(): WorkerRecord[] {
    const idle = [...this.workers.values()].filter((w) => w.status === "idle");
    return this.options.balancer.order(idle);
  }

  markBusy(workerId: string, job: Job, now = Date.now()): void {
    const worker = this.get(workerId);
    if (worker.status !== "idle" || worker.currentJob) {
      throw new InvalidWorkerTransitionError(workerId, worker.status, "busy");
    }
    worker.status = "busy";
    worker.currentJob = job;
    worker.dispatchCount += 1;
    worker.lastAssignment = ++this.assignmentClock;
    worker.lastAssignedAt = now;
    this.options.balancer.assigned(worker);
  }

  /** Drops the worker's job reference and makes it eligible again. */
  markIdle(workerId: string, options: { completed?: boolean } = {}): ReleaseOutcome {
    const worker = this.get(workerId);
    if (worker.status === "unhealthy") {
      throw new InvalidWorkerTransitionError(workerId, worker.status, "idle");
    }
    if (options.completed) worker.completedCount += 1;
    worker.currentJob = undefined;
    worker.heldForProbe = false;
    return this.settle(worker);
  }

  /**
   * After a timeout or transport failure the worker may still be computing or
   * may be gone. It drops the job but stays out of the idle pool until a probe
   * answers.
   */
  holdForProbe(workerId: string): ReleaseOutcome {
    const worker = this.get(workerId);
    worker.currentJob = undefined;
    if (worker.removeWhenIdle) {
      this.remove(worker);
      return "removed";
    }
    if (worker.status === "unhealthy") return worker.status;
    worker.heldForProbe = true;
    if (worker.status === "idle") worker.status = "busy";
    return worker.status;
  }

  markUnhealthy(workerId: string, cause: FailureCause, now = Date.now()): Job | undefined {
    const worker = this.get(workerId);
    if (worker.status === "unhealthy") return undefined;

    const evicted = worker.currentJob;
    worker.currentJob = undefined;
    worker.heldForProbe = false;
    worker.status = "unhealthy";
    worker.unhealthySince = now;

    this.options.log.warn(
      { workerId, failures: worker.consecutiveFailures, evictedJobId: evicted?.jobId },
      "worker marked unhealthy"
    );
    this.options.ctx.emit({
      type: "worker.unhealthy",
      at: now,
      workerId,
      jobId: evicted?.jobId,
      detail: { consecutiveFailures: worker.consecutiveFailures },
    });

    if (evicted) this.options.evictions.evict(evicted, cause);
    if (worker.removeWhenIdle) this.remove(worker);
    return evicted;
  }

  recordProbeSuccess(workerId: string, now = Date.now()): ProbeSuccessOutcome {
    const worker = this.get(workerId);
    worker.lastHeartbeat = now;
    worker.consecutiveFailures = 0;

    if (worker.status === "unhealthy") {
      worker.unhealthySince = undefined;
      worker.status = worker.drainRequested ? "draining" : "idle";
      this.options.log.info({ workerId, status: worker.status }, "worker recovered");
      this.options.ctx.emit({ type: "worker.recovered", at: now, workerId });
      return "recovered";
    }

    if (worker.heldForProbe && !worker.currentJob) {
      worker.heldForProbe = false;
      this.settle(worker);
      return "released";
    }

    return "unchanged";
  }

  /** Returns the new consecutive-failure count. */
  recordProbeFailure(workerId: string): number {
    const worker = this.get(workerId);
    worker.consecutiveFailures += 1;
    return worker.consecutiveFailures;
  }

  drain(workerId: string): WorkerStatus {
    const worker = this.get(workerId);
    worker.drainRequested = true;
    if (worker.status === "idle" || worker.status === "busy") worker.status = "draining";
    this.options.ctx.emit({ type: "worker.draining", at: Date.now(), workerId });
    return worker.status;
  }

  undrain(workerId: string): WorkerStatus {
    const worker = this.get(workerId);
    worker.drainRequested = false;
    worker.removeWhenIdle = false;
    if (worker.status === "draining") {
      worker.status = worker.currentJob || worker.heldForProbe ? "busy" : "idle";
    }
    this.options.ctx.emit({ type: "worker.undrained", at: Date.now(), workerId });
    return worker.status;
  }

  /** Removes workers that stayed unhealthy for at least `afterMs`. */
  evictUnhealthy(now: number, afterMs: number): string[] {
    if (afterMs <= 0) return [];
    const removed: string[] = [];
    for (const worker of [...this.workers.values()]) {
      if (worker.status !== "unhealthy" || worker.unhealthySince === undefined) continue;
      if (now - worker.unhealthySince < afterMs) continue;
      this.remove(worker, "worker.evicted");
      removed.push(worker.workerId);
    }
    return removed;
  }

  private settle(worker: WorkerRecord): ReleaseOutcome {
    if (worker.removeWhenIdle) {
      this.remove(worker);
      return "removed";
    }
    worker.status = worker.drainRequested ? "draining" : "idle";
    return worker.status;
  }

  private remove(
    worker: WorkerRecord,
    type: "worker.deregistered" | "worker.evicted" = "worker.deregistered"
  ) {
    this.workers.delete(worker.workerId);
    this.options.log.info({ workerId: worker.workerId, reason: type }, "worker removed");
    this.options.ctx.emit({ type, at: Date.now(), workerId: worker.workerId });
  }

  private toView(worker: WorkerRecord): WorkerView {
    return {
      workerId: worker.workerId,
      address: worker.address,
      status: worker.status,
      registeredAt: worker.registeredAt,
      lastHeartbeat: worker.lastHeartbeat,
      consecutiveFailures: worker.consecutiveFailures,
      currentJobId: worker.currentJob?.jobId ?? null,
      heldForProbe: worker.heldForProbe,
      drainRequested: worker.drainRequested,
      dispatchCount: worker.dispatchCount,
      completedCount: worker.completedCount,
      lastAssignedAt: worker.lastAssignedAt,
      unhealthySince: worker.unhealthySince,
    };
  }
}
