import type { FailureCause, WorkerStatus } from "./contracts.js";

export type ProxyErrorCode =
  | "admission_rejected"
  | "unknown_worker"
  | "worker_unhealthy"
  | "job_timeout"
  | "retry_exhausted"
  | "transport_error"
  | "worker_error"
  | "job_id_conflict"
  | "invalid_worker_transition"
  | "config_invalid";

export abstract class ProxyError extends Error {
  abstract readonly code: ProxyErrorCode;

  toJSON(): Record<string, unknown> {
    return { error: this.code, message: this.message };
  }
}

/** Queue full, either at submission or when a failed job is put back. */
export class AdmissionRejectedError extends ProxyError {
  readonly code = "admission_rejected" as const;

  constructor(
    readonly jobId: string,
    readonly queueCapacity: number,
    readonly retryCount = 0,
    readonly lastFailure?: FailureCause
  ) {
    super(`queue is full (capacity ${queueCapacity}); job ${jobId} rejected`);
    this.name = "AdmissionRejectedError";
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      jobId: this.jobId,
      queueCapacity: this.queueCapacity,
      retryCount: this.retryCount,
      lastFailure: this.lastFailure ?? null,
    };
  }
}

export class UnknownWorkerError extends ProxyError {
  readonly code = "unknown_worker" as const;

  constructor(readonly workerId: string) {
    super(`unknown worker: ${workerId}`);
    this.name = "UnknownWorkerError";
  }
}

export class WorkerUnhealthyError extends ProxyError {
  readonly code = "worker_unhealthy" as const;

  constructor(
    readonly workerId: string,
    readonly consecutiveFailures: number
  ) {
    super(`worker ${workerId} marked unhealthy after ${consecutiveFailures} failed probes`);
    this.name = "WorkerUnhealthyError";
  }
}

export class JobTimeoutError extends ProxyError {
  readonly code = "job_timeout" as const;

  constructor(
    readonly jobId: string,
    readonly workerId: string,
    readonly timeoutMs: number
  ) {
    super(`job ${jobId} exceeded its ${timeoutMs}ms deadline on worker ${workerId}`);
    this.name = "JobTimeoutError";
  }
}

export class RetryExhaustedError extends ProxyError {
  readonly code = "retry_exhausted" as const;

  constructor(
    readonly jobId: string,
    readonly retryCount: number,
    readonly lastFailure?: FailureCause
  ) {
    super(`job ${jobId} failed after ${retryCount} retries`);
    this.name = "RetryExhaustedError";
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.code,
      message: this.message,
      jobId: this.jobId,
      retryCount: this.retryCount,
      lastFailure: this.lastFailure ?? null,
    };
  }
}

export class TransportError extends ProxyError {
  readonly code = "transport_error" as const;

  constructor(
    readonly workerId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`transport to ${workerId} failed: ${message}`, options);
    this.name = "TransportError";
  }
}

/** The worker answered, but with a failure instead of a proof. */
export class WorkerJobError extends ProxyError {
  readonly code = "worker_error" as const;

  constructor(
    readonly workerId: string,
    readonly reason: string
  ) {
    super(`worker ${workerId} failed the job: ${reason}`);
    this.name = "WorkerJobError";
  }
}

export class JobConflictError extends ProxyError {
  readonly code = "job_id_conflict" as const;

  constructor(readonly jobId: string) {
    super(`job ${jobId} is already in flight`);
    this.name = "JobConflictError";
  }
}

export class InvalidWorkerTransitionError extends ProxyError {
  readonly code = "invalid_worker_transition" as const;

  constructor(
    readonly workerId: string,
    readonly from: WorkerStatus,
    readonly to: WorkerStatus
  ) {
    super(`worker ${workerId} cannot go from ${from} to ${to}`);
    this.name = "InvalidWorkerTransitionError";
  }
}

export class ConfigError extends ProxyError {
  readonly code = "config_invalid" as const;

  constructor(readonly issues: string[]) {
    super(`invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

export function isProxyError(err: unknown): err is ProxyError {
  return err instanceof ProxyError;
}

export function toFailureCause(err: ProxyError, at = Date.now()): FailureCause {
  const workerId = "workerId" in err && typeof err.workerId === "string" ? err.workerId : undefined;
  return { code: err.code, message: err.message, workerId, at };
}

/** Terminal errors are the only ones a submitting client ever sees. */
export type TerminalJobError = AdmissionRejectedError | RetryExhaustedError;
