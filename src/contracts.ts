export type SchemaVersion = "1.0";

export type WorkerStatus = "idle" | "busy" | "unhealthy" | "draining";

export type LoadBalancingPolicy = "round-robin" | "least-recently-used" | "least-loaded";

export interface WorkerView {
  workerId: string;
  address: string;
  status: WorkerStatus;
  registeredAt: number;
  lastHeartbeat?: number;
  consecutiveFailures: number;
  currentJobId: string | null;
  /** Busy with no job: waiting on a probe after a timeout or transport failure. */
  heldForProbe: boolean;
  drainRequested: boolean;
  dispatchCount: number;
  completedCount: number;
  lastAssignedAt?: number;
  unhealthySince?: number;
}

export type JobState = "queued" | "dispatched" | "completed" | "failed";

export interface FailureCause {
  code: string;
  message: string;
  workerId?: string;
  at: number;
}

export interface Job {
  schemaVersion: SchemaVersion;
  jobId: string;
  /** Opaque to the proxy; forwarded to the worker untouched. */
  payload: string;
  arrivedAt: number;
  /** Set on each dispatch: dispatchedAt + per-job timeout. */
  deadline?: number;
  retryCount: number;
  attempts: number;
  assignedWorkerId?: string;
  dispatchedAt?: number;
  state: JobState;
  lastFailure?: FailureCause;
}

export interface JobSubmission {
  jobId?: string;
  payload: string;
}

export interface ProveRequest {
  jobId: string;
  payload: string;
}

export type ProveReply = { ok: true; proof: string } | { ok: false; error: string };

/** What a finished job leaves behind once its proof has been handed over. */
export interface JobSummary {
  jobId: string;
  state: JobState;
  retryCount: number;
  attempts: number;
  arrivedAt: number;
  finishedAt: number;
  workerId?: string;
  failureCode?: string;
}
