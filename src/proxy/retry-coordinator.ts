import type { FailureCause, Job } from "../contracts.js";
import { AdmissionRejectedError, RetryExhaustedError } from "../errors.js";
import type { ProxyLogger } from "../logger.js";
import type { ProxyPluginContext } from "../plugins/types.js";
import { computeRetryDecision, type RetryDecision } from "../control/retry-policy.js";
import type { QueueManager } from "./queue-manager.js";
import type { ResultRelay } from "./result-relay.js";
import type { EvictionSink } from "./worker-registry.js";

/**
 * Decides what happens to a dispatched job that failed: back to the front of
 * the queue, or a terminal failure handed to the relay.
 */
export class RetryCoordinator implements EvictionSink {
  constructor(
    private readonly options: {
      maxRetries: number;
      queue: QueueManager;
      relay: ResultRelay;
      ctx: ProxyPluginContext;
      log: ProxyLogger;
    }
  ) {}

  handleFailure(job: Job, cause: FailureCause): RetryDecision {
    const { queue, relay, ctx, log } = this.options;
    job.lastFailure = cause;
    job.assignedWorkerId = undefined;
    job.deadline = undefined;

    const decision = computeRetryDecision({
      retryCount: job.retryCount,
      maxRetries: this.options.maxRetries,
      queueFull: queue.isFull(),
    });

    if (decision.action === "requeue") {
      job.retryCount = decision.nextRetryCount;
      queue.requeueFront(job);
      log.info(
        { jobId: job.jobId, retryCount: job.retryCount, cause: cause.code },
        "job requeued for retry"
      );
      ctx.emit({
        type: "job.retried",
        at: cause.at,
        jobId: job.jobId,
        workerId: cause.workerId,
        detail: { retryCount: job.retryCount, cause: cause.code },
      });
      return decision;
    }

    const error =
      decision.reason === "queue_full"
        ? new AdmissionRejectedError(job.jobId, queue.capacity, job.retryCount, cause)
        : new RetryExhaustedError(job.jobId, job.retryCount, cause);
    log.warn(
      { jobId: job.jobId, retryCount: job.retryCount, cause: cause.code, error: error.code },
      "job failed terminally"
    );
    relay.fail(job, error);
    return decision;
  }

  evict(job: Job, cause: FailureCause): void {
    this.handleFailure(job, cause);
  }
}
