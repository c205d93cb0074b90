import test from "node:test";
import assert from "node:assert/strict";
import {
  AdmissionRejectedError,
  ConfigError,
  JobTimeoutError,
  RetryExhaustedError,
  TransportError,
  UnknownWorkerError,
  isProxyError,
  toFailureCause,
} from "./errors.js";

test("failure cause carries the worker when the error names one", () => {
  const timeout = new JobTimeoutError("job-1", "10.0.0.5:7001", 500);
  assert.deepEqual(toFailureCause(timeout, 42), {
    code: "job_timeout",
    message: "job job-1 exceeded its 500ms deadline on worker 10.0.0.5:7001",
    workerId: "10.0.0.5:7001",
    at: 42,
  });

  const rejected = new AdmissionRejectedError("job-2", 4);
  assert.equal(toFailureCause(rejected, 1).workerId, undefined);
});

test("terminal errors serialize job id, retry count and last cause", () => {
  const cause = toFailureCause(new TransportError("w1:1", "socket hang up"), 7);
  const exhausted = new RetryExhaustedError("job-3", 2, cause);
  assert.deepEqual(exhausted.toJSON(), {
    error: "retry_exhausted",
    message: "job job-3 failed after 2 retries",
    jobId: "job-3",
    retryCount: 2,
    lastFailure: {
      code: "transport_error",
      message: "transport to w1:1 failed: socket hang up",
      workerId: "w1:1",
      at: 7,
    },
  });

  assert.deepEqual(new AdmissionRejectedError("job-4", 10).toJSON(), {
    error: "admission_rejected",
    message: "queue is full (capacity 10); job job-4 rejected",
    jobId: "job-4",
    queueCapacity: 10,
    retryCount: 0,
    lastFailure: null,
  });
});

test("config errors list every issue on its own line", () => {
  const err = new ConfigError(["queueCapacity: too small", "workers.0: bad address"]);
  assert.equal(err.message, "invalid configuration:\n  queueCapacity: too small\n  workers.0: bad address");
  assert.equal(err.code, "config_invalid");
});

test("isProxyError tells proxy errors from everything else", () => {
  assert.equal(isProxyError(new UnknownWorkerError("w")), true);
  assert.equal(isProxyError(new Error("plain")), false);
  assert.equal(isProxyError("nope"), false);
});
