import test from "node:test";
import assert from "node:assert/strict";
import type { Job } from "../contracts.js";
import { RetryExhaustedError } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { ProxyEvent } from "../plugins/types.js";
import { ResultRelay, type JobOutcome, type WorkerReleaser } from "./result-relay.js";

function job(jobId: string): Job {
  return {
    schemaVersion: "1.0",
    jobId,
    payload: "p",
    arrivedAt: 3,
    retryCount: 0,
    attempts: 1,
    assignedWorkerId: "w:1",
    state: "dispatched",
  };
}

function setup(historyLimit?: number) {
  const events: ProxyEvent[] = [];
  const relay = new ResultRelay({ ctx: { emit: (e) => events.push(e) }, log: silentLogger, historyLimit });
  const steps: string[] = [];
  const workers: WorkerReleaser = {
    markIdle: (workerId, options) => {
      steps.push(`release ${workerId} completed=${String(options?.completed)}`);
      return "idle";
    },
  };
  return { relay, events, steps, workers };
}

test("delivers a proof to the waiting client after freeing the worker", () => {
  const { relay, steps, workers } = setup();
  const received: JobOutcome[] = [];
  relay.attach("j1", (o) => {
    steps.push("deliver");
    received.push(o);
  });

  const j = job("j1");
  assert.deepEqual(relay.complete(j, "w:1", "proof-bytes", workers), {
    delivery: "delivered",
    release: "idle",
  });
  assert.deepEqual(steps, ["release w:1 completed=true", "deliver"]);
  assert.equal(j.state, "completed");
  assert.equal(j.assignedWorkerId, undefined);
  assert.deepEqual(received, [{ ok: true, job: j, workerId: "w:1", proof: "proof-bytes" }]);
  assert.equal(relay.isAwaited("j1"), false);
});

test("a departed client means the outcome is discarded but the worker is still released", () => {
  const { relay, events, steps, workers } = setup();
  relay.attach("j1", () => assert.fail("must not deliver"));
  assert.equal(relay.detach("j1"), true);

  const result = relay.complete(job("j1"), "w:1", "proof", workers);
  assert.equal(result.delivery, "discarded");
  assert.deepEqual(steps, ["release w:1 completed=true"]);
  assert.deepEqual(
    events.map((e) => e.type),
    ["job.completed", "job.discarded"]
  );
});

test("an outcome is settled exactly once", () => {
  const { relay, workers } = setup();
  let deliveries = 0;
  relay.attach("j1", () => deliveries++);
  const j = job("j1");
  relay.complete(j, "w:1", "proof", workers);
  assert.equal(relay.fail(j, new RetryExhaustedError("j1", 0)), "discarded");
  assert.equal(deliveries, 1);
  assert.equal(j.state, "completed");
  assert.equal(relay.summary("j1")?.state, "completed");
  assert.deepEqual(relay.complete(j, "w:1", "again", workers), { delivery: "discarded", release: null });
});

test("failures are recorded with their code", () => {
  const { relay, events } = setup();
  const j = job("j1");
  relay.fail(j, new RetryExhaustedError("j1", 0));
  const summary = relay.summary("j1");
  assert.equal(summary?.state, "failed");
  assert.equal(summary?.failureCode, "retry_exhausted");
  assert.equal(summary?.workerId, undefined);
  assert.deepEqual(events[0]?.detail, { error: "retry_exhausted", retryCount: 0 });
});

test("history keeps only the most recent outcomes", () => {
  const { relay } = setup(2);
  for (const id of ["a", "b", "c"]) relay.fail(job(id), new RetryExhaustedError(id, 0));
  assert.deepEqual(
    relay.recent().map((s) => s.jobId),
    ["b", "c"]
  );
  assert.equal(relay.summary("a"), undefined);
});
