import test from "node:test";
import assert from "node:assert/strict";
import {
  LeastLoadedBalancer,
  LeastRecentlyUsedBalancer,
  RoundRobinBalancer,
  createLoadBalancer,
} from "./load-balancer.js";
import type { WorkerRecord } from "./worker-registry.js";

function worker(seq: number, overrides: Partial<WorkerRecord> = {}): WorkerRecord {
  return {
    workerId: `w${seq}:7000`,
    address: `w${seq}:7000`,
    seq,
    status: "idle",
    registeredAt: 0,
    consecutiveFailures: 0,
    heldForProbe: false,
    drainRequested: false,
    removeWhenIdle: false,
    dispatchCount: 0,
    completedCount: 0,
    lastAssignment: 0,
    ...overrides,
  };
}

const ids = (workers: WorkerRecord[]) => workers.map((w) => w.seq);

test("round-robin resumes after the last assigned worker and wraps", () => {
  const lb = new RoundRobinBalancer();
  const pool = [worker(2), worker(0), worker(1)];
  assert.deepEqual(ids(lb.order(pool)), [0, 1, 2]);

  lb.assigned(worker(1));
  assert.deepEqual(ids(lb.order(pool)), [2, 0, 1]);

  // the cursor holds even when the worker after it is not idle
  assert.deepEqual(ids(lb.order([worker(0), worker(1)])), [0, 1]);
});

test("least-recently-used puts never-assigned workers first, then the oldest assignment", () => {
  const lb = new LeastRecentlyUsedBalancer();
  const pool = [worker(0, { lastAssignment: 5 }), worker(1, { lastAssignment: 2 }), worker(2)];
  assert.deepEqual(ids(lb.order(pool)), [2, 1, 0]);
});

test("least-loaded prefers fewer dispatches and breaks ties by registration order", () => {
  const lb = new LeastLoadedBalancer();
  const pool = [
    worker(0, { dispatchCount: 3 }),
    worker(1, { dispatchCount: 1 }),
    worker(2, { dispatchCount: 1 }),
  ];
  assert.deepEqual(ids(lb.order(pool)), [1, 2, 0]);
});

test("identical state gives an identical order", () => {
  const pool = [worker(0, { dispatchCount: 2 }), worker(1, { dispatchCount: 2 })];
  for (const policy of ["round-robin", "least-recently-used", "least-loaded"] as const) {
    const lb = createLoadBalancer(policy);
    assert.equal(lb.policy, policy);
    assert.deepEqual(ids(lb.order(pool)), ids(lb.order(pool)));
  }
});
