import test from "node:test";
import assert from "node:assert/strict";
import { setTimeout as sleep } from "node:timers/promises";
import { until } from "../testing/fake-transport.js";
import { createTestProxy } from "../testing/harness.js";

test("failed probes are counted but do nothing below the threshold", async () => {
  const { proxy, transport, events } = createTestProxy({ workers: ["a:1"], failureThreshold: 3 });
  const { healthMonitor, registry } = proxy;
  transport.setDown("a:1");

  await healthMonitor.tick();
  await healthMonitor.tick();
  const view = registry.view("a:1");
  assert.equal(view.consecutiveFailures, 2);
  assert.equal(view.status, "idle");

  const failures = events.filter((e) => e.type === "worker.probe_failed");
  assert.deepEqual(
    failures.map((e) => e.detail),
    [
      { consecutiveFailures: 1, reason: "connection refused" },
      { consecutiveFailures: 2, reason: "connection refused" },
    ]
  );
});

test("a success resets the failure counter", async () => {
  const { proxy, transport } = createTestProxy({ workers: ["a:1"] });
  transport.setDown("a:1");
  await proxy.healthMonitor.tick();
  transport.setDown("a:1", false);
  await proxy.healthMonitor.tick();
  const view = proxy.registry.view("a:1");
  assert.equal(view.consecutiveFailures, 0);
  assert.equal(typeof view.lastHeartbeat, "number");
});

test("a probe that never answers counts as a failure", async () => {
  const { proxy, transport, events } = createTestProxy({
    workers: ["a:1"],
    failureThreshold: 1,
    probeTimeoutMs: 20,
  });
  transport.setHanging("a:1");
  await proxy.healthMonitor.tick();
  assert.equal(proxy.registry.view("a:1").status, "unhealthy");
  const failed = events.find((e) => e.type === "worker.probe_failed");
  assert.deepEqual(failed?.detail, { consecutiveFailures: 1, reason: "probe timed out after 20ms" });
});

test("a recovered worker goes back to idle and picks up queued work", async () => {
  const { proxy, transport, eventTypes } = createTestProxy({ workers: ["a:1"], failureThreshold: 1 });
  const { healthMonitor, registry, dispatcher } = proxy;
  transport.setDown("a:1");
  await healthMonitor.tick();
  assert.equal(registry.view("a:1").status, "unhealthy");

  const { job, outcome } = await dispatcher.submit({ jobId: "j1", payload: "x" });
  assert.equal(job.state, "queued");

  transport.setDown("a:1", false);
  await healthMonitor.tick();
  assert.ok(eventTypes().includes("worker.recovered"));
  assert.equal(job.state, "dispatched");
  assert.equal(job.assignedWorkerId, "a:1");

  transport.pending("j1").resolve({ ok: true, proof: "p" });
  assert.ok((await outcome).ok);
  await dispatcher.close();
});

test("workers unhealthy for longer than the eviction window are removed", async () => {
  const { proxy, transport, eventTypes } = createTestProxy({
    workers: ["a:1", "b:1"],
    failureThreshold: 1,
    unhealthyEvictionMs: 10,
  });
  transport.setDown("a:1");
  await proxy.healthMonitor.tick();
  assert.equal(proxy.registry.view("a:1").status, "unhealthy");

  await sleep(15);
  await proxy.healthMonitor.tick();
  assert.equal(proxy.registry.has("a:1"), false);
  assert.equal(proxy.registry.has("b:1"), true);
  assert.ok(eventTypes().includes("worker.evicted"));
});

test("periodic ticks skip a worker whose deadline probe is still out", async () => {
  const { proxy, transport } = createTestProxy({ workers: ["a:1"], probeTimeoutMs: 30 });
  transport.setHanging("a:1");

  const deadlineProbe = proxy.healthMonitor.probeNow("a:1");
  await proxy.healthMonitor.tick();
  assert.deepEqual(transport.probes, ["a:1"]);

  await deadlineProbe;
  assert.equal(proxy.registry.view("a:1").consecutiveFailures, 1);
});

test("a deadline probe joins a periodic probe already in flight", async () => {
  const { proxy, transport } = createTestProxy({ workers: ["a:1"], probeTimeoutMs: 30 });
  transport.setHanging("a:1");

  const round = proxy.healthMonitor.tick();
  const deadlineProbe = proxy.healthMonitor.probeNow("a:1");
  assert.deepEqual(transport.probes, ["a:1"]);

  await Promise.all([round, deadlineProbe]);
  assert.equal(proxy.registry.view("a:1").consecutiveFailures, 1);

  await proxy.healthMonitor.tick();
  assert.deepEqual(transport.probes, ["a:1", "a:1"]);
  assert.equal(proxy.registry.view("a:1").consecutiveFailures, 2);
});

test("start and stop control the probe timer", async () => {
  const { proxy, transport } = createTestProxy({ workers: ["a:1"], healthcheckIntervalMs: 10 });
  const { healthMonitor } = proxy;
  assert.equal(healthMonitor.running, false);

  healthMonitor.start();
  assert.equal(healthMonitor.running, true);
  await until(() => transport.probes.length >= 1);

  healthMonitor.stop();
  assert.equal(healthMonitor.running, false);
});
