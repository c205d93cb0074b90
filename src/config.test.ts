import test from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, parseConfig, readEnvOverrides, writeDefaultConfig } from "./config.js";
import { ConfigError } from "./errors.js";

function withTempDir(fn: (dir: string) => void) {
  const dir = mkdtempSync(join(tmpdir(), "proving-proxy-"));
  try {
    fn(dir);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}

test("empty input yields the defaults", () => {
  assert.deepEqual(parseConfig({}), {
    queueCapacity: 10,
    maxRetries: 1,
    healthcheckIntervalMs: 10_000,
    probeTimeoutMs: 1_000,
    failureThreshold: 3,
    jobTimeoutMs: 100_000,
    loadBalancing: "round-robin",
    workers: [],
    unhealthyEvictionMs: 0,
    maxRequestsPerSecond: 5,
    adminSecret: "admin-dev",
    logLevel: "info",
  });
});

test("invalid values are reported per key", () => {
  assert.throws(
    () => parseConfig({ failureThreshold: 0, workers: ["no-port"] }),
    (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.deepEqual(err.issues, [
        "failureThreshold: Number must be greater than or equal to 1",
        "workers.0: worker address must look like host:port",
      ]);
      return true;
    }
  );
});

test("environment overrides are coerced and split", () => {
  const overrides = readEnvOverrides({
    PROVING_PROXY_QUEUE_CAPACITY: "25",
    PROVING_PROXY_WORKERS: "10.0.0.5:7001, 10.0.0.6:7001,",
    PROVING_PROXY_LOAD_BALANCING: "least-loaded",
    PROVING_PROXY_MAX_RETRIES: "",
    UNRELATED: "x",
  });
  assert.deepEqual(overrides, {
    queueCapacity: 25,
    loadBalancing: "least-loaded",
    workers: ["10.0.0.5:7001", "10.0.0.6:7001"],
  });
});

test("a non-numeric environment value fails against its key", () => {
  withTempDir((dir) => {
    assert.throws(
      () => loadConfig({ cwd: dir, env: { PROVING_PROXY_JOB_TIMEOUT_MS: "soon" } }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.deepEqual(err.issues, ["jobTimeoutMs: Expected number, received string"]);
        return true;
      }
    );
  });
});

test("file settings sit between defaults and environment", () => {
  withTempDir((dir) => {
    writeFileSync(
      join(dir, "proving-proxy.json"),
      JSON.stringify({ queueCapacity: 3, maxRetries: 4, workers: ["w1:7001"] })
    );
    const config = loadConfig({ cwd: dir, env: { PROVING_PROXY_MAX_RETRIES: "2" } });
    assert.equal(config.queueCapacity, 3);
    assert.equal(config.maxRetries, 2);
    assert.deepEqual(config.workers, ["w1:7001"]);
    assert.equal(config.failureThreshold, 3);
  });
});

test("an explicit config path must exist", () => {
  withTempDir((dir) => {
    assert.throws(
      () => loadConfig({ cwd: dir, configPath: "missing.json", env: {} }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.deepEqual(err.issues, [`${join(dir, "missing.json")}: file not found`]);
        return true;
      }
    );
  });
});

test("a config file that is not an object is rejected", () => {
  withTempDir((dir) => {
    const path = join(dir, "proving-proxy.json");
    writeFileSync(path, "[1, 2]");
    assert.throws(
      () => loadConfig({ cwd: dir, env: {} }),
      (err: unknown) => err instanceof ConfigError && err.issues[0] === `${path}: expected a JSON object`
    );
  });
});

test("writeDefaultConfig refuses to overwrite unless forced", () => {
  withTempDir((dir) => {
    const path = join(dir, "proving-proxy.json");
    writeDefaultConfig(path);
    const written: unknown = JSON.parse(readFileSync(path, "utf8"));
    assert.deepEqual(written, parseConfig({}));
    assert.ok(readFileSync(path, "utf8").endsWith("}\n"));

    assert.throws(
      () => writeDefaultConfig(path),
      (err: unknown) =>
        err instanceof ConfigError && err.issues[0] === `${path}: already exists (use --force to overwrite)`
    );
    assert.doesNotThrow(() => writeDefaultConfig(path, { force: true }));
  });
});
