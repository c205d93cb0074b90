import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { z, type ZodIssue } from "zod";
import { ConfigError } from "./errors.js";

export const CONFIG_FILE_NAME = "proving-proxy.json";
export const ENV_PREFIX = "PROVING_PROXY_";

const workerAddressSchema = z
  .string()
  .regex(/^[A-Za-z0-9.-]+:\d{1,5}$/, "worker address must look like host:port");

export const ProxyConfigSchema = z.object({
  queueCapacity: z.number().int().min(0).default(10),
  maxRetries: z.number().int().min(0).default(1),
  healthcheckIntervalMs: z.number().int().min(10).default(10_000),
  probeTimeoutMs: z.number().int().min(10).default(1_000),
  failureThreshold: z.number().int().min(1).default(3),
  jobTimeoutMs: z.number().int().min(10).default(100_000),
  loadBalancing: z
    .enum(["round-robin", "least-recently-used", "least-loaded"])
    .default("round-robin"),
  workers: z.array(workerAddressSchema).default([]),
  /** Unhealthy workers are dropped after this long; 0 keeps them forever. */
  unhealthyEvictionMs: z.number().int().min(0).default(0),
  /** Per client IP; 0 disables the limit. */
  maxRequestsPerSecond: z.number().int().min(0).default(5),
  adminSecret: z.string().min(1).default("admin-dev"),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type ProxyConfig = z.infer<typeof ProxyConfigSchema>;
export type ProxyConfigInput = z.input<typeof ProxyConfigSchema>;

type ConfigKey = keyof ProxyConfig;

const ENV_KEYS: ReadonlyArray<readonly [ConfigKey, string]> = [
  ["queueCapacity", "QUEUE_CAPACITY"],
  ["maxRetries", "MAX_RETRIES"],
  ["healthcheckIntervalMs", "HEALTHCHECK_INTERVAL_MS"],
  ["probeTimeoutMs", "PROBE_TIMEOUT_MS"],
  ["failureThreshold", "FAILURE_THRESHOLD"],
  ["jobTimeoutMs", "JOB_TIMEOUT_MS"],
  ["loadBalancing", "LOAD_BALANCING"],
  ["workers", "WORKERS"],
  ["unhealthyEvictionMs", "UNHEALTHY_EVICTION_MS"],
  ["maxRequestsPerSecond", "MAX_REQUESTS_PER_SECOND"],
  ["adminSecret", "ADMIN_SECRET"],
  ["logLevel", "LOG_LEVEL"],
];

const NUMERIC_KEYS = new Set<ConfigKey>([
  "queueCapacity",
  "maxRetries",
  "healthcheckIntervalMs",
  "probeTimeoutMs",
  "failureThreshold",
  "jobTimeoutMs",
  "unhealthyEvictionMs",
  "maxRequestsPerSecond",
]);

function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

/**
 * Reads `PROVING_PROXY_*` variables. Numbers are coerced here so the schema
 * still reports a bad value against the right key.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [key, suffix] of ENV_KEYS) {
    const raw = env[`${ENV_PREFIX}${suffix}`];
    if (raw === undefined || raw === "") continue;

    if (key === "workers") {
      overrides[key] = raw
        .split(",")
        .map((addr) => addr.trim())
        .filter((addr) => addr.length > 0);
    } else if (NUMERIC_KEYS.has(key)) {
      const value = Number(raw);
      overrides[key] = Number.isFinite(value) ? value : raw;
    } else {
      overrides[key] = raw;
    }
  }
  return overrides;
}

export function parseConfig(input: unknown): ProxyConfig {
  const parsed = ProxyConfigSchema.safeParse(input);
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error.issues));
  return parsed.data;
}

function readConfigFile(path: string): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`${path}: ${reason}`]);
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new ConfigError([`${path}: expected a JSON object`]);
  }
  return { ...raw };
}

export function resolveConfigPath(configPath?: string, cwd = process.cwd()): string {
  return resolve(cwd, configPath ?? CONFIG_FILE_NAME);
}

/**
 * Defaults, then the JSON file (if any), then environment variables.
 * An explicit `configPath` that does not exist is an error; the default
 * file name is optional.
 */
export function loadConfig(
  options: { configPath?: string; env?: NodeJS.ProcessEnv; cwd?: string } = {}
): ProxyConfig {
  const path = resolveConfigPath(options.configPath, options.cwd);
  let fromFile: Record<string, unknown> = {};
  if (existsSync(path)) {
    fromFile = readConfigFile(path);
  } else if (options.configPath) {
    throw new ConfigError([`${path}: file not found`]);
  }

  return parseConfig({ ...fromFile, ...readEnvOverrides(options.env) });
}

/** Used by `init`. Refuses to clobber an existing file unless forced. */
export function writeDefaultConfig(path: string, options: { force?: boolean } = {}): ProxyConfig {
  if (existsSync(path) && !options.force) {
    throw new ConfigError([`${path}: already exists (use --force to overwrite)`]);
  }
  const config = parseConfig({});
  writeFileSync(path, `${JSON.stringify(config, null, 2)}\n`, "utf8");
  return config;
}
