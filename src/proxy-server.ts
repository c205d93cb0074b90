import { PassThrough } from "node:stream";
import Fastify from "fastify";
import type { FastifyReply, FastifyRequest } from "fastify";
import type { Job, JobSubmission } from "./contracts.js";
import { parseConfig, type ProxyConfig, type ProxyConfigInput } from "./config.js";
import { AdmissionRejectedError, JobConflictError, UnknownWorkerError } from "./errors.js";
import { loggerOptions } from "./logger.js";
import { createPluginContext, type ProxyEvent, type ProxyPlugin } from "./plugins/types.js";
import { createTelemetryPlugin } from "./plugins/telemetry-plugin.js";
import { createProvingProxy, type ProvingProxy, type Submission } from "./proxy/index.js";
import { FixedWindowRateLimiter } from "./rate-limit.js";
import { HttpWorkerTransport } from "./transport/http-transport.js";
import type { WorkerTransport } from "./transport/types.js";

declare module "fastify" {
  interface FastifyInstance {
    provingProxy: ProvingProxy;
  }
}

const WORKER_ADDRESS_PATTERN = "^[A-Za-z0-9.-]+:[0-9]{1,5}$";
const QUEUE_FULL_MESSAGE = "Too many requests in the queue";

export interface ProxyServerOptions {
  config?: ProxyConfig | ProxyConfigInput;
  transport?: WorkerTransport;
  plugins?: ProxyPlugin[];
  /** Off in tests that drive `healthMonitor.tick()` by hand. */
  startHealthMonitor?: boolean;
}

function toJobView(job: Job) {
  const { payload, ...rest } = job;
  return { ...rest, payloadBytes: Buffer.byteLength(payload) };
}

export function buildProxyServer(options: ProxyServerOptions = {}) {
  const config = parseConfig(options.config ?? {});
  const app = Fastify({ logger: loggerOptions(config.logLevel) });

  const ctx = createPluginContext();

  const telemetry = createTelemetryPlugin();
  for (const plugin of [telemetry, ...(options.plugins ?? [])]) {
    plugin.register(app, ctx);
  }

  // SSE fan-out wraps ctx.emit after the plugins so subscribers see every event
  const sseSubscribers = new Set<(event: ProxyEvent) => void>();
  {
    const prevEmit = ctx.emit;
    ctx.emit = (event: ProxyEvent) => {
      prevEmit(event);
      for (const sub of sseSubscribers) sub(event);
    };
  }

  const proxy = createProvingProxy(config, {
    transport: options.transport ?? new HttpWorkerTransport(),
    ctx,
    log: app.log,
  });
  app.decorate("provingProxy", proxy);
  const { registry, queue, relay, dispatcher, healthMonitor, mutex } = proxy;

  const rateLimiter = new FixedWindowRateLimiter(config.maxRequestsPerSecond);

  const requireAdmin = (req: FastifyRequest, reply: FastifyReply): boolean => {
    if (req.headers["x-admin-token"] === config.adminSecret) return true;
    void reply.code(401).send({ ok: false, error: "unauthorized" });
    return false;
  };

  app.get("/health", async () => ({ ok: true }));

  app.get("/metrics", async (_req, reply) => {
    const workers = registry.list();
    const byStatus = { idle: 0, busy: 0, unhealthy: 0, draining: 0 };
    for (const w of workers) byStatus[w.status]++;

    const gauge = (name: string, help: string, value: number) => [
      `# HELP proving_proxy_${name} ${help}`,
      `# TYPE proving_proxy_${name} gauge`,
      `proving_proxy_${name} ${value}`,
    ];

    const lines: string[] = [
      ...telemetry.prometheusCounters("proving_proxy_"),
      ...gauge("queue_depth", "Jobs waiting for a worker", queue.size),
      ...gauge("queue_capacity", "Configured queue capacity", queue.capacity),
      ...gauge("jobs_in_flight", "Jobs queued or dispatched", dispatcher.listJobs().length),
      ...gauge("workers_idle", "Workers ready for a job", byStatus.idle),
      ...gauge("workers_busy", "Workers running a job or awaiting a probe", byStatus.busy),
      ...gauge("workers_unhealthy", "Workers failing health checks", byStatus.unhealthy),
      ...gauge("workers_draining", "Workers taking no new jobs", byStatus.draining),
      "",
    ];

    reply.header("content-type", "text/plain; version=0.0.4; charset=utf-8");
    return reply.send(lines.join("\n"));
  });

  app.get("/v1/events", (req, reply) => {
    const stream = new PassThrough();
    stream.write(": connected\n\n");

    const send = (event: ProxyEvent) => stream.write(`data: ${JSON.stringify(event)}\n\n`);
    sseSubscribers.add(send);

    const cleanup = () => {
      sseSubscribers.delete(send);
      if (!stream.destroyed) stream.end();
    };
    req.raw.on("close", cleanup);

    reply.header("content-type", "text/event-stream; charset=utf-8");
    reply.header("cache-control", "no-cache");
    reply.header("x-accel-buffering", "no");
    return reply.send(stream);
  });

  // ── Jobs ──────────────────────────────────────────────────────────────────

  app.post<{ Body: JobSubmission }>(
    "/v1/jobs",
    {
      schema: {
        body: {
          type: "object",
          required: ["payload"],
          properties: {
            jobId: { type: "string", minLength: 1, maxLength: 128 },
            payload: { type: "string" },
          },
        },
      },
    },
    async (req, reply) => {
      const verdict = rateLimiter.check(req.ip);
      if (!verdict.allowed) {
        reply.header("x-rate-limit-limit", String(verdict.limit));
        reply.header("x-rate-limit-remaining", "0");
        reply.header("x-rate-limit-reset", String(verdict.resetSeconds));
        return reply.code(429).send({ ok: false, error: "rate_limited" });
      }

      let submission: Submission;
      try {
        submission = await dispatcher.submit({ jobId: req.body.jobId, payload: req.body.payload });
      } catch (err) {
        if (err instanceof AdmissionRejectedError) {
          reply.header("x-error-message", QUEUE_FULL_MESSAGE);
          return reply.code(503).send({ ok: false, ...err.toJSON() });
        }
        if (err instanceof JobConflictError) {
          return reply.code(409).send({ ok: false, error: err.code, jobId: err.jobId });
        }
        throw err;
      }

      const { job, outcome } = submission;
      reply.raw.on("close", () => {
        if (!reply.raw.writableFinished) relay.detach(job.jobId);
      });

      const result = await outcome;
      if (result.ok) {
        return {
          ok: true,
          jobId: job.jobId,
          workerId: result.workerId,
          proof: result.proof,
          retryCount: job.retryCount,
          attempts: job.attempts,
        };
      }
      if (result.error instanceof AdmissionRejectedError) {
        reply.header("x-error-message", QUEUE_FULL_MESSAGE);
        return reply.code(503).send({ ok: false, ...result.error.toJSON() });
      }
      return reply.code(502).send({ ok: false, ...result.error.toJSON() });
    }
  );

  app.get("/v1/jobs", async () => ({
    ok: true,
    jobs: dispatcher.listJobs().map(toJobView),
    recent: relay.recent(),
  }));

  app.get<{ Params: { jobId: string } }>("/v1/jobs/:jobId", async (req, reply) => {
    const live = dispatcher.getJob(req.params.jobId);
    if (live) return { ok: true, job: toJobView(live) };
    const finished = relay.summary(req.params.jobId);
    if (finished) return { ok: true, job: finished };
    return reply.code(404).send({ ok: false, error: "job_not_found" });
  });

  app.get("/v1/queue", async () => ({
    ok: true,
    depth: queue.size,
    capacity: queue.capacity,
    jobIds: queue.snapshot().map((job) => job.jobId),
  }));

  // ── Workers ───────────────────────────────────────────────────────────────

  app.get("/v1/workers", async () => ({ ok: true, workers: registry.list() }));

  app.post<{ Body: { addresses: string[] } }>(
    "/v1/workers",
    {
      schema: {
        body: {
          type: "object",
          required: ["addresses"],
          properties: {
            addresses: {
              type: "array",
              minItems: 1,
              items: { type: "string", pattern: WORKER_ADDRESS_PATTERN },
            },
          },
        },
      },
    },
    async (req, reply) => {
      if (!requireAdmin(req, reply)) return reply;
      const workers = await mutex.runExclusive(() => {
        const added = req.body.addresses.map((address) => registry.register(address));
        // new capacity may unblock queued jobs
        dispatcher.dispatchPending();
        return added;
      });
      reply.header("x-worker-count", String(registry.size));
      return { ok: true, workers };
    }
  );

  app.delete<{ Params: { workerId: string } }>("/v1/workers/:workerId", async (req, reply) => {
    if (!requireAdmin(req, reply)) return reply;
    try {
      const result = await mutex.runExclusive(() => registry.deregister(req.params.workerId));
      reply.header("x-worker-count", String(registry.size));
      return { ok: true, workerId: req.params.workerId, result };
    } catch (err) {
      if (err instanceof UnknownWorkerError) {
        return reply.code(404).send({ ok: false, error: err.code });
      }
      throw err;
    }
  });

  app.post<{ Params: { workerId: string } }>("/v1/workers/:workerId/drain", async (req, reply) => {
    if (!requireAdmin(req, reply)) return reply;
    try {
      const status = await mutex.runExclusive(() => registry.drain(req.params.workerId));
      return { ok: true, workerId: req.params.workerId, status };
    } catch (err) {
      if (err instanceof UnknownWorkerError) {
        return reply.code(404).send({ ok: false, error: err.code });
      }
      throw err;
    }
  });

  app.post<{ Params: { workerId: string } }>(
    "/v1/workers/:workerId/undrain",
    async (req, reply) => {
      if (!requireAdmin(req, reply)) return reply;
      try {
        const status = await mutex.runExclusive(() => {
          const next = registry.undrain(req.params.workerId);
          if (next === "idle") dispatcher.onWorkerIdle(req.params.workerId);
          return registry.view(req.params.workerId).status;
        });
        return { ok: true, workerId: req.params.workerId, status };
      } catch (err) {
        if (err instanceof UnknownWorkerError) {
          return reply.code(404).send({ ok: false, error: err.code });
        }
        throw err;
      }
    }
  );

  if (options.startHealthMonitor ?? true) healthMonitor.start();
  app.addHook("preClose", async () => {
    healthMonitor.stop();
    await dispatcher.close();
  });

  return app;
}

export function parseListenAddress(address: string): { host: string; port: number } {
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d{1,5})$/.exec(address.trim());
  const host = match?.[1] ?? match?.[2];
  const port = Number(match?.[3]);
  if (!host || !Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new Error(`invalid listen address "${address}" (expected host:port)`);
  }
  return { host, port };
}

export async function startProxy(address: string, config: ProxyConfig) {
  const { host, port } = parseListenAddress(address);
  const app = buildProxyServer({ config });
  await app.listen({ host, port });
  app.log.info(
    { workers: app.provingProxy.registry.size, queueCapacity: config.queueCapacity },
    `proving proxy listening on http://${host}:${port}`
  );
  return app;
}
