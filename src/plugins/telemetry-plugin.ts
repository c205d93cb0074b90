import type { FastifyInstance } from "fastify";
import type { ProxyEvent, ProxyEventType, ProxyPlugin, ProxyPluginContext } from "./types.js";

interface CounterDef {
  name: string;
  help: string;
}

/** Prometheus counters bumped by proxy events; other event types only show up in the recent list. */
const EVENT_COUNTERS: ReadonlyArray<CounterDef & { event: ProxyEventType }> = [
  { event: "job.submitted", name: "jobs_submitted_total", help: "Jobs admitted since startup" },
  { event: "job.rejected", name: "jobs_rejected_total", help: "Jobs refused because the queue was full" },
  { event: "job.dispatched", name: "jobs_dispatched_total", help: "Dispatch attempts since startup" },
  { event: "job.completed", name: "jobs_completed_total", help: "Jobs that produced a proof" },
  { event: "job.retried", name: "jobs_retried_total", help: "Failed attempts put back in the queue" },
  { event: "job.failed", name: "jobs_failed_total", help: "Jobs that failed terminally" },
  { event: "job.discarded", name: "jobs_discarded_total", help: "Outcomes dropped because the client left" },
  { event: "worker.probe_failed", name: "worker_probe_failures_total", help: "Health probes that failed" },
  { event: "worker.unhealthy", name: "workers_unhealthy_total", help: "Times a worker was marked unhealthy" },
  { event: "worker.evicted", name: "workers_evicted_total", help: "Unhealthy workers dropped from the registry" },
];

const HTTP_REQUESTS: CounterDef = { name: "http_requests_total", help: "Total HTTP requests processed" };

export interface TelemetrySnapshot {
  eventCounts: Record<string, number>;
  httpStatus: Record<string, number>;
  events: ProxyEvent[];
}

export interface TelemetryPlugin extends ProxyPlugin {
  snapshot(): TelemetrySnapshot;
  /** HELP/TYPE/value lines for every counter, zeroes included. */
  prometheusCounters(prefix: string): string[];
}

export function createTelemetryPlugin(options: { maxEvents?: number } = {}): TelemetryPlugin {
  const maxEvents = options.maxEvents ?? 200;
  const eventCounts = new Map<ProxyEventType, number>();
  const httpStatus = new Map<number, number>();
  let httpRequests = 0;
  const recent: ProxyEvent[] = [];

  const countOf = (type: ProxyEventType) => eventCounts.get(type) ?? 0;

  const snapshot = (): TelemetrySnapshot => ({
    eventCounts: Object.fromEntries(eventCounts),
    httpStatus: Object.fromEntries([...httpStatus].map(([code, n]) => [String(code), n])),
    events: [...recent],
  });

  return {
    name: "telemetry",
    register(app: FastifyInstance, ctx: ProxyPluginContext) {
      app.addHook("onResponse", async (_req, reply) => {
        httpRequests += 1;
        httpStatus.set(reply.statusCode, (httpStatus.get(reply.statusCode) ?? 0) + 1);
      });

      const forward = ctx.emit;
      ctx.emit = (event) => {
        eventCounts.set(event.type, countOf(event.type) + 1);
        recent.push(event);
        if (recent.length > maxEvents) recent.shift();
        forward(event);
      };

      app.get("/v1/plugins/telemetry", async () => ({ ok: true, plugin: "telemetry", ...snapshot() }));
    },
    snapshot,
    prometheusCounters(prefix: string) {
      const lines: string[] = [];
      const push = (def: CounterDef, value: number) => {
        lines.push(
          `# HELP ${prefix}${def.name} ${def.help}`,
          `# TYPE ${prefix}${def.name} counter`,
          `${prefix}${def.name} ${value}`
        );
      };
      push(HTTP_REQUESTS, httpRequests);
      for (const def of EVENT_COUNTERS) push(def, countOf(def.event));
      return lines;
    },
  };
}
