import type { FastifyInstance } from "fastify";

export type ProxyEventType =
  | "job.submitted"
  | "job.rejected"
  | "job.queued"
  | "job.dispatched"
  | "job.completed"
  | "job.retried"
  | "job.failed"
  | "job.discarded"
  | "worker.registered"
  | "worker.deregistered"
  | "worker.draining"
  | "worker.undrained"
  | "worker.probe_failed"
  | "worker.unhealthy"
  | "worker.recovered"
  | "worker.evicted";

export interface ProxyEvent {
  type: ProxyEventType;
  at: number;
  workerId?: string;
  jobId?: string;
  detail?: Record<string, unknown>;
}

export interface ProxyPluginContext {
  emit(event: ProxyEvent): void;
}

export interface ProxyPlugin {
  name: string;
  register(app: FastifyInstance, ctx: ProxyPluginContext): Promise<void> | void;
}

export function createPluginContext(): ProxyPluginContext {
  return { emit() {} };
}
