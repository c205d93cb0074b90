import { Mutex } from "async-mutex";
import type { ProxyConfig } from "../config.js";
import type { ProxyLogger } from "../logger.js";
import type { ProxyPluginContext } from "../plugins/types.js";
import type { WorkerTransport } from "../transport/types.js";
import { Dispatcher } from "./dispatcher.js";
import { HealthMonitor } from "./health-monitor.js";
import { createLoadBalancer } from "./load-balancer.js";
import { QueueManager } from "./queue-manager.js";
import { ResultRelay } from "./result-relay.js";
import { RetryCoordinator } from "./retry-coordinator.js";
import { WorkerRegistry } from "./worker-registry.js";

export interface ProvingProxy {
  config: ProxyConfig;
  mutex: Mutex;
  registry: WorkerRegistry;
  queue: QueueManager;
  relay: ResultRelay;
  retry: RetryCoordinator;
  dispatcher: Dispatcher;
  healthMonitor: HealthMonitor;
}

/**
 * Wires the components around one mutex. Nothing is started: the caller
 * decides when the health monitor begins ticking.
 */
export function createProvingProxy(
  config: ProxyConfig,
  deps: { transport: WorkerTransport; ctx: ProxyPluginContext; log: ProxyLogger }
): ProvingProxy {
  const { transport, ctx, log } = deps;
  const mutex = new Mutex();
  const queue = new QueueManager(config.queueCapacity);
  const relay = new ResultRelay({ ctx, log });
  const retry = new RetryCoordinator({ maxRetries: config.maxRetries, queue, relay, ctx, log });
  const registry = new WorkerRegistry({
    balancer: createLoadBalancer(config.loadBalancing),
    evictions: retry,
    ctx,
    log,
  });

  const dispatcher: Dispatcher = new Dispatcher({
    registry,
    queue,
    retry,
    relay,
    transport,
    mutex,
    jobTimeoutMs: config.jobTimeoutMs,
    ctx,
    log,
    onHeldForProbe: (workerId): Promise<void> => healthMonitor.probeNow(workerId),
  });

  const healthMonitor: HealthMonitor = new HealthMonitor({
    registry,
    transport,
    mutex,
    dispatcher,
    intervalMs: config.healthcheckIntervalMs,
    probeTimeoutMs: config.probeTimeoutMs,
    failureThreshold: config.failureThreshold,
    unhealthyEvictionMs: config.unhealthyEvictionMs,
    ctx,
    log,
  });

  for (const address of config.workers) registry.register(address);

  return { config, mutex, registry, queue, relay, retry, dispatcher, healthMonitor };
}

export { Dispatcher, HealthMonitor, QueueManager, ResultRelay, RetryCoordinator, WorkerRegistry };
export type { Submission } from "./dispatcher.js";
export type { JobOutcome } from "./result-relay.js";
