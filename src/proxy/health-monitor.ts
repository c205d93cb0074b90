import type { Mutex } from "async-mutex";
import { WorkerUnhealthyError, toFailureCause } from "../errors.js";
import type { ProxyLogger } from "../logger.js";
import type { ProxyPluginContext } from "../plugins/types.js";
import type { WorkerTransport } from "../transport/types.js";
import type { WorkerRegistry } from "./worker-registry.js";

/** What the monitor needs from the dispatcher once a worker is usable again. */
export interface IdleWorkerListener {
  onWorkerIdle(workerId: string): void;
  dispatchPending(): void;
}

export interface HealthMonitorOptions {
  registry: WorkerRegistry;
  transport: WorkerTransport;
  mutex: Mutex;
  dispatcher: IdleWorkerListener;
  intervalMs: number;
  probeTimeoutMs: number;
  failureThreshold: number;
  /** 0 keeps unhealthy workers registered forever. */
  unhealthyEvictionMs: number;
  ctx: ProxyPluginContext;
  log: ProxyLogger;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class HealthMonitor {
  private timer: ReturnType<typeof setInterval> | null = null;
  /** One probe per worker at a time; ticks skip it, `probeNow` joins it. */
  private inFlight = new Map<string, Promise<void>>();

  constructor(private readonly options: HealthMonitorOptions) {}

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) => this.options.log.error({ err }, "health check tick failed"));
    }, this.options.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /** One round: probe every eligible worker, then drop long-dead ones. */
  async tick(): Promise<void> {
    const { registry, mutex, unhealthyEvictionMs } = this.options;
    const targets = registry
      .list()
      .map((w) => w.workerId)
      .filter((id) => !this.inFlight.has(id));

    await Promise.all(targets.map((id) => this.probe(id)));

    if (unhealthyEvictionMs > 0) {
      await mutex.runExclusive(() => registry.evictUnhealthy(Date.now(), unhealthyEvictionMs));
    }
  }

  /**
   * Probe right away on the dispatcher's behalf, after a job deadline or a
   * transport failure, to tell a slow job from a dead worker.
   */
  probeNow(workerId: string): Promise<void> {
    return this.probe(workerId);
  }

  private probe(workerId: string): Promise<void> {
    const running = this.inFlight.get(workerId);
    if (running) return running;
    const probe = this.probeWorker(workerId).finally(() => this.inFlight.delete(workerId));
    this.inFlight.set(workerId, probe);
    return probe;
  }

  private async probeWorker(workerId: string): Promise<void> {
    const { registry, transport, mutex, probeTimeoutMs } = this.options;
    if (!registry.has(workerId)) return;
    const address = registry.get(workerId).address;

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`probe timed out after ${probeTimeoutMs}ms`)),
      probeTimeoutMs
    );

    let failure: string | null = null;
    try {
      await Promise.race([
        transport.probe(address, controller.signal),
        new Promise<never>((_, reject) => {
          controller.signal.addEventListener("abort", () => reject(controller.signal.reason), {
            once: true,
          });
        }),
      ]);
    } catch (err) {
      failure = describe(controller.signal.aborted ? controller.signal.reason : err);
    } finally {
      clearTimeout(timer);
    }

    await mutex.runExclusive(() => this.applyProbe(workerId, failure));
  }

  private applyProbe(workerId: string, failure: string | null): void {
    const { registry, dispatcher, failureThreshold, ctx, log } = this.options;
    // deregistered while the probe was out
    if (!registry.has(workerId)) return;

    if (failure === null) {
      const outcome = registry.recordProbeSuccess(workerId);
      if (outcome !== "unchanged" && registry.has(workerId)) {
        log.info({ workerId, outcome }, "worker eligible again");
        dispatcher.onWorkerIdle(workerId);
      }
      return;
    }

    const failures = registry.recordProbeFailure(workerId);
    log.warn({ workerId, failures, reason: failure }, "worker probe failed");
    ctx.emit({
      type: "worker.probe_failed",
      at: Date.now(),
      workerId,
      detail: { consecutiveFailures: failures, reason: failure },
    });

    if (failures >= failureThreshold && registry.get(workerId).status !== "unhealthy") {
      const cause = toFailureCause(new WorkerUnhealthyError(workerId, failures));
      registry.markUnhealthy(workerId, cause);
      // the evicted job went back to the queue front; another worker may take it
      dispatcher.dispatchPending();
    }
  }
}
