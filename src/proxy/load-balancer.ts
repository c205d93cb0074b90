import type { LoadBalancingPolicy } from "../contracts.js";
import type { WorkerRecord } from "./worker-registry.js";

/**
 * Orders idle workers for assignment. Every policy is a pure function of the
 * registry state plus its own cursor, so identical state yields an identical
 * choice. Ties always break on registration order.
 */
export interface LoadBalancer {
  readonly policy: LoadBalancingPolicy;
  order(idle: readonly WorkerRecord[]): WorkerRecord[];
  assigned(worker: WorkerRecord): void;
}

const bySeq = (a: WorkerRecord, b: WorkerRecord) => a.seq - b.seq;

export class RoundRobinBalancer implements LoadBalancer {
  readonly policy = "round-robin" as const;
  private lastSeq = -1;

  order(idle: readonly WorkerRecord[]): WorkerRecord[] {
    const sorted = [...idle].sort(bySeq);
    const after = sorted.filter((w) => w.seq > this.lastSeq);
    const wrapped = sorted.filter((w) => w.seq <= this.lastSeq);
    return [...after, ...wrapped];
  }

  assigned(worker: WorkerRecord): void {
    this.lastSeq = worker.seq;
  }
}

export class LeastRecentlyUsedBalancer implements LoadBalancer {
  readonly policy = "least-recently-used" as const;

  order(idle: readonly WorkerRecord[]): WorkerRecord[] {
    // lastAssignment is a logical clock; 0 means never assigned
    return [...idle].sort((a, b) => a.lastAssignment - b.lastAssignment || bySeq(a, b));
  }

  assigned(): void {}
}

export class LeastLoadedBalancer implements LoadBalancer {
  readonly policy = "least-loaded" as const;

  order(idle: readonly WorkerRecord[]): WorkerRecord[] {
    return [...idle].sort((a, b) => a.dispatchCount - b.dispatchCount || bySeq(a, b));
  }

  assigned(): void {}
}

export function createLoadBalancer(policy: LoadBalancingPolicy): LoadBalancer {
  switch (policy) {
    case "round-robin":
      return new RoundRobinBalancer();
    case "least-recently-used":
      return new LeastRecentlyUsedBalancer();
    case "least-loaded":
      return new LeastLoadedBalancer();
  }
}
