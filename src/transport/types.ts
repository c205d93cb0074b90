import type { ProveReply, ProveRequest } from "../contracts.js";

/**
 * Boundary to the workers. Implementations throw `TransportError` when the
 * worker cannot be reached or answers with something unreadable; a worker
 * that answers with a failure resolves to `{ ok: false }`.
 */
export interface WorkerTransport {
  prove(address: string, request: ProveRequest, signal: AbortSignal): Promise<ProveReply>;
  /** Resolves when the worker reports itself live. */
  probe(address: string, signal: AbortSignal): Promise<void>;
}
