import { z } from "zod";
import type { ProveReply, ProveRequest } from "../contracts.js";
import { TransportError } from "../errors.js";
import type { WorkerTransport } from "./types.js";

const ProveReplySchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), proof: z.string() }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Talks to workers over plain HTTP: `POST /v1/prove` and `GET /health`. */
export class HttpWorkerTransport implements WorkerTransport {
  constructor(private readonly scheme: "http" | "https" = "http") {}

  async prove(address: string, request: ProveRequest, signal: AbortSignal): Promise<ProveReply> {
    const res = await this.send(address, "/v1/prove", signal, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(request),
    });
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new TransportError(address, `HTTP ${res.status} ${res.statusText}: ${text}`);
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      if (signal.aborted) throw signal.reason ?? err;
      throw new TransportError(address, `malformed reply: ${describe(err)}`, { cause: err });
    }
    const parsed = ProveReplySchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(address, "reply does not match { ok, proof | error }");
    }
    return parsed.data;
  }

  async probe(address: string, signal: AbortSignal): Promise<void> {
    const res = await this.send(address, "/health", signal, { method: "GET" });
    // drain the body so the connection can be reused
    await res.arrayBuffer().catch(() => undefined);
    if (!res.ok) throw new TransportError(address, `health check returned HTTP ${res.status}`);
  }

  private async send(
    address: string,
    path: string,
    signal: AbortSignal,
    init: RequestInit
  ): Promise<Response> {
    try {
      return await fetch(`${this.scheme}://${address}${path}`, { ...init, signal });
    } catch (err) {
      if (signal.aborted) throw signal.reason ?? err;
      throw new TransportError(address, describe(err), { cause: err });
    }
  }
}
