import { parseConfig, type ProxyConfigInput } from "../config.js";
import { silentLogger } from "../logger.js";
import type { ProxyEvent } from "../plugins/types.js";
import { createProvingProxy } from "../proxy/index.js";
import { buildProxyServer } from "../proxy-server.js";
import { FakeWorkerTransport } from "./fake-transport.js";

/** A fully wired proxy over the fake transport, with every emitted event kept. */
export function createTestProxy(config: ProxyConfigInput = {}) {
  const transport = new FakeWorkerTransport();
  const events: ProxyEvent[] = [];
  const proxy = createProvingProxy(parseConfig({ logLevel: "silent", ...config }), {
    transport,
    ctx: { emit: (event) => events.push(event) },
    log: silentLogger,
  });
  const eventTypes = () => events.map((e) => e.type);
  return { proxy, transport, events, eventTypes };
}

/** The HTTP server over the fake transport, health monitor stopped, no rate limit. */
export function createTestServer(config: ProxyConfigInput = {}) {
  const transport = new FakeWorkerTransport();
  const app = buildProxyServer({
    config: { logLevel: "silent", maxRequestsPerSecond: 0, ...config },
    transport,
    startHealthMonitor: false,
  });
  return { app, transport };
}
