export * from "./contracts.js";
export * from "./errors.js";
export {
  CONFIG_FILE_NAME,
  ENV_PREFIX,
  ProxyConfigSchema,
  loadConfig,
  parseConfig,
  readEnvOverrides,
  resolveConfigPath,
  writeDefaultConfig,
  type ProxyConfig,
  type ProxyConfigInput,
} from "./config.js";
export { createLogger, silentLogger, type ProxyLogger } from "./logger.js";
export type { ProxyEvent, ProxyEventType, ProxyPlugin, ProxyPluginContext } from "./plugins/types.js";
export { createTelemetryPlugin, type TelemetryPlugin } from "./plugins/telemetry-plugin.js";
export {
  createProvingProxy,
  Dispatcher,
  HealthMonitor,
  QueueManager,
  ResultRelay,
  RetryCoordinator,
  WorkerRegistry,
  type JobOutcome,
  type ProvingProxy,
  type Submission,
} from "./proxy/index.js";
export { createLoadBalancer, type LoadBalancer } from "./proxy/load-balancer.js";
export { computeRetryDecision, type RetryDecision } from "./control/retry-policy.js";
export { HttpWorkerTransport } from "./transport/http-transport.js";
export type { WorkerTransport } from "./transport/types.js";
export { buildProxyServer, parseListenAddress, startProxy, type ProxyServerOptions } from "./proxy-server.js";
