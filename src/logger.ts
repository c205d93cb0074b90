import { pino, type DestinationStream } from "pino";
import type { FastifyBaseLogger } from "fastify";
import type { ProxyConfig } from "./config.js";

/** The slice of the Fastify/pino logger the proxy components write to. */
export type ProxyLogger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export const LOGGER_NAME = "proving-proxy";

export function loggerOptions(level: ProxyConfig["logLevel"]) {
  return { name: LOGGER_NAME, level };
}

/** Standalone logger for components built outside a Fastify server. Writes to stdout by default. */
export function createLogger(
  level: ProxyConfig["logLevel"] = "info",
  destination?: DestinationStream
): ProxyLogger {
  return destination ? pino(loggerOptions(level), destination) : pino(loggerOptions(level));
}

export const silentLogger: ProxyLogger = createLogger("silent");
