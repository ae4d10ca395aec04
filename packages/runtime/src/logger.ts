import pino from "pino";
import type { BaseLogger, Logger } from "pino";

// Components take the narrow BaseLogger so Fastify's app.log, a pino child
// and a silent test logger all fit.
export type Log = BaseLogger;

export function createLogger(name: string, level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({ name, level });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
