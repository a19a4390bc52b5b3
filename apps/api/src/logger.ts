import { pino, type Logger, type LoggerOptions } from "pino";

export type { Logger };

// Fastify builds its request logger from the same options, so both write one line format.
export function loggerOptions(level = "info"): LoggerOptions {
  return { level, base: { service: "awaken-api" } };
}

export function createLogger(level = "info"): Logger {
  return pino(loggerOptions(level));
}

/** Silent logger for tests and tooling. */
export function nullLogger(): Logger {
  return pino({ level: "silent" });
}
