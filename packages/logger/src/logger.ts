/**
 * Creates structured pino loggers with secret redaction, pretty-printing in
 * development and JSON output elsewhere.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, REDACTED } from "./redact.js";

export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Defaults to "info", or "debug" when NODE_ENV is "development". */
  level?: string;
  /** Logical service / component name attached to every log line. */
  service?: string;
  /** Write JSON lines here instead of stdout. Disables pretty-printing. */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

function buildTransport(): pino.TransportSingleOptions | undefined {
  if (isDevelopment()) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }
  return undefined;
}

export function createLogger(options?: CreateLoggerOptions): Logger {
  const level = options?.level ?? (isDevelopment() ? "debug" : "info");
  const service = options?.service ?? "docqa";

  const loggerOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: REDACTED,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options?.destination) {
    return pino(loggerOptions, options.destination);
  }

  const transport = buildTransport();
  return pino({ ...loggerOptions, ...(transport ? { transport } : {}) });
}

/**
 * Child logger carrying request- or component-scoped bindings
 * (e.g. `requestId`, `component`).
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}

/** A logger that drops everything. Handy default for library callers and tests. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
