/**
 * Logger setup
 *
 * Structured pino loggers: pretty-printed in development, JSON everywhere else.
 */

import pino, { type DestinationStream, type Logger as PinoLogger } from "pino";
import { REDACT_PATHS, REDACTED } from "./redaction.js";

/**
 * Re-export the Pino Logger type so consumers do not need a direct pino dependency.
 */
export type Logger = PinoLogger;

export interface CreateLoggerOptions {
  /** Log level (defaults to "info", or "debug" when pretty-printing). */
  level?: string;
  /** Logical component name attached to every log line. */
  service?: string;
  /**
   * Pretty-print through pino-pretty on stderr. Defaults to true in
   * development when no `destination` is given.
   */
  pretty?: boolean;
  /** Where JSON lines go when not pretty-printing (defaults to stdout). */
  destination?: DestinationStream;
}

function isDevelopment(): boolean {
  return process.env["NODE_ENV"] === "development";
}

const prettyTransport: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname",
    destination: 2,
  },
};

export function createLogger(options?: CreateLoggerOptions): Logger {
  const pretty = options?.pretty ?? (options?.destination === undefined && isDevelopment());
  const level = options?.level ?? (pretty ? "debug" : "info");
  const service = options?.service ?? "transcript-digest";

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: service,
    redact: {
      paths: REDACT_PATHS,
      censor: REDACTED,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (pretty) {
    return pino({ ...pinoOptions, transport: prettyTransport });
  }
  if (options?.destination) {
    return pino(pinoOptions, options.destination);
  }
  return pino(pinoOptions);
}

/**
 * Logger that drops everything; the default when a caller passes none.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
