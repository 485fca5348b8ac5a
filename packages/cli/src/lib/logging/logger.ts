import fs from "node:fs";
import path from "node:path";
import pino, { type DestinationStream, type Logger } from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(raw: unknown, fallback: LogLevel): LogLevel {
  const normalized = (typeof raw === "string" ? raw : "").trim().toLowerCase();
  if (!normalized) return fallback;
  if (isLogLevel(normalized)) return normalized;
  throw new Error(`invalid log level: ${normalized}`);
}

/**
 * Logs go to stderr; stdout carries only inventory records. An optional file
 * sink gets a copy as JSON lines.
 */
export function createCliLogger(params: {
  level: LogLevel;
  logFilePath?: string;
  destination?: DestinationStream;
  bindings?: Record<string, unknown>;
}): Logger {
  const streams: Array<{ stream: DestinationStream; level: LogLevel }> = [
    { stream: params.destination ?? pino.destination(2), level: params.level },
  ];

  const logFilePath = (params.logFilePath ?? "").trim();
  if (logFilePath) {
    const resolved = path.resolve(logFilePath);
    fs.mkdirSync(path.dirname(resolved), { recursive: true, mode: 0o700 });
    // Key paths and fingerprints end up in here; owner-only.
    const fd = fs.openSync(resolved, "a", 0o600);
    fs.closeSync(fd);
    fs.chmodSync(resolved, 0o600);
    streams.push({ stream: pino.destination({ dest: resolved, sync: false }), level: params.level });
  }

  const logger = pino(
    {
      name: "keysweep",
      level: params.level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: { err: pino.stdSerializers.err },
    },
    pino.multistream(streams),
  );

  return params.bindings ? logger.child(params.bindings) : logger;
}
