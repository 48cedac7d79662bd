/**
 * Structured logging with credential redaction.
 *
 * Redaction policy:
 * - The TES bearer token and any Authorization header are never logged
 * - All paths listed in `redact.paths` are replaced with "[REDACTED]"
 */
import pino from "pino";

export type Logger = pino.Logger;

export interface LoggerOptions {
  name?: string;
  level?: string;
  /** Where log lines go. stdio transport mode needs "stderr" so stdout stays protocol-only. */
  destination?: "stdout" | "stderr";
  /** pino-pretty worker transport; defaults to on outside production. */
  pretty?: boolean;
}

// Accept the level names operators tend to carry over from other tooling.
const LEVEL_ALIASES: Record<string, pino.LevelWithSilent> = {
  trace: "trace",
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
  critical: "fatal",
  fatal: "fatal",
  silent: "silent",
};

export function normalizeLogLevel(level: string | undefined): pino.LevelWithSilent {
  if (!level) return "info";
  return LEVEL_ALIASES[level.trim().toLowerCase()] ?? "info";
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const fd = options.destination === "stderr" ? 2 : 1;
  const pretty = options.pretty ?? process.env.NODE_ENV !== "production";

  const pinoOptions: pino.LoggerOptions = {
    name: options.name ?? "tes-mcp",
    level: normalizeLogLevel(options.level ?? process.env.LOG_LEVEL),
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      // Add `error` so logger.error({ error: someError }) shows message + stack.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "token",
        "authToken",
        "authorization",
        "headers.authorization",
        "headers.Authorization",
        "*.token",
        "*.authToken",
      ],
      censor: "[REDACTED]",
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: { colorize: fd === 1, destination: fd },
      },
    });
  }

  return pino(pinoOptions, pino.destination(fd));
}
