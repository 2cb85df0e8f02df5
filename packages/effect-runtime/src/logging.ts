/**
 * Console logging and tracing integration for the CLI.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  // stderr, so command output on stdout stays pipeable
  console.error(`[${ts}] ${lvl} ${msg}`);
});

/** Replace the default logger and set the minimum level in one layer. */
export function loggerLayer(level: LogLevel.LogLevel): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
}

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export const LOG_LEVELS = ["debug", "info", "warn", "error", "none"] as const;

export type LogLevelName = (typeof LOG_LEVELS)[number];

export function isLogLevelName(level: string): level is LogLevelName {
  return LOG_LEVELS.some((name) => name === level);
}

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}
