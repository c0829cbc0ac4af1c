/**
 * Logging and tracing integration.
 *
 * Provides the pretty console logger used by every command, and span
 * helpers for tracing.
 */
import { Effect, Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function renderMessage(message: unknown): string {
  if (typeof message === "string") return message;
  if (Array.isArray(message)) return message.map(renderMessage).join(" ");
  return JSON.stringify(message);
}

/** `[HH:MM:SS.mmm] LEVEL message`; warnings and errors go to stderr. */
export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const line = `[${ts}] ${lvl} ${renderMessage(message)}`;
  if (LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)) console.error(line);
  else console.log(line);
});

/** Replace Effect's default logger with `prettyLogger`. */
export const PrettyLoggerLive: Layer.Layer<never> = Logger.replace(Logger.defaultLogger, prettyLogger);

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string | undefined): LogLevel.LogLevel {
  switch ((level ?? "").toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}

/**
 * Run a program with the pretty logger at `level`. A failure rejects with
 * the typed error itself rather than a wrapped fiber failure.
 */
export async function runLogged<A, E>(program: Effect.Effect<A, E>, level: LogLevel.LogLevel = LogLevel.Info): Promise<A> {
  const result = await Effect.runPromise(
    program.pipe(Logger.withMinimumLogLevel(level), Effect.provide(PrettyLoggerLive), Effect.either),
  );
  if (result._tag === "Left") throw result.left;
  return result.right;
}
