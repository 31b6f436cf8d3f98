/**
 * EFFECT RUNTIME - CENTRALIZED RUNTIME CONFIGURATION
 *
 * Provides a unified runtime for Effect-TS programs with:
 * - Structured JSON logging with PHI redaction
 * - Result-style helpers (no exceptions cross the boundary)
 * - Error serialization for the run report
 *
 * Architecture:
 * - Effect.runPromise for orchestration (file access, concurrency)
 * - Effect.runSync for pure computations (resolution, aggregation)
 * - Logger.replace swaps the default logger for AppLogger
 */

import { Effect, Logger, LogLevel } from "effect";
import type { ServiceError } from "./errors";

// ============================================================================
// REDACTION
// ============================================================================

// Document text and file contents carry patient names.
const REDACT_KEYS = [/text$/i, /content/i, /document/i, /rawdate/i];

const redactValue = (value: unknown): unknown => {
  if (typeof value === "string") {
    if (value.length > 120 || value.includes("\n")) {
      return "[REDACTED]";
    }
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((v) => redactValue(v));
  }

  if (value !== null && typeof value === "object") {
    return redactRecord(Object.fromEntries(Object.entries(value)));
  }

  return value;
};

const redactRecord = (record: Record<string, unknown>): Record<string, unknown> => {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(record)) {
    out[k] = REDACT_KEYS.some((re) => re.test(k)) ? "[REDACTED]" : redactValue(v);
  }
  return out;
};

const renderMessage = (message: unknown): unknown => {
  // Effect hands the logger an array of the arguments given to Effect.log*
  if (Array.isArray(message) && message.length === 1) {
    return redactValue(message[0]);
  }
  return redactValue(message);
};

// ============================================================================
// RUNTIME CONFIGURATION
// ============================================================================

/**
 * Structured logger: one JSON object per line.
 */
const AppLogger = Logger.make(({ logLevel, message, annotations }) => {
  const annotationRecord: Record<string, unknown> = {};
  for (const [key, value] of annotations) {
    annotationRecord[key] = value;
  }

  const entry = {
    timestamp: new Date().toISOString(),
    level: logLevel.label,
    message: renderMessage(message),
    ...redactRecord(annotationRecord),
  };

  const line = JSON.stringify(entry);

  if (logLevel._tag === "Error" || logLevel._tag === "Fatal") {
    console.error(line);
  } else if (logLevel._tag === "Warning") {
    console.warn(line);
  } else if (logLevel._tag === "Info") {
    console.info(line);
  } else {
    console.log(line);
  }
});

const minimumLevel = (): LogLevel.LogLevel => {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  switch (configured) {
    case "debug":
      return LogLevel.Debug;
    case "warn":
    case "warning":
      return LogLevel.Warning;
    case "error":
      return LogLevel.Error;
    case "none":
      return LogLevel.None;
    default:
      return process.env.NODE_ENV === "test" ? LogLevel.Warning : LogLevel.Info;
  }
};

/**
 * Base layer: structured logger + level filtering
 * (INFO+ by default, WARN+ under the test runner, LOG_LEVEL overrides)
 */
const AppLayer = Logger.replace(Logger.defaultLogger, AppLogger);

const withAppLogging = <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
  effect.pipe(Logger.withMinimumLogLevel(minimumLevel()), Effect.provide(AppLayer));

// ============================================================================
// RUNTIME HELPERS
// ============================================================================

export type RunResult<A, E> = { success: true; data: A } | { success: false; error: E };

/**
 * Run Effect as Promise with error handling
 *
 * @example
 * const result = await runPromise(runMonitoringCheck(config));
 * if (result.success) {
 *   console.log(result.data.overallSummary);
 * }
 */
export const runPromise = <A, E>(effect: Effect.Effect<A, E, never>): Promise<RunResult<A, E>> => {
  return Effect.runPromise(
    withAppLogging(effect).pipe(
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) => Effect.succeed({ success: false as const, error }))
    )
  );
};

/**
 * Run Effect synchronously (for pure computations)
 *
 * CAUTION: Will throw if Effect fails
 */
export const runSync = <A>(effect: Effect.Effect<A, never, never>): A => {
  return Effect.runSync(withAppLogging(effect));
};

/**
 * Run Effect with Result type (no exceptions)
 *
 * @example
 * const result = runSyncResult(aggregate(measurements, requirements));
 */
export const runSyncResult = <A, E>(effect: Effect.Effect<A, E, never>): RunResult<A, E> => {
  return Effect.runSync(
    withAppLogging(effect).pipe(
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) => Effect.succeed({ success: false as const, error }))
    )
  );
};

// ============================================================================
// SERVICE ERROR HELPERS
// ============================================================================

export const isRecoverable = (error: ServiceError): boolean => {
  return error.recoverable;
};

/**
 * Convert ServiceError to JSON for logging
 */
export const serializeError = (error: ServiceError): Record<string, unknown> => {
  return error.toJSON();
};

export { AppLayer, AppLogger, withAppLogging, redactValue };
