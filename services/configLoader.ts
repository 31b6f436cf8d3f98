/**
 * MONITORING CONFIG LOADER
 *
 * Overrides are shallow-merged over the defaults, then the result is
 * decoded as a whole so cross-field rules (tight ≤ loose window) apply.
 */

import { Effect } from "effect";
import { readFile } from "node:fs/promises";
import {
  decodeMonitoringConfig,
  defaultMonitoringConfig,
  type MonitoringConfig,
} from "../schemas/monitoringConfig";
import { ConfigurationError } from "./errors";

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export const resolveMonitoringConfig = (
  overrides: unknown
): Effect.Effect<MonitoringConfig, ConfigurationError, never> => {
  if (overrides === undefined || overrides === null) {
    return Effect.succeed(defaultMonitoringConfig);
  }

  if (typeof overrides !== "object" || Array.isArray(overrides)) {
    return Effect.fail(
      new ConfigurationError({
        message: "Monitoring config overrides must be an object",
        context: { received: Array.isArray(overrides) ? "array" : typeof overrides },
      })
    );
  }

  return decodeMonitoringConfig({ ...defaultMonitoringConfig, ...overrides }).pipe(
    Effect.mapError(
      (error) =>
        new ConfigurationError({
          message: `Invalid monitoring config: ${error.message}`,
        })
    )
  );
};

/**
 * Read a JSON config file. A missing file means "use the defaults".
 */
export const loadMonitoringConfigFile = (
  path: string
): Effect.Effect<MonitoringConfig, ConfigurationError, never> =>
  Effect.gen(function* (_) {
    const text = yield* _(
      Effect.tryPromise({
        try: async (): Promise<string | null> => {
          try {
            return await readFile(path, "utf8");
          } catch (error) {
            if (isMissingFile(error)) return null;
            throw error;
          }
        },
        catch: (error) =>
          new ConfigurationError({
            message: `Cannot read monitoring config ${path}`,
            context: { reason: error instanceof Error ? error.message : String(error) },
          }),
      })
    );

    if (text === null) {
      yield* _(Effect.logInfo("config_defaults_used").pipe(Effect.annotateLogs({ path })));
      return defaultMonitoringConfig;
    }

    const parsed = yield* _(
      Effect.try({
        try: (): unknown => JSON.parse(text),
        catch: (error) =>
          new ConfigurationError({
            message: `Monitoring config ${path} is not valid JSON`,
            context: { reason: error instanceof Error ? error.message : String(error) },
          }),
      })
    );

    return yield* _(resolveMonitoringConfig(parsed));
  });
