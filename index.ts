/**
 * Vitals completeness engine: public surface.
 */

import { Effect, Layer } from "effect";
import type { MonitoringConfig } from "./schemas/monitoringConfig";
import { loadMonitoringConfigFile } from "./services/configLoader";
import { DelimitedPressureDecoderLive } from "./services/delimitedPressureDecoder";
import {
  FileSystemMeasurementSourceLive,
  FileSystemReportStoreLive,
  PlainTextDocumentDecoderLive,
} from "./services/fileSystemAdapters";
import { runMonitoringCheck } from "./services/monitoringPipeline.effect";
import { runPromise } from "./services/runtime";

export * from "./schemas";
export * from "./services/errors";
export * from "./services/timestamps";
export * from "./services/timeSlotClassifier";
export * from "./services/ambiguityResolver.effect";
export * from "./services/dateTextParser";
export * from "./services/canonicalSource";
export * from "./services/measurementExtractor.effect";
export * from "./services/completenessAggregator";
export * from "./services/collaborators";
export * from "./services/configLoader";
export * from "./services/delimitedPressureDecoder";
export * from "./services/fileSystemAdapters";
export * from "./services/monitoringPipeline.effect";
export * from "./services/runtime";

/**
 * Node file-system collaborators for one config.
 */
export const FileSystemLive = (config: MonitoringConfig) =>
  Layer.mergeAll(
    FileSystemMeasurementSourceLive(config.dataDir),
    DelimitedPressureDecoderLive,
    PlainTextDocumentDecoderLive,
    FileSystemReportStoreLive(config.reportsDir)
  );

/**
 * Load the config file (defaults when absent) and run a check against the
 * directories it names.
 *
 * @example
 * const result = await runMonitoringCheckFromDisk("monitoring.config.json");
 * if (result.success) console.log(result.data.location);
 */
export const runMonitoringCheckFromDisk = (configPath: string) =>
  runPromise(
    Effect.flatMap(loadMonitoringConfigFile(configPath), (config) =>
      runMonitoringCheck(config).pipe(Effect.provide(FileSystemLive(config)))
    )
  );
