/**
 * MONITORING PIPELINE - EFFECT-TS VERSION
 *
 * Orchestrates a monitoring run across every patient:
 *
 *   listPatients
 *     → extractPatient (per patient, concurrently)
 *         files → canonical pressure export → pressure rows
 *               → ECG documents (corroborated by the pressure timestamps)
 *     → ExtractionIndex (explicit per-run map, no hidden caches)
 *     → aggregate per patient → OverallSummary
 *     → ReportStore.save
 *
 * Per-patient and per-file failures become issues on the report. Only a
 * missing patient listing, malformed requirements or the run timeout fail
 * the whole run.
 */

import { Clock, Duration, Effect, Either } from "effect";
import { format } from "date-fns";
import type { EcgMeasurement, FileDescriptor, PressureMeasurement, RawMeasurement } from "../schemas/measurement";
import type { Issue, MonitoringReport, PatientReport } from "../schemas/completeness";
import { defaultMonitoringConfig, type MonitoringConfig } from "../schemas/monitoringConfig";
import {
  DocumentTextDecoder,
  MeasurementSource,
  PressureRowDecoder,
  ReportStore,
  type ExtractionServices,
} from "./collaborators";
import { ConfigurationError, IssueCollector, RunTimeoutError, SourceError } from "./errors";
import { isEcgCandidate, isPressureCandidate, rankSourcesLogged } from "./canonicalSource";
import { extractEcgMeasurement, extractPressureMeasurements } from "./measurementExtractor.effect";
import { aggregate, summarize } from "./completenessAggregator";
import type { ResolverThresholds } from "./ambiguityResolver.effect";

// ============================================================================
// TYPES
// ============================================================================

export interface PatientExtraction {
  readonly patientId: string;
  readonly canonicalSource: FileDescriptor | null;
  readonly ignoredSources: ReadonlyArray<FileDescriptor>;
  readonly measurements: ReadonlyArray<RawMeasurement>;
  readonly issues: ReadonlyArray<Issue>;
}

/** patientId → extraction, built once per run */
export type ExtractionIndex = ReadonlyMap<string, PatientExtraction>;

export interface MonitoringRun {
  readonly report: MonitoringReport;
  /** null when the report could not be persisted */
  readonly location: string | null;
}

const thresholdsOf = (config: MonitoringConfig): ResolverThresholds => ({
  tightMinutes: config.tightCorroborationMinutes,
  looseMinutes: config.looseCorroborationMinutes,
});

// ============================================================================
// PER-PATIENT EXTRACTION
// ============================================================================

const extractEcgFiles = (
  patientId: string,
  files: ReadonlyArray<FileDescriptor>,
  canonical: FileDescriptor | null,
  pressure: ReadonlyArray<PressureMeasurement>,
  config: MonitoringConfig,
  issues: IssueCollector
): Effect.Effect<EcgMeasurement[], never, DocumentTextDecoder> =>
  Effect.gen(function* (_) {
    const decoder = yield* _(DocumentTextDecoder);
    const dayPoints = pressure.map((m) => m.timestamp);
    const measurements: EcgMeasurement[] = [];

    for (const file of files) {
      const decoded = yield* _(Effect.either(decoder.extractText(file)));
      if (Either.isLeft(decoded)) {
        issues.fromError("FILE_DECODE_FAILED", decoded.left);
        yield* _(Effect.logWarning("ecg_decode_failed").pipe(Effect.annotateLogs({ file: file.name })));
        continue;
      }

      // Same capture session as the canonical export: tight pairing is allowed
      const sameSession =
        canonical !== null && canonical.sessionId !== undefined && file.sessionId === canonical.sessionId;

      const extracted = yield* _(
        extractEcgMeasurement({
          patientId,
          document: decoded.right,
          corroboration: sameSession ? { session: dayPoints, day: dayPoints } : { day: dayPoints },
          options: {
            thresholds: thresholdsOf(config),
            allowFileLevelNowFallback: config.allowFileLevelNowFallback,
          },
        })
      );
      issues.addAll(extracted.issues);
      if (extracted.measurement !== null) {
        measurements.push(extracted.measurement);
      }
    }

    return measurements;
  });

/**
 * Files → measurements for one patient. Never fails: problems are issues.
 */
export const extractPatient = (
  patientId: string,
  config: MonitoringConfig = defaultMonitoringConfig
): Effect.Effect<PatientExtraction, never, ExtractionServices> =>
  Effect.gen(function* (_) {
    const source = yield* _(MeasurementSource);
    const rowDecoder = yield* _(PressureRowDecoder);
    const issues = new IssueCollector();

    const listed = yield* _(Effect.either(source.listFiles(patientId)));
    if (Either.isLeft(listed)) {
      issues.fromError("SOURCE_UNAVAILABLE", listed.left);
      return { patientId, canonicalSource: null, ignoredSources: [], measurements: [], issues: issues.getAll() };
    }
    const { files, unreadable } = listed.right;
    for (const entry of unreadable) {
      issues.fromError("SOURCE_UNAVAILABLE", entry);
    }

    // Stage 1: canonical pressure export
    const ranking = yield* _(rankSourcesLogged(files.filter(isPressureCandidate)));
    const canonical = ranking.selected;
    let pressure: ReadonlyArray<PressureMeasurement> = [];

    if (canonical === null) {
      issues.info("NO_PRESSURE_SOURCE", "No pressure export found for this patient");
    } else {
      for (const ignored of ranking.ignored) {
        issues.info("IGNORED_SOURCE", `Ignored in favour of canonical export ${canonical.name}`, ignored.name);
      }

      const rows = yield* _(Effect.either(rowDecoder.decodeRows(canonical)));
      if (Either.isLeft(rows)) {
        issues.fromError("FILE_DECODE_FAILED", rows.left);
      } else {
        const extracted = yield* _(
          extractPressureMeasurements({
            patientId,
            sourceFile: canonical.name,
            rows: rows.right,
            ranges: config.ranges,
          })
        );
        pressure = extracted.measurements;
        issues.addAll(extracted.issues);
      }
    }

    // Stage 2: ECG reports, resolved against the pressure timestamps
    const ecg = yield* _(
      extractEcgFiles(patientId, files.filter(isEcgCandidate), canonical, pressure, config, issues)
    );

    yield* _(
      Effect.logInfo("patient_extracted").pipe(
        Effect.annotateLogs({
          files: files.length,
          pressure: pressure.length,
          ecg: ecg.length,
          issues: issues.count(),
        })
      )
    );

    return {
      patientId,
      canonicalSource: canonical,
      ignoredSources: ranking.ignored,
      measurements: [...pressure, ...ecg],
      issues: issues.getAll(),
    };
  }).pipe(Effect.annotateLogs({ patientId }));

/**
 * Extract every patient with bounded concurrency into the run's index.
 */
export const buildExtractionIndex = (
  patientIds: ReadonlyArray<string>,
  config: MonitoringConfig = defaultMonitoringConfig
): Effect.Effect<ExtractionIndex, never, ExtractionServices> =>
  Effect.map(
    Effect.forEach(patientIds, (patientId) => extractPatient(patientId, config), {
      concurrency: config.concurrency,
    }),
    (extractions) => new Map(extractions.map((extraction) => [extraction.patientId, extraction] as const))
  );

// ============================================================================
// REPORT
// ============================================================================

const countKind = (measurements: ReadonlyArray<RawMeasurement>, kind: RawMeasurement["kind"]): number =>
  measurements.filter((m) => m.kind === kind).length;

/**
 * Stage 3: aggregate each indexed patient and reduce the overall summary.
 * Patients appear in identifier order whatever order the index was built in.
 */
export const buildMonitoringReport = (
  index: ExtractionIndex,
  config: MonitoringConfig,
  generatedAt: string,
  runIssues: ReadonlyArray<Issue> = []
): Effect.Effect<MonitoringReport, ConfigurationError, never> =>
  Effect.gen(function* (_) {
    const patients: Record<string, PatientReport> = {};
    const issues: Issue[] = [...runIssues];

    for (const patientId of [...index.keys()].sort()) {
      const extraction = index.get(patientId);
      if (extraction === undefined) continue;

      const completeness = yield* _(
        aggregate(extraction.measurements, config.requirements, config.requiredStudyDays)
      );
      patients[patientId] = {
        patientId,
        completeness,
        canonicalSource: extraction.canonicalSource,
        ignoredSources: extraction.ignoredSources,
        measurementCounts: {
          pressure: countKind(extraction.measurements, "pressure"),
          ecg: countKind(extraction.measurements, "ecg"),
        },
        issues: extraction.issues,
      };
      issues.push(...extraction.issues.map((issue) => ({ ...issue, patientId })));
    }

    return {
      generatedAt,
      overallSummary: summarize(Object.values(patients).map((patient) => patient.completeness)),
      patients,
      issues,
    };
  });

/** monitoring_report_YYYYMMDD_HHmmss.json (local time) */
export const reportFileName = (generatedAt: Date): string =>
  `monitoring_report_${format(generatedAt, "yyyyMMdd_HHmmss")}.json`;

// ============================================================================
// RUN
// ============================================================================

/**
 * The whole run under one timeout guard.
 */
export const runMonitoringCheck = (
  config: MonitoringConfig = defaultMonitoringConfig
): Effect.Effect<
  MonitoringRun,
  SourceError | ConfigurationError | RunTimeoutError,
  ExtractionServices | ReportStore
> =>
  Effect.gen(function* (_) {
    const source = yield* _(MeasurementSource);
    const store = yield* _(ReportStore);

    const startedAt = new Date(yield* _(Clock.currentTimeMillis));
    const patientIds = yield* _(source.listPatients());
    yield* _(Effect.logInfo("monitoring_run_started").pipe(Effect.annotateLogs({ patients: patientIds.length })));

    const index = yield* _(buildExtractionIndex(patientIds, config));
    const report = yield* _(buildMonitoringReport(index, config, startedAt.toISOString()));

    const saved = yield* _(Effect.either(store.save(reportFileName(startedAt), report)));
    if (Either.isLeft(saved)) {
      yield* _(
        Effect.logWarning("report_not_saved").pipe(
          Effect.annotateLogs({ location: saved.left.location, reason: saved.left.reason })
        )
      );
    }

    yield* _(
      Effect.logInfo("monitoring_run_finished").pipe(
        Effect.annotateLogs({
          patientsComplete: report.overallSummary.patientsComplete,
          patientsIncomplete: report.overallSummary.patientsIncomplete,
        })
      )
    );

    return { report, location: Either.isRight(saved) ? saved.right : null };
  }).pipe(
    Effect.timeoutFail({
      duration: Duration.millis(config.runTimeoutMs),
      onTimeout: () => new RunTimeoutError({ timeoutMs: config.runTimeoutMs }),
    })
  );
