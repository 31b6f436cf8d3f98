/**
 * MEASUREMENT EXTRACTOR - EFFECT-TS VERSION
 *
 * Turns decoded pressure rows and ECG report text into RawMeasurements that
 * are already slot-classified and ambiguity-resolved.
 *
 * Architecture:
 * - Effect<Extraction, never, never> (data problems never fail the effect)
 * - Bad rows/documents are dropped and reported as Issues
 * - Out-of-range vitals are kept and flagged
 *
 * OCaml equivalent:
 * module MeasurementExtractor : sig
 *   val extract_pressure_measurements : pressure_input -> pressure_extraction
 *   val extract_ecg_measurement : ecg_input -> ecg_extraction
 * end
 */

import { Clock, Effect } from "effect";
import type {
  EcgDocument,
  EcgMeasurement,
  MeasurementTimestamp,
  PressureMeasurement,
  PressurePayload,
  PressureRow,
  RangeWarning,
  ResolutionTrace,
  VitalField,
} from "../schemas/measurement";
import type { Issue } from "../schemas/completeness";
import { defaultPhysiologicalRanges, type PhysiologicalRanges } from "../schemas/monitoringConfig";
import { IssueCollector } from "./errors";
import { classifyTimeSlot } from "./timeSlotClassifier";
import { fromLocalDate, fromParts, toIsoLocal } from "./timestamps";
import { findDocumentDate, findFilenameDate, parseTabularDate, type DateParts } from "./dateTextParser";
import {
  defaultResolverThresholds,
  resolveWithCascade,
  type CascadeSources,
  type ResolverThresholds,
} from "./ambiguityResolver.effect";

// ============================================================================
// SMART CONSTRUCTORS (slot always derived from the timestamp)
// ============================================================================

export const makePressureMeasurement = (
  patientId: string,
  sourceFile: string,
  timestamp: MeasurementTimestamp,
  payload: PressurePayload
): PressureMeasurement => ({
  patientId,
  kind: "pressure",
  timestamp,
  slot: classifyTimeSlot(timestamp),
  sourceFile,
  payload,
});

export const makeEcgMeasurement = (
  patientId: string,
  sourceFile: string,
  timestamp: MeasurementTimestamp,
  resolution?: ResolutionTrace
): EcgMeasurement => ({
  patientId,
  kind: "ecg",
  timestamp,
  slot: classifyTimeSlot(timestamp),
  sourceFile,
  payload: resolution === undefined ? {} : { resolution },
});

// ============================================================================
// RANGE CHECKS
// ============================================================================

const FIELD_LABELS: Record<VitalField, string> = {
  systolic: "Systolic",
  diastolic: "Diastolic",
  pulse: "Pulse",
};

export const checkRanges = (
  values: { readonly systolic: number; readonly diastolic: number; readonly pulse?: number },
  ranges: PhysiologicalRanges = defaultPhysiologicalRanges
): RangeWarning[] => {
  const warnings: RangeWarning[] = [];
  const fields: ReadonlyArray<[VitalField, number | undefined]> = [
    ["systolic", values.systolic],
    ["diastolic", values.diastolic],
    ["pulse", values.pulse],
  ];

  for (const [field, value] of fields) {
    if (value === undefined) continue;
    const { min, max } = ranges[field];
    if (value < min || value > max) {
      warnings.push({ field, value, min, max });
    }
  }
  return warnings;
};

export const describeRangeWarning = (warning: RangeWarning): string =>
  `${FIELD_LABELS[warning.field]}: ${warning.value} outside the normal range (${warning.min}-${warning.max})`;

// ============================================================================
// PRESSURE EXTRACTION
// ============================================================================

export interface PressureExtractionInput {
  readonly patientId: string;
  readonly sourceFile: string;
  readonly rows: ReadonlyArray<PressureRow>;
  readonly ranges?: PhysiologicalRanges;
}

export interface PressureExtraction {
  readonly measurements: ReadonlyArray<PressureMeasurement>;
  readonly issues: ReadonlyArray<Issue>;
}

const isReading = (value: number | undefined): value is number =>
  value !== undefined && Number.isFinite(value);

/**
 * Each row is an independent reading. A row needs systolic, diastolic and
 * a date text that matches one of the tabular layouts.
 */
export const extractPressureMeasurements = (
  input: PressureExtractionInput
): Effect.Effect<PressureExtraction, never, never> =>
  Effect.gen(function* (_) {
    const ranges = input.ranges ?? defaultPhysiologicalRanges;
    const issues = new IssueCollector();
    const measurements: PressureMeasurement[] = [];

    input.rows.forEach((row, index) => {
      const rowLabel = `Row ${index + 1}`;

      if (!isReading(row.systolic) || !isReading(row.diastolic)) {
        issues.warn("UNPARSEABLE_ROW", `${rowLabel}: missing systolic or diastolic value`, input.sourceFile);
        return;
      }

      if (row.rawDateText === undefined || row.rawDateText.trim() === "") {
        issues.warn("UNPARSEABLE_ROW", `${rowLabel}: missing measurement date`, input.sourceFile);
        return;
      }

      const parsed = parseTabularDate(row.rawDateText);
      if (parsed._tag === "TimeOnly") {
        issues.warn("UNPARSEABLE_ROW", `${rowLabel}: time without a calendar date`, input.sourceFile);
        return;
      }
      if (parsed._tag === "Unrecognized") {
        issues.warn("UNPARSEABLE_ROW", `${rowLabel}: unrecognized date "${row.rawDateText}"`, input.sourceFile);
        return;
      }

      const values = isReading(row.pulse)
        ? { systolic: row.systolic, diastolic: row.diastolic, pulse: row.pulse }
        : { systolic: row.systolic, diastolic: row.diastolic };
      const warnings = checkRanges(values, ranges);
      for (const warning of warnings) {
        issues.warn("OUT_OF_RANGE", `${rowLabel}: ${describeRangeWarning(warning)}`, input.sourceFile);
      }

      measurements.push(
        makePressureMeasurement(input.patientId, input.sourceFile, parsed.timestamp, { ...values, warnings })
      );
    });

    yield* _(
      Effect.logDebug("pressure_rows_extracted").pipe(
        Effect.annotateLogs({
          file: input.sourceFile,
          rows: input.rows.length,
          measurements: measurements.length,
        })
      )
    );

    return { measurements, issues: issues.getAll() };
  });

// ============================================================================
// ECG EXTRACTION
// ============================================================================

const ECG_KEYWORDS = [
  "ecg",
  "ekg",
  "electrocardiogram",
  "electrocardiograma",
  "ritmo",
  "rhythm",
  "frecuencia",
  "heart rate",
  "bpm",
  "latido",
  "cardíaca",
];

export const hasEcgContent = (text: string): boolean => {
  const lower = text.toLowerCase();
  return ECG_KEYWORDS.some((keyword) => lower.includes(keyword));
};

export interface EcgExtractionOptions {
  readonly thresholds?: ResolverThresholds;
  readonly allowFileLevelNowFallback?: boolean;
}

export interface EcgExtractionInput {
  readonly patientId: string;
  readonly document: EcgDocument;
  readonly corroboration: CascadeSources;
  readonly options?: EcgExtractionOptions;
}

export interface EcgExtraction {
  readonly measurement: EcgMeasurement | null;
  readonly issues: ReadonlyArray<Issue>;
}

type DatedDocument =
  | { readonly _tag: "Resolved"; readonly timestamp: MeasurementTimestamp; readonly resolution?: ResolutionTrace }
  | { readonly _tag: "Invalid" };

const INVALID: DatedDocument = { _tag: "Invalid" };

const isTwelveHourDial = (hour: number): boolean => hour >= 1 && hour <= 12;

const dateFromDocumentParts = (
  parts: DateParts,
  corroboration: CascadeSources,
  thresholds: ResolverThresholds
): Effect.Effect<DatedDocument, never, never> => {
  const dayStart = fromParts(parts.year, parts.month, parts.day, 0, 0, 0);
  if (dayStart === null || parts.minute > 59 || parts.second > 59) {
    return Effect.succeed(INVALID);
  }

  // 00:xx and 13:xx-23:xx can only be read one way
  if (!isTwelveHourDial(parts.hour)) {
    const timestamp = fromParts(parts.year, parts.month, parts.day, parts.hour, parts.minute, parts.second);
    const dated: DatedDocument = timestamp === null ? INVALID : { _tag: "Resolved", timestamp };
    return Effect.succeed(dated);
  }

  const ambiguous =
    parts.meridiem === undefined
      ? { date: dayStart.date, hour12: parts.hour, minute: parts.minute, second: parts.second }
      : { date: dayStart.date, hour12: parts.hour, minute: parts.minute, second: parts.second, meridiem: parts.meridiem };

  return Effect.map(resolveWithCascade(ambiguous, corroboration, thresholds), (outcome) => ({
    _tag: "Resolved" as const,
    timestamp: outcome.timestamp,
    resolution: outcome.trace,
  }));
};

/**
 * Date lookup order: report text, then the file name, then (only when
 * enabled) the clock for the whole file.
 */
export const extractEcgMeasurement = (
  input: EcgExtractionInput
): Effect.Effect<EcgExtraction, never, never> =>
  Effect.gen(function* (_) {
    const { document, patientId } = input;
    const thresholds = input.options?.thresholds ?? defaultResolverThresholds;
    const issues = new IssueCollector();
    const file = document.sourceFile;

    if (!hasEcgContent(document.extractedText)) {
      issues.warn("NO_ECG_CONTENT", "No typical ECG content detected in the report", file);
    }

    const textMatch = findDocumentDate(document.extractedText);
    const dated =
      textMatch === null
        ? INVALID
        : yield* _(dateFromDocumentParts(textMatch.parts, input.corroboration, thresholds));
    if (dated._tag === "Resolved") {
      if (dated.resolution?.branch === "heuristic") {
        issues.info(
          "AMBIGUITY_HEURISTIC",
          `Hour ${dated.resolution.original.hour12} had no corroborating reading; resolved to ${toIsoLocal(dated.timestamp)}`,
          file
        );
      }
      return {
        measurement: makeEcgMeasurement(patientId, file, dated.timestamp, dated.resolution),
        issues: issues.getAll(),
      };
    }

    const nameParts = findFilenameDate(file);
    const fromName =
      nameParts === null
        ? null
        : fromParts(nameParts.year, nameParts.month, nameParts.day, nameParts.hour, nameParts.minute, nameParts.second);
    if (fromName !== null) {
      yield* _(Effect.logDebug("ecg_dated_from_filename").pipe(Effect.annotateLogs({ file })));
      return { measurement: makeEcgMeasurement(patientId, file, fromName), issues: issues.getAll() };
    }

    if (input.options?.allowFileLevelNowFallback === true) {
      const now = fromLocalDate(new Date(yield* _(Clock.currentTimeMillis)));
      issues.warn("NOW_FALLBACK", `No date found; stamped with the run time ${toIsoLocal(now)}`, file);
      return { measurement: makeEcgMeasurement(patientId, file, now), issues: issues.getAll() };
    }

    issues.warn("UNDATED_DOCUMENT", "No measurement date found in report text or file name", file);
    return { measurement: null, issues: issues.getAll() };
  });
