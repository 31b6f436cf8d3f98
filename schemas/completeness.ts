/**
 * COMPLETENESS SCHEMAS
 *
 * Timeline, per-patient completeness report and the multi-patient
 * monitoring report. Everything here is JSON-compatible: maps are keyed by
 * `YYYY-MM-DD` or by slot name.
 */

import { Schema as S, pipe } from "effect";
import { CalendarDateSchema, MeasurementKindSchema, FileDescriptorSchema } from "./measurement";

// ============================================================================
// TIMELINE
// ============================================================================

/**
 * OCaml equivalent:
 * type slot_counts = { pressure_count: int; ecg_count: int }
 */
export const SlotCountsSchema = S.Struct({
  pressureCount: pipe(S.Int, S.greaterThanOrEqualTo(0)),
  ecgCount: pipe(S.Int, S.greaterThanOrEqualTo(0)),
});
export type SlotCounts = S.Schema.Type<typeof SlotCountsSchema>;

export const DaySlotsSchema = S.Struct({
  morning: SlotCountsSchema,
  evening: SlotCountsSchema,
});
export type DaySlots = S.Schema.Type<typeof DaySlotsSchema>;

/**
 * Chronologically ordered date → slots mapping.
 */
export const PatientTimelineSchema = S.Record({
  key: CalendarDateSchema,
  value: DaySlotsSchema,
});
export type PatientTimeline = S.Schema.Type<typeof PatientTimelineSchema>;

// ============================================================================
// REQUIREMENTS
// ============================================================================

const Count = pipe(S.Int, S.greaterThanOrEqualTo(0));

export const SlotRequirementsSchema = S.Struct({
  pressurePerSlot: Count,
  ecgPerSlot: Count,
});
export type SlotRequirements = S.Schema.Type<typeof SlotRequirementsSchema>;

export const RequiredStudyDaysSchema = pipe(S.Int, S.greaterThanOrEqualTo(1));

export const defaultSlotRequirements: SlotRequirements = {
  pressurePerSlot: 2,
  ecgPerSlot: 2,
};

export const DEFAULT_REQUIRED_STUDY_DAYS = 7;

// ============================================================================
// COMPLETENESS REPORT
// ============================================================================

export const MissingSlotSchema = S.Struct({
  date: CalendarDateSchema,
  slot: S.Literal("morning", "evening"),
  missingKinds: S.Array(MeasurementKindSchema),
});
export type MissingSlot = S.Schema.Type<typeof MissingSlotSchema>;

/**
 * OCaml equivalent:
 * type completeness_report = {
 *   daily_data: patient_timeline;
 *   requirements: slot_requirements;
 *   required_study_days: int;
 *   consecutive_complete_days: int;
 *   is_complete: bool;
 *   missing_slots: missing_slot list;
 *   ...
 * }
 *
 * Invariant: isComplete = consecutiveCompleteDays >= requiredStudyDays
 */
export const CompletenessReportSchema = pipe(
  S.Struct({
    dailyData: PatientTimelineSchema,
    requirements: SlotRequirementsSchema,
    requiredStudyDays: RequiredStudyDaysSchema,
    consecutiveCompleteDays: Count,
    isComplete: S.Boolean,
    missingSlots: S.Array(MissingSlotSchema),
    completeDays: Count,
    receivedSlotCompletions: Count,
    expectedSlotCompletions: Count,
    completionPercentage: pipe(S.Number, S.between(0, 100)),
  }),
  S.filter(
    (report) => report.isComplete === report.consecutiveCompleteDays >= report.requiredStudyDays,
    {
      message: () => "isComplete must agree with the consecutive-day streak",
    }
  )
);
export type CompletenessReport = S.Schema.Type<typeof CompletenessReportSchema>;

// ============================================================================
// ISSUES (non-fatal findings accumulated per run)
// ============================================================================

export const IssueSeveritySchema = S.Literal("info", "warning", "error");
export type IssueSeverity = S.Schema.Type<typeof IssueSeveritySchema>;

export const IssueCodeSchema = S.Literal(
  "UNPARSEABLE_ROW",
  "OUT_OF_RANGE",
  "UNDATED_DOCUMENT",
  "NOW_FALLBACK",
  "NO_ECG_CONTENT",
  "AMBIGUITY_HEURISTIC",
  "NO_PRESSURE_SOURCE",
  "IGNORED_SOURCE",
  "FILE_DECODE_FAILED",
  "SOURCE_UNAVAILABLE"
);
export type IssueCode = S.Schema.Type<typeof IssueCodeSchema>;

export const IssueSchema = S.Struct({
  severity: IssueSeveritySchema,
  code: IssueCodeSchema,
  message: S.String,
  file: S.optional(S.String),
  patientId: S.optional(S.String),
});
export type Issue = S.Schema.Type<typeof IssueSchema>;

// ============================================================================
// PATIENT & MONITORING REPORT
// ============================================================================

export const PatientReportSchema = S.Struct({
  patientId: pipe(S.String, S.minLength(1)),
  completeness: CompletenessReportSchema,
  canonicalSource: S.NullOr(FileDescriptorSchema),
  ignoredSources: S.Array(FileDescriptorSchema),
  measurementCounts: S.Struct({
    pressure: Count,
    ecg: Count,
  }),
  issues: S.Array(IssueSchema),
});
export type PatientReport = S.Schema.Type<typeof PatientReportSchema>;

/**
 * OCaml equivalent:
 * type overall_summary = {
 *   total_patients: int;
 *   patients_complete: int;
 *   patients_incomplete: int;
 *   total_slot_completions_expected: int;
 *   total_slot_completions_received: int;
 * }
 *
 * Invariant: patientsComplete + patientsIncomplete = totalPatients
 */
export const OverallSummarySchema = S.Struct({
  totalPatients: Count,
  patientsComplete: Count,
  patientsIncomplete: Count,
  totalSlotCompletionsExpected: Count,
  totalSlotCompletionsReceived: Count,
});
export type OverallSummary = S.Schema.Type<typeof OverallSummarySchema>;

export const MonitoringReportSchema = S.Struct({
  generatedAt: S.String,
  overallSummary: OverallSummarySchema,
  patients: S.Record({ key: S.String, value: PatientReportSchema }),
  issues: S.Array(IssueSchema),
});
export type MonitoringReport = S.Schema.Type<typeof MonitoringReportSchema>;

