/**
 * MEASUREMENT SCHEMAS
 *
 * Timestamps, slots and the normalized measurement record shared by the
 * extractor, resolver and aggregator.
 *
 * Philosophy:
 * - Wall-clock timestamps, no time zone: every comparison goes through
 *   the calendar date and seconds-of-day
 * - The slot is derived from the timestamp, never set independently
 * - Measurements are immutable once built
 */

import { Schema as S, pipe } from "effect";

// ============================================================================
// MEASUREMENT KIND
// ============================================================================

/**
 * OCaml equivalent:
 * type measurement_kind = Pressure | Ecg
 */
export const MeasurementKindSchema = S.Literal("pressure", "ecg");
export type MeasurementKind = S.Schema.Type<typeof MeasurementKindSchema>;

// ============================================================================
// TIME SLOT
// ============================================================================

/**
 * Daily capture windows.
 *
 * OCaml equivalent:
 * type time_slot = Morning | Evening | OutOfSlot
 */
export const TimeSlotSchema = S.Literal("morning", "evening", "out_of_slot");
export type TimeSlot = S.Schema.Type<typeof TimeSlotSchema>;

/** The two slots a protocol day is made of */
export type ScoredSlot = Exclude<TimeSlot, "out_of_slot">;

export const SCORED_SLOTS: ReadonlyArray<ScoredSlot> = ["morning", "evening"];

// ============================================================================
// TIMESTAMPS
// ============================================================================

export const CalendarDateSchema = pipe(
  S.String,
  S.pattern(/^\d{4}-\d{2}-\d{2}$/, {
    message: () => "Calendar date must use the YYYY-MM-DD layout",
  })
);

const MinuteOrSecond = pipe(S.Int, S.between(0, 59));

/**
 * MEASUREMENT TIMESTAMP (resolved, 24-hour)
 *
 * OCaml equivalent:
 * type timestamp = { date: string; hour: int; minute: int; second: int }
 */
export const MeasurementTimestampSchema = S.Struct({
  date: CalendarDateSchema,
  hour: pipe(S.Int, S.between(0, 23)),
  minute: MinuteOrSecond,
  second: MinuteOrSecond,
});
export type MeasurementTimestamp = S.Schema.Type<typeof MeasurementTimestampSchema>;

export const MeridiemSchema = S.Literal("AM", "PM");
export type Meridiem = S.Schema.Type<typeof MeridiemSchema>;

/**
 * AMBIGUOUS TIMESTAMP (resolver input, never persisted)
 *
 * The hour was read on a 12-hour dial. `meridiem` is present only when the
 * source text carried an explicit a.m./p.m. marker.
 */
export const AmbiguousTimestampSchema = S.Struct({
  date: CalendarDateSchema,
  hour12: pipe(S.Int, S.between(1, 12)),
  minute: MinuteOrSecond,
  second: MinuteOrSecond,
  meridiem: S.optional(MeridiemSchema),
});
export type AmbiguousTimestamp = S.Schema.Type<typeof AmbiguousTimestampSchema>;

export const hasExplicitMeridiem = (
  ts: AmbiguousTimestamp
): ts is AmbiguousTimestamp & { readonly meridiem: Meridiem } => ts.meridiem !== undefined;

// ============================================================================
// RESOLUTION TRACE
// ============================================================================

/**
 * OCaml equivalent:
 * type resolution_branch = Explicit | Corroborated | Heuristic
 */
export const ResolutionBranchSchema = S.Literal("explicit", "corroborated", "heuristic");
export type ResolutionBranch = S.Schema.Type<typeof ResolutionBranchSchema>;

/**
 * How a corroborating reading relates to the ambiguous one.
 * - session: captured in the same session (high confidence, tight window)
 * - day: any reading taken that day (low confidence, loose window)
 */
export const CorroborationPairingSchema = S.Literal("session", "day");
export type CorroborationPairing = S.Schema.Type<typeof CorroborationPairingSchema>;

export const ResolutionTraceSchema = S.Struct({
  branch: ResolutionBranchSchema,
  original: AmbiguousTimestampSchema,
  resolvedHour: pipe(S.Int, S.between(0, 23)),
  pairing: S.optional(CorroborationPairingSchema),
  thresholdMinutes: S.optional(S.Number),
  minDiffAm: S.optional(S.Number),
  minDiffPm: S.optional(S.Number),
  corroboratingPoints: pipe(S.Int, S.greaterThanOrEqualTo(0)),
});
export type ResolutionTrace = S.Schema.Type<typeof ResolutionTraceSchema>;

// ============================================================================
// PAYLOADS
// ============================================================================

export const VitalFieldSchema = S.Literal("systolic", "diastolic", "pulse");
export type VitalField = S.Schema.Type<typeof VitalFieldSchema>;

/**
 * Out-of-physiological-range flag. Informational: the reading still counts.
 */
export const RangeWarningSchema = S.Struct({
  field: VitalFieldSchema,
  value: S.Number,
  min: S.Number,
  max: S.Number,
});
export type RangeWarning = S.Schema.Type<typeof RangeWarningSchema>;

export const PressurePayloadSchema = S.Struct({
  systolic: S.Number,
  diastolic: S.Number,
  pulse: S.optional(S.Number),
  warnings: S.Array(RangeWarningSchema),
});
export type PressurePayload = S.Schema.Type<typeof PressurePayloadSchema>;

export const EcgPayloadSchema = S.Struct({
  resolution: S.optional(ResolutionTraceSchema),
});
export type EcgPayload = S.Schema.Type<typeof EcgPayloadSchema>;

// ============================================================================
// RAW MEASUREMENT (Sum Type)
// ============================================================================

const MeasurementBase = {
  patientId: pipe(S.String, S.minLength(1)),
  timestamp: MeasurementTimestampSchema,
  slot: TimeSlotSchema,
  sourceFile: pipe(S.String, S.minLength(1)),
};

export const PressureMeasurementSchema = S.Struct({
  ...MeasurementBase,
  kind: S.Literal("pressure"),
  payload: PressurePayloadSchema,
});
export type PressureMeasurement = S.Schema.Type<typeof PressureMeasurementSchema>;

export const EcgMeasurementSchema = S.Struct({
  ...MeasurementBase,
  kind: S.Literal("ecg"),
  payload: EcgPayloadSchema,
});
export type EcgMeasurement = S.Schema.Type<typeof EcgMeasurementSchema>;

/**
 * OCaml equivalent:
 * type raw_measurement =
 *   | Pressure of measurement_base * pressure_payload
 *   | Ecg of measurement_base * ecg_payload
 */
export const RawMeasurementSchema = S.Union(PressureMeasurementSchema, EcgMeasurementSchema);
export type RawMeasurement = S.Schema.Type<typeof RawMeasurementSchema>;

// ============================================================================
// COLLABORATOR BOUNDARY SHAPES
// ============================================================================

/**
 * One decoded row of a tabular pressure export.
 */
export const PressureRowSchema = S.Struct({
  systolic: S.optional(S.Number),
  diastolic: S.optional(S.Number),
  pulse: S.optional(S.Number),
  rawDateText: S.optional(S.String),
});
export type PressureRow = S.Schema.Type<typeof PressureRowSchema>;

/**
 * Text extracted from one ECG report.
 */
export const EcgDocumentSchema = S.Struct({
  extractedText: S.String,
  sourceFile: pipe(S.String, S.minLength(1)),
});
export type EcgDocument = S.Schema.Type<typeof EcgDocumentSchema>;

/**
 * A candidate file as listed by the measurement source.
 * `modifiedTime` is epoch milliseconds.
 */
export const FileDescriptorSchema = S.Struct({
  id: pipe(S.String, S.minLength(1)),
  name: pipe(S.String, S.minLength(1)),
  size: pipe(S.Int, S.greaterThanOrEqualTo(0)),
  modifiedTime: S.Number,
  sessionId: S.optional(S.String),
});
export type FileDescriptor = S.Schema.Type<typeof FileDescriptorSchema>;
