/**
 * MONITORING CONFIG SCHEMA
 *
 * Protocol requirements and tunable thresholds for a monitoring run.
 */

import { Schema as S, pipe } from "effect";
import {
  SlotRequirementsSchema,
  RequiredStudyDaysSchema,
  defaultSlotRequirements,
  DEFAULT_REQUIRED_STUDY_DAYS,
} from "./completeness";

// ============================================================================
// PHYSIOLOGICAL RANGES
// ============================================================================

export const ValueRangeSchema = pipe(
  S.Struct({
    min: S.Number,
    max: S.Number,
  }),
  S.filter((range) => range.min <= range.max, {
    message: () => "Range minimum must not exceed its maximum",
  })
);
export type ValueRange = S.Schema.Type<typeof ValueRangeSchema>;

export const PhysiologicalRangesSchema = S.Struct({
  systolic: ValueRangeSchema,
  diastolic: ValueRangeSchema,
  pulse: ValueRangeSchema,
});
export type PhysiologicalRanges = S.Schema.Type<typeof PhysiologicalRangesSchema>;

export const defaultPhysiologicalRanges: PhysiologicalRanges = {
  systolic: { min: 70, max: 250 },
  diastolic: { min: 40, max: 150 },
  pulse: { min: 40, max: 150 },
};

// ============================================================================
// MONITORING CONFIG
// ============================================================================

const PositiveMinutes = pipe(S.Number, S.greaterThan(0));

export const MonitoringConfigSchema = pipe(
  S.Struct({
    requirements: SlotRequirementsSchema,
    requiredStudyDays: RequiredStudyDaysSchema,

    // Ambiguity resolution windows
    tightCorroborationMinutes: PositiveMinutes, // default 2 - same capture session
    looseCorroborationMinutes: PositiveMinutes, // default 120 - any reading that day

    ranges: PhysiologicalRangesSchema,

    // Orchestration
    concurrency: pipe(S.Int, S.greaterThanOrEqualTo(1)),
    runTimeoutMs: pipe(S.Int, S.greaterThan(0)),
    allowFileLevelNowFallback: S.Boolean,

    dataDir: pipe(S.String, S.minLength(1)),
    reportsDir: pipe(S.String, S.minLength(1)),
  }),
  S.filter(
    (config) => config.tightCorroborationMinutes <= config.looseCorroborationMinutes,
    {
      message: () => "Tight corroboration window must not exceed the loose window",
    }
  )
);
export type MonitoringConfig = S.Schema.Type<typeof MonitoringConfigSchema>;

export const defaultMonitoringConfig: MonitoringConfig = {
  requirements: defaultSlotRequirements,
  requiredStudyDays: DEFAULT_REQUIRED_STUDY_DAYS,
  tightCorroborationMinutes: 2,
  looseCorroborationMinutes: 120,
  ranges: defaultPhysiologicalRanges,
  concurrency: 4,
  runTimeoutMs: 300_000,
  allowFileLevelNowFallback: false,
  dataDir: "data",
  reportsDir: "reports",
};

export const decodeMonitoringConfig = S.decodeUnknown(MonitoringConfigSchema);
