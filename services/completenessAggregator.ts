/**
 * COMPLETENESS AGGREGATOR
 *
 * Folds one patient's measurements into a day/slot timeline and scores it
 * against the protocol requirements.
 *
 * Pipeline:
 * 1. Group by date, then slot, counting by kind → PatientTimeline
 * 2. Slot complete ⇔ pressure ≥ required AND ecg ≥ required
 * 3. Day complete ⇔ morning AND evening complete
 * 4. Longest run of calendar-consecutive complete dates
 * 5. isComplete ⇔ run ≥ requiredStudyDays
 *
 * Pure apart from the requirements check. No clock is read: the same
 * measurements always give the same report.
 *
 * OCaml equivalent:
 * module CompletenessAggregator : sig
 *   val build_timeline : raw_measurement list -> patient_timeline
 *   val longest_consecutive_run : string list -> int
 *   val aggregate : raw_measurement list -> slot_requirements -> int -> (completeness_report, configuration_error) result
 * end
 */

import { Effect, Schema as S } from "effect";
import { differenceInCalendarDays, parseISO } from "date-fns";
import { SCORED_SLOTS, type MeasurementKind, type RawMeasurement, type ScoredSlot } from "../schemas/measurement";
import {
  DEFAULT_REQUIRED_STUDY_DAYS,
  RequiredStudyDaysSchema,
  SlotRequirementsSchema,
  defaultSlotRequirements,
  type CompletenessReport,
  type DaySlots,
  type MissingSlot,
  type OverallSummary,
  type PatientTimeline,
  type SlotCounts,
  type SlotRequirements,
} from "../schemas/completeness";
import { ConfigurationError } from "./errors";

// ============================================================================
// TIMELINE
// ============================================================================

interface CountsAccumulator {
  pressureCount: number;
  ecgCount: number;
}

type DayAccumulator = Record<ScoredSlot, CountsAccumulator>;

const emptyDay = (): DayAccumulator => ({
  morning: { pressureCount: 0, ecgCount: 0 },
  evening: { pressureCount: 0, ecgCount: 0 },
});

/**
 * Dates come out in chronological order, each with both slots present.
 * Out-of-slot measurements are not counted.
 */
export const buildTimeline = (measurements: ReadonlyArray<RawMeasurement>): PatientTimeline => {
  const days = new Map<string, DayAccumulator>();

  for (const measurement of measurements) {
    if (measurement.slot === "out_of_slot") continue;

    const day = days.get(measurement.timestamp.date) ?? emptyDay();
    days.set(measurement.timestamp.date, day);

    const counts = day[measurement.slot];
    if (measurement.kind === "pressure") {
      counts.pressureCount += 1;
    } else {
      counts.ecgCount += 1;
    }
  }

  // YYYY-MM-DD sorts chronologically as plain text
  const timeline: Record<string, DaySlots> = {};
  for (const date of [...days.keys()].sort()) {
    const day = days.get(date) ?? emptyDay();
    timeline[date] = {
      morning: { ...day.morning },
      evening: { ...day.evening },
    };
  }
  return timeline;
};

// ============================================================================
// SCORING
// ============================================================================

export const missingKinds = (counts: SlotCounts, requirements: SlotRequirements): MeasurementKind[] => {
  const kinds: MeasurementKind[] = [];
  if (counts.pressureCount < requirements.pressurePerSlot) kinds.push("pressure");
  if (counts.ecgCount < requirements.ecgPerSlot) kinds.push("ecg");
  return kinds;
};

export const isSlotComplete = (counts: SlotCounts, requirements: SlotRequirements): boolean =>
  missingKinds(counts, requirements).length === 0;

export const isDayComplete = (day: DaySlots, requirements: SlotRequirements): boolean =>
  SCORED_SLOTS.every((slot) => isSlotComplete(day[slot], requirements));

export const completeDates = (timeline: PatientTimeline, requirements: SlotRequirements): string[] =>
  Object.keys(timeline)
    .filter((date) => {
      const day = timeline[date];
      return day !== undefined && isDayComplete(day, requirements);
    })
    .sort();

/**
 * Longest run of dates exactly one calendar day apart.
 * Input order and duplicates do not matter.
 */
export const longestConsecutiveRun = (dates: ReadonlyArray<string>): number => {
  const sorted = [...new Set(dates)].sort();

  let longest = 0;
  let current = 0;
  let previous: Date | null = null;

  for (const date of sorted) {
    const day = parseISO(date);
    current = previous !== null && differenceInCalendarDays(day, previous) === 1 ? current + 1 : 1;
    longest = Math.max(longest, current);
    previous = day;
  }

  return longest;
};

const collectMissingSlots = (timeline: PatientTimeline, requirements: SlotRequirements): MissingSlot[] => {
  const missing: MissingSlot[] = [];
  for (const [date, day] of Object.entries(timeline)) {
    for (const slot of SCORED_SLOTS) {
      const kinds = missingKinds(day[slot], requirements);
      if (kinds.length > 0) {
        missing.push({ date, slot, missingKinds: kinds });
      }
    }
  }
  return missing;
};

const countCompleteSlots = (timeline: PatientTimeline, requirements: SlotRequirements): number =>
  Object.values(timeline).reduce(
    (total, day) => total + SCORED_SLOTS.filter((slot) => isSlotComplete(day[slot], requirements)).length,
    0
  );

const toPercentage = (received: number, expected: number): number =>
  expected === 0 ? 0 : Math.min(100, Math.round((received / expected) * 10_000) / 100);

const computeReport = (
  measurements: ReadonlyArray<RawMeasurement>,
  requirements: SlotRequirements,
  requiredStudyDays: number
): CompletenessReport => {
  const dailyData = buildTimeline(measurements);
  const complete = completeDates(dailyData, requirements);
  const consecutiveCompleteDays = longestConsecutiveRun(complete);
  const receivedSlotCompletions = countCompleteSlots(dailyData, requirements);
  const expectedSlotCompletions = SCORED_SLOTS.length * requiredStudyDays;

  return {
    dailyData,
    requirements,
    requiredStudyDays,
    consecutiveCompleteDays,
    isComplete: consecutiveCompleteDays >= requiredStudyDays,
    missingSlots: collectMissingSlots(dailyData, requirements),
    completeDays: complete.length,
    receivedSlotCompletions,
    expectedSlotCompletions,
    completionPercentage: toPercentage(receivedSlotCompletions, expectedSlotCompletions),
  };
};

// ============================================================================
// AGGREGATE (Effect)
// ============================================================================

const AggregationSettingsSchema = S.Struct({
  requirements: SlotRequirementsSchema,
  requiredStudyDays: RequiredStudyDaysSchema,
});

const validateSettings = (
  requirements: SlotRequirements,
  requiredStudyDays: number
): Effect.Effect<S.Schema.Type<typeof AggregationSettingsSchema>, ConfigurationError, never> =>
  S.decodeUnknown(AggregationSettingsSchema)({ requirements, requiredStudyDays }).pipe(
    Effect.mapError(
      (error) =>
        new ConfigurationError({
          message: `Invalid completeness requirements: ${error.message}`,
          context: { requirements, requiredStudyDays },
        })
    )
  );

/**
 * aggregate(measurements, requirements, requiredStudyDays) -> CompletenessReport
 *
 * Fails only when the requirements themselves are malformed.
 */
export const aggregate = (
  measurements: ReadonlyArray<RawMeasurement>,
  requirements: SlotRequirements = defaultSlotRequirements,
  requiredStudyDays: number = DEFAULT_REQUIRED_STUDY_DAYS
): Effect.Effect<CompletenessReport, ConfigurationError, never> =>
  Effect.gen(function* (_) {
    const settings = yield* _(validateSettings(requirements, requiredStudyDays));
    const report = computeReport(measurements, settings.requirements, settings.requiredStudyDays);

    yield* _(
      Effect.logDebug("completeness_aggregated").pipe(
        Effect.annotateLogs({
          measurements: measurements.length,
          dates: Object.keys(report.dailyData).length,
          consecutiveCompleteDays: report.consecutiveCompleteDays,
          isComplete: report.isComplete,
        })
      )
    );

    return report;
  });

/**
 * Synchronous aggregate. Throws on malformed requirements.
 */
export const aggregateSync = (
  measurements: ReadonlyArray<RawMeasurement>,
  requirements: SlotRequirements = defaultSlotRequirements,
  requiredStudyDays: number = DEFAULT_REQUIRED_STUDY_DAYS
): CompletenessReport => Effect.runSync(aggregate(measurements, requirements, requiredStudyDays));

// ============================================================================
// OVERALL SUMMARY (commutative, associative reduction)
// ============================================================================

const emptySummary: OverallSummary = {
  totalPatients: 0,
  patientsComplete: 0,
  patientsIncomplete: 0,
  totalSlotCompletionsExpected: 0,
  totalSlotCompletionsReceived: 0,
};

export const summarizeReport = (report: CompletenessReport): OverallSummary => ({
  totalPatients: 1,
  patientsComplete: report.isComplete ? 1 : 0,
  patientsIncomplete: report.isComplete ? 0 : 1,
  totalSlotCompletionsExpected: report.expectedSlotCompletions,
  totalSlotCompletionsReceived: report.receivedSlotCompletions,
});

export const mergeSummaries = (a: OverallSummary, b: OverallSummary): OverallSummary => ({
  totalPatients: a.totalPatients + b.totalPatients,
  patientsComplete: a.patientsComplete + b.patientsComplete,
  patientsIncomplete: a.patientsIncomplete + b.patientsIncomplete,
  totalSlotCompletionsExpected: a.totalSlotCompletionsExpected + b.totalSlotCompletionsExpected,
  totalSlotCompletionsReceived: a.totalSlotCompletionsReceived + b.totalSlotCompletionsReceived,
});

export const summarize = (reports: Iterable<CompletenessReport>): OverallSummary => {
  let summary = emptySummary;
  for (const report of reports) {
    summary = mergeSummaries(summary, summarizeReport(report));
  }
  return summary;
};
