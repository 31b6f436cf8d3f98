/**
 * TIMESTAMP AMBIGUITY RESOLVER - EFFECT-TS VERSION
 *
 * Decides the meridiem of a time read on a 12-hour dial without an a.m./p.m.
 * marker, using precisely timestamped readings from the same patient.
 *
 * Flow:
 * 1. Explicit marker → apply it (12 AM = 00, PM adds 12 unless 12)
 * 2. Candidates: AM = hour % 12, PM = AM + 12
 * 3. Minimum distance (minutes) from each candidate to same-date readings
 * 4. Window depends on pairing: session (tight) or day (loose)
 * 5. Winner must be inside the window and strictly closer than the other
 * 6. Otherwise: 1-11 → AM, 12 → PM (noon)
 *
 * Never fails. Which branch fired is reported through ResolutionTrace and
 * the debug log, not through the returned timestamp.
 *
 * OCaml equivalent:
 * module AmbiguityResolver : sig
 *   val resolve_timestamp : ambiguous_timestamp -> corroboration option -> timestamp
 *   val explain_resolution : ambiguous_timestamp -> corroboration option -> resolution_outcome
 *   val resolve_with_cascade : ambiguous_timestamp -> cascade_sources -> resolution_outcome Effect.t
 * end
 */

import { Effect } from "effect";
import {
  hasExplicitMeridiem,
  type AmbiguousTimestamp,
  type CorroborationPairing,
  type MeasurementTimestamp,
  type Meridiem,
  type ResolutionTrace,
} from "../schemas/measurement";
import { secondsOfDay, toIsoLocal } from "./timestamps";

// ============================================================================
// TYPES
// ============================================================================

export interface Corroboration {
  readonly pairing: CorroborationPairing;
  readonly points: ReadonlyArray<MeasurementTimestamp>;
}

export interface ResolverThresholds {
  readonly tightMinutes: number;
  readonly looseMinutes: number;
}

export const defaultResolverThresholds: ResolverThresholds = {
  tightMinutes: 2,
  looseMinutes: 120,
};

export interface ResolutionOutcome {
  readonly timestamp: MeasurementTimestamp;
  readonly trace: ResolutionTrace;
}

/**
 * Readings available to the cascade: same-session ones first, then any
 * reading of the day.
 */
export interface CascadeSources {
  readonly session?: ReadonlyArray<MeasurementTimestamp>;
  readonly day?: ReadonlyArray<MeasurementTimestamp>;
}

// ============================================================================
// HOUR ARITHMETIC
// ============================================================================

const applyMeridiem = (hour12: number, meridiem: Meridiem): number => {
  if (meridiem === "AM") return hour12 === 12 ? 0 : hour12;
  return hour12 === 12 ? 12 : hour12 + 12;
};

// Most captures happen in the morning; a bare 12 is read as noon.
const heuristicMeridiem = (hour12: number): Meridiem => (hour12 === 12 ? "PM" : "AM");

const atHour = (ambiguous: AmbiguousTimestamp, hour: number): MeasurementTimestamp => ({
  date: ambiguous.date,
  hour,
  minute: ambiguous.minute,
  second: ambiguous.second,
});

const minutesBetween = (
  a: { hour: number; minute: number; second: number },
  b: { hour: number; minute: number; second: number }
): number => Math.abs(secondsOfDay(a) - secondsOfDay(b)) / 60;

// ============================================================================
// RESOLUTION (pure)
// ============================================================================

const thresholdFor = (pairing: CorroborationPairing, thresholds: ResolverThresholds): number =>
  pairing === "session" ? thresholds.tightMinutes : thresholds.looseMinutes;

const heuristicOutcome = (
  ambiguous: AmbiguousTimestamp,
  details: Partial<Pick<ResolutionTrace, "pairing" | "thresholdMinutes" | "minDiffAm" | "minDiffPm">>,
  corroboratingPoints: number
): ResolutionOutcome => {
  const hour = applyMeridiem(ambiguous.hour12, heuristicMeridiem(ambiguous.hour12));
  return {
    timestamp: atHour(ambiguous, hour),
    trace: {
      branch: "heuristic",
      original: ambiguous,
      resolvedHour: hour,
      corroboratingPoints,
      ...details,
    },
  };
};

/**
 * Resolve and report which branch decided.
 */
export const explainResolution = (
  ambiguous: AmbiguousTimestamp,
  corroboration?: Corroboration,
  thresholds: ResolverThresholds = defaultResolverThresholds
): ResolutionOutcome => {
  if (hasExplicitMeridiem(ambiguous)) {
    const hour = applyMeridiem(ambiguous.hour12, ambiguous.meridiem);
    return {
      timestamp: atHour(ambiguous, hour),
      trace: { branch: "explicit", original: ambiguous, resolvedHour: hour, corroboratingPoints: 0 },
    };
  }

  const sameDay = (corroboration?.points ?? []).filter((p) => p.date === ambiguous.date);
  if (corroboration === undefined || sameDay.length === 0) {
    return heuristicOutcome(ambiguous, {}, 0);
  }

  const am = ambiguous.hour12 % 12;
  const pm = am + 12;
  const amCandidate = atHour(ambiguous, am);
  const pmCandidate = atHour(ambiguous, pm);

  let minDiffAm = Number.POSITIVE_INFINITY;
  let minDiffPm = Number.POSITIVE_INFINITY;
  for (const point of sameDay) {
    minDiffAm = Math.min(minDiffAm, minutesBetween(point, amCandidate));
    minDiffPm = Math.min(minDiffPm, minutesBetween(point, pmCandidate));
  }

  const thresholdMinutes = thresholdFor(corroboration.pairing, thresholds);
  const details = { pairing: corroboration.pairing, thresholdMinutes, minDiffAm, minDiffPm };

  const winner =
    minDiffAm <= thresholdMinutes && minDiffAm < minDiffPm
      ? am
      : minDiffPm <= thresholdMinutes && minDiffPm < minDiffAm
        ? pm
        : null;

  if (winner === null) {
    return heuristicOutcome(ambiguous, details, sameDay.length);
  }

  return {
    timestamp: atHour(ambiguous, winner),
    trace: {
      branch: "corroborated",
      original: ambiguous,
      resolvedHour: winner,
      corroboratingPoints: sameDay.length,
      ...details,
    },
  };
};

/**
 * resolve(ambiguous, corroboration) -> timestamp
 *
 * Deterministic: identical inputs always give the identical timestamp.
 */
export const resolveTimestamp = (
  ambiguous: AmbiguousTimestamp,
  corroboration?: Corroboration,
  thresholds: ResolverThresholds = defaultResolverThresholds
): MeasurementTimestamp => explainResolution(ambiguous, corroboration, thresholds).timestamp;

/**
 * Session pairing first, then day pairing, then the heuristic.
 * The trace of the last attempt is kept when nothing corroborates.
 */
export const explainCascade = (
  ambiguous: AmbiguousTimestamp,
  sources: CascadeSources,
  thresholds: ResolverThresholds = defaultResolverThresholds
): ResolutionOutcome => {
  const attempts: Corroboration[] = [];
  if (sources.session && sources.session.length > 0) {
    attempts.push({ pairing: "session", points: sources.session });
  }
  if (sources.day && sources.day.length > 0) {
    attempts.push({ pairing: "day", points: sources.day });
  }

  let last = explainResolution(ambiguous, undefined, thresholds);
  for (const corroboration of attempts) {
    const outcome = explainResolution(ambiguous, corroboration, thresholds);
    if (outcome.trace.branch !== "heuristic") return outcome;
    if (outcome.trace.corroboratingPoints > 0) last = outcome;
  }
  return last;
};

// ============================================================================
// RESOLUTION (Effect, with trace side channel)
// ============================================================================

const logTrace = (outcome: ResolutionOutcome): Effect.Effect<void> =>
  Effect.logDebug("timestamp_resolved").pipe(
    Effect.annotateLogs({
      branch: outcome.trace.branch,
      resolved: toIsoLocal(outcome.timestamp),
      pairing: outcome.trace.pairing ?? "none",
      minDiffAm: outcome.trace.minDiffAm ?? null,
      minDiffPm: outcome.trace.minDiffPm ?? null,
      corroboratingPoints: outcome.trace.corroboratingPoints,
    })
  );

export const resolveTimestampTraced = (
  ambiguous: AmbiguousTimestamp,
  corroboration?: Corroboration,
  thresholds: ResolverThresholds = defaultResolverThresholds
): Effect.Effect<ResolutionOutcome, never, never> => {
  const outcome = explainResolution(ambiguous, corroboration, thresholds);
  return Effect.as(logTrace(outcome), outcome);
};

export const resolveWithCascade = (
  ambiguous: AmbiguousTimestamp,
  sources: CascadeSources,
  thresholds: ResolverThresholds = defaultResolverThresholds
): Effect.Effect<ResolutionOutcome, never, never> => {
  return Effect.suspend(() => {
    const outcome = explainCascade(ambiguous, sources, thresholds);
    return Effect.as(logTrace(outcome), outcome);
  });
};
