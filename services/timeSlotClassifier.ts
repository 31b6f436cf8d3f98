/**
 * TIME-SLOT CLASSIFIER
 *
 * Morning: 04:00 - 12:59
 * Evening: 13:00 - 03:59 (wraps past midnight)
 *
 * The slot comes from the hour alone. A reading at 00:30 stays on its own
 * calendar date (evening slot) rather than being moved to the previous day.
 *
 * OCaml equivalent:
 * let classify_time_slot ts =
 *   match ts.hour with
 *   | h when 4 <= h && h <= 12 -> Morning
 *   | h when (13 <= h && h <= 23) || (0 <= h && h <= 3) -> Evening
 *   | _ -> OutOfSlot
 */

import type { MeasurementTimestamp, TimeSlot } from "../schemas/measurement";

interface HourRange {
  readonly from: number;
  readonly to: number;
}

const SLOT_WINDOWS: ReadonlyArray<{ slot: TimeSlot; ranges: ReadonlyArray<HourRange> }> = [
  { slot: "morning", ranges: [{ from: 4, to: 12 }] },
  {
    slot: "evening",
    ranges: [
      { from: 13, to: 23 },
      { from: 0, to: 3 },
    ],
  },
];

export const classifyHour = (hour: number): TimeSlot => {
  for (const window of SLOT_WINDOWS) {
    if (window.ranges.some((r) => hour >= r.from && hour <= r.to)) {
      return window.slot;
    }
  }
  return "out_of_slot";
};

export const classifyTimeSlot = (timestamp: Pick<MeasurementTimestamp, "hour">): TimeSlot =>
  classifyHour(timestamp.hour);
