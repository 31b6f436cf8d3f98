/**
 * Wall-clock timestamp helpers.
 *
 * MeasurementTimestamp carries no zone. Text is turned into one from its
 * written fields; only the run clock goes through a local Date.
 */

import { format, isExists } from "date-fns";
import type { MeasurementTimestamp } from "../schemas/measurement";

export const fromLocalDate = (date: Date): MeasurementTimestamp => ({
  date: format(date, "yyyy-MM-dd"),
  hour: date.getHours(),
  minute: date.getMinutes(),
  second: date.getSeconds(),
});

/**
 * Build a timestamp from calendar parts, rejecting impossible dates
 * such as 31 April. `month` is 1-based.
 */
export const fromParts = (
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number
): MeasurementTimestamp | null => {
  if (!isExists(year, month - 1, day)) return null;
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59 || second < 0 || second > 59) {
    return null;
  }
  return {
    date: calendarDate(year, month, day),
    hour,
    minute,
    second,
  };
};

export const calendarDate = (year: number, month: number, day: number): string =>
  `${String(year).padStart(4, "0")}-${pad2(month)}-${pad2(day)}`;

const pad2 = (n: number): string => String(n).padStart(2, "0");

export const secondsOfDay = (ts: { hour: number; minute: number; second: number }): number =>
  ts.hour * 3600 + ts.minute * 60 + ts.second;

/** `YYYY-MM-DDTHH:mm:ss` */
export const toIsoLocal = (ts: MeasurementTimestamp): string =>
  `${ts.date}T${pad2(ts.hour)}:${pad2(ts.minute)}:${pad2(ts.second)}`;
