/**
 * DATE TEXT PARSER
 *
 * One place for every textual date layout the extractor accepts.
 * Each table is an ordered list tried in priority order; the first entry
 * that yields a valid calendar date wins.
 *
 * Tables:
 * - TABULAR_LAYOUTS: date-fns-style formats for pressure export cells,
 *   compiled to whole-cell patterns and read field by field (no host zone)
 * - DOCUMENT_DATE_PATTERNS: localized phrases in ECG report text
 *   ("Thursday, 22 May 2025, 8:15:26", "jueves, 22 de may de 2025, 2:05:59 p. m.")
 * - FILENAME_DATE_PATTERNS: device file names (24-hour clock)
 */

import { isExists } from "date-fns";
import type { MeasurementTimestamp, Meridiem } from "../schemas/measurement";
import { fromParts } from "./timestamps";

// ============================================================================
// TABULAR CELLS
// ============================================================================

/**
 * Each layout must match the whole cell, so "2025/01/05 08:00:30" falls
 * through the minute-only layouts. Day-first is tried before month-first.
 */
export const TABULAR_LAYOUTS: ReadonlyArray<string> = [
  "yyyy/MM/dd HH:mm",
  "yyyy-MM-dd HH:mm:ss",
  "dd/MM/yyyy HH:mm",
  "MM/dd/yyyy HH:mm",
  "yyyy/MM/dd HH:mm:ss",
  "dd-MM-yyyy HH:mm",
  "yyyyMMdd HHmmss",
  "yyyy-MM-dd HH:mm",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm",
  "dd/MM/yyyy HH:mm:ss",
  "MM/dd/yyyy HH:mm:ss",
  "dd-MM-yyyy HH:mm:ss",
  "yyyy-MM-dd h:mm a",
  "yyyy-MM-dd h:mm:ss a",
  "dd/MM/yyyy h:mm a",
  "dd/MM/yyyy h:mm:ss a",
  "MM/dd/yyyy h:mm a",
  "MM/dd/yyyy h:mm:ss a",
];

const TIME_ONLY = /^\d{1,2}:\d{2}(?::\d{2})?(?:\s*[ap]\.?\s?m\.?)?$/i;

// Full ISO-8601. A fraction or offset is dropped: the written wall-clock time is kept.
const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:[.,]\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const LAYOUT_TOKENS: ReadonlyArray<readonly [token: string, source: string]> = [
  ["yyyy", String.raw`(?<year>\d{4})`],
  ["MM", String.raw`(?<month>\d{1,2})`],
  ["dd", String.raw`(?<day>\d{1,2})`],
  ["HH", String.raw`(?<hour>\d{1,2})`],
  ["h", String.raw`(?<hour>\d{1,2})`],
  ["mm", String.raw`(?<minute>\d{1,2})`],
  ["ss", String.raw`(?<second>\d{1,2})`],
  ["a", String.raw`(?<meridiem>[ap])\.?\s?m\.?`],
];

const escapeRegExp = (text: string): string => text.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");

interface CompiledLayout {
  readonly layout: string;
  readonly pattern: RegExp;
}

const compileLayout = (layout: string): CompiledLayout => {
  let source = "";
  let rest = layout;
  while (rest.length > 0) {
    const quoteEnd = rest.startsWith("'") ? rest.indexOf("'", 1) : -1;
    if (quoteEnd > 0) {
      source += escapeRegExp(rest.slice(1, quoteEnd));
      rest = rest.slice(quoteEnd + 1);
      continue;
    }
    const token = LAYOUT_TOKENS.find(([name]) => rest.startsWith(name));
    if (token !== undefined) {
      source += token[1];
      rest = rest.slice(token[0].length);
    } else {
      source += escapeRegExp(rest.charAt(0));
      rest = rest.slice(1);
    }
  }
  return { layout, pattern: new RegExp(`^${source}$`, "i") };
};

const COMPILED_LAYOUTS: ReadonlyArray<CompiledLayout> = TABULAR_LAYOUTS.map(compileLayout);

const readLayoutFields = (fields: Readonly<Record<string, string | undefined>>): MeasurementTimestamp | null => {
  const hour = toInt(fields.hour);
  const meridiem = toMeridiem(fields.meridiem);
  if (meridiem !== undefined && (hour < 1 || hour > 12)) return null;
  const hour24 = meridiem === undefined ? hour : (hour % 12) + (meridiem === "PM" ? 12 : 0);
  return fromParts(
    toInt(fields.year),
    toInt(fields.month),
    toInt(fields.day),
    hour24,
    toInt(fields.minute),
    toInt(fields.second)
  );
};

export type TabularDateResult =
  | { readonly _tag: "Parsed"; readonly timestamp: MeasurementTimestamp; readonly layout: string }
  | { readonly _tag: "TimeOnly" }
  | { readonly _tag: "Unrecognized" };

export const parseTabularDate = (raw: string): TabularDateResult => {
  const text = raw.trim().replace(/\s+/g, " ");
  if (text.length === 0) return { _tag: "Unrecognized" };

  // A clock reading without a date is never completed with "today"
  if (TIME_ONLY.test(text)) return { _tag: "TimeOnly" };

  for (const { layout, pattern } of COMPILED_LAYOUTS) {
    const fields = pattern.exec(text)?.groups;
    const timestamp = fields === undefined ? null : readLayoutFields(fields);
    if (timestamp !== null) {
      return { _tag: "Parsed", timestamp, layout };
    }
  }

  const iso = ISO_DATE_TIME.exec(text);
  if (iso !== null) {
    const timestamp = fromParts(toInt(iso[1]), toInt(iso[2]), toInt(iso[3]), toInt(iso[4]), toInt(iso[5]), toInt(iso[6]));
    if (timestamp !== null) {
      return { _tag: "Parsed", timestamp, layout: "iso-8601" };
    }
  }

  return { _tag: "Unrecognized" };
};

// ============================================================================
// MONTH NAMES
// ============================================================================

const MONTH_NAMES: ReadonlyArray<readonly [string, number]> = [
  ["january", 1], ["enero", 1],
  ["february", 2], ["febrero", 2],
  ["march", 3], ["marzo", 3],
  ["april", 4], ["abril", 4],
  ["may", 5], ["mayo", 5],
  ["june", 6], ["junio", 6],
  ["july", 7], ["julio", 7],
  ["august", 8], ["agosto", 8],
  ["september", 9], ["septiembre", 9], ["setiembre", 9],
  ["october", 10], ["octubre", 10],
  ["november", 11], ["noviembre", 11],
  ["december", 12], ["diciembre", 12],
];

const stripDiacritics = (text: string): string => text.normalize("NFD").replace(/\p{Diacritic}/gu, "");

/**
 * Full or abbreviated English/Spanish month name → 1-12.
 * An abbreviation must be a prefix of a full name ("sept", "dic", "may").
 */
export const monthFromName = (name: string): number | null => {
  const word = stripDiacritics(name.trim().replace(/\.$/, "")).toLowerCase();
  if (word.length < 3) return null;
  const entry = MONTH_NAMES.find(([full]) => full.startsWith(word));
  return entry ? entry[1] : null;
};

// ============================================================================
// DOCUMENT PHRASES
// ============================================================================

export interface DateParts {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly meridiem?: Meridiem;
}

export interface DocumentDatePattern {
  readonly name: string;
  readonly pattern: RegExp;
  readonly read: (match: RegExpMatchArray) => DateParts | null;
}

export interface DocumentDateMatch {
  readonly pattern: string;
  readonly parts: DateParts;
}

// "8:15:26", "8:15", optional "a.m." / "p. m." / "PM"
const TIME = String.raw`(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([ap])\.?\s?m\.?(?!\p{L}))?`;
const WEEKDAY = String.raw`(?:\p{L}+,\s*)?`;

const toInt = (value: string | undefined): number => (value === undefined ? 0 : Number.parseInt(value, 10));

const toMeridiem = (marker: string | undefined): Meridiem | undefined => {
  if (marker === undefined) return undefined;
  return marker.toLowerCase() === "p" ? "PM" : "AM";
};

const readParts = (
  day: string | undefined,
  monthName: string | undefined,
  year: string | undefined,
  time: ReadonlyArray<string | undefined>
): DateParts | null => {
  if (day === undefined || monthName === undefined || year === undefined) return null;
  const month = monthFromName(monthName);
  if (month === null) return null;
  const meridiem = toMeridiem(time[3]);
  const parts = {
    year: toInt(year),
    month,
    day: toInt(day),
    hour: toInt(time[0]),
    minute: toInt(time[1]),
    second: toInt(time[2]),
  };
  return meridiem === undefined ? parts : { ...parts, meridiem };
};

export const DOCUMENT_DATE_PATTERNS: ReadonlyArray<DocumentDatePattern> = [
  {
    // "jueves, 22 de may de 2025, 8:15:26" / "4 de abril de 2025, 6:14:36 p.m."
    name: "day-de-month-de-year",
    pattern: new RegExp(
      String.raw`${WEEKDAY}(\d{1,2})\s+de\s+(\p{L}+)\.?\s+de\s+(\d{4}),?\s+${TIME}`,
      "giu"
    ),
    read: (m) => readParts(m[1], m[2], m[3], [m[4], m[5], m[6], m[7]]),
  },
  {
    // "Thursday, 22 May 2025, 8:15:26"
    name: "day-month-year",
    pattern: new RegExp(String.raw`${WEEKDAY}(\d{1,2})\s+(\p{L}+)\.?,?\s+(\d{4}),?\s+${TIME}`, "giu"),
    read: (m) => readParts(m[1], m[2], m[3], [m[4], m[5], m[6], m[7]]),
  },
  {
    // "Thursday, May 22, 2025, 8:15:26 AM"
    name: "month-day-year",
    pattern: new RegExp(String.raw`${WEEKDAY}(\p{L}+)\.?\s+(\d{1,2}),?\s+(\d{4}),?\s+${TIME}`, "giu"),
    read: (m) => readParts(m[2], m[1], m[3], [m[4], m[5], m[6], m[7]]),
  },
];

const isCalendarValid = (parts: DateParts): boolean =>
  isExists(parts.year, parts.month - 1, parts.day) && parts.hour <= 23 && parts.minute <= 59 && parts.second <= 59;

/**
 * First real date wins: patterns in table order, matches in text order.
 * "31 April" is skipped so a later phrase still gets its turn.
 */
export const findDocumentDate = (
  text: string,
  patterns: ReadonlyArray<DocumentDatePattern> = DOCUMENT_DATE_PATTERNS
): DocumentDateMatch | null => {
  for (const entry of patterns) {
    for (const match of text.matchAll(entry.pattern)) {
      const parts = entry.read(match);
      if (parts !== null && isCalendarValid(parts)) {
        return { pattern: entry.name, parts };
      }
    }
  }
  return null;
};

// ============================================================================
// FILE NAMES
// ============================================================================

const FILENAME_DATE_PATTERNS: ReadonlyArray<RegExp> = [
  /ecg_(\d{4})-(\d{2})-(\d{2})_(\d{2})-(\d{2})-(\d{2})/i,
  /(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})/,
];

/**
 * Device file names use a 24-hour clock; the parts are never ambiguous.
 */
export const findFilenameDate = (filename: string): DateParts | null => {
  for (const pattern of FILENAME_DATE_PATTERNS) {
    const m = filename.match(pattern);
    if (m === null) continue;
    const parts: DateParts = {
      year: toInt(m[1]),
      month: toInt(m[2]),
      day: toInt(m[3]),
      hour: toInt(m[4]),
      minute: toInt(m[5]),
      second: toInt(m[6]),
    };
    if (isCalendarValid(parts)) return parts;
  }
  return null;
};
