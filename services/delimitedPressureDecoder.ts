/**
 * DELIMITED PRESSURE DECODER
 *
 * Reads blood-pressure exports written as comma, semicolon or tab
 * separated text with a header row. Columns are found by header keywords
 * (English or Spanish), so column order and extra columns do not matter.
 */

import { Effect, Layer } from "effect";
import { readFile } from "node:fs/promises";
import type { FileDescriptor, PressureRow } from "../schemas/measurement";
import { PressureRowDecoder } from "./collaborators";
import { FileDecodeError } from "./errors";

// ============================================================================
// LINE SPLITTING
// ============================================================================

const DELIMITERS = [",", ";", "\t"] as const;
type Delimiter = (typeof DELIMITERS)[number];

export const detectDelimiter = (headerLine: string): Delimiter => {
  let best: Delimiter = ",";
  let bestCount = 0;
  for (const delimiter of DELIMITERS) {
    const count = headerLine.split(delimiter).length - 1;
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }
  return best;
};

/**
 * Split one line, honouring double-quoted fields ("" is an escaped quote).
 */
export const splitDelimitedLine = (line: string, delimiter: Delimiter): string[] => {
  const cells: string[] = [];
  let cell = "";
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        cell += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === delimiter) {
      cells.push(cell.trim());
      cell = "";
    } else {
      cell += char;
    }
  }
  cells.push(cell.trim());
  return cells;
};

// ============================================================================
// HEADER DETECTION
// ============================================================================

type Column = "systolic" | "diastolic" | "pulse" | "date" | "time";

// Tried in this order; a header cell is claimed by the first column it fits
const COLUMN_PATTERNS: ReadonlyArray<readonly [Column, RegExp]> = [
  ["systolic", /systolic|sistolic|^sys\b/],
  ["diastolic", /diastolic|^dia\b/],
  ["pulse", /pulse|pulso|heart.?rate|frecuencia|^bpm\b/],
  ["date", /date|fecha|timestamp|medicion/],
  ["time", /^(time|hora|hour)\b/],
];

const normalizeHeader = (cell: string): string =>
  cell.normalize("NFD").replace(/\p{Diacritic}/gu, "").trim().toLowerCase();

export type ColumnMap = Partial<Record<Column, number>>;

export const detectColumns = (headerCells: ReadonlyArray<string>): ColumnMap => {
  const normalized = headerCells.map(normalizeHeader);
  const claimed = new Set<number>();
  const columns: ColumnMap = {};

  for (const [column, pattern] of COLUMN_PATTERNS) {
    const index = normalized.findIndex((cell, i) => !claimed.has(i) && pattern.test(cell));
    if (index >= 0) {
      columns[column] = index;
      claimed.add(index);
    }
  }
  return columns;
};

// ============================================================================
// ROWS
// ============================================================================

/** "120 mmHg" → 120, "" → undefined */
export const firstInteger = (cell: string | undefined): number | undefined => {
  const match = cell?.match(/-?\d+/);
  return match ? Number.parseInt(match[0], 10) : undefined;
};

const cellAt = (cells: ReadonlyArray<string>, index: number | undefined): string | undefined =>
  index === undefined ? undefined : cells[index];

const joinDateText = (date: string | undefined, time: string | undefined): string | undefined => {
  const parts = [date, time].filter((part): part is string => part !== undefined && part !== "");
  return parts.length === 0 ? undefined : parts.join(" ");
};

/**
 * Decode a whole export. Fails only when the header names no systolic or
 * no diastolic column; bad data lines are left for the extractor to judge.
 */
export const decodeDelimitedPressureText = (
  text: string,
  fileName: string
): Effect.Effect<PressureRow[], FileDecodeError, never> => {
  const lines = text
    .replace(/^\uFEFF/, "")
    .split(/\r?\n/)
    .filter((line) => line.trim() !== "");

  const [header, ...dataLines] = lines;
  if (header === undefined) {
    return Effect.fail(
      new FileDecodeError({
        file: fileName,
        reason: "File is empty",
        suggestion: "Export the pressure readings again with a header row.",
      })
    );
  }

  const delimiter = detectDelimiter(header);
  const columns = detectColumns(splitDelimitedLine(header, delimiter));
  if (columns.systolic === undefined || columns.diastolic === undefined) {
    return Effect.fail(
      new FileDecodeError({
        file: fileName,
        reason: "Header has no systolic or no diastolic column",
        suggestion: "Name the columns, e.g. 'Systolic' and 'Diastolic' (or 'Sistólica' and 'Diastólica').",
      })
    );
  }

  const rows = dataLines.map((line): PressureRow => {
    const cells = splitDelimitedLine(line, delimiter);
    return {
      systolic: firstInteger(cellAt(cells, columns.systolic)),
      diastolic: firstInteger(cellAt(cells, columns.diastolic)),
      pulse: firstInteger(cellAt(cells, columns.pulse)),
      rawDateText: joinDateText(cellAt(cells, columns.date), cellAt(cells, columns.time)),
    };
  });

  return Effect.succeed(rows);
};

// ============================================================================
// LAYER
// ============================================================================

export const describeFsError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const readTextFile = (file: FileDescriptor): Effect.Effect<string, FileDecodeError, never> =>
  Effect.tryPromise({
    try: () => readFile(file.id, "utf8"),
    catch: (error) =>
      new FileDecodeError({
        file: file.name,
        reason: describeFsError(error),
        suggestion: "Check that the file exists and is readable.",
      }),
  });

export const DelimitedPressureDecoderLive = Layer.succeed(PressureRowDecoder, {
  decodeRows: (file: FileDescriptor) =>
    Effect.flatMap(readTextFile(file), (text) => decodeDelimitedPressureText(text, file.name)),
});
