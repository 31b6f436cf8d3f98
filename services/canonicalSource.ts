/**
 * CANONICAL SOURCE SELECTOR
 *
 * Picks exactly one pressure export per patient. Larger exports are
 * assumed more complete; the more recent modification breaks ties.
 * Competing exports are ignored, never merged: partially overlapping
 * exports would otherwise count the same reading twice.
 */

import { Effect } from "effect";
import type { FileDescriptor } from "../schemas/measurement";

export interface SourceRanking {
  readonly selected: FileDescriptor | null;
  readonly ignored: ReadonlyArray<FileDescriptor>;
}

const bySizeThenRecency = (a: FileDescriptor, b: FileDescriptor): number =>
  b.size - a.size || b.modifiedTime - a.modifiedTime;

export const rankSources = (files: ReadonlyArray<FileDescriptor>): SourceRanking => {
  if (files.length === 0) return { selected: null, ignored: [] };

  // A single candidate is taken as-is, whatever its size
  if (files.length === 1) return { selected: files[0], ignored: [] };

  const [selected, ...ignored] = [...files].sort(bySizeThenRecency);
  return { selected, ignored };
};

export const selectCanonical = (files: ReadonlyArray<FileDescriptor>): FileDescriptor | null =>
  rankSources(files).selected;

/**
 * rankSources with the selection and every ignored file logged.
 */
export const rankSourcesLogged = (
  files: ReadonlyArray<FileDescriptor>
): Effect.Effect<SourceRanking, never, never> =>
  Effect.gen(function* (_) {
    const ranking = rankSources(files);
    if (ranking.selected === null) {
      yield* _(Effect.logDebug("no_pressure_source"));
      return ranking;
    }

    yield* _(
      Effect.logInfo("pressure_source_selected").pipe(
        Effect.annotateLogs({
          file: ranking.selected.name,
          size: ranking.selected.size,
          modifiedTime: new Date(ranking.selected.modifiedTime).toISOString(),
          candidates: files.length,
        })
      )
    );
    for (const ignored of ranking.ignored) {
      yield* _(
        Effect.logInfo("pressure_source_ignored").pipe(
          Effect.annotateLogs({ file: ignored.name, size: ignored.size })
        )
      );
    }
    return ranking;
  });

// ============================================================================
// FILE CLASSIFICATION
// ============================================================================

const extensionOf = (name: string): string => {
  const dot = name.lastIndexOf(".");
  return dot < 0 ? "" : name.slice(dot + 1).toLowerCase();
};

/** Tabular pressure export: `.csv` or "pressure" in the name, non-empty */
export const isPressureCandidate = (file: FileDescriptor): boolean =>
  file.size > 0 && (extensionOf(file.name) === "csv" || file.name.toLowerCase().includes("pressure"));

/** ECG report: `.pdf` / `.txt` or "ecg" in the name, non-empty */
export const isEcgCandidate = (file: FileDescriptor): boolean => {
  if (file.size <= 0 || isPressureCandidate(file)) return false;
  const ext = extensionOf(file.name);
  return ext === "pdf" || ext === "txt" || file.name.toLowerCase().includes("ecg");
};
