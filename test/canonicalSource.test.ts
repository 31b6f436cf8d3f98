import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import {
  isEcgCandidate,
  isPressureCandidate,
  rankSources,
  rankSourcesLogged,
  selectCanonical,
} from "../services/canonicalSource";
import { fileDescriptor } from "../services/testConstants";

describe("selectCanonical", () => {
  it("returns null for an empty file set", () => {
    expect(selectCanonical([])).toBeNull();
  });

  it("always selects a single file, even an empty one", () => {
    const only = fileDescriptor("pressure.csv", 0, 1_000);
    expect(selectCanonical([only])).toBe(only);
  });

  it("prefers the larger export", () => {
    const small = fileDescriptor("a.csv", 100, 9_000);
    const large = fileDescriptor("b.csv", 500, 1_000);
    expect(selectCanonical([small, large])).toBe(large);
  });

  it("breaks a size tie by the most recent modification", () => {
    const older = fileDescriptor("older.csv", 300, 1_000);
    const newer = fileDescriptor("newer.csv", 300, 2_000);
    expect(selectCanonical([older, newer])).toBe(newer);
    expect(selectCanonical([newer, older])).toBe(newer);
  });
});

describe("rankSources", () => {
  it("lists every non-selected file as ignored, best first", () => {
    const a = fileDescriptor("a.csv", 100, 1_000);
    const b = fileDescriptor("b.csv", 300, 1_000);
    const c = fileDescriptor("c.csv", 200, 1_000);
    expect(rankSources([a, b, c])).toEqual({ selected: b, ignored: [c, a] });
  });

  it("does not reorder the caller's array", () => {
    const files = [fileDescriptor("a.csv", 1, 1), fileDescriptor("b.csv", 2, 1)];
    rankSources(files);
    expect(files.map((f) => f.name)).toEqual(["a.csv", "b.csv"]);
  });

  it("logs and returns the same ranking", () => {
    const files = [fileDescriptor("a.csv", 1, 1), fileDescriptor("b.csv", 2, 1)];
    expect(Effect.runSync(rankSourcesLogged(files))).toEqual(rankSources(files));
  });
});

describe("file classification", () => {
  it("treats csv exports and pressure-named files as pressure candidates", () => {
    expect(isPressureCandidate(fileDescriptor("export.CSV", 10, 1))).toBe(true);
    expect(isPressureCandidate(fileDescriptor("blood_pressure.txt", 10, 1))).toBe(true);
    expect(isPressureCandidate(fileDescriptor("export.csv", 0, 1))).toBe(false);
  });

  it("treats pdf/txt reports and ecg-named files as ECG candidates", () => {
    expect(isEcgCandidate(fileDescriptor("report.pdf", 10, 1))).toBe(true);
    expect(isEcgCandidate(fileDescriptor("ecg_2025-05-22_08-00-00.dat", 10, 1))).toBe(true);
    expect(isEcgCandidate(fileDescriptor("notes.txt", 0, 1))).toBe(false);
  });

  it("never classifies a pressure export as an ECG", () => {
    expect(isEcgCandidate(fileDescriptor("pressure_log.txt", 10, 1))).toBe(false);
  });
});
