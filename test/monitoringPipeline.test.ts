/**
 * MONITORING PIPELINE - INTEGRATION TESTS
 *
 * Every collaborator is an in-memory stand-in provided with Layer.succeed;
 * nothing touches the disk or the network.
 */

import { describe, it, expect, beforeAll } from "vitest";
import { Effect, Either, Layer } from "effect";
import type { FileDescriptor, PressureRow } from "../schemas/measurement";
import type { MonitoringReport } from "../schemas/completeness";
import { defaultMonitoringConfig, type MonitoringConfig } from "../schemas/monitoringConfig";
import {
  DocumentTextDecoder,
  MeasurementSource,
  PressureRowDecoder,
  ReportStore,
} from "../services/collaborators";
import { FileDecodeError, ReportWriteError, SourceError } from "../services/errors";
import {
  buildExtractionIndex,
  buildMonitoringReport,
  extractPatient,
  reportFileName,
  runMonitoringCheck,
  type ExtractionIndex,
} from "../services/monitoringPipeline.effect";
import { TEST_PATIENTS, at, fileDescriptor } from "../services/testConstants";

// ============================================================================
// STAND-INS
// ============================================================================

const { PRIMARY, SECONDARY, EMPTY } = TEST_PATIENTS;

const FILES: Record<string, ReadonlyArray<FileDescriptor>> = {
  [PRIMARY]: [
    fileDescriptor("pressure_a.csv", 300, 1_000, "s1"),
    fileDescriptor("pressure_b.csv", 100, 2_000),
    fileDescriptor("ecg_morning.txt", 50, 1_000, "s1"),
    fileDescriptor("ecg_evening.txt", 50, 1_000),
    fileDescriptor("ecg_broken.txt", 50, 1_000),
  ],
  [SECONDARY]: [],
};

const ROWS: Record<string, ReadonlyArray<PressureRow>> = {
  "pressure_a.csv": [
    { systolic: 120, diastolic: 80, pulse: 70, rawDateText: "2025-05-22 08:01:00" },
    { systolic: 118, diastolic: 79, pulse: 72, rawDateText: "2025-05-22 20:30:00" },
    { systolic: 260, diastolic: 90, pulse: 75, rawDateText: "2025-05-22 20:35:00" },
  ],
};

const TEXTS: Record<string, string> = {
  "ecg_morning.txt": "Thursday, 22 May 2025, 8:02:00\nECG rhythm: sinus",
  "ecg_evening.txt": "22 May 2025, 20:40:00 ECG",
};

const decodeFailure = (file: FileDescriptor) =>
  new FileDecodeError({ file: file.name, reason: "unreadable", suggestion: "Re-export the file." });

const SourceStandIn = (unavailable: ReadonlyArray<string> = [EMPTY]) =>
  Layer.succeed(MeasurementSource, {
    listPatients: () => Effect.succeed([...Object.keys(FILES), ...unavailable]),
    listFiles: (patientId: string) =>
      unavailable.includes(patientId)
        ? Effect.fail(new SourceError({ location: `mem://${patientId}`, reason: "offline" }))
        : Effect.succeed({ files: FILES[patientId] ?? [], unreadable: [] }),
  });

const RowsStandIn = Layer.succeed(PressureRowDecoder, {
  decodeRows: (file: FileDescriptor) => {
    const rows = ROWS[file.name];
    return rows === undefined ? Effect.fail(decodeFailure(file)) : Effect.succeed(rows);
  },
});

const DocumentsStandIn = Layer.succeed(DocumentTextDecoder, {
  extractText: (file: FileDescriptor) => {
    const text = TEXTS[file.name];
    return text === undefined
      ? Effect.fail(decodeFailure(file))
      : Effect.succeed({ extractedText: text, sourceFile: file.name });
  },
});

const memoryStore = () => {
  const saved: Array<{ name: string; report: MonitoringReport }> = [];
  const layer = Layer.succeed(ReportStore, {
    save: (name: string, report: MonitoringReport) =>
      Effect.sync(() => {
        saved.push({ name, report });
        return `mem://reports/${name}`;
      }),
  });
  return { saved, layer };
};

const ExtractionStandIns = Layer.mergeAll(SourceStandIn(), RowsStandIn, DocumentsStandIn);

const config: MonitoringConfig = {
  ...defaultMonitoringConfig,
  requirements: { pressurePerSlot: 1, ecgPerSlot: 1 },
  requiredStudyDays: 1,
  concurrency: 2,
};

// ============================================================================
// TESTS
// ============================================================================

describe("extractPatient", () => {
  const extraction = Effect.runSync(extractPatient(PRIMARY, config).pipe(Effect.provide(ExtractionStandIns)));

  it("uses the larger export and ignores the other", () => {
    expect(extraction.canonicalSource?.name).toBe("pressure_a.csv");
    expect(extraction.ignoredSources.map((f) => f.name)).toEqual(["pressure_b.csv"]);
  });

  it("extracts pressure rows and every readable ECG", () => {
    expect(extraction.measurements.filter((m) => m.kind === "pressure")).toHaveLength(3);
    expect(extraction.measurements.filter((m) => m.kind === "ecg").map((m) => m.timestamp)).toEqual([
      at("2025-05-22", 8, 2),
      at("2025-05-22", 20, 40),
    ]);
  });

  it("pairs an ECG with the export from its own session", () => {
    const morning = extraction.measurements.find((m) => m.sourceFile === "ecg_morning.txt");
    expect(morning?.kind === "ecg" && morning.payload.resolution).toMatchObject({
      branch: "corroborated",
      pairing: "session",
    });
  });

  it("turns file-level problems into issues", () => {
    expect(extraction.issues.map((i) => [i.severity, i.code, i.file])).toEqual([
      ["info", "IGNORED_SOURCE", "pressure_b.csv"],
      ["warning", "OUT_OF_RANGE", "pressure_a.csv"],
      ["error", "FILE_DECODE_FAILED", "ecg_broken.txt"],
    ]);
  });

  it("reports a patient without pressure exports", () => {
    const empty = Effect.runSync(extractPatient(SECONDARY, config).pipe(Effect.provide(ExtractionStandIns)));
    expect(empty.canonicalSource).toBeNull();
    expect(empty.measurements).toEqual([]);
    expect(empty.issues.map((i) => i.code)).toEqual(["NO_PRESSURE_SOURCE"]);
  });

  it("reports an unreadable entry and still processes the other files", () => {
    const partialSource = Layer.succeed(MeasurementSource, {
      listPatients: () => Effect.succeed([PRIMARY]),
      listFiles: () =>
        Effect.succeed({
          files: FILES[PRIMARY] ?? [],
          unreadable: [new SourceError({ location: "mem://PRIMARY/s2", reason: "EACCES" })],
        }),
    });
    const partial = Effect.runSync(
      extractPatient(PRIMARY, config).pipe(Effect.provide(Layer.mergeAll(partialSource, RowsStandIn, DocumentsStandIn)))
    );

    expect(partial.issues.map((i) => [i.code, i.file])).toEqual([
      ["SOURCE_UNAVAILABLE", "mem://PRIMARY/s2"],
      ["IGNORED_SOURCE", "pressure_b.csv"],
      ["OUT_OF_RANGE", "pressure_a.csv"],
      ["FILE_DECODE_FAILED", "ecg_broken.txt"],
    ]);
    expect(partial.issues[0]?.message).toBe("Measurement source unavailable at mem://PRIMARY/s2: EACCES");
    expect(partial.measurements).toHaveLength(5);
  });

  it("reports an unreachable patient folder without failing", () => {
    const offline = Effect.runSync(extractPatient(EMPTY, config).pipe(Effect.provide(ExtractionStandIns)));
    expect(offline.issues).toEqual([
      {
        severity: "error",
        code: "SOURCE_UNAVAILABLE",
        message: `Measurement source unavailable at mem://${EMPTY}: offline`,
        file: `mem://${EMPTY}`,
      },
    ]);
  });
});

describe("buildMonitoringReport", () => {
  let index: ExtractionIndex;
  let report: MonitoringReport;

  beforeAll(async () => {
    index = await Effect.runPromise(
      buildExtractionIndex([EMPTY, SECONDARY, PRIMARY], config).pipe(Effect.provide(ExtractionStandIns))
    );
    report = Effect.runSync(buildMonitoringReport(index, config, "2025-05-23T10:00:00.000Z"));
  });

  it("indexes every patient once", () => {
    expect([...index.keys()].sort()).toEqual([PRIMARY, SECONDARY, EMPTY]);
  });

  it("lists patients in identifier order", () => {
    expect(Object.keys(report.patients)).toEqual([PRIMARY, SECONDARY, EMPTY]);
  });

  it("scores each patient", () => {
    const primary = report.patients[PRIMARY];
    expect(primary?.completeness.isComplete).toBe(true);
    expect(primary?.completeness.consecutiveCompleteDays).toBe(1);
    expect(primary?.measurementCounts).toEqual({ pressure: 3, ecg: 2 });
    expect(report.patients[SECONDARY]?.completeness.isComplete).toBe(false);
  });

  it("reduces the overall summary", () => {
    expect(report.overallSummary).toEqual({
      totalPatients: 3,
      patientsComplete: 1,
      patientsIncomplete: 2,
      totalSlotCompletionsExpected: 6,
      totalSlotCompletionsReceived: 2,
    });
  });

  it("collects every patient's issues with the patient attached", () => {
    expect(report.issues.map((i) => [i.patientId, i.code])).toEqual([
      [PRIMARY, "IGNORED_SOURCE"],
      [PRIMARY, "OUT_OF_RANGE"],
      [PRIMARY, "FILE_DECODE_FAILED"],
      [SECONDARY, "NO_PRESSURE_SOURCE"],
      [EMPTY, "SOURCE_UNAVAILABLE"],
    ]);
  });

  it("fails on malformed requirements", () => {
    const broken = { ...config, requiredStudyDays: 0 };
    const result = Effect.runSync(Effect.either(buildMonitoringReport(index, broken, "now")));
    expect(Either.isLeft(result) && result.left._tag).toBe("ConfigurationError");
  });
});

describe("reportFileName", () => {
  it("stamps the local generation time", () => {
    expect(reportFileName(new Date(2025, 4, 23, 7, 5, 9))).toBe("monitoring_report_20250523_070509.json");
  });
});

describe("runMonitoringCheck", () => {
  it("builds and saves one report per run", async () => {
    const store = memoryStore();
    const run = await Effect.runPromise(
      runMonitoringCheck(config).pipe(Effect.provide(Layer.merge(ExtractionStandIns, store.layer)))
    );

    expect(store.saved).toHaveLength(1);
    expect(store.saved[0]?.name).toMatch(/^monitoring_report_\d{8}_\d{6}\.json$/);
    expect(run.location).toBe(`mem://reports/${store.saved[0]?.name}`);
    expect(run.report.overallSummary.totalPatients).toBe(3);
  });

  it("keeps the report when it cannot be saved", async () => {
    const failingStore = Layer.succeed(ReportStore, {
      save: (name: string) => Effect.fail(new ReportWriteError({ location: name, reason: "read-only" })),
    });
    const run = await Effect.runPromise(
      runMonitoringCheck(config).pipe(Effect.provide(Layer.merge(ExtractionStandIns, failingStore)))
    );

    expect(run.location).toBeNull();
    expect(run.report.overallSummary.patientsComplete).toBe(1);
  });

  it("fails when the patient listing is unavailable", async () => {
    const offlineSource = Layer.succeed(MeasurementSource, {
      listPatients: () => Effect.fail(new SourceError({ location: "mem://", reason: "offline" })),
      listFiles: () => Effect.succeed({ files: [], unreadable: [] }),
    });
    const result = await Effect.runPromise(
      Effect.either(
        runMonitoringCheck(config).pipe(
          Effect.provide(Layer.mergeAll(offlineSource, RowsStandIn, DocumentsStandIn, memoryStore().layer))
        )
      )
    );

    expect(Either.isLeft(result) && result.left._tag).toBe("SourceError");
  });

  it("fails with RunTimeoutError when a collaborator hangs", async () => {
    const hangingSource = Layer.succeed(MeasurementSource, {
      listPatients: () => Effect.never,
      listFiles: () => Effect.never,
    });
    const result = await Effect.runPromise(
      Effect.either(
        runMonitoringCheck({ ...config, runTimeoutMs: 20 }).pipe(
          Effect.provide(Layer.mergeAll(hangingSource, RowsStandIn, DocumentsStandIn, memoryStore().layer))
        )
      )
    );

    expect(Either.isLeft(result) && result.left).toMatchObject({ _tag: "RunTimeoutError", timeoutMs: 20 });
  });
});
