/**
 * FILE-SYSTEM ADAPTERS
 *
 * Layout read by the measurement source:
 *
 *   <dataDir>/<patientId>/<file>
 *   <dataDir>/<patientId>/<sessionId>/<file>
 *
 * Files inside a session folder carry that folder's name as `sessionId`,
 * which lets the resolver pair an ECG with the pressure export captured in
 * the same session. Hidden entries are skipped; symbolic links are followed.
 */

import { Effect, Either, Layer } from "effect";
import { mkdir, readdir, stat, writeFile } from "node:fs/promises";
import { extname, join } from "node:path";
import type { EcgDocument, FileDescriptor } from "../schemas/measurement";
import type { MonitoringReport } from "../schemas/completeness";
import { DocumentTextDecoder, MeasurementSource, ReportStore, type FileListing } from "./collaborators";
import { describeFsError, readTextFile } from "./delimitedPressureDecoder";
import { FileDecodeError, ReportWriteError, SourceError } from "./errors";

// ============================================================================
// MEASUREMENT SOURCE
// ============================================================================

const isVisible = (name: string): boolean => !name.startsWith(".");

const listDirectory = (location: string) =>
  Effect.tryPromise({
    try: () => readdir(location, { withFileTypes: true }),
    catch: (error) => new SourceError({ location, reason: describeFsError(error) }),
  });

const inspect = (path: string) =>
  Effect.tryPromise({
    try: () => stat(path),
    catch: (error) => new SourceError({ location: path, reason: describeFsError(error) }),
  });

const describeFile = (
  path: string,
  name: string,
  info: { readonly size: number; readonly mtimeMs: number },
  sessionId?: string
): FileDescriptor => {
  const descriptor = { id: path, name, size: info.size, modifiedTime: info.mtimeMs };
  return sessionId === undefined ? descriptor : { ...descriptor, sessionId };
};

/**
 * Entries are inspected with `stat`, so symbolic links count as what they
 * point to. An entry that cannot be inspected, or a session folder that
 * cannot be read, lands in `unreadable`; the rest of the patient is still
 * listed.
 */
const listPatientFiles = (dataDir: string, patientId: string) =>
  Effect.gen(function* (_) {
    const patientDir = join(dataDir, patientId);
    const entries = yield* _(listDirectory(patientDir));
    const files: FileDescriptor[] = [];
    const unreadable: SourceError[] = [];

    for (const entry of entries.filter((e) => isVisible(e.name))) {
      const path = join(patientDir, entry.name);
      const info = yield* _(Effect.either(inspect(path)));
      if (Either.isLeft(info)) {
        unreadable.push(info.left);
        continue;
      }
      if (info.right.isFile()) {
        files.push(describeFile(path, entry.name, info.right));
        continue;
      }
      if (!info.right.isDirectory()) continue;

      const session = yield* _(Effect.either(listDirectory(path)));
      if (Either.isLeft(session)) {
        unreadable.push(session.left);
        continue;
      }
      for (const inner of session.right.filter((e) => isVisible(e.name))) {
        const innerPath = join(path, inner.name);
        const innerInfo = yield* _(Effect.either(inspect(innerPath)));
        if (Either.isLeft(innerInfo)) {
          unreadable.push(innerInfo.left);
        } else if (innerInfo.right.isFile()) {
          files.push(describeFile(innerPath, inner.name, innerInfo.right, entry.name));
        }
      }
    }

    const listing: FileListing = {
      files: files.sort((a, b) => a.id.localeCompare(b.id)),
      unreadable: unreadable.sort((a, b) => a.location.localeCompare(b.location)),
    };
    return listing;
  });

export const makeFileSystemMeasurementSource = (dataDir: string): MeasurementSource => ({
  listPatients: () =>
    Effect.map(listDirectory(dataDir), (entries) =>
      entries
        .filter((entry) => entry.isDirectory() && isVisible(entry.name))
        .map((entry) => entry.name)
        .sort()
    ),
  listFiles: (patientId) => listPatientFiles(dataDir, patientId),
});

export const FileSystemMeasurementSourceLive = (dataDir: string) =>
  Layer.succeed(MeasurementSource, makeFileSystemMeasurementSource(dataDir));

// ============================================================================
// DOCUMENT TEXT
// ============================================================================

/**
 * Reads UTF-8 text renditions of ECG reports. PDF files are refused: their
 * text must be extracted by the host before the run.
 */
export const PlainTextDocumentDecoderLive = Layer.succeed(DocumentTextDecoder, {
  extractText: (file: FileDescriptor): Effect.Effect<EcgDocument, FileDecodeError, never> => {
    if (extname(file.name).toLowerCase() === ".pdf") {
      return Effect.fail(
        new FileDecodeError({
          file: file.name,
          reason: "PDF text extraction is not available in this decoder",
          suggestion: "Provide a .txt rendition of the report next to the PDF.",
        })
      );
    }
    return Effect.map(readTextFile(file), (extractedText) => ({ extractedText, sourceFile: file.name }));
  },
});

// ============================================================================
// REPORT STORE
// ============================================================================

export const makeFileSystemReportStore = (reportsDir: string): ReportStore => ({
  save: (name: string, report: MonitoringReport) => {
    const location = join(reportsDir, name);
    return Effect.tryPromise({
      try: async () => {
        await mkdir(reportsDir, { recursive: true });
        await writeFile(location, `${JSON.stringify(report, null, 2)}\n`, "utf8");
        return location;
      },
      catch: (error) => new ReportWriteError({ location, reason: describeFsError(error) }),
    });
  },
});

export const FileSystemReportStoreLive = (reportsDir: string) =>
  Layer.succeed(ReportStore, makeFileSystemReportStore(reportsDir));
