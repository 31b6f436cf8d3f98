/**
 * COLLABORATOR SERVICES
 *
 * Everything the engine needs from the outside world, as Context tags.
 * The core never touches files directly; tests swap these for in-memory
 * stand-ins with Layer.succeed.
 *
 * OCaml equivalent:
 * module type MeasurementSource = sig
 *   val list_patients : unit -> (string list, source_error) result
 *   val list_files : string -> (file_listing, source_error) result
 * end
 */

import { Context, Effect } from "effect";
import type { EcgDocument, FileDescriptor, PressureRow } from "../schemas/measurement";
import type { MonitoringReport } from "../schemas/completeness";
import type { FileDecodeError, ReportWriteError, SourceError } from "./errors";

/**
 * A patient's files plus the entries that could not be inspected.
 */
export interface FileListing {
  readonly files: ReadonlyArray<FileDescriptor>;
  readonly unreadable: ReadonlyArray<SourceError>;
}

/**
 * Patients and their candidate files. `listFiles` fails only when the
 * patient folder itself cannot be read.
 */
export interface MeasurementSource {
  readonly listPatients: () => Effect.Effect<ReadonlyArray<string>, SourceError, never>;
  readonly listFiles: (patientId: string) => Effect.Effect<FileListing, SourceError, never>;
}

export const MeasurementSource = Context.GenericTag<MeasurementSource>("MeasurementSource");

/**
 * Tabular pressure export → one PressureRow per data line.
 */
export interface PressureRowDecoder {
  readonly decodeRows: (file: FileDescriptor) => Effect.Effect<ReadonlyArray<PressureRow>, FileDecodeError, never>;
}

export const PressureRowDecoder = Context.GenericTag<PressureRowDecoder>("PressureRowDecoder");

/**
 * ECG report → its text. PDF rendering lives with the host.
 */
export interface DocumentTextDecoder {
  readonly extractText: (file: FileDescriptor) => Effect.Effect<EcgDocument, FileDecodeError, never>;
}

export const DocumentTextDecoder = Context.GenericTag<DocumentTextDecoder>("DocumentTextDecoder");

/**
 * Persists the run artifact and returns where it went.
 */
export interface ReportStore {
  readonly save: (name: string, report: MonitoringReport) => Effect.Effect<string, ReportWriteError, never>;
}

export const ReportStore = Context.GenericTag<ReportStore>("ReportStore");

export type ExtractionServices = MeasurementSource | PressureRowDecoder | DocumentTextDecoder;
