/**
 * SERVICE-LEVEL ERROR SYSTEM (Effect-TS)
 *
 * Errors are values, not exceptions. Composable, type-safe, structured.
 *
 * Philosophy:
 * - Errors are part of the type signature (Effect<A, E, R>)
 * - Data-quality findings are NOT errors: they become Issues on the report
 * - Only collaborator failures and contract violations are errors
 * - Each error knows whether the run can continue past it
 */

import { Data } from "effect";
import type { Issue, IssueCode, IssueSeverity } from "../schemas/completeness";

/**
 * CONFIGURATION ERROR - Requirements or thresholds are malformed
 *
 * Programming-contract violation: the run cannot start.
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
  readonly context?: Record<string, unknown>;
}> {
  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      context: this.context,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * FILE DECODE ERROR - A collaborator could not read one file
 *
 * Excluded from that patient's measurement set; other files continue.
 */
export class FileDecodeError extends Data.TaggedError("FileDecodeError")<{
  readonly file: string;
  readonly reason: string;
  readonly suggestion: string;
}> {
  get message(): string {
    return `Failed to decode ${this.file}: ${this.reason}`;
  }

  get recoverable(): boolean {
    return true;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      file: this.file,
      reason: this.reason,
      suggestion: this.suggestion,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * SOURCE ERROR - Patient listing or file listing failed
 */
export class SourceError extends Data.TaggedError("SourceError")<{
  readonly location: string;
  readonly reason: string;
}> {
  get message(): string {
    return `Measurement source unavailable at ${this.location}: ${this.reason}`;
  }

  get recoverable(): boolean {
    return true; // One patient's folder failing leaves the others intact
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      location: this.location,
      reason: this.reason,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * REPORT WRITE ERROR - The report artifact could not be persisted
 */
export class ReportWriteError extends Data.TaggedError("ReportWriteError")<{
  readonly location: string;
  readonly reason: string;
}> {
  get message(): string {
    return `Failed to write report to ${this.location}: ${this.reason}`;
  }

  get recoverable(): boolean {
    return true; // Report still exists in memory
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      location: this.location,
      reason: this.reason,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * RUN TIMEOUT ERROR - The whole run exceeded its guard
 *
 * Usually a decoder hanging on one file.
 */
export class RunTimeoutError extends Data.TaggedError("RunTimeoutError")<{
  readonly timeoutMs: number;
}> {
  get message(): string {
    return `Monitoring run exceeded ${this.timeoutMs}ms`;
  }

  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      timeoutMs: this.timeoutMs,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Union of all service errors (for type safety)
 */
export type ServiceError =
  | ConfigurationError
  | FileDecodeError
  | SourceError
  | ReportWriteError
  | RunTimeoutError;

/**
 * Issue Collector (accumulates non-fatal findings during extraction)
 *
 * Used when we want to continue processing despite bad rows or files.
 */
export class IssueCollector {
  private issues: Issue[] = [];

  add(severity: IssueSeverity, code: IssueCode, message: string, file?: string): void {
    this.issues.push(file === undefined ? { severity, code, message } : { severity, code, message, file });
  }

  info(code: IssueCode, message: string, file?: string): void {
    this.add("info", code, message, file);
  }

  warn(code: IssueCode, message: string, file?: string): void {
    this.add("warning", code, message, file);
  }

  /** Record a recoverable service error as an error-level issue */
  fromError(code: IssueCode, error: FileDecodeError | SourceError): void {
    this.add("error", code, error.message, error._tag === "FileDecodeError" ? error.file : error.location);
  }

  addAll(issues: ReadonlyArray<Issue>): void {
    this.issues.push(...issues);
  }

  getAll(): Issue[] {
    return [...this.issues];
  }

  count(): number {
    return this.issues.length;
  }

  hasErrors(): boolean {
    return this.issues.some((i) => i.severity === "error");
  }

  clear(): void {
    this.issues = [];
  }
}
