/**
 * Diagnostic Collector
 *
 * Collects diagnostics across a CLI run and provides filtering/sorting.
 * IDs are numbered per collector.
 */

import type { SourceSpan } from "../utils/span";
import {
  type Diagnostic,
  type Hint,
  type Severity,
  type StructuredData,
  createDiagnostic,
  isError,
} from "./diagnostic";

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];
  private nextId = 0;

  /**
   * Create and add a diagnostic; severity follows the code.
   */
  report(
    code: string,
    message: string,
    location: SourceSpan,
    structured: StructuredData = { kind: "general" },
    hints: Hint[] = []
  ): Diagnostic {
    const diagnostic = createDiagnostic(`d${++this.nextId}`, code, message, location, structured, hints);
    this.diagnostics.push(diagnostic);
    return diagnostic;
  }

  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getBySeverity(severity: Severity): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === severity);
  }

  getErrors(): Diagnostic[] {
    return this.getBySeverity("error");
  }

  getWarnings(): Diagnostic[] {
    return this.getBySeverity("warning");
  }

  hasErrors(): boolean {
    return this.diagnostics.some(isError);
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Sort diagnostics by location (file, then line, then column).
   */
  sorted(): Diagnostic[] {
    return [...this.diagnostics].sort((a, b) => {
      const fileCompare = a.location.file.localeCompare(b.location.file);
      if (fileCompare !== 0) return fileCompare;

      if (a.location.start.line !== b.location.start.line) {
        return a.location.start.line - b.location.start.line;
      }

      return a.location.start.column - b.location.start.column;
    });
  }
}
