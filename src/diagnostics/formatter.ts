/**
 * Diagnostic Formatter
 *
 * Formats diagnostics for output as JSON or human-readable text.
 */

import type { DesugarReport, Diagnostic } from "./diagnostic";
import type { SourceFile } from "../utils/source";
import { formatSpan } from "../utils/span";
import { isError, isWarning } from "./diagnostic";

/**
 * Format a desugar report as JSON.
 */
export function formatJson(report: DesugarReport | DesugarReport[]): string {
  return JSON.stringify(report, null, 2);
}

/**
 * Format diagnostics as human-readable text, with a source snippet when the
 * source file is available.
 */
export function formatPretty(diagnostics: Diagnostic[], source?: SourceFile): string {
  const lines: string[] = [];

  for (const diag of diagnostics) {
    lines.push(formatDiagnostic(diag, source));
    lines.push("");
  }

  const summary = formatCounts(diagnostics);
  if (summary) {
    lines.push(summary);
  }

  return lines.join("\n");
}

/**
 * "2 errors, 1 warning", or the empty string when there is nothing to count.
 */
export function formatCounts(diagnostics: Diagnostic[]): string {
  const errorCount = diagnostics.filter(isError).length;
  const warningCount = diagnostics.filter(isWarning).length;

  const parts: string[] = [];
  if (errorCount > 0) {
    parts.push(`${errorCount} error${errorCount === 1 ? "" : "s"}`);
  }
  if (warningCount > 0) {
    parts.push(`${warningCount} warning${warningCount === 1 ? "" : "s"}`);
  }
  return parts.join(", ");
}

function formatDiagnostic(diag: Diagnostic, source?: SourceFile): string {
  const lines: string[] = [];
  const loc = diag.location;

  // Header: severity[code]: message
  lines.push(`${diag.severity}[${diag.code}]: ${diag.message}`);
  lines.push(`  --> ${formatSpan(loc)}`);

  const lineNum = loc.start.line;
  const lineNumWidth = Math.max(3, String(lineNum).length);
  const gutter = " ".repeat(lineNumWidth);

  const sourceLine = source?.getLine(lineNum) ?? null;
  if (sourceLine !== null) {
    lines.push(`${gutter} |`);
    lines.push(`${String(lineNum).padStart(lineNumWidth)} | ${sourceLine}`);

    const startCol = loc.start.column;
    const endCol = loc.start.line === loc.end.line ? loc.end.column : sourceLine.length + 1;
    const underlineLength = Math.max(1, endCol - startCol);
    lines.push(`${gutter} | ${" ".repeat(startCol - 1)}${"^".repeat(underlineLength)}`);
  }

  for (const hint of diag.hints) {
    lines.push(`${gutter} = help: ${hint.description}`);
    if (hint.template) {
      lines.push(`${gutter}         ${hint.template}`);
    }
  }

  return lines.join("\n");
}

/**
 * Format diagnostics as a simple list (no source context).
 */
export function formatSimple(diagnostics: Diagnostic[]): string {
  return diagnostics
    .map((d) => `${formatSpan(d.location)}: ${d.severity}[${d.code}]: ${d.message}`)
    .join("\n");
}

/**
 * One-line summary of a report.
 */
export function formatSummary(report: DesugarReport): string {
  const parts: string[] = [report.status === "success" ? "Desugared" : "Failed", report.file];

  const counts = formatCounts(report.diagnostics);
  if (counts) {
    parts.push(counts);
  }

  const { stats } = report;
  parts.push(
    `${stats.clauses} clause${stats.clauses === 1 ? "" : "s"} -> ${stats.maps} map, ${stats.flatMaps} flatMap, ${stats.withFilters} withFilter`
  );
  parts.push(`in ${stats.timeMs.toFixed(0)}ms`);

  return parts.join(" | ");
}
