/**
 * Diagnostics Module
 *
 * Structured error reporting with source locations, hints, and
 * machine-readable output.
 */

export type {
  Severity,
  Diagnostic,
  StructuredData,
  Hint,
  DesugarReport,
  DesugarStats,
} from "./diagnostic";

export { createDiagnostic, isError, isWarning } from "./diagnostic";

export { ErrorCode, getErrorDescription, getCodeSeverity } from "./codes";
export type { ErrorCodeType } from "./codes";

export { DiagnosticCollector } from "./collector";

export {
  formatJson,
  formatPretty,
  formatCounts,
  formatSimple,
  formatSummary,
} from "./formatter";
