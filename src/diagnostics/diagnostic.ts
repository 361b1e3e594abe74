/**
 * Diagnostic types for structured desugarer output
 *
 * These types define the shape of diagnostics and of the per-file report
 * the CLI prints.
 */

import type { SourceSpan } from "../utils/span";
import { getCodeSeverity } from "./codes";

// =============================================================================
// Core Diagnostic Types
// =============================================================================

export type Severity = "error" | "warning";

export interface Diagnostic {
  /** Unique ID for this diagnostic instance, scoped to its collector */
  id: string;
  severity: Severity;
  code: string;
  message: string;
  location: SourceSpan;
  structured: StructuredData;
  hints: Hint[];
}

export interface StructuredData {
  kind: string;
  /** JSON path of the offending input node */
  path?: string | undefined;
  /** Index of the offending clause */
  clauseIndex?: number | undefined;
  [key: string]: unknown;
}

export interface Hint {
  description: string;
  template?: string | undefined;
}

// =============================================================================
// Desugar Report
// =============================================================================

export interface DesugarReport {
  status: "success" | "error";
  file: string;
  /** Rendered comprehension input, when it could be read */
  input?: string | undefined;
  /** Rendered combinator expression */
  output?: string | undefined;
  diagnostics: Diagnostic[];
  stats: DesugarStats;
}

export interface DesugarStats {
  clauses: number;
  maps: number;
  flatMaps: number;
  withFilters: number;
  blocks: number;
  timeMs: number;
}

// =============================================================================
// Helper Functions
// =============================================================================

export function createDiagnostic(
  id: string,
  code: string,
  message: string,
  location: SourceSpan,
  structured: StructuredData = { kind: "general" },
  hints: Hint[] = []
): Diagnostic {
  return {
    id,
    severity: getCodeSeverity(code),
    code,
    message,
    location,
    structured,
    hints,
  };
}

export function isError(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === "error";
}

export function isWarning(diagnostic: Diagnostic): boolean {
  return diagnostic.severity === "warning";
}
