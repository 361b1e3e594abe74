/**
 * Desugaring errors
 *
 * Every failure is a value returned from `desugar`; nothing is recovered
 * inside the engine and no partial output escapes.
 */

import type { Pattern } from "../ast";
import type { DiagnosticCollector, Diagnostic, Hint } from "../diagnostics";
import { ErrorCode, type ErrorCodeType } from "../diagnostics/codes";
import { type SourceSpan, syntheticSpan } from "../utils/span";

export type DesugarErrorKind =
  | "MalformedComprehension"
  | "ComprehensionTooLarge"
  | "UnsupportedPattern";

export interface DesugarError {
  kind: DesugarErrorKind;
  code: ErrorCodeType;
  message: string;
  /** Index of the clause the error is about, if any */
  clauseIndex?: number | undefined;
  span?: SourceSpan | undefined;
  hints: Hint[];
}

/**
 * Thrown inside the rewrite engine and turned back into a value at the entry
 * point.
 */
export class DesugarFailure extends Error {
  readonly error: DesugarError;

  constructor(error: DesugarError) {
    super(error.message);
    this.name = "DesugarFailure";
    this.error = error;
  }
}

export function malformed(
  message: string,
  clauseIndex?: number,
  span?: SourceSpan,
  hints: Hint[] = []
): DesugarError {
  return {
    kind: "MalformedComprehension",
    code: ErrorCode.MalformedComprehension,
    message,
    clauseIndex,
    span,
    hints,
  };
}

export function tooLarge(clauseCount: number, maxClauses: number): DesugarError {
  return {
    kind: "ComprehensionTooLarge",
    code: ErrorCode.ComprehensionTooLarge,
    message: `comprehension has ${clauseCount} clauses; the maximum is ${maxClauses}`,
    hints: [{ description: "split the comprehension or raise maxClauses" }],
  };
}

export function unsupportedPattern(pattern: Pattern, clauseIndex: number): DesugarError {
  const message =
    pattern.kind === "tuple"
      ? `tuple pattern must have at least 2 elements, found ${pattern.elements.length}`
      : `unsupported ${pattern.kind} pattern`;
  return {
    kind: "UnsupportedPattern",
    code: ErrorCode.UnsupportedPattern,
    message,
    clauseIndex,
    span: pattern.span,
    hints: [],
  };
}

/**
 * Record a desugaring error as a diagnostic against `file`.
 */
export function reportDesugarError(
  collector: DiagnosticCollector,
  error: DesugarError,
  file: string
): Diagnostic {
  return collector.report(
    error.code,
    error.message,
    error.span ?? syntheticSpan(file),
    { kind: error.kind, clauseIndex: error.clauseIndex },
    error.hints
  );
}
