/**
 * AST Serialization
 *
 * Converts terms (desugared trees in particular) to the JSON format.
 */

import type { Clause, Comprehension, Expr, Pattern } from "../ast";
import type { SourceSpan } from "../utils/span";
import type { JsonClause, JsonComprehension, JsonExpr, JsonPattern, JsonSpan } from "./schema";

// =============================================================================
// Options
// =============================================================================

export interface SerializeOptions {
  /** Include source spans in output (default: false) */
  includeSpans?: boolean;
  /** Pretty-print JSON (default: true) */
  pretty?: boolean;
}

// =============================================================================
// Main Entry Points
// =============================================================================

export function serializeExpr(expr: Expr, options: SerializeOptions = {}): string {
  const { pretty = true } = options;
  return JSON.stringify(exprToJson(expr, options), null, pretty ? 2 : undefined);
}

export function serializeComprehension(comp: Comprehension, options: SerializeOptions = {}): string {
  const { pretty = true } = options;
  return JSON.stringify(comprehensionToJson(comp, options), null, pretty ? 2 : undefined);
}

export function comprehensionToJson(comp: Comprehension, options: SerializeOptions = {}): JsonComprehension {
  return {
    kind: "comprehension",
    clauses: comp.clauses.map((c) => clauseToJson(c, options)),
    ...(comp.yield ? { yield: exprToJson(comp.yield, options) } : {}),
    ...spanField(comp.span, options),
  };
}

// =============================================================================
// Nodes
// =============================================================================

function clauseToJson(clause: Clause, options: SerializeOptions): JsonClause {
  const spanPart = spanField(clause.span, options);
  switch (clause.kind) {
    case "generator":
      return {
        kind: "generator",
        pattern: patternToJson(clause.pattern, options),
        source: exprToJson(clause.source, options),
        ...spanPart,
      };
    case "alias":
      return {
        kind: "alias",
        pattern: patternToJson(clause.pattern, options),
        value: exprToJson(clause.value, options),
        ...spanPart,
      };
    case "guard":
      return { kind: "guard", condition: exprToJson(clause.condition, options), ...spanPart };
    case "exec":
      return { kind: "exec", expr: exprToJson(clause.expr, options), ...spanPart };
  }
}

export function patternToJson(pattern: Pattern, options: SerializeOptions = {}): JsonPattern {
  const spanPart = spanField(pattern.span, options);
  switch (pattern.kind) {
    case "wildcard":
      return { kind: "wildcard", ...spanPart };
    case "ident":
      return { kind: "ident", name: pattern.name, ...spanPart };
    case "tuple":
      return {
        kind: "tuple",
        elements: pattern.elements.map((p) => patternToJson(p, options)),
        ...spanPart,
      };
  }
}

export function exprToJson(expr: Expr, options: SerializeOptions = {}): JsonExpr {
  const spanPart = spanField(expr.span, options);
  switch (expr.kind) {
    case "ident":
      return { kind: "ident", name: expr.name, ...spanPart };
    case "literal":
      return { kind: "literal", value: expr.value, ...spanPart };
    case "raw":
      return { source: expr.text };
    case "tuple":
      return { kind: "tuple", elements: expr.elements.map((e) => exprToJson(e, options)), ...spanPart };
    case "call":
      return {
        kind: "call",
        callee: exprToJson(expr.callee, options),
        args: expr.args.map((e) => exprToJson(e, options)),
        ...spanPart,
      };
    case "binary":
      return {
        kind: "binary",
        op: expr.op,
        left: exprToJson(expr.left, options),
        right: exprToJson(expr.right, options),
        ...spanPart,
      };
    case "unary":
      return { kind: "unary", op: expr.op, operand: exprToJson(expr.operand, options), ...spanPart };
    case "block":
      return {
        kind: "block",
        bindings: expr.bindings.map((b) => ({
          pattern: patternToJson(b.pattern, options),
          value: exprToJson(b.value, options),
        })),
        result: exprToJson(expr.result, options),
        ...spanPart,
      };
    case "map":
      return {
        kind: "map",
        source: exprToJson(expr.source, options),
        pattern: patternToJson(expr.pattern, options),
        body: exprToJson(expr.body, options),
      };
    case "flatMap":
      return {
        kind: "flatMap",
        source: exprToJson(expr.source, options),
        pattern: patternToJson(expr.pattern, options),
        body: exprToJson(expr.body, options),
      };
    case "withFilter":
      return {
        kind: "withFilter",
        source: exprToJson(expr.source, options),
        pattern: patternToJson(expr.pattern, options),
        predicate: exprToJson(expr.predicate, options),
      };
  }
}

function spanField(span: SourceSpan | undefined, options: SerializeOptions): { span?: JsonSpan } {
  if (!options.includeSpans || !span) return {};
  return {
    span: {
      file: span.file,
      start: { ...span.start },
      end: { ...span.end },
    },
  };
}
