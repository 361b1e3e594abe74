/**
 * AST-as-JSON Schema
 *
 * JSON description of comprehensions (input) and of desugared trees (output).
 *
 * Design principles:
 * 1. Mirror the internal term model closely (same `kind` discriminators)
 * 2. Spans are optional on input
 * 3. Shorthands for hand-written input: a string pattern is an identifier
 *    ("_" is the wildcard), a string expression is a raw host fragment, a
 *    number or boolean expression is a literal
 * 4. Host code the model does not structure travels as `{ "source": "..." }`
 */

// =============================================================================
// Span (optional on input)
// =============================================================================

export interface JsonSpan {
  file?: string;
  start: { line: number; column: number; offset?: number };
  end?: { line: number; column: number; offset?: number };
}

/**
 * Uninterpreted host-language text, never parsed.
 */
export interface SourceFragment {
  source: string;
}

// =============================================================================
// Comprehension
// =============================================================================

export interface JsonComprehension {
  kind: "comprehension";
  clauses: JsonClause[];
  yield?: JsonExpr;
  span?: JsonSpan;
}

export type JsonClause = JsonGeneratorClause | JsonAliasClause | JsonGuardClause | JsonExecClause;

export interface JsonGeneratorClause {
  kind: "generator";
  pattern: JsonPattern;
  source: JsonExpr;
  span?: JsonSpan;
}

export interface JsonAliasClause {
  kind: "alias";
  pattern: JsonPattern;
  value: JsonExpr;
  span?: JsonSpan;
}

export interface JsonGuardClause {
  kind: "guard";
  condition: JsonExpr;
  span?: JsonSpan;
}

export interface JsonExecClause {
  kind: "exec";
  expr: JsonExpr;
  span?: JsonSpan;
}

// =============================================================================
// Patterns
// =============================================================================

export type JsonPattern = string | JsonWildcardPattern | JsonIdentPattern | JsonTuplePattern;

export interface JsonWildcardPattern {
  kind: "wildcard";
  span?: JsonSpan;
}

export interface JsonIdentPattern {
  kind: "ident";
  name: string;
  span?: JsonSpan;
}

export interface JsonTuplePattern {
  kind: "tuple";
  elements: JsonPattern[];
  span?: JsonSpan;
}

// =============================================================================
// Expressions
// =============================================================================

export type JsonExpr =
  | string
  | number
  | boolean
  | SourceFragment
  | JsonIdentExpr
  | JsonLiteralExpr
  | JsonTupleExpr
  | JsonCallExpr
  | JsonBinaryExpr
  | JsonUnaryExpr
  | JsonBlockExpr
  | JsonMapCall
  | JsonFlatMapCall
  | JsonWithFilterCall;

export interface JsonIdentExpr {
  kind: "ident";
  name: string;
  span?: JsonSpan;
}

export interface JsonLiteralExpr {
  kind: "literal";
  value: number | string | boolean;
  span?: JsonSpan;
}

export interface JsonTupleExpr {
  kind: "tuple";
  elements: JsonExpr[];
  span?: JsonSpan;
}

export interface JsonCallExpr {
  kind: "call";
  callee: JsonExpr;
  args: JsonExpr[];
  span?: JsonSpan;
}

export interface JsonBinaryExpr {
  kind: "binary";
  op: string;
  left: JsonExpr;
  right: JsonExpr;
  span?: JsonSpan;
}

export interface JsonUnaryExpr {
  kind: "unary";
  op: string;
  operand: JsonExpr;
  span?: JsonSpan;
}

export interface JsonBinding {
  pattern: JsonPattern;
  value: JsonExpr;
}

export interface JsonBlockExpr {
  kind: "block";
  bindings: JsonBinding[];
  result: JsonExpr;
  span?: JsonSpan;
}

// Combinator calls appear in output only.

export interface JsonMapCall {
  kind: "map";
  source: JsonExpr;
  pattern: JsonPattern;
  body: JsonExpr;
}

export interface JsonFlatMapCall {
  kind: "flatMap";
  source: JsonExpr;
  pattern: JsonPattern;
  body: JsonExpr;
}

export interface JsonWithFilterCall {
  kind: "withFilter";
  source: JsonExpr;
  pattern: JsonPattern;
  predicate: JsonExpr;
}

// =============================================================================
// Type Guards
// =============================================================================

export function isRecord(node: unknown): node is Record<string, unknown> {
  return typeof node === "object" && node !== null && !Array.isArray(node);
}

export function isSourceFragment(node: unknown): node is SourceFragment {
  return isRecord(node) && typeof node.source === "string" && !("kind" in node);
}
