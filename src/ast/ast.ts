/**
 * Term model for comprehensions and their desugared form
 *
 * Host expressions are mostly opaque to the desugarer: it only needs to wrap
 * them in combinator calls and, for redundant-map elision, recognise a yield
 * that merely rebuilds the last bound pattern. The few structured expression
 * kinds below exist so that test fixtures and the pretty-printer can say
 * something meaningful; anything else travels as a `raw` fragment.
 *
 * All nodes are immutable. Spans are optional and never affect equality.
 */

import type { SourceSpan } from "../utils/span";

export interface AstNode {
  /** Source location, when the producer recorded one */
  span?: SourceSpan | undefined;
}

// =============================================================================
// Patterns
// =============================================================================

export type Pattern = WildcardPattern | IdentPattern | TuplePattern;

export interface WildcardPattern extends AstNode {
  kind: "wildcard";
}

export interface IdentPattern extends AstNode {
  kind: "ident";
  name: string;
}

/** Arity is at least 2; see `findUnsupportedPattern`. */
export interface TuplePattern extends AstNode {
  kind: "tuple";
  elements: readonly Pattern[];
}

// =============================================================================
// Expressions
// =============================================================================

export type LiteralValue = number | string | boolean;

export type BinaryOp =
  | "||"
  | "&&"
  | "=="
  | "!="
  | "<"
  | ">"
  | "<="
  | ">="
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "++";

export const BINARY_OPS: readonly BinaryOp[] = [
  "||", "&&", "==", "!=", "<", ">", "<=", ">=", "+", "-", "*", "/", "%", "++",
];

export type UnaryOp = "!" | "-";

export const UNARY_OPS: readonly UnaryOp[] = ["!", "-"];

export type Expr =
  | IdentExpr
  | LiteralExpr
  | TupleExpr
  | CallExpr
  | BinaryExpr
  | UnaryExpr
  | RawExpr
  | BlockExpr
  | CombinatorCall;

/** Expression kinds a producer may hand to the desugarer. */
export type HostExpr = Exclude<Expr, CombinatorCall>;

export interface IdentExpr extends AstNode {
  kind: "ident";
  name: string;
}

export interface LiteralExpr extends AstNode {
  kind: "literal";
  value: LiteralValue;
}

export interface TupleExpr extends AstNode {
  kind: "tuple";
  elements: readonly Expr[];
}

export interface CallExpr extends AstNode {
  kind: "call";
  callee: Expr;
  args: readonly Expr[];
}

export interface BinaryExpr extends AstNode {
  kind: "binary";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export interface UnaryExpr extends AstNode {
  kind: "unary";
  op: UnaryOp;
  operand: Expr;
}

/** Uninterpreted host-language text. */
export interface RawExpr extends AstNode {
  kind: "raw";
  text: string;
}

/** `val P = E` */
export interface Binding {
  pattern: Pattern;
  value: Expr;
}

/** `{ val P1 = E1; ...; result }` */
export interface BlockExpr extends AstNode {
  kind: "block";
  bindings: readonly Binding[];
  result: Expr;
}

// =============================================================================
// Combinator Calls (desugared output)
// =============================================================================

export type CombinatorCall = MapCall | FlatMapCall | WithFilterCall;

/** `source.map(pattern => body)` */
export interface MapCall extends AstNode {
  kind: "map";
  source: Expr;
  pattern: Pattern;
  body: Expr;
}

/** `source.flatMap(pattern => body)` */
export interface FlatMapCall extends AstNode {
  kind: "flatMap";
  source: Expr;
  pattern: Pattern;
  body: Expr;
}

/** `source.withFilter(pattern => predicate)` */
export interface WithFilterCall extends AstNode {
  kind: "withFilter";
  source: Expr;
  pattern: Pattern;
  predicate: Expr;
}

export function isCombinatorCall(expr: Expr): expr is CombinatorCall {
  return expr.kind === "map" || expr.kind === "flatMap" || expr.kind === "withFilter";
}

// =============================================================================
// Clauses and Comprehensions
// =============================================================================

export type Clause = GeneratorClause | AliasClause | GuardClause | ExecClause;

export type ClauseKind = Clause["kind"];

export const CLAUSE_KINDS: readonly ClauseKind[] = ["generator", "alias", "guard", "exec"];

/** `pattern <- source` */
export interface GeneratorClause extends AstNode {
  kind: "generator";
  pattern: Pattern;
  source: Expr;
}

/** `pattern = value` */
export interface AliasClause extends AstNode {
  kind: "alias";
  pattern: Pattern;
  value: Expr;
}

/** `if condition` */
export interface GuardClause extends AstNode {
  kind: "guard";
  condition: Expr;
}

/** `exec expr`: evaluated in the monad, result not bound */
export interface ExecClause extends AstNode {
  kind: "exec";
  expr: Expr;
}

export interface Comprehension extends AstNode {
  kind: "comprehension";
  clauses: readonly Clause[];
  /** Absent when the comprehension ends with an exec clause */
  yield?: Expr | undefined;
}
