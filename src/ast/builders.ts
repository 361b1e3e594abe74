/**
 * Node constructors
 *
 * Used by tests, the JSON deserializer and the rewrite engine. Constructors do
 * not validate; `findUnsupportedPattern` and the classifier do that.
 */

import type {
  AliasClause,
  BinaryExpr,
  BinaryOp,
  Binding,
  BlockExpr,
  CallExpr,
  Clause,
  Comprehension,
  ExecClause,
  Expr,
  FlatMapCall,
  GeneratorClause,
  GuardClause,
  IdentExpr,
  IdentPattern,
  LiteralExpr,
  LiteralValue,
  MapCall,
  Pattern,
  RawExpr,
  TupleExpr,
  TuplePattern,
  UnaryExpr,
  UnaryOp,
  WildcardPattern,
  WithFilterCall,
} from "./ast";

// Patterns

export function pwild(): WildcardPattern {
  return { kind: "wildcard" };
}

export function pvar(name: string): IdentPattern {
  return { kind: "ident", name };
}

export function ptuple(...elements: Pattern[]): TuplePattern {
  return { kind: "tuple", elements };
}

// Expressions

export function ident(name: string): IdentExpr {
  return { kind: "ident", name };
}

export function lit(value: LiteralValue): LiteralExpr {
  return { kind: "literal", value };
}

export function tuple(...elements: Expr[]): TupleExpr {
  return { kind: "tuple", elements };
}

/** A string callee is shorthand for an identifier. */
export function call(callee: Expr | string, ...args: Expr[]): CallExpr {
  return {
    kind: "call",
    callee: typeof callee === "string" ? ident(callee) : callee,
    args,
  };
}

export function binary(op: BinaryOp, left: Expr, right: Expr): BinaryExpr {
  return { kind: "binary", op, left, right };
}

export function unary(op: UnaryOp, operand: Expr): UnaryExpr {
  return { kind: "unary", op, operand };
}

export function raw(text: string): RawExpr {
  return { kind: "raw", text };
}

export function binding(pattern: Pattern, value: Expr): Binding {
  return { pattern, value };
}

export function block(bindings: readonly Binding[], result: Expr): BlockExpr {
  return { kind: "block", bindings, result };
}

export function mapCall(source: Expr, pattern: Pattern, body: Expr): MapCall {
  return { kind: "map", source, pattern, body };
}

export function flatMapCall(source: Expr, pattern: Pattern, body: Expr): FlatMapCall {
  return { kind: "flatMap", source, pattern, body };
}

export function withFilterCall(source: Expr, pattern: Pattern, predicate: Expr): WithFilterCall {
  return { kind: "withFilter", source, pattern, predicate };
}

// Clauses

export function generator(pattern: Pattern, source: Expr): GeneratorClause {
  return { kind: "generator", pattern, source };
}

export function alias(pattern: Pattern, value: Expr): AliasClause {
  return { kind: "alias", pattern, value };
}

export function guard(condition: Expr): GuardClause {
  return { kind: "guard", condition };
}

export function exec(expr: Expr): ExecClause {
  return { kind: "exec", expr };
}

export function comprehension(clauses: readonly Clause[], yieldExpr?: Expr): Comprehension {
  return yieldExpr === undefined
    ? { kind: "comprehension", clauses }
    : { kind: "comprehension", clauses, yield: yieldExpr };
}
