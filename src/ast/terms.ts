/**
 * Structural queries over the term model
 */

import type { Binding, Clause, Comprehension, Expr, Pattern } from "./ast";

// =============================================================================
// Binding Identity
// =============================================================================

/**
 * Whether `expr` syntactically rebuilds what `pattern` binds: the same
 * identifier, or a tuple literal of the pattern's components in order.
 * Wildcards bind nothing and so never match.
 */
export function sameBinding(pattern: Pattern, expr: Expr): boolean {
  switch (pattern.kind) {
    case "wildcard":
      return false;
    case "ident":
      return expr.kind === "ident" && expr.name === pattern.name;
    case "tuple":
      return (
        expr.kind === "tuple" &&
        expr.elements.length === pattern.elements.length &&
        pattern.elements.every((p, i) => sameBinding(p, expr.elements[i]))
      );
  }
}

// =============================================================================
// Validation
// =============================================================================

/**
 * The first sub-pattern the term model does not accept, or undefined.
 */
export function findUnsupportedPattern(pattern: Pattern): Pattern | undefined {
  switch (pattern.kind) {
    case "wildcard":
      return undefined;
    case "ident":
      return pattern.name.length === 0 ? pattern : undefined;
    case "tuple":
      if (pattern.elements.length < 2) return pattern;
      for (const element of pattern.elements) {
        const bad = findUnsupportedPattern(element);
        if (bad) return bad;
      }
      return undefined;
  }
}

// =============================================================================
// Structural Equality
// =============================================================================

export function patternEquals(a: Pattern, b: Pattern): boolean {
  switch (a.kind) {
    case "wildcard":
      return b.kind === "wildcard";
    case "ident":
      return b.kind === "ident" && a.name === b.name;
    case "tuple":
      return (
        b.kind === "tuple" &&
        a.elements.length === b.elements.length &&
        a.elements.every((p, i) => patternEquals(p, b.elements[i]))
      );
  }
}

function exprListEquals(a: readonly Expr[], b: readonly Expr[]): boolean {
  return a.length === b.length && a.every((e, i) => exprEquals(e, b[i]));
}

function bindingEquals(a: Binding, b: Binding): boolean {
  return patternEquals(a.pattern, b.pattern) && exprEquals(a.value, b.value);
}

/**
 * Syntactic equality, ignoring spans.
 */
export function exprEquals(a: Expr, b: Expr): boolean {
  switch (a.kind) {
    case "ident":
      return b.kind === "ident" && a.name === b.name;
    case "literal":
      return b.kind === "literal" && a.value === b.value;
    case "raw":
      return b.kind === "raw" && a.text === b.text;
    case "tuple":
      return b.kind === "tuple" && exprListEquals(a.elements, b.elements);
    case "call":
      return b.kind === "call" && exprEquals(a.callee, b.callee) && exprListEquals(a.args, b.args);
    case "binary":
      return (
        b.kind === "binary" &&
        a.op === b.op &&
        exprEquals(a.left, b.left) &&
        exprEquals(a.right, b.right)
      );
    case "unary":
      return b.kind === "unary" && a.op === b.op && exprEquals(a.operand, b.operand);
    case "block":
      return (
        b.kind === "block" &&
        a.bindings.length === b.bindings.length &&
        a.bindings.every((binding, i) => bindingEquals(binding, b.bindings[i])) &&
        exprEquals(a.result, b.result)
      );
    case "map":
    case "flatMap":
      return (
        b.kind === a.kind &&
        exprEquals(a.source, b.source) &&
        patternEquals(a.pattern, b.pattern) &&
        exprEquals(a.body, b.body)
      );
    case "withFilter":
      return (
        b.kind === "withFilter" &&
        exprEquals(a.source, b.source) &&
        patternEquals(a.pattern, b.pattern) &&
        exprEquals(a.predicate, b.predicate)
      );
  }
}

// =============================================================================
// Names
// =============================================================================

/**
 * Identifiers bound by a pattern, left to right.
 */
export function patternNames(pattern: Pattern): string[] {
  switch (pattern.kind) {
    case "wildcard":
      return [];
    case "ident":
      return [pattern.name];
    case "tuple":
      return pattern.elements.flatMap(patternNames);
  }
}

/**
 * Names visible anywhere in a comprehension: identifiers in expressions,
 * names bound by patterns, and the text of raw fragments (which may hide
 * identifiers the desugarer cannot see).
 */
export interface NameInventory {
  names: Set<string>;
  rawTexts: string[];
}

export function comprehensionNames(comp: Comprehension): NameInventory {
  const inventory: NameInventory = { names: new Set(), rawTexts: [] };
  for (const clause of comp.clauses) {
    collectClause(clause, inventory);
  }
  if (comp.yield) {
    collectExpr(comp.yield, inventory);
  }
  return inventory;
}

function collectClause(clause: Clause, inv: NameInventory): void {
  switch (clause.kind) {
    case "generator":
      collectPattern(clause.pattern, inv);
      collectExpr(clause.source, inv);
      break;
    case "alias":
      collectPattern(clause.pattern, inv);
      collectExpr(clause.value, inv);
      break;
    case "guard":
      collectExpr(clause.condition, inv);
      break;
    case "exec":
      collectExpr(clause.expr, inv);
      break;
  }
}

function collectPattern(pattern: Pattern, inv: NameInventory): void {
  for (const name of patternNames(pattern)) {
    inv.names.add(name);
  }
}

function collectExpr(expr: Expr, inv: NameInventory): void {
  switch (expr.kind) {
    case "ident":
      inv.names.add(expr.name);
      break;
    case "literal":
      break;
    case "raw":
      inv.rawTexts.push(expr.text);
      break;
    case "tuple":
      expr.elements.forEach((e) => collectExpr(e, inv));
      break;
    case "call":
      collectExpr(expr.callee, inv);
      expr.args.forEach((e) => collectExpr(e, inv));
      break;
    case "binary":
      collectExpr(expr.left, inv);
      collectExpr(expr.right, inv);
      break;
    case "unary":
      collectExpr(expr.operand, inv);
      break;
    case "block":
      for (const b of expr.bindings) {
        collectPattern(b.pattern, inv);
        collectExpr(b.value, inv);
      }
      collectExpr(expr.result, inv);
      break;
    case "map":
    case "flatMap":
      collectExpr(expr.source, inv);
      collectPattern(expr.pattern, inv);
      collectExpr(expr.body, inv);
      break;
    case "withFilter":
      collectExpr(expr.source, inv);
      collectPattern(expr.pattern, inv);
      collectExpr(expr.predicate, inv);
      break;
  }
}
