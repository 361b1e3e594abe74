/**
 * Clause Classifier
 *
 * Validates a comprehension before any rewriting happens, and tells the
 * rewrite engine which clause-run shape sits at a given index. Clauses are
 * addressed by index into one flat array; runs are reported as index ranges
 * plus the clauses they cover.
 */

import type {
  AliasClause,
  Clause,
  Comprehension,
  GeneratorClause,
  GuardClause,
} from "../ast";
import { findUnsupportedPattern } from "../ast";
import { type DesugarError, malformed, tooLarge, unsupportedPattern } from "./errors";

/** Clauses after exec rewriting: exec has become a generator. */
export type NormalClause = GeneratorClause | AliasClause | GuardClause;

// =============================================================================
// Step Shapes
// =============================================================================

/**
 * What the engine finds at `index` when it is not inside a generator's
 * continuation.
 */
export type StepShape =
  /** No clauses left: the yield expression follows */
  | { kind: "end" }
  /** An alias run opening the whole comprehension */
  | { kind: "leadingAliases"; aliases: AliasClause[]; end: number; guardFollows: boolean }
  /** An alias run further in, inside some generator's body */
  | { kind: "aliases"; aliases: AliasClause[]; end: number; guardFollows: boolean }
  | { kind: "generator"; clause: GeneratorClause }
  /** A guard with no generator to filter */
  | { kind: "guard"; clause: GuardClause };

/**
 * What follows a generator: a (possibly empty) alias run starting at the
 * given index, then the yield, a run of guards, or another generator.
 */
export type Continuation =
  | { kind: "yield"; aliases: AliasClause[]; aliasEnd: number }
  | { kind: "guard"; aliases: AliasClause[]; aliasEnd: number; guards: GuardClause[]; guardEnd: number }
  | { kind: "clause"; aliases: AliasClause[]; aliasEnd: number };

function aliasRun(clauses: readonly NormalClause[], index: number): { aliases: AliasClause[]; end: number } {
  const aliases: AliasClause[] = [];
  let end = index;
  while (end < clauses.length) {
    const clause = clauses[end];
    if (clause.kind !== "alias") break;
    aliases.push(clause);
    end++;
  }
  return { aliases, end };
}

function guardRun(clauses: readonly NormalClause[], index: number): { guards: GuardClause[]; end: number } {
  const guards: GuardClause[] = [];
  let end = index;
  while (end < clauses.length) {
    const clause = clauses[end];
    if (clause.kind !== "guard") break;
    guards.push(clause);
    end++;
  }
  return { guards, end };
}

export function classifyStep(
  clauses: readonly NormalClause[],
  index: number,
  atStart: boolean
): StepShape {
  if (index >= clauses.length) {
    return { kind: "end" };
  }

  const clause = clauses[index];

  switch (clause.kind) {
    case "alias": {
      const { aliases, end } = aliasRun(clauses, index);
      const guardFollows = end < clauses.length && clauses[end].kind === "guard";
      return { kind: atStart ? "leadingAliases" : "aliases", aliases, end, guardFollows };
    }
    case "generator":
      return { kind: "generator", clause };
    case "guard":
      return { kind: "guard", clause };
  }
}

export function classifyContinuation(clauses: readonly NormalClause[], index: number): Continuation {
  const { aliases, end: aliasEnd } = aliasRun(clauses, index);
  if (aliasEnd >= clauses.length) {
    return { kind: "yield", aliases, aliasEnd };
  }
  if (clauses[aliasEnd].kind === "guard") {
    const { guards, end: guardEnd } = guardRun(clauses, aliasEnd);
    return { kind: "guard", aliases, aliasEnd, guards, guardEnd };
  }
  return { kind: "clause", aliases, aliasEnd };
}

// =============================================================================
// Validation
// =============================================================================

/**
 * The first reason `comp` cannot be desugared, or undefined.
 */
export function validateComprehension(comp: Comprehension, maxClauses: number): DesugarError | undefined {
  const { clauses } = comp;

  if (clauses.length > maxClauses) {
    return tooLarge(clauses.length, maxClauses);
  }

  for (let i = 0; i < clauses.length; i++) {
    const clause = clauses[i];
    if (clause.kind === "generator" || clause.kind === "alias") {
      const bad = findUnsupportedPattern(clause.pattern);
      if (bad) return unsupportedPattern(bad, i);
    }
  }

  return validateStructure(clauses, comp.yield !== undefined);
}

function validateStructure(clauses: readonly Clause[], hasYield: boolean): DesugarError | undefined {
  if (clauses.length === 0) {
    return hasYield
      ? undefined
      : malformed("comprehension has no clauses and no yield", undefined, undefined, [
          { description: "add a yield expression" },
        ]);
  }

  const first = clauses[0];
  if (first.kind === "guard") {
    return malformed("a guard cannot open a comprehension; it needs a generator to filter", 0, first.span, [
      { description: "move the guard after the generator whose values it tests" },
    ]);
  }

  const lastIndex = clauses.length - 1;
  const last = clauses[lastIndex];
  if (!hasYield && last.kind !== "exec") {
    return malformed(
      `a comprehension without yield must end with an exec clause, not ${articled(last.kind)}`,
      lastIndex,
      last.span,
      [
        { description: "yield a value", template: "yield <expr>" },
        { description: "or end with an exec clause", template: "exec <expr>" },
      ]
    );
  }

  let end = 0;
  while (end < clauses.length && clauses[end].kind === "alias") end++;
  const afterLeading = clauses[end];
  if (end > 0 && end < clauses.length && afterLeading.kind === "guard") {
    return malformed("a guard must follow a generator, not a leading alias", end, afterLeading.span, [
      { description: "introduce a generator before the guard" },
    ]);
  }

  return undefined;
}

function articled(kind: Clause["kind"]): string {
  return kind === "alias" || kind === "exec" ? `an ${kind}` : `a ${kind}`;
}
