/**
 * Rewrite Engine
 *
 * Turns a validated comprehension into map/flatMap/withFilter calls.
 *
 *   for { a <- xs; b = f(a); c <- g(b) } yield a + c
 *   ==> xs.flatMap(a => { val b = f(a); g(b).map(c => a + c) })
 *
 *   for { a <- xs; b = f(a); if b > 0 } yield a + b
 *   ==> xs.map(a => { val b = f(a); (a, b) })
 *         .withFilter { case (a, b) => b > 0 }
 *         .map { case (a, b) => a + b }
 *
 * The engine walks one flat clause array by index. A generator is handled
 * together with whatever directly follows it (aliases, guards), since those
 * decide between the plain, the continuation and the tuple shape.
 */

import type { AliasClause, Binding, Comprehension, Expr, Pattern } from "../ast";
import {
  binding,
  block,
  flatMapCall,
  ident,
  mapCall,
  ptuple,
  pvar,
  pwild,
  tuple,
  withFilterCall,
} from "../ast";
import { type NormalClause, classifyContinuation, classifyStep } from "./classify";
import { DesugarFailure, malformed } from "./errors";
import type { FreshNameSupply } from "./fresh";
import { elideRedundantMap } from "./optimize";

// =============================================================================
// Tracing
// =============================================================================

export type RewriteRule =
  | "leading-aliases"
  | "yield"
  | "final-exec"
  | "exec"
  | "elide-map"
  | "map"
  | "flatMap"
  | "alias-continuation"
  | "alias-tuple"
  | "aliases"
  | "guard";

export interface RewriteTraceEvent {
  rule: RewriteRule;
  /** Index of the clause the rule fired on; the clause count for the yield */
  index: number;
}

export type RewriteTrace = (event: RewriteTraceEvent) => void;

// =============================================================================
// Exec Rewriting
// =============================================================================

export interface NormalizedComprehension {
  clauses: NormalClause[];
  result: Expr;
}

/**
 * Replace every exec clause by a generator. A trailing exec in a comprehension
 * without yield binds a fresh name and yields it; any other exec binds a
 * wildcard. Expects a comprehension that passed validation.
 */
export function normalizeClauses(
  comp: Comprehension,
  freshNames: FreshNameSupply,
  trace?: RewriteTrace
): NormalizedComprehension {
  const clauses: NormalClause[] = [];
  let result = comp.yield;
  const lastIndex = comp.clauses.length - 1;

  comp.clauses.forEach((clause, index) => {
    if (clause.kind !== "exec") {
      clauses.push(clause);
      return;
    }

    if (index === lastIndex && result === undefined) {
      const name = freshNames.fresh();
      trace?.({ rule: "final-exec", index });
      clauses.push({ kind: "generator", pattern: pvar(name), source: clause.expr, span: clause.span });
      result = ident(name);
    } else {
      trace?.({ rule: "exec", index });
      clauses.push({ kind: "generator", pattern: pwild(), source: clause.expr, span: clause.span });
    }
  });

  if (result === undefined) {
    throw new DesugarFailure(malformed("comprehension has neither a yield nor a trailing exec clause"));
  }

  return { clauses, result };
}

// =============================================================================
// Engine
// =============================================================================

export interface RewriteContext {
  clauses: readonly NormalClause[];
  result: Expr;
  freshNames: FreshNameSupply;
  elideRedundantMap: boolean;
  trace?: RewriteTrace | undefined;
}

export function rewrite(ctx: RewriteContext): Expr {
  return new Rewriter(ctx).rewriteFrom(0, true);
}

class Rewriter {
  private readonly clauses: readonly NormalClause[];
  private readonly result: Expr;
  private readonly freshNames: FreshNameSupply;
  private readonly elide: boolean;
  private readonly trace: RewriteTrace | undefined;

  constructor(ctx: RewriteContext) {
    this.clauses = ctx.clauses;
    this.result = ctx.result;
    this.freshNames = ctx.freshNames;
    this.elide = ctx.elideRedundantMap;
    this.trace = ctx.trace;
  }

  private note(rule: RewriteRule, index: number): void {
    this.trace?.({ rule, index });
  }

  /**
   * Desugar the clauses from `index` on, outside any generator's reach.
   */
  rewriteFrom(index: number, atStart: boolean): Expr {
    const step = classifyStep(this.clauses, index, atStart);

    switch (step.kind) {
      case "end":
        this.note("yield", index);
        return this.result;

      case "leadingAliases":
      case "aliases": {
        if (step.guardFollows) {
          throw new DesugarFailure(
            malformed("a guard must follow a generator, not an alias run", step.end, this.clauses[step.end].span)
          );
        }
        this.note(step.kind === "aliases" ? "aliases" : "leading-aliases", index);
        return block(bindingsOf(step.aliases), this.rewriteFrom(step.end, false));
      }

      case "generator":
        return this.bindFrom(step.clause.pattern, step.clause.source, index, index + 1);

      case "guard":
        throw new DesugarFailure(malformed("a guard must follow a generator", index, step.clause.span));
    }
  }

  /**
   * Desugar a generator `pattern <- source` (found at `origin`) together with
   * the clauses from `index` on.
   */
  private bindFrom(pattern: Pattern, source: Expr, origin: number, index: number): Expr {
    const next = classifyContinuation(this.clauses, index);

    switch (next.kind) {
      case "yield":
        if (next.aliases.length === 0) {
          const mapped = elideRedundantMap(source, pattern, this.result, this.elide);
          this.note(mapped === source ? "elide-map" : "map", origin);
          return mapped;
        }
        this.note("alias-continuation", origin);
        return flatMapCall(source, pattern, this.rewriteFrom(index, false));

      case "clause":
        this.note(next.aliases.length === 0 ? "flatMap" : "alias-continuation", origin);
        return flatMapCall(source, pattern, this.rewriteFrom(index, false));

      case "guard": {
        let bound = { pattern, source };
        if (next.aliases.length > 0) {
          this.note("alias-tuple", origin);
          bound = this.tupleGenerator(pattern, source, next.aliases);
        }

        let filtered = bound.source;
        next.guards.forEach((clause, offset) => {
          this.note("guard", next.aliasEnd + offset);
          filtered = withFilterCall(filtered, bound.pattern, clause.condition);
        });

        return this.bindFrom(bound.pattern, filtered, origin, next.guardEnd);
      }
    }
  }

  /**
   * `P <- G; P1 = E1; ...; PN = EN` as one generator over a tuple, so that a
   * following guard sees every name through a single lambda parameter:
   *
   *   (P, P1, ..., PN) <- G.map(x => { val x1 = E1; ...; (x, x1, ..., xN) })
   *
   * Wildcards are given fresh names inside the map so each slot has a value.
   */
  private tupleGenerator(
    pattern: Pattern,
    source: Expr,
    aliases: readonly AliasClause[]
  ): { pattern: Pattern; source: Expr } {
    const head = this.addressable(pattern);
    const parts = aliases.map((clause) => ({ ...this.addressable(clause.pattern), value: clause.value }));

    const body = block(
      parts.map((part) => binding(part.pattern, part.value)),
      tuple(head.expr, ...parts.map((part) => part.expr))
    );

    return {
      pattern: ptuple(pattern, ...aliases.map((clause) => clause.pattern)),
      source: mapCall(source, head.pattern, body),
    };
  }

  /**
   * `pattern` with wildcards replaced by fresh names, and the expression
   * rebuilding its value.
   */
  private addressable(pattern: Pattern): { pattern: Pattern; expr: Expr } {
    switch (pattern.kind) {
      case "wildcard": {
        const name = this.freshNames.fresh();
        return { pattern: pvar(name), expr: ident(name) };
      }
      case "ident":
        return { pattern, expr: ident(pattern.name) };
      case "tuple": {
        const elements = pattern.elements.map((element) => this.addressable(element));
        return {
          pattern: ptuple(...elements.map((e) => e.pattern)),
          expr: tuple(...elements.map((e) => e.expr)),
        };
      }
    }
  }
}

function bindingsOf(aliases: readonly AliasClause[]): Binding[] {
  return aliases.map((clause) => binding(clause.pattern, clause.value));
}
