/**
 * Desugar Entry Point
 *
 * Ties together validation, exec rewriting, the rewrite engine
 * and redundant-map elision. `desugar` is synchronous and keeps no state
 * between calls; every call gets its own fresh-name supply unless one is
 * injected.
 */

import type { Comprehension, Expr } from "../ast";
import { comprehensionNames } from "../ast";
import { validateComprehension } from "./classify";
import { type DesugarError, DesugarFailure } from "./errors";
import { type FreshNameSupply, createFreshNameSupply } from "./fresh";
import { type RewriteTrace, normalizeClauses, rewrite } from "./rewrite";

// =============================================================================
// Types
// =============================================================================

export interface DesugarOptions {
  /** Reject comprehensions with more clauses than this (default: 1000) */
  maxClauses?: number;
  /** Source of synthetic names (default: `x$1`, `x$2`, ... avoiding names in use) */
  freshNames?: FreshNameSupply;
  /** Drop a final `map` that rebuilds its own binding (default: true) */
  elideRedundantMap?: boolean;
  /** Called for every rule application, in order */
  trace?: RewriteTrace;
}

export type DesugarResult =
  | { ok: true; value: Expr }
  | { ok: false; error: DesugarError };

export const DEFAULT_MAX_CLAUSES = 1000;

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Desugar a comprehension into combinator calls.
 *
 * Fails with `MalformedComprehension`, `ComprehensionTooLarge` or
 * `UnsupportedPattern`; on failure nothing else is returned.
 */
export function desugar(comp: Comprehension, options: DesugarOptions = {}): DesugarResult {
  const invalid = validateComprehension(comp, options.maxClauses ?? DEFAULT_MAX_CLAUSES);
  if (invalid) {
    return { ok: false, error: invalid };
  }

  const freshNames = options.freshNames ?? createFreshNameSupply(comprehensionNames(comp));

  try {
    const { clauses, result } = normalizeClauses(comp, freshNames, options.trace);
    const value = rewrite({
      clauses,
      result,
      freshNames,
      elideRedundantMap: options.elideRedundantMap ?? true,
      trace: options.trace,
    });
    return { ok: true, value };
  } catch (e) {
    if (e instanceof DesugarFailure) {
      return { ok: false, error: e.error };
    }
    throw e;
  }
}
