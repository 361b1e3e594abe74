/**
 * Comprehension Desugaring Module
 *
 * Rewrites for-comprehensions into map/flatMap/withFilter chains:
 * 1. Validation (clause classifier)
 * 2. Exec clauses become generators
 * 3. Rule-driven rewriting over the flat clause array
 * 4. Redundant-map elision at the last generator
 */

export { desugar, DEFAULT_MAX_CLAUSES, type DesugarOptions, type DesugarResult } from "./desugar";
export { validateComprehension, classifyStep, classifyContinuation } from "./classify";
export type { NormalClause, StepShape, Continuation } from "./classify";
export { elideRedundantMap } from "./optimize";
export { normalizeClauses, rewrite } from "./rewrite";
export type { RewriteRule, RewriteTrace, RewriteTraceEvent, RewriteContext } from "./rewrite";
export { createFreshNameSupply, DEFAULT_FRESH_PREFIX } from "./fresh";
export type { FreshNameSupply } from "./fresh";
export { DesugarFailure, reportDesugarError } from "./errors";
export type { DesugarError, DesugarErrorKind } from "./errors";
