/**
 * Desugar Driver
 *
 * Runs one JSON comprehension description through deserialization and
 * desugaring and collects the outcome as a report. The CLI is a thin layer
 * over this.
 */

import type { Comprehension, Expr } from "./ast";
import { deserializeComprehension } from "./ast-json";
import { unparse, unparseComprehension, type UnparseOptions } from "./codegen";
import { desugar, reportDesugarError, type DesugarOptions } from "./desugar";
import { DiagnosticCollector, type DesugarReport, type DesugarStats } from "./diagnostics";
import type { SourceFile } from "./utils/source";
import { syntheticSpan } from "./utils/span";

export interface DriverOptions {
  desugar?: DesugarOptions;
  unparse?: UnparseOptions;
  /** Treat warnings as errors */
  strict?: boolean;
}

export interface DriverResult {
  report: DesugarReport;
  comprehension?: Comprehension | undefined;
  tree?: Expr | undefined;
}

export function desugarSource(source: SourceFile, options: DriverOptions = {}): DriverResult {
  const startTime = performance.now();
  const collector = new DiagnosticCollector();
  const file = source.name;

  const parsed = deserializeComprehension(source.content, { file });
  for (const problem of [...parsed.errors, ...parsed.warnings]) {
    collector.report(
      problem.code,
      problem.message,
      syntheticSpan(file),
      { kind: "input", path: problem.path },
      problem.hint ? [{ description: problem.hint }] : []
    );
  }

  const comp = parsed.value;
  let tree: Expr | undefined;

  if (comp) {
    const result = desugar(comp, options.desugar);
    if (result.ok) {
      tree = result.value;
    } else {
      reportDesugarError(collector, result.error, file);
    }
  }

  const failed = collector.hasErrors() || (options.strict === true && collector.count() > 0);
  const output = tree && !failed ? tree : undefined;

  const report: DesugarReport = {
    status: failed ? "error" : "success",
    file,
    input: comp ? unparseComprehension(comp) : undefined,
    output: output ? unparse(output, options.unparse) : undefined,
    diagnostics: collector.sorted(),
    stats: {
      ...countNodes(output),
      clauses: comp ? comp.clauses.length : 0,
      timeMs: performance.now() - startTime,
    },
  };

  return { report, comprehension: comp, tree: output };
}

/**
 * Combinator and block counts of a desugared tree.
 */
export function countNodes(expr: Expr | undefined): Omit<DesugarStats, "clauses" | "timeMs"> {
  const counts = { maps: 0, flatMaps: 0, withFilters: 0, blocks: 0 };

  const visit = (e: Expr): void => {
    switch (e.kind) {
      case "ident":
      case "literal":
      case "raw":
        return;
      case "tuple":
        e.elements.forEach(visit);
        return;
      case "call":
        visit(e.callee);
        e.args.forEach(visit);
        return;
      case "binary":
        visit(e.left);
        visit(e.right);
        return;
      case "unary":
        visit(e.operand);
        return;
      case "block":
        counts.blocks++;
        e.bindings.forEach((b) => visit(b.value));
        visit(e.result);
        return;
      case "map":
        counts.maps++;
        visit(e.source);
        visit(e.body);
        return;
      case "flatMap":
        counts.flatMaps++;
        visit(e.source);
        visit(e.body);
        return;
      case "withFilter":
        counts.withFilters++;
        visit(e.source);
        visit(e.predicate);
        return;
    }
  };

  if (expr) visit(expr);
  return counts;
}
