/**
 * Driver tests: JSON input through to a report.
 */

import { describe, test, expect } from "vitest";
import { countNodes, desugarSource } from "../../src/driver";
import { ident, lit, mapCall, pvar, withFilterCall, flatMapCall, block, binding } from "../../src/ast";
import { sourceFromString } from "../../src/utils/source";
import { syntheticSpan } from "../../src/utils/span";

const filtered = JSON.stringify({
  kind: "comprehension",
  clauses: [
    { kind: "generator", pattern: "a", source: "xs" },
    { kind: "guard", condition: "a > 0" },
  ],
  yield: { kind: "ident", name: "a" },
});

describe("desugarSource", () => {
  test("successful run", () => {
    const { report, tree } = desugarSource(sourceFromString("q.json", filtered));
    expect(report.status).toBe("success");
    expect(report.file).toBe("q.json");
    expect(report.input).toBe("for { a <- xs; if a > 0 } yield a");
    expect(report.output).toBe("xs.withFilter(a => a > 0)");
    expect(report.diagnostics).toEqual([]);
    expect(report.stats).toMatchObject({ clauses: 2, maps: 0, flatMaps: 0, withFilters: 1, blocks: 0 });
    expect(tree?.kind).toBe("withFilter");
  });

  test("options reach the desugarer", () => {
    const { report } = desugarSource(sourceFromString("q.json", filtered), {
      desugar: { elideRedundantMap: false },
    });
    expect(report.output).toBe("xs.withFilter(a => a > 0).map(a => a)");
    expect(report.stats.maps).toBe(1);
  });

  test("input errors become diagnostics", () => {
    const json = JSON.stringify({ kind: "comprehension", clauses: [{ kind: "gaurd", condition: "x" }] });
    const { report, tree } = desugarSource(sourceFromString("q.json", json));
    expect(report.status).toBe("error");
    expect(tree).toBeUndefined();
    expect(report.input).toBeUndefined();
    expect(report.output).toBeUndefined();
    expect(report.stats.clauses).toBe(0);
    expect(report.diagnostics).toHaveLength(1);
    expect(report.diagnostics[0]).toMatchObject({
      code: "E0002",
      severity: "error",
      location: syntheticSpan("q.json"),
      structured: { kind: "input", path: "$.clauses[0].kind" },
      hints: [{ description: "did you mean 'guard'?" }],
    });
  });

  test("desugaring errors become diagnostics", () => {
    const json = JSON.stringify({
      kind: "comprehension",
      clauses: [
        { kind: "guard", condition: "ok" },
        { kind: "generator", pattern: "a", source: "xs" },
      ],
      yield: "a",
    });
    const { report } = desugarSource(sourceFromString("q.json", json));
    expect(report.status).toBe("error");
    expect(report.input).toBe("for { if ok; a <- xs } yield a");
    expect(report.output).toBeUndefined();
    expect(report.diagnostics.map((d) => [d.code, d.structured.clauseIndex])).toEqual([["E1001", 0]]);
  });

  test("warnings fail only in strict mode", () => {
    const json = JSON.stringify({
      kind: "comprehension",
      clauses: [{ kind: "generator", pattern: "a", source: "xs", note: "ignored" }],
      yield: 1,
    });
    const relaxed = desugarSource(sourceFromString("q.json", json));
    expect(relaxed.report.status).toBe("success");
    expect(relaxed.report.output).toBe("xs.map(a => 1)");
    expect(relaxed.report.diagnostics.map((d) => d.code)).toEqual(["W0001"]);

    const strict = desugarSource(sourceFromString("q.json", json), { strict: true });
    expect(strict.report.status).toBe("error");
    expect(strict.report.output).toBeUndefined();
  });

  test("chain layout", () => {
    const json = JSON.stringify({
      kind: "comprehension",
      clauses: [
        { kind: "generator", pattern: "a", source: "xs" },
        { kind: "guard", condition: "p(a)" },
      ],
      yield: "a + 1",
    });
    const { report } = desugarSource(sourceFromString("q.json", json), { unparse: { layout: "chain" } });
    expect(report.output).toBe("xs.withFilter(a => p(a))\n  .map(a => a + 1)");
  });
});

describe("countNodes", () => {
  test("counts combinators and blocks", () => {
    const tree = flatMapCall(
      withFilterCall(ident("xs"), pvar("a"), ident("a")),
      pvar("a"),
      block([binding(pvar("b"), lit(1))], mapCall(ident("ys"), pvar("c"), ident("b")))
    );
    expect(countNodes(tree)).toEqual({ maps: 1, flatMaps: 1, withFilters: 1, blocks: 1 });
  });

  test("nothing to count", () => {
    expect(countNodes(undefined)).toEqual({ maps: 0, flatMaps: 0, withFilters: 0, blocks: 0 });
  });
});
