/**
 * JSON deserialization tests.
 */

import { describe, test, expect } from "vitest";
import {
  alias,
  binary,
  comprehension,
  generator,
  guard,
  ident,
  lit,
  ptuple,
  pvar,
  pwild,
  raw,
} from "../../src/ast";
import { deserializeComprehension } from "../../src/ast-json";

function clausesJson(...clauses: unknown[]): string {
  return JSON.stringify({ kind: "comprehension", clauses, yield: { kind: "ident", name: "a" } });
}

describe("deserializeComprehension", () => {
  describe("valid input", () => {
    test("reads clauses, shorthands and the yield", () => {
      const json = JSON.stringify({
        kind: "comprehension",
        clauses: [
          { kind: "generator", pattern: "a", source: "xs" },
          { kind: "alias", pattern: "_", value: { source: "log(a)" } },
          {
            kind: "guard",
            condition: { kind: "binary", op: ">", left: { kind: "ident", name: "a" }, right: 0 },
          },
        ],
        yield: { kind: "ident", name: "a" },
      });

      const result = deserializeComprehension(json);

      expect(result.ok).toBe(true);
      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
      expect(result.value).toEqual(
        comprehension(
          [
            generator(pvar("a"), raw("xs")),
            alias(pwild(), raw("log(a)")),
            guard(binary(">", ident("a"), lit(0))),
          ],
          ident("a")
        )
      );
    });

    test("reads tuple patterns and literals", () => {
      const json = clausesJson({
        kind: "generator",
        pattern: { kind: "tuple", elements: ["k", { kind: "wildcard" }] },
        source: { kind: "literal", value: "abc" },
      });
      const result = deserializeComprehension(json);
      expect(result.value?.clauses).toEqual([generator(ptuple(pvar("k"), pwild()), lit("abc"))]);
    });

    test("comprehension without yield", () => {
      const result = deserializeComprehension({
        kind: "comprehension",
        clauses: [{ kind: "exec", expr: true }],
      });
      expect(result.ok).toBe(true);
      expect(result.value?.yield).toBeUndefined();
      expect(result.value?.clauses).toEqual([{ kind: "exec", expr: lit(true) }]);
    });

    test("spans default their end and file", () => {
      const json = clausesJson({
        kind: "generator",
        pattern: "a",
        source: "xs",
        span: { start: { line: 2, column: 3 } },
      });
      const result = deserializeComprehension(json, { file: "query.json" });
      expect(result.value?.clauses[0]?.span).toEqual({
        file: "query.json",
        start: { line: 2, column: 3, offset: 0 },
        end: { line: 2, column: 3, offset: 0 },
      });
    });

    test("unknown fields are warnings with suggestions", () => {
      const json = clausesJson({ kind: "generator", pattern: "a", source: "xs", sorce: "ys" });
      const result = deserializeComprehension(json);
      expect(result.ok).toBe(true);
      expect(result.warnings).toEqual([
        {
          code: "W0001",
          message: 'Unknown field "sorce" ignored',
          path: "$.clauses[0].sorce",
          hint: "did you mean 'source'?",
        },
      ]);
    });
  });

  describe("invalid input", () => {
    test("malformed JSON", () => {
      const result = deserializeComprehension("{");
      expect(result.ok).toBe(false);
      expect(result.value).toBeUndefined();
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.code).toBe("E0001");
      expect(result.errors[0]?.path).toBe("$");
      expect(result.errors[0]?.message.startsWith("JSON parse error: ")).toBe(true);
    });

    test("root that is not an object", () => {
      const result = deserializeComprehension("[]");
      expect(result.errors).toEqual([
        { code: "E0004", message: "Expected comprehension object, got array", path: "$", hint: undefined },
      ]);
    });

    test("misspelled clause kind", () => {
      const result = deserializeComprehension(clausesJson({ kind: "generater", pattern: "a", source: "xs" }));
      expect(result.ok).toBe(false);
      expect(result.errors).toEqual([
        {
          code: "E0002",
          message: 'Unknown kind "generater"; expected one of "generator", "alias", "guard", "exec"',
          path: "$.clauses[0].kind",
          hint: "did you mean 'generator'?",
        },
      ]);
    });

    test("unknown pattern kind is an unsupported pattern", () => {
      const result = deserializeComprehension(
        clausesJson({ kind: "generator", pattern: { kind: "list", elements: [] }, source: "xs" })
      );
      expect(result.errors.map((e) => [e.code, e.path])).toEqual([["E1003", "$.clauses[0].pattern.kind"]]);
    });

    test("missing field", () => {
      const result = deserializeComprehension(clausesJson({ kind: "generator", pattern: "a" }));
      expect(result.errors).toEqual([
        { code: "E0003", message: 'Missing field "source"', path: "$.clauses[0].source", hint: undefined },
      ]);
    });

    test("missing clauses", () => {
      const result = deserializeComprehension({ kind: "comprehension" });
      expect(result.errors.map((e) => e.path)).toEqual(["$.clauses"]);
    });

    test("unknown operator", () => {
      const result = deserializeComprehension({
        kind: "comprehension",
        clauses: [],
        yield: { kind: "binary", op: "**", left: 1, right: 2 },
      });
      expect(result.errors).toEqual([
        { code: "E0004", message: 'Unknown operator "**"', path: "$.yield.op", hint: undefined },
      ]);
    });

    test("pattern string that is not an identifier", () => {
      const result = deserializeComprehension(clausesJson({ kind: "generator", pattern: "1a", source: "xs" }));
      expect(result.errors).toEqual([
        {
          code: "E0004",
          message: '"1a" is not an identifier pattern',
          path: "$.clauses[0].pattern",
          hint: undefined,
        },
      ]);
    });

    test("reports every problem in one pass", () => {
      const result = deserializeComprehension(
        clausesJson(
          { kind: "generator", pattern: "a" },
          { kind: "guard", condition: null },
          { kind: "exec", expr: { kind: "literal", value: [] } }
        )
      );
      expect(result.errors.map((e) => e.path)).toEqual([
        "$.clauses[0].source",
        "$.clauses[1].condition",
        "$.clauses[2].expr.value",
      ]);
    });
  });
});
