/**
 * JSON serialization tests.
 */

import { describe, test, expect } from "vitest";
import {
  alias,
  binary,
  block,
  binding,
  comprehension,
  exec,
  generator,
  guard,
  ident,
  lit,
  mapCall,
  ptuple,
  pvar,
  pwild,
  raw,
  withFilterCall,
} from "../../src/ast";
import {
  comprehensionToJson,
  deserializeComprehension,
  exprToJson,
  patternToJson,
  serializeComprehension,
  serializeExpr,
} from "../../src/ast-json";
import { position, span } from "../../src/utils/span";

describe("exprToJson", () => {
  test("raw fragments become source objects", () => {
    expect(exprToJson(raw("a.b"))).toEqual({ source: "a.b" });
  });

  test("combinator calls keep their structure", () => {
    const tree = mapCall(
      withFilterCall(ident("xs"), pvar("a"), binary(">", ident("a"), lit(0))),
      pwild(),
      block([binding(pvar("b"), lit(1))], ident("b"))
    );
    expect(exprToJson(tree)).toEqual({
      kind: "map",
      source: {
        kind: "withFilter",
        source: { kind: "ident", name: "xs" },
        pattern: { kind: "ident", name: "a" },
        predicate: {
          kind: "binary",
          op: ">",
          left: { kind: "ident", name: "a" },
          right: { kind: "literal", value: 0 },
        },
      },
      pattern: { kind: "wildcard" },
      body: {
        kind: "block",
        bindings: [{ pattern: { kind: "ident", name: "b" }, value: { kind: "literal", value: 1 } }],
        result: { kind: "ident", name: "b" },
      },
    });
  });
});

describe("patternToJson", () => {
  test("nested tuple", () => {
    expect(patternToJson(ptuple(pvar("a"), pwild()))).toEqual({
      kind: "tuple",
      elements: [{ kind: "ident", name: "a" }, { kind: "wildcard" }],
    });
  });
});

describe("serializeExpr", () => {
  test("compact output", () => {
    expect(serializeExpr(ident("a"), { pretty: false })).toBe('{"kind":"ident","name":"a"}');
  });

  test("pretty output by default", () => {
    expect(serializeExpr(lit(1))).toBe('{\n  "kind": "literal",\n  "value": 1\n}');
  });

  test("spans only when asked", () => {
    const at = span("q.json", position(1, 2, 1), position(1, 3, 2));
    const node = { kind: "ident" as const, name: "a", span: at };
    expect(serializeExpr(node, { pretty: false })).toBe('{"kind":"ident","name":"a"}');
    expect(serializeExpr(node, { pretty: false, includeSpans: true })).toBe(
      '{"kind":"ident","name":"a","span":{"file":"q.json","start":{"line":1,"column":2,"offset":1},"end":{"line":1,"column":3,"offset":2}}}'
    );
  });
});

describe("comprehensionToJson", () => {
  test("omits a missing yield", () => {
    const json = comprehensionToJson(comprehension([exec(ident("e"))]));
    expect(json).toEqual({ kind: "comprehension", clauses: [{ kind: "exec", expr: { kind: "ident", name: "e" } }] });
    expect("yield" in json).toBe(false);
  });

  test("reads back as the same comprehension", () => {
    const comp = comprehension(
      [
        generator(ptuple(pvar("k"), pwild()), raw("pairs")),
        alias(pvar("w"), binary("++", ident("k"), lit("!"))),
        guard(ident("w")),
        exec(raw("flush()")),
      ],
      ident("w")
    );
    const result = deserializeComprehension(serializeComprehension(comp));
    expect(result.errors).toEqual([]);
    expect(result.value).toEqual(comp);
  });
});
