/**
 * Unparser tests.
 */

import { describe, test, expect } from "vitest";
import {
  alias,
  binary,
  block,
  binding,
  call,
  comprehension,
  exec,
  flatMapCall,
  generator,
  guard,
  ident,
  lit,
  mapCall,
  ptuple,
  pvar,
  pwild,
  raw,
  tuple,
  unary,
  withFilterCall,
} from "../../src/ast";
import { unparse, unparseComprehension, unparsePattern } from "../../src/codegen";

const a = ident("a");
const b = ident("b");
const c = ident("c");

describe("unparse", () => {
  describe("host expressions", () => {
    test("literals", () => {
      expect(unparse(lit(3))).toBe("3");
      expect(unparse(lit(true))).toBe("true");
      expect(unparse(lit('say "hi"'))).toBe('"say \\"hi\\""');
    });

    test("raw text is printed verbatim", () => {
      expect(unparse(raw("row.id * 2"))).toBe("row.id * 2");
    });

    test("raw operators are parenthesized as receivers and operands", () => {
      expect(unparse(mapCall(raw("xs ++ ys"), pvar("x"), binary("+", ident("x"), lit(1))))).toBe(
        "(xs ++ ys).map(x => x + 1)"
      );
      expect(unparse(binary("*", raw("a + b"), c))).toBe("(a + b) * c");
      expect(unparse(unary("-", raw("f(a) + g(b)")))).toBe("-(f(a) + g(b))");
    });

    test("raw names, paths and calls stay bare as receivers", () => {
      expect(unparse(mapCall(raw("db.rows"), pvar("r"), ident("r.id")))).toBe("db.rows.map(r => r.id)");
      expect(unparse(mapCall(raw("db.query(sql, (a))"), pvar("r"), lit(1)))).toBe("db.query(sql, (a)).map(r => 1)");
      expect(unparse(mapCall(raw("f(a)(b)"), pvar("r"), lit(1)))).toBe("(f(a)(b)).map(r => 1)");
    });

    test("calls and tuples", () => {
      expect(unparse(call("f", a, lit(1)))).toBe("f(a, 1)");
      expect(unparse(call("g"))).toBe("g()");
      expect(unparse(tuple(a, tuple(b, c)))).toBe("(a, (b, c))");
    });

    test("binary operators parenthesize by precedence", () => {
      expect(unparse(binary("*", binary("+", a, b), c))).toBe("(a + b) * c");
      expect(unparse(binary("+", a, binary("*", b, c)))).toBe("a + b * c");
      expect(unparse(binary("||", binary("&&", a, b), c))).toBe("a && b || c");
      expect(unparse(binary("&&", a, binary("||", b, c)))).toBe("a && (b || c)");
    });

    test("left-associative operators parenthesize the right operand", () => {
      expect(unparse(binary("-", binary("-", a, b), c))).toBe("a - b - c");
      expect(unparse(binary("-", a, binary("-", b, c)))).toBe("a - (b - c)");
    });

    test("unary operators", () => {
      expect(unparse(unary("-", a))).toBe("-a");
      expect(unparse(unary("!", binary("&&", a, b)))).toBe("!(a && b)");
      expect(unparse(unary("!", call("p", a)))).toBe("!p(a)");
    });

    test("blocks", () => {
      expect(unparse(block([binding(pvar("a"), lit(1)), binding(pwild(), call("log", a))], a))).toBe(
        "{ val a = 1; val _ = log(a); a }"
      );
    });
  });

  describe("combinator calls", () => {
    test("simple lambda", () => {
      expect(unparse(mapCall(ident("xs"), pvar("x"), binary("+", ident("x"), lit(1))))).toBe("xs.map(x => x + 1)");
    });

    test("tuple patterns use a case lambda", () => {
      expect(unparse(withFilterCall(ident("ps"), ptuple(pvar("a"), pwild()), a))).toBe(
        "ps.withFilter { case (a, _) => a }"
      );
    });

    test("receivers below postfix precedence are parenthesized", () => {
      expect(unparse(mapCall(binary("++", ident("xs"), ident("ys")), pvar("x"), ident("x")))).toBe(
        "(xs ++ ys).map(x => x)"
      );
      expect(unparse(flatMapCall(block([], ident("xs")), pvar("x"), ident("ys")))).toBe(
        "({ xs }).flatMap(x => ys)"
      );
    });

    test("chain layout breaks before chained calls", () => {
      const tree = mapCall(
        withFilterCall(
          mapCall(ident("G"), pvar("a"), block([binding(pvar("b"), a)], tuple(a, b))),
          ptuple(pvar("a"), pvar("b")),
          binary(">", b, lit(1))
        ),
        ptuple(pvar("a"), pvar("b")),
        binary("+", a, b)
      );
      expect(unparse(tree, { layout: "chain" })).toBe(
        "G.map(a => { val b = a; (a, b) })\n  .withFilter { case (a, b) => b > 1 }\n  .map { case (a, b) => a + b }"
      );
    });

    test("chain layout indents nested chains deeper", () => {
      const tree = flatMapCall(
        ident("xs"),
        pvar("a"),
        mapCall(withFilterCall(ident("ys"), pvar("b"), call("p", b)), pvar("b"), binary("+", a, b))
      );
      expect(unparse(tree, { layout: "chain", indent: "  " })).toBe(
        "xs.flatMap(a => ys.withFilter(b => p(b))\n    .map(b => a + b))"
      );
    });

    test("inline layout keeps one line", () => {
      const tree = mapCall(withFilterCall(ident("xs"), pvar("a"), a), pvar("a"), a);
      expect(unparse(tree)).toBe("xs.withFilter(a => a).map(a => a)");
    });
  });
});

describe("unparsePattern", () => {
  test("all pattern forms", () => {
    expect(unparsePattern(pwild())).toBe("_");
    expect(unparsePattern(pvar("a"))).toBe("a");
    expect(unparsePattern(ptuple(pvar("a"), ptuple(pwild(), pvar("b"))))).toBe("(a, (_, b))");
  });
});

describe("unparseComprehension", () => {
  test("every clause form", () => {
    const comp = comprehension(
      [
        generator(ptuple(pvar("k"), pvar("v")), ident("m")),
        alias(pvar("w"), call("f", ident("v"))),
        guard(binary(">", ident("w"), lit(1))),
        exec(call("log", ident("w"))),
      ],
      binary("+", ident("k"), ident("w"))
    );
    expect(unparseComprehension(comp)).toBe(
      "for { (k, v) <- m; w = f(v); if w > 1; exec log(w) } yield k + w"
    );
  });

  test("no clauses", () => {
    expect(unparseComprehension(comprehension([], lit(1)))).toBe("for {} yield 1");
  });

  test("no yield", () => {
    expect(unparseComprehension(comprehension([exec(ident("e"))]))).toBe("for { exec e }");
  });
});
