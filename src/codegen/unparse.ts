/**
 * Term to source text unparser
 *
 * Renders desugared trees as method-call style combinator calls and comprehensions
 * in their surface form:
 *
 *   for { a <- xs; b = a; if b > 1 } yield a + b
 *   xs.map(a => { val b = a; (a, b) }).withFilter { case (a, b) => b > 1 }.map { case (a, b) => a + b }
 */

import type { Binding, BinaryOp, Clause, Comprehension, Expr, Pattern } from "../ast";
import { isCombinatorCall } from "../ast";

// =============================================================================
// Options
// =============================================================================

export interface UnparseOptions {
  /**
   * "inline" keeps everything on one line (default); "chain" starts every
   * call of a combinator chain on its own line.
   */
  layout?: "inline" | "chain";
  /** Indentation string for the chain layout (default: "  " - 2 spaces) */
  indent?: string;
}

interface ResolvedOptions {
  layout: "inline" | "chain";
  indent: string;
}

// =============================================================================
// Operator Precedence (for minimal parenthesization)
// =============================================================================

const PRECEDENCE: Record<BinaryOp, number> = {
  "||": 1,
  "&&": 2,
  "==": 3,
  "!=": 3,
  "<": 4,
  ">": 4,
  "<=": 4,
  ">=": 4,
  "++": 5,
  "+": 6,
  "-": 6,
  "*": 7,
  "/": 7,
  "%": 7,
};

const UNARY_PRECEDENCE = 8;
/** Atoms, calls and method chains */
const POSTFIX_PRECEDENCE = 9;

const SIMPLE_RAW_HEAD = /^[\w$]+(\.[\w$]+)*/;

/**
 * Whether raw text is a name, a path or a single call on one, which can take
 * a method call without parentheses. Anything else is opaque.
 */
function isSimpleRaw(text: string): boolean {
  const head = SIMPLE_RAW_HEAD.exec(text);
  if (!head) {
    return false;
  }
  const rest = text.slice(head[0].length);
  if (rest === "") {
    return true;
  }
  if (!rest.startsWith("(") || !rest.endsWith(")")) {
    return false;
  }
  // The opening paren must close only at the very end
  let depth = 0;
  for (let i = 0; i < rest.length; i++) {
    if (rest[i] === "(") {
      depth++;
    } else if (rest[i] === ")") {
      depth--;
      if (depth === 0 && i < rest.length - 1) {
        return false;
      }
    }
  }
  return depth === 0;
}

function precedenceOf(expr: Expr): number {
  switch (expr.kind) {
    case "binary":
      return PRECEDENCE[expr.op];
    case "unary":
      return UNARY_PRECEDENCE;
    case "block":
      return 0;
    case "raw":
      return isSimpleRaw(expr.text) ? POSTFIX_PRECEDENCE : 0;
    default:
      return POSTFIX_PRECEDENCE;
  }
}

// =============================================================================
// Unparser Class
// =============================================================================

class TermUnparser {
  private options: ResolvedOptions;

  constructor(options: UnparseOptions = {}) {
    this.options = {
      layout: options.layout ?? "inline",
      indent: options.indent ?? "  ",
    };
  }

  expr(expr: Expr, depth: number): string {
    switch (expr.kind) {
      case "ident":
        return expr.name;

      case "literal":
        return typeof expr.value === "string" ? JSON.stringify(expr.value) : String(expr.value);

      case "raw":
        return expr.text;

      case "tuple":
        return `(${expr.elements.map((e) => this.expr(e, depth)).join(", ")})`;

      case "call": {
        const args = expr.args.map((e) => this.expr(e, depth)).join(", ");
        return `${this.operand(expr.callee, POSTFIX_PRECEDENCE, depth)}(${args})`;
      }

      case "binary": {
        const prec = PRECEDENCE[expr.op];
        // Left-associative: an equal-precedence right operand needs parens
        const left = this.operand(expr.left, prec, depth);
        const right = this.operand(expr.right, prec + 1, depth);
        return `${left} ${expr.op} ${right}`;
      }

      case "unary":
        return `${expr.op}${this.operand(expr.operand, UNARY_PRECEDENCE, depth)}`;

      case "block": {
        const parts = expr.bindings.map((b) => this.binding(b, depth));
        parts.push(this.expr(expr.result, depth));
        return `{ ${parts.join("; ")} }`;
      }

      case "map":
      case "flatMap":
        return this.combinator(expr.kind, expr.source, expr.pattern, expr.body, depth);

      case "withFilter":
        return this.combinator(expr.kind, expr.source, expr.pattern, expr.predicate, depth);
    }
  }

  private operand(expr: Expr, minPrecedence: number, depth: number): string {
    const text = this.expr(expr, depth);
    return precedenceOf(expr) < minPrecedence ? `(${text})` : text;
  }

  private combinator(name: string, source: Expr, pattern: Pattern, body: Expr, depth: number): string {
    const receiver = this.operand(source, POSTFIX_PRECEDENCE, depth);
    const separator =
      this.options.layout === "chain" && isCombinatorCall(source)
        ? `\n${this.options.indent.repeat(depth + 1)}`
        : "";
    return `${receiver}${separator}.${name}${this.lambda(pattern, body, depth + 1)}`;
  }

  /**
   * `(x => body)`, or `{ case (a, b) => body }` for tuple patterns.
   */
  private lambda(pattern: Pattern, body: Expr, depth: number): string {
    const text = this.expr(body, depth);
    if (pattern.kind === "tuple") {
      return ` { case ${unparsePattern(pattern)} => ${text} }`;
    }
    return `(${unparsePattern(pattern)} => ${text})`;
  }

  binding(b: Binding, depth: number): string {
    return `val ${unparsePattern(b.pattern)} = ${this.expr(b.value, depth)}`;
  }

  clause(clause: Clause): string {
    switch (clause.kind) {
      case "generator":
        return `${unparsePattern(clause.pattern)} <- ${this.expr(clause.source, 0)}`;
      case "alias":
        return `${unparsePattern(clause.pattern)} = ${this.expr(clause.value, 0)}`;
      case "guard":
        return `if ${this.expr(clause.condition, 0)}`;
      case "exec":
        return `exec ${this.expr(clause.expr, 0)}`;
    }
  }
}

// =============================================================================
// Public API
// =============================================================================

export function unparsePattern(pattern: Pattern): string {
  switch (pattern.kind) {
    case "wildcard":
      return "_";
    case "ident":
      return pattern.name;
    case "tuple":
      return `(${pattern.elements.map(unparsePattern).join(", ")})`;
  }
}

/**
 * Render an expression, including desugared combinator trees.
 */
export function unparse(expr: Expr, options: UnparseOptions = {}): string {
  return new TermUnparser(options).expr(expr, 0);
}

/**
 * Render a comprehension in surface syntax.
 */
export function unparseComprehension(comp: Comprehension): string {
  const unparser = new TermUnparser();
  const clauses = comp.clauses.map((c) => unparser.clause(c)).join("; ");
  const head = clauses.length > 0 ? `for { ${clauses} }` : "for {}";
  return comp.yield ? `${head} yield ${unparser.expr(comp.yield, 0)}` : head;
}
