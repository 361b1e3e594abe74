/**
 * AST Deserialization
 *
 * Converts a JSON comprehension description into the term model. Input is
 * checked node by node; every problem is reported with the JSON path where
 * it occurred, and reading continues so that one pass shows all of them.
 */

import type { Binding, BinaryOp, Clause, Comprehension, Expr, Pattern, UnaryOp } from "../ast";
import { BINARY_OPS, CLAUSE_KINDS, UNARY_OPS } from "../ast";
import { ErrorCode, type ErrorCodeType } from "../diagnostics/codes";
import { suggestName } from "../utils/similarity";
import { type Position, type SourceSpan, position, span } from "../utils/span";
import { isRecord, isSourceFragment } from "./schema";

// =============================================================================
// Error Type
// =============================================================================

export interface DeserializeError {
  code: ErrorCodeType;
  message: string;
  /** JSON path where the problem occurred */
  path: string;
  /** "did you mean ..." style suggestion */
  hint?: string | undefined;
}

export interface DeserializeResult<T> {
  ok: boolean;
  value: T | undefined;
  errors: DeserializeError[];
  warnings: DeserializeError[];
}

export interface DeserializeOptions {
  /** File name recorded in spans that do not name one (default: "<input>") */
  file?: string;
}

// =============================================================================
// Main Entry Point
// =============================================================================

export function deserializeComprehension(
  json: string | unknown,
  options: DeserializeOptions = {}
): DeserializeResult<Comprehension> {
  const reader = new JsonReader(options.file ?? "<input>");

  let data: unknown = json;
  if (typeof json === "string") {
    try {
      data = JSON.parse(json);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      reader.error(ErrorCode.InvalidJson, `JSON parse error: ${message}`, "$");
      return reader.result<Comprehension>(undefined);
    }
  }

  return reader.result(reader.comprehension(data, "$"));
}

// =============================================================================
// Reader
// =============================================================================

const COMPREHENSION_FIELDS = ["kind", "clauses", "yield", "span"] as const;

const CLAUSE_FIELDS: Record<Clause["kind"], readonly string[]> = {
  generator: ["kind", "pattern", "source", "span"],
  alias: ["kind", "pattern", "value", "span"],
  guard: ["kind", "condition", "span"],
  exec: ["kind", "expr", "span"],
};

const PATTERN_KINDS = ["wildcard", "ident", "tuple"] as const;

const EXPR_KINDS = ["ident", "literal", "tuple", "call", "binary", "unary", "block"] as const;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function isOneOf<T extends string>(value: string, options: readonly T[]): value is T {
  return options.some((option) => option === value);
}

class JsonReader {
  private readonly errors: DeserializeError[] = [];
  private readonly warnings: DeserializeError[] = [];

  constructor(private readonly file: string) {}

  error(code: ErrorCodeType, message: string, path: string, hint?: string): void {
    this.errors.push({ code, message, path, hint });
  }

  result<T>(value: T | undefined): DeserializeResult<T> {
    const ok = this.errors.length === 0 && value !== undefined;
    return { ok, value: ok ? value : undefined, errors: this.errors, warnings: this.warnings };
  }

  // ---------------------------------------------------------------------------
  // Structure helpers
  // ---------------------------------------------------------------------------

  private record(node: unknown, path: string, what: string): Record<string, unknown> | undefined {
    if (!isRecord(node)) {
      this.error(ErrorCode.InvalidFieldValue, `Expected ${what} object, got ${describe(node)}`, path);
      return undefined;
    }
    return node;
  }

  /**
   * The node's `kind`, when it is one of `kinds`.
   */
  private kind<T extends string>(
    node: Record<string, unknown>,
    path: string,
    kinds: readonly T[],
    unknownCode: ErrorCodeType = ErrorCode.UnknownNodeKind
  ): T | undefined {
    const kind = node.kind;
    if (kind === undefined) {
      this.error(ErrorCode.MissingField, `Missing field "kind"`, `${path}.kind`);
      return undefined;
    }
    if (typeof kind !== "string") {
      this.error(ErrorCode.InvalidFieldValue, `Field "kind" must be a string`, `${path}.kind`);
      return undefined;
    }
    if (!isOneOf(kind, kinds)) {
      this.error(
        unknownCode,
        `Unknown kind "${kind}"; expected one of ${kinds.map((k) => `"${k}"`).join(", ")}`,
        `${path}.kind`,
        suggestName(kind, kinds)
      );
      return undefined;
    }
    return kind;
  }

  private checkFields(node: Record<string, unknown>, path: string, allowed: readonly string[]): void {
    for (const key of Object.keys(node)) {
      if (!allowed.includes(key)) {
        this.warnings.push({
          code: ErrorCode.UnknownField,
          message: `Unknown field "${key}" ignored`,
          path: `${path}.${key}`,
          hint: suggestName(key, allowed),
        });
      }
    }
  }

  private required(node: Record<string, unknown>, key: string, path: string): unknown {
    if (!(key in node) || node[key] === undefined) {
      this.error(ErrorCode.MissingField, `Missing field "${key}"`, `${path}.${key}`);
      return undefined;
    }
    return node[key];
  }

  private string(node: Record<string, unknown>, key: string, path: string): string | undefined {
    const value = this.required(node, key, path);
    if (value === undefined) return undefined;
    if (typeof value !== "string") {
      this.error(ErrorCode.InvalidFieldValue, `Field "${key}" must be a string`, `${path}.${key}`);
      return undefined;
    }
    return value;
  }

  private array(node: Record<string, unknown>, key: string, path: string): unknown[] | undefined {
    const value = this.required(node, key, path);
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) {
      this.error(ErrorCode.InvalidFieldValue, `Field "${key}" must be an array`, `${path}.${key}`);
      return undefined;
    }
    return value;
  }

  /**
   * Read every element; undefined if any of them failed.
   */
  private each<T>(items: unknown[], path: string, read: (item: unknown, path: string) => T | undefined): T[] | undefined {
    const out: T[] = [];
    let failed = false;
    items.forEach((item, i) => {
      const value = read(item, `${path}[${i}]`);
      if (value === undefined) {
        failed = true;
      } else {
        out.push(value);
      }
    });
    return failed ? undefined : out;
  }

  private span(node: Record<string, unknown>, path: string): SourceSpan | undefined {
    const raw = node.span;
    if (raw === undefined) return undefined;

    const at = `${path}.span`;
    if (!isRecord(raw)) {
      this.error(ErrorCode.InvalidFieldValue, `Field "span" must be an object`, at);
      return undefined;
    }

    const start = this.position(raw.start, `${at}.start`);
    if (!start) return undefined;
    const end = raw.end === undefined ? start : this.position(raw.end, `${at}.end`);
    if (!end) return undefined;

    const file = typeof raw.file === "string" ? raw.file : this.file;
    return span(file, start, end);
  }

  private position(raw: unknown, path: string): Position | undefined {
    if (!isRecord(raw) || typeof raw.line !== "number" || typeof raw.column !== "number") {
      this.error(ErrorCode.InvalidFieldValue, `Position needs numeric "line" and "column"`, path);
      return undefined;
    }
    const offset = typeof raw.offset === "number" ? raw.offset : 0;
    return position(raw.line, raw.column, offset);
  }

  // ---------------------------------------------------------------------------
  // Nodes
  // ---------------------------------------------------------------------------

  comprehension(data: unknown, path: string): Comprehension | undefined {
    const node = this.record(data, path, "comprehension");
    if (!node) return undefined;
    if (this.kind(node, path, ["comprehension"]) === undefined) return undefined;
    this.checkFields(node, path, COMPREHENSION_FIELDS);

    const items = this.array(node, "clauses", path);
    const clauses = items ? this.each(items, `${path}.clauses`, (item, at) => this.clause(item, at)) : undefined;
    const yieldExpr = node.yield === undefined ? undefined : this.expr(node.yield, `${path}.yield`);
    const nodeSpan = this.span(node, path);

    if (!clauses) return undefined;
    if (node.yield !== undefined && !yieldExpr) return undefined;

    return { kind: "comprehension", clauses, yield: yieldExpr, span: nodeSpan };
  }

  clause(data: unknown, path: string): Clause | undefined {
    const node = this.record(data, path, "clause");
    if (!node) return undefined;
    const kind = this.kind(node, path, CLAUSE_KINDS);
    if (!kind) return undefined;
    this.checkFields(node, path, CLAUSE_FIELDS[kind]);
    const clauseSpan = this.span(node, path);

    switch (kind) {
      case "generator": {
        const pattern = this.pattern(this.required(node, "pattern", path), `${path}.pattern`);
        const source = this.expr(this.required(node, "source", path), `${path}.source`);
        return pattern && source ? { kind, pattern, source, span: clauseSpan } : undefined;
      }
      case "alias": {
        const pattern = this.pattern(this.required(node, "pattern", path), `${path}.pattern`);
        const value = this.expr(this.required(node, "value", path), `${path}.value`);
        return pattern && value ? { kind, pattern, value, span: clauseSpan } : undefined;
      }
      case "guard": {
        const condition = this.expr(this.required(node, "condition", path), `${path}.condition`);
        return condition ? { kind, condition, span: clauseSpan } : undefined;
      }
      case "exec": {
        const expr = this.expr(this.required(node, "expr", path), `${path}.expr`);
        return expr ? { kind, expr, span: clauseSpan } : undefined;
      }
    }
  }

  pattern(data: unknown, path: string): Pattern | undefined {
    // Missing fields were already reported by `required`
    if (data === undefined) return undefined;

    if (typeof data === "string") {
      if (data === "_") return { kind: "wildcard" };
      if (!IDENTIFIER.test(data)) {
        this.error(ErrorCode.InvalidFieldValue, `"${data}" is not an identifier pattern`, path);
        return undefined;
      }
      return { kind: "ident", name: data };
    }

    const node = this.record(data, path, "pattern");
    if (!node) return undefined;
    const kind = this.kind(node, path, PATTERN_KINDS, ErrorCode.UnsupportedPattern);
    if (!kind) return undefined;
    const patternSpan = this.span(node, path);

    switch (kind) {
      case "wildcard":
        this.checkFields(node, path, ["kind", "span"]);
        return { kind, span: patternSpan };
      case "ident": {
        this.checkFields(node, path, ["kind", "name", "span"]);
        const name = this.string(node, "name", path);
        return name === undefined ? undefined : { kind, name, span: patternSpan };
      }
      case "tuple": {
        this.checkFields(node, path, ["kind", "elements", "span"]);
        const items = this.array(node, "elements", path);
        const elements = items && this.each(items, `${path}.elements`, (item, at) => this.pattern(item, at));
        return elements ? { kind, elements, span: patternSpan } : undefined;
      }
    }
  }

  expr(data: unknown, path: string): Expr | undefined {
    if (data === undefined) return undefined;

    if (typeof data === "string") {
      return { kind: "raw", text: data };
    }
    if (typeof data === "number" || typeof data === "boolean") {
      return { kind: "literal", value: data };
    }
    if (isSourceFragment(data)) {
      return { kind: "raw", text: data.source };
    }

    const node = this.record(data, path, "expression");
    if (!node) return undefined;
    const kind = this.kind(node, path, EXPR_KINDS);
    if (!kind) return undefined;
    const exprSpan = this.span(node, path);

    switch (kind) {
      case "ident": {
        this.checkFields(node, path, ["kind", "name", "span"]);
        const name = this.string(node, "name", path);
        return name === undefined ? undefined : { kind, name, span: exprSpan };
      }

      case "literal": {
        this.checkFields(node, path, ["kind", "value", "span"]);
        const value = this.required(node, "value", path);
        if (value === undefined) return undefined;
        if (typeof value !== "number" && typeof value !== "string" && typeof value !== "boolean") {
          this.error(ErrorCode.InvalidFieldValue, `Literal value must be a number, string or boolean`, `${path}.value`);
          return undefined;
        }
        return { kind, value, span: exprSpan };
      }

      case "tuple": {
        this.checkFields(node, path, ["kind", "elements", "span"]);
        const items = this.array(node, "elements", path);
        const elements = items && this.each(items, `${path}.elements`, (item, at) => this.expr(item, at));
        return elements ? { kind, elements, span: exprSpan } : undefined;
      }

      case "call": {
        this.checkFields(node, path, ["kind", "callee", "args", "span"]);
        const callee = this.expr(this.required(node, "callee", path), `${path}.callee`);
        const items = this.array(node, "args", path);
        const args = items && this.each(items, `${path}.args`, (item, at) => this.expr(item, at));
        return callee && args ? { kind, callee, args, span: exprSpan } : undefined;
      }

      case "binary": {
        this.checkFields(node, path, ["kind", "op", "left", "right", "span"]);
        const op = this.operator(node, path, BINARY_OPS);
        const left = this.expr(this.required(node, "left", path), `${path}.left`);
        const right = this.expr(this.required(node, "right", path), `${path}.right`);
        return op && left && right ? { kind, op, left, right, span: exprSpan } : undefined;
      }

      case "unary": {
        this.checkFields(node, path, ["kind", "op", "operand", "span"]);
        const op = this.operator<UnaryOp>(node, path, UNARY_OPS);
        const operand = this.expr(this.required(node, "operand", path), `${path}.operand`);
        return op && operand ? { kind, op, operand, span: exprSpan } : undefined;
      }

      case "block": {
        this.checkFields(node, path, ["kind", "bindings", "result", "span"]);
        const items = this.array(node, "bindings", path);
        const bindings = items && this.each(items, `${path}.bindings`, (item, at) => this.binding(item, at));
        const result = this.expr(this.required(node, "result", path), `${path}.result`);
        return bindings && result ? { kind, bindings, result, span: exprSpan } : undefined;
      }
    }
  }

  private binding(data: unknown, path: string): Binding | undefined {
    const node = this.record(data, path, "binding");
    if (!node) return undefined;
    this.checkFields(node, path, ["pattern", "value"]);
    const pattern = this.pattern(this.required(node, "pattern", path), `${path}.pattern`);
    const value = this.expr(this.required(node, "value", path), `${path}.value`);
    return pattern && value ? { pattern, value } : undefined;
  }

  private operator<T extends BinaryOp | UnaryOp>(
    node: Record<string, unknown>,
    path: string,
    ops: readonly T[]
  ): T | undefined {
    const op = this.string(node, "op", path);
    if (op === undefined) return undefined;
    if (!isOneOf(op, ops)) {
      this.error(ErrorCode.InvalidFieldValue, `Unknown operator "${op}"`, `${path}.op`);
      return undefined;
    }
    return op;
  }
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
