/**
 * Term Model Module
 *
 * Patterns, host expressions, comprehension clauses and the combinator
 * calls they desugar into.
 */

export type {
  AstNode,
  Pattern,
  WildcardPattern,
  IdentPattern,
  TuplePattern,
  LiteralValue,
  BinaryOp,
  UnaryOp,
  Expr,
  HostExpr,
  IdentExpr,
  LiteralExpr,
  TupleExpr,
  CallExpr,
  BinaryExpr,
  UnaryExpr,
  RawExpr,
  Binding,
  BlockExpr,
  CombinatorCall,
  MapCall,
  FlatMapCall,
  WithFilterCall,
  Clause,
  ClauseKind,
  GeneratorClause,
  AliasClause,
  GuardClause,
  ExecClause,
  Comprehension,
} from "./ast";

export { BINARY_OPS, UNARY_OPS, CLAUSE_KINDS, isCombinatorCall } from "./ast";

export {
  pwild,
  pvar,
  ptuple,
  ident,
  lit,
  tuple,
  call,
  binary,
  unary,
  raw,
  binding,
  block,
  mapCall,
  flatMapCall,
  withFilterCall,
  generator,
  alias,
  guard,
  exec,
  comprehension,
} from "./builders";

export {
  sameBinding,
  findUnsupportedPattern,
  patternEquals,
  exprEquals,
  patternNames,
  comprehensionNames,
  type NameInventory,
} from "./terms";
