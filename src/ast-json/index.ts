/**
 * AST-as-JSON Module
 *
 * Bidirectional conversion between the term model and JSON, so that a host
 * parser (or a person) can hand comprehensions over as files and read the
 * desugared tree back.
 */

// Schema types
export type {
  JsonSpan,
  SourceFragment,
  JsonComprehension,
  JsonClause,
  JsonGeneratorClause,
  JsonAliasClause,
  JsonGuardClause,
  JsonExecClause,
  JsonPattern,
  JsonWildcardPattern,
  JsonIdentPattern,
  JsonTuplePattern,
  JsonExpr,
  JsonIdentExpr,
  JsonLiteralExpr,
  JsonTupleExpr,
  JsonCallExpr,
  JsonBinaryExpr,
  JsonUnaryExpr,
  JsonBinding,
  JsonBlockExpr,
  JsonMapCall,
  JsonFlatMapCall,
  JsonWithFilterCall,
} from "./schema";

export { isRecord, isSourceFragment } from "./schema";

// Serialization (terms → JSON)
export {
  serializeExpr,
  serializeComprehension,
  comprehensionToJson,
  exprToJson,
  patternToJson,
  type SerializeOptions,
} from "./serialize";

// Deserialization (JSON → terms)
export {
  deserializeComprehension,
  type DeserializeError,
  type DeserializeResult,
  type DeserializeOptions,
} from "./deserialize";
