export {
  type Position,
  type SourceSpan,
  position,
  span,
  syntheticSpan,
  formatPosition,
  formatSpan,
} from "./span";
export { SourceFile, readSourceFile, sourceFromString } from "./source";
export {
  levenshteinDistance,
  similarityScore,
  findSimilarNames,
  suggestName,
  type SimilarName,
} from "./similarity";
