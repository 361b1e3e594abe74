/**
 * Codegen Module
 *
 * Source-text rendering of comprehensions and their desugared form.
 */

export { unparse, unparsePattern, unparseComprehension, type UnparseOptions } from "./unparse";
