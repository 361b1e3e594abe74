/**
 * fordesugar
 *
 * Desugars monadic for-comprehensions into map/flatMap/withFilter chains.
 */

export * from "./ast";
export * from "./desugar";
export * from "./codegen";
export * from "./diagnostics";
export * from "./utils";
export * from "./driver";
export * as astJson from "./ast-json";
