/**
 * Bridgewright Frontend - declaration tree classifier and API model builder
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type ItemContext,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";
export * from "./types/result.js";

export * from "./model/namespace.js";
export * from "./model/api.js";
export * from "./model/api-model.js";
export * from "./model/identifiers.js";
export * from "./model/known-types.js";

export * from "./declarations/types.js";
export { loadDeclarationTree, validateDeclarationTree } from "./declarations/loader.js";

export * from "./config/types.js";
export { loadConfig, findConfig, resolveConfig, CONFIG_FILE_NAME } from "./config/loader.js";
export { createPolicy, type Policy } from "./config/policy.js";

export { parseBindings, type ParseOptions } from "./parse/parse-bindings.js";
export {
  analyzeManagedFunction,
  type ManagedFunctionAnalysis,
  type ManagedSource,
} from "./parse/managed-fun-deps.js";
export { parseBindingsFromFiles, type ProgramOptions } from "./program.js";
