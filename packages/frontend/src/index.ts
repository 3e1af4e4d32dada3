/**
 * scopekit frontend - member enumeration over a semantic model
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  hasErrors,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./universe/index.js";
export * from "./member-collector/index.js";
export * from "./source/index.js";
