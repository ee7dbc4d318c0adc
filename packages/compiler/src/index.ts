/**
 * Trigger expression compiler - binding catalog, free-reference scanner,
 * and the shared workspace expressions are compiled into
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  formatDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/guards.js";
export * from "./catalog/index.js";

export { findReferencedBindings } from "./analysis/scanner.js";
export {
  type PlannedBinding,
  type PlanOptions,
  guardGenerator,
  planBindings,
} from "./analysis/planner.js";
export {
  type BuildOptions,
  buildExpressionSource,
  preludeLineCount,
} from "./builder/expression-builder.js";
export { checkSyntax, parseSnippet } from "./syntax/parser.js";

export * from "./runtime/atom.js";
export * from "./runtime/context.js";
export * from "./runtime/events.js";

export * from "./workspace/workspace.js";
export * from "./workspace/services.js";
export * from "./workspace/prelude.js";

export * from "./compiler/errors.js";
export * from "./compiler/compile.js";
export * from "./compiler/invoke.js";
export * from "./compiler/shared-definitions.js";

export * from "./slots/specs.js";
export * from "./slots/compile-slot.js";
export * from "./slots/slot-table.js";
