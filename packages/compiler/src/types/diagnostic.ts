/**
 * Diagnostic types for the expression compiler
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  | "EXP1001" // Syntax error in snippet
  | "EXP1002" // Evaluation failed while building an expression
  | "EXP1003" // Evaluation failed while loading shared definitions
  | "EXP1004" // Shared workspace busy
  | "EXP1005" // Generated code did not evaluate to a function
  // Catalog construction (EXP2001-EXP2099)
  | "EXP2001" // Unknown event kind
  | "EXP2002" // Circular inheritance between event kinds
  | "EXP2003" // Binding requires a binding that is not available
  | "EXP2004" // Circular binding requirement
  | "EXP2005" // Invalid or reserved binding name
  | "EXP2006" // Generator is not a single expression
  | "EXP2007" // Event kind registered twice
  | "EXP2008" // Unknown expression slot
  // File loading (EXP9001-EXP9099)
  | "EXP9001" // File not found
  | "EXP9002" // Failed to read file
  | "EXP9003" // Invalid JSON
  | "EXP9004" // File must contain an object
  | "EXP9005" // Malformed event kind or binding
  | "EXP9006"; // Malformed configuration field

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

/**
 * Format several diagnostics, one per line
 */
export const formatDiagnostics = (
  diagnostics: readonly Diagnostic[]
): string => diagnostics.map(formatDiagnostic).join("\n");
