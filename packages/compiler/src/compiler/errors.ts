/**
 * Errors reported to the owners of expressions
 */

import {
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
} from "../types/diagnostic.js";

/**
 * Parsing or evaluation failed while building an expression or loading
 * shared definitions
 */
export type CompileError = {
  readonly kind: "compile";
  /** Which snippet, e.g. "Activation Expression for Trigger 2" */
  readonly title: string;
  readonly message: string;
  readonly diagnostics: readonly Diagnostic[];
  /** Whatever evaluation threw, untouched */
  readonly cause?: unknown;
};

/**
 * A compiled expression threw while running
 */
export type RuntimeError = {
  readonly kind: "runtime";
  readonly title: string;
  readonly message: string;
  readonly cause: unknown;
};

export type ExpressionError = CompileError | RuntimeError;

/**
 * Message of a thrown value. Values thrown inside the workspace come
 * from another realm, so this reads fields rather than testing
 * `instanceof Error`.
 */
export const describeCause = (cause: unknown): string => {
  if (typeof cause === "object" && cause !== null && "message" in cause) {
    const name =
      "name" in cause && typeof cause.name === "string" ? cause.name : "Error";
    return `${name}: ${String(cause.message)}`;
  }
  return String(cause);
};

const stackOf = (cause: unknown): string | undefined =>
  typeof cause === "object" &&
  cause !== null &&
  "stack" in cause &&
  typeof cause.stack === "string"
    ? cause.stack
    : undefined;

export const compileError = (
  title: string,
  diagnostics: readonly Diagnostic[],
  cause?: unknown
): CompileError => {
  const message = diagnostics[0]?.message ?? "Compilation failed";
  return cause === undefined
    ? { kind: "compile", title, message, diagnostics }
    : { kind: "compile", title, message, diagnostics, cause };
};

/**
 * Compile failure caused by something evaluation threw
 */
export const evaluationError = (
  title: string,
  code: "EXP1002" | "EXP1003",
  cause: unknown,
  location?: Diagnostic["location"]
): CompileError =>
  compileError(
    title,
    [createDiagnostic(code, "error", describeCause(cause), location)],
    cause
  );

export const runtimeError = (title: string, cause: unknown): RuntimeError => ({
  kind: "runtime",
  title,
  message: describeCause(cause),
  cause,
});

/**
 * Render an error for a log or a dialog
 */
export const formatExpressionError = (error: ExpressionError): string => {
  if (error.kind === "compile") {
    return [
      `Problem compiling ${error.title}:`,
      ...error.diagnostics.map((d) => `  ${formatDiagnostic(d)}`),
    ].join("\n");
  }

  const header = `Problem running ${error.title}: ${error.message}`;
  const stack = stackOf(error.cause);
  return stack === undefined ? header : `${header}\n${stack}`;
};
