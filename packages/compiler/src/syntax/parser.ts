/**
 * Snippet parsing with the TypeScript parser
 */

import * as ts from "typescript";
import { type Result, ok, error } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { convertTsDiagnostics } from "./locations.js";

/**
 * Compiler options every snippet is parsed and lowered with
 */
export const SNIPPET_COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ESNext,
  moduleDetection: ts.ModuleDetectionKind.Legacy,
  newLine: ts.NewLineKind.LineFeed,
  noLib: true,
  noResolve: true,
};

/**
 * Name the compiler sees for a snippet. The TypeScript program only
 * accepts roots with a TypeScript extension.
 */
export const snippetFileName = (title: string): string =>
  title.endsWith(".ts") ? title : `${title}.ts`;

/**
 * Report locations against the snippet title rather than the
 * synthetic file name
 */
export const relocate = (
  diagnostics: readonly Diagnostic[],
  title: string
): readonly Diagnostic[] =>
  diagnostics.map((diagnostic) =>
    diagnostic.location
      ? { ...diagnostic, location: { ...diagnostic.location, file: title } }
      : diagnostic
  );

/**
 * Collect the syntax errors in a snippet without keeping the output
 */
export const checkSyntax = (
  source: string,
  title: string
): readonly Diagnostic[] => {
  const output = ts.transpileModule(source, {
    compilerOptions: SNIPPET_COMPILER_OPTIONS,
    fileName: snippetFileName(title),
    reportDiagnostics: true,
  });

  return relocate(
    convertTsDiagnostics(output.diagnostics ?? [], "EXP1001"),
    title
  );
};

/**
 * Parse a snippet into a source file. Fails with every syntax error
 * found, each carrying its line and column.
 */
export const parseSnippet = (
  source: string,
  title: string
): Result<ts.SourceFile, readonly Diagnostic[]> => {
  const diagnostics = checkSyntax(source, title);
  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  return ok(
    ts.createSourceFile(
      title,
      source,
      ts.ScriptTarget.ES2022,
      true,
      ts.ScriptKind.TS
    )
  );
};
