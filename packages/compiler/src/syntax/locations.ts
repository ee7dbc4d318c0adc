/**
 * TypeScript diagnostics and source positions
 */

import * as ts from "typescript";
import {
  type Diagnostic,
  type DiagnosticCode,
  type SourceLocation,
  createDiagnostic,
} from "../types/diagnostic.js";

/**
 * Get source location information from TypeScript source file
 */
export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};

/**
 * Get location information for a node
 */
export const getNodeLocation = (
  sourceFile: ts.SourceFile,
  node: ts.Node
): SourceLocation =>
  getSourceLocation(sourceFile, node.getStart(sourceFile), node.getWidth(sourceFile));

/**
 * Convert TypeScript diagnostic to an expression diagnostic
 */
export const convertTsDiagnostic = (
  tsDiag: ts.Diagnostic,
  code: DiagnosticCode
): Diagnostic | null => {
  if (tsDiag.category === ts.DiagnosticCategory.Suggestion) {
    return null;
  }

  const severity =
    tsDiag.category === ts.DiagnosticCategory.Error
      ? "error"
      : tsDiag.category === ts.DiagnosticCategory.Warning
        ? "warning"
        : "info";

  const message = ts.flattenDiagnosticMessageText(tsDiag.messageText, "\n");

  const location =
    tsDiag.file && tsDiag.start !== undefined
      ? getSourceLocation(tsDiag.file, tsDiag.start, tsDiag.length ?? 1)
      : undefined;

  return createDiagnostic(code, severity, message, location);
};

/**
 * Convert a batch of TypeScript diagnostics, dropping suggestions
 */
export const convertTsDiagnostics = (
  tsDiags: readonly ts.Diagnostic[],
  code: DiagnosticCode
): readonly Diagnostic[] =>
  tsDiags.flatMap((tsDiag) => {
    const diagnostic = convertTsDiagnostic(tsDiag, code);
    return diagnostic ? [diagnostic] : [];
  });
