/**
 * Lowering snippets to JavaScript the workspace can evaluate
 */

import * as ts from "typescript";
import { type Result, ok, error } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { convertTsDiagnostics } from "./locations.js";
import {
  SNIPPET_COMPILER_OPTIONS,
  relocate,
  snippetFileName,
} from "./parser.js";

/**
 * Turn the trailing statement into the snippet's return value.
 * Descends into a trailing block and both branches of a trailing `if`.
 */
const returnFromTail = (
  statement: ts.Statement,
  factory: ts.NodeFactory
): ts.Statement => {
  if (ts.isExpressionStatement(statement)) {
    return ts.setTextRange(
      factory.createReturnStatement(statement.expression),
      statement
    );
  }

  if (ts.isBlock(statement)) {
    return factory.updateBlock(
      statement,
      returnFromStatements(statement.statements, factory)
    );
  }

  if (ts.isIfStatement(statement)) {
    return factory.updateIfStatement(
      statement,
      statement.expression,
      returnFromTail(statement.thenStatement, factory),
      statement.elseStatement
        ? returnFromTail(statement.elseStatement, factory)
        : undefined
    );
  }

  return statement;
};

const returnFromStatements = (
  statements: readonly ts.Statement[],
  factory: ts.NodeFactory
): readonly ts.Statement[] => {
  const last = statements[statements.length - 1];
  if (!last) {
    return statements;
  }
  return [...statements.slice(0, -1), returnFromTail(last, factory)];
};

/**
 * The value of the last top-level statement becomes the result
 */
export const returnLastStatement: ts.TransformerFactory<ts.SourceFile> =
  (context) => (sourceFile) =>
    context.factory.updateSourceFile(
      sourceFile,
      returnFromStatements(sourceFile.statements, context.factory)
    );

const hoistStatement = (
  statement: ts.Statement,
  factory: ts.NodeFactory
): ts.Statement => {
  if (
    ts.isVariableStatement(statement) &&
    statement.declarationList.flags & ts.NodeFlags.BlockScoped
  ) {
    return factory.updateVariableStatement(
      statement,
      statement.modifiers,
      factory.createVariableDeclarationList(
        statement.declarationList.declarations,
        ts.NodeFlags.None
      )
    );
  }

  if (ts.isClassDeclaration(statement) && statement.name) {
    return ts.setTextRange(
      factory.createVariableStatement(
        undefined,
        factory.createVariableDeclarationList(
          [
            factory.createVariableDeclaration(
              statement.name,
              undefined,
              undefined,
              factory.createClassExpression(
                statement.modifiers?.filter(ts.isDecorator),
                statement.name,
                statement.typeParameters,
                statement.heritageClauses,
                statement.members
              )
            ),
          ],
          ts.NodeFlags.None
        )
      ),
      statement
    );
  }

  return statement;
};

/**
 * Top-level `let`, `const` and classes become `var` so that they land on
 * the workspace global and a later load can redefine them
 */
export const hoistLexicalDeclarations: ts.TransformerFactory<ts.SourceFile> =
  (context) => (sourceFile) =>
    context.factory.updateSourceFile(
      sourceFile,
      sourceFile.statements.map((statement) =>
        hoistStatement(statement, context.factory)
      )
    );

/**
 * Erase TypeScript syntax and apply the given transformers
 */
export const lowerSnippet = (
  source: string,
  title: string,
  transformers: readonly ts.TransformerFactory<ts.SourceFile>[]
): Result<string, readonly Diagnostic[]> => {
  const output = ts.transpileModule(source, {
    compilerOptions: SNIPPET_COMPILER_OPTIONS,
    fileName: snippetFileName(title),
    reportDiagnostics: true,
    transformers: { before: [...transformers] },
  });

  const diagnostics = relocate(
    convertTsDiagnostics(output.diagnostics ?? [], "EXP1001"),
    title
  );
  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  return ok(output.outputText);
};
