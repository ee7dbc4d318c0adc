/**
 * Free-reference scanner - finds the catalog bindings a snippet uses
 */

import * as ts from "typescript";
import type { Binding } from "../catalog/types.js";
import { compareNames } from "../catalog/resolver.js";

const isMemberName = (parent: ts.Node, id: ts.Identifier): boolean =>
  (ts.isPropertyAccessExpression(parent) ||
    ts.isPropertyAssignment(parent) ||
    ts.isMethodDeclaration(parent) ||
    ts.isPropertyDeclaration(parent) ||
    ts.isGetAccessorDeclaration(parent) ||
    ts.isSetAccessorDeclaration(parent) ||
    ts.isPropertySignature(parent) ||
    ts.isMethodSignature(parent) ||
    ts.isEnumMember(parent)) &&
  parent.name === id;

const isDeclarationName = (parent: ts.Node, id: ts.Identifier): boolean => {
  if (ts.isBindingElement(parent)) {
    return parent.name === id || parent.propertyName === id;
  }
  return (
    (ts.isVariableDeclaration(parent) ||
      ts.isParameter(parent) ||
      ts.isFunctionDeclaration(parent) ||
      ts.isFunctionExpression(parent) ||
      ts.isClassDeclaration(parent) ||
      ts.isClassExpression(parent) ||
      ts.isEnumDeclaration(parent) ||
      ts.isModuleDeclaration(parent)) &&
    parent.name === id
  );
};

const isLabel = (parent: ts.Node, id: ts.Identifier): boolean =>
  (ts.isLabeledStatement(parent) || ts.isBreakOrContinueStatement(parent)) &&
  parent.label === id;

/**
 * Whether an identifier reads a value in scope. Shorthand properties
 * (`{ trackTitle }`) do.
 */
const isValueReference = (parent: ts.Node, id: ts.Identifier): boolean =>
  !isMemberName(parent, id) &&
  !isDeclarationName(parent, id) &&
  !isLabel(parent, id) &&
  !ts.isMetaProperty(parent);

/**
 * Type syntax is erased before evaluation, so nothing in it can read a
 * binding. `extends` clauses of classes are the exception.
 */
const isTypeOnly = (node: ts.Node): boolean =>
  (ts.isTypeNode(node) && !ts.isExpressionWithTypeArguments(node)) ||
  ts.isInterfaceDeclaration(node) ||
  ts.isTypeAliasDeclaration(node) ||
  ts.isTypeParameterDeclaration(node) ||
  (ts.isHeritageClause(node) &&
    node.token === ts.SyntaxKind.ImplementsKeyword);

/**
 * Names of the given bindings that the snippet references, at any depth,
 * sorted by name
 */
export const findReferencedBindings = (
  sourceFile: ts.SourceFile,
  bindings: ReadonlyMap<string, Binding>
): readonly string[] => {
  const found = new Set<string>();

  const visit = (node: ts.Node, parent: ts.Node): void => {
    if (isTypeOnly(node)) {
      return;
    }

    if (ts.isIdentifier(node)) {
      if (bindings.has(node.text) && isValueReference(parent, node)) {
        found.add(node.text);
      }
      return;
    }

    ts.forEachChild(node, (child) => visit(child, node));
  };

  ts.forEachChild(sourceFile, (child) => visit(child, sourceFile));

  return [...found].sort(compareNames);
};
