/**
 * Shared-definitions loader - evaluates top-level definitions into the
 * shared workspace
 */

import type * as ts from "typescript";
import { type Result, ok, error, collect } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { parseSnippet } from "../syntax/parser.js";
import { hoistLexicalDeclarations, lowerSnippet } from "../syntax/lowering.js";
import { getNodeLocation } from "../syntax/locations.js";
import { type SharedWorkspace, sharedWorkspace } from "../workspace/workspace.js";
import { type CompileError, compileError, evaluationError } from "./errors.js";

export type LoadOptions = {
  readonly title: string;
  readonly workspace?: SharedWorkspace;
};

type LoweredStatement = {
  readonly code: string;
  readonly node: ts.Statement;
};

/**
 * Evaluate each top-level statement of `source` in order, holding the
 * workspace lock throughout. Nothing runs if the text does not parse.
 * The first statement that throws stops the load; statements before it
 * stay in effect.
 */
export const loadSharedDefinitions = (
  source: string,
  options: LoadOptions
): Result<void, CompileError> => {
  const { title } = options;

  const parsed = parseSnippet(source, title);
  if (!parsed.ok) {
    return error(compileError(title, parsed.error));
  }
  const file = parsed.value;

  const lowered = collect(
    file.statements.map(
      (node): Result<LoweredStatement, readonly Diagnostic[]> => {
        const text = source.slice(node.getStart(file), node.end);
        const result = lowerSnippet(text, title, [hoistLexicalDeclarations]);
        return result.ok ? ok({ code: result.value, node }) : result;
      }
    )
  );
  if (!lowered.ok) {
    return error(compileError(title, lowered.error));
  }

  const workspace = options.workspace ?? sharedWorkspace();
  const outcome = workspace.exclusive(
    (scope): Result<void, CompileError> => {
      for (const { code, node } of lowered.value) {
        const location = getNodeLocation(file, node);
        const run = scope.run(code, {
          filename: title,
          lineOffset: location.line - 1,
        });
        if (!run.ok) {
          return error(evaluationError(title, "EXP1003", run.error, location));
        }
      }
      return ok(undefined);
    }
  );

  return outcome.ok
    ? outcome.value
    : error(compileError(title, [outcome.error]));
};
