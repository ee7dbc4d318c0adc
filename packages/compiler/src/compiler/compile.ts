/**
 * Compiler front end - turns snippet text into a live expression
 */

import { type Result, ok, error } from "../types/result.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { ResolvedBindingSet } from "../catalog/types.js";
import { parseSnippet } from "../syntax/parser.js";
import { lowerSnippet, returnLastStatement } from "../syntax/lowering.js";
import { findReferencedBindings } from "../analysis/scanner.js";
import { type PlannedBinding, planBindings } from "../analysis/planner.js";
import {
  buildExpressionSource,
  preludeLineCount,
} from "../builder/expression-builder.js";
import { type SharedWorkspace, sharedWorkspace } from "../workspace/workspace.js";
import type { OwnerContext, StateBag } from "../runtime/context.js";
import { type CompileError, compileError, evaluationError } from "./errors.js";

export type ExpressionFunction = (
  event: unknown,
  context: OwnerContext | undefined,
  globals: StateBag | undefined
) => unknown;

export type CompiledExpression = {
  readonly title: string;
  /** Bindings in the order the generated function declares them */
  readonly prelude: readonly PlannedBinding[];
  /** Generated JavaScript */
  readonly source: string;
  readonly fn: ExpressionFunction;
};

export type CompileOptions = {
  /** Identifies the snippet in errors and stack traces */
  readonly title: string;
  /** The event may be absent; bindings become undefined instead of throwing */
  readonly nilGuarded?: boolean;
  readonly noOwnerLocals?: boolean;
  readonly workspace?: SharedWorkspace;
};

/**
 * Compile a snippet against a resolved binding set. Stateless: the
 * caller decides what to do with the result, including whether a
 * previously compiled expression stays installed on failure.
 */
export const compileExpression = (
  source: string,
  bindings: ResolvedBindingSet,
  options: CompileOptions
): Result<CompiledExpression, CompileError> => {
  const { title } = options;

  const parsed = parseSnippet(source, title);
  if (!parsed.ok) {
    return error(compileError(title, parsed.error));
  }

  const referenced = findReferencedBindings(parsed.value, bindings.bindings);
  const plan = planBindings(referenced, bindings.bindings, {
    nilGuarded: options.nilGuarded,
  });
  if (!plan.ok) {
    return error(compileError(title, [plan.error]));
  }

  const body = lowerSnippet(source, title, [returnLastStatement]);
  if (!body.ok) {
    return error(compileError(title, body.error));
  }

  const buildOptions = { noOwnerLocals: options.noOwnerLocals };
  const code = buildExpressionSource(body.value, plan.value, buildOptions);

  // Line 1 of the snippet is line 1 in stack traces
  const workspace = options.workspace ?? sharedWorkspace();
  const evaluated = workspace.evaluate(code, {
    filename: title,
    lineOffset: -preludeLineCount(plan.value, buildOptions),
  });
  if (!evaluated.ok) {
    const failure = evaluated.error;
    return error(
      failure.kind === "busy"
        ? compileError(title, [failure.diagnostic])
        : evaluationError(title, "EXP1002", failure.cause)
    );
  }

  const value = evaluated.value;
  if (typeof value !== "function") {
    return error(
      compileError(title, [
        createDiagnostic(
          "EXP1005",
          "error",
          `Generated code evaluated to ${typeof value}, not a function`
        ),
      ])
    );
  }

  return ok({
    title,
    prelude: plan.value,
    source: code,
    fn: (event, context, globals) =>
      Reflect.apply(value, undefined, [event, context, globals]),
  });
};
