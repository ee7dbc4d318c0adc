/**
 * Expression builder - generates the function text that wraps a snippet
 * body with its binding prelude
 */

import {
  CONTEXT_PARAMETER,
  EVENT_PARAMETER,
  GLOBALS_PARAMETER,
  LOCALS_NAME,
} from "../catalog/types.js";
import type { PlannedBinding } from "../analysis/planner.js";

export type BuildOptions = {
  /** Process-wide expressions get no owner-scoped `locals` */
  readonly noOwnerLocals?: boolean;
};

/**
 * Number of generated lines ahead of the snippet body. Passing its
 * negation as the script's line offset makes stack traces count lines
 * from the start of the snippet.
 */
export const preludeLineCount = (
  plan: readonly PlannedBinding[],
  options: BuildOptions = {}
): number => 2 + plan.length + (options.noOwnerLocals ? 0 : 1);

/**
 * Generate `(function (event, context, globals) { ... })`. The body runs
 * in an arrow function of its own, so any declaration in it, `var` and
 * function declarations included, shadows a binding of the same name.
 * No evaluation happens here.
 */
export const buildExpressionSource = (
  body: string,
  plan: readonly PlannedBinding[],
  options: BuildOptions = {}
): string => {
  const lines = [
    `(function (${EVENT_PARAMETER}, ${CONTEXT_PARAMETER}, ${GLOBALS_PARAMETER}) {`,
  ];

  if (!options.noOwnerLocals) {
    lines.push(`  const { ${LOCALS_NAME} } = ${CONTEXT_PARAMETER} ?? {};`);
  }

  for (const binding of plan) {
    lines.push(`  const ${binding.name} = ${binding.generator};`);
  }

  lines.push("  return (() => {");
  if (body.trim() !== "") {
    lines.push(body.trimEnd());
  }
  lines.push("  })();", "})");

  return lines.join("\n");
};
