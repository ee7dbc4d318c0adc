/**
 * Binding planner - orders the bindings a snippet needs so that every
 * requirement is bound before the binding that needs it
 */

import { type Result, ok, error } from "../types/result.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { type Binding, EVENT_PARAMETER } from "../catalog/types.js";
import { compareNames } from "../catalog/resolver.js";
import { formatCycle } from "../catalog/circular.js";

export type PlannedBinding = {
  readonly name: string;
  readonly generator: string;
  /** Bound only because another planned binding requires it */
  readonly implicit: boolean;
};

export type PlanOptions = {
  readonly nilGuarded?: boolean;
};

/**
 * Make a generator evaluate to `undefined` instead of reading through
 * an absent event
 */
export const guardGenerator = (generator: string): string =>
  `${EVENT_PARAMETER} == null ? undefined : (${generator})`;

/**
 * Plan the prelude for the referenced names. Names missing from the set
 * are ignored; a missing requirement or a requirement cycle fails.
 */
export const planBindings = (
  referenced: readonly string[],
  bindings: ReadonlyMap<string, Binding>,
  options: PlanOptions = {}
): Result<readonly PlannedBinding[], Diagnostic> => {
  const direct = new Set(referenced.filter((name) => bindings.has(name)));
  const placed = new Set<string>();
  const plan: PlannedBinding[] = [];

  const place = (name: string, chain: readonly string[]): Diagnostic | null => {
    if (placed.has(name)) {
      return null;
    }

    if (chain.includes(name)) {
      return createDiagnostic(
        "EXP2004",
        "error",
        `Circular binding requirement: ${formatCycle([
          ...chain.slice(chain.indexOf(name)),
          name,
        ])}`
      );
    }

    const binding = bindings.get(name);
    if (!binding) {
      return createDiagnostic(
        "EXP2003",
        "error",
        `Binding '${chain[chain.length - 1] ?? name}' requires '${name}', which is not available`
      );
    }

    if (binding.requires !== undefined) {
      const failure = place(binding.requires, [...chain, name]);
      if (failure) {
        return failure;
      }
    }

    placed.add(name);
    plan.push({
      name,
      generator: options.nilGuarded
        ? guardGenerator(binding.generator)
        : binding.generator,
      implicit: !direct.has(name),
    });
    return null;
  };

  for (const name of [...direct].sort(compareNames)) {
    const failure = place(name, []);
    if (failure) {
      return error(failure);
    }
  }

  return ok(plan);
};
