/**
 * Compile a snippet for a named slot
 */

import { type Result, ok, error, collect } from "../types/result.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import type { BindingCatalog, ResolvedBindingSet } from "../catalog/types.js";
import { mergeBindingSets, resolveBindings } from "../catalog/resolver.js";
import { standardCatalog } from "../catalog/standard.js";
import type { SharedWorkspace } from "../workspace/workspace.js";
import {
  type CompiledExpression,
  compileExpression,
} from "../compiler/compile.js";
import { loadSharedDefinitions } from "../compiler/shared-definitions.js";
import { type CompileError, compileError } from "../compiler/errors.js";
import type { ExpressionSlotSpec, SlotTable } from "./specs.js";

export type SlotCompileOptions = {
  readonly title: string;
  /** Defaults to the standard catalog */
  readonly catalog?: BindingCatalog;
  readonly workspace?: SharedWorkspace;
};

/**
 * What a slot compiled to. Shared definitions leave nothing to call;
 * their effect is on the workspace.
 */
export type SlotOutcome =
  | { readonly kind: "expression"; readonly compiled: CompiledExpression }
  | { readonly kind: "definitions" };

export const findSlot = (
  slots: SlotTable,
  slotName: string
): Result<ExpressionSlotSpec, Diagnostic> => {
  const spec = Object.hasOwn(slots, slotName) ? slots[slotName] : undefined;
  if (!spec) {
    return error(
      createDiagnostic(
        "EXP2008",
        "error",
        `Unknown expression slot '${slotName}'`,
        undefined,
        `Known slots: ${Object.keys(slots).join(", ")}`
      )
    );
  }
  return ok(spec);
};

/**
 * Bindings available to a slot: the union of its kinds' resolved sets
 */
export const slotBindings = (
  catalog: BindingCatalog,
  spec: ExpressionSlotSpec
): Result<ResolvedBindingSet, readonly Diagnostic[]> => {
  const sets = collect(
    spec.kinds.map(
      (kind): Result<ResolvedBindingSet, readonly Diagnostic[]> => {
        const resolved = resolveBindings(catalog, kind);
        return resolved.ok ? resolved : error([resolved.error]);
      }
    )
  );
  return sets.ok ? ok(mergeBindingSets(...sets.value)) : sets;
};

const catalogFor = (
  options: SlotCompileOptions
): Result<BindingCatalog, readonly Diagnostic[]> =>
  options.catalog === undefined ? standardCatalog() : ok(options.catalog);

export const compileSlot = (
  slots: SlotTable,
  slotName: string,
  source: string,
  options: SlotCompileOptions
): Result<SlotOutcome, CompileError> => {
  const { title, workspace } = options;

  const spec = findSlot(slots, slotName);
  if (!spec.ok) {
    return error(compileError(title, [spec.error]));
  }

  if (spec.value.sharedDefinitions === true) {
    const loaded = loadSharedDefinitions(source, { title, workspace });
    return loaded.ok
      ? ok<SlotOutcome, CompileError>({ kind: "definitions" })
      : loaded;
  }

  const catalog = catalogFor(options);
  if (!catalog.ok) {
    return error(compileError(title, catalog.error));
  }

  const bindings = slotBindings(catalog.value, spec.value);
  if (!bindings.ok) {
    return error(compileError(title, bindings.error));
  }

  const compiled = compileExpression(source, bindings.value, {
    title,
    nilGuarded: spec.value.nilGuarded,
    noOwnerLocals: spec.value.noOwnerLocals,
    workspace,
  });
  return compiled.ok
    ? ok<SlotOutcome, CompileError>({
        kind: "expression",
        compiled: compiled.value,
      })
    : compiled;
};
