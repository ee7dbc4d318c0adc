/**
 * Catalog resolver - flattens event kind inheritance into binding sets
 */

import { type Result, ok, error } from "../types/result.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import type {
  Binding,
  BindingCatalog,
  EventKind,
  EventKindEntry,
  ResolvedBindingSet,
} from "./types.js";

/**
 * Flatten one kind. Parents are merged in the order they are listed,
 * later parents overriding earlier ones, and the kind's own bindings
 * override everything inherited. Expects acyclic, fully known kinds;
 * the catalog builder checks both before calling this.
 */
export const flattenKind = (
  kinds: ReadonlyMap<EventKind, EventKindEntry>,
  kind: EventKind,
  memo: Map<EventKind, ReadonlyMap<string, Binding>>
): ReadonlyMap<string, Binding> => {
  const cached = memo.get(kind);
  if (cached) {
    return cached;
  }

  const entry = kinds.get(kind);
  const merged = new Map<string, Binding>();

  for (const parent of entry?.inherits ?? []) {
    for (const [name, binding] of flattenKind(kinds, parent, memo)) {
      merged.set(name, binding);
    }
  }

  for (const [name, binding] of entry?.bindings ?? []) {
    merged.set(name, binding);
  }

  memo.set(kind, merged);
  return merged;
};

/**
 * Look up the resolved bindings of an event kind
 */
export const resolveBindings = (
  catalog: BindingCatalog,
  kind: EventKind
): Result<ResolvedBindingSet, Diagnostic> => {
  const resolved = catalog.resolved.get(kind);
  if (!resolved) {
    return error(
      createDiagnostic(
        "EXP2001",
        "error",
        `Unknown event kind '${kind}'`,
        undefined,
        `Known kinds: ${[...catalog.kinds.keys()].join(", ")}`
      )
    );
  }
  return ok(resolved);
};

/**
 * Union of several resolved sets, for expressions that may receive more
 * than one kind of event. Later sets win on name collisions.
 */
export const mergeBindingSets = (
  ...sets: readonly ResolvedBindingSet[]
): ResolvedBindingSet => {
  const bindings = new Map<string, Binding>();
  for (const set of sets) {
    for (const [name, binding] of set.bindings) {
      bindings.set(name, binding);
    }
  }
  return {
    kinds: sets.flatMap((set) => set.kinds),
    bindings,
  };
};

export type BindingDescription = {
  readonly name: string;
  readonly doc: string;
  readonly requires?: string;
};

/**
 * Code-unit ordering, independent of the host locale
 */
export const compareNames = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Bindings of a set sorted by name, for help output
 */
export const describeBindings = (
  set: ResolvedBindingSet
): readonly BindingDescription[] =>
  [...set.bindings.values()]
    .map(({ name, doc, requires }) =>
      requires === undefined ? { name, doc } : { name, doc, requires }
    )
    .sort((a, b) => compareNames(a.name, b.name));
