/**
 * Binding catalog construction and validation
 */

import * as ts from "typescript";
import { type Result, ok, error } from "../types/result.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { checkSyntax } from "../syntax/parser.js";
import { findCycle, formatCycle } from "./circular.js";
import { flattenKind } from "./resolver.js";
import {
  type Binding,
  type BindingCatalog,
  type EventKind,
  type EventKindDefinition,
  type EventKindEntry,
  type ResolvedBindingSet,
  RESERVED_NAMES,
} from "./types.js";

/**
 * Whether a name can be declared with `const` in generated code
 */
export const isValidBindingName = (name: string): boolean => {
  if (!ts.isIdentifierText(name, ts.ScriptTarget.ES2022)) {
    return false;
  }
  const token = ts.stringToToken(name);
  return (
    token === undefined ||
    token < ts.SyntaxKind.FirstReservedWord ||
    token > ts.SyntaxKind.LastReservedWord
  );
};

/**
 * A generator must parse as exactly one expression, and not a comma
 * sequence, since it is spliced in as a `const` initializer
 */
export const isSingleExpression = (generator: string): boolean => {
  if (generator.trim() === "") {
    return false;
  }
  const wrapped = `(${generator})`;
  if (checkSyntax(wrapped, "generator").length > 0) {
    return false;
  }
  const file = ts.createSourceFile(
    "generator.ts",
    wrapped,
    ts.ScriptTarget.ES2022,
    false,
    ts.ScriptKind.TS
  );
  const [statement, ...rest] = file.statements;
  if (!statement || rest.length > 0 || !ts.isExpressionStatement(statement)) {
    return false;
  }
  const outer = statement.expression;
  if (!ts.isParenthesizedExpression(outer)) {
    return false;
  }
  return !(
    ts.isBinaryExpression(outer.expression) &&
    outer.expression.operatorToken.kind === ts.SyntaxKind.CommaToken
  );
};

const validateBinding = (
  kind: EventKind,
  binding: Binding
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];

  if (RESERVED_NAMES.has(binding.name)) {
    diagnostics.push(
      createDiagnostic(
        "EXP2005",
        "error",
        `Binding '${binding.name}' of kind '${kind}' uses a reserved name`,
        undefined,
        `Reserved names: ${[...RESERVED_NAMES].join(", ")}`
      )
    );
  } else if (!isValidBindingName(binding.name)) {
    diagnostics.push(
      createDiagnostic(
        "EXP2005",
        "error",
        `Binding name '${binding.name}' of kind '${kind}' is not a valid identifier`
      )
    );
  }

  if (!isSingleExpression(binding.generator)) {
    diagnostics.push(
      createDiagnostic(
        "EXP2006",
        "error",
        `Generator of '${kind}.${binding.name}' is not a single expression: ${binding.generator}`
      )
    );
  }

  return diagnostics;
};

const toEntry = (
  definition: EventKindDefinition,
  diagnostics: Diagnostic[]
): EventKindEntry => {
  const bindings = new Map<string, Binding>();
  for (const binding of definition.bindings) {
    if (bindings.has(binding.name)) {
      diagnostics.push(
        createDiagnostic(
          "EXP2005",
          "error",
          `Binding '${binding.name}' is declared twice in kind '${definition.kind}'`
        )
      );
      continue;
    }
    diagnostics.push(...validateBinding(definition.kind, binding));
    bindings.set(binding.name, binding);
  }

  return definition.description === undefined
    ? { inherits: definition.inherits, bindings }
    : {
        description: definition.description,
        inherits: definition.inherits,
        bindings,
      };
};

const requiresEdges = (
  bindings: ReadonlyMap<string, Binding>
): ReadonlyMap<string, readonly string[]> =>
  new Map(
    [...bindings.values()].map((binding) => [
      binding.name,
      binding.requires === undefined ? [] : [binding.requires],
    ])
  );

/**
 * Same cycle found from a different starting binding gets the same key
 */
const cycleKey = (cycle: readonly string[]): string => {
  const nodes = cycle.slice(0, -1);
  const start = nodes.indexOf([...nodes].sort()[0] ?? "");
  return [...nodes.slice(start), ...nodes.slice(0, start)].join(",");
};

/**
 * Check requirements of one kind's own bindings against its resolved set
 */
const validateRequires = (
  kind: EventKind,
  entry: EventKindEntry,
  resolved: ReadonlyMap<string, Binding>,
  reportedCycles: Set<string>
): readonly Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];

  for (const binding of entry.bindings.values()) {
    if (binding.requires !== undefined && !resolved.has(binding.requires)) {
      diagnostics.push(
        createDiagnostic(
          "EXP2003",
          "error",
          `Binding '${kind}.${binding.name}' requires '${binding.requires}', which kind '${kind}' does not provide`
        )
      );
    }
  }

  const cycle = findCycle(requiresEdges(resolved));
  if (cycle && !reportedCycles.has(cycleKey(cycle))) {
    reportedCycles.add(cycleKey(cycle));
    diagnostics.push(
      createDiagnostic(
        "EXP2004",
        "error",
        `Circular binding requirement in kind '${kind}': ${formatCycle(cycle)}`
      )
    );
  }

  return diagnostics;
};

const buildCatalog = (
  base: ReadonlyMap<EventKind, EventKindEntry>,
  definitions: readonly EventKindDefinition[]
): Result<BindingCatalog, readonly Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];
  const kinds = new Map(base);
  const added: EventKind[] = [];

  for (const definition of definitions) {
    if (kinds.has(definition.kind)) {
      diagnostics.push(
        createDiagnostic(
          "EXP2007",
          "error",
          `Event kind '${definition.kind}' is already registered`
        )
      );
      continue;
    }
    kinds.set(definition.kind, toEntry(definition, diagnostics));
    added.push(definition.kind);
  }

  for (const kind of added) {
    for (const parent of kinds.get(kind)?.inherits ?? []) {
      if (!kinds.has(parent)) {
        diagnostics.push(
          createDiagnostic(
            "EXP2001",
            "error",
            `Event kind '${kind}' inherits from unknown kind '${parent}'`
          )
        );
      }
    }
  }

  const cycle = findCycle(
    new Map([...kinds].map(([kind, entry]) => [kind, entry.inherits]))
  );
  if (cycle) {
    diagnostics.push(
      createDiagnostic(
        "EXP2002",
        "error",
        `Circular inheritance between event kinds: ${formatCycle(cycle)}`
      )
    );
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  const memo = new Map<EventKind, ReadonlyMap<string, Binding>>();
  const resolved = new Map<EventKind, ResolvedBindingSet>();
  const reportedCycles = new Set<string>();
  for (const [kind, entry] of kinds) {
    const bindings = flattenKind(kinds, kind, memo);
    diagnostics.push(
      ...validateRequires(kind, entry, bindings, reportedCycles)
    );
    resolved.set(kind, { kinds: [kind], bindings });
  }

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  return ok({ kinds, resolved });
};

/**
 * Build a catalog from kind definitions. Every problem found is reported,
 * not just the first.
 */
export const createBindingCatalog = (
  definitions: readonly EventKindDefinition[]
): Result<BindingCatalog, readonly Diagnostic[]> =>
  buildCatalog(new Map(), definitions);

/**
 * Register new kinds on top of an existing catalog. The existing catalog
 * is left untouched.
 */
export const extendCatalog = (
  catalog: BindingCatalog,
  definitions: readonly EventKindDefinition[]
): Result<BindingCatalog, readonly Diagnostic[]> =>
  buildCatalog(catalog.kinds, definitions);
