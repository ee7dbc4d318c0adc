/**
 * Catalog JSON loader - reads event kind definitions from disk and
 * validates their structure
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { type Result, ok, error } from "../types/result.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { describeType, isRecord, isStringArray } from "../types/guards.js";
import type { Binding, EventKindDefinition } from "./types.js";

/**
 * Load a catalog file. The file holds `{ "kinds": [...] }`, each kind
 * with `kind`, optional `description`, `inherits` and `bindings`.
 */
export const loadCatalogFile = (
  filePath: string
): Result<readonly EventKindDefinition[], readonly Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return error([
      createDiagnostic("EXP9001", "error", `Catalog file not found: ${filePath}`),
    ]);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return error([
      createDiagnostic(
        "EXP9002",
        "error",
        `Failed to read catalog file: ${String(err)}`
      ),
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return error([
      createDiagnostic(
        "EXP9003",
        "error",
        `Invalid JSON in catalog file ${filePath}: ${String(err)}`
      ),
    ]);
  }

  return parseCatalogData(parsed, path.basename(filePath));
};

/**
 * Validate already-parsed catalog data
 */
export const parseCatalogData = (
  data: unknown,
  source: string
): Result<readonly EventKindDefinition[], readonly Diagnostic[]> => {
  if (!isRecord(data)) {
    return error([
      createDiagnostic(
        "EXP9004",
        "error",
        `Catalog file must be an object, got ${describeType(data)}`
      ),
    ]);
  }

  if (!Array.isArray(data.kinds)) {
    return error([
      createDiagnostic(
        "EXP9005",
        "error",
        `Missing or invalid 'kinds' array in ${source}`
      ),
    ]);
  }

  const diagnostics: Diagnostic[] = [];
  const definitions: EventKindDefinition[] = [];
  data.kinds.forEach((item: unknown, index: number) => {
    const definition = parseKind(item, `${source}: kinds[${index}]`, diagnostics);
    if (definition) {
      definitions.push(definition);
    }
  });

  return diagnostics.length > 0 ? error(diagnostics) : ok(definitions);
};

const malformed = (where: string, problem: string): Diagnostic =>
  createDiagnostic("EXP9005", "error", `${where}: ${problem}`);

const parseKind = (
  item: unknown,
  where: string,
  diagnostics: Diagnostic[]
): EventKindDefinition | undefined => {
  if (!isRecord(item)) {
    diagnostics.push(malformed(where, "expected an object"));
    return undefined;
  }

  const { kind, description, inherits, bindings } = item;
  const before = diagnostics.length;

  if (typeof kind !== "string" || kind === "") {
    diagnostics.push(malformed(where, "'kind' must be a non-empty string"));
  }
  if (description !== undefined && typeof description !== "string") {
    diagnostics.push(malformed(where, "'description' must be a string"));
  }
  if (inherits !== undefined && !isStringArray(inherits)) {
    diagnostics.push(malformed(where, "'inherits' must be an array of strings"));
  }
  if (!Array.isArray(bindings)) {
    diagnostics.push(malformed(where, "'bindings' must be an array"));
  }

  const parsedBindings = Array.isArray(bindings)
    ? bindings.flatMap((binding: unknown, index: number) => {
        const parsed = parseBinding(
          binding,
          `${where}.bindings[${index}]`,
          diagnostics
        );
        return parsed ? [parsed] : [];
      })
    : [];

  if (diagnostics.length > before || typeof kind !== "string") {
    return undefined;
  }

  return {
    kind,
    ...(typeof description === "string" ? { description } : {}),
    inherits: isStringArray(inherits) ? inherits : [],
    bindings: parsedBindings,
  };
};

const parseBinding = (
  item: unknown,
  where: string,
  diagnostics: Diagnostic[]
): Binding | undefined => {
  if (!isRecord(item)) {
    diagnostics.push(malformed(where, "expected an object"));
    return undefined;
  }

  const { name, generator, doc, requires } = item;
  if (
    typeof name !== "string" ||
    typeof generator !== "string" ||
    typeof doc !== "string"
  ) {
    diagnostics.push(
      malformed(where, "'name', 'generator' and 'doc' must be strings")
    );
    return undefined;
  }
  if (requires !== undefined && typeof requires !== "string") {
    diagnostics.push(malformed(where, "'requires' must be a string"));
    return undefined;
  }

  return requires === undefined
    ? { name, generator, doc }
    : { name, generator, doc, requires };
};
