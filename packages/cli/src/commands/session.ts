/**
 * Catalog, workspace and snippet loading shared by the commands
 */

import { existsSync, readFileSync } from "node:fs";
import { basename } from "node:path";
import {
  type BindingCatalog,
  type CompileOptions,
  type Diagnostic,
  type ResolvedBindingSet,
  type Result,
  type SharedWorkspace,
  collect,
  createDiagnostic,
  createSharedWorkspace,
  error,
  extendCatalog,
  flatMap,
  formatDiagnostics,
  formatExpressionError,
  loadCatalogFile,
  loadSharedDefinitions,
  mergeBindingSets,
  ok,
  resolveBindings,
  standardCatalog,
} from "@trigger-expressions/compiler";
import type { CommandFailure, ResolvedConfig } from "../types.js";
import type { Reporter } from "../cli/reporter.js";

export const failure = (
  exitCode: CommandFailure["exitCode"],
  message: string
): CommandFailure => ({ exitCode, message });

const usageError = (message: string): CommandFailure => failure(1, message);

const diagnosticsError = (diagnostics: readonly Diagnostic[]): CommandFailure =>
  usageError(formatDiagnostics(diagnostics));

/**
 * Read a snippet or event file
 */
export const readTextFile = (
  filePath: string,
  what: string
): Result<string, CommandFailure> => {
  if (!existsSync(filePath)) {
    return error(
      diagnosticsError([
        createDiagnostic("EXP9001", "error", `${what} not found: ${filePath}`),
      ])
    );
  }
  try {
    return ok(readFileSync(filePath, "utf-8"));
  } catch (err) {
    return error(
      diagnosticsError([
        createDiagnostic(
          "EXP9002",
          "error",
          `Failed to read ${what.toLowerCase()} ${filePath}: ${String(err)}`
        ),
      ])
    );
  }
};

/**
 * Read the JSON event a snippet is run on
 */
export const readEventFile = (
  filePath: string
): Result<unknown, CommandFailure> =>
  flatMap(readTextFile(filePath, "Event file"), (content) => {
    try {
      return ok<unknown, CommandFailure>(JSON.parse(content));
    } catch (err) {
      return error<unknown, CommandFailure>(
        diagnosticsError([
          createDiagnostic(
            "EXP9003",
            "error",
            `Invalid JSON in event file ${filePath}: ${String(err)}`
          ),
        ])
      );
    }
  });

/**
 * The standard catalog, extended with the configured extra kinds
 */
export const loadCatalog = (
  config: ResolvedConfig,
  reporter: Reporter
): Result<BindingCatalog, CommandFailure> => {
  const standard = standardCatalog();
  if (!standard.ok) {
    return error(diagnosticsError(standard.error));
  }
  if (config.catalog === undefined) {
    return ok(standard.value);
  }

  reporter.detail(`Registering event kinds from ${config.catalog}`);
  const extended = flatMap(loadCatalogFile(config.catalog), (definitions) =>
    extendCatalog(standard.value, definitions)
  );
  return extended.ok ? extended : error(diagnosticsError(extended.error));
};

/**
 * Union of the bindings of every requested kind
 */
export const resolveKinds = (
  catalog: BindingCatalog,
  kinds: readonly string[]
): Result<ResolvedBindingSet, CommandFailure> => {
  if (kinds.length === 0) {
    return error(usageError("An event kind is required (--kind <kind>)"));
  }
  const sets = collect(
    kinds.map((kind): Result<ResolvedBindingSet, readonly Diagnostic[]> => {
      const resolved = resolveBindings(catalog, kind);
      return resolved.ok ? resolved : error([resolved.error]);
    })
  );
  return sets.ok
    ? ok(mergeBindingSets(...sets.value))
    : error(diagnosticsError(sets.error));
};

/**
 * A fresh workspace with the configured shared definitions loaded
 */
export const prepareWorkspace = (
  config: ResolvedConfig,
  reporter: Reporter
): Result<SharedWorkspace, CommandFailure> => {
  const workspace = createSharedWorkspace();
  const sharedPath = config.sharedDefinitions;
  if (sharedPath === undefined) {
    return ok(workspace);
  }

  const source = readTextFile(sharedPath, "Shared definitions file");
  if (!source.ok) {
    return source;
  }

  reporter.detail(`Loading shared definitions from ${sharedPath}`);
  const loaded = loadSharedDefinitions(source.value, {
    title: basename(sharedPath),
    workspace,
  });
  return loaded.ok
    ? ok(workspace)
    : error(failure(4, formatExpressionError(loaded.error)));
};

/**
 * Compile options for a snippet file
 */
export const compileOptionsFor = (
  config: ResolvedConfig,
  file: string,
  workspace: SharedWorkspace
): CompileOptions => ({
  title: basename(file),
  nilGuarded: config.nilGuarded,
  noOwnerLocals: config.noOwnerLocals,
  workspace,
});
