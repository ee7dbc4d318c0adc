/**
 * check command - compile a snippet without running it
 */

import {
  type CompiledExpression,
  type Result,
  compileExpression,
  error,
  formatExpressionError,
} from "@trigger-expressions/compiler";
import type { CommandFailure, ResolvedConfig } from "../types.js";
import type { Reporter } from "../cli/reporter.js";
import {
  compileOptionsFor,
  failure,
  loadCatalog,
  prepareWorkspace,
  readTextFile,
  resolveKinds,
} from "./session.js";

/**
 * Compile the snippet in `file` against the configured kinds
 */
export const compileFile = (
  config: ResolvedConfig,
  file: string | undefined,
  reporter: Reporter
): Result<CompiledExpression, CommandFailure> => {
  if (file === undefined) {
    return error(failure(1, "A snippet file is required"));
  }

  const catalog = loadCatalog(config, reporter);
  if (!catalog.ok) {
    return catalog;
  }
  const bindings = resolveKinds(catalog.value, config.kinds);
  if (!bindings.ok) {
    return bindings;
  }
  const source = readTextFile(file, "Snippet file");
  if (!source.ok) {
    return source;
  }
  const workspace = prepareWorkspace(config, reporter);
  if (!workspace.ok) {
    return workspace;
  }

  const compiled = compileExpression(
    source.value,
    bindings.value,
    compileOptionsFor(config, file, workspace.value)
  );
  return compiled.ok
    ? compiled
    : error(failure(4, formatExpressionError(compiled.error)));
};

export const checkCommand = (
  config: ResolvedConfig,
  file: string | undefined,
  reporter: Reporter
): Result<CompiledExpression, CommandFailure> => {
  const compiled = compileFile(config, file, reporter);
  if (!compiled.ok) {
    return compiled;
  }

  const { title, prelude, source } = compiled.value;
  reporter.info(`✓ Compiled ${title}`);
  reporter.result(
    prelude.length === 0
      ? "Bindings: (none)"
      : `Bindings: ${prelude.map((binding) => binding.name).join(", ")}`
  );
  reporter.detail(source);
  return compiled;
};
