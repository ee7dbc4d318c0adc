/**
 * bindings command - list what a snippet for a kind can refer to
 */

import {
  type Result,
  describeBindings,
  error,
  formatDiagnostic,
  ok,
  resolveBindings,
} from "@trigger-expressions/compiler";
import type { CommandFailure, ResolvedConfig } from "../types.js";
import type { Reporter } from "../cli/reporter.js";
import { failure, loadCatalog } from "./session.js";

export const bindingsCommand = (
  config: ResolvedConfig,
  kind: string | undefined,
  reporter: Reporter
): Result<void, CommandFailure> => {
  if (kind === undefined) {
    return error(failure(1, "An event kind is required"));
  }

  const catalog = loadCatalog(config, reporter);
  if (!catalog.ok) {
    return catalog;
  }

  const resolved = resolveBindings(catalog.value, kind);
  if (!resolved.ok) {
    return error(failure(1, formatDiagnostic(resolved.error)));
  }

  const bindings = describeBindings(resolved.value);
  const width = Math.max(0, ...bindings.map((binding) => binding.name.length));
  for (const { name, doc, requires } of bindings) {
    reporter.result(`${name.padEnd(width)}  ${doc}`);
    if (requires !== undefined) {
      reporter.detail(`${" ".repeat(width)}  requires ${requires}`);
    }
  }
  return ok(undefined);
};
