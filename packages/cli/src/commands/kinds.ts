/**
 * kinds command - list the event kinds of the catalog
 */

import { type Result, ok } from "@trigger-expressions/compiler";
import type { CommandFailure, ResolvedConfig } from "../types.js";
import type { Reporter } from "../cli/reporter.js";
import { loadCatalog } from "./session.js";

export const kindsCommand = (
  config: ResolvedConfig,
  reporter: Reporter
): Result<void, CommandFailure> => {
  const catalog = loadCatalog(config, reporter);
  if (!catalog.ok) {
    return catalog;
  }

  const kinds = [...catalog.value.kinds];
  const width = Math.max(0, ...kinds.map(([kind]) => kind.length));
  for (const [kind, entry] of kinds) {
    reporter.result(
      entry.description === undefined
        ? kind
        : `${kind.padEnd(width)}  ${entry.description}`
    );
    if (entry.inherits.length > 0) {
      reporter.detail(
        `${" ".repeat(width)}  inherits ${entry.inherits.join(", ")}`
      );
    }
  }
  return ok(undefined);
};
