/**
 * run command - compile a snippet and call it with an event
 */

import {
  type Result,
  createGlobals,
  createOwnerContext,
  error,
  formatExpressionError,
  invokeExpression,
  ok,
} from "@trigger-expressions/compiler";
import type { CommandFailure, ResolvedConfig } from "../types.js";
import type { Reporter } from "../cli/reporter.js";
import { compileFile } from "./check.js";
import { failure, readEventFile } from "./session.js";

/**
 * JSON text of a result; undefined and functions have none
 */
export const formatValue = (value: unknown): string =>
  JSON.stringify(value, null, 2) ?? String(value);

export const runCommand = (
  config: ResolvedConfig,
  file: string | undefined,
  reporter: Reporter
): Result<unknown, CommandFailure> => {
  const compiled = compileFile(config, file, reporter);
  if (!compiled.ok) {
    return compiled;
  }

  let event: unknown = undefined;
  if (config.eventFile !== undefined) {
    const read = readEventFile(config.eventFile);
    if (!read.ok) {
      return read;
    }
    event = read.value;
  }

  reporter.detail(`Running ${compiled.value.title}`);
  const result = invokeExpression(
    compiled.value,
    event,
    createOwnerContext(),
    createGlobals()
  );
  if (!result.ok) {
    return error(failure(5, formatExpressionError(result.error)));
  }

  reporter.result(formatValue(result.value));
  return ok(result.value);
};
