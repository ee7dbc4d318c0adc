/**
 * Invocation boundary - the only place compiled code is run
 */

import { type Result, attempt } from "../types/result.js";
import type { OwnerContext, StateBag } from "../runtime/context.js";
import type { CompiledExpression } from "./compile.js";
import { type RuntimeError, runtimeError } from "./errors.js";

/**
 * Run a compiled expression, turning anything it throws into a
 * RuntimeError so one failing expression cannot disturb the caller's
 * other work
 */
export const invokeExpression = (
  compiled: CompiledExpression,
  event: unknown,
  context?: OwnerContext,
  globals?: StateBag
): Result<unknown, RuntimeError> =>
  attempt(
    () => compiled.fn(event, context, globals),
    (cause) => runtimeError(compiled.title, cause)
  );
