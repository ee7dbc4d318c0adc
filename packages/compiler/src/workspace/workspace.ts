/**
 * Shared workspace - the one evaluation scope that expressions are
 * compiled in and shared definitions are loaded into
 */

import * as vm from "node:vm";
import { type Result, ok, error, attempt } from "../types/result.js";
import { type Diagnostic, createDiagnostic } from "../types/diagnostic.js";
import { createPrelude } from "./prelude.js";
import { type DeviceServices, offlineServices } from "./services.js";

export type RunOptions = {
  /** Name shown in stack traces */
  readonly filename: string;
  /** Added to line numbers in stack traces */
  readonly lineOffset?: number;
};

/**
 * Access to the workspace while holding its lock
 */
export type WorkspaceScope = {
  /** Evaluate code, capturing anything thrown as the error */
  readonly run: (code: string, options: RunOptions) => Result<unknown, unknown>;
};

export type EvaluationFailure =
  | { readonly kind: "busy"; readonly diagnostic: Diagnostic }
  | { readonly kind: "thrown"; readonly cause: unknown };

export type WorkspaceOptions = {
  readonly services?: DeviceServices;
  /** Console snippets log to */
  readonly console?: Console;
};

/**
 * Host facilities a fresh `vm` context lacks: timers, microtasks and the
 * web-platform globals Node provides
 */
const hostFacilities = () => ({
  setTimeout,
  clearTimeout,
  setInterval,
  clearInterval,
  setImmediate,
  clearImmediate,
  queueMicrotask,
  structuredClone,
  URL,
  URLSearchParams,
  TextEncoder,
  TextDecoder,
  AbortController,
  AbortSignal,
  Buffer,
  performance,
});

export class SharedWorkspace {
  private readonly context: vm.Context;
  private services: DeviceServices;
  private locked = false;

  constructor(options: WorkspaceOptions = {}) {
    this.services = options.services ?? offlineServices;
    this.context = vm.createContext({
      ...hostFacilities(),
      console: options.console ?? console,
      ...createPrelude(() => this.services),
    });
  }

  /**
   * Swap the network lookups the helpers read through
   */
  useServices(services: DeviceServices): void {
    this.services = services;
  }

  /**
   * Run `fn` holding the workspace lock. Fails with EXP1004 when the
   * lock is already held, as when a snippet being evaluated tries to
   * compile another one.
   */
  exclusive<T>(fn: (scope: WorkspaceScope) => T): Result<T, Diagnostic> {
    if (this.locked) {
      return error(
        createDiagnostic(
          "EXP1004",
          "error",
          "The shared workspace is busy with another compilation"
        )
      );
    }

    this.locked = true;
    try {
      return ok(fn({ run: (code, options) => this.run(code, options) }));
    } finally {
      this.locked = false;
    }
  }

  /**
   * Evaluate one piece of code under the lock
   */
  evaluate(
    code: string,
    options: RunOptions
  ): Result<unknown, EvaluationFailure> {
    const outcome = this.exclusive((scope) => scope.run(code, options));
    if (!outcome.ok) {
      return error<unknown, EvaluationFailure>({
        kind: "busy",
        diagnostic: outcome.error,
      });
    }
    const evaluated = outcome.value;
    return evaluated.ok
      ? ok(evaluated.value)
      : error<unknown, EvaluationFailure>({
          kind: "thrown",
          cause: evaluated.error,
        });
  }

  define(name: string, value: unknown): void {
    this.context[name] = value;
  }

  lookup(name: string): unknown {
    return this.has(name) ? this.context[name] : undefined;
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.context, name);
  }

  private run(code: string, options: RunOptions): Result<unknown, unknown> {
    return attempt(
      (): unknown =>
        new vm.Script(code, {
          filename: options.filename,
          lineOffset: options.lineOffset ?? 0,
        }).runInContext(this.context),
      (thrown) => thrown
    );
  }
}

export const createSharedWorkspace = (
  options: WorkspaceOptions = {}
): SharedWorkspace => new SharedWorkspace(options);

let processWorkspace: SharedWorkspace | undefined;

/**
 * The process-wide workspace, created on first use
 */
export const sharedWorkspace = (): SharedWorkspace => {
  processWorkspace ??= createSharedWorkspace();
  return processWorkspace;
};
