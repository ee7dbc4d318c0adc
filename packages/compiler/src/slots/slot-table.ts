/**
 * Per-owner table of compiled slot expressions
 */

import { type Result, ok, error } from "../types/result.js";
import type { BindingCatalog } from "../catalog/types.js";
import type { SharedWorkspace } from "../workspace/workspace.js";
import {
  type OwnerContext,
  type StateBag,
  createOwnerContext,
} from "../runtime/context.js";
import { invokeExpression } from "../compiler/invoke.js";
import type { CompileError, RuntimeError } from "../compiler/errors.js";
import { type SlotOutcome, compileSlot, findSlot } from "./compile-slot.js";
import { type SlotTable, slotTitle } from "./specs.js";

export type SlotState =
  | { readonly status: "empty" }
  | {
      readonly status: "installed";
      readonly source: string;
      readonly outcome: SlotOutcome;
    }
  | {
      readonly status: "failed";
      readonly source: string;
      readonly error: CompileError;
    };

export type SlotTableOptions = {
  readonly slots: SlotTable;
  /** Prefix for slot titles, e.g. "Trigger 2" */
  readonly owner?: string;
  readonly context?: OwnerContext;
  readonly catalog?: BindingCatalog;
  readonly workspace?: SharedWorkspace;
  /**
   * Leave the last good expression installed when a recompilation fails,
   * instead of emptying the slot
   */
  readonly keepPreviousOnFailure?: boolean;
};

const EMPTY: SlotState = { status: "empty" };

export class ExpressionSlotTable {
  readonly context: OwnerContext;
  private readonly states = new Map<string, SlotState>();

  constructor(private readonly options: SlotTableOptions) {
    this.context = options.context ?? createOwnerContext();
  }

  titleFor(slot: string): string {
    const spec = findSlot(this.options.slots, slot);
    return spec.ok ? slotTitle(spec.value, this.options.owner) : slot;
  }

  state(slot: string): SlotState {
    return this.states.get(slot) ?? EMPTY;
  }

  /**
   * Compile `source` into `slot`. The slot is emptied first, so a failed
   * compilation never leaves a stale expression behind unless
   * `keepPreviousOnFailure` is set.
   */
  update(
    slot: string,
    source: string,
    title: string = this.titleFor(slot)
  ): Result<SlotOutcome, CompileError> {
    const previous = this.state(slot);
    this.states.delete(slot);

    const compiled = compileSlot(this.options.slots, slot, source, {
      title,
      catalog: this.options.catalog,
      workspace: this.options.workspace,
    });

    if (compiled.ok) {
      this.states.set(slot, {
        status: "installed",
        source,
        outcome: compiled.value,
      });
      return compiled;
    }

    if (
      this.options.keepPreviousOnFailure === true &&
      previous.status === "installed"
    ) {
      this.states.set(slot, previous);
    } else {
      this.states.set(slot, {
        status: "failed",
        source,
        error: compiled.error,
      });
    }
    return compiled;
  }

  clear(slot: string): void {
    this.states.delete(slot);
  }

  /**
   * Run the expression in `slot` with this table's owner context. An
   * empty or failed slot, or one holding shared definitions, gives
   * undefined.
   */
  run(
    slot: string,
    event: unknown,
    globals?: StateBag
  ): Result<unknown, RuntimeError> {
    const state = this.state(slot);
    if (state.status !== "installed" || state.outcome.kind !== "expression") {
      return ok(undefined);
    }
    return invokeExpression(state.outcome.compiled, event, this.context, globals);
  }

  /**
   * Source of every slot that has one, installed or not, for saving
   */
  sources(): Readonly<Record<string, string>> {
    const result: Record<string, string> = {};
    for (const [slot, state] of this.states) {
      if (state.status !== "empty") {
        result[slot] = state.source;
      }
    }
    return result;
  }

  /**
   * Slots whose last compilation failed
   */
  failures(): readonly CompileError[] {
    return [...this.states.values()].flatMap((state) =>
      state.status === "failed" ? [state.error] : []
    );
  }
}

export const createSlotTable = (
  options: SlotTableOptions
): ExpressionSlotTable => new ExpressionSlotTable(options);

/**
 * Install every source of a saved table, reporting each failure. Slots
 * that fail are left in the failed state; the rest are installed.
 */
export const loadSlotTable = (
  table: ExpressionSlotTable,
  sources: Readonly<Record<string, string>>
): Result<void, readonly CompileError[]> => {
  const failures = Object.entries(sources).flatMap(([slot, source]) => {
    const result = table.update(slot, source);
    return result.ok ? [] : [result.error];
  });
  return failures.length > 0 ? error(failures) : ok(undefined);
};
