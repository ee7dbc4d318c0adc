/**
 * Expression slots - the places an owner can attach a snippet
 */

import type { EventKind } from "../catalog/types.js";

export type ExpressionSlotSpec = {
  readonly title: string;
  readonly description: string;
  /** Kinds whose bindings are merged, in order; empty for event-less slots */
  readonly kinds: readonly EventKind[];
  readonly nilGuarded: boolean;
  readonly noOwnerLocals: boolean;
  /** Snippet is a block of shared definitions rather than an expression */
  readonly sharedDefinitions?: boolean;
};

export type SlotTable = Readonly<Record<string, ExpressionSlotSpec>>;

const STATUS_KINDS = ["cdj-status", "mixer-status"] as const;

export const triggerSlots = {
  setup: {
    title: "Setup Expression",
    description:
      "Called once when the trigger is created or loaded, to prepare its locals.",
    kinds: [],
    nilGuarded: true,
    noOwnerLocals: false,
  },
  enabled: {
    title: "Enabled Expression",
    description:
      "Called for each status update from the watched player to decide whether the trigger is enabled.",
    kinds: STATUS_KINDS,
    nilGuarded: false,
    noOwnerLocals: false,
  },
  activation: {
    title: "Activation Expression",
    description: "Called when the trigger becomes active.",
    kinds: STATUS_KINDS,
    nilGuarded: false,
    noOwnerLocals: false,
  },
  beat: {
    title: "Beat Expression",
    description: "Called for each beat from the watched player.",
    kinds: ["beat"],
    nilGuarded: false,
    noOwnerLocals: false,
  },
  tracked: {
    title: "Tracked Update Expression",
    description:
      "Called for each status update from the watched player while the trigger is active.",
    kinds: ["cdj-status"],
    nilGuarded: false,
    noOwnerLocals: false,
  },
  deactivation: {
    title: "Deactivation Expression",
    description:
      "Called when the trigger stops being active. There may be no status, for example when the trigger is disabled.",
    kinds: STATUS_KINDS,
    nilGuarded: true,
    noOwnerLocals: false,
  },
  shutdown: {
    title: "Shutdown Expression",
    description:
      "Called when the trigger is deleted or the application exits, to release what setup acquired.",
    kinds: [],
    nilGuarded: true,
    noOwnerLocals: false,
  },
} as const satisfies SlotTable;

export const globalSlots = {
  setup: {
    title: "Global Setup Expression",
    description: "Called once when the application starts, to prepare globals.",
    kinds: [],
    nilGuarded: true,
    noOwnerLocals: true,
  },
  shutdown: {
    title: "Global Shutdown Expression",
    description: "Called when the application exits.",
    kinds: [],
    nilGuarded: true,
    noOwnerLocals: true,
  },
  shared: {
    title: "Shared Functions",
    description:
      "Definitions evaluated into the shared workspace, callable from every expression.",
    kinds: [],
    nilGuarded: true,
    noOwnerLocals: true,
    sharedDefinitions: true,
  },
} as const satisfies SlotTable;

export type TriggerSlot = keyof typeof triggerSlots;
export type GlobalSlot = keyof typeof globalSlots;

/**
 * Title of a slot as its owner shows it, e.g. "Trigger 2 Beat Expression"
 */
export const slotTitle = (spec: ExpressionSlotSpec, owner?: string): string =>
  owner === undefined ? spec.title : `${owner} ${spec.title}`;
