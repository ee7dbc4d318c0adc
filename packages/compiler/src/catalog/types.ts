/**
 * Binding catalog type definitions
 */

/**
 * Discriminator for the shape of an incoming event. Catalogs may register
 * their own kinds; the ones shipped with the standard catalog are listed
 * in `StandardEventKind`.
 */
export type EventKind = string;

export type StandardEventKind =
  | "device-update"
  | "metadata"
  | "beat-shared"
  | "beat"
  | "mixer-status"
  | "cdj-status"
  | "beat-with-position";

/**
 * A named value made available to expressions. `generator` is a
 * JavaScript expression over `event` and earlier bindings; `requires`
 * names a binding that must be bound before this one.
 */
export type Binding = {
  readonly name: string;
  readonly generator: string;
  readonly doc: string;
  readonly requires?: string;
};

export type EventKindDefinition = {
  readonly kind: EventKind;
  readonly description?: string;
  readonly inherits: readonly EventKind[];
  readonly bindings: readonly Binding[];
};

export type EventKindEntry = {
  readonly description?: string;
  readonly inherits: readonly EventKind[];
  readonly bindings: ReadonlyMap<string, Binding>;
};

/**
 * Flattened bindings available to one event kind
 */
export type ResolvedBindingSet = {
  readonly kinds: readonly EventKind[];
  readonly bindings: ReadonlyMap<string, Binding>;
};

export type BindingCatalog = {
  readonly kinds: ReadonlyMap<EventKind, EventKindEntry>;
  readonly resolved: ReadonlyMap<EventKind, ResolvedBindingSet>;
};

/**
 * Parameter and local names every generated expression declares
 */
export const EVENT_PARAMETER = "event";
export const CONTEXT_PARAMETER = "context";
export const GLOBALS_PARAMETER = "globals";
export const LOCALS_NAME = "locals";

export const RESERVED_NAMES: ReadonlySet<string> = new Set([
  EVENT_PARAMETER,
  CONTEXT_PARAMETER,
  GLOBALS_PARAMETER,
  LOCALS_NAME,
]);
