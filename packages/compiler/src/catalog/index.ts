/**
 * Binding catalog - event kinds, their bindings and inheritance
 */

export type {
  Binding,
  BindingCatalog,
  EventKind,
  EventKindDefinition,
  EventKindEntry,
  ResolvedBindingSet,
  StandardEventKind,
} from "./types.js";
export {
  CONTEXT_PARAMETER,
  EVENT_PARAMETER,
  GLOBALS_PARAMETER,
  LOCALS_NAME,
  RESERVED_NAMES,
} from "./types.js";
export {
  createBindingCatalog,
  extendCatalog,
  isSingleExpression,
  isValidBindingName,
} from "./builder.js";
export type { BindingDescription } from "./resolver.js";
export {
  compareNames,
  describeBindings,
  mergeBindingSets,
  resolveBindings,
} from "./resolver.js";
export { loadCatalogFile, parseCatalogData } from "./loader.js";
export { STANDARD_CATALOG_PATH, standardCatalog } from "./standard.js";
