/**
 * The catalog shipped with the application
 */

import { fileURLToPath } from "node:url";
import { type Result, flatMap } from "../types/result.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createBindingCatalog } from "./builder.js";
import { loadCatalogFile } from "./loader.js";
import type { BindingCatalog } from "./types.js";

export const STANDARD_CATALOG_PATH = fileURLToPath(
  new URL("./catalog.json", import.meta.url)
);

let standard: Result<BindingCatalog, readonly Diagnostic[]> | undefined;

/**
 * Standard catalog, built once per process
 */
export const standardCatalog = (): Result<
  BindingCatalog,
  readonly Diagnostic[]
> => {
  standard ??= flatMap(loadCatalogFile(STANDARD_CATALOG_PATH), (definitions) =>
    createBindingCatalog(definitions)
  );
  return standard;
};
