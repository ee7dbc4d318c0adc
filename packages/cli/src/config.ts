/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  type Diagnostic,
  type Result,
  createDiagnostic,
  describeType,
  error,
  isRecord,
  ok,
} from "@trigger-expressions/compiler";
import type {
  TriggerExpressionsConfig,
  CliOptions,
  ResolvedConfig,
} from "./types.js";

export const CONFIG_FILE_NAME = "trigger-expressions.json";

const STRING_FIELDS = ["$schema", "sharedDefinitions", "catalog"] as const;
const BOOLEAN_FIELDS = ["nilGuarded", "noOwnerLocals"] as const;

/**
 * Load trigger-expressions.json
 */
export const loadConfig = (
  configPath: string
): Result<TriggerExpressionsConfig, readonly Diagnostic[]> => {
  if (!existsSync(configPath)) {
    return error([
      createDiagnostic("EXP9001", "error", `Config file not found: ${configPath}`),
    ]);
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (err) {
    return error([
      createDiagnostic(
        "EXP9002",
        "error",
        `Failed to read ${configPath}: ${String(err)}`
      ),
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return error([
      createDiagnostic(
        "EXP9003",
        "error",
        `Failed to parse ${CONFIG_FILE_NAME}: ${String(err)}`
      ),
    ]);
  }

  return parseConfig(parsed);
};

/**
 * Validate already-parsed configuration. Unknown fields are ignored.
 */
export const parseConfig = (
  data: unknown
): Result<TriggerExpressionsConfig, readonly Diagnostic[]> => {
  if (!isRecord(data)) {
    return error([
      createDiagnostic(
        "EXP9004",
        "error",
        `${CONFIG_FILE_NAME} must contain an object, got ${describeType(data)}`
      ),
    ]);
  }

  const diagnostics: Diagnostic[] = [];
  for (const field of STRING_FIELDS) {
    const value = data[field];
    if (value !== undefined && typeof value !== "string") {
      diagnostics.push(
        createDiagnostic(
          "EXP9006",
          "error",
          `${CONFIG_FILE_NAME}: '${field}' must be a string, got ${describeType(value)}`
        )
      );
    }
  }
  for (const field of BOOLEAN_FIELDS) {
    const value = data[field];
    if (value !== undefined && typeof value !== "boolean") {
      diagnostics.push(
        createDiagnostic(
          "EXP9006",
          "error",
          `${CONFIG_FILE_NAME}: '${field}' must be a boolean, got ${describeType(value)}`
        )
      );
    }
  }
  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  const { sharedDefinitions, catalog, nilGuarded, noOwnerLocals } = data;
  return ok({
    ...(typeof sharedDefinitions === "string" ? { sharedDefinitions } : {}),
    ...(typeof catalog === "string" ? { catalog } : {}),
    ...(typeof nilGuarded === "boolean" ? { nilGuarded } : {}),
    ...(typeof noOwnerLocals === "boolean" ? { noOwnerLocals } : {}),
  });
};

/**
 * Find trigger-expressions.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI options. Paths in the
 * file are relative to the project root; paths given on the command
 * line are relative to the working directory.
 */
export const resolveConfig = (
  config: TriggerExpressionsConfig,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd(),
  workingDirectory: string = process.cwd()
): ResolvedConfig => {
  const fromFile = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(projectRoot, path);
  const fromCli = (path: string | undefined): string | undefined =>
    path === undefined ? undefined : resolve(workingDirectory, path);

  return {
    projectRoot,
    sharedDefinitions:
      fromCli(cliOptions.shared) ?? fromFile(config.sharedDefinitions),
    catalog: fromCli(cliOptions.catalog) ?? fromFile(config.catalog),
    kinds: cliOptions.kinds ?? [],
    eventFile: fromCli(cliOptions.event),
    nilGuarded: cliOptions.nilGuarded ?? config.nilGuarded ?? false,
    noOwnerLocals: cliOptions.noLocals ?? config.noOwnerLocals ?? false,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
