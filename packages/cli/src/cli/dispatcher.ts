/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { type Result, formatDiagnostics } from "@trigger-expressions/compiler";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { kindsCommand } from "../commands/kinds.js";
import { bindingsCommand } from "../commands/bindings.js";
import { checkCommand } from "../commands/check.js";
import { runCommand } from "../commands/run.js";
import type { CommandFailure, TriggerExpressionsConfig } from "../types.js";
import { PROGRAM_NAME, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";
import { type Reporter, createConsoleReporter } from "./reporter.js";

export type CliEnvironment = {
  readonly cwd: string;
  readonly reporter?: Reporter;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  environment: CliEnvironment = { cwd: process.cwd() }
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`${PROGRAM_NAME} v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  const reporter =
    environment.reporter ??
    createConsoleReporter({
      verbose: parsed.options.verbose ?? false,
      quiet: parsed.options.quiet ?? false,
    });

  if (parsed.unknown.length > 0) {
    reporter.error(`Error: Unknown option '${parsed.unknown.join("', '")}'`);
    return 1;
  }

  // The config file is optional unless named explicitly
  const configPath = parsed.options.config
    ? resolve(environment.cwd, parsed.options.config)
    : findConfig(environment.cwd);

  let fileConfig: TriggerExpressionsConfig = {};
  if (configPath) {
    const loaded = loadConfig(configPath);
    if (!loaded.ok) {
      reporter.error(formatDiagnostics(loaded.error));
      return 1;
    }
    fileConfig = loaded.value;
    reporter.detail(`Using ${configPath}`);
  }

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    configPath ? dirname(configPath) : environment.cwd,
    environment.cwd
  );
  const target =
    parsed.target === undefined
      ? undefined
      : resolve(environment.cwd, parsed.target);

  const finish = (outcome: Result<unknown, CommandFailure>): number => {
    if (!outcome.ok) {
      reporter.error(outcome.error.message);
      return outcome.error.exitCode;
    }
    return 0;
  };

  // Dispatch to command handlers
  switch (parsed.command) {
    case "kinds":
      return finish(kindsCommand(config, reporter));

    case "bindings":
      return finish(bindingsCommand(config, parsed.target, reporter));

    case "check":
      return finish(checkCommand(config, target, reporter));

    case "run":
      return finish(runCommand(config, target, reporter));

    default:
      reporter.error(`Error: Unknown command '${parsed.command}'`);
      reporter.error(`Run '${PROGRAM_NAME} --help' for usage information`);
      return 2;
  }
};
