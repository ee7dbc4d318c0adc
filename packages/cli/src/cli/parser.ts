/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  target?: string;
  options: CliOptions;
  /** Options the parser did not recognise */
  unknown: string[];
};

const splitKinds = (value: string): string[] =>
  value
    .split(",")
    .map((kind) => kind.trim())
    .filter((kind) => kind !== "");

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const unknown: string[] = [];
  let command = "";
  let target: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // File or kind the command works on
    if (command && !target && !arg.startsWith("-")) {
      target = arg;
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, unknown: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, unknown: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-k":
      case "--kind":
        options.kinds = [...(options.kinds ?? []), ...splitKinds(args[++i] ?? "")];
        break;
      case "-e":
      case "--event":
        options.event = args[++i] ?? "";
        break;
      case "-s":
      case "--shared":
        options.shared = args[++i] ?? "";
        break;
      case "--catalog":
        options.catalog = args[++i] ?? "";
        break;
      case "--nil-guarded":
        options.nilGuarded = true;
        break;
      case "--no-locals":
        options.noLocals = true;
        break;
      default:
        unknown.push(arg);
    }
  }

  return target === undefined
    ? { command, options, unknown }
    : { command, target, options, unknown };
};
