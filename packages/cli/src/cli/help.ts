/**
 * CLI help message
 */

import { PROGRAM_NAME, VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
Trigger expression compiler v${VERSION}

USAGE:
  ${PROGRAM_NAME} <command> [options]

COMMANDS:
  kinds                     List event kinds
  bindings <kind>           List the bindings available for a kind
  check <file>              Compile a snippet and show what it binds
  run <file>                Compile a snippet and run it on an event

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Suppress output
  -c, --config <file>       Config file path (default: trigger-expressions.json)

CHECK/RUN OPTIONS:
  -k, --kind <kind>         Event kind, repeat or separate with commas to merge
  -e, --event <file>        JSON file holding the event (run only)
  -s, --shared <file>       Shared definitions loaded before compiling
  --catalog <file>          Extra event kinds to register
  --nil-guarded             Bindings are undefined when there is no event
  --no-locals               Do not bind the owner's locals

EXAMPLES:
  ${PROGRAM_NAME} kinds
  ${PROGRAM_NAME} bindings cdj-status
  ${PROGRAM_NAME} check beat.ts --kind beat
  ${PROGRAM_NAME} run enabled.ts --kind cdj-status,mixer-status --event status.json
`);
};
