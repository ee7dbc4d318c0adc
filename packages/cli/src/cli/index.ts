/**
 * CLI - Public API
 */

export { VERSION } from "./constants.js";
export { showHelp } from "./help.js";
export { parseArgs } from "./parser.js";
export { runCli } from "./dispatcher.js";
export {
  type Reporter,
  createConsoleReporter,
  createMemoryReporter,
} from "./reporter.js";
