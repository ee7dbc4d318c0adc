/**
 * CLI constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

const readVersion = (json: unknown): string =>
  typeof json === "object" &&
  json !== null &&
  "version" in json &&
  typeof json.version === "string"
    ? json.version
    : "0.0.0";

export const VERSION = readVersion(packageJson);

export const PROGRAM_NAME = "trigger-expr";
