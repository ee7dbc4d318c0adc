/**
 * Type definitions for CLI
 */

/**
 * Project configuration file (trigger-expressions.json)
 */
export type TriggerExpressionsConfig = {
  readonly $schema?: string;
  /** Snippet of shared definitions loaded before compiling */
  readonly sharedDefinitions?: string;
  /** Extra event kinds registered on top of the standard catalog */
  readonly catalog?: string;
  readonly nilGuarded?: boolean;
  readonly noOwnerLocals?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  kinds?: string[];
  event?: string;
  shared?: string;
  catalog?: string;
  nilGuarded?: boolean;
  noLocals?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  /** Directory containing trigger-expressions.json, or the working directory */
  readonly projectRoot: string;
  readonly sharedDefinitions: string | undefined;
  readonly catalog: string | undefined;
  readonly kinds: readonly string[];
  readonly eventFile: string | undefined;
  readonly nilGuarded: boolean;
  readonly noOwnerLocals: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Why a command failed, and the exit code to report it with
 */
export type CommandFailure = {
  readonly exitCode: 1 | 4 | 5;
  readonly message: string;
};
