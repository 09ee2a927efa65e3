/**
 * Type definitions for CLI
 */

import type { NullHandling } from "@dtoshape/compiler";

export type CommentOutput = "all" | "none";

/**
 * dtoshape configuration file (dtoshape.json)
 */
export type DtoshapeConfig = {
  readonly $schema?: string;
  /** Entry files, relative to the directory holding dtoshape.json */
  readonly include: readonly string[];
  readonly outputFile?: string;
  readonly selectorNames?: readonly string[];
  readonly mapOperators?: readonly string[];
  readonly nullHandling?: NullHandling;
  readonly arrayNullabilityRemoval?: boolean;
  readonly readonlyProperties?: boolean;
  readonly commentOutput?: CommentOutput;
  readonly strict?: boolean;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  nullHandling?: NullHandling;
  selectors?: string[];
  force?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  /** Directory containing dtoshape.json */
  readonly projectRoot: string;
  /** Absolute entry file paths */
  readonly include: readonly string[];
  /** Absolute path of the generated module */
  readonly outputFile: string;
  readonly selectorNames: readonly string[];
  readonly mapOperators: readonly string[];
  readonly nullHandling: NullHandling;
  readonly arrayNullabilityRemoval: boolean;
  readonly readonlyProperties: boolean;
  readonly commentOutput: CommentOutput;
  readonly strict: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

export type { Result } from "@dtoshape/frontend";
