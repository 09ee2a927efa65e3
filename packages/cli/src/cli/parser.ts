/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly options: CliOptions;
  /** Set when an option is unknown or lacks its value */
  readonly error?: string;
};

const VALUE_OPTIONS = new Set([
  "-c",
  "--config",
  "-o",
  "--out",
  "-s",
  "--selector",
  "--null-handling",
]);

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    let value = "";
    if (VALUE_OPTIONS.has(arg)) {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("-")) {
        return { command, options, error: `Option ${arg} requires a value` };
      }
      value = next;
      i++;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-f":
      case "--force":
        options.force = true;
        break;
      case "-c":
      case "--config":
        options.config = value;
        break;
      case "-o":
      case "--out":
        options.out = value;
        break;
      case "-s":
      case "--selector":
        options.selectors = [...(options.selectors ?? []), value];
        break;
      case "--null-handling":
        if (value !== "guard" && value !== "optional-chain") {
          return {
            command,
            options,
            error: `--null-handling must be "guard" or "optional-chain"`,
          };
        }
        options.nullHandling = value;
        break;
      default:
        return { command, options, error: `Unknown option: ${arg}` };
    }
  }

  return { command, options };
};
