/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { initProject } from "../commands/init.js";
import { generateCommand } from "../commands/generate.js";
import { checkCommand } from "../commands/check.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.error) {
    console.error(`Error: ${parsed.error}`);
    return 1;
  }

  if (parsed.command === "version") {
    console.log(`dtoshape v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  // init doesn't need a config
  if (parsed.command === "init") {
    const result = initProject(cwd, { force: parsed.options.force });
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return 1;
    }
    console.log("✓ Initialized dtoshape");
    console.log(`  Created: ${result.value}`);
    return 0;
  }

  if (parsed.command !== "generate" && parsed.command !== "check") {
    console.error(`Error: Unknown command: ${parsed.command}`);
    console.error("Run 'dtoshape --help' for usage");
    return 1;
  }

  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (!configPath) {
    console.error("Error: No dtoshape.json found");
    console.error("Run 'dtoshape init' to create one");
    return 3;
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    console.error(`Error: ${configResult.error}`);
    return 1;
  }

  const config = resolveConfig(
    configResult.value,
    parsed.options,
    dirname(configPath)
  );

  if (parsed.command === "check") {
    const result = checkCommand(config);
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return 2;
    }
    return 0;
  }

  const result = generateCommand(config);
  if (!result.ok) {
    console.error(`Error: ${result.error}`);
    return 5;
  }
  return 0;
};
