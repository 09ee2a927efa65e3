#!/usr/bin/env node
/**
 * dtoshape CLI - command-line interface for the projection compiler
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { runCli } from "./cli/index.js";

const isEntryPoint = (): boolean => {
  const script = process.argv[1];
  return (
    script !== undefined &&
    realpathSync(script) === realpathSync(fileURLToPath(import.meta.url))
  );
};

if (isEntryPoint()) {
  runCli(process.argv.slice(2))
    .then((exitCode) => {
      process.exit(exitCode);
    })
    .catch((error: unknown) => {
      console.error("Fatal error:", error);
      process.exit(1);
    });
}

// Export for testing
export { runCli } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export { runPipeline, type PipelineResult } from "./pipeline.js";
export { generateCommand, type GenerateSummary } from "./commands/generate.js";
export { checkCommand } from "./commands/check.js";
export { initProject, DEFAULT_CONFIG } from "./commands/init.js";
