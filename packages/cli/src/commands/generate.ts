/**
 * dtoshape generate command - write the generated module
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, relative } from "node:path";
import type { ResolvedConfig, Result } from "../types.js";
import { runPipeline } from "../pipeline.js";
import { printDiagnostics, summarize } from "./report.js";

export type GenerateSummary = {
  readonly outputFile: string;
  readonly projections: number;
  readonly types: number;
};

/**
 * Compile every projection site and write the module to `config.outputFile`.
 * Nothing is written while the input has errors.
 */
export const generateCommand = (
  config: ResolvedConfig,
  sources?: ReadonlyMap<string, string>
): Result<GenerateSummary, string> => {
  const result = runPipeline(config, sources);
  if (!result.ok) {
    printDiagnostics(result.error, config);
    return { ok: false, error: "Failed to load the input program" };
  }

  const { diagnostics, hasErrors, module, projections } = result.value;
  printDiagnostics(diagnostics, config);
  if (hasErrors) {
    return {
      ok: false,
      error: `Generation aborted: ${summarize(diagnostics)}`,
    };
  }

  mkdirSync(dirname(config.outputFile), { recursive: true });
  writeFileSync(config.outputFile, module.code, "utf-8");

  if (!config.quiet) {
    console.log(
      `✓ Generated ${module.typeNames.length} type(s) for ${projections.length} projection(s)`
    );
    console.log(`  Written: ${relative(config.projectRoot, config.outputFile)}`);
  }

  return {
    ok: true,
    value: {
      outputFile: config.outputFile,
      projections: projections.length,
      types: module.typeNames.length,
    },
  };
};
