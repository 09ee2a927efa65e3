/**
 * dtoshape check command - report diagnostics without writing
 */

import { Diagnostic } from "@dtoshape/frontend";
import type { ResolvedConfig, Result } from "../types.js";
import { runPipeline } from "../pipeline.js";
import { printDiagnostics, summarize } from "./report.js";

export const checkCommand = (
  config: ResolvedConfig,
  sources?: ReadonlyMap<string, string>
): Result<readonly Diagnostic[], string> => {
  const result = runPipeline(config, sources);
  if (!result.ok) {
    printDiagnostics(result.error, config);
    return { ok: false, error: "Failed to load the input program" };
  }

  const { diagnostics, hasErrors, projections } = result.value;
  printDiagnostics(diagnostics, config);

  if (hasErrors) {
    return { ok: false, error: `Check failed: ${summarize(diagnostics)}` };
  }
  if (!config.quiet) {
    console.log(`✓ ${projections.length} projection(s) checked: ${summarize(diagnostics)}`);
  }
  return { ok: true, value: diagnostics };
};
