/**
 * Diagnostic printing for command output
 */

import {
  Diagnostic,
  countBySeverity,
  formatDiagnostic,
} from "@dtoshape/frontend";
import type { ResolvedConfig } from "../types.js";

/**
 * Errors always print; warnings and infos are silenced by --quiet
 */
export const printDiagnostics = (
  diagnostics: readonly Diagnostic[],
  config: Pick<ResolvedConfig, "quiet">
): void => {
  for (const diagnostic of diagnostics) {
    if (diagnostic.severity === "error") {
      console.error(formatDiagnostic(diagnostic));
    } else if (!config.quiet) {
      console.log(formatDiagnostic(diagnostic));
    }
  }
};

export const summarize = (diagnostics: readonly Diagnostic[]): string => {
  const counts = countBySeverity(diagnostics);
  return `${counts.error} error(s), ${counts.warning} warning(s), ${counts.info} info`;
};
