/**
 * dtoshape frontend - TypeScript program loading, projection discovery and
 * expression IR
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  countBySeverity,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./program/index.js";
export * from "./ir/types.js";
export * from "./ir/traversal.js";
export * from "./ir/equality.js";
export * from "./ir/chains.js";
export { type IrNodeMap, createNodeMap } from "./ir/node-map.js";
export { convertExpression } from "./ir/expression-converter.js";
export {
  type ParsedExpression,
  parseExpression,
} from "./ir/parse-expression.js";
export { createConverterContext } from "./ir/converters/context.js";
export * from "./semantic/type-descriptor.js";
export * from "./semantic/type-resolver.js";
export {
  type CheckerResolver,
  createCheckerResolver,
} from "./semantic/checker-resolver.js";
export * from "./discovery/projection-sites.js";
export { type NamingHints, findNamingHints } from "./discovery/naming-hints.js";

import { createProgram } from "./program/creation.js";
import { CompilerOptions, DtoshapeProgram } from "./program/types.js";
import {
  DiscoveryOptions,
  ProjectionSite,
  findProjectionSites,
} from "./discovery/projection-sites.js";
import { Diagnostic, DiagnosticsCollector } from "./types/diagnostic.js";
import { Result, ok } from "./types/result.js";

export type AnalyzeResult = {
  readonly program: DtoshapeProgram;
  readonly sites: readonly ProjectionSite[];
  /** TypeScript diagnostics followed by discovery diagnostics */
  readonly diagnostics: readonly Diagnostic[];
  readonly hasTypeErrors: boolean;
};

/**
 * Main entry point: load the files and find their projection sites
 */
export const analyzeFiles = (
  filePaths: readonly string[],
  options: CompilerOptions & DiscoveryOptions
): Result<AnalyzeResult, DiagnosticsCollector> => {
  const programResult = createProgram(filePaths, options);
  if (!programResult.ok) {
    return programResult;
  }

  const program = programResult.value;
  const discovery = findProjectionSites(program, options);

  if (options.verbose) {
    console.log(`Found ${discovery.sites.length} projection site(s)`);
  }

  return ok({
    program,
    sites: discovery.sites,
    diagnostics: [
      ...program.diagnostics.diagnostics,
      ...discovery.diagnostics,
    ],
    hasTypeErrors: program.diagnostics.hasErrors,
  });
};
