/**
 * Source locations, and TypeScript diagnostics of the input as DSH2001
 */

import * as ts from "typescript";
import {
  Diagnostic,
  DiagnosticSeverity,
  DiagnosticsCollector,
  SourceLocation,
  createDiagnosticsCollector,
  createDiagnostic,
} from "../types/diagnostic.js";

const SEVERITY_BY_CATEGORY: Readonly<
  Record<ts.DiagnosticCategory, DiagnosticSeverity | undefined>
> = {
  [ts.DiagnosticCategory.Error]: "error",
  [ts.DiagnosticCategory.Warning]: "warning",
  [ts.DiagnosticCategory.Message]: "info",
  [ts.DiagnosticCategory.Suggestion]: undefined,
};

const TYPE_ERROR_HINT =
  "Field types are read from the checker; fix the input before generating";

export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const position = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: position.line + 1,
    column: position.character + 1,
    length,
  };
};

export const getNodeLocation = (node: ts.Node): SourceLocation => {
  const sourceFile = node.getSourceFile();
  const start = node.getStart(sourceFile);
  return getSourceLocation(sourceFile, start, node.getEnd() - start);
};

/**
 * Convert one TypeScript diagnostic; suggestions yield nothing
 */
export const convertTsDiagnostic = (
  tsDiagnostic: ts.Diagnostic
): Diagnostic | undefined => {
  const severity = SEVERITY_BY_CATEGORY[tsDiagnostic.category];
  if (severity === undefined) return undefined;

  const { file, start } = tsDiagnostic;
  const text = ts.flattenDiagnosticMessageText(tsDiagnostic.messageText, "\n");
  return createDiagnostic(
    "DSH2001",
    severity,
    `TS${tsDiagnostic.code}: ${text}`,
    file && start !== undefined
      ? getSourceLocation(file, start, tsDiagnostic.length ?? 1)
      : undefined,
    severity === "error" ? TYPE_ERROR_HINT : undefined
  );
};

/**
 * Option, syntax and type diagnostics of the whole program, in that order
 */
export const collectTsDiagnostics = (
  program: ts.Program
): DiagnosticsCollector =>
  createDiagnosticsCollector(
    ts
      .sortAndDeduplicateDiagnostics([
        ...program.getConfigFileParsingDiagnostics(),
        ...program.getOptionsDiagnostics(),
        ...program.getGlobalDiagnostics(),
      ])
      .concat(program.getSyntacticDiagnostics(), program.getSemanticDiagnostics())
      .flatMap((tsDiagnostic) => {
        const diagnostic = convertTsDiagnostic(tsDiagnostic);
        return diagnostic ? [diagnostic] : [];
      })
  );
