/**
 * Diagnostic types for dtoshape
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Input program (DSH1xxx, DSH2xxx)
  | "DSH1001" // Source file not found
  | "DSH1002" // Selector call has no projection lambda
  | "DSH2001" // TypeScript error in input program
  // Projection shape (DSH3xxx)
  | "DSH3001" // Nested projection could not be expanded
  | "DSH3002" // Unsupported syntax kept verbatim
  | "DSH3003" // Projection has no nameable fields
  | "DSH3004" // Duplicate field name dropped
  // Captures and null handling (DSH4xxx)
  | "DSH4001" // Missing capture
  | "DSH4002" // Unnecessary capture
  | "DSH4003" // Explicit null guard can be an optional chain
  | "DSH4004" // Two captures need the same name
  // Identity (DSH5xxx)
  | "DSH5001" // Hash collision, identity widened
  // Internal (DSH6xxx)
  | "DSH6001"; // Internal compiler error

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

export type DiagnosticsCollector = {
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

export const createDiagnosticsCollector = (
  initial: readonly Diagnostic[] = []
): DiagnosticsCollector => ({
  diagnostics: initial,
  hasErrors: initial.some(isError),
});

export const addDiagnostic = (
  collector: DiagnosticsCollector,
  diagnostic: Diagnostic
): DiagnosticsCollector => ({
  diagnostics: [...collector.diagnostics, diagnostic],
  hasErrors: collector.hasErrors || isError(diagnostic),
});

export const mergeDiagnostics = (
  collector1: DiagnosticsCollector,
  collector2: DiagnosticsCollector
): DiagnosticsCollector => ({
  diagnostics: [...collector1.diagnostics, ...collector2.diagnostics],
  hasErrors: collector1.hasErrors || collector2.hasErrors,
});

/**
 * Count diagnostics per severity, for summaries.
 */
export const countBySeverity = (
  diagnostics: readonly Diagnostic[]
): Readonly<Record<DiagnosticSeverity, number>> => ({
  error: diagnostics.filter((d) => d.severity === "error").length,
  warning: diagnostics.filter((d) => d.severity === "warning").length,
  info: diagnostics.filter((d) => d.severity === "info").length,
});
