/**
 * Program creation
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import { Result, ok, error } from "../types/result.js";
import {
  DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { CompilerOptions, DtoshapeProgram } from "./types.js";
import { defaultTsConfig } from "./config.js";
import { collectTsDiagnostics } from "./diagnostics.js";

/**
 * Create TypeScript compiler options from dtoshape options
 */
export const createCompilerOptions = (
  options: CompilerOptions
): ts.CompilerOptions => ({
  ...defaultTsConfig,
  strict: options.strict ?? true,
});

/**
 * Compiler host that serves in-memory sources before falling back to disk
 */
const createHost = (
  tsOptions: ts.CompilerOptions,
  sources: ReadonlyMap<string, string>
): ts.CompilerHost => {
  const host = ts.createCompilerHost(tsOptions);
  if (sources.size === 0) {
    return host;
  }

  const originalGetSourceFile = host.getSourceFile;
  const originalFileExists = host.fileExists;
  const originalReadFile = host.readFile;

  host.getSourceFile = (
    fileName: string,
    languageVersion: ts.ScriptTarget | ts.CreateSourceFileOptions,
    onError?: (message: string) => void,
    shouldCreateNewSourceFile?: boolean
  ): ts.SourceFile | undefined => {
    const text = sources.get(path.resolve(fileName));
    if (text !== undefined) {
      return ts.createSourceFile(fileName, text, languageVersion, true);
    }
    return originalGetSourceFile.call(
      host,
      fileName,
      languageVersion,
      onError,
      shouldCreateNewSourceFile
    );
  };
  host.fileExists = (fileName: string): boolean =>
    sources.has(path.resolve(fileName)) ||
    originalFileExists.call(host, fileName);
  host.readFile = (fileName: string): string | undefined =>
    sources.get(path.resolve(fileName)) ?? originalReadFile.call(host, fileName);

  return host;
};

/**
 * Create a program over the given entry files.
 *
 * Type errors in the input do not fail creation; they are returned alongside
 * the program so `check` can report them and `generate` can refuse to run.
 * Missing entry files do fail creation (DSH1001).
 */
export const createProgram = (
  filePaths: readonly string[],
  options: CompilerOptions
): Result<
  DtoshapeProgram & { readonly diagnostics: DiagnosticsCollector },
  DiagnosticsCollector
> => {
  const sources = options.sources ?? new Map<string, string>();
  const absolutePaths = filePaths.map((fp) =>
    path.resolve(options.projectRoot, fp)
  );

  const missing = absolutePaths.filter(
    (fp) => !sources.has(fp) && !fs.existsSync(fp)
  );
  if (missing.length > 0) {
    return error(
      missing.reduce(
        (collector, fp) =>
          addDiagnostic(
            collector,
            createDiagnostic("DSH1001", "error", `Source file not found: ${fp}`)
          ),
        createDiagnosticsCollector()
      )
    );
  }

  const tsOptions = createCompilerOptions(options);
  const host = createHost(tsOptions, sources);

  if (options.verbose) {
    console.log(`Creating program for ${absolutePaths.length} file(s)`);
    for (const fp of absolutePaths) {
      console.log(`  ${fp}`);
    }
  }

  const program = ts.createProgram(absolutePaths, tsOptions, host);
  const diagnostics = collectTsDiagnostics(program);

  const sourceFiles = absolutePaths
    .map((fp) => program.getSourceFile(fp))
    .filter((sf): sf is ts.SourceFile => sf !== undefined);

  if (options.verbose) {
    console.log(
      `Program created: ${program.getSourceFiles().length} file(s) loaded, ${diagnostics.diagnostics.length} TypeScript diagnostic(s)`
    );
  }

  return ok({
    program,
    checker: program.getTypeChecker(),
    options,
    sourceFiles,
    diagnostics,
  });
};
