/**
 * Program type definitions
 */

import * as ts from "typescript";

export type CompilerOptions = {
  /** Directory that relative include paths and output paths resolve against */
  readonly projectRoot: string;
  readonly strict?: boolean;
  readonly verbose?: boolean;
  /**
   * In-memory file contents keyed by absolute path. Files listed here shadow
   * the disk, which keeps tests free of temp directories.
   */
  readonly sources?: ReadonlyMap<string, string>;
};

export type DtoshapeProgram = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly options: CompilerOptions;
  /** The requested root files, in request order */
  readonly sourceFiles: readonly ts.SourceFile[];
};
