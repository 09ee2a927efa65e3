/**
 * Program - Public API
 */

export type { CompilerOptions, DtoshapeProgram } from "./types.js";
export { defaultTsConfig } from "./config.js";
export {
  collectTsDiagnostics,
  convertTsDiagnostic,
  getSourceLocation,
  getNodeLocation,
} from "./diagnostics.js";
export { createProgram, createCompilerOptions } from "./creation.js";
