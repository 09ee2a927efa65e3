/**
 * Emitter Types
 * Main dispatcher - re-exports from emitter-types/ subdirectory
 */

export type {
  EmitterOptions,
  EmitterContext,
  TsFragment,
} from "./emitter-types/index.js";
export {
  createContext,
  indent,
  dedent,
  withSingleLine,
  getIndent,
  escapeComment,
  isIdentifierName,
  formatPropertyKey,
} from "./emitter-types/index.js";
