/**
 * Emitter types - re-exports
 */

export type { EmitterOptions, EmitterContext, TsFragment } from "./core.js";
export { createContext, indent, dedent, withSingleLine } from "./context.js";
export {
  getIndent,
  escapeComment,
  isIdentifierName,
  formatPropertyKey,
} from "./formatting.js";
