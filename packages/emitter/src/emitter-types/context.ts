/**
 * Context creation and manipulation functions
 */

import { EmitterContext, EmitterOptions } from "./core.js";

/**
 * Create a new emitter context with default values
 */
export const createContext = (options: EmitterOptions): EmitterContext => ({
  indentLevel: 0,
  options,
  singleLine: false,
});

/**
 * Increase indentation level
 */
export const indent = (context: EmitterContext): EmitterContext => ({
  ...context,
  indentLevel: context.indentLevel + 1,
});

/**
 * Decrease indentation level
 */
export const dedent = (context: EmitterContext): EmitterContext => ({
  ...context,
  indentLevel: Math.max(0, context.indentLevel - 1),
});

export const withSingleLine = (context: EmitterContext): EmitterContext =>
  context.singleLine ? context : { ...context, singleLine: true };
