/**
 * Formatting helper functions
 */

import { EmitterContext } from "./core.js";

/**
 * Get indentation string for current level
 */
export const getIndent = (context: EmitterContext): string => {
  const spaces = context.options.indent ?? 2;
  return " ".repeat(spaces * context.indentLevel);
};

/**
 * Text that can close a block comment is broken up
 */
export const escapeComment = (text: string): string =>
  text.replace(/\*\//g, "*\\/").replace(/\s*\n\s*/g, " ");

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export const isIdentifierName = (name: string): boolean => IDENTIFIER.test(name);

/**
 * Property key as written in an object literal or interface
 */
export const formatPropertyKey = (key: string): string =>
  isIdentifierName(key) ? key : JSON.stringify(key);
