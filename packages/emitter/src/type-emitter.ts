/**
 * Type Emitter - TypeDescriptors to TypeScript type text
 */

import { TypeDescriptor } from "@dtoshape/frontend";

const needsUnionParens = (text: string): boolean =>
  /=>/.test(text) || /^(keyof|typeof|new)\s/.test(text);

/**
 * The type as written, with `| null` when it admits null
 */
export const emitType = (
  descriptor: TypeDescriptor,
  nullable = descriptor.isNullableAnnotated
): string => {
  const text = descriptor.fullyQualifiedName;
  if (!nullable) return text;
  const base = needsUnionParens(text) ? `(${text})` : text;
  return `${base} | null`;
};

/**
 * Unresolved capture types fall back to `unknown`
 */
export const emitCaptureType = (
  descriptor: TypeDescriptor | undefined
): string => (descriptor ? emitType(descriptor) : "unknown");
