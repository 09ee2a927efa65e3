/**
 * Generated type names
 */

import { NamingHints } from "@dtoshape/frontend";

const words = (name: string): readonly string[] =>
  name
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/[^A-Za-z0-9]+/)
    .filter((word) => word.length > 0);

/**
 * `order_items` → `OrderItems`, `activeRows` → `ActiveRows`
 */
export const toPascalCase = (name: string): string =>
  words(name)
    .map((word) => `${word.charAt(0).toUpperCase()}${word.slice(1)}`)
    .join("");

/**
 * Leading identifier of a type text (`Order[]` → `Order`, `Map<K, V>` → `Map`).
 */
export const typeBaseName = (typeText: string): string | undefined => {
  const match = /^(?:readonly\s+)?([A-Za-z_$][\w$]*)/.exec(typeText.trim());
  return match?.[1];
};

const withSuffix = (base: string | undefined): string | undefined => {
  const pascal = base === undefined ? "" : toPascalCase(base);
  return pascal.length > 0 && /^[A-Za-z_]/.test(pascal)
    ? `${pascal}Dto`
    : undefined;
};

const stripGetPrefix = (name: string): string =>
  /^get[A-Z_]/.test(name) ? name.slice(3) : name;

export const rootTypeHint = (
  hints: NamingHints | undefined,
  sourceTypeName: string
): string =>
  withSuffix(hints?.variableName) ??
  withSuffix(
    hints?.functionName === undefined
      ? undefined
      : stripGetPrefix(hints.functionName)
  ) ??
  withSuffix(typeBaseName(sourceTypeName)) ??
  "ProjectionDto";

/**
 * Nested types are named after the field holding them, then after the
 * element type.
 */
export const nestedTypeHint = (
  fieldName: string,
  elementTypeName: string | undefined
): string =>
  withSuffix(fieldName) ??
  withSuffix(
    elementTypeName === undefined ? undefined : typeBaseName(elementTypeName)
  ) ??
  "NestedDto";

export const generatedTypeName = (hint: string, hash: string): string =>
  `${hint}_${hash}`;
