/**
 * Default values substituted when a null-guarded path short-circuits.
 */

import {
  IrExpression,
  TypeDescriptor,
  literal,
  nullLiteral,
  typeAssertion,
} from "@dtoshape/frontend";

export const defaultValueFor = (
  type: TypeDescriptor | undefined
): IrExpression => {
  if (!type || type.isNullableAnnotated) return nullLiteral();
  switch (type.specialKind) {
    case "boolean":
      return literal(false, "false");
    case "char":
      return literal("\0", '"\\0"');
    case "string":
      return literal("", '""');
    case "number":
      return literal(0, "0");
    case "bigint":
      return literal(BigInt(0), "0n");
    case "enum":
      return typeAssertion(literal(0, "0"), type.fullyQualifiedName);
    case "none":
      return nullLiteral();
  }
};

export const emptyArray = (): IrExpression => ({ kind: "array", elements: [] });

/**
 * `null`, `undefined` or `null as T`
 */
export const isNullLikeDefault = (expr: IrExpression): boolean => {
  if (expr.kind === "literal") {
    return expr.value === null || expr.value === undefined;
  }
  if (expr.kind === "typeAssertion") return isNullLikeDefault(expr.expression);
  return false;
};

/**
 * A value the default policy can produce: null-like, `false`, `0`, `0n`,
 * `""`, `"\0"`, `0 as E` or `[]`.
 */
export const isDefaultLiteral = (expr: IrExpression): boolean => {
  switch (expr.kind) {
    case "literal":
      return (
        expr.value === null ||
        expr.value === undefined ||
        expr.value === false ||
        expr.value === 0 ||
        expr.value === "" ||
        expr.value === "\0" ||
        (typeof expr.value === "bigint" && expr.value === BigInt(0))
      );
    case "typeAssertion":
      return isDefaultLiteral(expr.expression);
    case "array":
      return expr.elements.length === 0;
    default:
      return false;
  }
};
