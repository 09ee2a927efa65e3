/**
 * Structural equality for IR expressions.
 *
 * Source spans are ignored: two nodes are equal when they would print the
 * same program text.
 */

import { IrExpression, IrObjectProperty } from "./types.js";

const allEqual = (
  left: readonly IrExpression[],
  right: readonly IrExpression[]
): boolean =>
  left.length === right.length &&
  left.every((item, index) => {
    const other = right[index];
    return other !== undefined && irEquals(item, other);
  });

const propertyEquals = (
  left: IrObjectProperty,
  right: IrObjectProperty
): boolean => {
  switch (left.kind) {
    case "property":
      return (
        right.kind === "property" &&
        left.key === right.key &&
        left.shorthand === right.shorthand &&
        irEquals(left.value, right.value)
      );
    case "computed":
      return (
        right.kind === "computed" &&
        irEquals(left.key, right.key) &&
        irEquals(left.value, right.value)
      );
    case "spread":
      return (
        right.kind === "spread" && irEquals(left.expression, right.expression)
      );
  }
};

const typeArgumentsEqual = (
  left: readonly string[] | undefined,
  right: readonly string[] | undefined
): boolean =>
  (left ?? []).length === (right ?? []).length &&
  (left ?? []).every((arg, index) => arg === (right ?? [])[index]);

export const irEquals = (left: IrExpression, right: IrExpression): boolean => {
  if (left === right) return true;

  switch (left.kind) {
    case "literal":
      return right.kind === "literal" && left.value === right.value;

    case "identifier":
      return right.kind === "identifier" && left.name === right.name;

    case "this":
      return right.kind === "this";

    case "memberAccess":
      return (
        right.kind === "memberAccess" &&
        left.property === right.property &&
        left.isOptional === right.isOptional &&
        irEquals(left.object, right.object)
      );

    case "elementAccess":
      return (
        right.kind === "elementAccess" &&
        left.isOptional === right.isOptional &&
        irEquals(left.object, right.object) &&
        irEquals(left.index, right.index)
      );

    case "call":
      return (
        right.kind === "call" &&
        left.isOptional === right.isOptional &&
        typeArgumentsEqual(left.typeArguments, right.typeArguments) &&
        irEquals(left.callee, right.callee) &&
        allEqual(left.arguments, right.arguments)
      );

    case "new":
      return (
        right.kind === "new" &&
        typeArgumentsEqual(left.typeArguments, right.typeArguments) &&
        irEquals(left.callee, right.callee) &&
        allEqual(left.arguments, right.arguments)
      );

    case "arrowFunction":
      return (
        right.kind === "arrowFunction" &&
        left.returnType === right.returnType &&
        allEqual(left.parameters, right.parameters) &&
        irEquals(left.body, right.body)
      );

    case "object":
      return (
        right.kind === "object" &&
        left.properties.length === right.properties.length &&
        left.properties.every((property, index) => {
          const other = right.properties[index];
          return other !== undefined && propertyEquals(property, other);
        })
      );

    case "array":
      return right.kind === "array" && allEqual(left.elements, right.elements);

    case "unary":
      return (
        right.kind === "unary" &&
        left.operator === right.operator &&
        irEquals(left.expression, right.expression)
      );

    case "binary":
      return (
        right.kind === "binary" &&
        left.operator === right.operator &&
        irEquals(left.left, right.left) &&
        irEquals(left.right, right.right)
      );

    case "logical":
      return (
        right.kind === "logical" &&
        left.operator === right.operator &&
        irEquals(left.left, right.left) &&
        irEquals(left.right, right.right)
      );

    case "conditional":
      return (
        right.kind === "conditional" &&
        irEquals(left.condition, right.condition) &&
        irEquals(left.whenTrue, right.whenTrue) &&
        irEquals(left.whenFalse, right.whenFalse)
      );

    case "typeAssertion":
      return (
        right.kind === "typeAssertion" &&
        left.targetType === right.targetType &&
        irEquals(left.expression, right.expression)
      );

    case "satisfies":
      return (
        right.kind === "satisfies" &&
        left.targetType === right.targetType &&
        irEquals(left.expression, right.expression)
      );

    case "nonNull":
      return (
        right.kind === "nonNull" && irEquals(left.expression, right.expression)
      );

    case "templateLiteral":
      return (
        right.kind === "templateLiteral" &&
        left.quasis.length === right.quasis.length &&
        left.quasis.every((quasi, index) => quasi === right.quasis[index]) &&
        allEqual(left.expressions, right.expressions)
      );

    case "spread":
      return (
        right.kind === "spread" && irEquals(left.expression, right.expression)
      );

    case "annotated":
      return (
        right.kind === "annotated" &&
        left.comment === right.comment &&
        irEquals(left.expression, right.expression)
      );

    case "opaque":
      return right.kind === "opaque" && left.text === right.text;
  }
};
