/**
 * Factories for synthesized IR nodes.
 *
 * Synthesized nodes carry no sourceSpan; passes use these instead of spelling
 * out object literals so the shapes stay consistent.
 */

import {
  IrBinaryExpression,
  IrCallExpression,
  IrConditionalExpression,
  IrExpression,
  IrIdentifierExpression,
  IrLiteralExpression,
  IrLogicalExpression,
  IrMemberExpression,
  IrTypeAssertionExpression,
} from "./expressions.js";

export const identifier = (name: string): IrIdentifierExpression => ({
  kind: "identifier",
  name,
});

export const literal = (
  value: IrLiteralExpression["value"],
  raw?: string
): IrLiteralExpression => ({ kind: "literal", value, raw });

export const nullLiteral = (): IrLiteralExpression => literal(null, "null");

export const member = (
  object: IrExpression,
  property: string,
  isOptional = false
): IrMemberExpression => ({
  kind: "memberAccess",
  object,
  property,
  isOptional,
});

export const call = (
  callee: IrExpression,
  args: readonly IrExpression[],
  isOptional = false
): IrCallExpression => ({
  kind: "call",
  callee,
  arguments: args,
  isOptional,
});

export const notNullCheck = (operand: IrExpression): IrBinaryExpression => ({
  kind: "binary",
  operator: "!=",
  left: operand,
  right: nullLiteral(),
});

export const conjunction = (
  operands: readonly IrExpression[]
): IrExpression | undefined =>
  operands.reduce<IrExpression | undefined>(
    (acc, operand): IrExpression =>
      acc === undefined ? operand : logical("&&", acc, operand),
    undefined
  );

export const logical = (
  operator: IrLogicalExpression["operator"],
  left: IrExpression,
  right: IrExpression
): IrLogicalExpression => ({ kind: "logical", operator, left, right });

export const conditional = (
  condition: IrExpression,
  whenTrue: IrExpression,
  whenFalse: IrExpression
): IrConditionalExpression => ({
  kind: "conditional",
  condition,
  whenTrue,
  whenFalse,
});

export const typeAssertion = (
  expression: IrExpression,
  targetType: string
): IrTypeAssertionExpression => ({
  kind: "typeAssertion",
  expression,
  targetType,
});

/**
 * Build a dotted access path `root.a.b` from a root name and segments.
 */
export const accessPath = (
  root: string,
  ...segments: readonly string[]
): IrExpression =>
  segments.reduce<IrExpression>(
    (object, segment) => member(object, segment),
    identifier(root)
  );
