/**
 * Operator expression converters (binary, logical, unary)
 *
 * Assignments, comma sequences and increments have side effects a
 * projection must not carry; they stay opaque.
 */

import * as ts from "typescript";
import { IrExpression } from "../../types.js";
import {
  convertOpaque,
  getBinaryOperator,
  getLogicalOperator,
  getSourceSpan,
  getUnaryOperator,
} from "./helpers.js";
import { ConverterContext } from "../context.js";
import { convertExpression } from "../../expression-converter.js";

export const convertBinaryExpression = (
  node: ts.BinaryExpression,
  ctx: ConverterContext
): IrExpression => {
  const sourceSpan = getSourceSpan(node);

  const logical = getLogicalOperator(node.operatorToken);
  if (logical) {
    return ctx.nodes.record(
      {
        kind: "logical",
        operator: logical,
        left: convertExpression(node.left, ctx),
        right: convertExpression(node.right, ctx),
        sourceSpan,
      },
      node
    );
  }

  const operator = getBinaryOperator(node.operatorToken);
  if (!operator) {
    return convertOpaque(node, ctx);
  }

  return ctx.nodes.record(
    {
      kind: "binary",
      operator,
      left: convertExpression(node.left, ctx),
      right: convertExpression(node.right, ctx),
      sourceSpan,
    },
    node
  );
};

export const convertPrefixUnary = (
  node: ts.PrefixUnaryExpression,
  ctx: ConverterContext
): IrExpression => {
  const operator = getUnaryOperator(node.operator);
  if (!operator) {
    return convertOpaque(node, ctx);
  }
  return ctx.nodes.record(
    {
      kind: "unary",
      operator,
      expression: convertExpression(node.operand, ctx),
      sourceSpan: getSourceSpan(node),
    },
    node
  );
};

/**
 * `typeof x` and `void x`
 */
export const convertKeywordUnary = (
  node: ts.TypeOfExpression | ts.VoidExpression,
  ctx: ConverterContext
): IrExpression =>
  ctx.nodes.record(
    {
      kind: "unary",
      operator: ts.isTypeOfExpression(node) ? "typeof" : "void",
      expression: convertExpression(node.expression, ctx),
      sourceSpan: getSourceSpan(node),
    },
    node
  );
