/**
 * Operator expression emitters (binary, logical, unary, conditional)
 */

import {
  IrBinaryExpression,
  IrConditionalExpression,
  IrExpression,
  IrLogicalExpression,
  IrUnaryExpression,
} from "@dtoshape/frontend";
import { EmitterContext, TsFragment } from "../types.js";
import { emitExpression } from "../expression-emitter.js";
import {
  Precedence,
  fragment,
  getBinaryPrecedence,
  operand,
  parenthesize,
} from "./parentheses.js";

export const emitBinary = (
  expr: IrBinaryExpression,
  context: EmitterContext
): TsFragment => {
  const precedence = getBinaryPrecedence(expr.operator);
  const left = emitExpression(expr.left, context);
  const right = emitExpression(expr.right, context);

  // `**` is right-associative and rejects a unary left operand
  const leftText =
    expr.operator === "**"
      ? operand(left, Precedence.unary + 1)
      : operand(left, precedence);
  const rightText =
    expr.operator === "**"
      ? operand(right, precedence)
      : operand(right, precedence + 1);

  return fragment(`${leftText} ${expr.operator} ${rightText}`, precedence);
};

const isAndOr = (expr: IrExpression): boolean =>
  expr.kind === "logical" && expr.operator !== "??";

const isCoalesce = (expr: IrExpression): boolean =>
  expr.kind === "logical" && expr.operator === "??";

/**
 * `??` cannot share an unparenthesized operand with `&&` or `||`.
 */
const mixesCoalesce = (
  operator: IrLogicalExpression["operator"],
  side: IrExpression
): boolean => (operator === "??" ? isAndOr(side) : isCoalesce(side));

export const emitLogical = (
  expr: IrLogicalExpression,
  context: EmitterContext
): TsFragment => {
  const precedence =
    expr.operator === "&&"
      ? Precedence.and
      : expr.operator === "||"
        ? Precedence.or
        : Precedence.coalesce;

  const side = (value: IrExpression, minimum: number): string => {
    const printed = emitExpression(value, context);
    return mixesCoalesce(expr.operator, value)
      ? parenthesize(printed.text)
      : operand(printed, minimum);
  };

  return fragment(
    `${side(expr.left, precedence)} ${expr.operator} ${side(expr.right, precedence + 1)}`,
    precedence
  );
};

export const emitUnary = (
  expr: IrUnaryExpression,
  context: EmitterContext
): TsFragment => {
  const value = emitExpression(expr.expression, context);
  const text = operand(value, Precedence.unary);

  if (expr.operator === "typeof" || expr.operator === "void") {
    return fragment(`${expr.operator} ${text}`, Precedence.unary);
  }
  // `- -x` must not print as `--x`
  const safe =
    (expr.operator === "-" || expr.operator === "+") &&
    text.startsWith(expr.operator)
      ? parenthesize(text)
      : text;
  return fragment(`${expr.operator}${safe}`, Precedence.unary);
};

export const emitConditional = (
  expr: IrConditionalExpression,
  context: EmitterContext
): TsFragment => {
  const condition = operand(
    emitExpression(expr.condition, context),
    Precedence.coalesce
  );
  const whenTrue = operand(
    emitExpression(expr.whenTrue, context),
    Precedence.conditional
  );
  const whenFalse = operand(
    emitExpression(expr.whenFalse, context),
    Precedence.conditional
  );
  return fragment(
    `${condition} ? ${whenTrue} : ${whenFalse}`,
    Precedence.conditional
  );
};
