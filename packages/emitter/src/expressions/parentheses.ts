/**
 * Precedence levels and parenthesization.
 *
 * The IR drops source parentheses, so the printer re-derives them from the
 * precedence of each operand. Higher numbers bind tighter.
 *
 * Optional chains (`?.`) are never wrapped when a chain continues:
 * `x?.y.z` is not equivalent to `(x?.y).z`. Chain links print at POSTFIX
 * precedence, so a continuing link never asks for parentheses.
 */

import { IrBinaryOperator, IrExpression } from "@dtoshape/frontend";
import { TsFragment } from "../types.js";

export const Precedence = {
  /** Opaque source text: always wrapped when used as an operand */
  opaque: 0,
  arrow: 2,
  conditional: 3,
  coalesce: 4,
  or: 4,
  and: 5,
  bitwiseOr: 6,
  bitwiseXor: 7,
  bitwiseAnd: 8,
  equality: 9,
  relational: 10,
  shift: 11,
  additive: 12,
  multiplicative: 13,
  exponent: 14,
  unary: 15,
  postfix: 17,
  primary: 18,
} as const;

const BINARY_PRECEDENCE: Readonly<Record<IrBinaryOperator, number>> = {
  "|": Precedence.bitwiseOr,
  "^": Precedence.bitwiseXor,
  "&": Precedence.bitwiseAnd,
  "==": Precedence.equality,
  "!=": Precedence.equality,
  "===": Precedence.equality,
  "!==": Precedence.equality,
  "<": Precedence.relational,
  ">": Precedence.relational,
  "<=": Precedence.relational,
  ">=": Precedence.relational,
  instanceof: Precedence.relational,
  in: Precedence.relational,
  "<<": Precedence.shift,
  ">>": Precedence.shift,
  ">>>": Precedence.shift,
  "+": Precedence.additive,
  "-": Precedence.additive,
  "*": Precedence.multiplicative,
  "/": Precedence.multiplicative,
  "%": Precedence.multiplicative,
  "**": Precedence.exponent,
};

export const getBinaryPrecedence = (operator: IrBinaryOperator): number =>
  BINARY_PRECEDENCE[operator];

export const fragment = (text: string, precedence: number): TsFragment => ({
  text,
  precedence,
});

export const parenthesize = (text: string): string => `(${text})`;

/**
 * Operand text, wrapped when it binds looser than `minimum`.
 */
export const operand = (value: TsFragment, minimum: number): string =>
  value.precedence < minimum ? parenthesize(value.text) : value.text;

/**
 * Receiver of `.name`, `[index]` or `(args)`.
 *
 * Numeric literals are wrapped so `.` is not read as a decimal point.
 */
export const postfixReceiver = (
  expr: IrExpression,
  value: TsFragment
): string => {
  if (expr.kind === "literal" && typeof expr.value === "number") {
    return parenthesize(value.text);
  }
  return operand(value, Precedence.postfix);
};
