/**
 * Literal expression emitters
 */

import { IrLiteralExpression } from "@dtoshape/frontend";
import { TsFragment } from "../types.js";
import { Precedence, fragment } from "./parentheses.js";

const formatValue = (value: IrLiteralExpression["value"]): string => {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value.toString()}n`;
  return String(value);
};

/**
 * Emit a literal, keeping the source lexeme when there is one
 */
export const emitLiteral = (expr: IrLiteralExpression): TsFragment => {
  const text = expr.raw ?? formatValue(expr.value);
  // A negative number lexeme is a unary minus
  const precedence =
    typeof expr.value === "number" && text.startsWith("-")
      ? Precedence.unary
      : Precedence.primary;
  return fragment(text, precedence);
};
