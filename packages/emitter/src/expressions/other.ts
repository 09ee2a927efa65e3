/**
 * Miscellaneous expression emitters (templates, assertions, spread, markers)
 */

import {
  IrAnnotatedExpression,
  IrOpaqueExpression,
  IrSatisfiesExpression,
  IrSpreadExpression,
  IrTemplateLiteralExpression,
  IrTypeAssertionExpression,
} from "@dtoshape/frontend";
import {
  EmitterContext,
  TsFragment,
  escapeComment,
  isIdentifierName,
} from "../types.js";
import { emitExpression } from "../expression-emitter.js";
import { Precedence, fragment, operand } from "./parentheses.js";

export const emitTemplateLiteral = (
  expr: IrTemplateLiteralExpression,
  context: EmitterContext
): TsFragment => {
  const parts = expr.quasis.map((quasi, index) => {
    const value = expr.expressions[index];
    return value === undefined
      ? quasi
      : `${quasi}\${${emitExpression(value, context).text}}`;
  });
  return fragment(`\`${parts.join("")}\``, Precedence.primary);
};

export const emitTypeAssertion = (
  expr: IrTypeAssertionExpression | IrSatisfiesExpression,
  context: EmitterContext
): TsFragment => {
  const keyword = expr.kind === "typeAssertion" ? "as" : "satisfies";
  const value = operand(
    emitExpression(expr.expression, context),
    Precedence.relational + 1
  );
  return fragment(`${value} ${keyword} ${expr.targetType}`, Precedence.relational);
};

export const emitSpread = (
  expr: IrSpreadExpression,
  context: EmitterContext
): TsFragment =>
  fragment(
    `...${operand(emitExpression(expr.expression, context), Precedence.arrow)}`,
    Precedence.arrow
  );

export const emitAnnotated = (
  expr: IrAnnotatedExpression,
  context: EmitterContext
): TsFragment => {
  const inner = emitExpression(expr.expression, context);
  return fragment(`/* ${escapeComment(expr.comment)} */ ${inner.text}`, inner.precedence);
};

/**
 * Opaque text is printed verbatim and wrapped wherever it is an operand
 */
export const emitOpaque = (expr: IrOpaqueExpression): TsFragment =>
  fragment(
    expr.text,
    expr.text === "" || isIdentifierName(expr.text)
      ? Precedence.primary
      : Precedence.opaque
  );
