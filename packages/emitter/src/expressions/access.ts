/**
 * Member and element access emitters
 */

import {
  IrElementAccessExpression,
  IrMemberExpression,
  IrNonNullExpression,
} from "@dtoshape/frontend";
import { EmitterContext, TsFragment, isIdentifierName } from "../types.js";
import { emitExpression } from "../expression-emitter.js";
import {
  Precedence,
  fragment,
  operand,
  postfixReceiver,
} from "./parentheses.js";

/**
 * `obj.name` / `obj?.name`; names that are not identifiers use brackets
 */
export const emitMemberAccess = (
  expr: IrMemberExpression,
  context: EmitterContext
): TsFragment => {
  const receiver = postfixReceiver(
    expr.object,
    emitExpression(expr.object, context)
  );
  const { property } = expr;
  if (isIdentifierName(property) || /^#[\w$]+$/.test(property)) {
    return fragment(
      `${receiver}${expr.isOptional ? "?." : "."}${property}`,
      Precedence.postfix
    );
  }
  return fragment(
    `${receiver}${expr.isOptional ? "?." : ""}[${JSON.stringify(property)}]`,
    Precedence.postfix
  );
};

export const emitElementAccess = (
  expr: IrElementAccessExpression,
  context: EmitterContext
): TsFragment => {
  const receiver = postfixReceiver(
    expr.object,
    emitExpression(expr.object, context)
  );
  const index = emitExpression(expr.index, context);
  return fragment(
    `${receiver}${expr.isOptional ? "?." : ""}[${index.text}]`,
    Precedence.postfix
  );
};

export const emitNonNull = (
  expr: IrNonNullExpression,
  context: EmitterContext
): TsFragment =>
  fragment(
    `${operand(emitExpression(expr.expression, context), Precedence.postfix)}!`,
    Precedence.postfix
  );
