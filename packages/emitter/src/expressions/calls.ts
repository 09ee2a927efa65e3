/**
 * Call and new expression emitters
 */

import {
  IrCallExpression,
  IrExpression,
  IrNewExpression,
} from "@dtoshape/frontend";
import { EmitterContext, TsFragment } from "../types.js";
import { emitExpression } from "../expression-emitter.js";
import {
  Precedence,
  fragment,
  operand,
  parenthesize,
  postfixReceiver,
} from "./parentheses.js";

const emitTypeArguments = (typeArguments: readonly string[] | undefined): string =>
  typeArguments && typeArguments.length > 0
    ? `<${typeArguments.join(", ")}>`
    : "";

export const emitArguments = (
  args: readonly IrExpression[],
  context: EmitterContext
): string =>
  args
    .map((arg) => operand(emitExpression(arg, context), Precedence.arrow))
    .join(", ");

export const emitCall = (
  expr: IrCallExpression,
  context: EmitterContext
): TsFragment => {
  const callee = postfixReceiver(
    expr.callee,
    emitExpression(expr.callee, context)
  );
  const typeArgs = emitTypeArguments(expr.typeArguments);
  const open = expr.isOptional ? "?.(" : "(";
  return fragment(
    `${callee}${typeArgs}${open}${emitArguments(expr.arguments, context)})`,
    Precedence.postfix
  );
};

export const emitNew = (
  expr: IrNewExpression,
  context: EmitterContext
): TsFragment => {
  const calleeFragment = emitExpression(expr.callee, context);
  // `new a.b()` constructs a.b; `new (a.b())()` constructs the call's result
  const callee =
    expr.callee.kind === "call"
      ? parenthesize(calleeFragment.text)
      : operand(calleeFragment, Precedence.postfix);
  return fragment(
    `new ${callee}${emitTypeArguments(expr.typeArguments)}(${emitArguments(expr.arguments, context)})`,
    Precedence.postfix
  );
};
