/**
 * Arrow function emitter
 */

import { IrArrowFunctionExpression } from "@dtoshape/frontend";
import { EmitterContext, TsFragment } from "../types.js";
import { emitExpression } from "../expression-emitter.js";
import { Precedence, fragment, operand, parenthesize } from "./parentheses.js";

/**
 * `(i): ItemDto => ({ ... })`. An object-literal body is wrapped so it is not
 * read as a block.
 */
export const emitArrowFunction = (
  expr: IrArrowFunctionExpression,
  context: EmitterContext
): TsFragment => {
  const parameters = expr.parameters.map((parameter) => parameter.name).join(", ");
  const returnType = expr.returnType ? `: ${expr.returnType}` : "";
  const body = emitExpression(expr.body, context);
  const bodyText =
    expr.body.kind === "object"
      ? parenthesize(body.text)
      : operand(body, Precedence.arrow);
  return fragment(`(${parameters})${returnType} => ${bodyText}`, Precedence.arrow);
};
