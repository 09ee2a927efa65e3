/**
 * Function expression converters
 */

import * as ts from "typescript";
import { IrExpression, IrIdentifierExpression } from "../../types.js";
import { convertOpaque, getSourceSpan } from "./helpers.js";
import { ConverterContext } from "../context.js";
import { convertExpression } from "../../expression-converter.js";

/**
 * Expression-bodied arrows with plain identifier parameters are modelled.
 * Block bodies, destructuring, defaults and rest parameters stay opaque.
 */
export const convertArrowFunction = (
  node: ts.ArrowFunction,
  ctx: ConverterContext
): IrExpression => {
  if (ts.isBlock(node.body)) {
    return convertOpaque(node, ctx);
  }

  const parameters: IrIdentifierExpression[] = [];
  for (const param of node.parameters) {
    if (
      !ts.isIdentifier(param.name) ||
      param.initializer !== undefined ||
      param.dotDotDotToken !== undefined
    ) {
      return convertOpaque(node, ctx);
    }
    parameters.push(
      ctx.nodes.record(
        {
          kind: "identifier",
          name: param.name.text,
          sourceSpan: getSourceSpan(param.name),
        },
        param.name
      )
    );
  }

  return ctx.nodes.record(
    {
      kind: "arrowFunction",
      parameters,
      returnType: node.type?.getText(),
      body: convertExpression(node.body, ctx),
      sourceSpan: getSourceSpan(node),
    },
    node
  );
};
