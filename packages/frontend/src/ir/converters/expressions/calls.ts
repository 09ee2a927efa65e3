/**
 * Call and constructor expression converters
 */

import * as ts from "typescript";
import { IrCallExpression, IrExpression, IrNewExpression } from "../../types.js";
import { getSourceSpan, getTypeArgumentTexts } from "./helpers.js";
import { ConverterContext } from "../context.js";
import { convertExpression } from "../../expression-converter.js";

/**
 * Convert an argument list; spread arguments become spread nodes
 */
export const convertArguments = (
  args: ts.NodeArray<ts.Expression> | undefined,
  ctx: ConverterContext
): readonly IrExpression[] =>
  (args ?? []).map((arg) =>
    ts.isSpreadElement(arg)
      ? ctx.nodes.record(
          {
            kind: "spread",
            expression: convertExpression(arg.expression, ctx),
            sourceSpan: getSourceSpan(arg),
          },
          arg
        )
      : convertExpression(arg, ctx)
  );

export const convertCallExpression = (
  node: ts.CallExpression,
  ctx: ConverterContext
): IrCallExpression =>
  ctx.nodes.record(
    {
      kind: "call",
      callee: convertExpression(node.expression, ctx),
      arguments: convertArguments(node.arguments, ctx),
      isOptional: node.questionDotToken !== undefined,
      typeArguments: getTypeArgumentTexts(node.typeArguments),
      sourceSpan: getSourceSpan(node),
    },
    node
  );

export const convertNewExpression = (
  node: ts.NewExpression,
  ctx: ConverterContext
): IrNewExpression =>
  ctx.nodes.record(
    {
      kind: "new",
      callee: convertExpression(node.expression, ctx),
      arguments: convertArguments(node.arguments, ctx),
      typeArguments: getTypeArgumentTexts(node.typeArguments),
      sourceSpan: getSourceSpan(node),
    },
    node
  );
