/**
 * Miscellaneous expression converters (conditional, template, type operators)
 */

import * as ts from "typescript";
import { IrExpression } from "../../types.js";
import { getSourceSpan } from "./helpers.js";
import { ConverterContext } from "../context.js";
import { convertExpression } from "../../expression-converter.js";

export const convertConditionalExpression = (
  node: ts.ConditionalExpression,
  ctx: ConverterContext
): IrExpression =>
  ctx.nodes.record(
    {
      kind: "conditional",
      condition: convertExpression(node.condition, ctx),
      whenTrue: convertExpression(node.whenTrue, ctx),
      whenFalse: convertExpression(node.whenFalse, ctx),
      sourceSpan: getSourceSpan(node),
    },
    node
  );

export const convertTemplateLiteral = (
  node: ts.TemplateExpression,
  ctx: ConverterContext
): IrExpression =>
  ctx.nodes.record(
    {
      kind: "templateLiteral",
      quasis: [
        node.head.rawText ?? node.head.text,
        ...node.templateSpans.map((span) => span.literal.rawText ?? span.literal.text),
      ],
      expressions: node.templateSpans.map((span) =>
        convertExpression(span.expression, ctx)
      ),
      sourceSpan: getSourceSpan(node),
    },
    node
  );

/**
 * `x as T` and `<T>x`
 */
export const convertTypeAssertion = (
  node: ts.AsExpression | ts.TypeAssertion,
  ctx: ConverterContext
): IrExpression =>
  ctx.nodes.record(
    {
      kind: "typeAssertion",
      expression: convertExpression(node.expression, ctx),
      targetType: node.type.getText(),
      sourceSpan: getSourceSpan(node),
    },
    node
  );

export const convertSatisfies = (
  node: ts.SatisfiesExpression,
  ctx: ConverterContext
): IrExpression =>
  ctx.nodes.record(
    {
      kind: "satisfies",
      expression: convertExpression(node.expression, ctx),
      targetType: node.type.getText(),
      sourceSpan: getSourceSpan(node),
    },
    node
  );
