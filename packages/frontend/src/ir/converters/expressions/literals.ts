/**
 * Literal expression converters
 */

import * as ts from "typescript";
import { IrLiteralExpression, IrTemplateLiteralExpression } from "../../types.js";
import { getSourceSpan } from "./helpers.js";
import { ConverterContext } from "../context.js";

/**
 * Convert string, numeric and bigint literals
 */
export const convertLiteral = (
  node: ts.StringLiteral | ts.NumericLiteral | ts.BigIntLiteral,
  ctx: ConverterContext
): IrLiteralExpression => {
  const value: IrLiteralExpression["value"] = ts.isStringLiteral(node)
    ? node.text
    : ts.isNumericLiteral(node)
      ? Number(node.text)
      : BigInt(node.text.slice(0, -1));

  return ctx.nodes.record(
    {
      kind: "literal",
      value,
      raw: node.getText(),
      sourceSpan: getSourceSpan(node),
    },
    node
  );
};

/**
 * Convert `true`, `false`, `null` and `undefined`
 */
export const convertKeywordLiteral = (
  node: ts.Node,
  value: boolean | null | undefined,
  ctx: ConverterContext
): IrLiteralExpression =>
  ctx.nodes.record(
    {
      kind: "literal",
      value,
      raw: String(value),
      sourceSpan: getSourceSpan(node),
    },
    node
  );

/**
 * Template without substitutions: `plain text`
 */
export const convertNoSubstitutionTemplate = (
  node: ts.NoSubstitutionTemplateLiteral,
  ctx: ConverterContext
): IrTemplateLiteralExpression =>
  ctx.nodes.record(
    {
      kind: "templateLiteral",
      quasis: [node.rawText ?? node.text],
      expressions: [],
      sourceSpan: getSourceSpan(node),
    },
    node
  );
