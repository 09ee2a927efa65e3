/**
 * Member access converters
 */

import * as ts from "typescript";
import {
  IrElementAccessExpression,
  IrMemberExpression,
  IrNonNullExpression,
} from "../../types.js";
import { getSourceSpan } from "./helpers.js";
import { ConverterContext } from "../context.js";
import { convertExpression } from "../../expression-converter.js";

/**
 * `a.b`, `a?.b`, `this.#secret`
 */
export const convertPropertyAccess = (
  node: ts.PropertyAccessExpression,
  ctx: ConverterContext
): IrMemberExpression =>
  ctx.nodes.record(
    {
      kind: "memberAccess",
      object: convertExpression(node.expression, ctx),
      property: node.name.text,
      isOptional: node.questionDotToken !== undefined,
      sourceSpan: getSourceSpan(node),
    },
    node
  );

/**
 * `a[i]`, `a?.[i]`
 */
export const convertElementAccess = (
  node: ts.ElementAccessExpression,
  ctx: ConverterContext
): IrElementAccessExpression =>
  ctx.nodes.record(
    {
      kind: "elementAccess",
      object: convertExpression(node.expression, ctx),
      index: convertExpression(node.argumentExpression, ctx),
      isOptional: node.questionDotToken !== undefined,
      sourceSpan: getSourceSpan(node),
    },
    node
  );

export const convertNonNull = (
  node: ts.NonNullExpression,
  ctx: ConverterContext
): IrNonNullExpression =>
  ctx.nodes.record(
    {
      kind: "nonNull",
      expression: convertExpression(node.expression, ctx),
      sourceSpan: getSourceSpan(node),
    },
    node
  );
