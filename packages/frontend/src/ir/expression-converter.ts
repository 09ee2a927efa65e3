/**
 * Expression converter - TypeScript AST to IR expressions
 * Main dispatcher - delegates to specialized modules
 */

import * as ts from "typescript";
import { IrExpression } from "./types.js";
import { ConverterContext } from "./converters/context.js";
import {
  convertKeywordLiteral,
  convertLiteral,
  convertNoSubstitutionTemplate,
} from "./converters/expressions/literals.js";
import {
  convertArrayLiteral,
  convertObjectLiteral,
} from "./converters/expressions/collections.js";
import {
  convertElementAccess,
  convertNonNull,
  convertPropertyAccess,
} from "./converters/expressions/access.js";
import {
  convertCallExpression,
  convertNewExpression,
} from "./converters/expressions/calls.js";
import {
  convertBinaryExpression,
  convertKeywordUnary,
  convertPrefixUnary,
} from "./converters/expressions/operators.js";
import { convertArrowFunction } from "./converters/expressions/functions.js";
import {
  convertConditionalExpression,
  convertSatisfies,
  convertTemplateLiteral,
  convertTypeAssertion,
} from "./converters/expressions/other.js";
import {
  convertOpaque,
  getSourceSpan,
} from "./converters/expressions/helpers.js";

/**
 * Main expression conversion dispatcher
 * Converts TypeScript expression nodes to IR expressions
 */
export const convertExpression = (
  node: ts.Expression,
  ctx: ConverterContext
): IrExpression => {
  // Parentheses are a printing concern; the printer re-derives them
  if (ts.isParenthesizedExpression(node)) {
    return convertExpression(node.expression, ctx);
  }

  if (
    ts.isStringLiteral(node) ||
    ts.isNumericLiteral(node) ||
    ts.isBigIntLiteral(node)
  ) {
    return convertLiteral(node, ctx);
  }
  if (ts.isNoSubstitutionTemplateLiteral(node)) {
    return convertNoSubstitutionTemplate(node, ctx);
  }

  switch (node.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return convertKeywordLiteral(node, true, ctx);
    case ts.SyntaxKind.FalseKeyword:
      return convertKeywordLiteral(node, false, ctx);
    case ts.SyntaxKind.NullKeyword:
      return convertKeywordLiteral(node, null, ctx);
    case ts.SyntaxKind.ThisKeyword:
      return ctx.nodes.record(
        { kind: "this", sourceSpan: getSourceSpan(node) },
        node
      );
  }

  if (ts.isIdentifier(node)) {
    if (node.text === "undefined") {
      return convertKeywordLiteral(node, undefined, ctx);
    }
    return ctx.nodes.record(
      { kind: "identifier", name: node.text, sourceSpan: getSourceSpan(node) },
      node
    );
  }

  if (ts.isPropertyAccessExpression(node)) {
    return convertPropertyAccess(node, ctx);
  }
  if (ts.isElementAccessExpression(node)) {
    return convertElementAccess(node, ctx);
  }
  if (ts.isNonNullExpression(node)) {
    return convertNonNull(node, ctx);
  }
  if (ts.isCallExpression(node)) {
    return convertCallExpression(node, ctx);
  }
  if (ts.isNewExpression(node)) {
    return convertNewExpression(node, ctx);
  }
  if (ts.isArrowFunction(node)) {
    return convertArrowFunction(node, ctx);
  }
  if (ts.isObjectLiteralExpression(node)) {
    return convertObjectLiteral(node, ctx);
  }
  if (ts.isArrayLiteralExpression(node)) {
    return convertArrayLiteral(node, ctx);
  }
  if (ts.isBinaryExpression(node)) {
    return convertBinaryExpression(node, ctx);
  }
  if (ts.isPrefixUnaryExpression(node)) {
    return convertPrefixUnary(node, ctx);
  }
  if (ts.isTypeOfExpression(node) || ts.isVoidExpression(node)) {
    return convertKeywordUnary(node, ctx);
  }
  if (ts.isConditionalExpression(node)) {
    return convertConditionalExpression(node, ctx);
  }
  if (ts.isTemplateExpression(node)) {
    return convertTemplateLiteral(node, ctx);
  }
  if (ts.isAsExpression(node) || ts.isTypeAssertionExpression(node)) {
    return convertTypeAssertion(node, ctx);
  }
  if (ts.isSatisfiesExpression(node)) {
    return convertSatisfies(node, ctx);
  }
  if (ts.isRegularExpressionLiteral(node)) {
    return convertOpaque(node, ctx, { silent: true });
  }

  return convertOpaque(node, ctx);
};
