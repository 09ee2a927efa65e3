/**
 * Helper functions for expression conversion
 */

import * as ts from "typescript";
import {
  IrBinaryOperator,
  IrLogicalExpression,
  IrOpaqueExpression,
  IrUnaryOperator,
} from "../../types.js";
import { SourceLocation, createDiagnostic } from "../../../types/diagnostic.js";
import { getNodeLocation } from "../../../program/diagnostics.js";
import { ConverterContext } from "../context.js";

/**
 * Get source span for a TypeScript node.
 * Returns a SourceLocation that can be used for diagnostics.
 */
export const getSourceSpan = (node: ts.Node): SourceLocation =>
  getNodeLocation(node);

/**
 * Keep syntax the IR does not model as verbatim text.
 *
 * References inside opaque text are invisible to capture analysis, so the
 * conversion is reported (DSH3002) unless the caller knows the node holds
 * none (regular expression literals).
 */
export const convertOpaque = (
  node: ts.Node,
  ctx: ConverterContext,
  options: { readonly silent?: boolean } = {}
): IrOpaqueExpression => {
  const sourceSpan = getSourceSpan(node);
  if (!options.silent) {
    ctx.report(
      createDiagnostic(
        "DSH3002",
        "warning",
        `Unsupported syntax (${ts.SyntaxKind[node.kind]}) kept verbatim`,
        sourceSpan,
        "References inside this expression are not analyzed for captures"
      )
    );
  }
  return ctx.nodes.record(
    { kind: "opaque", text: node.getText(), sourceSpan },
    node
  );
};

const binaryOperators: ReadonlyMap<ts.SyntaxKind, IrBinaryOperator> = new Map(
  [
    [ts.SyntaxKind.PlusToken, "+"],
    [ts.SyntaxKind.MinusToken, "-"],
    [ts.SyntaxKind.AsteriskToken, "*"],
    [ts.SyntaxKind.SlashToken, "/"],
    [ts.SyntaxKind.PercentToken, "%"],
    [ts.SyntaxKind.AsteriskAsteriskToken, "**"],
    [ts.SyntaxKind.EqualsEqualsToken, "=="],
    [ts.SyntaxKind.ExclamationEqualsToken, "!="],
    [ts.SyntaxKind.EqualsEqualsEqualsToken, "==="],
    [ts.SyntaxKind.ExclamationEqualsEqualsToken, "!=="],
    [ts.SyntaxKind.LessThanToken, "<"],
    [ts.SyntaxKind.GreaterThanToken, ">"],
    [ts.SyntaxKind.LessThanEqualsToken, "<="],
    [ts.SyntaxKind.GreaterThanEqualsToken, ">="],
    [ts.SyntaxKind.LessThanLessThanToken, "<<"],
    [ts.SyntaxKind.GreaterThanGreaterThanToken, ">>"],
    [ts.SyntaxKind.GreaterThanGreaterThanGreaterThanToken, ">>>"],
    [ts.SyntaxKind.AmpersandToken, "&"],
    [ts.SyntaxKind.BarToken, "|"],
    [ts.SyntaxKind.CaretToken, "^"],
    [ts.SyntaxKind.InKeyword, "in"],
    [ts.SyntaxKind.InstanceOfKeyword, "instanceof"],
  ]
);

const logicalOperators: ReadonlyMap<
  ts.SyntaxKind,
  IrLogicalExpression["operator"]
> = new Map([
  [ts.SyntaxKind.AmpersandAmpersandToken, "&&"],
  [ts.SyntaxKind.BarBarToken, "||"],
  [ts.SyntaxKind.QuestionQuestionToken, "??"],
]);

const unaryOperators: ReadonlyMap<ts.SyntaxKind, IrUnaryOperator> = new Map([
  [ts.SyntaxKind.PlusToken, "+"],
  [ts.SyntaxKind.MinusToken, "-"],
  [ts.SyntaxKind.ExclamationToken, "!"],
  [ts.SyntaxKind.TildeToken, "~"],
]);

export const getBinaryOperator = (
  token: ts.BinaryOperatorToken
): IrBinaryOperator | undefined => binaryOperators.get(token.kind);

export const getLogicalOperator = (
  token: ts.BinaryOperatorToken
): IrLogicalExpression["operator"] | undefined =>
  logicalOperators.get(token.kind);

export const getUnaryOperator = (
  operator: ts.PrefixUnaryOperator
): IrUnaryOperator | undefined => unaryOperators.get(operator);

/**
 * Type arguments as written (`fn<A, B>()` → ["A", "B"])
 */
export const getTypeArgumentTexts = (
  typeArguments: ts.NodeArray<ts.TypeNode> | undefined
): readonly string[] | undefined =>
  typeArguments ? typeArguments.map((arg) => arg.getText()) : undefined;
