/**
 * IR types barrel exports
 */

export type {
  IrExpression,
  IrExpressionBase,
  IrLiteralExpression,
  IrIdentifierExpression,
  IrThisExpression,
  IrMemberExpression,
  IrElementAccessExpression,
  IrCallExpression,
  IrNewExpression,
  IrArrowFunctionExpression,
  IrObjectProperty,
  IrObjectExpression,
  IrArrayExpression,
  IrUnaryOperator,
  IrUnaryExpression,
  IrBinaryOperator,
  IrBinaryExpression,
  IrLogicalExpression,
  IrConditionalExpression,
  IrTypeAssertionExpression,
  IrSatisfiesExpression,
  IrNonNullExpression,
  IrTemplateLiteralExpression,
  IrSpreadExpression,
  IrAnnotatedExpression,
  IrOpaqueExpression,
} from "./expressions.js";

export * from "./builders.js";
