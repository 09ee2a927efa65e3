/**
 * Expression Emitter - IR expressions to TypeScript source
 * Main dispatcher - delegates to specialized modules
 */

import { IrExpression } from "@dtoshape/frontend";
import {
  EmitterContext,
  EmitterOptions,
  TsFragment,
  createContext,
  withSingleLine,
} from "./types.js";
import { emitLiteral } from "./expressions/literals.js";
import { emitIdentifier, emitThis } from "./expressions/identifiers.js";
import {
  emitElementAccess,
  emitMemberAccess,
  emitNonNull,
} from "./expressions/access.js";
import { emitCall, emitNew } from "./expressions/calls.js";
import { emitArrowFunction } from "./expressions/functions.js";
import { emitArray, emitObject } from "./expressions/collections.js";
import {
  emitBinary,
  emitConditional,
  emitLogical,
  emitUnary,
} from "./expressions/operators.js";
import {
  emitAnnotated,
  emitOpaque,
  emitSpread,
  emitTemplateLiteral,
  emitTypeAssertion,
} from "./expressions/other.js";

/**
 * Emit a TypeScript expression from an IR expression
 */
export const emitExpression = (
  expr: IrExpression,
  context: EmitterContext
): TsFragment => {
  switch (expr.kind) {
    case "literal":
      return emitLiteral(expr);
    case "identifier":
      return emitIdentifier(expr);
    case "this":
      return emitThis();
    case "memberAccess":
      return emitMemberAccess(expr, context);
    case "elementAccess":
      return emitElementAccess(expr, context);
    case "call":
      return emitCall(expr, context);
    case "new":
      return emitNew(expr, context);
    case "arrowFunction":
      return emitArrowFunction(expr, context);
    case "object":
      return emitObject(expr, context);
    case "array":
      return emitArray(expr, context);
    case "unary":
      return emitUnary(expr, context);
    case "binary":
      return emitBinary(expr, context);
    case "logical":
      return emitLogical(expr, context);
    case "conditional":
      return emitConditional(expr, context);
    case "typeAssertion":
    case "satisfies":
      return emitTypeAssertion(expr, context);
    case "nonNull":
      return emitNonNull(expr, context);
    case "templateLiteral":
      return emitTemplateLiteral(expr, context);
    case "spread":
      return emitSpread(expr, context);
    case "annotated":
      return emitAnnotated(expr, context);
    case "opaque":
      return emitOpaque(expr);
  }
};

const PRINT_OPTIONS: EmitterOptions = { outputFile: "expression.ts" };

/**
 * Print an expression on one line
 */
export const printExpression = (expr: IrExpression): string =>
  emitExpression(expr, withSingleLine(createContext(PRINT_OPTIONS))).text;
