/**
 * Convert standalone expression text to IR, without a program or checker.
 */

import * as ts from "typescript";
import { IrExpression } from "./types.js";
import { createNodeMap } from "./node-map.js";
import { createConverterContext } from "./converters/context.js";
import { convertExpression } from "./expression-converter.js";
import { Diagnostic } from "../types/diagnostic.js";

export type ParsedExpression = {
  readonly ir: IrExpression;
  readonly diagnostics: readonly Diagnostic[];
};

export const parseExpression = (text: string): ParsedExpression => {
  const sourceFile = ts.createSourceFile(
    "expression.ts",
    `const __value = (${text});`,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS
  );
  const statement = sourceFile.statements[0];
  const initializer =
    statement && ts.isVariableStatement(statement)
      ? statement.declarationList.declarations[0]?.initializer
      : undefined;
  if (!initializer) {
    throw new Error(`ICE: '${text}' did not parse as an expression`);
  }

  const diagnostics: Diagnostic[] = [];
  const context = createConverterContext({
    nodes: createNodeMap(),
    report: (diagnostic) => diagnostics.push(diagnostic),
  });
  return { ir: convertExpression(initializer, context), diagnostics };
};
