/**
 * Names from the code around a projection call, used to name generated types.
 */

import * as ts from "typescript";

export type NamingHints = {
  /** Variable, property or assignment target receiving the result */
  readonly variableName?: string;
  /** Nearest enclosing named function or method */
  readonly functionName?: string;
};

const isFunctionBoundary = (node: ts.Node): node is ts.FunctionLikeDeclaration =>
  ts.isFunctionDeclaration(node) ||
  ts.isMethodDeclaration(node) ||
  ts.isFunctionExpression(node) ||
  ts.isArrowFunction(node) ||
  ts.isGetAccessorDeclaration(node) ||
  ts.isConstructorDeclaration(node);

const nameText = (name: ts.Node | undefined): string | undefined => {
  if (!name) return undefined;
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name)) {
    return name.text.replace(/^#/, "");
  }
  if (ts.isStringLiteral(name)) return name.text;
  if (ts.isPropertyAccessExpression(name)) return name.name.text;
  return undefined;
};

/**
 * Name of a function-like node: its own name, or the variable or property
 * it is assigned to.
 */
const functionNameOf = (node: ts.FunctionLikeDeclaration): string | undefined => {
  if (ts.isConstructorDeclaration(node)) return "constructor";
  const own = nameText(node.name);
  if (own) return own;
  const parent = node.parent;
  if (ts.isVariableDeclaration(parent) || ts.isPropertyAssignment(parent)) {
    return nameText(parent.name);
  }
  if (ts.isPropertyDeclaration(parent)) return nameText(parent.name);
  return undefined;
};

/**
 * The receiving name is looked up through the expression the call sits in
 * (`await`, further method calls, parentheses) up to the first statement or
 * function boundary.
 */
export const findNamingHints = (call: ts.CallExpression): NamingHints => {
  let variableName: string | undefined;
  let node: ts.Node = call;

  while (node.parent && !isFunctionBoundary(node.parent)) {
    const parent = node.parent;
    if (variableName === undefined) {
      if (ts.isVariableDeclaration(parent) || ts.isPropertyDeclaration(parent)) {
        variableName = nameText(parent.name);
      } else if (ts.isPropertyAssignment(parent) && parent.initializer === node) {
        variableName = nameText(parent.name);
      } else if (
        ts.isBinaryExpression(parent) &&
        parent.operatorToken.kind === ts.SyntaxKind.EqualsToken &&
        parent.right === node
      ) {
        variableName = nameText(parent.left);
      } else if (
        ts.isExpressionStatement(parent) ||
        ts.isReturnStatement(parent) ||
        ts.isBlock(parent) ||
        ts.isSourceFile(parent)
      ) {
        // Stop looking for a receiver, keep walking for the function
        variableName = "";
      }
    }
    node = parent;
  }

  const enclosing = node.parent;
  return {
    variableName: variableName ? variableName : undefined,
    functionName:
      enclosing && isFunctionBoundary(enclosing)
        ? findEnclosingFunctionName(enclosing)
        : undefined,
  };
};

/**
 * Walks out of anonymous lambdas (`.then(() => ...)`) to the first named
 * function.
 */
const findEnclosingFunctionName = (
  start: ts.FunctionLikeDeclaration
): string | undefined => {
  let current: ts.Node | undefined = start;
  while (current) {
    if (isFunctionBoundary(current)) {
      const name = functionNameOf(current);
      if (name) return name;
    }
    current = current.parent;
  }
  return undefined;
};
