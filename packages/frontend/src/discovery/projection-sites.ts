/**
 * Projection call-site discovery
 *
 * A projection site is a call to a selector function (`selectExpr` by
 * default) whose lambda argument takes one parameter and returns an object
 * literal, optionally wrapped in `satisfies T` or `as T`:
 *
 *   selectExpr(orders, (o) => ({ id: o.id }), { threshold })
 *   selectExpr<Order, OrderRow>(orders, (o) => ({ id: o.id }))
 *   query.selectExpr((o) => ({ id: o.id }) satisfies OrderRow)
 */

import * as ts from "typescript";
import {
  IrIdentifierExpression,
  IrObjectExpression,
} from "../ir/types.js";
import { createNodeMap } from "../ir/node-map.js";
import { createConverterContext } from "../ir/converters/context.js";
import {
  convertObjectLiteral,
  getStaticPropertyName,
} from "../ir/converters/expressions/collections.js";
import { getSourceSpan } from "../ir/converters/expressions/helpers.js";
import {
  Diagnostic,
  SourceLocation,
  createDiagnostic,
} from "../types/diagnostic.js";
import { DtoshapeProgram } from "../program/types.js";
import { getNodeLocation } from "../program/diagnostics.js";
import { TypeDescriptor } from "../semantic/type-descriptor.js";
import {
  CheckerResolver,
  createCheckerResolver,
} from "../semantic/checker-resolver.js";
import { NamingHints, findNamingHints } from "./naming-hints.js";

export type ProjectionTarget =
  /** Shape inferred from the literal; name generated from hints + hash */
  | { readonly kind: "anonymous" }
  /** `({...}) satisfies T`: an existing type the result must match */
  | {
      readonly kind: "named";
      readonly typeName: string;
      readonly type: TypeDescriptor;
    }
  /** `selectExpr<Source, Dto>(...)`: a DTO the caller names */
  | { readonly kind: "explicit"; readonly typeName: string };

export type ProjectionSite = {
  readonly selectorName: string;
  readonly location: SourceLocation;
  readonly parameter: IrIdentifierExpression;
  readonly sourceType: TypeDescriptor;
  readonly body: IrObjectExpression;
  readonly target: ProjectionTarget;
  readonly hints: NamingHints;
  /** Names in the capture argument; absent when the call passes none */
  readonly declaredCaptures?: readonly string[];
  readonly resolver: CheckerResolver;
};

export type DiscoveryOptions = {
  readonly selectorNames: readonly string[];
};

export type DiscoveryResult = {
  readonly sites: readonly ProjectionSite[];
  readonly diagnostics: readonly Diagnostic[];
};

const unwrapParentheses = (expr: ts.Expression): ts.Expression =>
  ts.isParenthesizedExpression(expr) ? unwrapParentheses(expr.expression) : expr;

const selectorNameOf = (call: ts.CallExpression): string | undefined => {
  const callee = call.expression;
  if (ts.isIdentifier(callee)) return callee.text;
  if (ts.isPropertyAccessExpression(callee)) return callee.name.text;
  return undefined;
};

type ProjectionBody = {
  readonly literal: ts.ObjectLiteralExpression;
  readonly targetTypeNode?: ts.TypeNode;
};

const findProjectionBody = (body: ts.ConciseBody): ProjectionBody | undefined => {
  if (ts.isBlock(body)) return undefined;
  const inner = unwrapParentheses(body);
  if (ts.isObjectLiteralExpression(inner)) {
    return { literal: inner };
  }
  if (ts.isSatisfiesExpression(inner) || ts.isAsExpression(inner)) {
    const literal = unwrapParentheses(inner.expression);
    if (ts.isObjectLiteralExpression(literal)) {
      return { literal, targetTypeNode: inner.type };
    }
  }
  return undefined;
};

const declaredCaptureNames = (
  arg: ts.Expression | undefined
): readonly string[] | undefined => {
  if (!arg) return undefined;
  const literal = unwrapParentheses(arg);
  if (!ts.isObjectLiteralExpression(literal)) return undefined;
  return literal.properties.flatMap((prop) => {
    if (ts.isShorthandPropertyAssignment(prop)) return [prop.name.text];
    if (ts.isPropertyAssignment(prop)) {
      const name = getStaticPropertyName(prop.name);
      return name !== undefined ? [name] : [];
    }
    return [];
  });
};

const noLambda = (call: ts.CallExpression, selectorName: string): Diagnostic =>
  createDiagnostic(
    "DSH1002",
    "warning",
    `'${selectorName}' call has no projection lambda`,
    getNodeLocation(call),
    "Pass a one-parameter arrow function returning an object literal"
  );

const analyzeCall = (
  call: ts.CallExpression,
  selectorName: string,
  checker: ts.TypeChecker,
  report: (diagnostic: Diagnostic) => void
): ProjectionSite | undefined => {
  const lambdaIndex = call.arguments.findIndex((arg) =>
    ts.isArrowFunction(unwrapParentheses(arg))
  );
  const lambdaArg = call.arguments[lambdaIndex];
  const lambda = lambdaArg ? unwrapParentheses(lambdaArg) : undefined;
  if (!lambda || !ts.isArrowFunction(lambda)) {
    report(noLambda(call, selectorName));
    return undefined;
  }

  const param = lambda.parameters[0];
  const body = findProjectionBody(lambda.body);
  if (
    lambda.parameters.length !== 1 ||
    !param ||
    !ts.isIdentifier(param.name) ||
    !body
  ) {
    report(noLambda(call, selectorName));
    return undefined;
  }

  const nodes = createNodeMap();
  const ctx = createConverterContext({ nodes, report });
  const converted = convertObjectLiteral(body.literal, ctx);
  if (converted.kind !== "object") {
    // Methods or accessors in the literal; already reported as opaque
    return undefined;
  }

  const resolver = createCheckerResolver({ checker, nodes, scope: lambda });
  const parameter = nodes.record<IrIdentifierExpression>(
    {
      kind: "identifier",
      name: param.name.text,
      sourceSpan: getSourceSpan(param.name),
    },
    param.name
  );

  const explicitType = call.typeArguments?.[1];
  const target: ProjectionTarget = explicitType
    ? { kind: "explicit", typeName: explicitType.getText() }
    : body.targetTypeNode
      ? {
          kind: "named",
          typeName: body.targetTypeNode.getText(),
          type: resolver.describeType(
            checker.getTypeFromTypeNode(body.targetTypeNode)
          ),
        }
      : { kind: "anonymous" };

  return {
    selectorName,
    location: getNodeLocation(call),
    parameter,
    sourceType: resolver.describeType(checker.getTypeAtLocation(param.name)),
    body: converted,
    target,
    hints: findNamingHints(call),
    declaredCaptures: declaredCaptureNames(call.arguments[lambdaIndex + 1]),
    resolver,
  };
};

/**
 * Find every projection site in the program's root files, in file order
 * then source order.
 */
export const findProjectionSites = (
  program: DtoshapeProgram,
  options: DiscoveryOptions
): DiscoveryResult => {
  const selectorNames = new Set(options.selectorNames);
  const sites: ProjectionSite[] = [];
  const diagnostics: Diagnostic[] = [];
  const report = (diagnostic: Diagnostic): void => {
    diagnostics.push(diagnostic);
  };

  const visit = (node: ts.Node): void => {
    if (ts.isCallExpression(node)) {
      const selectorName = selectorNameOf(node);
      if (selectorName !== undefined && selectorNames.has(selectorName)) {
        const site = analyzeCall(node, selectorName, program.checker, report);
        if (site) sites.push(site);
      }
    }
    ts.forEachChild(node, visit);
  };

  for (const sourceFile of program.sourceFiles) {
    visit(sourceFile);
  }

  return { sites, diagnostics };
};
