/**
 * Nested-projection expander
 *
 * Finds `<base>.map((p) => ({ ... }))<trailing>` on a field value's chain,
 * compiles the inner literal as its own schema and rewrites the lambda to
 * return the generated element type:
 *
 *   s.items.map((i) => ({ sku: i.sku })).slice(0, 5)
 *   → s.items.map((i): ItemsDto_1A2B3C4D => ({ sku: i.sku })).slice(0, 5)
 */

import {
  IrAnnotatedExpression,
  IrArrowFunctionExpression,
  IrCallExpression,
  IrExpression,
  IrObjectExpression,
  Result,
  TypeDescriptor,
  chainLinks,
  createDiagnostic,
  isChainLink,
  linkTarget,
  namedType,
  someExpression,
  withLinkTarget,
} from "@dtoshape/frontend";
import { BuildContext } from "../context.js";
import { NestedProjection, Rejection, Schema } from "../types.js";
import { computeIdentity } from "../identity/hasher.js";
import { generatedTypeName, nestedTypeHint } from "../identity/naming.js";

export type SchemaRequest = {
  readonly body: IrObjectExpression;
  readonly parameter: string;
  readonly sourceType: TypeDescriptor;
  readonly hintName?: string;
};

export type SchemaBuilder = (
  request: SchemaRequest,
  context: BuildContext
) => Result<Schema, Rejection>;

export type NestedExpansion =
  | { readonly kind: "none" }
  | {
      readonly kind: "expanded";
      readonly expression: IrExpression;
      readonly nested: NestedProjection;
      /** Element type of the map call as written, when known */
      readonly mappedElementType?: string;
    }
  | { readonly kind: "failed"; readonly expression: IrAnnotatedExpression };

type MapCall = {
  readonly call: IrCallExpression;
  readonly arrow: IrArrowFunctionExpression;
  readonly parameter: string;
  readonly body: IrObjectExpression;
};

export const NOT_EXPANDED_MARKER = "dtoshape: nested projection not expanded";

const asMapCall = (
  expr: IrExpression,
  mapOperators: readonly string[]
): MapCall | undefined => {
  if (expr.kind !== "call" || expr.arguments.length !== 1) return undefined;
  if (expr.callee.kind !== "memberAccess") return undefined;
  if (!mapOperators.includes(expr.callee.property)) return undefined;
  const arrow = expr.arguments[0];
  if (arrow === undefined || arrow.kind !== "arrowFunction") return undefined;
  const parameter = arrow.parameters[0];
  if (parameter === undefined || arrow.parameters.length !== 1) return undefined;
  if (arrow.body.kind !== "object") return undefined;
  return { call: expr, arrow, parameter: parameter.name, body: arrow.body };
};

/**
 * Replace `target` (a link on `expr`'s chain) and rebuild the links above it.
 */
const replaceInChain = (
  expr: IrExpression,
  target: IrExpression,
  replacement: IrExpression
): IrExpression => {
  if (expr === target) return replacement;
  if (!isChainLink(expr)) return expr;
  return withLinkTarget(
    expr,
    replaceInChain(linkTarget(expr), target, replacement)
  );
};

const fail = (
  value: IrExpression,
  fieldName: string,
  reason: string,
  context: BuildContext
): NestedExpansion => {
  context.report(
    createDiagnostic(
      "DSH3001",
      "warning",
      `Nested projection in field '${fieldName}' was not expanded: ${reason}`,
      value.sourceSpan ?? context.location,
      "The field keeps the value as written"
    )
  );
  return {
    kind: "failed",
    expression: { kind: "annotated", comment: NOT_EXPANDED_MARKER, expression: value },
  };
};

export const expandNested = (
  value: IrExpression,
  fieldName: string,
  context: BuildContext,
  buildSchema: SchemaBuilder
): NestedExpansion => {
  const { mapOperators } = context.options;
  const found = chainLinks(value)
    .map((link) => asMapCall(link, mapOperators))
    .find((match): match is MapCall => match !== undefined);

  if (!found) {
    const elsewhere = someExpression(
      value,
      (node) => asMapCall(node, mapOperators) !== undefined
    );
    return elsewhere
      ? fail(value, fieldName, "the map call is not on the value's access chain", context)
      : { kind: "none" };
  }

  const { resolver } = context;
  const arrowParameter = found.arrow.parameters[0];
  const elementType =
    (arrowParameter === undefined ? undefined : resolver.resolveType(arrowParameter)) ??
    (found.call.callee.kind === "memberAccess"
      ? resolver.resolveType(found.call.callee.object)?.collection?.elementType
      : undefined) ??
    namedType("unknown");

  // Equal shapes share one type, named by whichever call site registers it first
  const hintName = nestedTypeHint(fieldName, elementType.fullyQualifiedName);
  const built = buildSchema(
    {
      body: found.body,
      parameter: found.parameter,
      sourceType: elementType,
      hintName,
    },
    context
  );
  if (!built.ok) {
    return fail(value, fieldName, "the element literal has no nameable fields", context);
  }

  const identity = computeIdentity(built.value);
  const registration = context.registry.resolveOrRegister(
    identity,
    generatedTypeName(hintName, identity.hash)
  );
  if (registration.collided) {
    context.report(
      createDiagnostic(
        "DSH5001",
        "warning",
        `Hash ${identity.hash} is shared by another shape; widened to ${registration.identity.hash}`,
        value.sourceSpan ?? context.location
      )
    );
  }
  context.registerType({
    name: registration.name,
    schema: built.value,
    identity: registration.identity,
  });

  const rewrittenArrow: IrArrowFunctionExpression = {
    ...found.arrow,
    returnType: registration.name,
    body: fieldsToObject(built.value, found.body),
  };
  const rewrittenCall: IrCallExpression = {
    ...found.call,
    arguments: [rewrittenArrow],
  };

  return {
    kind: "expanded",
    expression: replaceInChain(value, found.call, rewrittenCall),
    nested: {
      schema: built.value,
      identity: registration.identity,
      typeName: registration.name,
      parameter: found.parameter,
    },
    mappedElementType: resolver.resolveType(found.call)?.collection?.elementType
      .fullyQualifiedName,
  };
};

/**
 * Object literal for a compiled schema, keeping the source span of the
 * literal it came from.
 */
export const fieldsToObject = (
  schema: Schema,
  original?: IrObjectExpression
): IrObjectExpression => ({
  kind: "object",
  properties: schema.fields.map((field) => ({
    kind: "property",
    key: field.name,
    value: field.sourceExpression,
    shorthand:
      field.sourceExpression.kind === "identifier" &&
      field.sourceExpression.name === field.name,
  })),
  sourceSpan: original?.sourceSpan,
});
