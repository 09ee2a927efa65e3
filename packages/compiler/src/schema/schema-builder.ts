/**
 * Schema builder - the ordered, typed field list of one object literal.
 *
 * Each field runs through nested expansion first, then gets its declared
 * type and optionality, then the null-chain rewrite for the configured
 * target form.
 */

import {
  IrExpression,
  ProjectionTarget,
  Result,
  TypeDescriptor,
  collectionTypeName,
  createDiagnostic,
  error,
  irEquals,
  isChainLink,
  isOptionalChain,
  logical,
  namedType,
  ok,
  withElementType,
  withNullability,
} from "@dtoshape/frontend";
import { BuildContext } from "../context.js";
import { ProjectionField, Rejection, Schema } from "../types.js";
import {
  NestedExpansion,
  SchemaRequest,
  expandNested,
} from "../rewrite/nested-projection.js";
import { toGuardForm } from "../rewrite/null-chain.js";
import { toOptionalChainForm } from "../rewrite/optional-chain.js";
import { emptyArray } from "../rewrite/default-values.js";
import { propertyFieldName, propertyValue } from "./field-names.js";

export type RootSchemaRequest = SchemaRequest & {
  readonly target?: ProjectionTarget;
};

const UNKNOWN_TYPE = namedType("unknown");

/**
 * Declared type of a field that holds a nested projection: the generated
 * element type replaces the literal's anonymous type.
 */
const nestedFieldType = (
  resolved: TypeDescriptor | undefined,
  mappedElementType: string | undefined,
  nestedTypeName: string
): TypeDescriptor => {
  if (!resolved) {
    return {
      ...namedType(collectionTypeName("array", nestedTypeName)),
      collection: { kind: "array", elementType: namedType(nestedTypeName) },
    };
  }
  const element = resolved.collection?.elementType.fullyQualifiedName;
  if (
    resolved.collection &&
    (mappedElementType === undefined || element === mappedElementType)
  ) {
    return withElementType(resolved, nestedTypeName);
  }
  if (resolved.fullyQualifiedName === mappedElementType) {
    return withElementType(resolved, nestedTypeName);
  }
  return resolved;
};

const rewriteNulls = (
  value: IrExpression,
  declaredType: TypeDescriptor,
  expansion: NestedExpansion,
  collectionDefault: IrExpression | undefined,
  context: BuildContext
): IrExpression => {
  if (context.options.nullHandling === "guard") {
    // The expanded map call returns the generated element type already
    return toGuardForm(value, declaredType, {
      resolver: context.resolver,
      defaultValue: collectionDefault,
      allowCast: expansion.kind !== "expanded",
    });
  }

  const simplified = toOptionalChainForm(value);
  if (!irEquals(simplified, value)) {
    context.report(
      createDiagnostic(
        "DSH4003",
        "info",
        "Explicit null guard can be written as an optional chain",
        value.sourceSpan ?? context.location
      )
    );
  }
  return collectionDefault && isChainLink(simplified) && isOptionalChain(simplified)
    ? logical("??", simplified, collectionDefault)
    : simplified;
};

const buildField = (
  name: string,
  value: IrExpression,
  target: ProjectionTarget | undefined,
  context: BuildContext,
  buildSchema: (request: SchemaRequest, context: BuildContext) => Result<Schema, Rejection>
): ProjectionField => {
  const { resolver, options } = context;
  const expansion: NestedExpansion = expandNested(value, name, context, buildSchema);
  const expanded = expansion.kind === "none" ? value : expansion.expression;

  const targetType =
    target?.kind === "named"
      ? resolver.resolveMemberType(target.type, name)
      : undefined;
  const resolved = targetType ?? resolver.resolveType(value);
  const baseType =
    expansion.kind === "expanded" && !targetType
      ? nestedFieldType(
          resolved,
          expansion.mappedElementType,
          expansion.nested.typeName
        )
      : resolved ?? UNKNOWN_TYPE;

  const hasOptionalChain = resolver.containsOptionalChain(value);
  const removesNullability =
    options.arrayNullabilityRemoval &&
    expansion.kind === "expanded" &&
    hasOptionalChain;
  const declaredType = removesNullability
    ? withNullability(baseType, false)
    : baseType;

  return {
    name,
    declaredType,
    isOptional:
      !removesNullability &&
      (declaredType.isNullableAnnotated || hasOptionalChain),
    sourceExpression: rewriteNulls(
      expanded,
      declaredType,
      expansion,
      removesNullability ? emptyArray() : undefined,
      context
    ),
    originalExpression: value,
    nested: expansion.kind === "expanded" ? expansion.nested : undefined,
  };
};

export const buildSchema = (
  request: RootSchemaRequest,
  context: BuildContext
): Result<Schema, Rejection> => {
  const fields: ProjectionField[] = [];

  for (const property of request.body.properties) {
    const name = propertyFieldName(property);
    const value = propertyValue(property);
    if (name === undefined) continue;

    if (fields.some((field) => field.name === name)) {
      context.report(
        createDiagnostic(
          "DSH3004",
          "info",
          `Duplicate field '${name}' dropped`,
          value.sourceSpan ?? context.location
        )
      );
      continue;
    }

    fields.push(buildField(name, value, request.target, context, buildSchema));
  }

  if (fields.length === 0) {
    return error({
      reason: "emptySchema",
      diagnostic: createDiagnostic(
        "DSH3003",
        "info",
        `Projection over '${request.sourceType.fullyQualifiedName}' has no nameable fields`,
        request.body.sourceSpan ?? context.location,
        "Nothing is generated for this call"
      ),
    });
  }

  return ok({
    sourceTypeName: request.sourceType.fullyQualifiedName,
    hintName: request.hintName,
    fields,
  });
};
