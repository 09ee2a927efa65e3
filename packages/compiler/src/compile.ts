/**
 * compileProjection - one projection site to a schema, an identity and a
 * rewritten selector.
 */

import {
  Diagnostic,
  IrArrowFunctionExpression,
  Result,
  createDiagnostic,
  identifier,
  ok,
} from "@dtoshape/frontend";
import { createBuildContext } from "./context.js";
import {
  CompileContext,
  CompiledProjection,
  GeneratedType,
  Identity,
  ProjectionInput,
  Rejection,
  Schema,
} from "./types.js";
import { buildSchema } from "./schema/schema-builder.js";
import { fieldsToObject } from "./rewrite/nested-projection.js";
import { analyzeCaptures } from "./capture/capture-analyzer.js";
import { diffCaptures } from "./capture/capture-diff.js";
import { computeIdentity } from "./identity/hasher.js";
import { generatedTypeName, rootTypeHint } from "./identity/naming.js";

type Naming = {
  readonly typeName: string;
  readonly identity: Identity;
  readonly declaration?: GeneratedType;
  readonly diagnostics: readonly Diagnostic[];
};

const nameProjection = (
  input: ProjectionInput,
  schema: Schema,
  identity: Identity,
  context: CompileContext
): Naming => {
  const { target } = input;
  switch (target.kind) {
    case "named":
      return { typeName: target.typeName, identity, diagnostics: [] };

    case "explicit":
      return {
        typeName: target.typeName,
        identity,
        declaration: { name: target.typeName, schema, identity },
        diagnostics: [],
      };

    case "anonymous": {
      const candidate = generatedTypeName(
        schema.hintName ?? rootTypeHint(input.hints, schema.sourceTypeName),
        identity.hash
      );
      const registration = context.registry.resolveOrRegister(identity, candidate);
      return {
        typeName: registration.name,
        identity: registration.identity,
        declaration: {
          name: registration.name,
          schema,
          identity: registration.identity,
        },
        diagnostics: registration.collided
          ? [
              createDiagnostic(
                "DSH5001",
                "warning",
                `Hash ${identity.hash} is shared by another shape; widened to ${registration.identity.hash}`,
                input.location
              ),
            ]
          : [],
      };
    }
  }
};

export const compileProjection = (
  input: ProjectionInput,
  context: CompileContext
): Result<CompiledProjection, Rejection> => {
  const state = createBuildContext(context, input.resolver, input.location);

  const built = buildSchema(
    {
      body: input.body,
      parameter: input.parameter,
      sourceType: input.sourceType,
      hintName:
        input.target.kind === "anonymous"
          ? rootTypeHint(input.hints, input.sourceType.fullyQualifiedName)
          : undefined,
      target: input.target,
    },
    state.context
  );
  if (!built.ok) return built;

  const captured = analyzeCaptures(
    built.value.fields,
    input.parameter,
    input.resolver
  );
  const schema: Schema = { ...built.value, fields: captured.fields };
  const naming = nameProjection(input, schema, computeIdentity(schema), context);

  const rewritten: IrArrowFunctionExpression = {
    kind: "arrowFunction",
    parameters: [identifier(input.parameter)],
    returnType: naming.typeName,
    body: fieldsToObject(schema, input.body),
  };

  return ok({
    kind: input.target.kind,
    target: input.target,
    schema,
    identity: naming.identity,
    typeName: naming.typeName,
    sourceType: input.sourceType,
    rewritten,
    captureSet: captured.captures,
    staticImports: captured.staticImports,
    generatedTypes: naming.declaration
      ? [...state.generatedTypes(), naming.declaration]
      : state.generatedTypes(),
    diagnostics: [
      ...state.diagnostics(),
      ...naming.diagnostics,
      ...diffCaptures(captured.captures, input.declaredCaptures, input.location),
    ],
    location: input.location,
  });
};
