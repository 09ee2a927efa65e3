/**
 * Module emitter - assembles the generated file
 *
 * Layout: banner, imports, interfaces (nested before the types that use
 * them), then one mapping function per distinct (type, body) pair.
 */

import { CompiledProjection, GeneratedType } from "@dtoshape/compiler";
import { EmitterContext } from "../types.js";
import { emitInterface } from "./declarations.js";
import { collectImports, emitImports } from "./imports.js";
import {
  emitMappingBody,
  emitMappingFunction,
  mappingFunctionName,
} from "./mapping-functions.js";
import { emitCaptureType } from "../type-emitter.js";

export type EmittedModule = {
  readonly code: string;
  /** Mapping function name per input projection, in input order */
  readonly functionNames: readonly string[];
  readonly typeNames: readonly string[];
};

/**
 * Types in first-seen order, one declaration per name
 */
export const uniqueTypes = (
  projections: readonly CompiledProjection[]
): readonly GeneratedType[] => {
  const seen = new Map<string, GeneratedType>();
  for (const projection of projections) {
    for (const generated of projection.generatedTypes) {
      if (!seen.has(generated.name)) seen.set(generated.name, generated);
    }
  }
  return [...seen.values()];
};

const functionKey = (
  projection: CompiledProjection,
  context: EmitterContext
): string =>
  [
    projection.sourceType.fullyQualifiedName,
    ...projection.captureSet.map(
      (entry) => `${entry.displayName}:${emitCaptureType(entry.type)}`
    ),
    emitMappingBody(projection, context),
  ].join("\n");

type PlannedFunction = {
  readonly name: string;
  readonly projection: CompiledProjection;
};

const planFunctions = (
  projections: readonly CompiledProjection[],
  context: EmitterContext
): { functions: readonly PlannedFunction[]; names: readonly string[] } => {
  const byKey = new Map<string, string>();
  const variantsByType = new Map<string, number>();
  const functions: PlannedFunction[] = [];

  const names = projections.map((projection) => {
    const key = `${projection.typeName}\n${functionKey(projection, context)}`;
    const existing = byKey.get(key);
    if (existing) return existing;

    const variant = (variantsByType.get(projection.typeName) ?? 0) + 1;
    variantsByType.set(projection.typeName, variant);
    const base = mappingFunctionName(projection.typeName);
    const name = variant === 1 ? base : `${base}_${variant}`;

    byKey.set(key, name);
    functions.push({ name, projection });
    return name;
  });

  return { functions, names };
};

export const emitModule = (
  projections: readonly CompiledProjection[],
  context: EmitterContext
): EmittedModule => {
  const types = uniqueTypes(projections);
  const { functions, names } = planFunctions(projections, context);
  const localNames = new Set([
    ...types.map((generated) => generated.name),
    ...functions.map((planned) => planned.name),
  ]);

  const sections: string[] = [];
  const { banner, outputFile } = context.options;
  if (banner) {
    sections.push(banner);
  }

  const imports = emitImports(collectImports(projections, outputFile, localNames));
  if (imports.length > 0) {
    sections.push(imports.join("\n"));
  }

  sections.push(...types.map((generated) => emitInterface(generated, context)));
  sections.push(
    ...functions.map((planned) =>
      emitMappingFunction(planned.projection, planned.name, context)
    )
  );

  return {
    code: sections.length > 0 ? `${sections.join("\n\n")}\n` : "",
    functionNames: names,
    typeNames: types.map((generated) => generated.name),
  };
};
