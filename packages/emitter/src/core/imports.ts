/**
 * Import collection for the generated module
 *
 * Field, source and capture types are imported with `import type`. Public
 * static members, exported constants and enums that the rewritten bodies
 * reference by name need a value import. Only exported declarations are
 * reachable; everything else stays unresolved and surfaces as a type error
 * in the generated module.
 */

import * as path from "node:path";
import { CompiledProjection } from "@dtoshape/compiler";
import {
  DeclarationSite,
  TypeDescriptor,
  collectDeclarations,
} from "@dtoshape/frontend";

export type ImportGroup = {
  readonly specifier: string;
  readonly typeNames: readonly string[];
  readonly valueNames: readonly string[];
};

type MutableGroup = {
  readonly types: Set<string>;
  readonly values: Set<string>;
};

const EXTENSIONS: readonly (readonly [RegExp, string])[] = [
  [/\.d\.[mc]?ts$/, ""],
  [/\.tsx?$/, ".js"],
  [/\.mts$/, ".mjs"],
  [/\.cts$/, ".cjs"],
];

/**
 * Relative ESM specifier from the generated file to a source file
 */
export const moduleSpecifier = (outputFile: string, file: string): string => {
  const relative = path
    .relative(path.dirname(outputFile), file)
    .split(path.sep)
    .join("/");
  const rewritten = EXTENSIONS.reduce<string>(
    (current, [pattern, replacement]) =>
      pattern.test(current) ? current.replace(pattern, replacement) : current,
    relative
  );
  return rewritten.startsWith(".") ? rewritten : `./${rewritten}`;
};

const typeDescriptors = (
  projection: CompiledProjection
): readonly TypeDescriptor[] => [
  projection.sourceType,
  ...(projection.target.kind === "named" ? [projection.target.type] : []),
  ...projection.generatedTypes.flatMap((generated) =>
    generated.schema.fields.map((field) => field.declaredType)
  ),
  ...projection.captureSet.flatMap((entry) => (entry.type ? [entry.type] : [])),
];

/**
 * Imports needed by a set of projections, grouped by module and sorted
 */
export const collectImports = (
  projections: readonly CompiledProjection[],
  outputFile: string,
  localNames: ReadonlySet<string>
): readonly ImportGroup[] => {
  const groups = new Map<string, MutableGroup>();
  const target = path.resolve(outputFile);

  const add = (site: DeclarationSite, kind: "types" | "values"): void => {
    if (!site.exported || localNames.has(site.name)) return;
    if (path.resolve(site.file) === target) return;
    const specifier = moduleSpecifier(outputFile, site.file);
    const group = groups.get(specifier) ?? { types: new Set(), values: new Set() };
    group[kind].add(site.name);
    groups.set(specifier, group);
  };

  for (const projection of projections) {
    for (const descriptor of typeDescriptors(projection)) {
      for (const site of collectDeclarations(descriptor)) add(site, "types");
    }
    for (const site of projection.staticImports) add(site, "values");
  }

  return [...groups.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([specifier, group]) => ({
      specifier,
      // A value import also brings the type
      typeNames: [...group.types].filter((name) => !group.values.has(name)).sort(),
      valueNames: [...group.values].sort(),
    }));
};

export const emitImports = (groups: readonly ImportGroup[]): readonly string[] =>
  groups.flatMap((group) => [
    ...(group.typeNames.length > 0
      ? [`import type { ${group.typeNames.join(", ")} } from "${group.specifier}";`]
      : []),
    ...(group.valueNames.length > 0
      ? [`import { ${group.valueNames.join(", ")} } from "${group.specifier}";`]
      : []),
  ]);
