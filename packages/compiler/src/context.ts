/**
 * Per-compilation build context
 */

import {
  Diagnostic,
  SourceLocation,
  TypeResolver,
} from "@dtoshape/frontend";
import { CompileContext, CompileOptions, GeneratedType } from "./types.js";
import { DedupRegistry } from "./identity/registry.js";

export type BuildContext = {
  readonly resolver: TypeResolver;
  readonly options: CompileOptions;
  readonly registry: DedupRegistry;
  /** Fallback location for diagnostics on synthesized nodes */
  readonly location?: SourceLocation;
  readonly report: (diagnostic: Diagnostic) => void;
  readonly registerType: (type: GeneratedType) => void;
};

export type BuildState = {
  readonly context: BuildContext;
  readonly diagnostics: () => readonly Diagnostic[];
  readonly generatedTypes: () => readonly GeneratedType[];
};

export const createBuildContext = (
  compileContext: CompileContext,
  resolver: TypeResolver,
  location?: SourceLocation
): BuildState => {
  const diagnostics: Diagnostic[] = [];
  const generatedTypes: GeneratedType[] = [];

  return {
    context: {
      resolver,
      options: compileContext.options,
      registry: compileContext.registry,
      location,
      report: (diagnostic) => {
        diagnostics.push(diagnostic);
      },
      registerType: (type) => {
        if (!generatedTypes.some((existing) => existing.name === type.name)) {
          generatedTypes.push(type);
        }
      },
    },
    diagnostics: () => diagnostics,
    generatedTypes: () => generatedTypes,
  };
};

export const DEFAULT_COMPILE_OPTIONS: CompileOptions = {
  mapOperators: ["map"],
  nullHandling: "guard",
  arrayNullabilityRemoval: false,
};
