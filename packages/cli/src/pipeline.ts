/**
 * Analysis pipeline shared by `generate` and `check`
 *
 * Discovery, compilation and emission for every projection site of the
 * configured entry files. One dedup registry spans the whole run, so equal
 * shapes from different files share a generated type.
 */

import {
  CompileContext,
  CompiledProjection,
  compileProjection,
  createDedupRegistry,
} from "@dtoshape/compiler";
import { EmittedModule, emitGeneratedModule } from "@dtoshape/emitter";
import {
  Diagnostic,
  ProjectionSite,
  analyzeFiles,
  createDiagnostic,
  isDiagnosticError,
} from "@dtoshape/frontend";
import type { ResolvedConfig, Result } from "./types.js";

export type PipelineResult = {
  readonly projections: readonly CompiledProjection[];
  readonly module: EmittedModule;
  readonly diagnostics: readonly Diagnostic[];
  readonly hasErrors: boolean;
};

const compileSite = (
  site: ProjectionSite,
  context: CompileContext
): Result<CompiledProjection, Diagnostic> => {
  try {
    const result = compileProjection(
      {
        parameter: site.parameter.name,
        sourceType: site.sourceType,
        body: site.body,
        target: site.target,
        hints: site.hints,
        declaredCaptures: site.declaredCaptures,
        location: site.location,
        resolver: site.resolver,
      },
      context
    );
    return result.ok
      ? result
      : { ok: false, error: result.error.diagnostic };
  } catch (error) {
    // Internal compiler errors stay scoped to their call site
    const message = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      error: createDiagnostic(
        "DSH6001",
        "error",
        `Internal error while compiling projection: ${message}`,
        site.location
      ),
    };
  }
};

export const runPipeline = (
  config: ResolvedConfig,
  sources?: ReadonlyMap<string, string>
): Result<PipelineResult, readonly Diagnostic[]> => {
  const analysis = analyzeFiles(config.include, {
    projectRoot: config.projectRoot,
    strict: config.strict,
    verbose: config.verbose,
    sources,
    selectorNames: config.selectorNames,
  });
  if (!analysis.ok) {
    return { ok: false, error: analysis.error.diagnostics };
  }

  const context: CompileContext = {
    registry: createDedupRegistry(),
    options: {
      mapOperators: config.mapOperators,
      nullHandling: config.nullHandling,
      arrayNullabilityRemoval: config.arrayNullabilityRemoval,
    },
  };

  const diagnostics: Diagnostic[] = [...analysis.value.diagnostics];
  const projections: CompiledProjection[] = [];
  for (const site of analysis.value.sites) {
    const compiled = compileSite(site, context);
    if (compiled.ok) {
      projections.push(compiled.value);
      diagnostics.push(...compiled.value.diagnostics);
    } else {
      diagnostics.push(compiled.error);
    }
  }

  if (config.verbose) {
    console.log(
      `Compiled ${projections.length} of ${analysis.value.sites.length} projection(s)`
    );
  }

  const module = emitGeneratedModule(projections, {
    outputFile: config.outputFile,
    projectRoot: config.projectRoot,
    readonlyProperties: config.readonlyProperties,
    commentOutput: config.commentOutput,
  });

  return {
    ok: true,
    value: {
      projections,
      module,
      diagnostics,
      hasErrors: diagnostics.some(isDiagnosticError),
    },
  };
};
