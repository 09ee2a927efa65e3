/**
 * Main Emitter - Public API
 * Renders compiled projections into one TypeScript module
 */

import { CompiledProjection } from "@dtoshape/compiler";
import { EmitterOptions, createContext } from "./types.js";
import { EmittedModule, emitModule } from "./core/module-emitter.js";

export const DEFAULT_BANNER =
  "// Generated by dtoshape. Do not edit; rerun `dtoshape generate` instead.";

/**
 * Emit the generated module for every compiled projection of a run
 */
export const emitGeneratedModule = (
  projections: readonly CompiledProjection[],
  options: EmitterOptions
): EmittedModule =>
  emitModule(
    projections,
    createContext({ ...options, banner: options.banner ?? DEFAULT_BANNER })
  );
