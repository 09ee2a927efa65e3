/**
 * dtoshape emitter - TypeScript declarations and mapping functions
 */

export * from "./types.js";
export * from "./type-emitter.js";
export { emitExpression, printExpression } from "./expression-emitter.js";
export { Precedence } from "./expressions/parentheses.js";
export { emitInterface } from "./core/declarations.js";
export {
  emitMappingFunction,
  mappingFunctionName,
} from "./core/mapping-functions.js";
export {
  type ImportGroup,
  collectImports,
  emitImports,
  moduleSpecifier,
} from "./core/imports.js";
export {
  type EmittedModule,
  emitModule,
  uniqueTypes,
} from "./core/module-emitter.js";
export { DEFAULT_BANNER, emitGeneratedModule } from "./emitter.js";
