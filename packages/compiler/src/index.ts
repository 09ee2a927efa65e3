/**
 * dtoshape compiler - projection schemas, identities and rewrites
 */

export * from "./types.js";
export { compileProjection } from "./compile.js";
export {
  type BuildContext,
  createBuildContext,
  DEFAULT_COMPILE_OPTIONS,
} from "./context.js";
export {
  type DedupRegistry,
  type Registration,
  type RegistryEntry,
  createDedupRegistry,
} from "./identity/registry.js";
export {
  computeIdentity,
  digestSignature,
  schemaSignature,
  SHORT_HASH_LENGTH,
} from "./identity/hasher.js";
export {
  toPascalCase,
  typeBaseName,
  rootTypeHint,
  nestedTypeHint,
  generatedTypeName,
} from "./identity/naming.js";
export { buildSchema } from "./schema/schema-builder.js";
export { inferFieldName } from "./schema/field-names.js";
export { toGuardForm, type GuardOptions } from "./rewrite/null-chain.js";
export { toOptionalChainForm } from "./rewrite/optional-chain.js";
export {
  defaultValueFor,
  isDefaultLiteral,
  isNullLikeDefault,
} from "./rewrite/default-values.js";
export {
  expandNested,
  fieldsToObject,
  NOT_EXPANDED_MARKER,
} from "./rewrite/nested-projection.js";
export {
  analyzeCaptures,
  capturedName,
  type CaptureAnalysis,
} from "./capture/capture-analyzer.js";
export { diffCaptures, findCaptureClashes } from "./capture/capture-diff.js";
