/**
 * Projection compiler types
 */

import type {
  DeclarationSite,
  Diagnostic,
  IrArrowFunctionExpression,
  IrExpression,
  IrObjectExpression,
  NamingHints,
  ProjectionTarget,
  SourceLocation,
  TypeDescriptor,
  TypeResolver,
} from "@dtoshape/frontend";
import type { DedupRegistry } from "./identity/registry.js";

/**
 * Content-addressed identity of a schema
 */
export type Identity = {
  /** Uppercase hex digest prefix: 8 chars, wider after a collision */
  readonly hash: string;
  readonly signature: string;
};

/**
 * A per-element sub-projection owned by one field
 */
export type NestedProjection = {
  readonly schema: Schema;
  readonly identity: Identity;
  readonly typeName: string;
  readonly parameter: string;
};

export type ProjectionField = {
  readonly name: string;
  readonly declaredType: TypeDescriptor;
  readonly isOptional: boolean;
  /** Value after nested expansion, null-chain rewriting and capture replacement */
  readonly sourceExpression: IrExpression;
  /** Value as written */
  readonly originalExpression: IrExpression;
  readonly nested?: NestedProjection;
};

export type Schema = {
  readonly sourceTypeName: string;
  readonly hintName?: string;
  readonly fields: readonly ProjectionField[];
};

export type CaptureKind =
  | "local"
  | "outerParameter"
  | "instanceMember"
  | "staticMember";

export type CaptureEntry = {
  /** Name the caller declares in the capture argument */
  readonly displayName: string;
  /** Identifier the rewritten projection uses (`captured_<Member>` for members) */
  readonly localName: string;
  readonly kind: CaptureKind;
  /** The reference as written */
  readonly source: IrExpression;
  readonly type?: TypeDescriptor;
};

/**
 * A type declaration the emitter writes
 */
export type GeneratedType = {
  readonly name: string;
  readonly schema: Schema;
  readonly identity: Identity;
};

export type CompiledProjection = {
  readonly kind: ProjectionTarget["kind"];
  readonly target: ProjectionTarget;
  readonly schema: Schema;
  readonly identity: Identity;
  /** Result type of the mapping function */
  readonly typeName: string;
  readonly sourceType: TypeDescriptor;
  readonly rewritten: IrArrowFunctionExpression;
  readonly captureSet: readonly CaptureEntry[];
  readonly staticImports: readonly DeclarationSite[];
  /** Declarations to emit, nested types before the types that use them */
  readonly generatedTypes: readonly GeneratedType[];
  readonly diagnostics: readonly Diagnostic[];
  readonly location?: SourceLocation;
};

export type Rejection = {
  readonly reason: "emptySchema";
  readonly diagnostic: Diagnostic;
};

export type ProjectionInput = {
  readonly parameter: string;
  readonly sourceType: TypeDescriptor;
  readonly body: IrObjectExpression;
  readonly target: ProjectionTarget;
  readonly hints?: NamingHints;
  /** Names in the caller's capture argument; absent when none was passed */
  readonly declaredCaptures?: readonly string[];
  readonly location?: SourceLocation;
  readonly resolver: TypeResolver;
};

export type NullHandling = "guard" | "optional-chain";

export type CompileOptions = {
  readonly mapOperators: readonly string[];
  readonly nullHandling: NullHandling;
  readonly arrayNullabilityRemoval: boolean;
};

/**
 * State shared by every compilation of one run
 */
export type CompileContext = {
  readonly registry: DedupRegistry;
  readonly options: CompileOptions;
};
