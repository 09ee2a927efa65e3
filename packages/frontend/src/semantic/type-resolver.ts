/**
 * TypeResolver - the semantic queries the projection compiler makes.
 *
 * Every query takes IR. Implementations answer `undefined` (or `value`)
 * for nodes they cannot place, such as nodes synthesized by a rewrite.
 */

import { IrExpression } from "../ir/types.js";
import { TypeDescriptor } from "./type-descriptor.js";

export type Accessibility = "public" | "protected" | "private";

/**
 * An importable top-level declaration (`export const`, `export class`)
 */
export type DeclarationSite = {
  readonly name: string;
  readonly file: string;
  readonly exported: boolean;
};

export type ReferenceClassification =
  /** A parameter of the projection lambda or of a lambda inside it */
  | { readonly kind: "boundParameter" }
  /** A variable or function of an enclosing scope */
  | { readonly kind: "local" }
  /** A parameter of an enclosing function */
  | { readonly kind: "outerParameter" }
  | {
      readonly kind: "instanceMember";
      readonly accessibility: Accessibility;
      readonly memberName: string;
    }
  | {
      readonly kind: "staticMember";
      readonly accessibility: Accessibility;
      readonly memberName: string;
      /** Root declaration to import (the class, or the exported binding itself) */
      readonly declaration?: DeclarationSite;
    }
  | { readonly kind: "constant"; readonly declaration?: DeclarationSite }
  | { readonly kind: "enumLiteral"; readonly declaration?: DeclarationSite }
  /** Not a reference (literal, global, library value) */
  | { readonly kind: "value" };

export type TypeResolver = {
  /** Type of the expression as evaluated, optional-chain propagation included */
  readonly resolveType: (expr: IrExpression) => TypeDescriptor | undefined;
  /** Declared type of the final link of an access chain */
  readonly resolvePathType: (expr: IrExpression) => TypeDescriptor | undefined;
  readonly resolveMemberType: (
    type: TypeDescriptor,
    memberName: string
  ) => TypeDescriptor | undefined;
  readonly classifyReference: (expr: IrExpression) => ReferenceClassification;
  readonly containsOptionalChain: (expr: IrExpression) => boolean;
};
