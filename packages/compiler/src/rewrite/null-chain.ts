/**
 * Guard form - optional chains rewritten to explicit null checks.
 *
 *   s.nest?.child?.id
 *   → s.nest != null && s.nest.child != null ? s.nest.child.id : null
 *
 * Query translators that cannot represent `?.` need this shape. Chains
 * nested inside arguments, operators or templates are rewritten in place
 * with the default of their own type.
 */

import {
  ChainLink,
  IrExpression,
  TypeDescriptor,
  TypeResolver,
  conditional,
  conjunction,
  isChainLink,
  isOptionalChain,
  linkTarget,
  logical,
  mapChildren,
  notNullCheck,
  nullLiteral,
  optionalPrefixes,
  stripOptional,
  typeAssertion,
  withLinkTarget,
} from "@dtoshape/frontend";
import { defaultValueFor, isDefaultLiteral } from "./default-values.js";

export type GuardOptions = {
  readonly resolver?: TypeResolver;
  /** Replaces the policy default for the top-level chain */
  readonly defaultValue?: IrExpression;
  /** Assert the declared type when the path's own type differs (default true) */
  readonly allowCast?: boolean;
};

/**
 * Apply `fn` to everything a chain evaluates besides its links: the root and
 * each argument or index along the way.
 */
const mapChainOperands = (
  expr: IrExpression,
  fn: (operand: IrExpression) => IrExpression
): IrExpression => {
  if (!isChainLink(expr)) return fn(expr);
  const relinked = withLinkTarget(
    expr,
    mapChainOperands(linkTarget(expr), fn)
  );
  return mapLinkOperands(relinked, fn);
};

const mapLinkOperands = (
  link: ChainLink,
  fn: (operand: IrExpression) => IrExpression
): ChainLink => {
  switch (link.kind) {
    case "memberAccess":
      return link;
    case "elementAccess": {
      const index = fn(link.index);
      return index === link.index ? link : { ...link, index };
    }
    case "call": {
      let changed = false;
      const args = link.arguments.map((arg) => {
        const next = fn(arg);
        if (next !== arg) changed = true;
        return next;
      });
      return changed ? { ...link, arguments: args } : link;
    }
  }
};

const needsCast = (
  pathType: TypeDescriptor | undefined,
  declaredType: TypeDescriptor | undefined
): declaredType is TypeDescriptor =>
  pathType !== undefined &&
  declaredType !== undefined &&
  pathType.fullyQualifiedName !== declaredType.fullyQualifiedName;

const guardChain = (
  chain: IrExpression,
  declaredType: TypeDescriptor | undefined,
  defaultValue: IrExpression,
  resolver: TypeResolver | undefined,
  allowCast = true
): IrExpression => {
  const prepared = mapChainOperands(chain, (operand) =>
    rewriteInnerChains(operand, resolver)
  );
  const checks = conjunction(optionalPrefixes(prepared).map(notNullCheck));
  const stripped = stripOptional(prepared);
  if (!checks) return stripped;

  const pathType = allowCast ? resolver?.resolvePathType(chain) : undefined;
  const value = needsCast(pathType, declaredType)
    ? typeAssertion(stripped, declaredType.fullyQualifiedName)
    : stripped;
  return conditional(checks, value, defaultValue);
};

const rewriteInnerChains = (
  expr: IrExpression,
  resolver: TypeResolver | undefined
): IrExpression => {
  if (isChainLink(expr) && isOptionalChain(expr)) {
    const ownType = resolver?.resolveType(expr);
    return guardChain(expr, undefined, defaultValueFor(ownType), resolver);
  }
  return mapChildren(expr, (child) => rewriteInnerChains(child, resolver));
};

/**
 * `chain ?? fallback` can become one guard only when the final link itself
 * never yields null; otherwise the fallback also covers that link.
 */
const canFoldFallback = (
  chain: IrExpression,
  resolver: TypeResolver | undefined
): boolean => {
  const pathType = resolver?.resolvePathType(chain);
  return pathType !== undefined && !pathType.isNullableAnnotated;
};

/**
 * Rewrite a field value to guard form.
 *
 * A value of the shape `chain ?? default` folds into a single guard when the
 * final link is non-nullable. Otherwise the `??` stays and the chain on its
 * left is guarded with a null default.
 */
export const toGuardForm = (
  expr: IrExpression,
  declaredType: TypeDescriptor | undefined,
  options: GuardOptions = {}
): IrExpression => {
  const { resolver, allowCast } = options;

  if (isChainLink(expr) && isOptionalChain(expr)) {
    return guardChain(
      expr,
      declaredType,
      options.defaultValue ?? defaultValueFor(declaredType),
      resolver,
      allowCast
    );
  }

  if (
    expr.kind === "logical" &&
    expr.operator === "??" &&
    isChainLink(expr.left) &&
    isOptionalChain(expr.left) &&
    isDefaultLiteral(expr.right)
  ) {
    if (canFoldFallback(expr.left, resolver)) {
      return guardChain(expr.left, declaredType, expr.right, resolver, allowCast);
    }
    return logical(
      "??",
      guardChain(expr.left, undefined, nullLiteral(), resolver),
      expr.right
    );
  }

  return rewriteInnerChains(expr, resolver);
};
