/**
 * Access-chain helpers.
 *
 * A chain is a run of member accesses, element accesses and calls hanging off
 * one root expression: `s.nest?.items[0].name`. In TypeScript an optional
 * link short-circuits everything to its right, so a chain containing any
 * optional link evaluates to `undefined` when that link's target is nullish.
 */

import {
  IrCallExpression,
  IrElementAccessExpression,
  IrExpression,
  IrMemberExpression,
} from "./types.js";
import { getChildren } from "./traversal.js";
import { irEquals } from "./equality.js";

export type ChainLink =
  | IrMemberExpression
  | IrElementAccessExpression
  | IrCallExpression;

export const isChainLink = (expr: IrExpression): expr is ChainLink =>
  expr.kind === "memberAccess" ||
  expr.kind === "elementAccess" ||
  expr.kind === "call";

/**
 * The expression a link applies to: the object of an access, the callee of a call.
 */
export const linkTarget = (link: ChainLink): IrExpression =>
  link.kind === "call" ? link.callee : link.object;

export const withLinkTarget = (
  link: ChainLink,
  target: IrExpression
): ChainLink => {
  if (linkTarget(link) === target) return link;
  switch (link.kind) {
    case "call":
      return { ...link, callee: target };
    case "memberAccess":
    case "elementAccess":
      return { ...link, object: target };
  }
};

/**
 * Links of a chain from the outermost inward (`a.b.c` → [`.c`, `.b`]).
 */
export const chainLinks = (expr: IrExpression): readonly ChainLink[] => {
  const links: ChainLink[] = [];
  let current = expr;
  while (isChainLink(current)) {
    links.push(current);
    current = linkTarget(current);
  }
  return links;
};

export const chainRoot = (expr: IrExpression): IrExpression => {
  let current = expr;
  while (isChainLink(current)) {
    current = linkTarget(current);
  }
  return current;
};

/**
 * True when the chain rooted at `expr` itself contains an optional link.
 * Arguments of calls along the chain are not inspected.
 */
export const isOptionalChain = (expr: IrExpression): boolean =>
  chainLinks(expr).some((link) => link.isOptional);

/**
 * True when an optional link appears anywhere in the expression.
 *
 * Arrow-function bodies are separate evaluation scopes (a per-element
 * sub-projection) and are not searched.
 */
export const containsOptionalChain = (expr: IrExpression): boolean => {
  if (expr.kind === "arrowFunction") return false;
  if (isChainLink(expr) && expr.isOptional) return true;
  return getChildren(expr).some(containsOptionalChain);
};

/**
 * Clear every optional flag along the chain (`a?.b?.c` → `a.b.c`).
 */
export const stripOptional = (expr: IrExpression): IrExpression => {
  if (!isChainLink(expr)) return expr;
  const target = stripOptional(linkTarget(expr));
  const relinked = withLinkTarget(expr, target);
  return relinked.isOptional ? { ...relinked, isOptional: false } : relinked;
};

/**
 * For each optional link, innermost first, the (stripped) expression whose
 * nullishness short-circuits the chain.
 *
 * `a?.b.c?.d` → [`a`, `a.b.c`]
 */
export const optionalPrefixes = (
  expr: IrExpression
): readonly IrExpression[] =>
  chainLinks(expr)
    .filter((link) => link.isOptional)
    .map((link) => stripOptional(linkTarget(link)))
    .reverse();

/**
 * A plain dotted path: identifier or `this`, followed by non-optional member
 * accesses only.
 */
export const isAccessPath = (expr: IrExpression): boolean => {
  if (expr.kind === "identifier" || expr.kind === "this") return true;
  return (
    expr.kind === "memberAccess" && !expr.isOptional && isAccessPath(expr.object)
  );
};

/**
 * True when `prefix` is a strict prefix of the chain `expr`
 * (`s.a` of `s.a.b.c`, `s.a` of `s.a.items.map(...)`).
 */
export const isStrictChainPrefix = (
  prefix: IrExpression,
  expr: IrExpression
): boolean =>
  chainLinks(expr).some((link) => irEquals(linkTarget(link), prefix));

/**
 * Outermost member access name of a path (`s.nest.name` → "name").
 */
export const finalMemberName = (expr: IrExpression): string | undefined => {
  if (expr.kind === "memberAccess") return expr.property;
  if (expr.kind === "identifier") return expr.name;
  return undefined;
};
