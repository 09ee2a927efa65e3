/**
 * Optional-chain form - explicit null guards collapsed into `?.` chains.
 *
 *   s.nest != null ? s.nest.id : null                → s.nest?.id
 *   s.a == null || s.a.b == null ? null : s.a.b.c    → s.a?.b?.c
 *   s.nest != null ? { id: s.nest.id } : null        → { id: s.nest?.id }
 *
 * Only guards whose default is null-like qualify: `s.a?.b ?? 0` would also
 * replace a null `s.a.b` with `0`, which the guard does not. Conditionals are
 * simplified bottom-up; anything else is left alone.
 */

import {
  IrConditionalExpression,
  IrExpression,
  irEquals,
  isAccessPath,
  isChainLink,
  isStrictChainPrefix,
  linkTarget,
  mapExpression,
  stripOptional,
  withLinkTarget,
} from "@dtoshape/frontend";
import { isNullLikeDefault } from "./default-values.js";

type NullGuard = {
  /** Checked paths, outermost root first */
  readonly paths: readonly IrExpression[];
  readonly value: IrExpression;
  readonly defaultValue: IrExpression;
};

const isNullish = (expr: IrExpression): boolean =>
  expr.kind === "literal" && (expr.value === null || expr.value === undefined);

/**
 * The path of `path != null` (or `path == null` when `negated`).
 */
const checkedPath = (
  expr: IrExpression,
  negated: boolean
): IrExpression | undefined => {
  if (expr.kind !== "binary") return undefined;
  const operators = negated ? ["==", "==="] : ["!=", "!=="];
  if (!operators.includes(expr.operator)) return undefined;
  const path = isNullish(expr.right)
    ? expr.left
    : isNullish(expr.left)
      ? expr.right
      : undefined;
  return path !== undefined && isAccessPath(path) ? path : undefined;
};

const flatten = (
  expr: IrExpression,
  operator: "&&" | "||"
): readonly IrExpression[] =>
  expr.kind === "logical" && expr.operator === operator
    ? [...flatten(expr.left, operator), ...flatten(expr.right, operator)]
    : [expr];

const checkedPaths = (
  condition: IrExpression,
  negated: boolean
): readonly IrExpression[] | undefined => {
  const operands = flatten(condition, negated ? "||" : "&&");
  const paths: IrExpression[] = [];
  for (const operand of operands) {
    const path = checkedPath(operand, negated);
    if (!path) return undefined;
    paths.push(path);
  }
  return paths;
};

const matchGuard = (expr: IrConditionalExpression): NullGuard | undefined => {
  const positive = checkedPaths(expr.condition, false);
  if (positive) {
    return { paths: positive, value: expr.whenTrue, defaultValue: expr.whenFalse };
  }

  const negative =
    expr.condition.kind === "unary" && expr.condition.operator === "!"
      ? checkedPaths(expr.condition.expression, false)
      : checkedPaths(expr.condition, true);
  if (negative) {
    return { paths: negative, value: expr.whenFalse, defaultValue: expr.whenTrue };
  }
  return undefined;
};

const isIncreasingPrefixChain = (paths: readonly IrExpression[]): boolean =>
  paths.every((path, index) => {
    const next = paths[index + 1];
    return next === undefined || isStrictChainPrefix(path, next);
  });

const unwrapAssertions = (expr: IrExpression): IrExpression =>
  expr.kind === "typeAssertion" ? unwrapAssertions(expr.expression) : expr;

const isGuarded = (
  target: IrExpression,
  paths: readonly IrExpression[]
): boolean => {
  const stripped = stripOptional(target);
  return paths.some((path) => irEquals(stripped, path));
};

/**
 * Mark optional every link of `expr`'s own chain whose target is guarded.
 */
const markChain = (
  expr: IrExpression,
  paths: readonly IrExpression[]
): IrExpression => {
  if (!isChainLink(expr)) return expr;
  const target = linkTarget(expr);
  const relinked = withLinkTarget(expr, markChain(target, paths));
  return !relinked.isOptional && isGuarded(target, paths)
    ? { ...relinked, isOptional: true }
    : relinked;
};

/**
 * Mark optional every link anywhere in `expr` whose target is guarded.
 */
const markEverywhere = (
  expr: IrExpression,
  paths: readonly IrExpression[]
): { readonly expression: IrExpression; readonly marked: number } => {
  let marked = 0;
  const expression = mapExpression(expr, (node) => {
    if (isChainLink(node) && !node.isOptional && isGuarded(linkTarget(node), paths)) {
      marked += 1;
      return { ...node, isOptional: true };
    }
    return node;
  });
  return { expression, marked };
};

const simplifyConditional = (expr: IrConditionalExpression): IrExpression => {
  const guard = matchGuard(expr);
  if (!guard || guard.paths.length === 0) return expr;
  if (!isIncreasingPrefixChain(guard.paths)) return expr;
  if (!isNullLikeDefault(guard.defaultValue)) return expr;

  const lastPath = guard.paths[guard.paths.length - 1];
  if (lastPath === undefined) return expr;
  const value = unwrapAssertions(guard.value);

  if (isChainLink(value) && isStrictChainPrefix(lastPath, stripOptional(value))) {
    return markChain(value, guard.paths);
  }

  // A constructed value (object, array, call) stays constructed; only its
  // accesses through the guarded paths become optional.
  const { expression, marked } = markEverywhere(value, guard.paths);
  return marked > 0 ? expression : expr;
};

export const toOptionalChainForm = (expr: IrExpression): IrExpression =>
  mapExpression(expr, (node) =>
    node.kind === "conditional" ? simplifyConditional(node) : node
  );
