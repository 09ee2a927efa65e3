/**
 * Generic IR traversal.
 *
 * mapChildren rebuilds a node from transformed children and returns the
 * original object when nothing changed, so identity comparisons stay cheap
 * and node→TypeScript mappings survive untouched subtrees.
 */

import { IrExpression, IrObjectProperty } from "./types.js";

const mapAll = (
  items: readonly IrExpression[],
  fn: (expr: IrExpression) => IrExpression
): { readonly items: readonly IrExpression[]; readonly changed: boolean } => {
  let changed = false;
  const mapped = items.map((item) => {
    const next = fn(item);
    if (next !== item) changed = true;
    return next;
  });
  return { items: changed ? mapped : items, changed };
};

const mapProperty = (
  property: IrObjectProperty,
  fn: (expr: IrExpression) => IrExpression
): IrObjectProperty => {
  switch (property.kind) {
    case "property": {
      const value = fn(property.value);
      return value === property.value ? property : { ...property, value };
    }
    case "computed": {
      const key = fn(property.key);
      const value = fn(property.value);
      return key === property.key && value === property.value
        ? property
        : { ...property, key, value };
    }
    case "spread": {
      const expression = fn(property.expression);
      return expression === property.expression
        ? property
        : { ...property, expression };
    }
  }
};

/**
 * Apply `fn` to each direct child expression of `expr`.
 */
export const mapChildren = (
  expr: IrExpression,
  fn: (child: IrExpression) => IrExpression
): IrExpression => {
  switch (expr.kind) {
    case "literal":
    case "identifier":
    case "this":
    case "opaque":
      return expr;

    case "memberAccess": {
      const object = fn(expr.object);
      return object === expr.object ? expr : { ...expr, object };
    }

    case "elementAccess": {
      const object = fn(expr.object);
      const index = fn(expr.index);
      return object === expr.object && index === expr.index
        ? expr
        : { ...expr, object, index };
    }

    case "call":
    case "new": {
      const callee = fn(expr.callee);
      const args = mapAll(expr.arguments, fn);
      return callee === expr.callee && !args.changed
        ? expr
        : { ...expr, callee, arguments: args.items };
    }

    case "arrowFunction": {
      const body = fn(expr.body);
      return body === expr.body ? expr : { ...expr, body };
    }

    case "object": {
      let changed = false;
      const properties = expr.properties.map((property) => {
        const next = mapProperty(property, fn);
        if (next !== property) changed = true;
        return next;
      });
      return changed ? { ...expr, properties } : expr;
    }

    case "array": {
      const elements = mapAll(expr.elements, fn);
      return elements.changed ? { ...expr, elements: elements.items } : expr;
    }

    case "unary":
    case "typeAssertion":
    case "satisfies":
    case "nonNull":
    case "spread":
    case "annotated": {
      const expression = fn(expr.expression);
      return expression === expr.expression ? expr : { ...expr, expression };
    }

    case "binary":
    case "logical": {
      const left = fn(expr.left);
      const right = fn(expr.right);
      return left === expr.left && right === expr.right
        ? expr
        : { ...expr, left, right };
    }

    case "conditional": {
      const condition = fn(expr.condition);
      const whenTrue = fn(expr.whenTrue);
      const whenFalse = fn(expr.whenFalse);
      return condition === expr.condition &&
        whenTrue === expr.whenTrue &&
        whenFalse === expr.whenFalse
        ? expr
        : { ...expr, condition, whenTrue, whenFalse };
    }

    case "templateLiteral": {
      const expressions = mapAll(expr.expressions, fn);
      return expressions.changed
        ? { ...expr, expressions: expressions.items }
        : expr;
    }
  }
};

/**
 * Bottom-up rewrite: children first, then `fn` on the rebuilt node.
 */
export const mapExpression = (
  expr: IrExpression,
  fn: (expr: IrExpression) => IrExpression
): IrExpression => fn(mapChildren(expr, (child) => mapExpression(child, fn)));

/**
 * Direct child expressions, in source order.
 */
export const getChildren = (expr: IrExpression): readonly IrExpression[] => {
  const children: IrExpression[] = [];
  mapChildren(expr, (child) => {
    children.push(child);
    return child;
  });
  return children;
};

/**
 * Pre-order search. Returns true as soon as `predicate` matches a node.
 */
export const someExpression = (
  expr: IrExpression,
  predicate: (expr: IrExpression) => boolean
): boolean =>
  predicate(expr) ||
  getChildren(expr).some((child) => someExpression(child, predicate));

/**
 * Pre-order walk over every node.
 */
export const forEachExpression = (
  expr: IrExpression,
  visit: (expr: IrExpression) => void
): void => {
  visit(expr);
  for (const child of getChildren(expr)) {
    forEachExpression(child, visit);
  }
};
