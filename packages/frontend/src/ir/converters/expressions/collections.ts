/**
 * Object and array literal converters
 */

import * as ts from "typescript";
import { IrExpression, IrObjectProperty } from "../../types.js";
import { convertOpaque, getSourceSpan } from "./helpers.js";
import { ConverterContext } from "../context.js";
import { convertExpression } from "../../expression-converter.js";

/**
 * Static text of a property name: identifiers, string and numeric literals,
 * and computed names whose expression is one of those literals.
 */
export const getStaticPropertyName = (
  name: ts.PropertyName
): string | undefined => {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) {
    return name.text;
  }
  if (ts.isNumericLiteral(name)) {
    return String(Number(name.text));
  }
  if (ts.isComputedPropertyName(name)) {
    const expr = name.expression;
    if (ts.isStringLiteral(expr) || ts.isNoSubstitutionTemplateLiteral(expr)) {
      return expr.text;
    }
    if (ts.isNumericLiteral(expr)) {
      return String(Number(expr.text));
    }
  }
  return undefined;
};

const convertProperty = (
  prop: ts.ObjectLiteralElementLike,
  ctx: ConverterContext
): IrObjectProperty | undefined => {
  if (ts.isPropertyAssignment(prop)) {
    const key = getStaticPropertyName(prop.name);
    if (key !== undefined) {
      return {
        kind: "property",
        key,
        value: convertExpression(prop.initializer, ctx),
        shorthand: false,
      };
    }
    if (ts.isComputedPropertyName(prop.name)) {
      return {
        kind: "computed",
        key: convertExpression(prop.name.expression, ctx),
        value: convertExpression(prop.initializer, ctx),
      };
    }
    return undefined;
  }

  if (ts.isShorthandPropertyAssignment(prop)) {
    if (prop.objectAssignmentInitializer) {
      return undefined;
    }
    return {
      kind: "property",
      key: prop.name.text,
      value: ctx.nodes.record(
        {
          kind: "identifier",
          name: prop.name.text,
          sourceSpan: getSourceSpan(prop.name),
        },
        prop.name
      ),
      shorthand: true,
    };
  }

  if (ts.isSpreadAssignment(prop)) {
    return {
      kind: "spread",
      expression: convertExpression(prop.expression, ctx),
    };
  }

  // Methods and accessors
  return undefined;
};

export const convertObjectLiteral = (
  node: ts.ObjectLiteralExpression,
  ctx: ConverterContext
): IrExpression => {
  const properties: IrObjectProperty[] = [];
  for (const prop of node.properties) {
    const converted = convertProperty(prop, ctx);
    if (!converted) {
      return convertOpaque(node, ctx);
    }
    properties.push(converted);
  }

  return ctx.nodes.record(
    { kind: "object", properties, sourceSpan: getSourceSpan(node) },
    node
  );
};

export const convertArrayLiteral = (
  node: ts.ArrayLiteralExpression,
  ctx: ConverterContext
): IrExpression =>
  ctx.nodes.record(
    {
      kind: "array",
      elements: node.elements.map((element): IrExpression => {
        if (ts.isSpreadElement(element)) {
          return ctx.nodes.record(
            {
              kind: "spread",
              expression: convertExpression(element.expression, ctx),
              sourceSpan: getSourceSpan(element),
            },
            element
          );
        }
        if (ts.isOmittedExpression(element)) {
          return { kind: "opaque", text: "" };
        }
        return convertExpression(element, ctx);
      }),
      sourceSpan: getSourceSpan(node),
    },
    node
  );
