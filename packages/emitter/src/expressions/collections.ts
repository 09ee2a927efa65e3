/**
 * Collection expression emitters (arrays, objects)
 */

import {
  IrArrayExpression,
  IrObjectExpression,
  IrObjectProperty,
} from "@dtoshape/frontend";
import {
  EmitterContext,
  TsFragment,
  formatPropertyKey,
  getIndent,
  indent,
} from "../types.js";
import { emitExpression } from "../expression-emitter.js";
import { Precedence, fragment, operand } from "./parentheses.js";

export const emitArray = (
  expr: IrArrayExpression,
  context: EmitterContext
): TsFragment => {
  const elements = expr.elements.map((element) =>
    operand(emitExpression(element, context), Precedence.arrow)
  );
  return fragment(`[${elements.join(", ")}]`, Precedence.primary);
};

const emitProperty = (
  property: IrObjectProperty,
  context: EmitterContext
): string => {
  switch (property.kind) {
    case "property": {
      const { value } = property;
      if (value.kind === "identifier" && value.name === property.key) {
        return property.key;
      }
      const valueText = operand(emitExpression(value, context), Precedence.arrow);
      return `${formatPropertyKey(property.key)}: ${valueText}`;
    }
    case "computed": {
      const key = emitExpression(property.key, context).text;
      const valueText = operand(emitExpression(property.value, context), Precedence.arrow);
      return `[${key}]: ${valueText}`;
    }
    case "spread":
      return `...${operand(emitExpression(property.expression, context), Precedence.arrow)}`;
  }
};

/**
 * One property per line, unless the context asks for a single line
 */
export const emitObject = (
  expr: IrObjectExpression,
  context: EmitterContext
): TsFragment => {
  if (expr.properties.length === 0) return fragment("{}", Precedence.primary);

  if (context.singleLine) {
    const properties = expr.properties.map((property) => emitProperty(property, context));
    return fragment(`{ ${properties.join(", ")} }`, Precedence.primary);
  }

  const inner = indent(context);
  const innerIndent = getIndent(inner);
  const lines = expr.properties.map(
    (property) => `${innerIndent}${emitProperty(property, inner)},`
  );
  return fragment(
    `{\n${lines.join("\n")}\n${getIndent(context)}}`,
    Precedence.primary
  );
};
