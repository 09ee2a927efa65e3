/**
 * Field name inference
 */

import { IrExpression, IrObjectProperty } from "@dtoshape/frontend";

/**
 * Name implied by a value: the identifier, or the final member of an access
 * (`s.nest?.name` → "name").
 */
export const inferFieldName = (value: IrExpression): string | undefined => {
  switch (value.kind) {
    case "identifier":
      return value.name;
    case "memberAccess":
      return value.property.replace(/^#/, "");
    default:
      return undefined;
  }
};

/**
 * Shorthand properties take the name of their value. Spreads and computed
 * keys that are not literals have no name.
 */
export const propertyFieldName = (
  property: IrObjectProperty
): string | undefined => {
  if (property.kind !== "property") return undefined;
  return property.shorthand ? inferFieldName(property.value) : property.key;
};

export const propertyValue = (property: IrObjectProperty): IrExpression =>
  property.kind === "spread" ? property.expression : property.value;
