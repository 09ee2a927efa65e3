/**
 * Interface declarations for generated DTO types
 */

import { GeneratedType, ProjectionField } from "@dtoshape/compiler";
import { printExpression } from "../expression-emitter.js";
import { emitType } from "../type-emitter.js";
import {
  EmitterContext,
  escapeComment,
  formatPropertyKey,
  getIndent,
  indent,
} from "../types.js";

export const wantsComments = (context: EmitterContext): boolean =>
  (context.options.commentOutput ?? "all") === "all";

const emitField = (
  field: ProjectionField,
  context: EmitterContext
): readonly string[] => {
  const ind = getIndent(context);
  const modifier = (context.options.readonlyProperties ?? true) ? "readonly " : "";
  const optional = field.isOptional ? "?" : "";
  const type = emitType(
    field.declaredType,
    field.isOptional || field.declaredType.isNullableAnnotated
  );
  const declaration = `${ind}${modifier}${formatPropertyKey(field.name)}${optional}: ${type};`;

  if (!wantsComments(context)) return [declaration];
  const origin = escapeComment(printExpression(field.originalExpression));
  return [`${ind}/** From: ${origin} */`, declaration];
};

/**
 * `export interface Name { ... }` for one generated type
 */
export const emitInterface = (
  generated: GeneratedType,
  context: EmitterContext
): string => {
  const ind = getIndent(context);
  const lines: string[] = [];

  if (wantsComments(context)) {
    const source = escapeComment(generated.schema.sourceTypeName);
    lines.push(`${ind}/** From: ${source} (${generated.identity.hash}) */`);
  }
  if (generated.schema.fields.length === 0) {
    lines.push(`${ind}export interface ${generated.name} {}`);
    return lines.join("\n");
  }

  const body = indent(context);
  lines.push(`${ind}export interface ${generated.name} {`);
  for (const field of generated.schema.fields) {
    lines.push(...emitField(field, body));
  }
  lines.push(`${ind}}`);
  return lines.join("\n");
};
