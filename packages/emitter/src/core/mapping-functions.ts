/**
 * Per-element mapping functions
 *
 * A projection without captures is an expression-bodied arrow:
 *
 *   export const projectSampleDto_1A2B3C4D = (s: Sample): SampleDto_1A2B3C4D => ({
 *     id: s.id,
 *   });
 *
 * With captures the caller's values arrive in a second `capture` parameter and
 * are destructured into the local names the rewritten body uses.
 */

import * as path from "node:path";
import { CaptureEntry, CompiledProjection } from "@dtoshape/compiler";
import { SourceLocation } from "@dtoshape/frontend";
import { emitExpression } from "../expression-emitter.js";
import { emitCaptureType, emitType } from "../type-emitter.js";
import {
  EmitterContext,
  escapeComment,
  formatPropertyKey,
  getIndent,
  indent,
} from "../types.js";
import { wantsComments } from "./declarations.js";

export const mappingFunctionName = (typeName: string): string =>
  `project${typeName}`;

const displayLocation = (
  location: SourceLocation,
  context: EmitterContext
): string => {
  const root = context.options.projectRoot;
  const file = root
    ? path.relative(root, location.file).split(path.sep).join("/")
    : location.file;
  return `${file}:${location.line}:${location.column}`;
};

const captureParameter = (captures: readonly CaptureEntry[]): string => {
  const members = captures.map(
    (entry) => `readonly ${formatPropertyKey(entry.displayName)}: ${emitCaptureType(entry.type)}`
  );
  return `capture: { ${members.join("; ")} }`;
};

const captureBinding = (captures: readonly CaptureEntry[]): string => {
  const names = captures.map((entry) =>
    entry.localName === entry.displayName
      ? entry.localName
      : `${formatPropertyKey(entry.displayName)}: ${entry.localName}`
  );
  return `const { ${names.join(", ")} } = capture;`;
};

/**
 * The body text of the rewritten selector, printed at the given depth
 */
export const emitMappingBody = (
  projection: CompiledProjection,
  context: EmitterContext
): string => emitExpression(projection.rewritten.body, context).text;

export const emitMappingFunction = (
  projection: CompiledProjection,
  name: string,
  context: EmitterContext
): string => {
  const ind = getIndent(context);
  const lines: string[] = [];

  if (projection.location && wantsComments(context)) {
    lines.push(
      `${ind}/** ${escapeComment(displayLocation(projection.location, context))} */`
    );
  }

  const parameter = projection.rewritten.parameters
    .map((p) => `${p.name}: ${emitType(projection.sourceType)}`)
    .join(", ");
  const { captureSet, typeName } = projection;

  if (captureSet.length === 0) {
    const body = emitMappingBody(projection, context);
    lines.push(
      `${ind}export const ${name} = (${parameter}): ${typeName} => (${body});`
    );
    return lines.join("\n");
  }

  const inner = indent(context);
  const innerIndent = getIndent(inner);
  lines.push(
    `${ind}export const ${name} = (${parameter}, ${captureParameter(captureSet)}): ${typeName} => {`,
    `${innerIndent}${captureBinding(captureSet)}`,
    `${innerIndent}return ${emitMappingBody(projection, inner)};`,
    `${ind}};`
  );
  return lines.join("\n");
};
