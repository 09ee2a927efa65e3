/**
 * Capture analyzer
 *
 * Finds every reference in a compiled projection that is neither bound by
 * one of its lambdas nor resolvable from the generated module on its own.
 * Enclosing locals are captured by name. `this`-qualified accesses and
 * non-public statics become `captured_<Member>` locals. Public statics,
 * exported constants and enum members stay in place and are imported.
 */

import {
  DeclarationSite,
  IrExpression,
  ReferenceClassification,
  TypeResolver,
  identifier,
  mapChildren,
} from "@dtoshape/frontend";
import { CaptureEntry, CaptureKind, ProjectionField } from "../types.js";

export type CaptureAnalysis = {
  readonly fields: readonly ProjectionField[];
  readonly captures: readonly CaptureEntry[];
  readonly staticImports: readonly DeclarationSite[];
};

export const capturedName = (memberName: string): string =>
  `captured_${memberName.replace(/^#/, "")}`;

type Collector = {
  readonly resolver: TypeResolver;
  /** Keyed by kind and display name; a local and a member may share a name */
  readonly captures: Map<string, CaptureEntry>;
  readonly imports: Map<string, DeclarationSite>;
};

const addCapture = (
  collector: Collector,
  displayName: string,
  localName: string,
  kind: CaptureKind,
  source: IrExpression
): void => {
  const key = `${kind}:${displayName}`;
  if (collector.captures.has(key)) return;
  collector.captures.set(key, {
    displayName,
    localName,
    kind,
    source,
    type: collector.resolver.resolveType(source),
  });
};

const addImport = (
  collector: Collector,
  declaration: DeclarationSite | undefined
): void => {
  if (!declaration || !declaration.exported) return;
  const key = `${declaration.file}#${declaration.name}`;
  if (!collector.imports.has(key)) collector.imports.set(key, declaration);
};

/**
 * Replacement for a member reference, or undefined to keep walking.
 */
const rewriteMember = (
  expr: IrExpression,
  classification: ReferenceClassification,
  collector: Collector
): IrExpression | undefined => {
  switch (classification.kind) {
    case "instanceMember": {
      const localName = capturedName(classification.memberName);
      addCapture(collector, classification.memberName, localName, "instanceMember", expr);
      return { ...identifier(localName), sourceSpan: expr.sourceSpan };
    }
    case "staticMember": {
      if (classification.accessibility === "public") {
        addImport(collector, classification.declaration);
        return expr;
      }
      const localName = capturedName(classification.memberName);
      addCapture(collector, classification.memberName, localName, "staticMember", expr);
      return { ...identifier(localName), sourceSpan: expr.sourceSpan };
    }
    case "constant":
    case "enumLiteral":
      addImport(collector, classification.declaration);
      return expr;
    default:
      return undefined;
  }
};

const visit = (
  expr: IrExpression,
  bound: ReadonlySet<string>,
  collector: Collector
): IrExpression => {
  switch (expr.kind) {
    case "identifier": {
      if (bound.has(expr.name)) return expr;
      const classification = collector.resolver.classifyReference(expr);
      switch (classification.kind) {
        case "local":
        case "outerParameter":
          addCapture(collector, expr.name, expr.name, classification.kind, expr);
          return expr;
        default:
          return rewriteMember(expr, classification, collector) ?? expr;
      }
    }

    case "this":
      addCapture(collector, "this", capturedName("this"), "instanceMember", expr);
      return { ...identifier(capturedName("this")), sourceSpan: expr.sourceSpan };

    case "memberAccess": {
      if (expr.object.kind === "this") {
        const localName = capturedName(expr.property);
        addCapture(collector, expr.property.replace(/^#/, ""), localName, "instanceMember", expr);
        return { ...identifier(localName), sourceSpan: expr.sourceSpan };
      }
      const replaced = rewriteMember(
        expr,
        collector.resolver.classifyReference(expr),
        collector
      );
      return replaced ?? mapChildren(expr, (child) => visit(child, bound, collector));
    }

    case "arrowFunction": {
      const inner = new Set(bound);
      for (const parameter of expr.parameters) inner.add(parameter.name);
      return mapChildren(expr, (child) => visit(child, inner, collector));
    }

    default:
      return mapChildren(expr, (child) => visit(child, bound, collector));
  }
};

export const analyzeCaptures = (
  fields: readonly ProjectionField[],
  parameter: string,
  resolver: TypeResolver
): CaptureAnalysis => {
  const collector: Collector = {
    resolver,
    captures: new Map(),
    imports: new Map(),
  };
  const bound = new Set([parameter]);

  const rewritten = fields.map((field) => {
    const sourceExpression = visit(field.sourceExpression, bound, collector);
    return sourceExpression === field.sourceExpression
      ? field
      : { ...field, sourceExpression };
  });

  return {
    fields: rewritten,
    captures: [...collector.captures.values()],
    staticImports: [...collector.imports.values()],
  };
};
