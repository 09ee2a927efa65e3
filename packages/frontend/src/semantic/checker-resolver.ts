/**
 * TypeResolver backed by the TypeScript checker.
 *
 * One resolver serves one projection site: "bound parameter" means declared
 * inside that site's lambda (`scope`).
 */

import * as ts from "typescript";
import { IrExpression } from "../ir/types.js";
import { IrNodeMap } from "../ir/node-map.js";
import { containsOptionalChain } from "../ir/chains.js";
import {
  CollectionInfo,
  SpecialKind,
  TypeDeclarationRef,
  TypeDescriptor,
} from "./type-descriptor.js";
import {
  Accessibility,
  DeclarationSite,
  ReferenceClassification,
  TypeResolver,
} from "./type-resolver.js";

export type CheckerResolver = TypeResolver & {
  readonly describeType: (type: ts.Type) => TypeDescriptor;
};

const NULLISH = ts.TypeFlags.Null | ts.TypeFlags.Undefined | ts.TypeFlags.Void;

const GENERIC_COLLECTIONS: ReadonlySet<string> = new Set([
  "Set",
  "ReadonlySet",
  "Iterable",
  "IterableIterator",
]);

const NOT_A_REFERENCE: ReferenceClassification = { kind: "value" };

const constituents = (type: ts.Type): readonly ts.Type[] =>
  type.isUnion() ? type.types : [type];

const everyConstituent = (type: ts.Type, flags: ts.TypeFlags): boolean =>
  constituents(type).every((t) => (t.flags & flags) !== 0);

const isObjectType = (type: ts.Type): type is ts.ObjectType =>
  (type.flags & ts.TypeFlags.Object) !== 0;

const isTypeReference = (type: ts.Type): type is ts.TypeReference =>
  isObjectType(type) && (type.objectFlags & ts.ObjectFlags.Reference) !== 0;

const specialKindOf = (type: ts.Type): SpecialKind => {
  if (type.flags & ts.TypeFlags.Never) return "none";
  // Numeric enums are NumberLike too, so they are checked first
  if (everyConstituent(type, ts.TypeFlags.EnumLike)) {
    return everyConstituent(type, ts.TypeFlags.NumberLike) ? "enum" : "none";
  }
  if (everyConstituent(type, ts.TypeFlags.BooleanLike)) return "boolean";
  if (everyConstituent(type, ts.TypeFlags.StringLike)) return "string";
  if (everyConstituent(type, ts.TypeFlags.NumberLike)) return "number";
  if (everyConstituent(type, ts.TypeFlags.BigIntLike)) return "bigint";
  return "none";
};

const isExported = (decl: ts.Declaration): boolean =>
  (ts.getCombinedModifierFlags(decl) & ts.ModifierFlags.Export) !== 0;

const isTopLevel = (decl: ts.Declaration): boolean => {
  if (ts.isVariableDeclaration(decl)) {
    const statement = decl.parent.parent;
    return ts.isVariableStatement(statement) && ts.isSourceFile(statement.parent);
  }
  return ts.isSourceFile(decl.parent);
};

const isLiteralInitializer = (expr: ts.Expression | undefined): boolean => {
  if (!expr) return false;
  if (
    ts.isStringLiteral(expr) ||
    ts.isNumericLiteral(expr) ||
    ts.isBigIntLiteral(expr) ||
    ts.isNoSubstitutionTemplateLiteral(expr) ||
    expr.kind === ts.SyntaxKind.TrueKeyword ||
    expr.kind === ts.SyntaxKind.FalseKeyword
  ) {
    return true;
  }
  return (
    ts.isPrefixUnaryExpression(expr) &&
    expr.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(expr.operand)
  );
};

const isConstLiteral = (decl: ts.Declaration): boolean =>
  ts.isVariableDeclaration(decl) &&
  (decl.parent.flags & ts.NodeFlags.Const) !== 0 &&
  isLiteralInitializer(decl.initializer);

const isNamedTypeDeclaration = (decl: ts.Declaration): boolean =>
  ts.isInterfaceDeclaration(decl) ||
  ts.isClassDeclaration(decl) ||
  ts.isTypeAliasDeclaration(decl) ||
  ts.isEnumDeclaration(decl);

const accessibilityOf = (
  decl: ts.Declaration | undefined,
  name: ts.MemberName
): Accessibility => {
  if (ts.isPrivateIdentifier(name)) return "private";
  if (!decl) return "public";
  const flags = ts.getCombinedModifierFlags(decl);
  if (flags & ts.ModifierFlags.Private) return "private";
  if (flags & ts.ModifierFlags.Protected) return "protected";
  return "public";
};

const siteOf = (
  decl: ts.Declaration,
  name: string
): DeclarationSite | undefined => {
  const sourceFile = decl.getSourceFile();
  if (sourceFile.isDeclarationFile) return undefined;
  return { name, file: sourceFile.fileName, exported: isExported(decl) };
};

/**
 * Expressions whose literal type an object literal property would widen
 * (`5` → number, `Status.Active` → Status, `c ? "a" : "b"` → string).
 */
const isWideningLiteral = (node: ts.Node): boolean =>
  ts.isStringLiteral(node) ||
  ts.isNumericLiteral(node) ||
  ts.isBigIntLiteral(node) ||
  ts.isNoSubstitutionTemplateLiteral(node) ||
  ts.isTemplateExpression(node) ||
  ts.isPrefixUnaryExpression(node) ||
  ts.isConditionalExpression(node) ||
  ts.isBinaryExpression(node) ||
  node.kind === ts.SyntaxKind.TrueKeyword ||
  node.kind === ts.SyntaxKind.FalseKeyword;

export const createCheckerResolver = (params: {
  readonly checker: ts.TypeChecker;
  readonly nodes: IrNodeMap;
  readonly scope: ts.Node;
}): CheckerResolver => {
  const { checker, nodes, scope } = params;
  const descriptors = new WeakMap<ts.Type, TypeDescriptor>();
  const typesByDescriptor = new WeakMap<TypeDescriptor, ts.Type>();

  const declarationsOf = (
    type: ts.Type
  ): readonly TypeDeclarationRef[] | undefined => {
    const symbol = type.aliasSymbol ?? type.getSymbol();
    if (!symbol) return undefined;
    const refs = (symbol.getDeclarations() ?? [])
      .filter(isNamedTypeDeclaration)
      .filter((decl) => !decl.getSourceFile().isDeclarationFile)
      .map((decl) => ({
        name: symbol.getName(),
        file: decl.getSourceFile().fileName,
        exported: isExported(decl),
      }));
    return refs.length > 0 ? refs.slice(0, 1) : undefined;
  };

  const collectionOf = (type: ts.Type): CollectionInfo | undefined => {
    if (!isTypeReference(type)) return undefined;
    const element = checker.getTypeArguments(type)[0];
    if (element === undefined) return undefined;
    const containerName = type.getSymbol()?.getName();
    if (checker.isArrayType(type)) {
      return {
        kind: containerName === "ReadonlyArray" ? "readonlyArray" : "array",
        elementType: describeType(element),
      };
    }
    if (containerName !== undefined && GENERIC_COLLECTIONS.has(containerName)) {
      return {
        kind: "generic",
        container: containerName,
        elementType: describeType(element),
      };
    }
    return undefined;
  };

  const describeType = (type: ts.Type): TypeDescriptor => {
    const cached = descriptors.get(type);
    if (cached) return cached;

    const nonNull = checker.getNonNullableType(type);
    const specialKind = specialKindOf(nonNull);
    const descriptor: TypeDescriptor = {
      fullyQualifiedName: checker.typeToString(
        nonNull,
        undefined,
        ts.TypeFormatFlags.NoTruncation |
          ts.TypeFormatFlags.UseAliasDefinedOutsideCurrentScope
      ),
      isNullableAnnotated: constituents(type).some(
        (t) => (t.flags & NULLISH) !== 0
      ),
      isValueType:
        specialKind !== "none" && specialKind !== "string",
      specialKind,
      collection: collectionOf(nonNull),
      declarations: declarationsOf(nonNull),
    };

    descriptors.set(type, descriptor);
    typesByDescriptor.set(descriptor, type);
    return descriptor;
  };

  const isWideningPosition = (node: ts.Node): boolean => {
    if (isWideningLiteral(node)) return true;
    if (!ts.isPropertyAccessExpression(node)) return false;
    const decl = checker.getSymbolAtLocation(node.name)?.valueDeclaration;
    return decl !== undefined && ts.isEnumMember(decl);
  };

  const shorthandValueSymbol = (node: ts.Node): ts.Symbol | undefined =>
    ts.isShorthandPropertyAssignment(node.parent) && node.parent.name === node
      ? checker.getShorthandAssignmentValueSymbol(node.parent)
      : undefined;

  const resolveType = (expr: IrExpression): TypeDescriptor | undefined => {
    const node = nodes.get(expr);
    if (!node) return undefined;
    const shorthand = shorthandValueSymbol(node);
    if (shorthand) {
      return describeType(checker.getTypeOfSymbolAtLocation(shorthand, node));
    }
    const type = checker.getTypeAtLocation(node);
    return describeType(
      isWideningPosition(node) ? checker.getBaseTypeOfLiteralType(type) : type
    );
  };

  const resolvePathType = (expr: IrExpression): TypeDescriptor | undefined => {
    const node = nodes.get(expr);
    if (!node) return undefined;
    if (ts.isPropertyAccessExpression(node)) {
      const symbol = checker.getSymbolAtLocation(node.name);
      if (symbol) {
        return describeType(checker.getTypeOfSymbolAtLocation(symbol, node));
      }
    }
    if (ts.isCallExpression(node)) {
      const signature = checker.getResolvedSignature(node);
      if (signature) {
        return describeType(checker.getReturnTypeOfSignature(signature));
      }
    }
    return resolveType(expr);
  };

  const resolveMemberType = (
    type: TypeDescriptor,
    memberName: string
  ): TypeDescriptor | undefined => {
    const tsType = typesByDescriptor.get(type);
    if (!tsType) return undefined;
    const member = checker.getPropertyOfType(
      checker.getNonNullableType(tsType),
      memberName
    );
    return member
      ? describeType(checker.getTypeOfSymbolAtLocation(member, scope))
      : undefined;
  };

  const isInsideScope = (decl: ts.Declaration): boolean =>
    decl.getSourceFile() === scope.getSourceFile() &&
    decl.pos >= scope.pos &&
    decl.end <= scope.end;

  const classifyIdentifier = (node: ts.Identifier): ReferenceClassification => {
    const located = shorthandValueSymbol(node) ?? checker.getSymbolAtLocation(node);
    if (!located) return NOT_A_REFERENCE;
    const symbol =
      located.flags & ts.SymbolFlags.Alias
        ? checker.getAliasedSymbol(located)
        : located;

    const decl = symbol.valueDeclaration ?? symbol.getDeclarations()?.[0];
    if (!decl || decl.getSourceFile().isDeclarationFile) {
      return NOT_A_REFERENCE;
    }
    if (isInsideScope(decl)) {
      return { kind: "boundParameter" };
    }
    if (ts.isEnumDeclaration(decl)) {
      return { kind: "enumLiteral", declaration: siteOf(decl, symbol.getName()) };
    }
    if (ts.isParameter(decl)) {
      return { kind: "outerParameter" };
    }
    if (isTopLevel(decl)) {
      // Unexported module bindings are unreachable from generated code
      if (!isExported(decl)) return { kind: "local" };
      const declaration = siteOf(decl, symbol.getName());
      if (isConstLiteral(decl)) return { kind: "constant", declaration };
      return {
        kind: "staticMember",
        accessibility: "public",
        memberName: symbol.getName(),
        declaration,
      };
    }
    return { kind: "local" };
  };

  const classifyMember = (
    node: ts.PropertyAccessExpression
  ): ReferenceClassification => {
    const symbol = checker.getSymbolAtLocation(node.name);
    const decl = symbol?.valueDeclaration;

    if (node.expression.kind === ts.SyntaxKind.ThisKeyword) {
      return {
        kind: "instanceMember",
        accessibility: accessibilityOf(decl, node.name),
        memberName: node.name.text,
      };
    }
    if (!decl || decl.getSourceFile().isDeclarationFile) {
      return NOT_A_REFERENCE;
    }
    if (ts.isEnumMember(decl)) {
      return {
        kind: "enumLiteral",
        declaration: siteOf(decl.parent, decl.parent.name.text),
      };
    }
    const isStatic =
      (ts.getCombinedModifierFlags(decl) & ts.ModifierFlags.Static) !== 0;
    if (isStatic && ts.isClassLike(decl.parent)) {
      const className = decl.parent.name?.text;
      return {
        kind: "staticMember",
        accessibility: accessibilityOf(decl, node.name),
        memberName: node.name.text,
        declaration:
          className !== undefined ? siteOf(decl.parent, className) : undefined,
      };
    }
    return NOT_A_REFERENCE;
  };

  const classifyReference = (expr: IrExpression): ReferenceClassification => {
    const node = nodes.get(expr);
    if (!node) return NOT_A_REFERENCE;
    if (expr.kind === "memberAccess" && ts.isPropertyAccessExpression(node)) {
      return classifyMember(node);
    }
    if (expr.kind === "identifier" && ts.isIdentifier(node)) {
      return classifyIdentifier(node);
    }
    return NOT_A_REFERENCE;
  };

  return {
    resolveType,
    resolvePathType,
    resolveMemberType,
    classifyReference,
    containsOptionalChain,
    describeType,
  };
};
