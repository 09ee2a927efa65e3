/**
 * TypeDescriptor - what the projection compiler knows about a type.
 *
 * Descriptors are plain data so the compiler can be driven by the TypeScript
 * checker in production and by hand-written descriptors in tests.
 */

/**
 * Type classes that have a non-null default value
 */
export type SpecialKind =
  | "boolean"
  | "char"
  | "string"
  | "number"
  | "bigint"
  | "enum"
  | "none";

export type CollectionKind = "array" | "readonlyArray" | "generic";

export type CollectionInfo = {
  readonly kind: CollectionKind;
  /** Generic container name for kind "generic" (`Set`, `Iterable`) */
  readonly container?: string;
  readonly elementType: TypeDescriptor;
};

/**
 * Where a named type is declared, so generated code can import it
 */
export type TypeDeclarationRef = {
  readonly name: string;
  readonly file: string;
  readonly exported: boolean;
};

export type TypeDescriptor = {
  /** Type text with null and undefined removed */
  readonly fullyQualifiedName: string;
  /** The type admits null or undefined */
  readonly isNullableAnnotated: boolean;
  readonly isValueType: boolean;
  readonly specialKind: SpecialKind;
  readonly collection?: CollectionInfo;
  readonly declarations?: readonly TypeDeclarationRef[];
};

const needsArrayParens = (elementName: string): boolean =>
  /[|&]|=>/.test(elementName);

/**
 * Render a collection type around an element type name.
 */
export const collectionTypeName = (
  kind: CollectionKind,
  elementName: string,
  container?: string
): string => {
  const element = needsArrayParens(elementName)
    ? `(${elementName})`
    : elementName;
  switch (kind) {
    case "array":
      return `${element}[]`;
    case "readonlyArray":
      return `readonly ${element}[]`;
    case "generic":
      return `${container ?? "Iterable"}<${elementName}>`;
  }
};

/**
 * A descriptor for a named type that is not nullable and has no default.
 */
export const namedType = (
  name: string,
  options: {
    readonly nullable?: boolean;
    readonly declarations?: readonly TypeDeclarationRef[];
  } = {}
): TypeDescriptor => ({
  fullyQualifiedName: name,
  isNullableAnnotated: options.nullable ?? false,
  isValueType: false,
  specialKind: "none",
  declarations: options.declarations,
});

/**
 * Replace the element type of a collection (or the whole type when it is
 * not a collection) with a generated type name, recomputing the name.
 */
export const withElementType = (
  descriptor: TypeDescriptor,
  elementName: string
): TypeDescriptor => {
  const element = namedType(elementName);
  const collection = descriptor.collection;
  if (!collection) {
    return { ...element, isNullableAnnotated: descriptor.isNullableAnnotated };
  }
  return {
    ...descriptor,
    fullyQualifiedName: collectionTypeName(
      collection.kind,
      elementName,
      collection.container
    ),
    collection: { ...collection, elementType: element },
    declarations: undefined,
  };
};

/**
 * Same type, with nullability switched on or off.
 */
export const withNullability = (
  descriptor: TypeDescriptor,
  isNullableAnnotated: boolean
): TypeDescriptor =>
  descriptor.isNullableAnnotated === isNullableAnnotated
    ? descriptor
    : { ...descriptor, isNullableAnnotated };

/**
 * All declarations referenced by a descriptor, element types included.
 */
export const collectDeclarations = (
  descriptor: TypeDescriptor
): readonly TypeDeclarationRef[] => [
  ...(descriptor.declarations ?? []),
  ...(descriptor.collection
    ? collectDeclarations(descriptor.collection.elementType)
    : []),
];
