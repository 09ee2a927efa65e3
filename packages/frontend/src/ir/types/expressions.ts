/**
 * Expression types for IR
 *
 * Projection bodies are converted from the TypeScript AST into this tree once.
 * Every later pass (schema building, null-chain rewriting, nested expansion,
 * capture analysis, printing) works on these nodes and never re-parses text.
 */

import { SourceLocation } from "../../types/diagnostic.js";

/**
 * Base fields shared by all expression types.
 * - sourceSpan: Source location for error reporting (absent on synthesized nodes)
 */
export type IrExpressionBase = {
  readonly sourceSpan?: SourceLocation;
};

export type IrExpression =
  | IrLiteralExpression
  | IrIdentifierExpression
  | IrThisExpression
  | IrMemberExpression
  | IrElementAccessExpression
  | IrCallExpression
  | IrNewExpression
  | IrArrowFunctionExpression
  | IrObjectExpression
  | IrArrayExpression
  | IrUnaryExpression
  | IrBinaryExpression
  | IrLogicalExpression
  | IrConditionalExpression
  | IrTypeAssertionExpression
  | IrSatisfiesExpression
  | IrNonNullExpression
  | IrTemplateLiteralExpression
  | IrSpreadExpression
  | IrAnnotatedExpression
  | IrOpaqueExpression;

export type IrLiteralExpression = IrExpressionBase & {
  readonly kind: "literal";
  readonly value: string | number | bigint | boolean | null | undefined;
  /** Source lexeme, kept so numbers and strings print the way they were written */
  readonly raw?: string;
};

export type IrIdentifierExpression = IrExpressionBase & {
  readonly kind: "identifier";
  readonly name: string;
};

export type IrThisExpression = IrExpressionBase & {
  readonly kind: "this";
};

export type IrMemberExpression = IrExpressionBase & {
  readonly kind: "memberAccess";
  readonly object: IrExpression;
  readonly property: string;
  readonly isOptional: boolean; // true for obj?.prop
};

export type IrElementAccessExpression = IrExpressionBase & {
  readonly kind: "elementAccess";
  readonly object: IrExpression;
  readonly index: IrExpression;
  readonly isOptional: boolean; // true for obj?.[index]
};

export type IrCallExpression = IrExpressionBase & {
  readonly kind: "call";
  readonly callee: IrExpression;
  readonly arguments: readonly IrExpression[];
  readonly isOptional: boolean; // true for fn?.()
  /** Explicit type arguments as written (`fn<A, B>()`) */
  readonly typeArguments?: readonly string[];
};

export type IrNewExpression = IrExpressionBase & {
  readonly kind: "new";
  readonly callee: IrExpression;
  readonly arguments: readonly IrExpression[];
  readonly typeArguments?: readonly string[];
};

export type IrArrowFunctionExpression = IrExpressionBase & {
  readonly kind: "arrowFunction";
  readonly parameters: readonly IrIdentifierExpression[];
  /** Return type annotation text, set when a pass knows the generated type */
  readonly returnType?: string;
  readonly body: IrExpression;
};

export type IrObjectProperty =
  | {
      readonly kind: "property";
      readonly key: string;
      readonly value: IrExpression;
      /** `{ id }` rather than `{ id: id }` */
      readonly shorthand: boolean;
    }
  | {
      readonly kind: "computed";
      readonly key: IrExpression;
      readonly value: IrExpression;
    }
  | { readonly kind: "spread"; readonly expression: IrExpression };

export type IrObjectExpression = IrExpressionBase & {
  readonly kind: "object";
  readonly properties: readonly IrObjectProperty[];
};

export type IrArrayExpression = IrExpressionBase & {
  readonly kind: "array";
  readonly elements: readonly IrExpression[];
};

export type IrUnaryOperator = "+" | "-" | "!" | "~" | "typeof" | "void";

export type IrUnaryExpression = IrExpressionBase & {
  readonly kind: "unary";
  readonly operator: IrUnaryOperator;
  readonly expression: IrExpression;
};

export type IrBinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "**"
  | "=="
  | "!="
  | "==="
  | "!=="
  | "<"
  | ">"
  | "<="
  | ">="
  | "<<"
  | ">>"
  | ">>>"
  | "&"
  | "|"
  | "^"
  | "in"
  | "instanceof";

export type IrBinaryExpression = IrExpressionBase & {
  readonly kind: "binary";
  readonly operator: IrBinaryOperator;
  readonly left: IrExpression;
  readonly right: IrExpression;
};

export type IrLogicalExpression = IrExpressionBase & {
  readonly kind: "logical";
  readonly operator: "&&" | "||" | "??";
  readonly left: IrExpression;
  readonly right: IrExpression;
};

export type IrConditionalExpression = IrExpressionBase & {
  readonly kind: "conditional";
  readonly condition: IrExpression;
  readonly whenTrue: IrExpression;
  readonly whenFalse: IrExpression;
};

/**
 * `x as T`. The target type is kept as source text: projection passes never
 * need to look inside it, only to carry or drop it.
 */
export type IrTypeAssertionExpression = IrExpressionBase & {
  readonly kind: "typeAssertion";
  readonly expression: IrExpression;
  readonly targetType: string;
};

/**
 * `x satisfies T`
 */
export type IrSatisfiesExpression = IrExpressionBase & {
  readonly kind: "satisfies";
  readonly expression: IrExpression;
  readonly targetType: string;
};

/**
 * `x!`. Erased at run time but kept so generated code type-checks like the
 * source did.
 */
export type IrNonNullExpression = IrExpressionBase & {
  readonly kind: "nonNull";
  readonly expression: IrExpression;
};

export type IrTemplateLiteralExpression = IrExpressionBase & {
  readonly kind: "templateLiteral";
  /** Raw text segments; always one more than `expressions` */
  readonly quasis: readonly string[];
  readonly expressions: readonly IrExpression[];
};

export type IrSpreadExpression = IrExpressionBase & {
  readonly kind: "spread";
  readonly expression: IrExpression;
};

/**
 * An expression carrying an inline marker comment, printed as
 * `/* comment *\/ expression`. Used for field-scoped failures.
 */
export type IrAnnotatedExpression = IrExpressionBase & {
  readonly kind: "annotated";
  readonly comment: string;
  readonly expression: IrExpression;
};

/**
 * Syntax the IR does not model (block-bodied functions, assignments, ...).
 * Kept verbatim; no pass looks inside.
 */
export type IrOpaqueExpression = IrExpressionBase & {
  readonly kind: "opaque";
  readonly text: string;
};
