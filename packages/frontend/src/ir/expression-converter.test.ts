/**
 * Tests for TypeScript → IR expression conversion
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as ts from "typescript";
import { IrExpression } from "./types.js";
import { createNodeMap } from "./node-map.js";
import { createConverterContext } from "./converters/context.js";
import { convertExpression } from "./expression-converter.js";
import { Diagnostic } from "../types/diagnostic.js";

/**
 * Parse a single expression and convert it (no checker needed)
 */
const convert = (
  text: string
): { readonly ir: IrExpression; readonly diagnostics: readonly Diagnostic[] } => {
  const sourceFile = ts.createSourceFile(
    "expr.ts",
    `const __value = ${text};`,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS
  );
  const statement = sourceFile.statements[0];
  if (!statement || !ts.isVariableStatement(statement)) {
    throw new Error("Expected variable statement");
  }
  const initializer = statement.declarationList.declarations[0]?.initializer;
  if (!initializer) {
    throw new Error("Expected initializer");
  }
  const diagnostics: Diagnostic[] = [];
  const ctx = createConverterContext({
    nodes: createNodeMap(),
    report: (d) => diagnostics.push(d),
  });
  return { ir: convertExpression(initializer, ctx), diagnostics };
};

describe("Expression conversion", () => {
  it("should convert optional member chains", () => {
    const { ir } = convert("s.nest?.name");
    expect(ir).to.deep.include({
      kind: "memberAccess",
      property: "name",
      isOptional: true,
    });
    if (ir.kind !== "memberAccess") return;
    expect(ir.object).to.deep.include({
      kind: "memberAccess",
      property: "nest",
      isOptional: false,
    });
  });

  it("should drop parentheses", () => {
    const { ir } = convert("(a + b) * c");
    expect(ir.kind).to.equal("binary");
    if (ir.kind !== "binary") return;
    expect(ir.operator).to.equal("*");
    expect(ir.left.kind).to.equal("binary");
  });

  it("should distinguish logical from binary operators", () => {
    const { ir } = convert("a ?? b");
    expect(ir).to.deep.include({ kind: "logical", operator: "??" });
  });

  it("should convert literals with their source text", () => {
    expect(convert("0x10").ir).to.deep.include({
      kind: "literal",
      value: 16,
      raw: "0x10",
    });
    expect(convert("10n").ir).to.deep.include({
      kind: "literal",
      value: 10n,
    });
    expect(convert("undefined").ir).to.deep.include({
      kind: "literal",
      value: undefined,
    });
  });

  it("should convert object literal property forms", () => {
    const { ir } = convert('{ id, "full name": s.name, [key]: 1, ...rest }');
    if (ir.kind !== "object") {
      throw new Error(`Expected object, got ${ir.kind}`);
    }
    expect(ir.properties.map((p) => p.kind)).to.deep.equal([
      "property",
      "property",
      "computed",
      "spread",
    ]);
    expect(ir.properties[0]).to.deep.include({ key: "id", shorthand: true });
    expect(ir.properties[1]).to.deep.include({
      key: "full name",
      shorthand: false,
    });
  });

  it("should convert expression-bodied arrows", () => {
    const { ir } = convert("items.map((i) => ({ sku: i.sku }))");
    if (ir.kind !== "call") throw new Error("Expected call");
    const [lambda] = ir.arguments;
    expect(lambda?.kind).to.equal("arrowFunction");
    if (lambda?.kind !== "arrowFunction") return;
    expect(lambda.parameters.map((p) => p.name)).to.deep.equal(["i"]);
    expect(lambda.body.kind).to.equal("object");
  });

  it("should keep type assertions and non-null assertions", () => {
    expect(convert("x as Nest").ir).to.deep.include({
      kind: "typeAssertion",
      targetType: "Nest",
    });
    expect(convert("x!").ir.kind).to.equal("nonNull");
  });

  it("should keep unsupported syntax opaque and report it", () => {
    const { ir, diagnostics } = convert("items.map((i) => { return i; })");
    if (ir.kind !== "call") throw new Error("Expected call");
    expect(ir.arguments[0]).to.deep.include({
      kind: "opaque",
      text: "(i) => { return i; }",
    });
    expect(diagnostics.map((d) => d.code)).to.deep.equal(["DSH3002"]);
  });

  it("should not report regular expression literals", () => {
    const { ir, diagnostics } = convert("/a+/g");
    expect(ir).to.deep.include({ kind: "opaque", text: "/a+/g" });
    expect(diagnostics).to.deep.equal([]);
  });

  it("should split template literals into quasis and expressions", () => {
    const { ir } = convert("`#${s.id}-${s.code}`");
    if (ir.kind !== "templateLiteral") throw new Error("Expected template");
    expect(ir.quasis).to.deep.equal(["#", "-", ""]);
    expect(ir.expressions).to.have.length(2);
  });
});
