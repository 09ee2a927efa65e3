/**
 * Tests for nested-projection expansion
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  Diagnostic,
  IrExpression,
  TypeResolver,
  irEquals,
  namedType,
  parseExpression,
} from "@dtoshape/frontend";
import { BuildContext, DEFAULT_COMPILE_OPTIONS, createBuildContext } from "../context.js";
import { createDedupRegistry } from "../identity/registry.js";
import { digestSignature } from "../identity/hasher.js";
import { buildSchema } from "../schema/schema-builder.js";
import { NOT_EXPANDED_MARKER, expandNested } from "./nested-projection.js";
import { CompileOptions } from "../types.js";
import {
  arrayOf,
  createFakeResolver,
  stringType,
} from "../testing/fake-resolver.js";

const itemType = namedType("Item");

const resolver = createFakeResolver({
  types: {
    "s.items": arrayOf(itemType),
    i: itemType,
    "i.sku": stringType,
    x: itemType,
    "x.sku": stringType,
  },
});

const ir = (text: string): IrExpression => parseExpression(text).ir;

const setup = (
  options: Partial<CompileOptions> = {},
  typeResolver: TypeResolver = resolver
): { readonly context: BuildContext; readonly diagnostics: () => readonly Diagnostic[] } => {
  const state = createBuildContext(
    {
      registry: createDedupRegistry(),
      options: { ...DEFAULT_COMPILE_OPTIONS, ...options },
    },
    typeResolver
  );
  return { context: state.context, diagnostics: state.diagnostics };
};

const skuTypeName = `ItemsDto_${digestSignature("sku:string:false").slice(0, 8)}`;

describe("Nested projection expansion", () => {
  it("should type the element lambda with the generated name", () => {
    const { context } = setup();
    const result = expandNested(
      ir("s.items.map((i) => ({ sku: i.sku }))"),
      "items",
      context,
      buildSchema
    );

    expect(result.kind).to.equal("expanded");
    if (result.kind !== "expanded") return;
    expect(result.nested.typeName).to.equal(skuTypeName);
    expect(result.nested.parameter).to.equal("i");
    expect(result.nested.schema.sourceTypeName).to.equal("Item");
    expect(
      irEquals(
        result.expression,
        ir(`s.items.map((i): ${skuTypeName} => ({ sku: i.sku }))`)
      )
    ).to.equal(true);
  });

  it("should keep trailing operations after the map call", () => {
    const { context } = setup();
    const value = ir("s.items.map((i) => ({ sku: i.sku })).slice(0, 5)");
    const result = expandNested(value, "items", context, buildSchema);

    expect(result.kind).to.equal("expanded");
    if (result.kind !== "expanded") return;
    expect(
      irEquals(
        result.expression,
        ir(`s.items.map((i): ${skuTypeName} => ({ sku: i.sku })).slice(0, 5)`)
      )
    ).to.equal(true);
  });

  it("should register the nested type once per shape", () => {
    const { context } = setup();
    const first = expandNested(ir("s.items.map((i) => ({ sku: i.sku }))"), "items", context, buildSchema);
    const second = expandNested(ir("s.items.map((x) => ({ sku: x.sku }))"), "lines", context, buildSchema);

    expect(first.kind).to.equal("expanded");
    expect(second.kind).to.equal("expanded");
    if (first.kind !== "expanded" || second.kind !== "expanded") return;
    expect(second.nested.typeName).to.equal(first.nested.typeName);
    expect(context.registry.entries().size).to.equal(1);
  });

  it("should use a configured map operator", () => {
    const { context } = setup({ mapOperators: ["flatMap"] });
    expect(
      expandNested(ir("s.items.map((i) => ({ sku: i.sku }))"), "items", context, buildSchema).kind
    ).to.equal("none");
    expect(
      expandNested(ir("s.items.flatMap((i) => ({ sku: i.sku }))"), "items", context, buildSchema).kind
    ).to.equal("expanded");
  });

  it("should leave values without a map call alone", () => {
    const { context, diagnostics } = setup();
    expect(expandNested(ir("s.items.length"), "count", context, buildSchema).kind).to.equal("none");
    expect(expandNested(ir("s.items.map((i) => i.sku)"), "skus", context, buildSchema).kind).to.equal("none");
    expect(diagnostics()).to.deep.equal([]);
  });

  it("should mark a map call that is not on the access chain", () => {
    const { context, diagnostics } = setup();
    const value = ir("toList(s.items.map((i) => ({ sku: i.sku })))");
    const result = expandNested(value, "items", context, buildSchema);

    expect(result.kind).to.equal("failed");
    if (result.kind !== "failed") return;
    expect(result.expression.comment).to.equal(NOT_EXPANDED_MARKER);
    expect(result.expression.expression).to.equal(value);
    expect(diagnostics().map((d) => [d.code, d.severity])).to.deep.equal([
      ["DSH3001", "warning"],
    ]);
  });

  it("should mark an element literal with no nameable fields", () => {
    const { context, diagnostics } = setup();
    const result = expandNested(ir("s.items.map((i) => ({ ...i }))"), "items", context, buildSchema);
    expect(result.kind).to.equal("failed");
    expect(diagnostics()[0]?.code).to.equal("DSH3001");
  });

  it("should fall back to the collection element type", () => {
    const withoutParameter = createFakeResolver({
      types: { "s.items": arrayOf(itemType), "i.sku": stringType },
    });
    const { context } = setup({}, withoutParameter);
    const result = expandNested(ir("s.items.map((i) => ({ sku: i.sku }))"), "items", context, buildSchema);
    expect(result.kind === "expanded" && result.nested.schema.sourceTypeName).to.equal("Item");
  });
});
