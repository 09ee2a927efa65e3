/**
 * Tests for the guard form
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { IrExpression, irEquals, namedType, parseExpression } from "@dtoshape/frontend";
import { toGuardForm } from "./null-chain.js";
import { evaluate } from "../testing/evaluate.js";
import {
  createFakeResolver,
  nullable,
  numberType,
  stringType,
} from "../testing/fake-resolver.js";

const ir = (text: string): IrExpression => parseExpression(text).ir;

const expectIr = (actual: IrExpression, expected: string): void => {
  expect(irEquals(actual, ir(expected)), expected).to.equal(true);
};

describe("Guard form", () => {
  it("should guard a single optional link", () => {
    expectIr(
      toGuardForm(ir("s.nest?.name"), nullable(stringType)),
      "s.nest != null ? s.nest.name : null"
    );
  });

  it("should check every prefix that ends in an optional link", () => {
    expectIr(
      toGuardForm(ir("a?.b?.c"), nullable(stringType)),
      "a != null && a.b != null ? a.b.c : null"
    );
  });

  it("should check only the optional boundaries of a mixed chain", () => {
    expectIr(
      toGuardForm(ir("a?.b.c"), nullable(stringType)),
      "a != null ? a.b.c : null"
    );
  });

  it("should guard element access and calls", () => {
    expectIr(
      toGuardForm(ir("s.nest?.tags?.[0]"), nullable(stringType)),
      "s.nest != null && s.nest.tags != null ? s.nest.tags[0] : null"
    );
    expectIr(
      toGuardForm(ir("s.nest?.label.trim()"), nullable(stringType)),
      "s.nest != null ? s.nest.label.trim() : null"
    );
  });

  it("should use the default of a non-nullable declared type", () => {
    expectIr(toGuardForm(ir("s.nest?.id"), numberType), "s.nest != null ? s.nest.id : 0");
    expectIr(toGuardForm(ir("s.nest?.label"), stringType), 's.nest != null ? s.nest.label : ""');
  });

  it("should assert the declared type when the path type differs", () => {
    const resolver = createFakeResolver({ types: { "s.nest.amount": numberType } });
    expectIr(
      toGuardForm(ir("s.nest?.amount"), namedType("Cents", { nullable: true }), { resolver }),
      "s.nest != null ? (s.nest.amount as Cents) : null"
    );
  });

  it("should not assert when the path type matches", () => {
    const resolver = createFakeResolver({ types: { "s.nest.amount": numberType } });
    expectIr(
      toGuardForm(ir("s.nest?.amount"), nullable(numberType), { resolver }),
      "s.nest != null ? s.nest.amount : null"
    );
  });

  it("should rewrite chains inside operators in place", () => {
    expectIr(
      toGuardForm(ir("(s.nest?.count ?? 0) + 1"), numberType),
      "((s.nest != null ? s.nest.count : null) ?? 0) + 1"
    );
    expectIr(
      toGuardForm(ir("format(s.nest?.name)"), stringType),
      "format(s.nest != null ? s.nest.name : null)"
    );
  });

  it("should give inner chains the default of their own type", () => {
    const resolver = createFakeResolver({ types: { "s.nest.count": numberType } });
    // An optional chain always admits undefined, so its own default is null
    expectIr(
      toGuardForm(ir("`${s.nest?.count}`"), stringType, { resolver }),
      "`${s.nest != null ? s.nest.count : null}`"
    );
  });

  it("should rewrite chains in the arguments of a guarded chain", () => {
    expectIr(
      toGuardForm(ir("s.items?.includes(s.nest?.name)"), nullable(numberType)),
      "s.items != null ? s.items.includes(s.nest != null ? s.nest.name : null) : null"
    );
  });

  it("should fold a literal fallback into the guard when the last link is non-nullable", () => {
    const resolver = createFakeResolver({ types: { "s.nest.count": numberType } });
    expectIr(
      toGuardForm(ir("s.nest?.count ?? 0"), numberType, { resolver }),
      "s.nest != null ? s.nest.count : 0"
    );
  });

  it("should keep the fallback when the last link can be null", () => {
    const resolver = createFakeResolver({ types: { "s.a.b": nullable(numberType) } });
    const original = ir("s.a?.b ?? 0");
    const guarded = toGuardForm(original, numberType, { resolver });
    expectIr(guarded, "(s.a != null ? s.a.b : null) ?? 0");

    for (const input of [{ s: { a: { b: null } } }, { s: { a: null } }, { s: { a: { b: 4 } } }]) {
      expect(evaluate(guarded, input)).to.equal(evaluate(original, input));
    }
    expect(evaluate(guarded, { s: { a: { b: null } } })).to.equal(0);
  });

  it("should keep the fallback when the last link's type is unknown", () => {
    expectIr(
      toGuardForm(ir("s.nest?.count ?? 0"), numberType),
      "(s.nest != null ? s.nest.count : null) ?? 0"
    );
  });

  it("should use an explicit default", () => {
    expectIr(
      toGuardForm(ir("s.nest?.items"), nullable(numberType), { defaultValue: ir("[]") }),
      "s.nest != null ? s.nest.items : []"
    );
  });

  it("should leave values without optional links untouched", () => {
    const value = ir("s.nest != null ? s.nest.id : null");
    expect(toGuardForm(value, nullable(numberType))).to.equal(value);
  });
});
