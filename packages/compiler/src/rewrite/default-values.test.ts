/**
 * Tests for the default-value policy
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { TypeDescriptor, irEquals, namedType, parseExpression } from "@dtoshape/frontend";
import { defaultValueFor, isDefaultLiteral, isNullLikeDefault } from "./default-values.js";
import {
  booleanType,
  nullable,
  numberType,
  stringType,
} from "../testing/fake-resolver.js";

const colorType: TypeDescriptor = {
  fullyQualifiedName: "Color",
  isNullableAnnotated: false,
  isValueType: true,
  specialKind: "enum",
};

const charType: TypeDescriptor = { ...stringType, specialKind: "char", isValueType: true };

const bigintType: TypeDescriptor = { ...numberType, fullyQualifiedName: "bigint", specialKind: "bigint" };

describe("Default values", () => {
  it("should use null for nullable types", () => {
    expect(defaultValueFor(nullable(numberType))).to.deep.include({ kind: "literal", value: null });
  });

  it("should use null for reference types and unknown types", () => {
    expect(defaultValueFor(namedType("Nest"))).to.deep.include({ value: null });
    expect(defaultValueFor(undefined)).to.deep.include({ value: null });
  });

  it("should use the zero value of primitives", () => {
    expect(defaultValueFor(booleanType)).to.deep.include({ value: false });
    expect(defaultValueFor(stringType)).to.deep.include({ value: "" });
    expect(defaultValueFor(numberType)).to.deep.include({ value: 0 });
    expect(defaultValueFor(charType)).to.deep.include({ value: "\0", raw: '"\\0"' });
    expect(defaultValueFor(bigintType)).to.deep.include({ value: BigInt(0), raw: "0n" });
  });

  it("should assert zero to a numeric enum", () => {
    expect(irEquals(defaultValueFor(colorType), parseExpression("0 as Color").ir)).to.equal(true);
  });

  it("should recognize default literals", () => {
    for (const text of ["null", "undefined", "null as number | null", "0", '""', "false", "[]", "0 as Color"]) {
      expect(isDefaultLiteral(parseExpression(text).ir), text).to.equal(true);
    }
    for (const text of ["1", '"x"', "true", "[0]", "s.value"]) {
      expect(isDefaultLiteral(parseExpression(text).ir), text).to.equal(false);
    }
  });

  it("should tell null-like defaults apart", () => {
    expect(isNullLikeDefault(parseExpression("null as string | null").ir)).to.equal(true);
    expect(isNullLikeDefault(parseExpression("0").ir)).to.equal(false);
  });
});
