/**
 * Tests for generated type names
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  generatedTypeName,
  nestedTypeHint,
  rootTypeHint,
  toPascalCase,
  typeBaseName,
} from "./naming.js";

describe("Type naming", () => {
  it("should convert names to PascalCase", () => {
    expect(toPascalCase("activeRows")).to.equal("ActiveRows");
    expect(toPascalCase("order_items")).to.equal("OrderItems");
    expect(toPascalCase("_private")).to.equal("Private");
  });

  it("should read the base name of a type text", () => {
    expect(typeBaseName("Order[]")).to.equal("Order");
    expect(typeBaseName("readonly Item[]")).to.equal("Item");
    expect(typeBaseName("Map<string, Item>")).to.equal("Map");
    expect(typeBaseName("{ id: number }")).to.equal(undefined);
  });

  describe("root hints", () => {
    it("should prefer the receiving variable", () => {
      expect(
        rootTypeHint({ variableName: "activeRows", functionName: "getRows" }, "Sample")
      ).to.equal("ActiveRowsDto");
    });

    it("should drop a leading get from the function name", () => {
      expect(rootTypeHint({ functionName: "getActiveSamples" }, "Sample")).to.equal(
        "ActiveSamplesDto"
      );
      expect(rootTypeHint({ functionName: "gettingStarted" }, "Sample")).to.equal(
        "GettingStartedDto"
      );
    });

    it("should fall back to the source type name", () => {
      expect(rootTypeHint({}, "Sample")).to.equal("SampleDto");
      expect(rootTypeHint(undefined, "{ id: number; }")).to.equal("ProjectionDto");
    });
  });

  it("should name nested types after the field, then the element type", () => {
    expect(nestedTypeHint("lineItems", "Item")).to.equal("LineItemsDto");
    expect(nestedTypeHint("$", "Item")).to.equal("ItemDto");
    expect(nestedTypeHint("$", undefined)).to.equal("NestedDto");
  });

  it("should join hint and hash", () => {
    expect(generatedTypeName("RowsDto", "0A1B2C3D")).to.equal("RowsDto_0A1B2C3D");
  });
});
