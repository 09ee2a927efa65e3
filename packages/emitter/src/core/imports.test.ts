/**
 * Tests for import collection
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { namedType } from "@dtoshape/frontend";
import { collectImports, emitImports, moduleSpecifier } from "./imports.js";
import { field, numberType, projection } from "../testing/projections.js";

const outputFile = "/proj/src/generated/dtos.ts";

describe("Import Handling", () => {
  describe("moduleSpecifier", () => {
    it("should point at the emitted JavaScript", () => {
      expect(moduleSpecifier(outputFile, "/proj/src/models.ts")).to.equal("../models.js");
      expect(moduleSpecifier(outputFile, "/proj/src/ui/View.tsx")).to.equal("../ui/View.js");
      expect(moduleSpecifier(outputFile, "/proj/src/legacy.mts")).to.equal("../legacy.mjs");
    });

    it("should prefix siblings with ./", () => {
      expect(moduleSpecifier(outputFile, "/proj/src/generated/shared.ts")).to.equal(
        "./shared.js"
      );
    });

    it("should drop declaration-file extensions", () => {
      expect(moduleSpecifier(outputFile, "/proj/types/api.d.ts")).to.equal("../../types/api");
    });
  });

  describe("collectImports", () => {
    const money = namedType("Money", {
      declarations: [{ name: "Money", file: "/proj/src/money.ts", exported: true }],
    });

    it("should import source and field types as types", () => {
      const compiled = projection(
        "RowsDto_1A2B3C4D",
        [field("id", numberType, "s.id"), field("total", money, "s.total")],
        "{ id: s.id, total: s.total }"
      );

      expect(emitImports(collectImports([compiled], outputFile, new Set()))).to.deep.equal([
        'import type { Sample } from "../models.js";',
        'import type { Money } from "../money.js";',
      ]);
    });

    it("should import static references as values", () => {
      const compiled = projection(
        "RowsDto_1A2B3C4D",
        [field("rate", numberType, "Pricing.rate")],
        "{ rate: Pricing.rate }",
        {
          staticImports: [
            { name: "Pricing", file: "/proj/src/pricing.ts", exported: true },
            { name: "Sample", file: "/proj/src/models.ts", exported: true },
          ],
        }
      );

      expect(emitImports(collectImports([compiled], outputFile, new Set()))).to.deep.equal([
        'import { Sample } from "../models.js";',
        'import { Pricing } from "../pricing.js";',
      ]);
    });

    it("should skip unexported, local and same-file declarations", () => {
      const hidden = namedType("Hidden", {
        declarations: [{ name: "Hidden", file: "/proj/src/models.ts", exported: false }],
      });
      const local = namedType("Local", {
        declarations: [{ name: "Local", file: outputFile, exported: true }],
      });
      const compiled = projection(
        "RowsDto_1A2B3C4D",
        [field("hidden", hidden, "s.hidden"), field("local", local, "s.local")],
        "{ hidden: s.hidden, local: s.local }"
      );

      expect(
        collectImports([compiled], outputFile, new Set(["Sample"]))
      ).to.deep.equal([]);
    });

    it("should import a named target type", () => {
      const orderRow = namedType("OrderRow", {
        declarations: [{ name: "OrderRow", file: "/proj/src/models.ts", exported: true }],
      });
      const compiled = projection("OrderRow", [field("id", numberType, "s.id")], "{ id: s.id }", {
        kind: "named",
        target: { kind: "named", typeName: "OrderRow", type: orderRow },
        generatedTypes: [],
      });

      expect(emitImports(collectImports([compiled], outputFile, new Set()))).to.deep.equal([
        'import type { OrderRow, Sample } from "../models.js";',
      ]);
    });
  });
});
