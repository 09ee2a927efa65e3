/**
 * Tests for the generated module
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { identifier, member } from "@dtoshape/frontend";
import { emitGeneratedModule } from "../emitter.js";
import {
  field,
  numberType,
  projection,
  stringType,
} from "../testing/projections.js";

const outputFile = "/proj/src/generated/dtos.ts";

const rows = projection(
  "RowsDto_1A2B3C4D",
  [
    field("id", numberType, "s.id"),
    field("name", stringType, "s.nest != null ? s.nest.name : null", {
      original: "s.nest?.name",
      isOptional: true,
    }),
  ],
  "{ id: s.id, name: s.nest != null ? s.nest.name : null }"
);

describe("Module Emitter", () => {
  it("should write imports, interfaces and mapping functions", () => {
    const result = emitGeneratedModule([rows], { outputFile, projectRoot: "/proj" });

    expect(result.code).to.equal(
      [
        "// Generated by dtoshape. Do not edit; rerun `dtoshape generate` instead.",
        "",
        'import type { Sample } from "../models.js";',
        "",
        "/** From: Sample (1A2B3C4D) */",
        "export interface RowsDto_1A2B3C4D {",
        "  /** From: s.id */",
        "  readonly id: number;",
        "  /** From: s.nest?.name */",
        "  readonly name?: string | null;",
        "}",
        "",
        "/** src/rows.ts:4:22 */",
        "export const projectRowsDto_1A2B3C4D = (s: Sample): RowsDto_1A2B3C4D => ({",
        "  id: s.id,",
        "  name: s.nest != null ? s.nest.name : null,",
        "});",
        "",
      ].join("\n")
    );
    expect(result.functionNames).to.deep.equal(["projectRowsDto_1A2B3C4D"]);
    expect(result.typeNames).to.deep.equal(["RowsDto_1A2B3C4D"]);
  });

  it("should emit a shared shape once", () => {
    const second = { ...rows, location: { file: "/proj/src/other.ts", line: 9, column: 3, length: 40 } };
    const result = emitGeneratedModule([rows, second], {
      outputFile,
      commentOutput: "none",
    });

    expect(result.code.match(/export interface RowsDto_1A2B3C4D/g)).to.have.length(1);
    expect(result.code.match(/export const projectRowsDto_1A2B3C4D /g)).to.have.length(1);
    expect(result.functionNames).to.deep.equal([
      "projectRowsDto_1A2B3C4D",
      "projectRowsDto_1A2B3C4D",
    ]);
  });

  it("should number mapping functions that differ in body", () => {
    const other = projection(
      "RowsDto_1A2B3C4D",
      rows.schema.fields,
      "{ id: s.id, name: s.nest?.name }"
    );
    const result = emitGeneratedModule([rows, other], { outputFile });

    expect(result.functionNames).to.deep.equal([
      "projectRowsDto_1A2B3C4D",
      "projectRowsDto_1A2B3C4D_2",
    ]);
    expect(result.code).to.include(
      "export const projectRowsDto_1A2B3C4D_2 = (s: Sample): RowsDto_1A2B3C4D => ({\n  id: s.id,\n  name: s.nest?.name,\n});"
    );
  });

  it("should pass captures through a capture parameter", () => {
    const withCaptures = projection(
      "RowsDto_5E6F7A8B",
      [field("big", numberType, "s.id > threshold"), field("label", stringType, "captured_prefix")],
      "{ big: s.id > threshold, label: captured_prefix }",
      {
        captureSet: [
          {
            displayName: "threshold",
            localName: "threshold",
            kind: "local",
            source: identifier("threshold"),
            type: numberType,
          },
          {
            displayName: "prefix",
            localName: "captured_prefix",
            kind: "instanceMember",
            source: member({ kind: "this" }, "prefix"),
            type: stringType,
          },
        ],
      }
    );
    const result = emitGeneratedModule([withCaptures], {
      outputFile,
      commentOutput: "none",
      banner: "// generated",
    });

    expect(result.code).to.equal(
      [
        "// generated",
        "",
        'import type { Sample } from "../models.js";',
        "",
        "export interface RowsDto_5E6F7A8B {",
        "  readonly big: number;",
        "  readonly label: string;",
        "}",
        "",
        "export const projectRowsDto_5E6F7A8B = (s: Sample, capture: { readonly threshold: number; readonly prefix: string }): RowsDto_5E6F7A8B => {",
        "  const { threshold, prefix: captured_prefix } = capture;",
        "  return {",
        "    big: s.id > threshold,",
        "    label: captured_prefix,",
        "  };",
        "};",
        "",
      ].join("\n")
    );
  });

  it("should write nothing but the banner for an empty run", () => {
    expect(emitGeneratedModule([], { outputFile, banner: "// generated" }).code).to.equal(
      "// generated\n"
    );
  });
});
