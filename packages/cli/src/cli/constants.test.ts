/**
 * Tests for CLI constants
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { readFileSync } from "node:fs";
import { VERSION } from "./constants.js";

describe("CLI constants", () => {
  it("should report the package version", () => {
    const packageJson: unknown = JSON.parse(
      readFileSync(new URL("../../package.json", import.meta.url), "utf-8")
    );
    expect(packageJson).to.have.property("version", VERSION);
  });
});
