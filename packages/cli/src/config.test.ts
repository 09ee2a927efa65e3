/**
 * Tests for configuration loading and resolution
 */

import { after, before, describe, it } from "mocha";
import { expect } from "chai";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  findConfig,
  loadConfig,
  resolveConfig,
  validateConfig,
} from "./config.js";
import type { DtoshapeConfig } from "./types.js";

describe("Config", () => {
  describe("validateConfig", () => {
    it("should accept a minimal config", () => {
      expect(validateConfig({ include: ["src/index.ts"] })).to.deep.equal({
        ok: true,
        value: {
          $schema: undefined,
          include: ["src/index.ts"],
          outputFile: undefined,
          selectorNames: undefined,
          mapOperators: undefined,
          nullHandling: undefined,
          arrayNullabilityRemoval: undefined,
          readonlyProperties: undefined,
          commentOutput: undefined,
          strict: undefined,
        },
      });
    });

    it("should require include", () => {
      expect(validateConfig({ outputFile: "out.ts" })).to.deep.equal({
        ok: false,
        error: "dtoshape.json: 'include' must list at least one entry file",
      });
      expect(validateConfig({ include: [] }).ok).to.equal(false);
    });

    it("should reject unknown options", () => {
      expect(validateConfig({ include: ["a.ts"], rootNamespace: "App" })).to.deep.equal({
        ok: false,
        error: "dtoshape.json: unknown option 'rootNamespace'",
      });
    });

    it("should check option types", () => {
      expect(validateConfig({ include: ["a.ts"], nullHandling: "lenient" })).to.deep.equal({
        ok: false,
        error: 'dtoshape.json: \'nullHandling\' must be "guard" or "optional-chain"',
      });
      expect(validateConfig({ include: ["a.ts"], strict: "yes" })).to.deep.equal({
        ok: false,
        error: "dtoshape.json: 'strict' must be a boolean",
      });
      expect(validateConfig({ include: ["a.ts"], mapOperators: ["map", 1] })).to.deep.equal({
        ok: false,
        error: "dtoshape.json: 'mapOperators' must be an array of strings",
      });
    });

    it("should reject non-objects", () => {
      expect(validateConfig(["src/index.ts"]).ok).to.equal(false);
      expect(validateConfig(null).ok).to.equal(false);
    });
  });

  describe("resolveConfig", () => {
    it("should fill defaults and resolve paths against the project root", () => {
      const result = resolveConfig({ include: ["src/index.ts"] }, {}, "/work/app");
      expect(result).to.deep.equal({
        projectRoot: "/work/app",
        include: ["/work/app/src/index.ts"],
        outputFile: "/work/app/src/generated/dtoshape.generated.ts",
        selectorNames: ["selectExpr"],
        mapOperators: ["map"],
        nullHandling: "guard",
        arrayNullabilityRemoval: false,
        readonlyProperties: true,
        commentOutput: "all",
        strict: true,
        verbose: false,
        quiet: false,
      });
    });

    it("should let CLI options override the file", () => {
      const config: DtoshapeConfig = {
        include: ["src/index.ts"],
        outputFile: "src/dtos.ts",
        selectorNames: ["project"],
        nullHandling: "guard",
      };
      const result = resolveConfig(
        config,
        { out: "gen/out.ts", selectors: ["pick"], nullHandling: "optional-chain", verbose: true },
        "/work/app"
      );
      expect(result.outputFile).to.equal("/work/app/gen/out.ts");
      expect(result.selectorNames).to.deep.equal(["pick"]);
      expect(result.nullHandling).to.equal("optional-chain");
      expect(result.verbose).to.equal(true);
    });
  });

  describe("loadConfig and findConfig", () => {
    let root = "";

    before(() => {
      root = mkdtempSync(join(tmpdir(), "dtoshape-config-"));
      mkdirSync(join(root, "packages", "app", "src"), { recursive: true });
      writeFileSync(
        join(root, "dtoshape.json"),
        JSON.stringify({ include: ["src/index.ts"], commentOutput: "none" })
      );
      writeFileSync(join(root, "packages", "broken.json"), "{ include: ");
    });

    after(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it("should find the nearest config walking up", () => {
      expect(findConfig(join(root, "packages", "app", "src"))).to.equal(
        join(root, "dtoshape.json")
      );
    });

    it("should load and validate the file", () => {
      const result = loadConfig(join(root, "dtoshape.json"));
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.include).to.deep.equal(["src/index.ts"]);
      expect(result.value.commentOutput).to.equal("none");
    });

    it("should report missing and malformed files", () => {
      expect(loadConfig(join(root, "missing.json"))).to.deep.equal({
        ok: false,
        error: `Config file not found: ${join(root, "missing.json")}`,
      });
      const broken = loadConfig(join(root, "packages", "broken.json"));
      expect(broken.ok).to.equal(false);
      if (broken.ok) return;
      expect(broken.error).to.match(/^Failed to parse dtoshape\.json: /);
    });
  });
});
