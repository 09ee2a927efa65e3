/**
 * Tests for init command
 */

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { initProject } from "./init.js";
import { loadConfig } from "../config.js";

describe("Init Command", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "dtoshape-init-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should write a config that loads back", () => {
    const result = initProject(dir);
    expect(result).to.deep.equal({ ok: true, value: join(dir, "dtoshape.json") });

    const loaded = loadConfig(join(dir, "dtoshape.json"));
    expect(loaded.ok).to.equal(true);
    if (!loaded.ok) return;
    expect(loaded.value.include).to.deep.equal(["src/index.ts"]);
    expect(loaded.value.outputFile).to.equal("src/generated/dtoshape.generated.ts");
    expect(loaded.value.nullHandling).to.equal("guard");
  });

  it("should not overwrite an existing config without force", () => {
    writeFileSync(join(dir, "dtoshape.json"), '{ "include": ["main.ts"] }');

    expect(initProject(dir)).to.deep.equal({
      ok: false,
      error: "dtoshape.json already exists (use --force to overwrite)",
    });
    expect(readFileSync(join(dir, "dtoshape.json"), "utf-8")).to.equal(
      '{ "include": ["main.ts"] }'
    );

    expect(initProject(dir, { force: true }).ok).to.equal(true);
    expect(readFileSync(join(dir, "dtoshape.json"), "utf-8")).to.include('"src/index.ts"');
  });
});
