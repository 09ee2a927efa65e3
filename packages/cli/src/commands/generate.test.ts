/**
 * Tests for generate and check commands
 */

import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { generateCommand } from "./generate.js";
import { checkCommand } from "./check.js";
import { resolveConfig } from "../config.js";
import type { ResolvedConfig } from "../types.js";

const SOURCE = `declare function selectExpr<T, R = unknown>(
  source: Iterable<T>,
  selector: (item: T) => R,
  captures?: object
): R[];
export interface Order { id: number; customer?: { email: string } | null }
declare const orders: Order[];
export const contacts = selectExpr(orders, (o) => ({ id: o.id, email: o.customer?.email }));
`;

describe("Generate Command", () => {
  let root = "";
  let config: ResolvedConfig;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "dtoshape-generate-"));
    config = resolveConfig(
      { include: ["src/orders.ts"], outputFile: "src/generated/dtos.ts" },
      { quiet: true },
      root
    );
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should write the generated module", () => {
    const sources = new Map([[join(root, "src/orders.ts"), SOURCE]]);
    const result = generateCommand(config, sources);

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value).to.deep.equal({
      outputFile: join(root, "src/generated/dtos.ts"),
      projections: 1,
      types: 1,
    });

    const code = readFileSync(join(root, "src/generated/dtos.ts"), "utf-8");
    expect(code).to.include('import type { Order } from "../orders.js";');
    expect(code).to.match(/export interface ContactsDto_[0-9A-F]{8} \{/);
    expect(code).to.include("  /** From: o.customer?.email */\n  readonly email?: string | null;\n");
    expect(code).to.match(/export const projectContactsDto_[0-9A-F]{8} = \(o: Order\)/);
  });

  it("should write nothing when the input has errors", () => {
    const sources = new Map([
      [join(root, "src/orders.ts"), `${SOURCE}\nexport const broken: string = 1;\n`],
    ]);
    const result = generateCommand(config, sources);

    expect(result).to.deep.equal({
      ok: false,
      error: "Generation aborted: 1 error(s), 0 warning(s), 0 info",
    });
    expect(existsSync(join(root, "src/generated/dtos.ts"))).to.equal(false);
  });

  it("should check without writing", () => {
    const sources = new Map([[join(root, "src/orders.ts"), SOURCE]]);
    const result = checkCommand(config, sources);

    expect(result).to.deep.equal({ ok: true, value: [] });
    expect(existsSync(join(root, "src/generated/dtos.ts"))).to.equal(false);
  });

  it("should suggest optional chains for explicit guards", () => {
    const guarded = SOURCE.replace(
      "o.customer?.email",
      "o.customer != null ? o.customer.email : null"
    );
    const sources = new Map([[join(root, "src/orders.ts"), guarded]]);
    const result = checkCommand({ ...config, nullHandling: "optional-chain" }, sources);

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.map((d) => d.code)).to.deep.equal(["DSH4003"]);
  });
});
