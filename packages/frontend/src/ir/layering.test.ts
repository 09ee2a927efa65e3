/**
 * Layering guard: the expression IR is syntax only.
 *
 * Converters under ir/ read TypeScript nodes and nothing else. Every type
 * question goes through the TypeResolver built in semantic/, and the
 * compiler and emitter packages never see the TypeScript API at all.
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

const here = path.dirname(fileURLToPath(import.meta.url));
const packagesRoot = path.resolve(here, "../../..");

const CHECKER_PATTERNS = [
  /\bTypeChecker\b/,
  /\bchecker\.\w+\s*\(/,
  /\.getTypeChecker\s*\(/,
];

const TYPESCRIPT_IMPORT = /from\s+["']typescript["']/;

const sourceFiles = (dir: string): string[] => {
  if (!fs.existsSync(dir)) return [];

  return fs.readdirSync(dir, { withFileTypes: true }).flatMap((entry) => {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) return sourceFiles(entryPath);
    return entry.name.endsWith(".ts") && !entry.name.endsWith(".test.ts")
      ? [entryPath]
      : [];
  });
};

type Violation = { readonly file: string; readonly line: number; readonly text: string };

const findViolations = (
  files: readonly string[],
  patterns: readonly RegExp[]
): Violation[] =>
  files.flatMap((file) =>
    fs
      .readFileSync(file, "utf-8")
      .split("\n")
      .flatMap((text, index) => {
        const trimmed = text.trim();
        if (trimmed.startsWith("//") || trimmed.startsWith("*")) return [];
        return patterns.some((pattern) => pattern.test(text))
          ? [{ file: path.relative(packagesRoot, file), line: index + 1, text: trimmed }]
          : [];
      })
  );

const describeViolations = (violations: readonly Violation[]): string =>
  violations.map((v) => `  ${v.file}:${v.line}  ${v.text}`).join("\n");

describe("IR layering", () => {
  it("should keep the type checker out of the IR converters", () => {
    const files = sourceFiles(path.join(packagesRoot, "frontend/src/ir"));
    expect(files.length).to.be.greaterThan(0);

    const violations = findViolations(files, CHECKER_PATTERNS);
    expect(violations, `Checker use in ir/:\n${describeViolations(violations)}`).to.deep.equal([]);
  });

  it("should keep the TypeScript API out of the compiler and emitter", () => {
    const files = [
      ...sourceFiles(path.join(packagesRoot, "compiler/src")),
      ...sourceFiles(path.join(packagesRoot, "emitter/src")),
    ];
    expect(files.length).to.be.greaterThan(0);

    const violations = findViolations(files, [TYPESCRIPT_IMPORT]);
    expect(violations, `typescript imports:\n${describeViolations(violations)}`).to.deep.equal([]);
  });
});
