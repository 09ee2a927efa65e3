/**
 * Test harness for frontend tests.
 * Builds a real TypeScript program from in-memory sources.
 */

import * as path from "node:path";
import { createProgram } from "../program/creation.js";
import { DtoshapeProgram } from "../program/types.js";
import { formatDiagnostic } from "./diagnostic.js";
import { ProjectionSite, findProjectionSites } from "../discovery/projection-sites.js";

export const TEST_PROJECT_ROOT = "/virtual/project";

/**
 * Ambient selector declaration for test sources (script scope, no import needed)
 */
export const SELECTOR_DECLARATION = `declare function selectExpr<T, R = unknown>(
  source: Iterable<T>,
  selector: (item: T) => R,
  captures?: object
): R[];
`;

/**
 * Create a program from file name → text pairs, rooted at TEST_PROJECT_ROOT.
 * Fails the test on TypeScript errors so fixtures stay honest.
 */
export const createTestProgram = (
  files: Readonly<Record<string, string>>
): DtoshapeProgram => {
  const sources = new Map(
    Object.entries(files).map(([name, text]) => [
      path.resolve(TEST_PROJECT_ROOT, name),
      text,
    ])
  );
  const result = createProgram([...sources.keys()], {
    projectRoot: TEST_PROJECT_ROOT,
    sources,
  });
  if (!result.ok) {
    throw new Error(
      result.error.diagnostics.map(formatDiagnostic).join("\n")
    );
  }
  if (result.value.diagnostics.hasErrors) {
    throw new Error(
      result.value.diagnostics.diagnostics.map(formatDiagnostic).join("\n")
    );
  }
  return result.value;
};

/**
 * Discover the projection sites of a single-file program.
 */
export const findTestSites = (
  source: string,
  selectorNames: readonly string[] = ["selectExpr"]
): readonly ProjectionSite[] => {
  const program = createTestProgram({ "sample.ts": source });
  return findProjectionSites(program, { selectorNames }).sites;
};

/**
 * The single projection site of a source; throws when there is not exactly one.
 */
export const findSingleSite = (source: string): ProjectionSite => {
  const [site, ...rest] = findTestSites(source);
  if (!site || rest.length > 0) {
    throw new Error(`Expected one projection site in:\n${source}`);
  }
  return site;
};
