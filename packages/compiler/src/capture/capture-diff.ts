/**
 * Declared against computed capture sets
 */

import {
  Diagnostic,
  SourceLocation,
  createDiagnostic,
} from "@dtoshape/frontend";
import { CaptureEntry } from "../types.js";

const clashes = (
  computed: readonly CaptureEntry[],
  nameOf: (entry: CaptureEntry) => string
): readonly (readonly CaptureEntry[])[] => {
  const groups = new Map<string, CaptureEntry[]>();
  for (const entry of computed) {
    const name = nameOf(entry);
    groups.set(name, [...(groups.get(name) ?? []), entry]);
  }
  return [...groups.values()].filter((group) => group.length > 1);
};

const describeCapture = (entry: CaptureEntry): string =>
  entry.kind === "local" || entry.kind === "outerParameter"
    ? `local '${entry.displayName}'`
    : `member '${entry.displayName}'`;

/**
 * One DSH4004 error per name two different captures would both need, either
 * as the key the caller declares or as the local the mapping function binds.
 */
export const findCaptureClashes = (
  computed: readonly CaptureEntry[],
  location?: SourceLocation
): readonly Diagnostic[] => {
  const byDeclaredName = clashes(computed, (entry) => entry.displayName);
  // Groups whose entries also share the declared name are reported above
  const byLocalName = clashes(computed, (entry) => entry.localName).filter(
    (group) => new Set(group.map((entry) => entry.displayName)).size > 1
  );
  return [...byDeclaredName, ...byLocalName].map((group) =>
    createDiagnostic(
      "DSH4004",
      "error",
      `Captures ${group.map(describeCapture).join(" and ")} need the same name`,
      group[1]?.source.sourceSpan ?? location,
      "Rename the local so each captured value has its own name"
    )
  );
};

/**
 * One DSH4001 error per used name the caller did not declare, one DSH4002
 * warning per declared name nothing uses. A call without a capture argument
 * declares nothing. Name clashes between captures come first.
 */
export const diffCaptures = (
  computed: readonly CaptureEntry[],
  declared: readonly string[] | undefined,
  location?: SourceLocation
): readonly Diagnostic[] => {
  const declaredNames = new Set(declared ?? []);
  const computedNames = new Set(computed.map((entry) => entry.displayName));

  const missing = computed
    .filter(
      (entry, index) =>
        !declaredNames.has(entry.displayName) &&
        computed.findIndex((other) => other.displayName === entry.displayName) === index
    )
    .map((entry) =>
      createDiagnostic(
        "DSH4001",
        "error",
        `Missing capture '${entry.displayName}'`,
        entry.source.sourceSpan ?? location,
        `Add '${entry.displayName}' to the capture argument`
      )
    );

  const unnecessary = [...declaredNames]
    .filter((name) => !computedNames.has(name))
    .map((name) =>
      createDiagnostic(
        "DSH4002",
        "warning",
        `Unnecessary capture '${name}'`,
        location,
        `Remove '${name}' from the capture argument`
      )
    );

  return [...findCaptureClashes(computed, location), ...missing, ...unnecessary];
};
