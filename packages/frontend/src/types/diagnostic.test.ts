/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  countBySeverity,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("formatDiagnostic", () => {
    it("should format diagnostic with location and hint", () => {
      const diagnostic = createDiagnostic(
        "DSH4001",
        "error",
        "Missing capture 'threshold'",
        { file: "/src/orders.ts", line: 12, column: 7, length: 9 },
        "Add 'threshold' to the capture object"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "/src/orders.ts:12:7 error DSH4001: Missing capture 'threshold' Hint: Add 'threshold' to the capture object"
      );
    });

    it("should format diagnostic without location", () => {
      const diagnostic = createDiagnostic(
        "DSH3003",
        "info",
        "Projection has no nameable fields"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "info DSH3003: Projection has no nameable fields"
      );
    });
  });

  describe("DiagnosticsCollector", () => {
    it("should track errors as diagnostics are added", () => {
      const warning = createDiagnostic("DSH4002", "warning", "unused");
      const failure = createDiagnostic("DSH4001", "error", "missing");

      const afterWarning = addDiagnostic(createDiagnosticsCollector(), warning);
      expect(afterWarning.hasErrors).to.equal(false);

      const afterError = addDiagnostic(afterWarning, failure);
      expect(afterError.hasErrors).to.equal(true);
      expect(afterError.diagnostics).to.deep.equal([warning, failure]);
      expect(afterWarning.diagnostics).to.have.length(1);
    });

    it("should seed hasErrors from initial diagnostics", () => {
      const collector = createDiagnosticsCollector([
        createDiagnostic("DSH2001", "error", "Type error"),
      ]);
      expect(collector.hasErrors).to.equal(true);
    });

    it("should merge collectors", () => {
      const first = addDiagnostic(
        createDiagnosticsCollector(),
        createDiagnostic("DSH3004", "info", "duplicate")
      );
      const second = addDiagnostic(
        createDiagnosticsCollector(),
        createDiagnostic("DSH6001", "error", "ICE")
      );

      const merged = mergeDiagnostics(first, second);
      expect(merged.diagnostics.map((d) => d.code)).to.deep.equal([
        "DSH3004",
        "DSH6001",
      ]);
      expect(merged.hasErrors).to.equal(true);
    });
  });

  describe("countBySeverity", () => {
    it("should count each severity", () => {
      const counts = countBySeverity([
        createDiagnostic("DSH4001", "error", "a"),
        createDiagnostic("DSH4002", "warning", "b"),
        createDiagnostic("DSH4002", "warning", "c"),
      ]);
      expect(counts).to.deep.equal({ error: 1, warning: 2, info: 0 });
    });
  });
});
