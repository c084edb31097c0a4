/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createDiagnostic, formatDiagnostic, isError } from "./diagnostic.js";
import { Namespace } from "../model/namespace.js";

describe("Diagnostics", () => {
  describe("createDiagnostic", () => {
    it("should create a diagnostic with all fields", () => {
      const diagnostic = createDiagnostic(
        "BRW3002",
        "error",
        "Test error",
        {
          file: "bindings.ts",
          line: 10,
          column: 5,
          length: 10,
        },
        "Try this instead"
      );

      expect(diagnostic.code).to.equal("BRW3002");
      expect(diagnostic.severity).to.equal("error");
      expect(diagnostic.message).to.equal("Test error");
      expect(diagnostic.location?.file).to.equal("bindings.ts");
      expect(diagnostic.hint).to.equal("Try this instead");
    });

    it("should create a diagnostic without optional fields", () => {
      const diagnostic = createDiagnostic("BRW1005", "warning", "Test warning");

      expect(diagnostic.code).to.equal("BRW1005");
      expect(diagnostic.severity).to.equal("warning");
      expect(diagnostic.location).to.be.undefined;
      expect(diagnostic.item).to.be.undefined;
      expect(diagnostic.hint).to.be.undefined;
    });
  });

  describe("formatDiagnostic", () => {
    it("should format diagnostic with location", () => {
      const diagnostic = createDiagnostic(
        "BRW3002",
        "error",
        "Namespaced type",
        {
          file: "/src/bindings.ts",
          line: 5,
          column: 10,
          length: 15,
        }
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "/src/bindings.ts:5:10 error BRW3002: Namespaced type"
      );
    });

    it("should format diagnostic with item context", () => {
      const diagnostic = {
        ...createDiagnostic("BRW1004", "error", "Recursive"),
        item: { namespace: Namespace.of(["a", "b"]), ident: "Foo" },
      };

      expect(formatDiagnostic(diagnostic)).to.equal(
        "a::b::Foo: error BRW1004: Recursive"
      );
    });

    it("should format a root-level item context as the bare identifier", () => {
      const diagnostic = {
        ...createDiagnostic("BRW1001", "error", "Bad name"),
        item: { namespace: Namespace.root(), ident: "Foo" },
      };

      expect(formatDiagnostic(diagnostic)).to.equal(
        "Foo: error BRW1001: Bad name"
      );
    });

    it("should format diagnostic without location", () => {
      const diagnostic = createDiagnostic("BRW1005", "warning", "Generic warning");

      expect(formatDiagnostic(diagnostic)).to.equal(
        "warning BRW1005: Generic warning"
      );
    });

    it("should include hint if present", () => {
      const diagnostic = createDiagnostic(
        "BRW2001",
        "error",
        "Nothing generated",
        undefined,
        "Check the spelling"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "error BRW2001: Nothing generated Hint: Check the spelling"
      );
    });
  });

  describe("isError", () => {
    it("should only treat error severity as an error", () => {
      expect(isError(createDiagnostic("BRW1001", "error", "e"))).to.equal(true);
      expect(isError(createDiagnostic("BRW1001", "warning", "w"))).to.equal(false);
      expect(isError(createDiagnostic("BRW1001", "info", "i"))).to.equal(false);
    });
  });
});
