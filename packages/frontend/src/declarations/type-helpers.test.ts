import { describe, it } from "mocha";
import { expect } from "chai";
import {
  REFERENCE_MARKER,
  collectTypeDependencies,
  finalPathSegment,
  hasField,
  typeIsReference,
} from "./type-helpers.js";
import { field, pathType, pointerTo, rvalueRef } from "./test-builders.js";
import type { DeclType } from "./types.js";

const lvalueRef = (elem: DeclType): DeclType =>
  pointerTo({ kind: "path", segments: [REFERENCE_MARKER], args: [elem] });

const depNames = (types: readonly DeclType[]): string[] =>
  collectTypeDependencies(types).map((name) => name.toCppName());

describe("Declaration type helpers", () => {
  describe("typeIsReference", () => {
    it("should tell rvalue from lvalue references", () => {
      const rvalue = rvalueRef(pathType("Widget"));
      const lvalue = lvalueRef(pathType("Widget"));

      expect(typeIsReference(rvalue, true)).to.equal(true);
      expect(typeIsReference(lvalue, true)).to.equal(false);
      expect(typeIsReference(lvalue, false)).to.equal(true);
      expect(typeIsReference(rvalue, false)).to.equal(false);
    });

    it("should not match plain pointers", () => {
      expect(typeIsReference(pointerTo(pathType("Widget")), true)).to.equal(false);
      expect(typeIsReference(pathType("Widget"), false)).to.equal(false);
    });
  });

  describe("hasField", () => {
    it("should find fields by identifier", () => {
      const fields = [field("_unused"), { ty: pathType("i32") }];
      expect(hasField(fields, "_unused")).to.equal(true);
      expect(hasField(fields, "_address")).to.equal(false);
    });
  });

  describe("finalPathSegment", () => {
    it("should return the last segment of a path", () => {
      expect(finalPathSegment(pathType("root", "ns", "Widget"))).to.equal("Widget");
      expect(finalPathSegment(pointerTo(pathType("Widget")))).to.equal(undefined);
    });
  });

  describe("collectTypeDependencies", () => {
    it("should strip module prefixes and skip primitives", () => {
      expect(
        depNames([
          pathType("root", "a", "Foo"),
          pathType("i32"),
          pathType("std", "os", "raw", "c_int"),
          pathType("self", "super", "Bar"),
        ])
      ).to.deep.equal(["a::Foo", "Bar"]);
    });

    it("should keep header types whose scopes share a platform module name", () => {
      expect(
        depNames([
          pointerTo(pathType("root", "core", "Engine"), true),
          pathType("root", "std", "string"),
          pathType("core", "ffi", "c_void"),
        ])
      ).to.deep.equal(["core::Engine", "std::string"]);
    });

    it("should look through pointers, references and arrays", () => {
      expect(
        depNames([
          pointerTo(pathType("root", "Node"), true),
          rvalueRef(pathType("root", "Payload")),
          { kind: "array", elem: pathType("root", "Cell"), length: 4 },
        ])
      ).to.deep.equal(["Node", "Payload", "Cell"]);
    });

    it("should include generic arguments after their holder", () => {
      expect(
        depNames([
          {
            kind: "path",
            segments: ["root", "Holder"],
            args: [pathType("root", "Item")],
          },
        ])
      ).to.deep.equal(["Holder", "Item"]);
    });

    it("should report each name once in order of first appearance", () => {
      expect(
        depNames([
          pathType("root", "B"),
          {
            kind: "fn",
            params: [pathType("root", "A"), pathType("root", "B")],
            returnType: pathType("root", "C"),
          },
          { kind: "tuple", elems: [pathType("root", "A")] },
          { kind: "never" },
        ])
      ).to.deep.equal(["B", "A", "C"]);
    });
  });
});
