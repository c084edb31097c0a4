/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, mapError, collectResults, type Result } from "./result.js";

describe("Result", () => {
  describe("ok and error constructors", () => {
    it("should create ok result", () => {
      const result = ok<number, string>(42);
      expect(result).to.deep.equal({ ok: true, value: 42 });
    });

    it("should create error result", () => {
      const result = error<number, string>("Something went wrong");
      expect(result).to.deep.equal({ ok: false, error: "Something went wrong" });
    });
  });

  describe("mapError", () => {
    it("should map the error", () => {
      const result = mapError(error<number, string>("bad"), (e) => [e]);
      expect(result).to.deep.equal({ ok: false, error: ["bad"] });
    });

    it("should pass an ok value through", () => {
      const result = mapError(ok<number, string>(5), (e) => [e]);
      expect(result).to.deep.equal({ ok: true, value: 5 });
    });
  });

  describe("collectResults", () => {
    it("should collect every value in order", () => {
      const results: Result<number, string>[] = [ok(1), ok(2), ok(3)];
      expect(collectResults(results)).to.deep.equal({
        ok: true,
        value: [1, 2, 3],
      });
    });

    it("should stop at the first error", () => {
      const results: Result<number, string>[] = [
        ok(1),
        error("second"),
        error("third"),
      ];
      expect(collectResults(results)).to.deep.equal({
        ok: false,
        error: "second",
      });
    });

    it("should collect an empty list", () => {
      expect(collectResults<number, string>([])).to.deep.equal({
        ok: true,
        value: [],
      });
    });
  });
});
