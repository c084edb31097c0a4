import { describe, it } from "mocha";
import { expect } from "chai";
import { Namespace, QualifiedName } from "./namespace.js";

describe("Namespace", () => {
  it("should share a single root", () => {
    expect(Namespace.of([])).to.equal(Namespace.root());
    expect(Namespace.root().isEmpty).to.equal(true);
    expect(Namespace.root().toString()).to.equal("");
  });

  it("should not mutate the receiver on push", () => {
    const outer = Namespace.of(["a"]);
    const inner = outer.push("b");

    expect(outer.segments).to.deep.equal(["a"]);
    expect(inner.segments).to.deep.equal(["a", "b"]);
    expect(inner.toString()).to.equal("a::b");
  });

  it("should compare by segments", () => {
    expect(Namespace.of(["a", "b"]).equals(Namespace.root().push("a").push("b"))).to.equal(true);
    expect(Namespace.of(["a"]).equals(Namespace.of(["b"]))).to.equal(false);
  });
});

describe("QualifiedName", () => {
  it("should parse native spellings", () => {
    const name = QualifiedName.fromCppName("a::b::Widget");
    expect(name.namespace.segments).to.deep.equal(["a", "b"]);
    expect(name.ident).to.equal("Widget");
    expect(name.toCppName()).to.equal("a::b::Widget");
  });

  it("should spell root names without a separator", () => {
    const name = QualifiedName.fromCppName("Widget");
    expect(name.namespace.isEmpty).to.equal(true);
    expect(name.key).to.equal("Widget");
  });

  it("should build names from path segments", () => {
    const name = QualifiedName.fromSegments(["ns", "Thing"]);
    expect(name.equals(QualifiedName.fromCppName("ns::Thing"))).to.equal(true);
    expect(name.equals(QualifiedName.inRoot("Thing"))).to.equal(false);
  });
});
