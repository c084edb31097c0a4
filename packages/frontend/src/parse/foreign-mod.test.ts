import { describe, it } from "mocha";
import { expect } from "chai";
import { ForeignModCollector } from "./foreign-mod.js";
import { emptyParseCallbacks } from "../declarations/types.js";
import { fn, implBlock, param, pathType } from "../declarations/test-builders.js";
import { ApiModel } from "../model/api-model.js";
import { Namespace, QualifiedName } from "../model/namespace.js";

describe("ForeignModCollector", () => {
  it("should keep functions and drop statics", () => {
    const collector = new ForeignModCollector(Namespace.root(), emptyParseCallbacks());
    collector.convertForeignModItems([
      fn("init"),
      { kind: "static", ident: "counter", ty: pathType("i32") },
    ]);
    const model = new ApiModel();
    collector.finished(model);

    expect(model.toArray().map((entry) => entry.name.ident)).to.deep.equal(["init"]);
  });

  it("should use the method name when an impl method forwards to nothing", () => {
    const collector = new ForeignModCollector(Namespace.of(["gfx"]), emptyParseCallbacks());
    collector.convertImplItems(implBlock("Canvas", { ident: "clear" }));
    collector.convertForeignModItems([
      fn("clear", [param("this", pathType("root", "gfx", "Canvas"))]),
    ]);
    const model = new ApiModel();
    collector.finished(model);

    const entry = model.get(QualifiedName.fromCppName("gfx::clear"));
    expect(entry?.kind === "function" && entry.receiver).to.equal("instance");
    expect(
      entry?.kind === "function" && entry.source === "native" && entry.selfType?.toCppName()
    ).to.equal("gfx::Canvas");
  });

  it("should carry original names over from the header parser", () => {
    const collector = new ForeignModCollector(Namespace.of(["io"]), {
      originalNames: new Map([["io::open1", "open"]]),
      discardedTemplateParams: new Set(),
    });
    collector.convertForeignModItems([fn("open1")]);
    const model = new ApiModel();
    collector.finished(model);

    expect([...model.cppNames()]).to.deep.equal(["io::open"]);
  });

  it("should keep the first of two functions of the same name", () => {
    const collector = new ForeignModCollector(Namespace.root(), emptyParseCallbacks());
    collector.convertForeignModItems([
      fn("reset", [], pathType("u32")),
      fn("reset", [], pathType("u64")),
    ]);
    const model = new ApiModel();
    collector.finished(model);

    const entry = model.get(QualifiedName.inRoot("reset"));
    expect(model.size).to.equal(1);
    expect(
      entry?.kind === "function" && entry.source === "native" && entry.signature.returnType
    ).to.deep.equal(pathType("u32"));
  });
});
