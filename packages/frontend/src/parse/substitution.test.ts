import { describe, it } from "mocha";
import { expect } from "chai";
import {
  confirmAllGenerateDirectivesObeyed,
  replaceExternNativeTypes,
} from "./substitution.js";
import { resolveConfig } from "../config/loader.js";
import { createPolicy } from "../config/policy.js";
import { ApiModel } from "../model/api-model.js";
import { ApiName } from "../model/api.js";
import { Namespace } from "../model/namespace.js";

const forwardDeclaration = (namespace: string[], ident: string, cppName?: string) => ({
  kind: "forwardDeclaration" as const,
  name: ApiName.of(Namespace.of(namespace), ident, cppName),
});

describe("replaceExternNativeTypes", () => {
  it("should return only the names that displaced an entry", () => {
    const model = new ApiModel();
    model.add(forwardDeclaration(["b"], "Widget"));
    const policy = createPolicy(
      resolveConfig({
        externNativeTypes: [
          { definition: "b::Widget", managedPath: "widgets.Widget" },
          { definition: "Fresh", managedPath: "fresh.Fresh" },
        ],
      })
    );

    const displaced = replaceExternNativeTypes(model, policy);

    expect(displaced.map((name) => name.toCppName())).to.deep.equal(["b::Widget"]);
    expect(model.toArray().map((entry) => entry.kind)).to.deep.equal([
      "nativeTypeOverride",
      "nativeTypeOverride",
    ]);
  });
});

describe("confirmAllGenerateDirectivesObeyed", () => {
  it("should compare directives against original native names", () => {
    const model = new ApiModel();
    model.add(forwardDeclaration(["ui"], "Outer_Inner", "Outer::Inner"));

    const nested = confirmAllGenerateDirectivesObeyed(
      model,
      createPolicy(resolveConfig({ generate: ["ui::Outer::Inner"] }))
    );
    const renamed = confirmAllGenerateDirectivesObeyed(
      model,
      createPolicy(resolveConfig({ generate: ["ui::Outer_Inner"] }))
    );

    expect(nested.ok).to.equal(true);
    expect(renamed.ok).to.equal(false);
  });

  it("should report the first missing directive, pod directives last", () => {
    const result = confirmAllGenerateDirectivesObeyed(
      new ApiModel(),
      createPolicy(resolveConfig({ generatePod: ["a::Point"], generate: ["a::Line"] }))
    );

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.message).to.equal(
      "Generate directive 'a::Line' did not generate anything"
    );
  });
});
