import { describe, it } from "mocha";
import { expect } from "chai";
import {
  isKnownSubstituteType,
  isKnownType,
} from "./known-types.js";
import { QualifiedName } from "./namespace.js";

describe("Known types", () => {
  it("should match full native spellings", () => {
    expect(isKnownType(QualifiedName.fromCppName("std::string"))).to.equal(true);
    expect(isKnownType(QualifiedName.fromCppName("std::vector"))).to.equal(true);
    expect(isKnownType(QualifiedName.fromCppName("app::string"))).to.equal(false);
  });

  it("should treat root-level stand-ins as substitutes only at the root", () => {
    expect(isKnownSubstituteType(QualifiedName.inRoot("string"))).to.equal(true);
    expect(isKnownSubstituteType(QualifiedName.inRoot("unique_ptr"))).to.equal(true);
    expect(
      isKnownSubstituteType(QualifiedName.fromCppName("app::string"))
    ).to.equal(false);
    expect(isKnownSubstituteType(QualifiedName.inRoot("Widget"))).to.equal(false);
  });
});
