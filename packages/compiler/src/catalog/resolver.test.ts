/**
 * Tests for flattening event kind inheritance
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createBindingCatalog } from "./builder.js";
import {
  compareNames,
  describeBindings,
  mergeBindingSets,
  resolveBindings,
} from "./resolver.js";
import {
  BASE_AND_CHILD,
  expectError,
  expectOk,
} from "../types/test-harness.js";

describe("Catalog resolver", () => {
  const catalog = expectOk(createBindingCatalog(BASE_AND_CHILD));

  it("should include the bindings of inherited kinds", () => {
    const child = expectOk(resolveBindings(catalog, "Child"));
    expect(child.bindings.get("x")?.generator).to.equal("1 + 1");
    expect(child.bindings.get("y")?.requires).to.equal("x");
  });

  it("should fail for an unknown kind and list the known ones", () => {
    const diagnostic = expectError(resolveBindings(catalog, "Other"));
    expect(diagnostic.code).to.equal("EXP2001");
    expect(diagnostic.message).to.equal("Unknown event kind 'Other'");
    expect(diagnostic.hint).to.equal("Known kinds: Base, Child");
  });

  it("should let later parents and then the kind itself win", () => {
    const layered = expectOk(
      createBindingCatalog([
        {
          kind: "P1",
          inherits: [],
          bindings: [
            { name: "a", generator: "1", doc: "from P1" },
            { name: "b", generator: "1", doc: "from P1" },
          ],
        },
        {
          kind: "P2",
          inherits: [],
          bindings: [
            { name: "a", generator: "2", doc: "from P2" },
            { name: "b", generator: "2", doc: "from P2" },
          ],
        },
        {
          kind: "K",
          inherits: ["P1", "P2"],
          bindings: [{ name: "b", generator: "3", doc: "from K" }],
        },
      ])
    );

    const k = expectOk(resolveBindings(layered, "K"));
    expect(k.bindings.get("a")?.doc).to.equal("from P2");
    expect(k.bindings.get("b")?.doc).to.equal("from K");
    expect(k.bindings.size).to.equal(2);
  });

  it("should merge sets with later sets winning", () => {
    const base = expectOk(resolveBindings(catalog, "Base"));
    const child = expectOk(resolveBindings(catalog, "Child"));
    const merged = mergeBindingSets(base, child);

    expect(merged.kinds).to.deep.equal(["Base", "Child"]);
    expect([...merged.bindings.keys()]).to.deep.equal(["x", "y"]);
  });

  it("should describe bindings sorted by name", () => {
    const child = expectOk(resolveBindings(catalog, "Child"));
    expect(describeBindings(child)).to.deep.equal([
      { name: "x", doc: "Two." },
      { name: "y", doc: "Ten times x.", requires: "x" },
    ]);
  });

  it("should order names by code unit", () => {
    expect(["b", "Z", "a"].sort(compareNames)).to.deep.equal(["Z", "a", "b"]);
  });
});
