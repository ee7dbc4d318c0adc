/**
 * Tests for the shipped catalog
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { standardCatalog } from "./standard.js";
import { resolveBindings } from "./resolver.js";
import { expectOk } from "../types/test-harness.js";

describe("Standard catalog", () => {
  const catalog = expectOk(standardCatalog());
  const resolve = (kind: string) => expectOk(resolveBindings(catalog, kind));

  it("should register the standard kinds", () => {
    expect([...catalog.kinds.keys()]).to.deep.equal([
      "device-update",
      "metadata",
      "beat-shared",
      "beat",
      "mixer-status",
      "cdj-status",
      "beat-with-position",
    ]);
  });

  it("should be built once per process", () => {
    expect(standardCatalog()).to.equal(standardCatalog());
  });

  it("should make every metadata binding but the root require the root", () => {
    const metadata = resolve("metadata");
    for (const binding of metadata.bindings.values()) {
      expect(binding.requires).to.equal(
        binding.name === "trackMetadata" ? undefined : "trackMetadata"
      );
    }
  });

  it("should let beat override the shared beat bindings", () => {
    const beat = resolve("beat");
    expect(beat.bindings.get("isTempoMaster")?.generator).to.equal(
      "event.isTempoMaster"
    );
    expect(beat.bindings.has("trackTitle")).to.equal(true);
    expect(beat.bindings.has("rawPitch")).to.equal(true);
  });

  it("should keep kinds apart where they do not inherit", () => {
    expect(resolve("mixer-status").bindings.has("trackTitle")).to.equal(false);
    expect(resolve("cdj-status").bindings.has("trackPosition")).to.equal(false);
    expect(resolve("beat-with-position").bindings.has("trackPosition")).to.equal(
      true
    );
  });
});
