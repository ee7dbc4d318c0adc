/**
 * Tests for the shared workspace
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createSharedWorkspace, sharedWorkspace } from "./workspace.js";
import { createStaticServices } from "./services.js";
import { expectError, expectOk } from "../types/test-harness.js";

const at = { filename: "test" };

describe("Shared workspace", () => {
  it("should evaluate code and keep top-level vars", () => {
    const workspace = createSharedWorkspace();

    expect(expectOk(workspace.evaluate("1 + 2", at))).to.equal(3);
    expectOk(workspace.evaluate("var n = 5", at));
    expect(expectOk(workspace.evaluate("n * 2", at))).to.equal(10);
    expect(workspace.has("n")).to.equal(true);
    expect(workspace.lookup("n")).to.equal(5);
  });

  it("should keep workspaces apart", () => {
    const first = createSharedWorkspace();
    const second = createSharedWorkspace();
    first.define("answer", 42);

    expect(expectOk(first.evaluate("answer", at))).to.equal(42);
    expect(second.has("answer")).to.equal(false);
    expect(second.lookup("answer")).to.equal(undefined);
  });

  it("should capture what evaluation throws", () => {
    const workspace = createSharedWorkspace();
    const failure = expectError(
      workspace.evaluate("throw new Error('boom')", at)
    );

    expect(failure.kind).to.equal("thrown");
    expect(failure).to.have.nested.property("cause.message", "boom");
  });

  it("should refuse re-entrant use", () => {
    const workspace = createSharedWorkspace();
    const outer = expectOk(
      workspace.exclusive(() => workspace.evaluate("1", at))
    );
    const failure = expectError(outer);

    expect(failure.kind).to.equal("busy");
    expect(failure).to.have.nested.property("diagnostic.code", "EXP1004");
  });

  it("should release the lock when the holder throws", () => {
    const workspace = createSharedWorkspace();
    expect(() =>
      workspace.exclusive(() => {
        throw new Error("holder failed");
      })
    ).to.throw("holder failed");
    expect(expectOk(workspace.evaluate("1", at))).to.equal(1);
  });

  it("should install the helper prelude", () => {
    const workspace = createSharedWorkspace();
    expect(expectOk(workspace.evaluate("formatCueCountdown(511)", at))).to.equal(
      "--.-"
    );
    expect(expectOk(workspace.evaluate("typeof console.log", at))).to.equal(
      "function"
    );
  });

  it("should provide timers and host globals", () => {
    const workspace = createSharedWorkspace();
    const names = [
      "setTimeout",
      "clearTimeout",
      "setInterval",
      "setImmediate",
      "queueMicrotask",
      "structuredClone",
      "URL",
      "TextEncoder",
      "AbortController",
    ];

    for (const name of names) {
      expect(expectOk(workspace.evaluate(`typeof ${name}`, at))).to.equal(
        "function"
      );
    }
  });

  it("should run scheduled callbacks", async () => {
    const workspace = createSharedWorkspace();
    const later = expectOk(
      workspace.evaluate(
        "new Promise((resolve) => setTimeout(() => queueMicrotask(() => resolve('fired')), 0))",
        at
      )
    );

    expect(await later).to.equal("fired");
  });

  it("should count lines from the given offset", () => {
    const workspace = createSharedWorkspace();
    const failure = expectError(
      workspace.evaluate("\n\n\nthrow new Error('late')", {
        filename: "offset",
        lineOffset: -2,
      })
    );

    expect(failure)
      .to.have.nested.property("cause.stack")
      .that.matches(/offset:2:/);
  });

  it("should read through replaced services", () => {
    const workspace = createSharedWorkspace();
    const lookup = "metadataFor({ deviceNumber: 2 })?.title";

    expect(expectOk(workspace.evaluate(lookup, at))).to.equal(undefined);
    workspace.useServices(
      createStaticServices(
        new Map([[2, { metadata: { title: "Test Track", duration: 240 } }]])
      )
    );
    expect(expectOk(workspace.evaluate(lookup, at))).to.equal("Test Track");
  });

  it("should create the process-wide workspace once", () => {
    expect(sharedWorkspace()).to.equal(sharedWorkspace());
  });
});
