/**
 * Tests for loading shared definitions
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { loadSharedDefinitions } from "./shared-definitions.js";
import { compileExpression } from "./compile.js";
import { invokeExpression } from "./invoke.js";
import { createBindingCatalog } from "../catalog/builder.js";
import { resolveBindings } from "../catalog/resolver.js";
import {
  type SharedWorkspace,
  createSharedWorkspace,
} from "../workspace/workspace.js";
import {
  BASE_AND_CHILD,
  expectError,
  expectOk,
} from "../types/test-harness.js";

describe("Shared-definitions loader", () => {
  const bindings = expectOk(
    resolveBindings(expectOk(createBindingCatalog(BASE_AND_CHILD)), "Base")
  );

  const evaluate = (workspace: SharedWorkspace, source: string): unknown =>
    expectOk(
      invokeExpression(
        expectOk(
          compileExpression(source, bindings, { title: "Use", workspace })
        ),
        undefined
      )
    );

  it("should make definitions callable from later expressions", () => {
    const workspace = createSharedWorkspace();
    expectOk(
      loadSharedDefinitions("function double(n: number) { return n * 2; }", {
        title: "Shared Functions",
        workspace,
      })
    );

    expect(evaluate(workspace, "double(21)")).to.equal(42);
  });

  it("should keep const, let and class declarations in the workspace", () => {
    const workspace = createSharedWorkspace();
    expectOk(
      loadSharedDefinitions(
        [
          "const base = 10;",
          "let step = 1;",
          "class Counter {",
          "  n = base;",
          "  next() { return (this.n += step); }",
          "}",
        ].join("\n"),
        { title: "Shared Functions", workspace }
      )
    );

    expect(evaluate(workspace, "new Counter().next()")).to.equal(11);
  });

  it("should let definitions schedule work on timers", async () => {
    const workspace = createSharedWorkspace();
    expectOk(
      loadSharedDefinitions(
        [
          "const pending = setTimeout(() => {}, 60000);",
          "clearTimeout(pending);",
          "function later(value: number) {",
          "  return new Promise((resolve) => setTimeout(() => resolve(value * 2), 0));",
          "}",
        ].join("\n"),
        { title: "Shared Functions", workspace }
      )
    );

    expect(await evaluate(workspace, "later(4)")).to.equal(8);
  });

  it("should let a later load redefine a name", () => {
    const workspace = createSharedWorkspace();
    const title = "Shared Functions";
    expectOk(loadSharedDefinitions("const level = 1;", { title, workspace }));
    expectOk(loadSharedDefinitions("const level = 2;", { title, workspace }));

    expect(evaluate(workspace, "level")).to.equal(2);
  });

  it("should stop at the first failure and keep what ran before it", () => {
    const workspace = createSharedWorkspace();
    const failure = expectError(
      loadSharedDefinitions(
        "var before = 1;\nthrow new Error('stop');\nvar after = 2;",
        { title: "Shared Functions", workspace }
      )
    );

    expect(failure.title).to.equal("Shared Functions");
    expect(failure.diagnostics[0]?.code).to.equal("EXP1003");
    expect(failure.diagnostics[0]?.message).to.equal("Error: stop");
    expect(failure.diagnostics[0]?.location?.line).to.equal(2);
    expect(workspace.has("before")).to.equal(true);
    expect(workspace.has("after")).to.equal(false);
  });

  it("should evaluate nothing when the text does not parse", () => {
    const workspace = createSharedWorkspace();
    const failure = expectError(
      loadSharedDefinitions("var early = 1;\nfunction (", {
        title: "Shared Functions",
        workspace,
      })
    );

    expect(failure.diagnostics[0]?.code).to.equal("EXP1001");
    expect(workspace.has("early")).to.equal(false);
  });

  it("should refuse to load while the workspace is busy", () => {
    const workspace = createSharedWorkspace();
    const inner = expectOk(
      workspace.exclusive(() =>
        loadSharedDefinitions("var x = 1;", { title: "Nested", workspace })
      )
    );

    expect(expectError(inner).diagnostics[0]?.code).to.equal("EXP1004");
  });
});
