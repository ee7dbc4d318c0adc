/**
 * Tests for the invocation boundary
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { invokeExpression } from "./invoke.js";
import type { CompiledExpression } from "./compile.js";
import { createGlobals, createOwnerContext } from "../runtime/context.js";
import { expectError, expectOk } from "../types/test-harness.js";

const compiled = (fn: CompiledExpression["fn"]): CompiledExpression => ({
  title: "Beat Expression for Trigger 1",
  prelude: [],
  source: "",
  fn,
});

describe("invokeExpression", () => {
  it("should pass event, context and globals", () => {
    const context = createOwnerContext({ kind: "trigger", id: "1" });
    const globals = createGlobals();
    const seen: unknown[] = [];

    const result = invokeExpression(
      compiled((...args) => {
        seen.push(...args);
        return "fired";
      }),
      "event",
      context,
      globals
    );

    expect(expectOk(result)).to.equal("fired");
    expect(seen).to.deep.equal(["event", context, globals]);
  });

  it("should hand back the thrown value untouched", () => {
    const thrown = new RangeError("out of range");
    const failure = expectError(
      invokeExpression(
        compiled(() => {
          throw thrown;
        }),
        null
      )
    );

    expect(failure).to.deep.include({
      kind: "runtime",
      title: "Beat Expression for Trigger 1",
      message: "RangeError: out of range",
    });
    expect(failure.cause).to.equal(thrown);
  });
});
