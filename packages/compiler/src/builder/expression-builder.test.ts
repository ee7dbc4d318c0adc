/**
 * Tests for generating expression functions
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  buildExpressionSource,
  preludeLineCount,
} from "./expression-builder.js";

describe("Expression builder", () => {
  const plan = [
    { name: "x", generator: "1 + 1", implicit: true },
    { name: "y", generator: "x * 10", implicit: false },
  ];

  it("should declare locals and the prelude before the body", () => {
    expect(buildExpressionSource("return y;\n", plan)).to.equal(
      [
        "(function (event, context, globals) {",
        "  const { locals } = context ?? {};",
        "  const x = 1 + 1;",
        "  const y = x * 10;",
        "  return (() => {",
        "return y;",
        "  })();",
        "})",
      ].join("\n")
    );
  });

  it("should leave out locals for process-wide expressions", () => {
    expect(
      buildExpressionSource("return 42;", [], { noOwnerLocals: true })
    ).to.equal(
      [
        "(function (event, context, globals) {",
        "  return (() => {",
        "return 42;",
        "  })();",
        "})",
      ].join("\n")
    );
  });

  it("should accept an empty body", () => {
    expect(buildExpressionSource("", [], { noOwnerLocals: true })).to.equal(
      [
        "(function (event, context, globals) {",
        "  return (() => {",
        "  })();",
        "})",
      ].join("\n")
    );
  });

  it("should count the lines ahead of the body", () => {
    const source = buildExpressionSource("return y;", plan);
    const bodyLine = source.split("\n").indexOf("return y;");

    expect(preludeLineCount(plan)).to.equal(bodyLine);
    expect(preludeLineCount(plan, { noOwnerLocals: true })).to.equal(4);
    expect(preludeLineCount([], { noOwnerLocals: true })).to.equal(2);
  });
});
