/**
 * Tests for snippet parsing
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { checkSyntax, parseSnippet, snippetFileName } from "./parser.js";
import { expectError, expectOk } from "../types/test-harness.js";

describe("Snippet parser", () => {
  it("should parse a snippet under its title", () => {
    const file = expectOk(parseSnippet("trackBpm * 2", "Beat Expression"));

    expect(file.fileName).to.equal("Beat Expression");
    expect(file.statements).to.have.length(1);
  });

  it("should not type-check", () => {
    expect(checkSyntax('const bpm: number = "fast";', "Loose")).to.deep.equal(
      []
    );
  });

  it("should report syntax errors with the snippet's line", () => {
    const diagnostics = expectError(
      parseSnippet("const x = 1;\nconst = 2;", "Bad Snippet")
    );

    expect(diagnostics[0]?.code).to.equal("EXP1001");
    expect(diagnostics[0]?.location?.file).to.equal("Bad Snippet");
    expect(diagnostics[0]?.location?.line).to.equal(2);
  });

  it("should give the compiler a TypeScript file name", () => {
    expect(snippetFileName("Trigger 1 Beat Expression")).to.equal(
      "Trigger 1 Beat Expression.ts"
    );
    expect(snippetFileName("beat.ts")).to.equal("beat.ts");
  });
});
