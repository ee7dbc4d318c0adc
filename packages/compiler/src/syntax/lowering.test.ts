/**
 * Tests for lowering snippets to JavaScript
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import * as vm from "node:vm";
import {
  hoistLexicalDeclarations,
  lowerSnippet,
  returnLastStatement,
} from "./lowering.js";
import { expectOk } from "../types/test-harness.js";

/**
 * Lower a snippet as a function body and call it
 */
const callBody = (
  source: string,
  params: readonly string[] = [],
  args: readonly unknown[] = []
): unknown => {
  const body = expectOk(lowerSnippet(source, "Body", [returnLastStatement]));
  const fn = new Function(...params, body);
  return Reflect.apply(fn, undefined, [...args]);
};

describe("Snippet lowering", () => {
  describe("returnLastStatement", () => {
    it("should return a trailing expression", () => {
      expect(
        expectOk(lowerSnippet("1 + 2", "Sum", [returnLastStatement]))
      ).to.equal("return 1 + 2;\n");
    });

    it("should erase type annotations", () => {
      expect(callBody("const a: number = 20;\na * 2")).to.equal(40);
    });

    it("should return from both branches of a trailing if", () => {
      const source = 'if (playing) { "on" } else { "off" }';

      expect(callBody(source, ["playing"], [true])).to.equal("on");
      expect(callBody(source, ["playing"], [false])).to.equal("off");
    });

    it("should give undefined for an if without else that is not taken", () => {
      expect(callBody('if (playing) "on"', ["playing"], [false])).to.equal(
        undefined
      );
    });

    it("should leave a trailing declaration alone", () => {
      expect(callBody("const unused = 1;")).to.equal(undefined);
    });
  });

  describe("hoistLexicalDeclarations", () => {
    it("should turn let and const into var", () => {
      expect(
        expectOk(
          lowerSnippet("let a = 1;", "Shared", [hoistLexicalDeclarations])
        )
      ).to.equal("var a = 1;\n");
    });

    it("should put classes on the global object", () => {
      const code = expectOk(
        lowerSnippet(
          "class Counter { count = 0; }",
          "Shared",
          [hoistLexicalDeclarations]
        )
      );
      const context = vm.createContext({});
      vm.runInContext(code, context);

      expect(typeof context.Counter).to.equal("function");
    });

    it("should allow redefinition across evaluations", () => {
      const context = vm.createContext({});
      for (const value of [1, 2]) {
        vm.runInContext(
          expectOk(
            lowerSnippet(`const limit = ${value};`, "Shared", [
              hoistLexicalDeclarations,
            ])
          ),
          context
        );
      }

      expect(context.limit).to.equal(2);
    });
  });
});
