/**
 * Tests for Atom
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { Atom } from "./atom.js";

describe("Atom", () => {
  it("should hold and replace a value", () => {
    const atom = new Atom(1);
    expect(atom.deref()).to.equal(1);
    expect(atom.reset(2)).to.equal(2);
    expect(atom.deref()).to.equal(2);
  });

  it("should only compare-and-set against the current value", () => {
    const atom = new Atom({ n: 1 });
    const first = atom.deref();

    expect(atom.compareAndSet({ n: 1 }, { n: 2 })).to.equal(false);
    expect(atom.compareAndSet(first, { n: 3 })).to.equal(true);
    expect(atom.deref()).to.deep.equal({ n: 3 });
  });

  it("should swap with a function of the current value", () => {
    const atom = new Atom<Record<string, number>>({});
    atom.swap((m) => ({ ...m, count: (m.count ?? 0) + 1 }));
    atom.swap((m) => ({ ...m, count: (m.count ?? 0) + 1 }));
    expect(atom.deref()).to.deep.equal({ count: 2 });
  });

  it("should retry a swap when the value changes underneath", () => {
    const atom = new Atom(10);
    let calls = 0;

    const result = atom.swap((n) => {
      calls += 1;
      if (calls === 1) {
        atom.reset(20);
      }
      return n + 1;
    });

    expect(calls).to.equal(2);
    expect(result).to.equal(21);
    expect(atom.deref()).to.equal(21);
  });
});
