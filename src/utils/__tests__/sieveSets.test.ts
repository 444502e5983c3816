import { describe, it, expect } from "vitest";
import { createSieveSpec, getSieveSet, getSieveOpenings, SIEVE_SETS, defaultSieveSet } from "../../data/sieveSets";

describe("sieve sets", () => {
  it("defaults to the standard 4.75 mm to 75 µm set with a pan", () => {
    expect(defaultSieveSet.id).toBe("standard");
    expect(defaultSieveSet.sizes).toEqual([4.75, 2.36, 1.18, 0.6, 0.3, 0.15, 0.075, 0]);
  });

  it("ends every configured set with the pan", () => {
    for (const set of SIEVE_SETS) {
      expect(set.sizes[set.sizes.length - 1]).toBe(0);
    }
  });

  it("lists openings without the pan", () => {
    expect(getSieveOpenings(getSieveSet("extended"))).toEqual([19, 9.5, 4.75, 2.36, 1.18, 0.6, 0.3, 0.15, 0.075]);
  });

  it("throws for an unknown set", () => {
    expect(() => getSieveSet("missing")).toThrow("Unknown sieve set: missing");
  });

  it("rejects openings that do not decrease", () => {
    expect(() => createSieveSpec("bad", "Bad", [2, 2, 0])).toThrow(/strictly decreasing/);
  });

  it("rejects a set without a pan", () => {
    expect(() => createSieveSpec("bad", "Bad", [2, 1, 0.5])).toThrow(/must end with the pan/);
  });

  it("rejects a set with only the pan", () => {
    expect(() => createSieveSpec("bad", "Bad", [0])).toThrow(/at least one sieve/);
  });

  it("freezes the openings", () => {
    const spec = createSieveSpec("t", "Test", [1, 0.5, 0]);
    expect(Object.isFrozen(spec.sizes)).toBe(true);
  });
});
