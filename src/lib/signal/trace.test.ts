import { describe, expect, it } from "vitest";
import {
  allGaps,
  assertSameLength,
  backwardVelocity,
  countValid,
  fillGapsLinear,
  isGap,
} from "./trace";

describe("gap helpers", () => {
  it("treats only NaN as a gap", () => {
    expect(isGap(NaN)).toBe(true);
    expect(isGap(0)).toBe(false);
    expect(isGap(Infinity)).toBe(false);
    expect(countValid([1, NaN, 0, NaN])).toBe(2);
  });

  it("builds an all-gap trace", () => {
    const out = allGaps(3);
    expect(out).toHaveLength(3);
    out.forEach((v) => expect(v).toBeNaN());
  });

  it("reports the mismatched trace by name", () => {
    expect(() => assertSameLength("ctx", { a: [1, 2, 3], b: [1, 2] })).toThrow(
      "ctx: b has 2 samples, a has 3",
    );
    expect(() => assertSameLength("ctx", { a: [1], b: [2] })).not.toThrow();
  });
});

describe("backwardVelocity", () => {
  it("divides each step by its elapsed time", () => {
    expect(backwardVelocity([0, 1, 3], [0, 0.5, 1])).toEqual([0, 2, 4]);
  });

  it("propagates gaps to both adjacent steps", () => {
    const vel = backwardVelocity([0, NaN, 3, 4], [0, 1, 2, 3]);
    expect(vel[0]).toBe(0);
    expect(vel[1]).toBeNaN();
    expect(vel[2]).toBeNaN();
    expect(vel[3]).toBe(1);
  });

  it("handles an empty trace", () => {
    expect(backwardVelocity([], [])).toEqual([]);
  });
});

describe("fillGapsLinear", () => {
  it("interpolates inside and extrapolates past both ends", () => {
    expect(fillGapsLinear([NaN, 2, NaN, 6, NaN])).toEqual([0, 2, 4, 6, 8]);
  });

  it("uses the surrounding pair of valid samples", () => {
    expect(fillGapsLinear([1, NaN, 3, NaN, NaN, 9])).toEqual([1, 2, 3, 5, 7, 9]);
  });

  it("fills with the single valid value", () => {
    expect(fillGapsLinear([NaN, 5, NaN])).toEqual([5, 5, 5]);
  });

  it("returns a trace with no valid sample unchanged", () => {
    const out = fillGapsLinear([NaN, NaN]);
    expect(out).toHaveLength(2);
    out.forEach((v) => expect(v).toBeNaN());
  });
});
