import { describe, expect, it } from "vitest";
import { distanceToOrigin, euclideanDistance } from "./geometry";

describe("geometry", () => {
  it("computes sample-wise distances", () => {
    expect(euclideanDistance([3, 0], [4, 1], [0, 0], [0, 1])).toEqual([5, 0]);
    expect(distanceToOrigin([3, 6], [4, 8])).toEqual([5, 10]);
  });

  it("gives a gap where any coordinate is missing", () => {
    const d = euclideanDistance([NaN, 1], [0, NaN], [0, 0], [0, 0]);
    expect(d[0]).toBeNaN();
    expect(d[1]).toBeNaN();
  });

  it("rejects columns of different length", () => {
    expect(() => distanceToOrigin([1, 2], [1])).toThrow(/distanceToOrigin/);
  });
});
