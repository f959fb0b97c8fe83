import { describe, expect, it } from "vitest";
import { detectZeroCrossings, findVelocityReversals } from "./ZeroCrossingDetector";

const constant = (n: number, value: number) => new Array<number>(n).fill(value);

describe("findVelocityReversals", () => {
  it("marks strict sign changes only", () => {
    expect(findVelocityReversals([1, -1, -1, 2, 0, -3, NaN, 1])).toEqual([0, 2]);
  });

  it("finds nothing in a short or flat trace", () => {
    expect(findVelocityReversals([])).toEqual([]);
    expect(findVelocityReversals([1])).toEqual([]);
    expect(findVelocityReversals([0, 0, 0])).toEqual([]);
  });
});

describe("detectZeroCrossings", () => {
  const time = [0, 10, 20, 30, 40, 50];
  const velocity = [1, -1, 1, -1, 1, 1]; // candidates 0, 1, 2, 3

  it("keeps candidates that swing far enough from a neighbour", () => {
    const crossings = detectZeroCrossings({
      position: [0, 10, 9, 8, 5, 5],
      velocity,
      threshold: constant(6, 10),
      time,
      shoulderRatio: 0.5,
    });

    expect(crossings).toEqual([
      { index: 0, timestamp: 0, position: 0 },
      { index: 1, timestamp: 10, position: 10 },
    ]);
  });

  it("accepts a swing exactly at the threshold", () => {
    const pair = detectZeroCrossings({
      position: [0, 5, 5, 5, 5, 5],
      velocity: [1, -1, 1, 1, 1, 1],
      threshold: constant(6, 10),
      time,
      shoulderRatio: 0.5,
    });
    expect(pair.map((c) => c.index)).toEqual([0, 1]);
  });

  it("compares against the threshold at the candidate itself", () => {
    const crossings = detectZeroCrossings({
      position: [0, 6, 6, 6, 6, 6],
      velocity: [1, -1, 1, 1, 1, 1],
      threshold: [10, 20, 10, 10, 10, 10],
      time,
      shoulderRatio: 0.5,
    });
    // Candidate 0 needs 5, candidate 1 needs 10
    expect(crossings.map((c) => c.index)).toEqual([0]);
  });

  it("rejects a lone candidate", () => {
    const crossings = detectZeroCrossings({
      position: [0, 100, 0, 0],
      velocity: [1, -1, -1, -1],
      threshold: constant(4, 1),
      time: [0, 1, 2, 3],
      shoulderRatio: 0.2,
    });
    expect(crossings).toEqual([]);
  });

  it("rejects traces of different length", () => {
    expect(() =>
      detectZeroCrossings({
        position: [0, 1],
        velocity: [0, 1, 2],
        threshold: [1, 1],
        time: [0, 1],
        shoulderRatio: 0.2,
      }),
    ).toThrow(/detectZeroCrossings/);
  });
});
