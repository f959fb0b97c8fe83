import { describe, expect, it } from "vitest";
import { applySegmentWrites, buildUseSignal, planSegmentWrites } from "./SegmentBuilder";
import type { ZeroCrossing } from "./ZeroCrossingDetector";

function crossingsAt(time: number[], points: Array<[number, number]>): ZeroCrossing[] {
  return points.map(([index, position]) => ({ index, timestamp: time[index], position }));
}

describe("planSegmentWrites", () => {
  // time == index, threshold 10 * 0.5 => minimum swing 5
  const time = Array.from({ length: 20 }, (_, i) => i);
  const threshold = new Array<number>(20).fill(10);
  const crossings = crossingsAt(time, [
    [2, 0],
    [5, 10],
    [9, 1],
    [14, 3],
    [17, 12],
  ]);
  const input = { crossings, time, threshold, shoulderRatio: 0.5 };

  it("emits writes pair by pair in fold order", () => {
    const plan = planSegmentWrites(input);

    expect(plan.writes).toEqual([
      { from: 2, to: 5, value: 1, pair: 0, reason: "first_swing" },
      { from: 5, to: 6, value: 0, pair: 1, reason: "reversal_off" },
      { from: 6, to: 9, value: 1, pair: 1, reason: "reversal_on" },
      { from: 9, to: 14, value: 0, pair: 2, reason: "low_swing_off" },
      { from: 14, to: 17, value: 1, pair: 2, reason: "low_swing_carry" },
      { from: 14, to: 15, value: 0, pair: 3, reason: "reversal_off" },
      { from: 15, to: 17, value: 1, pair: 3, reason: "reversal_on" },
    ]);
  });

  it("lets later pairs overwrite earlier writes", () => {
    expect(buildUseSignal(input)).toEqual([
      0, 0, 1, 1, 1, 0, 1, 1, 1, 0, 0, 0, 0, 0, 0, 1, 1, 0, 0, 0,
    ]);
  });

  it("carries a low swing only when a crossing follows", () => {
    const short = { ...input, crossings: crossings.slice(0, 4) };
    const plan = planSegmentWrites(short);

    expect(plan.writes.map((w) => w.reason)).toEqual([
      "first_swing",
      "reversal_off",
      "reversal_on",
      "low_swing_off",
    ]);
  });
});

describe("buildUseSignal", () => {
  it("marks [0, 40) for crossings at samples 0 and 40 of a 30 Hz recording", () => {
    const time = Array.from({ length: 90 }, (_, i) => i / 30);
    const signal = buildUseSignal({
      crossings: crossingsAt(time, [
        [0, 100],
        [40, 150],
      ]),
      time,
      threshold: new Array<number>(90).fill(100),
      shoulderRatio: 0.2,
    });

    expect(signal.slice(0, 40).every((v) => v === 1)).toBe(true);
    expect(signal.slice(40).every((v) => v === 0)).toBe(true);
  });

  it("is all off with fewer than two crossings", () => {
    const time = [0, 1, 2, 3];
    const threshold = [1, 1, 1, 1];
    expect(buildUseSignal({ crossings: [], time, threshold, shoulderRatio: 0.2 })).toEqual([
      0, 0, 0, 0,
    ]);
    expect(
      buildUseSignal({
        crossings: crossingsAt(time, [[1, 5]]),
        time,
        threshold,
        shoulderRatio: 0.2,
      }),
    ).toEqual([0, 0, 0, 0]);
  });
});

describe("applySegmentWrites", () => {
  it("clamps ranges and ignores empty ones", () => {
    expect(
      applySegmentWrites(5, [
        { from: -2, to: 3, value: 1, pair: 0, reason: "first_swing" },
        { from: 4, to: 2, value: 1, pair: 1, reason: "reversal_on" },
        { from: 4, to: 9, value: 1, pair: 2, reason: "reversal_on" },
      ]),
    ).toEqual([1, 1, 1, 0, 1]);
  });
});
