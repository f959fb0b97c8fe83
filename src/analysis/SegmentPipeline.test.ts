import { describe, expect, it } from "vitest";
import { DEFAULT_PIPELINE_CONFIG } from "../lib/config/pipelineConfig";
import type { UseSample } from "../lib/signal/trace";
import { alignUseSignals, processRecordingSegment } from "./SegmentPipeline";
import type { FusedUseSignal, Limb } from "./UseSignalFusion";

function fused(limb: Limb, time: number[], useSignal: UseSample[]): FusedUseSignal {
  return {
    limb,
    baseCameraId: 1,
    time,
    useSignal,
    rawDistance: time.map(() => 1),
    segmentCount: 0,
    filledSamples: 0,
  };
}

describe("alignUseSignals", () => {
  it("aligns both limbs on the union of their timestamps", () => {
    const table = alignUseSignals(
      fused("RH", [1, 2, 3], [1, 0, 1]),
      fused("LH", [2, 3, 4], [0, 1, 1]),
    );

    expect(table.time).toEqual([1, 2, 3, 4]);
    expect(table.RH).toEqual([1, 0, 1, NaN]);
    expect(table.LH).toEqual([NaN, 0, 1, 1]);
  });

  it("sorts timestamps numerically", () => {
    const table = alignUseSignals(fused("RH", [9, 10], [0, 1]), fused("LH", [2], [1]));
    expect(table.time).toEqual([2, 9, 10]);
  });
});

describe("processRecordingSegment", () => {
  it("requires at least one camera table", () => {
    expect(() => processRecordingSegment([], DEFAULT_PIPELINE_CONFIG)).toThrow(
      "at least one camera table",
    );
  });
});
