import { afterEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_PIPELINE_CONFIG } from "../lib/config/pipelineConfig";
import type { CameraTable, MarkerTrack } from "../lib/io/cameraTable";
import { buildAdaptiveThreshold, processCameraView, toViewResult } from "./CameraViewProcessor";

const N = 120;
const time = Array.from({ length: N }, (_, i) => i / 30);

function still(x: number, y: number): MarkerTrack {
  return { x: new Array<number>(N).fill(x), y: new Array<number>(N).fill(y) };
}

function table(overrides: Partial<CameraTable["markers"]> = {}): CameraTable {
  return {
    cameraId: 5,
    fileName: "Camera5.csv",
    time,
    markers: {
      leftShoulder: still(200, 0),
      rightShoulder: still(300, 0),
      leftWrist: still(150, 50),
      rightWrist: still(300, 40),
      ...overrides,
    },
  };
}

describe("buildAdaptiveThreshold", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("interpolates across shoulder dropouts", () => {
    const width = new Array<number>(N).fill(100);
    for (let i = 40; i < 60; i++) width[i] = NaN;

    const threshold = buildAdaptiveThreshold(width, DEFAULT_PIPELINE_CONFIG);

    threshold.forEach((v) => expect(v).toBeCloseTo(100, 6));
  });

  it("warns when no shoulder width was observed", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const threshold = buildAdaptiveThreshold(new Array<number>(N).fill(NaN), DEFAULT_PIPELINE_CONFIG);

    threshold.forEach((v) => expect(v).toBeNaN());
    expect(warn).toHaveBeenCalledWith(
      "[Detect] Shoulder width has no valid samples; no movement can be confirmed",
    );
  });
});

describe("processCameraView", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("derives distances for both limbs from the marker tracks", () => {
    const view = processCameraView(table(), DEFAULT_PIPELINE_CONFIG);

    expect(view.cameraId).toBe(5);
    expect(view.threshold[0]).toBeCloseTo(100, 6);
    expect(view.limbs.RH.rawDistance[0]).toBeCloseTo(Math.hypot(300, 40), 10);
    expect(view.limbs.RH.rawShoulderDistance[0]).toBeCloseTo(40, 10);
    expect(view.limbs.LH.rawDistance[0]).toBeCloseTo(Math.hypot(150, 50), 10);
    expect(view.limbs.LH.filteredShoulderDistance[0]).toBeCloseTo(Math.hypot(50, 50), 6);
    expect(view.limbs.RH.velocity[0]).toBe(0);
    expect(view.limbs.RH.useSignal.every((v) => v === 0)).toBe(true);
    expect(view.limbs.LH.crossings).toEqual([]);
  });

  it("keeps wrist dropouts as gaps in the filtered distance", () => {
    const rightWrist = still(300, 40);
    rightWrist.x[10] = NaN;

    const view = processCameraView(table({ rightWrist }), DEFAULT_PIPELINE_CONFIG);

    expect(view.limbs.RH.rawDistance[10]).toBeNaN();
    expect(view.limbs.RH.filteredDistance[10]).toBeNaN();
    expect(view.limbs.RH.velocity[10]).toBeNaN();
    expect(view.limbs.RH.velocity[11]).toBeNaN();
    expect(view.limbs.RH.filteredDistance[11]).toBeCloseTo(Math.hypot(300, 40), 6);
  });

  it("finds no movement without a shoulder width", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const gone: MarkerTrack = { x: new Array<number>(N).fill(NaN), y: new Array<number>(N).fill(NaN) };
    const rightWrist: MarkerTrack = {
      x: time.map((t) => 300 + 100 * Math.sin(Math.PI * t)),
      y: new Array<number>(N).fill(0),
    };

    const view = processCameraView(
      table({ leftShoulder: gone, rightShoulder: gone, rightWrist }),
      DEFAULT_PIPELINE_CONFIG,
    );

    expect(view.limbs.RH.crossings).toEqual([]);
    expect(view.limbs.RH.useSignal.every((v) => v === 0)).toBe(true);
  });

  it("logs crossings and rejection reasons per camera and limb", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});

    processCameraView(table(), DEFAULT_PIPELINE_CONFIG);

    expect(debug).toHaveBeenCalledWith(
      "[Detect:Camera5:RH] 0 crossings, 0 raw segments, rejected: gap 0, too_fast 0, too_slow 0",
    );
    expect(debug).toHaveBeenCalledWith(
      "[Detect:Camera5:LH] 0 crossings, 0 raw segments, rejected: gap 0, too_fast 0, too_slow 0",
    );
  });

  it("exposes one limb as fusion input", () => {
    const view = processCameraView(table(), DEFAULT_PIPELINE_CONFIG);
    const lh = toViewResult(view, "LH");

    expect(lh.cameraId).toBe(5);
    expect(lh.time).toBe(view.time);
    expect(lh.useSignal).toBe(view.limbs.LH.useSignal);
    expect(lh.filteredDistance).toBe(view.limbs.LH.filteredDistance);
    expect(lh.rawDistance).toBe(view.limbs.LH.rawDistance);
  });
});
