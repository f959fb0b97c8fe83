/**
 * SegmentPipeline
 * ===============
 *
 * A recording segment end to end: every camera view is processed on its own,
 * the results are collected into one array, and each limb is fused across
 * that array.
 *
 * @module analysis/SegmentPipeline
 */

import type { PipelineConfig } from "../lib/config/pipelineConfig";
import type { CameraTable } from "../lib/io/cameraTable";
import { pipelineLog } from "../lib/logger";
import type { BinarySignal, TimeBase } from "../lib/signal/trace";
import { processCameraView, toViewResult, type CameraViewResult } from "./CameraViewProcessor";
import { combineUseSignal, type FusedUseSignal, type Limb } from "./UseSignalFusion";

// ============================================================================
// TYPES
// ============================================================================

/** Both limbs' fused signals over the union of their time bases. */
export interface CombinedUseSignalTable {
    time: number[];
    /** 0/1, NaN where the limb has no sample at that time */
    RH: number[];
    LH: number[];
}

export interface SegmentResult {
    views: CameraViewResult[];
    fused: Record<Limb, FusedUseSignal>;
    combined: CombinedUseSignalTable;
}

// ============================================================================
// ALIGNMENT
// ============================================================================

function alignTo(time: readonly number[], source: TimeBase, values: BinarySignal): number[] {
    const bySample = new Map<number, number>();
    source.forEach((t, i) => bySample.set(t, values[i]));
    return time.map((t) => bySample.get(t) ?? NaN);
}

export function alignUseSignals(rh: FusedUseSignal, lh: FusedUseSignal): CombinedUseSignalTable {
    const time = Array.from(new Set([...rh.time, ...lh.time])).sort((a, b) => a - b);
    return {
        time,
        RH: alignTo(time, rh.time, rh.useSignal),
        LH: alignTo(time, lh.time, lh.useSignal),
    };
}

// ============================================================================
// PIPELINE
// ============================================================================

export function processRecordingSegment(
    tables: readonly CameraTable[],
    config: PipelineConfig,
): SegmentResult {
    if (tables.length === 0) {
        throw new Error("processRecordingSegment: at least one camera table is required");
    }

    const views = tables.map((table) => processCameraView(table, config));
    const limits = { tooFast: config.tooFast, tooSlow: config.tooSlow };

    const fused: Record<Limb, FusedUseSignal> = {
        RH: combineUseSignal(views.map((v) => toViewResult(v, 'RH')), 'RH', limits),
        LH: combineUseSignal(views.map((v) => toViewResult(v, 'LH')), 'LH', limits),
    };

    pipelineLog.debug(
        `Processed ${views.length} views: RH ${fused.RH.segmentCount} movements, LH ${fused.LH.segmentCount} movements`,
    );

    return { views, fused, combined: alignUseSignals(fused.RH, fused.LH) };
}
