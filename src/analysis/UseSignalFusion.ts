/**
 * UseSignalFusion
 * ===============
 *
 * Merges the use signals of several cameras watching the same limb.
 *
 * Logic:
 * - Base view: the view with the most movement segments (first wins a tie)
 * - Where the base view's filtered distance is missing, take the use value
 *   of the first other view (input order) that shares the timestamp and has
 *   a defined filtered distance there
 * - Re-apply the duration rule to the merged signal
 *
 * Cameras are rarely occluded at the same moment, so the base view keeps the
 * movement count honest while the others patch its dropouts.
 *
 * @module analysis/UseSignalFusion
 */

import { fusionLog } from "../lib/logger";
import {
    assertSameLength,
    isGap,
    type BinarySignal,
    type TimeBase,
    type Trace,
    type UseSample,
} from "../lib/signal/trace";
import { countSegments, filterSegmentsByDuration, type DurationLimits } from "./SegmentQuality";

// ============================================================================
// TYPES
// ============================================================================

export type Limb = 'RH' | 'LH';

export const LIMBS: readonly Limb[] = ['RH', 'LH'];

/** One camera's contribution for one limb. */
export interface ViewResult {
    cameraId: number;
    time: TimeBase;
    useSignal: BinarySignal;
    filteredDistance: Trace;
    rawDistance: Trace;
}

export interface FusedUseSignal {
    limb: Limb;
    /** Camera whose signal and time base the result follows */
    baseCameraId: number;
    time: TimeBase;
    useSignal: BinarySignal;
    /** Base view's raw distance, for reporting */
    rawDistance: Trace;
    segmentCount: number;
    /** Samples taken from other views */
    filledSamples: number;
}

// ============================================================================
// FUSION
// ============================================================================

/**
 * Index of the view with the most segments; ties go to the earliest view.
 */
export function selectBaseView(views: readonly ViewResult[]): number {
    if (views.length === 0) {
        throw new Error("selectBaseView: at least one view is required");
    }
    let best = 0;
    let bestCount = countSegments(views[0].useSignal);
    for (let i = 1; i < views.length; i++) {
        const count = countSegments(views[i].useSignal);
        if (count > bestCount) {
            best = i;
            bestCount = count;
        }
    }
    return best;
}

function validateView(view: ViewResult): void {
    assertSameLength(`camera ${view.cameraId}`, {
        time: view.time,
        useSignal: view.useSignal,
        filteredDistance: view.filteredDistance,
        rawDistance: view.rawDistance,
    });
}

/**
 * Fuse one limb's views into a single use signal.
 * Throws when no view is supplied.
 */
export function combineUseSignal(
    views: readonly ViewResult[],
    limb: Limb,
    limits: DurationLimits,
): FusedUseSignal {
    if (views.length === 0) {
        throw new Error(`combineUseSignal(${limb}): at least one view is required`);
    }
    views.forEach(validateView);

    if (views.length === 1) {
        const [only] = views;
        return {
            limb,
            baseCameraId: only.cameraId,
            time: only.time,
            useSignal: only.useSignal,
            rawDistance: only.rawDistance,
            segmentCount: countSegments(only.useSignal),
            filledSamples: 0,
        };
    }

    const baseIdx = selectBaseView(views);
    const base = views[baseIdx];
    const merged: UseSample[] = [...base.useSignal];
    const needsFill = base.filteredDistance.map(isGap);
    let filledSamples = 0;

    views.forEach((other, i) => {
        if (i === baseIdx) return;

        const otherIndex = new Map<number, number>();
        other.time.forEach((t, k) => otherIndex.set(t, k));

        for (let j = 0; j < base.time.length; j++) {
            if (!needsFill[j]) continue;
            const k = otherIndex.get(base.time[j]);
            if (k === undefined || isGap(other.filteredDistance[k])) continue;

            merged[j] = other.useSignal[k];
            needsFill[j] = false;
            filledSamples++;
        }
    });

    const useSignal = filterSegmentsByDuration(merged, limits);
    const segmentCount = countSegments(useSignal);

    fusionLog.debug(
        `${limb}: base camera ${base.cameraId} of ${views.length}, ${filledSamples} samples filled, ${segmentCount} segments`,
    );

    return {
        limb,
        baseCameraId: base.cameraId,
        time: base.time,
        useSignal,
        rawDistance: base.rawDistance,
        segmentCount,
        filledSamples,
    };
}
