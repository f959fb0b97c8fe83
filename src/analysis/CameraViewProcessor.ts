/**
 * CameraViewProcessor
 * ===================
 *
 * Everything one camera view contributes to a recording segment:
 * - wrist-to-origin and wrist-to-shoulder distances per limb (raw + filtered)
 * - backward-difference velocity of the filtered wrist-to-origin distance
 * - adaptive threshold: shoulder width, low-passed at thresholdCutoffHz and
 *   gap-filled so it is defined at every sample
 * - movement detection per limb
 *
 * @module analysis/CameraViewProcessor
 */

import type { PipelineConfig } from "../lib/config/pipelineConfig";
import { distanceToOrigin, euclideanDistance } from "../lib/geometry";
import type { CameraTable, MarkerTrack } from "../lib/io/cameraTable";
import { detectLog } from "../lib/logger";
import { designButterworthLowPass } from "../lib/signal/butterworth";
import { filterWithMask } from "../lib/signal/filterWithMask";
import {
    backwardVelocity,
    countValid,
    fillGapsLinear,
    type BinarySignal,
    type TimeBase,
    type Trace,
} from "../lib/signal/trace";
import { detectMovement } from "./MovementDetector";
import { countRejections } from "./SegmentQuality";
import type { Limb, ViewResult } from "./UseSignalFusion";
import type { ZeroCrossing } from "./ZeroCrossingDetector";

// ============================================================================
// TYPES
// ============================================================================

export interface LimbTrace {
    /** Wrist-to-origin distance */
    rawDistance: Trace;
    filteredDistance: Trace;
    /** Wrist-to-shoulder distance */
    rawShoulderDistance: Trace;
    filteredShoulderDistance: Trace;
    /** Velocity of filteredDistance */
    velocity: Trace;
    useSignal: BinarySignal;
    crossings: ZeroCrossing[];
}

export interface CameraViewResult {
    cameraId: number;
    fileName: string;
    time: TimeBase;
    /** Gap-free adaptive threshold (filtered shoulder width) */
    threshold: Trace;
    limbs: Record<Limb, LimbTrace>;
}

// ============================================================================
// PROCESSING
// ============================================================================

/**
 * Smoothed shoulder width with every gap interpolated. Stays all-gap only
 * when no shoulder sample was observed at all.
 */
export function buildAdaptiveThreshold(shoulderWidth: Trace, config: PipelineConfig): number[] {
    const coeffs = designButterworthLowPass(
        config.filterOrder,
        config.thresholdCutoffHz,
        config.sampleRateHz,
    );
    const filled = fillGapsLinear(filterWithMask(shoulderWidth, coeffs));
    if (countValid(filled) === 0) {
        detectLog.warn("Shoulder width has no valid samples; no movement can be confirmed");
    }
    return filled;
}

function processLimb(
    label: string,
    wrist: MarkerTrack,
    shoulder: MarkerTrack,
    time: TimeBase,
    threshold: Trace,
    config: PipelineConfig,
): LimbTrace {
    const coeffs = designButterworthLowPass(config.filterOrder, config.cutoffHz, config.sampleRateHz);

    const rawDistance = distanceToOrigin(wrist.x, wrist.y);
    const rawShoulderDistance = euclideanDistance(wrist.x, wrist.y, shoulder.x, shoulder.y);
    const filteredDistance = filterWithMask(rawDistance, coeffs);
    const filteredShoulderDistance = filterWithMask(rawShoulderDistance, coeffs);
    const velocity = backwardVelocity(filteredDistance, time);

    const { useSignal, crossings, verdicts } = detectMovement(
        { position: filteredDistance, velocity, threshold, time },
        config,
    );

    const rejected = countRejections(verdicts);
    detectLog.child(label).debug(
        `${crossings.length} crossings, ${verdicts.length} raw segments, rejected: ` +
            `gap ${rejected.gap}, too_fast ${rejected.too_fast}, too_slow ${rejected.too_slow}`,
    );

    return {
        rawDistance,
        filteredDistance,
        rawShoulderDistance,
        filteredShoulderDistance,
        velocity,
        useSignal,
        crossings,
    };
}

export function processCameraView(table: CameraTable, config: PipelineConfig): CameraViewResult {
    const { markers, time } = table;

    const shoulderWidth = euclideanDistance(
        markers.rightShoulder.x,
        markers.rightShoulder.y,
        markers.leftShoulder.x,
        markers.leftShoulder.y,
    );
    const threshold = buildAdaptiveThreshold(shoulderWidth, config);

    return {
        cameraId: table.cameraId,
        fileName: table.fileName,
        time,
        threshold,
        limbs: {
            RH: processLimb(
                `Camera${table.cameraId}:RH`,
                markers.rightWrist,
                markers.rightShoulder,
                time,
                threshold,
                config,
            ),
            LH: processLimb(
                `Camera${table.cameraId}:LH`,
                markers.leftWrist,
                markers.leftShoulder,
                time,
                threshold,
                config,
            ),
        },
    };
}

/** Fusion input for one limb of a processed view. */
export function toViewResult(view: CameraViewResult, limb: Limb): ViewResult {
    const trace = view.limbs[limb];
    return {
        cameraId: view.cameraId,
        time: view.time,
        useSignal: trace.useSignal,
        filteredDistance: trace.filteredDistance,
        rawDistance: trace.rawDistance,
    };
}
