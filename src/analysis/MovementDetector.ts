/**
 * MovementDetector
 * ================
 *
 * One limb of one camera view: accepted reversals -> raw use signal ->
 * quality-filtered use signal.
 *
 * @module analysis/MovementDetector
 */

import type { PipelineConfig } from "../lib/config/pipelineConfig";
import type { BinarySignal, TimeBase, Trace } from "../lib/signal/trace";
import { buildUseSignal } from "./SegmentBuilder";
import { applyVerdicts, judgeSegments, type SegmentVerdict } from "./SegmentQuality";
import { detectZeroCrossings, type ZeroCrossing } from "./ZeroCrossingDetector";

export type MovementDetectorConfig = Pick<
    PipelineConfig,
    'shoulderRatio' | 'maxAllowedGap' | 'tooFast' | 'tooSlow'
>;

export interface MovementDetectionInput {
    /** Filtered wrist-to-origin distance */
    position: Trace;
    velocity: Trace;
    /** Gap-free adaptive threshold */
    threshold: Trace;
    time: TimeBase;
}

export interface MovementDetection {
    /** Quality-filtered use signal */
    useSignal: BinarySignal;
    /** Accepted reversals (for visualisation) */
    crossings: ZeroCrossing[];
    /** Verdicts on the raw signal's segments */
    verdicts: SegmentVerdict[];
}

export function detectMovement(
    input: MovementDetectionInput,
    config: MovementDetectorConfig,
): MovementDetection {
    const { position, velocity, threshold, time } = input;

    const crossings = detectZeroCrossings({
        position,
        velocity,
        threshold,
        time,
        shoulderRatio: config.shoulderRatio,
    });

    const raw = buildUseSignal({
        crossings,
        time,
        threshold,
        shoulderRatio: config.shoulderRatio,
    });

    const verdicts = judgeSegments(raw, position, config);
    const useSignal = applyVerdicts(raw, verdicts);

    return { useSignal, crossings, verdicts };
}
