/**
 * ZeroCrossingDetector
 * ====================
 *
 * Finds velocity reversals in a filtered wrist-distance trace and keeps the
 * ones that swing far enough from a neighbouring reversal.
 *
 * Logic:
 * - Candidate i: vel[i] * vel[i + 1] < 0
 * - Keep a candidate when |pos[c] - pos[neighbour]| >= threshold[c] * shoulderRatio
 *   for its previous or next candidate
 * - The threshold is the smoothed shoulder width, so the acceptance rule
 *   scales with how large the subject appears in the camera
 *
 * @module analysis/ZeroCrossingDetector
 */

import { assertSameLength, type TimeBase, type Trace } from "../lib/signal/trace";

// ============================================================================
// TYPES
// ============================================================================

export interface ZeroCrossing {
    /** Sample index in the position trace */
    index: number;
    timestamp: number;
    position: number;
}

export interface ZeroCrossingInput {
    /** Filtered wrist-to-origin distance */
    position: Trace;
    /** Backward-difference velocity of `position` */
    velocity: Trace;
    /** Gap-free adaptive threshold (filtered shoulder width) */
    threshold: Trace;
    time: TimeBase;
    shoulderRatio: number;
}

// ============================================================================
// DETECTION
// ============================================================================

/**
 * Indices where consecutive velocity samples have opposite sign.
 * A zero or a gap on either side is not a reversal.
 */
export function findVelocityReversals(velocity: Trace): number[] {
    const candidates: number[] = [];
    for (let i = 0; i < velocity.length - 1; i++) {
        if (velocity[i] * velocity[i + 1] < 0) {
            candidates.push(i);
        }
    }
    return candidates;
}

/**
 * Reversals confirmed by an amplitude swing to a neighbouring reversal,
 * in time order.
 */
export function detectZeroCrossings(input: ZeroCrossingInput): ZeroCrossing[] {
    const { position, velocity, threshold, time, shoulderRatio } = input;
    assertSameLength("detectZeroCrossings", { position, velocity, threshold, time });

    const candidates = findVelocityReversals(velocity);
    const accepted: ZeroCrossing[] = [];

    for (let i = 0; i < candidates.length; i++) {
        const idx = candidates[i];
        const current = position[idx];
        const minSwing = threshold[idx] * shoulderRatio;
        let keep = false;

        if (i > 0 && Math.abs(current - position[candidates[i - 1]]) >= minSwing) {
            keep = true;
        }
        if (i < candidates.length - 1 && Math.abs(current - position[candidates[i + 1]]) >= minSwing) {
            keep = true;
        }

        if (keep) {
            accepted.push({ index: idx, timestamp: time[idx], position: current });
        }
    }

    return accepted;
}
