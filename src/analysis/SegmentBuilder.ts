/**
 * SegmentBuilder
 * ==============
 *
 * Turns accepted zero-crossings into a binary use signal.
 *
 * The crossings are folded left to right, pair by pair. Each pair emits
 * interval writes; the writes are then painted in order onto an all-off
 * signal, so a later pair may overwrite what an earlier pair decided.
 *
 * Per pair (i, i + 1):
 * - first pair: on over [T[i], T[i+1])
 * - swing |P[i+1] - P[i]| below threshold: off over [T[i], T[i+1]) and, if
 *   crossing i + 2 exists, on over [T[i+1], T[i+2])
 * - swing at or above threshold: off at the first sample at/after T[i], on
 *   from the next sample through the last sample before T[i+1]
 *
 * @module analysis/SegmentBuilder
 */

import type { BinarySignal, TimeBase, Trace, UseSample } from "../lib/signal/trace";
import type { ZeroCrossing } from "./ZeroCrossingDetector";

// ============================================================================
// TYPES
// ============================================================================

export type SegmentWriteReason =
    | 'first_swing'      // First pair always opens a movement
    | 'low_swing_off'    // Sub-threshold wiggle cleared
    | 'low_swing_carry'  // Movement assumed to continue past the wiggle
    | 'reversal_off'     // Boundary sample of a confirmed reversal
    | 'reversal_on';     // Body of the movement after a confirmed reversal

export interface SegmentWrite {
    /** First sample index written */
    from: number;
    /** One past the last sample index written */
    to: number;
    value: UseSample;
    /** Crossing pair that produced the write */
    pair: number;
    reason: SegmentWriteReason;
}

export interface SegmentBuilderInput {
    crossings: readonly ZeroCrossing[];
    time: TimeBase;
    /** Adaptive threshold over the full time base */
    threshold: Trace;
    shoulderRatio: number;
}

export interface SegmentPlan {
    /** Writes in the order they are painted */
    writes: SegmentWrite[];
}

// ============================================================================
// TIME HELPERS
// ============================================================================

/** First index with time[i] >= t, or time.length if none. */
function firstAtOrAfter(time: TimeBase, t: number): number {
    let lo = 0;
    let hi = time.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (time[mid] < t) lo = mid + 1;
        else hi = mid;
    }
    return lo;
}

/** Sample range [from, to) covering start <= time < end. */
function timeRange(time: TimeBase, start: number, end: number): { from: number; to: number } {
    return { from: firstAtOrAfter(time, start), to: firstAtOrAfter(time, end) };
}

// ============================================================================
// FOLD
// ============================================================================

function stepPair(
    plan: SegmentPlan,
    pair: number,
    input: SegmentBuilderInput,
): SegmentPlan {
    const { crossings, time, threshold, shoulderRatio } = input;
    const curr = crossings[pair];
    const next = crossings[pair + 1];
    const { writes } = plan;

    if (pair === 0) {
        const range = timeRange(time, curr.timestamp, next.timestamp);
        writes.push({ ...range, value: 1, pair, reason: 'first_swing' });
        return plan;
    }

    const minSwing = threshold[curr.index] * shoulderRatio;
    if (Math.abs(next.position - curr.position) < minSwing) {
        const off = timeRange(time, curr.timestamp, next.timestamp);
        writes.push({ ...off, value: 0, pair, reason: 'low_swing_off' });

        const after = crossings[pair + 2];
        if (after) {
            const carry = timeRange(time, next.timestamp, after.timestamp);
            writes.push({ ...carry, value: 1, pair, reason: 'low_swing_carry' });
        }
        return plan;
    }

    const idxCurrent = firstAtOrAfter(time, curr.timestamp);
    // Last index strictly before the next crossing
    const idxNext = firstAtOrAfter(time, next.timestamp) - 1;
    if (idxCurrent < time.length && idxNext >= 0) {
        writes.push({ from: idxCurrent, to: idxCurrent + 1, value: 0, pair, reason: 'reversal_off' });
        writes.push({ from: idxCurrent + 1, to: idxNext + 1, value: 1, pair, reason: 'reversal_on' });
    }
    return plan;
}

/**
 * Ordered interval writes for every crossing pair.
 */
export function planSegmentWrites(input: SegmentBuilderInput): SegmentPlan {
    const pairs = Math.max(0, input.crossings.length - 1);
    let plan: SegmentPlan = { writes: [] };
    for (let pair = 0; pair < pairs; pair++) {
        plan = stepPair(plan, pair, input);
    }
    return plan;
}

/**
 * Paint writes in order onto an all-off signal of the given length.
 * Empty or inverted ranges write nothing.
 */
export function applySegmentWrites(length: number, writes: readonly SegmentWrite[]): UseSample[] {
    const signal = new Array<UseSample>(length).fill(0);
    for (const w of writes) {
        const from = Math.max(0, w.from);
        const to = Math.min(length, w.to);
        for (let i = from; i < to; i++) signal[i] = w.value;
    }
    return signal;
}

/**
 * Raw use signal from accepted crossings. Fewer than two crossings means no
 * movement.
 */
export function buildUseSignal(input: SegmentBuilderInput): BinarySignal {
    return applySegmentWrites(input.time.length, planSegmentWrites(input).writes);
}
