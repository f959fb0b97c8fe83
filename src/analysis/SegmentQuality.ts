/**
 * SegmentQuality
 * ==============
 *
 * Post-hoc checks on the "on" runs of a use signal. A run is dropped when:
 * - it holds maxAllowedGap consecutive missing position samples
 * - its length is <= tooFast or >= tooSlow
 *
 * Dropped runs are zeroed; kept runs are left untouched.
 *
 * @module analysis/SegmentQuality
 */

import {
    assertSameLength,
    isGap,
    type BinarySignal,
    type Trace,
    type UseSample,
} from "../lib/signal/trace";

// ============================================================================
// TYPES
// ============================================================================

/** Maximal run of "on" samples, inclusive bounds. */
export interface Segment {
    start: number;
    end: number;
    length: number;
}

export interface DurationLimits {
    /** Runs this short or shorter are rejected */
    tooFast: number;
    /** Runs this long or longer are rejected */
    tooSlow: number;
}

export interface QualityLimits extends DurationLimits {
    /** Consecutive missing samples that reject a run */
    maxAllowedGap: number;
}

export type SegmentRejection = 'gap' | 'too_fast' | 'too_slow';

export interface SegmentVerdict {
    segment: Segment;
    rejection: SegmentRejection | null;
}

// ============================================================================
// SEGMENTS
// ============================================================================

export function findSegments(signal: BinarySignal): Segment[] {
    const segments: Segment[] = [];
    let start = -1;

    for (let i = 0; i < signal.length; i++) {
        if (signal[i] === 1 && start < 0) {
            start = i;
        } else if (signal[i] === 0 && start >= 0) {
            segments.push({ start, end: i - 1, length: i - start });
            start = -1;
        }
    }
    if (start >= 0) {
        segments.push({ start, end: signal.length - 1, length: signal.length - start });
    }
    return segments;
}

export function countSegments(signal: BinarySignal): number {
    return findSegments(signal).length;
}

/**
 * True when some window of maxAllowedGap consecutive samples inside the
 * segment is entirely missing.
 */
export function hasGapRun(position: Trace, segment: Segment, maxAllowedGap: number): boolean {
    let run = 0;
    for (let i = segment.start; i <= segment.end; i++) {
        run = isGap(position[i]) ? run + 1 : 0;
        if (run >= maxAllowedGap) return true;
    }
    return false;
}

function durationRejection(segment: Segment, limits: DurationLimits): SegmentRejection | null {
    if (segment.length <= limits.tooFast) return 'too_fast';
    if (segment.length >= limits.tooSlow) return 'too_slow';
    return null;
}

/** Zero every rejected segment. */
export function applyVerdicts(signal: BinarySignal, verdicts: readonly SegmentVerdict[]): UseSample[] {
    const out = [...signal];
    for (const { segment, rejection } of verdicts) {
        if (rejection === null) continue;
        for (let i = segment.start; i <= segment.end; i++) out[i] = 0;
    }
    return out;
}

/** Rejected segments per reason. */
export function countRejections(verdicts: readonly SegmentVerdict[]): Record<SegmentRejection, number> {
    const counts: Record<SegmentRejection, number> = { gap: 0, too_fast: 0, too_slow: 0 };
    for (const { rejection } of verdicts) {
        if (rejection !== null) counts[rejection]++;
    }
    return counts;
}

// ============================================================================
// FILTERS
// ============================================================================

/**
 * Verdict for every segment: gap rule first, then duration.
 */
export function judgeSegments(
    signal: BinarySignal,
    position: Trace,
    limits: QualityLimits,
): SegmentVerdict[] {
    assertSameLength("judgeSegments", { signal, position });
    return findSegments(signal).map((segment) => ({
        segment,
        rejection: hasGapRun(position, segment, limits.maxAllowedGap)
            ? 'gap'
            : durationRejection(segment, limits),
    }));
}

/**
 * Duration rule only. Applying it twice gives the same signal.
 */
export function filterSegmentsByDuration(signal: BinarySignal, limits: DurationLimits): UseSample[] {
    const verdicts = findSegments(signal).map((segment) => ({
        segment,
        rejection: durationRejection(segment, limits),
    }));
    return applyVerdicts(signal, verdicts);
}

/**
 * Gap rule and duration rule against the position trace.
 */
export function filterSegmentsByQuality(
    signal: BinarySignal,
    position: Trace,
    limits: QualityLimits,
): UseSample[] {
    return applyVerdicts(signal, judgeSegments(signal, position, limits));
}
