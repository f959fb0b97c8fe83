/**
 * UseSignalReport
 * ===============
 *
 * Movement counts and rates for a use signal, plus the one-line summaries the
 * batch run prints.
 *
 * @module analysis/UseSignalReport
 */

import { pipelineLog, type Logger } from "../lib/logger";
import type { BinarySignal, TimeBase } from "../lib/signal/trace";
import type { SegmentResult } from "./SegmentPipeline";
import { countSegments } from "./SegmentQuality";
import { LIMBS, type Limb } from "./UseSignalFusion";

export interface UseSignalSummary {
    segmentCount: number;
    /** Last minus first timestamp, in minutes */
    durationMinutes: number;
    /** Movements per minute; NaN for a zero-length recording */
    ratePerMinute: number;
}

export function summarizeUseSignal(time: TimeBase, signal: BinarySignal): UseSignalSummary {
    const segmentCount = countSegments(signal);
    const durationMinutes = time.length > 1 ? (time[time.length - 1] - time[0]) / 60 : 0;
    return {
        segmentCount,
        durationMinutes,
        ratePerMinute: durationMinutes > 0 ? segmentCount / durationMinutes : NaN,
    };
}

/** Three significant digits, without trailing zeros ("2.67", "1.5", "120"). */
export function formatSignificant(value: number, digits: number = 3): string {
    if (!Number.isFinite(value)) return String(value);
    return String(Number(value.toPrecision(digits)));
}

function movementsText(summary: UseSignalSummary): string {
    return (
        `Number of movements: ${summary.segmentCount} in ` +
        `${formatSignificant(summary.durationMinutes)} minutes ` +
        `(${formatSignificant(summary.ratePerMinute)} moves/min)`
    );
}

export function formatViewReport(cameraId: number, limb: Limb, summary: UseSignalSummary): string {
    return `Camera ${cameraId} - ${limb} - ${movementsText(summary)}`;
}

export function formatFusedReport(baseCameraId: number, limb: Limb, summary: UseSignalSummary): string {
    return `Combined (Base: Camera ${baseCameraId}) - ${limb} - ${movementsText(summary)}`;
}

/** Per-view lines for both limbs, then the fused line per limb. */
export function reportSegment(result: SegmentResult): string[] {
    const lines: string[] = [];
    for (const view of result.views) {
        for (const limb of LIMBS) {
            const summary = summarizeUseSignal(view.time, view.limbs[limb].useSignal);
            lines.push(formatViewReport(view.cameraId, limb, summary));
        }
    }
    for (const limb of LIMBS) {
        const fused = result.fused[limb];
        lines.push(formatFusedReport(fused.baseCameraId, limb, summarizeUseSignal(fused.time, fused.useSignal)));
    }
    return lines;
}

/** Report lines are printed in production too, unlike plain info logs. */
export function printReportLines(lines: readonly string[], logger: Logger = pipelineLog): void {
    for (const line of lines) {
        logger.log('info', line, undefined, { force: true });
    }
}
