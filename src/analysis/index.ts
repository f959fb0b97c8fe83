/**
 * Analysis Module Barrel Export
 */
export { detectZeroCrossings, findVelocityReversals, type ZeroCrossing, type ZeroCrossingInput } from './ZeroCrossingDetector';
export {
    applySegmentWrites,
    buildUseSignal,
    planSegmentWrites,
    type SegmentBuilderInput,
    type SegmentPlan,
    type SegmentWrite,
    type SegmentWriteReason,
} from './SegmentBuilder';
export {
    applyVerdicts,
    countRejections,
    countSegments,
    filterSegmentsByDuration,
    filterSegmentsByQuality,
    findSegments,
    judgeSegments,
    type DurationLimits,
    type QualityLimits,
    type Segment,
    type SegmentRejection,
    type SegmentVerdict,
} from './SegmentQuality';
export { detectMovement, type MovementDetection, type MovementDetectionInput, type MovementDetectorConfig } from './MovementDetector';

// Multi-view
export { combineUseSignal, selectBaseView, LIMBS, type FusedUseSignal, type Limb, type ViewResult } from './UseSignalFusion';
export { buildAdaptiveThreshold, processCameraView, toViewResult, type CameraViewResult, type LimbTrace } from './CameraViewProcessor';
export { alignUseSignals, processRecordingSegment, type CombinedUseSignalTable, type SegmentResult } from './SegmentPipeline';
export {
    formatFusedReport,
    formatSignificant,
    formatViewReport,
    printReportLines,
    reportSegment,
    summarizeUseSignal,
    type UseSignalSummary,
} from './UseSignalReport';
