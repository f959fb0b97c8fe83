/**
 * Data Export Module
 * ==================
 *
 * CSV outputs of a processed recording segment:
 * - Viewer assets: per-view distances, velocities and use signals
 * - UseSignal.csv: fused RH/LH use signal per segment
 *
 * @module export
 */

export {
    buildViewerAssetCsv,
    formatCsvValue,
    viewerAssetHeader,
} from './viewerAssetTable';

export { buildCombinedUseSignalCsv, COMBINED_USE_SIGNAL_FILE } from './combinedUseSignal';
