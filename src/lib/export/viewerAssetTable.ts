import type { CameraViewResult } from "../../analysis/CameraViewProcessor";
import { LIMBS } from "../../analysis/UseSignalFusion";

const LIMB_COLUMNS = [
  "Dist_to_Ori_raw",
  "Dist_to_Ori_filt",
  "Dist_to_Should_raw",
  "Dist_to_Should_filt",
  "Dist_to_Ori_vel",
  "Use_Signal",
] as const;

/** Gaps are written as `NaN`; everything else at full precision. */
export function formatCsvValue(value: number): string {
  return Number.isNaN(value) ? "NaN" : String(value);
}

export function viewerAssetHeader(): string[] {
  return [
    "Time",
    ...LIMBS.flatMap((limb) => LIMB_COLUMNS.map((col) => `${limb}_${col}`)),
  ];
}

/**
 * Per-sample table of one processed camera view, read by the review viewer.
 */
export function buildViewerAssetCsv(view: CameraViewResult): string {
  const lines: string[] = [viewerAssetHeader().join(",")];

  for (let i = 0; i < view.time.length; i++) {
    const row: number[] = [view.time[i]];
    for (const limb of LIMBS) {
      const trace = view.limbs[limb];
      row.push(
        trace.rawDistance[i],
        trace.filteredDistance[i],
        trace.rawShoulderDistance[i],
        trace.filteredShoulderDistance[i],
        trace.velocity[i],
        trace.useSignal[i],
      );
    }
    lines.push(row.map(formatCsvValue).join(","));
  }

  return lines.join("\n");
}
