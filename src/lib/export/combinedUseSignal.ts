import type { CombinedUseSignalTable } from "../../analysis/SegmentPipeline";
import { formatCsvValue } from "./viewerAssetTable";

export const COMBINED_USE_SIGNAL_FILE = "UseSignal.csv";

/** `Time,RH,LH` over the union of both limbs' timestamps. */
export function buildCombinedUseSignalCsv(table: CombinedUseSignalTable): string {
  const lines = ["Time,RH,LH"];
  table.time.forEach((t, i) => {
    lines.push([t, table.RH[i], table.LH[i]].map(formatCsvValue).join(","));
  });
  return lines.join("\n");
}
