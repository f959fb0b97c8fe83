/**
 * Gap-Preserving Filter
 *
 * Marker dropouts leave gaps in a trace. The valid samples are compacted into
 * one block, zero-phase filtered, and written back to their own indices; gap
 * indices stay gaps in the output.
 *
 * @module lib/signal/filterWithMask
 */

import { filterLog } from "../logger";
import type { FilterCoefficients } from "./butterworth";
import { FilterError, filtfilt, minFiltfiltLength } from "./filtfilt";
import { allGaps, isGap, type Trace } from "./trace";

/** Fewer valid samples than this and the trace is not filtered at all. */
export const MIN_VALID_SAMPLES = 7;

export function filterWithMask(trace: Trace, coeffs: FilterCoefficients): number[] {
  const filtered = allGaps(trace.length);

  const validIdx: number[] = [];
  trace.forEach((v, i) => {
    if (!isGap(v)) validIdx.push(i);
  });

  // Higher filter orders need more than the fixed minimum
  const needed = Math.max(MIN_VALID_SAMPLES, minFiltfiltLength(coeffs));
  if (validIdx.length < needed) {
    filterLog.debug(`Skipping filter: ${validIdx.length} valid samples (need ${needed})`);
    return filtered;
  }

  let result: number[];
  try {
    result = filtfilt(
      coeffs,
      validIdx.map((i) => trace[i]),
    );
  } catch (err) {
    if (err instanceof FilterError) {
      filterLog.warn(
        `Filtering failed for a segment, possibly due to insufficient or unstable data: ${err.message}`,
      );
      return filtered;
    }
    throw err;
  }

  validIdx.forEach((idx, k) => {
    filtered[idx] = result[k];
  });
  return filtered;
}
