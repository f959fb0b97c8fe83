/**
 * Trace primitives
 *
 * A trace is one sample per camera frame. Unobserved samples hold NaN and
 * propagate through arithmetic; `isGap` is the only way code asks whether a
 * sample is missing.
 */

/** Position, distance or velocity samples. NaN marks a gap. */
export type Trace = readonly number[];

/** Strictly increasing sample timestamps (Unix seconds). */
export type TimeBase = readonly number[];

export type UseSample = 0 | 1;

/** Binary limb-in-use signal. Never holds a gap. */
export type BinarySignal = readonly UseSample[];

export function isGap(value: number): boolean {
  return Number.isNaN(value);
}

export function countValid(trace: Trace): number {
  let n = 0;
  for (const v of trace) {
    if (!isGap(v)) n++;
  }
  return n;
}

export function allGaps(length: number): number[] {
  return new Array<number>(length).fill(NaN);
}

export function assertSameLength(
  context: string,
  traces: Record<string, { length: number }>,
): void {
  const entries = Object.entries(traces);
  if (entries.length === 0) return;
  const [firstName, first] = entries[0];
  for (const [name, trace] of entries.slice(1)) {
    if (trace.length !== first.length) {
      throw new Error(
        `${context}: ${name} has ${trace.length} samples, ${firstName} has ${first.length}`,
      );
    }
  }
}

/**
 * Backward-difference velocity over elapsed time.
 * vel[0] = 0; a gap on either side of a step gives a gap.
 */
export function backwardVelocity(position: Trace, time: TimeBase): number[] {
  assertSameLength("backwardVelocity", { position, time });
  if (position.length === 0) return [];

  const vel = new Array<number>(position.length);
  vel[0] = 0;
  for (let i = 1; i < position.length; i++) {
    vel[i] = (position[i] - position[i - 1]) / (time[i] - time[i - 1]);
  }
  return vel;
}

/**
 * Fill gaps by linear interpolation over sample index, extrapolating the
 * first/last valid pair past the ends. One valid sample fills the trace with
 * its value; a trace with no valid sample is returned as is.
 */
export function fillGapsLinear(trace: Trace): number[] {
  const validIdx: number[] = [];
  trace.forEach((v, i) => {
    if (!isGap(v)) validIdx.push(i);
  });

  if (validIdx.length === 0 || validIdx.length === trace.length) {
    return [...trace];
  }
  if (validIdx.length === 1) {
    return new Array<number>(trace.length).fill(trace[validIdx[0]]);
  }

  const out = [...trace];
  let k = 0; // index into validIdx of the left anchor
  for (let i = 0; i < trace.length; i++) {
    if (!isGap(out[i])) continue;

    while (k < validIdx.length - 2 && validIdx[k + 1] < i) k++;

    const x0 = validIdx[k];
    const x1 = validIdx[k + 1];
    const y0 = trace[x0];
    const y1 = trace[x1];
    out[i] = y0 + ((y1 - y0) * (i - x0)) / (x1 - x0);
  }
  return out;
}
