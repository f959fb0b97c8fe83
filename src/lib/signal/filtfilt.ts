/**
 * Zero-Phase IIR Filtering
 *
 * Forward-backward filtering (filtfilt) for offline traces:
 * - Odd reflection padding of 3 * (nfilt - 1) samples at each end
 * - Steady-state initial conditions scaled by the first padded sample
 * - Direct-form II transposed core (lfilter)
 *
 * @module lib/signal/filtfilt
 */

import type { FilterCoefficients } from "./butterworth";

/** Raised when coefficients or data make filtering impossible. */
export class FilterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FilterError";
  }
}

// ============================================
// Coefficient handling
// ============================================

/** Pad b and a to equal length and normalise so a[0] = 1. */
function normalizeCoefficients({ b, a }: FilterCoefficients): FilterCoefficients {
  if (a.length === 0 || b.length === 0) {
    throw new FilterError("Filter coefficients must not be empty");
  }
  if ([...a, ...b].some((v) => !Number.isFinite(v))) {
    throw new FilterError("Filter coefficients must be finite");
  }
  if (a[0] === 0) {
    throw new FilterError("Leading denominator coefficient must be non-zero");
  }

  const nfilt = Math.max(a.length, b.length);
  const a0 = a[0];
  const padTo = (arr: number[]) =>
    Array.from({ length: nfilt }, (_, i) => (i < arr.length ? arr[i] / a0 : 0));

  return { b: padTo(b), a: padTo(a) };
}

/** Solve M x = rhs by Gaussian elimination with partial pivoting. */
function solveLinear(matrix: number[][], rhs: number[]): number[] {
  const n = rhs.length;
  const m = matrix.map((row, i) => [...row, rhs[i]]);

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r][col]) > Math.abs(m[pivot][col])) pivot = r;
    }
    if (Math.abs(m[pivot][col]) < 1e-12) {
      throw new FilterError("Initial-condition system is singular");
    }
    [m[col], m[pivot]] = [m[pivot], m[col]];

    for (let r = col + 1; r < n; r++) {
      const f = m[r][col] / m[col][col];
      for (let c = col; c <= n; c++) m[r][c] -= f * m[col][c];
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    let acc = m[r][n];
    for (let c = r + 1; c < n; c++) acc -= m[r][c] * x[c];
    x[r] = acc / m[r][r];
  }
  return x;
}

/**
 * Steady-state delay-line state for a unit step input.
 * Solves (I - A^T) zi = b[1:] - b[0] * a[1:] with A the companion matrix of a.
 */
export function lfilterZi(coeffs: FilterCoefficients): number[] {
  const { b, a } = normalizeCoefficients(coeffs);
  const n = a.length - 1;
  if (n === 0) return [];

  const matrix: number[][] = [];
  for (let i = 0; i < n; i++) {
    const row = new Array<number>(n).fill(0);
    row[i] = 1;
    row[0] += a[i + 1];
    if (i + 1 < n) row[i + 1] -= 1;
    matrix.push(row);
  }
  const rhs = Array.from({ length: n }, (_, i) => b[i + 1] - b[0] * a[i + 1]);
  return solveLinear(matrix, rhs);
}

// ============================================
// Filtering
// ============================================

/**
 * Causal IIR filter (direct-form II transposed).
 * @param zi - Initial delay-line state (length nfilt - 1), zeros by default
 */
export function lfilter(
  coeffs: FilterCoefficients,
  x: readonly number[],
  zi?: readonly number[],
): number[] {
  const { b, a } = normalizeCoefficients(coeffs);
  const order = a.length - 1;
  const z = zi ? [...zi] : new Array<number>(order).fill(0);
  if (z.length !== order) {
    throw new FilterError(`Initial state must have ${order} values, got ${z.length}`);
  }

  const y = new Array<number>(x.length);
  for (let n = 0; n < x.length; n++) {
    const xn = x[n];
    const yn = b[0] * xn + (order > 0 ? z[0] : 0);
    for (let i = 0; i < order - 1; i++) {
      z[i] = b[i + 1] * xn + z[i + 1] - a[i + 1] * yn;
    }
    if (order > 0) {
      z[order - 1] = b[order] * xn - a[order] * yn;
    }
    y[n] = yn;
  }
  return y;
}

/**
 * Minimum number of samples filtfilt accepts for these coefficients.
 */
export function minFiltfiltLength(coeffs: FilterCoefficients): number {
  const nfilt = Math.max(coeffs.a.length, coeffs.b.length);
  return Math.max(1, 3 * (nfilt - 1)) + 1;
}

/**
 * Zero-phase forward-backward filtering.
 * Throws FilterError when the data is shorter than minFiltfiltLength, when
 * the coefficients are unusable, or when the result is not finite.
 */
export function filtfilt(coeffs: FilterCoefficients, x: readonly number[]): number[] {
  const normalized = normalizeCoefficients(coeffs);
  const nfilt = normalized.a.length;
  const nfact = Math.max(1, 3 * (nfilt - 1));
  const len = x.length;

  if (len <= nfact) {
    throw new FilterError(
      `Data must have more than ${nfact} samples for a filter with ${nfilt} taps, got ${len}`,
    );
  }

  const zi = lfilterZi(normalized);

  // Odd reflection about the end points
  const padded: number[] = [];
  for (let i = nfact; i >= 1; i--) padded.push(2 * x[0] - x[i]);
  for (let i = 0; i < len; i++) padded.push(x[i]);
  for (let i = len - 2; i >= len - 1 - nfact; i--) padded.push(2 * x[len - 1] - x[i]);

  const forward = lfilter(
    normalized,
    padded,
    zi.map((v) => v * padded[0]),
  );
  forward.reverse();
  const backward = lfilter(
    normalized,
    forward,
    zi.map((v) => v * forward[0]),
  );
  backward.reverse();

  const out = backward.slice(nfact, nfact + len);
  if (out.some((v) => !Number.isFinite(v))) {
    throw new FilterError("Filter output is not finite");
  }
  return out;
}
