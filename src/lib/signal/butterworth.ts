/**
 * Butterworth Low-Pass Design
 *
 * Digital Butterworth low-pass coefficients for any order, designed from the
 * analog prototype through the bilinear transform with frequency
 * pre-warping. Coefficients are normalised so a[0] = 1 and DC gain = 1.
 *
 * @module lib/signal/butterworth
 */

// ============================================
// Types
// ============================================

/** Transfer-function coefficients: numerator b, denominator a. */
export interface FilterCoefficients {
  b: number[];
  a: number[];
}

interface Complex {
  re: number;
  im: number;
}

// ============================================
// Complex helpers
// ============================================

function cmul(x: Complex, y: Complex): Complex {
  return { re: x.re * y.re - x.im * y.im, im: x.re * y.im + x.im * y.re };
}

function cdiv(x: Complex, y: Complex): Complex {
  const d = y.re * y.re + y.im * y.im;
  return {
    re: (x.re * y.re + x.im * y.im) / d,
    im: (x.im * y.re - x.re * y.im) / d,
  };
}

/** Expand prod(z - r) into polynomial coefficients, highest power first. */
function polyFromRoots(roots: Complex[]): number[] {
  let coeffs: Complex[] = [{ re: 1, im: 0 }];
  for (const r of roots) {
    const next = new Array<Complex>(coeffs.length + 1);
    for (let i = 0; i < next.length; i++) next[i] = { re: 0, im: 0 };
    for (let i = 0; i < coeffs.length; i++) {
      next[i].re += coeffs[i].re;
      next[i].im += coeffs[i].im;
      const prod = cmul(coeffs[i], r);
      next[i + 1].re -= prod.re;
      next[i + 1].im -= prod.im;
    }
    coeffs = next;
  }
  // Conjugate pole pairs leave only round-off in the imaginary parts
  return coeffs.map((c) => c.re);
}

// ============================================
// Design
// ============================================

/**
 * Design an N-th order Butterworth low-pass filter.
 * @param order - Filter order (>= 1)
 * @param cutoffHz - -3 dB cutoff frequency
 * @param sampleRateHz - Sampling rate
 */
export function designButterworthLowPass(
  order: number,
  cutoffHz: number,
  sampleRateHz: number,
): FilterCoefficients {
  if (!Number.isInteger(order) || order < 1) {
    throw new Error(`Butterworth order must be a positive integer, got ${order}`);
  }
  const wn = cutoffHz / (sampleRateHz / 2);
  if (!(wn > 0 && wn < 1)) {
    throw new Error(
      `Cutoff ${cutoffHz} Hz must lie strictly between 0 and Nyquist (${sampleRateHz / 2} Hz)`,
    );
  }

  // Pre-warped analog cutoff for a bilinear transform at unit sample period
  const warped = Math.tan((Math.PI * wn) / 2);

  // Analog prototype poles on the left half of the unit circle, scaled by cutoff
  const zPoles: Complex[] = [];
  for (let k = 1; k <= order; k++) {
    const theta = (Math.PI * (2 * k + order - 1)) / (2 * order);
    const s: Complex = { re: warped * Math.cos(theta), im: warped * Math.sin(theta) };
    // z = (1 + s) / (1 - s)
    zPoles.push(cdiv({ re: 1 + s.re, im: s.im }, { re: 1 - s.re, im: -s.im }));
  }

  const a = polyFromRoots(zPoles);
  // All zeros at z = -1
  const bRaw = polyFromRoots(new Array<Complex>(order).fill({ re: -1, im: 0 }));

  const sumA = a.reduce((acc, v) => acc + v, 0);
  const sumB = bRaw.reduce((acc, v) => acc + v, 0);
  const gain = sumA / sumB;

  return { b: bRaw.map((v) => v * gain), a };
}
