/**
 * Column-wise 2-D marker geometry. A gap in any coordinate yields a gap.
 */

import { assertSameLength, type Trace } from "./signal/trace";

export function euclideanDistance(ax: Trace, ay: Trace, bx: Trace, by: Trace): number[] {
  assertSameLength("euclideanDistance", { ax, ay, bx, by });
  return ax.map((x, i) => Math.hypot(x - bx[i], ay[i] - by[i]));
}

export function distanceToOrigin(x: Trace, y: Trace): number[] {
  assertSameLength("distanceToOrigin", { x, y });
  return x.map((xi, i) => Math.hypot(xi, y[i]));
}
