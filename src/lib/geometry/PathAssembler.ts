import type { Point, KnotHandles, EndControls, CurveSegment, Spline } from "../types";

/**
 * Order knots and controls into draw instructions:
 * quadratic, cubics for every inner pair, quadratic.
 * `handles[k]` belongs to knot k + 2 (1-based).
 */
export function assembleSpline(
  points: readonly Point[],
  handles: readonly KnotHandles[],
  ends: EndControls
): Spline {
  const n = points.length;
  const segments: CurveSegment[] = [
    { kind: "quadratic", start: points[0], control: ends.first, end: points[1] },
  ];

  for (let k = 0; k < handles.length - 1; k++) {
    segments.push({
      kind: "cubic",
      start: points[k + 1],
      control1: handles[k].outgoing,
      control2: handles[k + 1].incoming,
      end: points[k + 2],
    });
  }

  segments.push({ kind: "quadratic", start: points[n - 2], control: ends.last, end: points[n - 1] });
  return { start: points[0], segments };
}
