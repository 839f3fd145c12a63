import type { Point, Spline, SynthesizeOptions } from "../types";
import { InvalidArgumentError, DegenerateSegmentError } from "../errors";
import { MIN_KNOTS, SCALING_MIN, SCALING_MAX } from "../config";
import { segmentGeometry } from "./SegmentGeometry";
import { placeAllHandles } from "./HandlePlacement";
import { resolveEndControls } from "./EndKnots";
import { assembleSpline } from "./PathAssembler";
import { buildDiagnostics } from "../diagnostics";

function validate(points: readonly Point[], scaling: number): void {
  if (points.length < MIN_KNOTS) {
    throw new InvalidArgumentError(`a spline needs at least ${MIN_KNOTS} points, got ${points.length}`);
  }
  if (!Number.isFinite(scaling) || scaling < SCALING_MIN || scaling > SCALING_MAX) {
    throw new InvalidArgumentError(`scaling must be within [${SCALING_MIN}, ${SCALING_MAX}], got ${scaling}`);
  }
  points.forEach((p, i) => {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
      throw new InvalidArgumentError(`point ${i + 1} has a non-finite coordinate (${p.x}, ${p.y})`);
    }
  });
  for (let i = 1; i < points.length; i++) {
    const a = points[i - 1];
    const b = points[i];
    if (a.x === b.x && a.y === b.y) throw new DegenerateSegmentError(i, "adjacent");
  }
}

/**
 * Build a smooth spline through `points`.
 *
 * Interior knots get two handles on a line parallel to their neighbours' joining
 * line; the end segments are quadratics borrowing the nearest interior handle.
 * `scaling` in [0, 1] sets the curviness, 0 gives the straight polyline.
 */
export function synthesizeSpline(points: readonly Point[], scaling: number, options: SynthesizeOptions = {}): Spline {
  validate(points, scaling);
  const geometry = segmentGeometry(points);
  const handles = placeAllHandles(points, geometry, scaling);
  const ends = resolveEndControls(handles);
  const spline = assembleSpline(points, handles, ends);
  if (options.onDiagnostics) {
    options.onDiagnostics(buildDiagnostics(points, scaling, geometry, handles, spline));
  }
  return spline;
}
