import type { Point, SegmentGeometry } from "../types";
import { DegenerateSegmentError, InvalidArgumentError } from "../errors";
import { sub, len } from "./Bezier";

/**
 * Joining-line record for every interior knot, in knot order.
 * Throws DegenerateSegmentError when a knot's two neighbours coincide and
 * InvalidArgumentError when their distance overflows.
 */
export function segmentGeometry(points: readonly Point[]): SegmentGeometry[] {
  const out: SegmentGeometry[] = [];
  for (let i = 1; i < points.length - 1; i++) {
    const joining = sub(points[i + 1], points[i - 1]);
    const length = len(joining);
    if (length === 0) throw new DegenerateSegmentError(i + 1, "flanking");
    if (!Number.isFinite(length)) {
      throw new InvalidArgumentError(`joining line of knot ${i + 1} overflows the number range`);
    }
    const unit = { x: joining.x / length, y: joining.y / length };
    out.push({
      index: i + 1,
      joining,
      length,
      unit,
      normalA: { x: -unit.y, y: unit.x },
      normalB: { x: unit.y, y: -unit.x },
    });
  }
  return out;
}
