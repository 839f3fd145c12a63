import type { Point, SegmentGeometry, KnotHandles, Vec2 } from "../types";
import { InvalidArgumentError } from "../errors";
import { dist } from "./Bezier";

const HALF_PI = Math.PI / 2;

function offset(p: Vec2, angle: number, r: number): Vec2 {
  return { x: p.x + Math.cos(angle) * r, y: p.y + Math.sin(angle) * r };
}

/**
 * Place the two handles of one interior knot on its control line.
 *
 * Both normals are turned back by a quarter turn, so the handles sit on the line
 * through the knot parallel to the joining line: angle A points at the previous
 * knot, angle B at the next one. The span `scaling * |joining|` is split in
 * proportion to the two adjacent distances, so a short side gets a short handle.
 */
export function placeHandles(points: readonly Point[], geom: SegmentGeometry, scaling: number): KnotHandles {
  const i = geom.index - 1;
  const knot = points[i];
  const angleA = Math.atan2(geom.normalA.y, geom.normalA.x) + HALF_PI;
  const angleB = Math.atan2(geom.normalB.y, geom.normalB.x) + HALF_PI;

  const distPrev = dist(points[i - 1], knot);
  const distNext = dist(knot, points[i + 1]);
  const total = distPrev + distNext;
  if (!Number.isFinite(total)) {
    throw new InvalidArgumentError(`distances around knot ${geom.index} overflow the number range`);
  }
  const span = scaling * geom.length;
  const incomingLength = span * (distPrev / total);
  const outgoingLength = span * (distNext / total);
  const incoming = offset(knot, angleA, incomingLength);
  const outgoing = offset(knot, angleB, outgoingLength);
  if (![incoming.x, incoming.y, outgoing.x, outgoing.y].every(Number.isFinite)) {
    throw new InvalidArgumentError(`handles of knot ${geom.index} overflow the number range`);
  }

  return {
    index: geom.index,
    angleA,
    angleB,
    distPrev,
    distNext,
    incomingLength,
    outgoingLength,
    incoming,
    outgoing,
  };
}

export function placeAllHandles(
  points: readonly Point[],
  geometry: readonly SegmentGeometry[],
  scaling: number
): KnotHandles[] {
  return geometry.map(g => placeHandles(points, g, scaling));
}
