import type { Vec2, Quadratic, Cubic, CurveSegment, Spline } from "../types";

export const add = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x + b.x, y: a.y + b.y });
export const sub = (a: Vec2, b: Vec2): Vec2 => ({ x: a.x - b.x, y: a.y - b.y });
export const mul = (a: Vec2, k: number): Vec2 => ({ x: a.x * k, y: a.y * k });
export const dot = (a: Vec2, b: Vec2): number => a.x * b.x + a.y * b.y;
export const cross = (a: Vec2, b: Vec2): number => a.x * b.y - a.y * b.x;
export const len = (a: Vec2): number => Math.hypot(a.x, a.y);
export const dist = (a: Vec2, b: Vec2): number => Math.hypot(b.x - a.x, b.y - a.y);

export function quadraticPoint(q: Quadratic, t: number): Vec2 {
  const u = 1 - t;
  return {
    x: u * u * q.start.x + 2 * u * t * q.control.x + t * t * q.end.x,
    y: u * u * q.start.y + 2 * u * t * q.control.y + t * t * q.end.y,
  };
}

export function cubicPoint(c: Cubic, t: number): Vec2 {
  // explicit Bernstein blend
  const u = 1 - t;
  const tt = t * t;
  const uu = u * u;
  const uuu = uu * u;
  const ttt = tt * t;
  return {
    x: uuu * c.start.x + 3 * uu * t * c.control1.x + 3 * u * tt * c.control2.x + ttt * c.end.x,
    y: uuu * c.start.y + 3 * uu * t * c.control1.y + 3 * u * tt * c.control2.y + ttt * c.end.y,
  };
}

export function quadraticDerivative(q: Quadratic, t: number): Vec2 {
  const a = mul(sub(q.control, q.start), 2 * (1 - t));
  const b = mul(sub(q.end, q.control), 2 * t);
  return add(a, b);
}

export function cubicDerivative(c: Cubic, t: number): Vec2 {
  const u = 1 - t;
  const a = mul(sub(c.control1, c.start), 3 * u * u);
  const b = mul(sub(c.control2, c.control1), 6 * u * t);
  const d = mul(sub(c.end, c.control2), 3 * t * t);
  return add(add(a, b), d);
}

export function segmentPoint(s: CurveSegment, t: number): Vec2 {
  return s.kind === "quadratic" ? quadraticPoint(s, t) : cubicPoint(s, t);
}

export function segmentDerivative(s: CurveSegment, t: number): Vec2 {
  return s.kind === "quadratic" ? quadraticDerivative(s, t) : cubicDerivative(s, t);
}

/** Uniform samples of every segment, joined without repeating shared knots. */
export function sampleSpline(spline: Spline, stepsPerSegment = 16): Vec2[] {
  const steps = Math.max(1, Math.floor(stepsPerSegment));
  const out: Vec2[] = [spline.start];
  for (const seg of spline.segments) {
    for (let k = 1; k <= steps; k++) out.push(segmentPoint(seg, k / steps));
  }
  return out;
}
