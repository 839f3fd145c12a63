import type { Spline, Vec2 } from "./types";

export type PathDataOptions = {
  /** Round coordinates to this many decimals; unset keeps full precision. */
  precision?: number;
};

function num(n: number, precision?: number): string {
  if (precision === undefined) return String(n);
  const s = n.toFixed(precision);
  const trimmed = s.includes(".") ? s.replace(/\.?0+$/, "") : s;
  return trimmed === "-0" ? "0" : trimmed;
}

const pt = (p: Vec2, precision?: number) => `${num(p.x, precision)},${num(p.y, precision)}`;

/** Path data: `M x,y` then `Q c e` or `C c1 c2 e` per segment. */
export function toPathData(spline: Spline, options: PathDataOptions = {}): string {
  const { precision } = options;
  const parts = [`M ${pt(spline.start, precision)}`];
  for (const s of spline.segments) {
    parts.push(
      s.kind === "quadratic"
        ? `Q ${pt(s.control, precision)} ${pt(s.end, precision)}`
        : `C ${pt(s.control1, precision)} ${pt(s.control2, precision)} ${pt(s.end, precision)}`
    );
  }
  return parts.join(" ");
}
