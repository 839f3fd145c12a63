import type { Point, SegmentGeometry, KnotHandles, Spline, DiagnosticsReport, Vec2 } from "./types";
import { DIAGNOSTICS_PRECISION } from "./config";

export function buildDiagnostics(
  points: readonly Point[],
  scaling: number,
  geometry: readonly SegmentGeometry[],
  handles: readonly KnotHandles[],
  spline: Spline
): DiagnosticsReport {
  return {
    scaling,
    knotCount: points.length,
    segmentCount: spline.segments.length,
    knots: geometry.map((g, k) => ({ ...g, ...handles[k], knot: points[g.index - 1] })),
  };
}

const fmt = (n: number, digits: number) => n.toFixed(digits);
const fmtVec = (v: Vec2, digits: number) => `${fmt(v.x, digits)},${fmt(v.y, digits)}`;

export const DIAGNOSTICS_COLUMNS = [
  "knot",
  "point",
  "joining",
  "length",
  "unit",
  "normalA",
  "normalB",
  "angleA",
  "angleB",
  "incoming",
  "outgoing",
] as const;

export type DiagnosticsColumn = (typeof DIAGNOSTICS_COLUMNS)[number];

/** One row of display strings per interior knot, keyed by column. */
export function diagnosticsRows(report: DiagnosticsReport, digits = DIAGNOSTICS_PRECISION): Record<DiagnosticsColumn, string>[] {
  return report.knots.map(k => ({
    knot: String(k.index),
    point: fmtVec(k.knot, digits),
    joining: fmtVec(k.joining, digits),
    length: fmt(k.length, digits),
    unit: fmtVec(k.unit, digits),
    normalA: fmtVec(k.normalA, digits),
    normalB: fmtVec(k.normalB, digits),
    angleA: fmt(k.angleA, digits),
    angleB: fmt(k.angleB, digits),
    incoming: fmtVec(k.incoming, digits),
    outgoing: fmtVec(k.outgoing, digits),
  }));
}

/** Plain-text table, columns left-aligned and separated by two spaces. */
export function formatDiagnosticsTable(report: DiagnosticsReport, digits = DIAGNOSTICS_PRECISION): string {
  const rows = diagnosticsRows(report, digits);
  const widths = DIAGNOSTICS_COLUMNS.map(col =>
    Math.max(col.length, ...rows.map(r => r[col].length))
  );
  const line = (cells: string[]) => cells.map((c, j) => c.padEnd(widths[j])).join("  ").trimEnd();
  const header = `scaling ${report.scaling}, ${report.knotCount} knots, ${report.segmentCount} segments`;
  return [
    header,
    line([...DIAGNOSTICS_COLUMNS]),
    ...rows.map(r => line(DIAGNOSTICS_COLUMNS.map(col => r[col]))),
  ].join("\n");
}
