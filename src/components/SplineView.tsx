import React, { useMemo } from "react";
import type { Point, Spline, DiagnosticsReport } from "../lib/types";
import { toPathData } from "../lib/serialization";
import { CANVAS, SPLINE_STYLE, OVERLAY_STYLE } from "../lib/config";

export type SplineViewProps = {
  spline: Spline;
  points: readonly Point[];
  diagnostics?: DiagnosticsReport | null;   // draws construction lines when set
  width?: number;
  height?: number;
  showKnots?: boolean;
  precision?: number;
  standalone?: boolean;                      // adds xmlns for file export
};

export function ConstructionOverlay({ points, report }: { points: readonly Point[]; report: DiagnosticsReport }): React.ReactElement {
  return (
    <g data-layer="diagnostics" fill="none">
      {report.knots.map(k => {
        const prev = points[k.index - 2];
        const next = points[k.index];
        return (
          <g key={`d-${k.index}`} data-knot={k.index}>
            <line
              x1={prev.x} y1={prev.y} x2={next.x} y2={next.y}
              stroke={OVERLAY_STYLE.joiningStroke} strokeDasharray={OVERLAY_STYLE.dash}
            />
            <line
              x1={k.incoming.x} y1={k.incoming.y} x2={k.outgoing.x} y2={k.outgoing.y}
              stroke={OVERLAY_STYLE.controlStroke}
            />
            <circle cx={k.incoming.x} cy={k.incoming.y} r={OVERLAY_STYLE.handleRadius} fill={OVERLAY_STYLE.handleFill} />
            <circle cx={k.outgoing.x} cy={k.outgoing.y} r={OVERLAY_STYLE.handleRadius} fill={OVERLAY_STYLE.handleFill} />
          </g>
        );
      })}
    </g>
  );
}

export function SplineView(props: SplineViewProps): React.ReactElement {
  const {
    spline,
    points,
    diagnostics,
    width = CANVAS.width,
    height = CANVAS.height,
    showKnots = true,
    precision,
    standalone = false,
  } = props;

  const d = useMemo(() => toPathData(spline, { precision }), [spline, precision]);

  return (
    <svg
      xmlns={standalone ? "http://www.w3.org/2000/svg" : undefined}
      width={width}
      height={height}
      viewBox={`0 0 ${width} ${height}`}
    >
      {diagnostics && <ConstructionOverlay points={points} report={diagnostics} />}
      <path d={d} fill="none" stroke={SPLINE_STYLE.stroke} strokeWidth={SPLINE_STYLE.strokeWidth} strokeLinecap="round" />
      {showKnots && (
        <g data-layer="knots">
          {points.map((p, i) => (
            <circle key={`k-${i}`} cx={p.x} cy={p.y} r={SPLINE_STYLE.knotRadius} fill={SPLINE_STYLE.knotFill} />
          ))}
        </g>
      )}
    </svg>
  );
}

export default SplineView;
