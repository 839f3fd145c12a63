import { renderToStaticMarkup } from "react-dom/server";
import type { Point, Spline, DiagnosticsReport } from "./types";
import { SplineView } from "../components/SplineView";

export type SvgDocumentOptions = {
  width?: number;
  height?: number;
  showKnots?: boolean;
  precision?: number;
  diagnostics?: DiagnosticsReport | null;
};

/** Standalone SVG file contents for a spline. */
export function toSvgDocument(spline: Spline, points: readonly Point[], options: SvgDocumentOptions = {}): string {
  const markup = renderToStaticMarkup(
    <SplineView
      spline={spline}
      points={points}
      diagnostics={options.diagnostics}
      width={options.width}
      height={options.height}
      showKnots={options.showKnots ?? false}
      precision={options.precision}
      standalone
    />
  );
  return `<?xml version="1.0" encoding="UTF-8"?>\n${markup}\n`;
}
