import type { Point } from "./types";

export const MIN_KNOTS = 3;
export const SCALING_MIN = 0;
export const SCALING_MAX = 1;
export const DEFAULT_SCALING = 0.4;
export const RECOMMENDED_SCALING = { min: 0.33, max: 0.5 } as const;

export type CanvasConfig = {
  width: number;
  height: number;
  padding: number;
};

export const CANVAS: CanvasConfig = {
  width: 300,
  height: 240,
  padding: 20,
};

export type SplineStyle = {
  stroke: string;
  strokeWidth: number;
  knotRadius: number;
  knotFill: string;
};

export type OverlayStyle = {
  joiningStroke: string;
  controlStroke: string;
  handleFill: string;
  handleRadius: number;
  dash: string;
};

export const SPLINE_STYLE: SplineStyle = {
  stroke: "#1f2937",
  strokeWidth: 2,
  knotRadius: 3,
  knotFill: "#ef4444",
};

export const OVERLAY_STYLE: OverlayStyle = {
  joiningStroke: "#9ca3af",
  controlStroke: "#10b981",
  handleFill: "#06b6d4",
  handleRadius: 2.5,
  dash: "4 3",
};

export const DIAGNOSTICS_PRECISION = 3;

export const SAMPLE_POINTS: Point[] = [
  { x: 50, y: 182 },
  { x: 100, y: 166 },
  { x: 150, y: 87 },
  { x: 200, y: 191 },
  { x: 250, y: 106 },
];

export function isRecommendedScaling(scaling: number): boolean {
  return scaling >= RECOMMENDED_SCALING.min && scaling <= RECOMMENDED_SCALING.max;
}
