export type Vec2 = { readonly x: number; readonly y: number };

/** A knot the spline passes through. */
export type Point = Vec2;

export type SegmentGeometry = {
  index: number;      // 1-based knot index, 2..N-1
  joining: Vec2;      // Point[i+1] - Point[i-1]
  length: number;     // |joining|, always > 0
  unit: Vec2;
  normalA: Vec2;      // joining direction rotated +90°
  normalB: Vec2;      // joining direction rotated -90°
};

export type KnotHandles = {
  index: number;
  angleA: number;     // radians, normal A angle + π/2
  angleB: number;     // radians, normal B angle + π/2
  distPrev: number;   // |Point[i] - Point[i-1]|
  distNext: number;   // |Point[i+1] - Point[i]|
  incomingLength: number;
  outgoingLength: number;
  incoming: Vec2;     // control point of the segment ending at this knot
  outgoing: Vec2;     // control point of the segment starting at this knot
};

export type EndControls = {
  first: Vec2;        // control of the quadratic Point[1] → Point[2]
  last: Vec2;         // control of the quadratic Point[N-1] → Point[N]
};

export type Quadratic = { kind: "quadratic"; start: Vec2; control: Vec2; end: Vec2 };
export type Cubic = { kind: "cubic"; start: Vec2; control1: Vec2; control2: Vec2; end: Vec2 };
export type CurveSegment = Quadratic | Cubic;

export type Spline = {
  start: Point;
  segments: CurveSegment[];
};

export type KnotDiagnostics = SegmentGeometry & KnotHandles & { knot: Point };

export type DiagnosticsReport = {
  scaling: number;
  knotCount: number;
  segmentCount: number;
  knots: KnotDiagnostics[];
};

export type SynthesizeOptions = {
  onDiagnostics?: (report: DiagnosticsReport) => void;
};
