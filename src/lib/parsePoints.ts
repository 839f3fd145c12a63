import type { Point } from "./types";
import { MalformedInputError, InvalidArgumentError } from "./errors";
import { MIN_KNOTS, SCALING_MIN, SCALING_MAX } from "./config";

const NUM = String.raw`[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?`;
const TOKEN = new RegExp(`^(${NUM}),(${NUM})$`);
const NUMBER = new RegExp(`^${NUM}$`);

/** Parse whitespace-separated `x,y` tokens, e.g. `"50,182 100,166 150,87"`. */
export function parsePoints(text: string): Point[] {
  const tokens = text.trim().split(/\s+/).filter(Boolean);
  const points = tokens.map(token => {
    const m = TOKEN.exec(token);
    if (!m) throw new MalformedInputError(`"${token}" is not a number,number pair`, token);
    return { x: Number(m[1]), y: Number(m[2]) };
  });
  if (points.length < MIN_KNOTS) {
    throw new MalformedInputError(`expected at least ${MIN_KNOTS} points, got ${points.length}`, text);
  }
  return points;
}

export function parseScaling(text: string): number {
  const trimmed = text.trim();
  if (!NUMBER.test(trimmed)) throw new MalformedInputError(`"${trimmed}" is not a number`, trimmed);
  const scaling = Number(trimmed);
  if (scaling < SCALING_MIN || scaling > SCALING_MAX) {
    throw new InvalidArgumentError(`scaling must be within [${SCALING_MIN}, ${SCALING_MAX}], got ${scaling}`);
  }
  return scaling;
}

export function formatPoints(points: readonly Point[]): string {
  return points.map(p => `${p.x},${p.y}`).join(" ");
}
