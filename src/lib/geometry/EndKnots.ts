import type { EndControls, KnotHandles } from "../types";

/**
 * The end knots own no handle of their own: the first quadratic borrows the
 * incoming handle of knot 2, the last one the outgoing handle of knot N-1.
 */
export function resolveEndControls(handles: readonly KnotHandles[]): EndControls {
  if (handles.length === 0) throw new RangeError("resolveEndControls needs at least one interior knot");
  return {
    first: handles[0].incoming,
    last: handles[handles.length - 1].outgoing,
  };
}
