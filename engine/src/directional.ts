import { bearingToVector, destinationPoint, normalizeBearing } from "./bearing.js";
import { InvalidParameterError, requireFinite, requireFinitePoint, requirePositive } from "./errors.js";
import type { DirectionalFanSpec, DirectionalRectangleSpec, Point, Polygon } from "./types.js";

export const DEFAULT_FAN_SEGMENTS = 64;

/**
 * Rectangle whose long axis runs from `base` along the bearing for `distance`,
 * centred width-wise on that axis. Returned counter-clockwise and closed.
 */
export function buildRectangle(spec: DirectionalRectangleSpec): Polygon {
  requireFinitePoint("base", spec.base);
  requirePositive("distance", spec.distance);
  requirePositive("width", spec.width);
  requireFinite("angle", spec.angle);

  const [dx, dy] = bearingToVector(spec.angle);
  const half = spec.width / 2;
  // right-hand normal of the travel direction
  const ox = dy * half;
  const oy = -dx * half;
  const [bx, by] = spec.base;
  const [tx, ty] = destinationPoint(spec.base, spec.distance, spec.angle);

  return [
    [bx + ox, by + oy],
    [tx + ox, ty + oy],
    [tx - ox, ty - oy],
    [bx - ox, by - oy],
    [bx + ox, by + oy],
  ];
}

/** Start and end bearings of a clockwise sweep; equal angles sweep the full circle. */
export function fanSweep(angle1: number, angle2: number): { start: number; end: number } {
  const start = normalizeBearing(angle1);
  let end = normalizeBearing(angle2);
  if (end <= start) end += 360;
  return { start, end };
}

/**
 * Circular sector swept clockwise from `angle1` to `angle2`.
 * Ring order: base, arc points in sweep order, base.
 */
export function buildFan(spec: DirectionalFanSpec, segments: number = DEFAULT_FAN_SEGMENTS): Polygon {
  requireFinitePoint("base", spec.base);
  requirePositive("distance", spec.distance);
  requireFinite("angle1", spec.angle1);
  requireFinite("angle2", spec.angle2);
  if (!Number.isInteger(segments) || segments < 1) {
    throw new InvalidParameterError(`segments must be a positive integer, got ${segments}`);
  }

  const { start, end } = fanSweep(spec.angle1, spec.angle2);
  const step = (end - start) / segments;
  const base: Point = [spec.base[0], spec.base[1]];
  const arc: Point[] = [];
  for (let i = 0; i <= segments; i++) {
    arc.push(destinationPoint(base, spec.distance, start + i * step));
  }
  return [base, ...arc, [base[0], base[1]]];
}
