import type { Point } from "./types.js";

const DEG_TO_RAD = Math.PI / 180;

/** Map any bearing in degrees onto [0, 360). */
export function normalizeBearing(angleDeg: number): number {
  return ((angleDeg % 360) + 360) % 360;
}

/**
 * Unit vector for a bearing measured clockwise from north.
 * x is easting and y is northing, so 0° → [0, 1] and 90° → [1, 0].
 */
export function bearingToVector(angleDeg: number): Point {
  const rad = angleDeg * DEG_TO_RAD;
  return [Math.sin(rad), Math.cos(rad)];
}

/** Point reached from `base` after travelling `distance` along a bearing. */
export function destinationPoint(base: Point, distance: number, angleDeg: number): Point {
  const [dx, dy] = bearingToVector(angleDeg);
  return [base[0] + distance * dx, base[1] + distance * dy];
}
