import { destinationPoint } from "./bearing.js";
import { requireFinitePoint, requirePositive } from "./errors.js";
import type { HexagonSpec, Point, Polygon } from "./types.js";

export const SQUARE_METRES_PER_HECTARE = 10_000;

const HEX_AREA_FACTOR = (3 * Math.sqrt(3)) / 2;

/** Circumradius (m) of a regular hexagon enclosing `areaHectares`. */
export function hexagonCircumradius(areaHectares: number): number {
  requirePositive("areaHectares", areaHectares);
  return Math.sqrt((areaHectares * SQUARE_METRES_PER_HECTARE) / HEX_AREA_FACTOR);
}

export function hexagonVertices(center: Point, radius: number): Polygon {
  const ring: Polygon = [];
  for (let k = 0; k < 6; k++) {
    ring.push(destinationPoint(center, radius, 30 + 60 * k));
  }
  ring.push([ring[0][0], ring[0][1]]);
  return ring;
}

/**
 * Flat-top regular hexagon of the given area. Vertices sit at bearings
 * 30°, 90°, …, 330° from the centre and the ring is closed.
 */
export function buildHexagon(areaHectares: number, center: Point): Polygon {
  requireFinitePoint("center", center);
  return hexagonVertices(center, hexagonCircumradius(areaHectares));
}

export function buildHexagonFromSpec(spec: HexagonSpec): Polygon {
  return buildHexagon(spec.areaHectares, spec.center);
}
