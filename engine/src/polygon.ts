import { DegenerateExtentError, InvalidParameterError, requireFinite } from "./errors.js";
import type { BBox, Extent, MultiPolygon, Point, Polygon, Ring } from "./types.js";

/** Distinguishes a single ring from a list of rings. */
export function isRing(extent: Extent): extent is Polygon {
  if (extent.length === 0) return true;
  return typeof extent[0][0] === "number";
}

export function extentRings(extent: Extent): MultiPolygon {
  if (isRing(extent)) return extent.length === 0 ? [] : [extent];
  return extent;
}

/** Append the first vertex when the ring is open. */
export function closeRing(points: Point[]): Ring {
  if (points.length === 0) return [];
  const first = points[0];
  const last = points[points.length - 1];
  if (first[0] === last[0] && first[1] === last[1] && points.length > 1) return points.slice();
  return [...points, [first[0], first[1]]];
}

/** Shoelace area; positive for counter-clockwise rings. */
export function signedRingArea(ring: Ring): number {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    const [x1, y1] = ring[i];
    const [x2, y2] = ring[i + 1];
    sum += x1 * y2 - x2 * y1;
  }
  return sum / 2;
}

export function ringArea(ring: Ring): number {
  return Math.abs(signedRingArea(ring));
}

/** Area of a multipolygon in `[polygon][ring][point]` form; holes subtract. */
export function multiPolygonArea(polygons: Point[][][]): number {
  return polygons.reduce((acc, polygon) => {
    const [outer, ...holes] = polygon;
    if (!outer) return acc;
    return acc + ringArea(closeRing(outer)) - holes.reduce((sum, hole) => sum + ringArea(closeRing(hole)), 0);
  }, 0);
}

/**
 * Round every coordinate to a fixed grid (micrometres for metre units) so
 * vertices computed separately for neighbouring cells become identical.
 */
export function snapRing(ring: Point[], scale = 1e6): Ring {
  return ring.map(([x, y]): Point => [Math.round(x * scale) / scale, Math.round(y * scale) / scale]);
}

export function ensureCounterClockwise(ring: Ring): Ring {
  return signedRingArea(ring) < 0 ? ring.slice().reverse() : ring.slice();
}

export function bboxOfExtent(extent: Extent): BBox {
  let minX = Infinity,
    minY = Infinity,
    maxX = -Infinity,
    maxY = -Infinity;
  extentRings(extent).forEach((ring) => {
    ring.forEach(([x, y]) => {
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    });
  });
  if (!Number.isFinite(minX) || !Number.isFinite(minY) || !Number.isFinite(maxX) || !Number.isFinite(maxY)) {
    throw new DegenerateExtentError("Extent has no finite coordinates");
  }
  return { minX, minY, maxX, maxY };
}

export function expandBBox(bbox: BBox, margin: number): BBox {
  requireFinite("margin", margin);
  if (margin < 0) throw new InvalidParameterError(`margin must not be negative, got ${margin}`);
  return {
    minX: bbox.minX - margin,
    minY: bbox.minY - margin,
    maxX: bbox.maxX + margin,
    maxY: bbox.maxY + margin,
  };
}
