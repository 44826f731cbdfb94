import { Geodesic } from "geographiclib-geodesic";
import type { Geometry, Position } from "geojson";
import { disassemble, normalizeBearing } from "gis-shapes-engine";
import type { DisassembledPositions } from "gis-shapes-engine";
import { transform } from "./projection.js";

/** GRS80 semi-major axis (m) and flattening. */
export const GRS80_A = 6_378_137;
export const GRS80_F = 1 / 298.257222101;

const grs80 = new Geodesic.Geodesic(GRS80_A, GRS80_F);

export interface RelativeCoord {
  azimuth: number;
  hDistance: number;
}

export interface RelativeCoordinates {
  azimuth: number[];
  hDistance: number[];
}

export type RelativeGeometry = Extract<
  Geometry,
  { type: "LineString" | "MultiLineString" | "Polygon" | "MultiPolygon" }
>;

/**
 * Forward azimuth (clockwise from true north, in [0, 360)) and geodesic
 * distance in metres on the GRS80 ellipsoid between two lon/lat points.
 */
export function azimuthAndDistance(from: [number, number], to: [number, number]): RelativeCoord {
  const { azi1, s12 } = grs80.Inverse(from[1], from[0], to[1], to[0]);
  if (typeof azi1 !== "number" || typeof s12 !== "number") {
    throw new Error(`Geodesic inverse failed between [${from.join(", ")}] and [${to.join(", ")}]`);
  }
  return { azimuth: normalizeBearing(azi1), hDistance: s12 };
}

/**
 * Azimuths and distances between consecutive lon/lat vertices. With `closed`,
 * the first vertex is appended when the sequence does not already end on it.
 */
export function relativeSequence(lons: number[], lats: number[], closed = true): RelativeCoordinates {
  const xs = lons.slice();
  const ys = lats.slice();
  const n = xs.length;
  if (closed && n > 1 && (xs[0] !== xs[n - 1] || ys[0] !== ys[n - 1])) {
    xs.push(xs[0]);
    ys.push(ys[0]);
  }
  const result: RelativeCoordinates = { azimuth: [], hDistance: [] };
  for (let i = 1; i < xs.length; i++) {
    const rc = azimuthAndDistance([xs[i - 1], ys[i - 1]], [xs[i], ys[i]]);
    result.azimuth.push(rc.azimuth);
    result.hDistance.push(rc.hDistance);
  }
  return result;
}

function partToRelative(part: Position[], epsg: number, closed: boolean): RelativeCoordinates {
  let lons = part.map((p) => p[0]);
  let lats = part.map((p) => p[1]);
  if (epsg !== 4326 && part.length > 0) {
    const geographic = transform(lons, lats, epsg, 4326);
    lons = geographic.lons;
    lats = geographic.lats;
  }
  return relativeSequence(lons, lats, closed);
}

function isPosition(value: DisassembledPositions): value is Position {
  return typeof value[0] === "number";
}

function isPartList(value: Position[] | Position[][]): value is Position[][] {
  const entries: (Position | Position[])[] = value;
  return entries.some((entry) => Array.isArray(entry[0]));
}

/**
 * Convert a geometry's absolute vertices into bearing/distance sequences.
 * Single-part geometries give one record, multi-part geometries one per part.
 */
export function absoluteToRelative(
  geometry: RelativeGeometry,
  epsg: number,
  closed = true
): RelativeCoordinates | RelativeCoordinates[] {
  const positions = disassemble(geometry, "xyz");
  if (!positions || isPosition(positions)) {
    throw new Error(`Cannot derive relative coordinates from ${geometry.type}`);
  }
  if (geometry.type === "MultiLineString" || geometry.type === "MultiPolygon") {
    return isPartList(positions) ? positions.map((part) => partToRelative(part, epsg, closed)) : [];
  }
  return isPartList(positions) ? partToRelative(positions[0], epsg, closed) : partToRelative(positions, epsg, closed);
}
