import { feature } from "topojson-client";
import type {
  Feature,
  FeatureCollection,
  Geometry,
  Polygon as GeoPolygon,
  Position,
} from "geojson";
import type { Topology } from "topojson-specification";
import { InvalidParameterError } from "./errors.js";
import { closeRing, ensureCounterClockwise } from "./polygon.js";
import type { Extent, Point, Polygon, TiledHexagon } from "./types.js";

export type GeometrySource = Topology | FeatureCollection | Feature;

export interface HexTileProperties {
  row: number;
  column: number;
}

export interface NamedCrs {
  type: "name";
  properties: { name: string };
}

export interface HexGridFeatureCollection extends FeatureCollection<GeoPolygon, HexTileProperties> {
  crs?: NamedCrs;
}

export interface FeatureCollectionOptions {
  /** Tags the collection with a legacy named CRS member. */
  epsg?: number;
}

function matchesRef(f: Feature, ref: string): boolean {
  return f.id?.toString() === ref || f.properties?.name === ref;
}

/**
 * Resolve a feature by reference. GeoJSON inputs are searched by id or
 * `properties.name`; TopoJSON inputs match an object key first, then a
 * feature inside any object.
 */
export function decodeExtentByRef(source: GeometrySource, ref: string): Feature | null {
  if (source.type === "FeatureCollection") {
    return source.features.find((f) => matchesRef(f, ref)) ?? null;
  }
  if (source.type === "Feature") {
    return matchesRef(source, ref) ? source : null;
  }

  const direct = source.objects[ref];
  if (direct) {
    const decoded = feature(source, direct);
    if (decoded.type === "Feature") return decoded;
    return { type: "Feature", properties: { name: ref }, geometry: mergePolygonal(decoded) };
  }
  for (const key of Object.keys(source.objects)) {
    const decoded = feature(source, source.objects[key]);
    if (decoded.type === "Feature") {
      if (matchesRef(decoded, ref)) return decoded;
      continue;
    }
    const match = decoded.features.find((f) => matchesRef(f, ref));
    if (match) return match;
  }
  return null;
}

/** Collapse a collection's polygonal members into a single MultiPolygon. */
function mergePolygonal(fc: FeatureCollection): Geometry {
  const polygons: Position[][][] = [];
  fc.features.forEach((f) => {
    if (!f.geometry) return;
    if (f.geometry.type === "Polygon") polygons.push(f.geometry.coordinates);
    if (f.geometry.type === "MultiPolygon") polygons.push(...f.geometry.coordinates);
  });
  return { type: "MultiPolygon", coordinates: polygons };
}

function toPoint(position: Position): Point {
  return [position[0], position[1]];
}

/** Outer rings of a GeoJSON Polygon or MultiPolygon, as an engine extent. */
export function extentFromGeoJSON(geometry: Geometry | null): Extent {
  if (!geometry) throw new InvalidParameterError("Extent geometry is missing");
  if (geometry.type === "Polygon") {
    return (geometry.coordinates[0] ?? []).map(toPoint);
  }
  if (geometry.type === "MultiPolygon") {
    return geometry.coordinates.filter((poly) => poly.length > 0).map((poly) => poly[0].map(toPoint));
  }
  throw new InvalidParameterError(`Unsupported extent geometry type: ${geometry.type}`);
}

/** GeoJSON Polygon with a counter-clockwise exterior ring. */
export function polygonToGeoJSON(polygon: Polygon): GeoPolygon {
  return { type: "Polygon", coordinates: [ensureCounterClockwise(closeRing(polygon))] };
}

export function epsgCrs(epsg: number): NamedCrs {
  return { type: "name", properties: { name: `urn:ogc:def:crs:EPSG::${epsg}` } };
}

/**
 * Assemble tiles into a FeatureCollection. Feature order follows tile order,
 * so row-major input gives row-major features.
 */
export function tilesToFeatureCollection(
  tiles: TiledHexagon[],
  options: FeatureCollectionOptions = {}
): HexGridFeatureCollection {
  const collection: HexGridFeatureCollection = {
    type: "FeatureCollection",
    features: tiles.map((t) => ({
      type: "Feature",
      id: `${t.row}-${t.column}`,
      properties: { row: t.row, column: t.column },
      geometry: polygonToGeoJSON(t.hexagon),
    })),
  };
  if (options.epsg !== undefined) collection.crs = epsgCrs(options.epsg);
  return collection;
}
