import type { Geometry, Point as GeoPoint, Position } from "geojson";

export type DisassemblyMode = "point" | "xyz" | "x_y_z";

/** Column-wise coordinates; `zs[i]` is null when vertex i has no z. */
export interface CoordinateColumns {
  xs: number[];
  ys: number[];
  zs: (number | null)[];
}

export type DisassembledPoints = GeoPoint | GeoPoint[] | GeoPoint[][];
export type DisassembledPositions = Position | Position[] | Position[][];

function toPointGeometry(position: Position): GeoPoint {
  return { type: "Point", coordinates: position.slice() };
}

function toColumns(positions: Position[]): CoordinateColumns {
  const columns: CoordinateColumns = { xs: [], ys: [], zs: [] };
  positions.forEach((p) => {
    columns.xs.push(p[0]);
    columns.ys.push(p[1]);
    columns.zs.push(p.length > 2 ? p[2] : null);
  });
  return columns;
}

/**
 * Vertex lists of a geometry: one list for single-part types, one per part
 * for multi-part types. Polygons contribute their exterior ring only.
 */
function partsOf(geometry: Geometry): { parts: Position[][]; multi: boolean; single: boolean } | null {
  switch (geometry.type) {
    case "Point":
      return { parts: [[geometry.coordinates]], multi: false, single: true };
    case "MultiPoint":
      return { parts: [geometry.coordinates], multi: false, single: false };
    case "LineString":
      return { parts: [geometry.coordinates], multi: false, single: false };
    case "MultiLineString":
      return { parts: geometry.coordinates, multi: true, single: false };
    case "Polygon":
      return { parts: [geometry.coordinates[0] ?? []], multi: false, single: false };
    case "MultiPolygon":
      return { parts: geometry.coordinates.map((poly) => poly[0] ?? []), multi: true, single: false };
    default:
      return null;
  }
}

/**
 * Break a geometry into vertices.
 * - "point": GeoJSON Point geometries
 * - "xyz": raw positions, z passed through untouched
 * - "x_y_z": flat x/y/z columns across all parts
 * Returns null for unsupported types (GeometryCollection).
 */
export function disassemble(geometry: Geometry, mode?: "point"): DisassembledPoints | null;
export function disassemble(geometry: Geometry, mode: "xyz"): DisassembledPositions | null;
export function disassemble(geometry: Geometry, mode: "x_y_z"): CoordinateColumns | null;
export function disassemble(
  geometry: Geometry,
  mode: DisassemblyMode = "point"
): DisassembledPoints | DisassembledPositions | CoordinateColumns | null {
  const split = partsOf(geometry);
  if (!split) return null;
  const { parts, multi, single } = split;

  if (mode === "x_y_z") return toColumns(parts.flat());

  if (mode === "xyz") {
    if (single) return parts[0][0].slice();
    return multi ? parts.map((part) => part.map((p) => p.slice())) : parts[0].map((p) => p.slice());
  }

  if (single) return toPointGeometry(parts[0][0]);
  return multi ? parts.map((part) => part.map(toPointGeometry)) : parts[0].map(toPointGeometry);
}
