/** Planar coordinate pair: [x (easting), y (northing)], in projected metres. */
export type Point = [number, number];

/** Closed ring of points (first === last). */
export type Ring = Point[];

/** Single outer ring. Every polygon the engine emits is closed. */
export type Polygon = Ring;

/** Collection of outer rings. */
export type MultiPolygon = Polygon[];

export type Extent = Polygon | MultiPolygon;

export interface BBox {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface DirectionalRectangleSpec {
  base: Point;
  distance: number;
  angle: number; // bearing, degrees clockwise from north
  width: number; // full width, centred on the axis
}

export interface DirectionalFanSpec {
  base: Point;
  distance: number;
  angle1: number;
  angle2: number;
}

export interface HexagonSpec {
  areaHectares: number;
  center: Point;
}

export interface TiledHexagon {
  row: number;
  column: number;
  center: Point;
  hexagon: Polygon;
}

export interface HexGridLayout {
  bbox: BBox; // expanded by margin
  radius: number;
  horizontalPitch: number;
  verticalPitch: number;
  rows: number;
  columns: number;
}

export interface ClippedTile {
  row: number;
  column: number;
  /** polygon-clipping output: polygons of rings, holes allowed. */
  geometry: Point[][][];
}

export type GeometryErrorCode = "INVALID_PARAMETER" | "DEGENERATE_EXTENT";
