import polygonClipping from "polygon-clipping";
import { DegenerateExtentError, requirePositive } from "./errors.js";
import { buildHexagon, hexagonCircumradius } from "./hexagon.js";
import { bboxOfExtent, expandBBox, extentRings, multiPolygonArea, ringArea, snapRing } from "./polygon.js";
import type { ClippedTile, Extent, HexGridLayout, Point, TiledHexagon } from "./types.js";

/**
 * Lattice geometry for a flat-top hex grid over `extent` plus `margin`.
 * Row and column counts are fixed here, before any hexagon exists: the last
 * column's centre reaches the right edge and every column's last centre
 * reaches the bottom edge, so the hexagons cover the whole expanded box.
 */
export function computeHexGridLayout(areaHectares: number, extent: Extent, margin = 0): HexGridLayout {
  requirePositive("areaHectares", areaHectares);
  const raw = bboxOfExtent(extent);
  const width = raw.maxX - raw.minX;
  const height = raw.maxY - raw.minY;
  if (width <= 0 || height <= 0) {
    throw new DegenerateExtentError(`Extent has zero width or height (${width} x ${height})`);
  }
  const bbox = expandBBox(raw, margin);
  const radius = hexagonCircumradius(areaHectares);
  const horizontalPitch = 1.5 * radius;
  const verticalPitch = Math.sqrt(3) * radius;
  const columns = Math.ceil((bbox.maxX - bbox.minX) / horizontalPitch) + 1;
  const rows = Math.ceil((bbox.maxY - bbox.minY) / verticalPitch) + 1;
  return { bbox, radius, horizontalPitch, verticalPitch, rows, columns };
}

/** Centre of lattice cell (row, column); odd columns sit half a row lower. */
export function latticeCenter(layout: HexGridLayout, row: number, column: number): Point {
  const offset = column % 2 === 1 ? layout.verticalPitch / 2 : 0;
  return [
    layout.bbox.minX + column * layout.horizontalPitch,
    layout.bbox.maxY - row * layout.verticalPitch - offset,
  ];
}

/** One row of the grid. Rows do not depend on each other. */
export function buildHexRow(areaHectares: number, layout: HexGridLayout, row: number): TiledHexagon[] {
  const cells: TiledHexagon[] = [];
  for (let column = 0; column < layout.columns; column++) {
    const center = latticeCenter(layout, row, column);
    cells.push({ row, column, center, hexagon: buildHexagon(areaHectares, center) });
  }
  return cells;
}

/**
 * Tile the bounding box of `extent`, grown by `margin`, with hexagons of
 * `areaHectares`. Output is row-major: row ascending, then column.
 * Hexagons are not clipped to the extent itself.
 */
export function tile(areaHectares: number, extent: Extent, margin = 0): TiledHexagon[] {
  const layout = computeHexGridLayout(areaHectares, extent, margin);
  const rows: TiledHexagon[][] = [];
  for (let row = 0; row < layout.rows; row++) {
    rows.push(buildHexRow(areaHectares, layout, row));
  }
  return rows.flat();
}

// Pieces smaller than this fraction of a tile are edge slivers, not overlap.
const SLIVER_AREA_RATIO = 1e-9;

/**
 * Intersect tiles with the exact extent, dropping tiles that fall outside it
 * or only touch it along an edge. Coordinates are snapped before clipping so
 * edges shared by neighbouring hexagons coincide exactly.
 */
export function clipTilesToExtent(tiles: TiledHexagon[], extent: Extent): ClippedTile[] {
  const mask = extentRings(extent).map((ring) => [snapRing(ring)]);
  if (mask.length === 0) return [];
  const clipped: ClippedTile[] = [];
  tiles.forEach((t) => {
    const geometry = polygonClipping.intersection([snapRing(t.hexagon)], mask);
    if (geometry.length === 0) return;
    if (multiPolygonArea(geometry) <= SLIVER_AREA_RATIO * ringArea(t.hexagon)) return;
    clipped.push({ row: t.row, column: t.column, geometry });
  });
  return clipped;
}
