import { describe, expect, it } from "vitest";
import { DegenerateExtentError, InvalidParameterError } from "../src/errors.js";
import { buildHexagon, hexagonCircumradius } from "../src/hexagon.js";
import { multiPolygonArea, ringArea } from "../src/polygon.js";
import { clipTilesToExtent, computeHexGridLayout, latticeCenter, tile } from "../src/tiler.js";
import type { Point, Polygon, TiledHexagon } from "../src/types.js";

const square100: Polygon = [
  [0, 0],
  [100, 0],
  [100, 100],
  [0, 100],
  [0, 0],
];

function pointInRing(point: Point, ring: Point[]) {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const xi = ring[i][0], yi = ring[i][1];
    const xj = ring[j][0], yj = ring[j][1];
    const onSegment =
      Math.abs((yj - yi) * (point[0] - xi) - (xj - xi) * (point[1] - yi)) < 1e-6 &&
      point[0] >= Math.min(xi, xj) - 1e-9 &&
      point[0] <= Math.max(xi, xj) + 1e-9 &&
      point[1] >= Math.min(yi, yj) - 1e-9 &&
      point[1] <= Math.max(yi, yj) + 1e-9;
    if (onSegment) return true;
    const intersect = yi > point[1] !== yj > point[1] && point[0] < ((xj - xi) * (point[1] - yi)) / (yj - yi) + xi;
    if (intersect) inside = !inside;
  }
  return inside;
}

function sharedVertices(a: Polygon, b: Polygon) {
  return a.slice(0, 6).filter(([ax, ay]) => b.slice(0, 6).some(([bx, by]) => Math.hypot(ax - bx, ay - by) < 1e-6))
    .length;
}

// Convex polygons overlap unless some edge normal separates their projections.
function convexOverlap(a: Polygon, b: Polygon, tolerance = 1e-6) {
  const edges = [a, b].flatMap((ring) =>
    ring.slice(0, -1).map((p, i): Point => [ring[i + 1][1] - p[1], p[0] - ring[i + 1][0]])
  );
  return edges.every(([nx, ny]) => {
    const len = Math.hypot(nx, ny);
    const project = (ring: Polygon) => ring.map(([x, y]) => (x * nx + y * ny) / len);
    const pa = project(a);
    const pb = project(b);
    return Math.min(Math.max(...pa), Math.max(...pb)) - Math.max(Math.min(...pa), Math.min(...pb)) > tolerance;
  });
}

function find(tiles: TiledHexagon[], row: number, column: number): TiledHexagon {
  const match = tiles.find((t) => t.row === row && t.column === column);
  if (!match) throw new Error(`missing tile ${row}/${column}`);
  return match;
}

describe("hex grid layout", () => {
  it("fixes row and column counts before generation", () => {
    const layout = computeHexGridLayout(1, square100, 10);
    const r = hexagonCircumradius(1);
    expect(layout.bbox).toEqual({ minX: -10, minY: -10, maxX: 110, maxY: 110 });
    expect(layout.radius).toBeCloseTo(r, 12);
    expect(layout.horizontalPitch).toBeCloseTo(1.5 * r, 12);
    expect(layout.verticalPitch).toBeCloseTo(Math.sqrt(3) * r, 12);
    expect(layout.columns).toBe(3);
    expect(layout.rows).toBe(3);
  });

  it("places the last column and row centres on or past the box edges", () => {
    const layout = computeHexGridLayout(1, square100);
    expect(layout.columns).toBe(3);
    expect(layout.rows).toBe(2);
    const lastColumn = latticeCenter(layout, 0, layout.columns - 1);
    expect(lastColumn[0]).toBeGreaterThanOrEqual(layout.bbox.maxX);
    for (let column = 0; column < layout.columns; column++) {
      expect(latticeCenter(layout, layout.rows - 1, column)[1]).toBeLessThanOrEqual(layout.bbox.minY);
    }
  });

  it("offsets odd columns half a row downward", () => {
    const layout = computeHexGridLayout(1, square100);
    const even = latticeCenter(layout, 0, 0);
    const odd = latticeCenter(layout, 0, 1);
    expect(even).toEqual([0, 100]);
    expect(odd[0]).toBeCloseTo(layout.horizontalPitch, 9);
    expect(odd[1]).toBeCloseTo(100 - layout.verticalPitch / 2, 9);
  });
});

describe("hexagon tiling", () => {
  const tiles = tile(1, square100, 10);

  it("returns tiles in row-major order starting at the top-left corner", () => {
    expect(tiles).toHaveLength(9);
    expect(tiles.map((t) => [t.row, t.column])).toEqual([
      [0, 0],
      [0, 1],
      [0, 2],
      [1, 0],
      [1, 1],
      [1, 2],
      [2, 0],
      [2, 1],
      [2, 2],
    ]);
    expect(tiles[0].center).toEqual([-10, 110]);
  });

  it("builds each cell with the regular hexagon generator", () => {
    tiles.forEach((t) => {
      expect(t.hexagon).toEqual(buildHexagon(1, t.center));
    });
  });

  it("covers the expanded bounding box", () => {
    const all = tiles.flatMap((t) => t.hexagon);
    expect(Math.min(...all.map((p) => p[0]))).toBeLessThanOrEqual(-10);
    expect(Math.min(...all.map((p) => p[1]))).toBeLessThanOrEqual(-10);
    expect(Math.max(...all.map((p) => p[0]))).toBeGreaterThanOrEqual(110);
    expect(Math.max(...all.map((p) => p[1]))).toBeGreaterThanOrEqual(110);

    for (let x = -10; x <= 110; x += 5) {
      for (let y = -10; y <= 110; y += 5) {
        const covered = tiles.some((t) => pointInRing([x, y], t.hexagon));
        expect(covered, `point ${x},${y}`).toBe(true);
      }
    }
  });

  it("makes lattice neighbours share an edge", () => {
    // same column, next row
    expect(sharedVertices(find(tiles, 0, 0).hexagon, find(tiles, 1, 0).hexagon)).toBe(2);
    expect(sharedVertices(find(tiles, 1, 1).hexagon, find(tiles, 2, 1).hexagon)).toBe(2);
    // even column to odd column
    expect(sharedVertices(find(tiles, 0, 0).hexagon, find(tiles, 0, 1).hexagon)).toBe(2);
    // odd column to even column
    expect(sharedVertices(find(tiles, 1, 1).hexagon, find(tiles, 1, 2).hexagon)).toBe(2);
  });

  it("never overlaps neighbouring hexagons", () => {
    for (let i = 0; i < tiles.length; i++) {
      for (let j = i + 1; j < tiles.length; j++) {
        expect(convexOverlap(tiles[i].hexagon, tiles[j].hexagon), `tiles ${i} and ${j}`).toBe(false);
      }
    }
  });

  it("is deterministic", () => {
    expect(tile(1, square100, 10)).toEqual(tiles);
  });

  it("uses the bounding box of every ring in a multipolygon", () => {
    const multi: Polygon[] = [
      [
        [0, 0],
        [10, 0],
        [10, 10],
        [0, 0],
      ],
      [
        [100, 50],
        [120, 50],
        [120, 60],
        [100, 50],
      ],
    ];
    const layout = computeHexGridLayout(0.1, multi);
    expect(layout.bbox).toEqual({ minX: 0, minY: 0, maxX: 120, maxY: 60 });
    expect(tile(0.1, multi)).toHaveLength(layout.rows * layout.columns);
  });

  it("rejects invalid parameters without producing tiles", () => {
    expect(() => tile(0, square100)).toThrow(InvalidParameterError);
    expect(() => tile(-2, square100)).toThrow(InvalidParameterError);
    expect(() => tile(1, square100, -1)).toThrow(InvalidParameterError);
  });

  it("rejects degenerate extents", () => {
    const flat: Polygon = [
      [0, 0],
      [50, 0],
      [0, 0],
    ];
    expect(() => tile(1, flat)).toThrow(DegenerateExtentError);
    expect(() => tile(1, [])).toThrow(DegenerateExtentError);
  });
});

describe("clipping tiles to the extent", () => {
  it("keeps only the parts inside the extent", () => {
    const tiles = tile(1, square100, 10);
    const clipped = clipTilesToExtent(tiles, square100);
    expect(clipped.length).toBeGreaterThan(0);
    expect(clipped.length).toBeLessThan(tiles.length);
    const total = clipped.reduce((acc, c) => acc + multiPolygonArea(c.geometry), 0);
    expect(Math.abs(total - 10_000)).toBeLessThan(1e-3);
    expect(clipped[0]).toMatchObject({ row: 0, column: 0 });
  });

  it("clips the grid to one of its own cells without edge slivers", () => {
    const tiles = tile(1, square100, 10);
    [
      [0, 0],
      [1, 0],
      [1, 1],
      [2, 0],
      [2, 1],
      [2, 2],
    ].forEach(([row, column]) => {
      const cell = find(tiles, row, column);
      const clipped = clipTilesToExtent(tiles, cell.hexagon);
      expect(clipped.map((c) => [c.row, c.column])).toEqual([[row, column]]);
      expect(Math.abs(multiPolygonArea(clipped[0].geometry) - ringArea(cell.hexagon))).toBeLessThan(1e-3);
    });
  });

  it("drops tiles that only touch the extent along an edge", () => {
    const tiles = tile(1, square100, 10);
    const neighbour = find(tiles, 1, 0);
    expect(convexOverlap(find(tiles, 0, 0).hexagon, neighbour.hexagon)).toBe(false);
    expect(clipTilesToExtent([neighbour], find(tiles, 0, 0).hexagon)).toEqual([]);
  });
});
