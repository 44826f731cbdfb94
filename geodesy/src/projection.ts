import proj4 from "proj4";
import type { Point } from "gis-shapes-engine";

const GRS80 = "+ellps=GRS80 +towgs84=0,0,0,0,0,0,0 +units=m +no_defs";

// JGD2011 plane rectangular zones I–XIX: [latitude of origin, central meridian]
const PLANE_RECTANGULAR_ORIGINS: [number, number][] = [
  [33, 129.5],
  [33, 131],
  [36, 132 + 1 / 6],
  [33, 133.5],
  [36, 134 + 1 / 3],
  [36, 136],
  [36, 137 + 1 / 6],
  [36, 138.5],
  [36, 139 + 5 / 6],
  [40, 140 + 5 / 6],
  [44, 140.25],
  [44, 142.25],
  [44, 144.25],
  [26, 142],
  [26, 127.5],
  [26, 124],
  [26, 131],
  [20, 136],
  [26, 154],
];

function registerDefinitions(): Set<number> {
  const codes = new Set<number>([4326]);
  proj4.defs("EPSG:6668", `+proj=longlat ${GRS80}`);
  codes.add(6668);
  PLANE_RECTANGULAR_ORIGINS.forEach(([lat0, lon0], idx) => {
    const code = 6669 + idx;
    proj4.defs(`EPSG:${code}`, `+proj=tmerc +lat_0=${lat0} +lon_0=${lon0} +k=0.9999 +x_0=0 +y_0=0 ${GRS80}`);
    codes.add(code);
  });
  for (let zone = 51; zone <= 55; zone++) {
    const code = 6688 + (zone - 51);
    proj4.defs(`EPSG:${code}`, `+proj=utm +zone=${zone} ${GRS80}`);
    codes.add(code);
  }
  return codes;
}

const SUPPORTED_CODES = registerDefinitions();

export function isSupportedEpsg(epsg: number): boolean {
  return SUPPORTED_CODES.has(epsg);
}

export interface TransformedCoord {
  lon: number;
  lat: number;
  points: Point[];
}

export interface TransformedCoords {
  lons: number[];
  lats: number[];
  points: Point[];
}

function crsName(epsg: number): string {
  if (!isSupportedEpsg(epsg)) throw new Error(`Unsupported EPSG code ${epsg}`);
  return `EPSG:${epsg}`;
}

function projectPair(from: string, to: string, x: number, y: number): Point {
  const [px, py] = proj4(from, to, [x, y]);
  return [px, py];
}

/**
 * Reproject coordinates between registered CRSs. Axis order is always
 * x/easting/longitude first.
 */
export function transform(lon: number, lat: number, inEpsg: number, outEpsg: number): TransformedCoord;
export function transform(lons: number[], lats: number[], inEpsg: number, outEpsg: number): TransformedCoords;
export function transform(
  lon: number | number[],
  lat: number | number[],
  inEpsg: number,
  outEpsg: number
): TransformedCoord | TransformedCoords {
  const from = crsName(inEpsg);
  const to = crsName(outEpsg);
  if (typeof lon === "number" && typeof lat === "number") {
    const point = projectPair(from, to, lon, lat);
    return { lon: point[0], lat: point[1], points: [point] };
  }
  if (Array.isArray(lon) && Array.isArray(lat)) {
    if (lon.length !== lat.length) {
      throw new Error(`Coordinate arrays differ in length: ${lon.length} vs ${lat.length}`);
    }
    const points = lon.map((x, i) => projectPair(from, to, x, lat[i]));
    return { lons: points.map((p) => p[0]), lats: points.map((p) => p[1]), points };
  }
  throw new Error("transform expects two numbers or two arrays");
}
