import { geoCentroid } from "d3-geo";
import type { Geometry } from "geojson";

// [min lon, max lon) → JGD2011 / UTM zones 51N–55N
const JGD2011_UTM_ZONES: { range: [number, number]; epsg: number }[] = [
  { range: [120, 126], epsg: 6688 },
  { range: [126, 132], epsg: 6689 },
  { range: [132, 138], epsg: 6690 },
  { range: [138, 144], epsg: 6691 },
  { range: [144, 150], epsg: 6692 },
];

/** JGD2011 UTM EPSG code for a longitude, or null outside Japan's zones. */
export function estimateJgdUtmFromLon(lon: number): number | null {
  if (!Number.isFinite(lon)) {
    console.warn(`Failed to estimate UTM coordinate system: longitude ${lon} is not a number`);
    return null;
  }
  const zone = JGD2011_UTM_ZONES.find(({ range }) => range[0] <= lon && lon < range[1]);
  if (!zone) {
    console.warn(`Failed to estimate UTM coordinate system for longitude ${lon}`);
    return null;
  }
  return zone.epsg;
}

// Polygon centroids in d3-geo depend on ring winding; outlines do not.
function outlineOf(geometry: Geometry): Geometry {
  switch (geometry.type) {
    case "Polygon":
      return { type: "LineString", coordinates: geometry.coordinates[0] ?? [] };
    case "MultiPolygon":
      return { type: "MultiLineString", coordinates: geometry.coordinates.map((poly) => poly[0] ?? []) };
    default:
      return geometry;
  }
}

/** Zone estimate from the spherical centroid of a lon/lat geometry. */
export function estimateJgdUtmFromGeometry(geometry: Geometry): number | null {
  const [lon] = geoCentroid(outlineOf(geometry));
  return estimateJgdUtmFromLon(lon);
}
