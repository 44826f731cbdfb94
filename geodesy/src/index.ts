export { loadGeodesyConfig, DEFAULT_ELEVATION_URL, DEFAULT_SEMIDYNA_URL } from "./config.js";
export type { GeodesyConfig, Fetcher } from "./config.js";

export { transform, isSupportedEpsg } from "./projection.js";
export type { TransformedCoord, TransformedCoords } from "./projection.js";

export {
  absoluteToRelative,
  relativeSequence,
  azimuthAndDistance,
  GRS80_A,
  GRS80_F,
} from "./relative.js";
export type { RelativeCoord, RelativeCoordinates, RelativeGeometry } from "./relative.js";

export { estimateJgdUtmFromLon, estimateJgdUtmFromGeometry } from "./utm.js";

export {
  lonlatToAltitude,
  semidynamicCorrection,
  semidynamicParamFile,
  fiscalYearOf,
  elevationUrl,
  semidynamicUrl,
} from "./gsi.js";
export type {
  Altitude,
  CorrectedCoord,
  SemidynamicDirection,
  GsiRequestOptions,
  SemidynamicOptions,
} from "./gsi.js";
