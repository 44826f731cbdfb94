/**
 * Planar Shape Engine
 * -------------------
 * Pure construction of directional buffers, regular hexagons and hexagon
 * grids on a projected (metre-based) plane.
 */
export * from "./types.js";

export {
  GeometryError,
  InvalidParameterError,
  DegenerateExtentError,
} from "./errors.js";

export { normalizeBearing, bearingToVector, destinationPoint } from "./bearing.js";

export {
  isRing,
  extentRings,
  closeRing,
  signedRingArea,
  ringArea,
  ensureCounterClockwise,
  multiPolygonArea,
  snapRing,
  bboxOfExtent,
  expandBBox,
} from "./polygon.js";

export { buildRectangle, buildFan, fanSweep, DEFAULT_FAN_SEGMENTS } from "./directional.js";

export {
  buildHexagon,
  buildHexagonFromSpec,
  hexagonCircumradius,
  hexagonVertices,
  SQUARE_METRES_PER_HECTARE,
} from "./hexagon.js";

export { tile, computeHexGridLayout, latticeCenter, buildHexRow, clipTilesToExtent } from "./tiler.js";

export {
  decodeExtentByRef,
  extentFromGeoJSON,
  polygonToGeoJSON,
  tilesToFeatureCollection,
  epsgCrs,
} from "./geometry.js";
export type {
  GeometrySource,
  HexTileProperties,
  HexGridFeatureCollection,
  NamedCrs,
  FeatureCollectionOptions,
} from "./geometry.js";

export { disassemble } from "./disassembly.js";
export type {
  DisassemblyMode,
  CoordinateColumns,
  DisassembledPoints,
  DisassembledPositions,
} from "./disassembly.js";
