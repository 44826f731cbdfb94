import type { GeometryErrorCode } from "./types.js";

export class GeometryError extends Error {
  readonly code: GeometryErrorCode;

  constructor(code: GeometryErrorCode, message: string) {
    super(message);
    this.name = "GeometryError";
    this.code = code;
  }
}

/** Raised for non-positive sizes, negative margins and non-finite input. */
export class InvalidParameterError extends GeometryError {
  constructor(message: string) {
    super("INVALID_PARAMETER", message);
    this.name = "InvalidParameterError";
  }
}

/** Raised when an extent has no area to tile. */
export class DegenerateExtentError extends GeometryError {
  constructor(message: string) {
    super("DEGENERATE_EXTENT", message);
    this.name = "DegenerateExtentError";
  }
}

export function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(`${name} must be a positive finite number, got ${value}`);
  }
}

export function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(`${name} must be a finite number, got ${value}`);
  }
}

export function requireFinitePoint(name: string, point: [number, number]): void {
  if (!Number.isFinite(point[0]) || !Number.isFinite(point[1])) {
    throw new InvalidParameterError(`${name} must have finite coordinates, got [${point.join(", ")}]`);
  }
}
