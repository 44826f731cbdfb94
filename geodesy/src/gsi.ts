import { loadGeodesyConfig, type Fetcher, type GeodesyConfig } from "./config.js";

export interface Altitude {
  altitude: number | null;
  source: string | null;
}

export interface CorrectedCoord {
  lon: number;
  lat: number;
  altitude: number | null;
}

/** currentToEpoch: today's coordinates → datum epoch; epochToCurrent the reverse. */
export type SemidynamicDirection = "currentToEpoch" | "epochToCurrent";

export interface GsiRequestOptions {
  fetcher?: Fetcher;
  timeoutMs?: number;
  retryDelayMs?: number;
  config?: GeodesyConfig;
}

export interface SemidynamicOptions extends GsiRequestOptions {
  direction?: SemidynamicDirection;
  altitude?: number;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function numericOrNull(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

interface ResolvedRequest {
  fetcher: Fetcher;
  timeoutMs: number;
  retryDelayMs: number;
  config: GeodesyConfig;
}

function resolveRequest(options: GsiRequestOptions): ResolvedRequest {
  const config = options.config ?? loadGeodesyConfig();
  return {
    fetcher: options.fetcher ?? fetch,
    timeoutMs: options.timeoutMs ?? config.timeoutMs,
    retryDelayMs: options.retryDelayMs ?? config.retryDelayMs,
    config,
  };
}

/** Settles with `pending`, or rejects once `signal` aborts. */
function withinDeadline<T>(pending: Promise<T>, signal: AbortSignal, message: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error(message));
    void pending.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      }
    );
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });
  });
}

async function fetchJson(fetcher: Fetcher, url: string, budgetMs: number): Promise<JsonRecord> {
  const signal = AbortSignal.timeout(budgetMs);
  const res = await withinDeadline(
    fetcher(url, { signal }),
    signal,
    `GSI request to ${url} timed out after ${budgetMs} ms`
  );
  if (!res.ok) throw new Error(`GSI request failed: ${res.status} ${res.statusText}`);
  const body: unknown = await res.json();
  if (!isRecord(body)) throw new Error(`GSI response from ${url} is not a JSON object`);
  return body;
}

/**
 * Poll an endpoint until it answers without `ErrMsg` or the timeout passes.
 * Resolves to null when the service keeps refusing; a single request that
 * outlives the remaining budget is aborted and rejects.
 */
async function requestUntilAccepted(url: string, req: ResolvedRequest): Promise<JsonRecord | null> {
  if (req.config.networkDisabled) {
    throw new Error("Network fetches are disabled (GIS_SHAPES_NO_NET=1).");
  }
  const started = Date.now();
  for (;;) {
    const remainingMs = Math.max(req.timeoutMs - (Date.now() - started), 1);
    const body = await fetchJson(req.fetcher, url, remainingMs);
    if (body.ErrMsg === undefined || body.ErrMsg === null) return body;
    console.info(`GSI API error: ${String(body.ErrMsg)}`);
    if (Date.now() - started >= req.timeoutMs) {
      console.error(`Failed to request ${url} within ${req.timeoutMs} ms`);
      return null;
    }
    await sleep(req.retryDelayMs);
  }
}

export function elevationUrl(lon: number, lat: number, base: string): string {
  const params = new URLSearchParams({ lon: String(lon), lat: String(lat), outtype: "JSON" });
  return `${base}?${params.toString()}`;
}

/**
 * Elevation at a lon/lat from the GSI DEM service. Points without DEM
 * coverage ("-----") resolve with a null altitude.
 */
export async function lonlatToAltitude(
  lon: number,
  lat: number,
  options: GsiRequestOptions = {}
): Promise<Altitude | null> {
  const req = resolveRequest(options);
  const body = await requestUntilAccepted(elevationUrl(lon, lat, req.config.elevationUrl), req);
  if (!body) return null;
  const source = typeof body.hsrc === "string" && body.hsrc !== "-----" ? body.hsrc : null;
  return { altitude: numericOrNull(body.elevation), source };
}

/** Parameter file name for a data year. */
export function semidynamicParamFile(dataYear: number): string {
  return `SemiDyna${dataYear}.par`;
}

/** Data year of a date; fiscal years start on April 1. */
export function fiscalYearOf(date: Date): number {
  return date.getMonth() >= 3 ? date.getFullYear() : date.getFullYear() - 1;
}

export function semidynamicUrl(
  lon: number,
  lat: number,
  dataYear: number,
  direction: SemidynamicDirection,
  altitude: number,
  base: string
): string {
  const params = new URLSearchParams({
    outputType: "json",
    chiiki: semidynamicParamFile(dataYear),
    sokuchi: direction === "currentToEpoch" ? "1" : "0",
    Place: "0", // geographic coordinates
    Hosei_J: "2", // 2D correction
    latitude: String(lat),
    longitude: String(lon),
    altitude1: String(altitude),
  });
  return `${base}?${params.toString()}`;
}

/**
 * Two-dimensional semi-dynamic correction through the GSI survey calculation API.
 */
export async function semidynamicCorrection(
  lon: number,
  lat: number,
  dataYear: number,
  options: SemidynamicOptions = {}
): Promise<CorrectedCoord | null> {
  if (!Number.isInteger(dataYear)) throw new Error(`dataYear must be an integer, got ${dataYear}`);
  const req = resolveRequest(options);
  const url = semidynamicUrl(
    lon,
    lat,
    dataYear,
    options.direction ?? "currentToEpoch",
    options.altitude ?? 0,
    req.config.semidynamicUrl
  );
  const body = await requestUntilAccepted(url, req);
  if (!body) return null;
  const output = body.OutputData;
  if (!isRecord(output)) throw new Error("GSI semi-dynamic response has no OutputData");
  const correctedLon = numericOrNull(output.longitude);
  const correctedLat = numericOrNull(output.latitude);
  if (correctedLon === null || correctedLat === null) {
    throw new Error("GSI semi-dynamic response is missing corrected coordinates");
  }
  return { lon: correctedLon, lat: correctedLat, altitude: numericOrNull(output.altitude) };
}
