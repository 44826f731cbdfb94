export type Fetcher = (url: string, init?: RequestInit) => Promise<Response>;

export interface GeodesyConfig {
  elevationUrl: string;
  semidynamicUrl: string;
  timeoutMs: number;
  retryDelayMs: number;
  networkDisabled: boolean;
}

export const DEFAULT_ELEVATION_URL = "https://cyberjapandata2.gsi.go.jp/general/dem/scripts/getelevation.php";
export const DEFAULT_SEMIDYNA_URL = "https://vldb.gsi.go.jp/sokuchi/surveycalc/semidyna/web/semidyna_r.php";

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Expected a non-negative number in environment, got "${value}"`);
  }
  return parsed;
}

/**
 * Settings for the GSI survey API clients, read from the environment.
 * GIS_SHAPES_NO_NET=1 blocks every outgoing request.
 */
export function loadGeodesyConfig(env: NodeJS.ProcessEnv = process.env): GeodesyConfig {
  return {
    elevationUrl: env.GSI_ELEVATION_URL || DEFAULT_ELEVATION_URL,
    semidynamicUrl: env.GSI_SEMIDYNA_URL || DEFAULT_SEMIDYNA_URL,
    timeoutMs: numberFromEnv(env.GSI_TIMEOUT_MS, 20_000),
    retryDelayMs: numberFromEnv(env.GSI_RETRY_DELAY_MS, 500),
    networkDisabled: env.GIS_SHAPES_NO_NET === "1",
  };
}
