import path from "node:path";

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`${name} must be a number, got "${raw}"`);
  return n;
}

export const DATA_DIR = "data";

export const config = {
  dataDir: DATA_DIR,
  cachePath: path.join(DATA_DIR, "geocode_cache.json"),
  missingCsvPath: path.join(DATA_DIR, "missing_coords.csv"),
  mapOutputPath: path.join("docs", "index.html"),
  geocodeReportPath: path.join("output", "geocoding_validation.json"),

  // Nominatim allows 1 request / second; stay well under it
  geocodeDelaySeconds: numberFromEnv("GEOCODE_DELAY_SECONDS", 2),
  geocodeUserAgent: process.env.GEOCODE_USER_AGENT?.trim() || undefined,
  mapboxAccessToken: process.env.MAPBOX_ACCESS_TOKEN?.trim() || undefined,
  nominatimBaseUrl: process.env.NOMINATIM_BASE_URL?.trim() || undefined,
};
