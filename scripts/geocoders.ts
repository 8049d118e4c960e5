import type { Coordinates } from "./types";

export interface Geocoder {
  readonly name: string;
  /**
   * Resolve a one-line address. Returns null when the service has no match;
   * throws on network, HTTP or response-format errors.
   */
  lookup(query: string): Promise<Coordinates | null>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class GeocodeHttpError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
    readonly provider: string,
  ) {
    super(`${provider} responded ${status} ${statusText}`);
    this.name = "GeocodeHttpError";
  }
}

const REQUEST_TIMEOUT_MS = 15_000;

function toCoordinates(lat: unknown, lon: unknown): Coordinates | null {
  const la = typeof lat === "string" ? Number(lat) : lat;
  const lo = typeof lon === "string" ? Number(lon) : lon;
  if (typeof la !== "number" || typeof lo !== "number") return null;
  if (!Number.isFinite(la) || !Number.isFinite(lo)) return null;
  return { lat: la, lon: lo };
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export type NominatimOptions = {
  userAgent: string;
  baseUrl?: string;
  fetchImpl?: FetchLike;
};

/** OpenStreetMap Nominatim. Usage policy: identifying User-Agent, max 1 req/s. */
export class NominatimGeocoder implements Geocoder {
  readonly name = "nominatim";
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: NominatimOptions) {
    if (!opts.userAgent.trim()) throw new Error("Nominatim requires an identifying User-Agent");
    this.baseUrl = (opts.baseUrl ?? "https://nominatim.openstreetmap.org").replace(/\/$/, "");
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async lookup(query: string): Promise<Coordinates | null> {
    const url = new URL(`${this.baseUrl}/search`);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "jsonv2");
    url.searchParams.set("limit", "1");

    const res = await this.fetchImpl(url.toString(), {
      headers: {
        "User-Agent": this.opts.userAgent,
        "Accept-Language": "en",
      },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!res.ok) throw new GeocodeHttpError(res.status, res.statusText, this.name);

    const data: unknown = await res.json();
    if (!Array.isArray(data)) throw new Error(`${this.name}: expected an array of results`);
    const hit: unknown = data[0];
    if (!isRecord(hit)) return null;
    return toCoordinates(hit.lat, hit.lon);
  }
}

export type MapboxOptions = {
  accessToken: string;
  userAgent: string;
  fetchImpl?: FetchLike;
};

const MAPBOX_URL = "https://api.mapbox.com/search/geocode/v6/forward";

export class MapboxGeocoder implements Geocoder {
  readonly name = "mapbox";
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: MapboxOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async lookup(query: string): Promise<Coordinates | null> {
    const url = new URL(MAPBOX_URL);
    url.searchParams.set("q", query);
    url.searchParams.set("access_token", this.opts.accessToken);
    url.searchParams.set("limit", "1");

    const res = await this.fetchImpl(url.toString(), {
      headers: { "User-Agent": this.opts.userAgent },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
    if (!res.ok) throw new GeocodeHttpError(res.status, res.statusText, this.name);

    const data: unknown = await res.json();
    if (!isRecord(data) || !Array.isArray(data.features)) {
      throw new Error(`${this.name}: expected a FeatureCollection`);
    }
    const feature: unknown = data.features[0];
    if (!isRecord(feature) || !isRecord(feature.properties)) return null;
    const coords = feature.properties.coordinates;
    if (!isRecord(coords)) return null;
    return toCoordinates(coords.latitude, coords.longitude);
  }
}

export type GeocoderConfig = {
  userAgent: string;
  mapboxAccessToken?: string;
  nominatimBaseUrl?: string;
  fetchImpl?: FetchLike;
};

export function createGeocoder(config: GeocoderConfig): Geocoder {
  if (config.mapboxAccessToken) {
    console.log("🗺️  MAPBOX_ACCESS_TOKEN found, geocoding with Mapbox");
    return new MapboxGeocoder({
      accessToken: config.mapboxAccessToken,
      userAgent: config.userAgent,
      fetchImpl: config.fetchImpl,
    });
  }
  console.log("🗺️  No MAPBOX_ACCESS_TOKEN, geocoding with OpenStreetMap Nominatim");
  return new NominatimGeocoder({
    userAgent: config.userAgent,
    baseUrl: config.nominatimBaseUrl,
    fetchImpl: config.fetchImpl,
  });
}
