import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { normalizeKey } from "./address";
import type { GeocodeCache, GeocodeCacheEntry } from "./types";

export class CacheCorruptError extends Error {
  constructor(
    readonly cachePath: string,
    detail: string,
  ) {
    super(`Geocode cache ${cachePath} is corrupt: ${detail}`);
    this.name = "CacheCorruptError";
  }
}

const entrySchema = z
  .object({
    latitude: z.number().finite().nullable(),
    longitude: z.number().finite().nullable(),
    source: z.enum(["api", "manual"]),
  })
  .strict()
  .refine((e) => (e.latitude === null) === (e.longitude === null), {
    message: "latitude and longitude must both be numbers or both be null",
  });

// Older caches stored bare {lat, lon} pairs for successful lookups only.
const legacyEntrySchema = z
  .object({ lat: z.number().finite(), lon: z.number().finite() })
  .strict()
  .transform((e): GeocodeCacheEntry => ({ latitude: e.lat, longitude: e.lon, source: "api" }));

const cacheValueSchema = z.union([entrySchema, legacyEntrySchema, z.null()]);

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .slice(0, 5)
    .map((i) => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
    .join("; ");
}

// Address keys are arbitrary text, so only own properties count and writes
// define the property ("__proto__" or "constructor" are just keys here).
export function getEntry(cache: Readonly<GeocodeCache>, key: string): GeocodeCacheEntry | undefined {
  return Object.hasOwn(cache, key) ? cache[key] : undefined;
}

export function setEntry(cache: GeocodeCache, key: string, entry: GeocodeCacheEntry): void {
  Object.defineProperty(cache, key, { value: entry, enumerable: true, writable: true, configurable: true });
}

/**
 * Parse cache file contents. Keys are re-normalized; when two keys collapse
 * to the same address a manual entry beats an api one, otherwise the first wins.
 */
export function parseCache(text: string, cachePath = "<cache>"): GeocodeCache {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new CacheCorruptError(cachePath, `invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    throw new CacheCorruptError(cachePath, "expected an object of address keys");
  }

  const rawEntries: Array<[string, unknown]> = Object.entries(json);
  const issues: z.ZodIssue[] = [];
  const cache: GeocodeCache = {};
  for (const [rawKey, value] of rawEntries) {
    const parsed = cacheValueSchema.safeParse(value);
    if (!parsed.success) {
      issues.push(...parsed.error.issues.map((i) => ({ ...i, path: [rawKey, ...i.path] })));
      continue;
    }
    const entry = parsed.data;
    if (entry === null) continue;
    const key = normalizeKey(rawKey);
    if (!key) continue;
    const existing = getEntry(cache, key);
    if (existing && !(existing.source === "api" && entry.source === "manual")) continue;
    setEntry(cache, key, entry);
  }
  if (issues.length > 0) throw new CacheCorruptError(cachePath, formatIssues(issues));
  return cache;
}

export async function loadCache(cachePath: string): Promise<GeocodeCache> {
  let text: string;
  try {
    text = await fs.readFile(cachePath, "utf8");
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return {};
    throw e;
  }
  return parseCache(text, cachePath);
}

export function serializeCache(cache: GeocodeCache): string {
  const sorted: GeocodeCache = {};
  for (const key of Object.keys(cache).sort()) {
    const { latitude, longitude, source } = cache[key];
    setEntry(sorted, key, { latitude, longitude, source });
  }
  return JSON.stringify(sorted, null, 2) + "\n";
}

/** Write via a temp file + rename so an interrupted save leaves the old cache intact. */
export async function saveCache(cachePath: string, cache: GeocodeCache): Promise<void> {
  await fs.mkdir(path.dirname(cachePath), { recursive: true });
  const tmp = `${cachePath}.${process.pid}.tmp`;
  await fs.writeFile(tmp, serializeCache(cache), "utf8");
  await fs.rename(tmp, cachePath);
}

export function countEntries(cache: GeocodeCache) {
  let manual = 0;
  let unresolved = 0;
  for (const entry of Object.values(cache)) {
    if (entry.source === "manual") manual++;
    if (entry.latitude === null) unresolved++;
  }
  return { total: Object.keys(cache).length, manual, unresolved };
}
