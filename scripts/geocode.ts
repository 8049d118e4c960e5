import path from "node:path";
import { addressKey, formatAddress } from "./address";
import { countEntries, getEntry, loadCache, saveCache, setEntry } from "./geocode_cache";
import type { Geocoder } from "./geocoders";
import { readFacilitiesFile, timestampSlug, writeJson } from "./io";
import { RequestScheduler } from "./rate_limiter";
import type { Coordinates, FacilityDataFile, FacilityRecord, GeocodeCache, GeocodeCacheEntry } from "./types";
import { validateCoordinates, writeValidationReport, type ReportEntry } from "./validation";

export type ResolveOutcome = "skipped" | "cache_hit" | "resolved" | "not_found" | "error";

export type ResolveProgress = {
  index: number;
  total: number;
  name: string;
  query: string;
  outcome: ResolveOutcome;
  entry: GeocodeCacheEntry | null;
  error?: string;
};

export type ResolveOptions = {
  geocoder: Geocoder;
  scheduler: RequestScheduler;
  /** Extra attempts after a thrown lookup error before caching a negative result. */
  retries?: number;
  /** Re-query cached api misses (lat/lon null). Manual entries are never re-queried. */
  retryFailed?: boolean;
  /** Called with the cache after every lookup so an interrupted run keeps its work. */
  persist?: (cache: GeocodeCache) => Promise<void>;
  onProgress?: (event: ResolveProgress) => void;
};

export type ResolveStats = {
  total: number;
  cacheHits: number;
  lookups: number;
  resolved: number;
  failed: number;
  skipped: number;
};

export type ResolveResult = {
  records: FacilityRecord[];
  cache: GeocodeCache;
  stats: ResolveStats;
};

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function isCacheHit(entry: GeocodeCacheEntry | undefined, retryFailed: boolean): entry is GeocodeCacheEntry {
  if (!entry) return false;
  if (entry.source === "manual") return true;
  return !(retryFailed && entry.latitude === null);
}

async function lookupWithRetries(
  query: string,
  opts: ResolveOptions,
  stats: ResolveStats,
): Promise<{ coords: Coordinates | null; error?: string }> {
  const attempts = 1 + Math.max(0, opts.retries ?? 0);
  let lastError = "";
  for (let attempt = 1; attempt <= attempts; attempt++) {
    stats.lookups++;
    try {
      return { coords: await opts.scheduler.run(() => opts.geocoder.lookup(query)) };
    } catch (e) {
      lastError = errorMessage(e);
    }
  }
  return { coords: null, error: lastError };
}

/**
 * Fill in latitude/longitude for each record.
 *
 * A key already in the cache is never looked up again, whatever its age or
 * result; each miss costs exactly one external call (plus `retries` on error)
 * and its result, found or not, is cached. Neither `records` nor `cache` is
 * mutated.
 */
export async function resolve(
  records: readonly FacilityRecord[],
  cache: Readonly<GeocodeCache>,
  opts: ResolveOptions,
): Promise<ResolveResult> {
  const next: GeocodeCache = { ...cache };
  const out: FacilityRecord[] = [];
  const stats: ResolveStats = {
    total: records.length,
    cacheHits: 0,
    lookups: 0,
    resolved: 0,
    failed: 0,
    skipped: 0,
  };

  for (const [i, r] of records.entries()) {
    const key = addressKey(r);
    const query = formatAddress(r);
    const progress = { index: i, total: records.length, name: r.name, query };

    if (!key) {
      stats.skipped++;
      stats.failed++;
      out.push({ ...r, latitude: null, longitude: null });
      opts.onProgress?.({ ...progress, outcome: "skipped", entry: null });
      continue;
    }

    let entry = getEntry(next, key);
    let outcome: ResolveOutcome;
    let error: string | undefined;

    if (isCacheHit(entry, opts.retryFailed ?? false)) {
      stats.cacheHits++;
      outcome = "cache_hit";
    } else {
      const result = await lookupWithRetries(query, opts, stats);
      entry = {
        latitude: result.coords?.lat ?? null,
        longitude: result.coords?.lon ?? null,
        source: "api",
      };
      setEntry(next, key, entry);
      outcome = result.coords ? "resolved" : result.error !== undefined ? "error" : "not_found";
      error = result.error;
      if (opts.persist) await opts.persist(next);
    }

    if (entry.latitude === null) stats.failed++;
    else stats.resolved++;

    out.push({ ...r, latitude: entry.latitude, longitude: entry.longitude });
    opts.onProgress?.({ ...progress, outcome, entry, error });
  }

  return { records: out, cache: next, stats };
}

function logProgress(e: ResolveProgress) {
  const prefix = `[${e.index + 1}/${e.total}]`;
  switch (e.outcome) {
    case "skipped":
      console.log(`${prefix} No address for "${e.name}", skipping.`);
      break;
    case "cache_hit":
      console.log(`${prefix} Cached: ${e.query} -> ${e.entry?.latitude ?? "null"}, ${e.entry?.longitude ?? "null"}`);
      break;
    case "resolved":
      console.log(`${prefix} Geocoded: ${e.query} -> ${e.entry?.latitude}, ${e.entry?.longitude}`);
      break;
    case "not_found":
      console.warn(`${prefix} ⚠️  No match for: ${e.query}`);
      break;
    case "error":
      console.warn(`${prefix} ⚠️  Error geocoding "${e.query}": ${e.error}`);
      break;
  }
}

export type GeocodeFileOptions = {
  input: string;
  output?: string;
  cachePath: string;
  reportPath?: string;
  geocoder: Geocoder;
  scheduler: RequestScheduler;
  retries?: number;
  retryFailed?: boolean;
  now?: Date;
};

export function defaultGeocodedPath(input: string, now: Date = new Date()): string {
  return path.join(path.dirname(input), `facilities_geocoded_${timestampSlug(now)}.json`);
}

/**
 * Geocode stage: read a facilities file, resolve against the cache file,
 * write the enriched file and a validation report. Returns the output path.
 */
export async function geocodeFile(opts: GeocodeFileOptions): Promise<{ output: string; stats: ResolveStats }> {
  const now = opts.now ?? new Date();
  const output = opts.output ?? defaultGeocodedPath(opts.input, now);

  console.log(`📄 Loading facilities from: ${opts.input}`);
  const data = await readFacilitiesFile(opts.input);

  console.log(`📦 Loading geocode cache from: ${opts.cachePath}`);
  const cache = await loadCache(opts.cachePath);
  const before = countEntries(cache);
  console.log(`   ${before.total} entries (${before.manual} manual, ${before.unresolved} unresolved)`);

  console.log(`📊 Processing ${data.facilities.length} facility records for geocoding`);

  const result = await resolve(data.facilities, cache, {
    geocoder: opts.geocoder,
    scheduler: opts.scheduler,
    retries: opts.retries,
    retryFailed: opts.retryFailed,
    persist: (c) => saveCache(opts.cachePath, c),
    onProgress: logProgress,
  });

  const enriched: FacilityDataFile = {
    metadata: { ...data.metadata, geocoded_at: now.toISOString() },
    facilities: result.records,
  };
  await writeJson(output, enriched);

  if (opts.reportPath) {
    const entries: ReportEntry[] = result.records.map((r) => ({
      label: `${r.name || "Unknown"} (${formatAddress(r) || "no address"})`,
      result: validateCoordinates(r.latitude ?? null, r.longitude ?? null),
    }));
    await writeValidationReport(opts.reportPath, entries, "Geocoding Validation", now);
  }

  const { stats } = result;
  console.log(`\n✅ Wrote ${output}`);
  if (stats.lookups > 0) console.log(`✅ Cache updated at ${opts.cachePath}`);
  else console.log("✅ No new addresses geocoded; cache unchanged.");
  console.log(
    `📊 Geocoding results: ${stats.resolved} success, ${stats.failed} failed, ${stats.cacheHits} cache hits, ${stats.lookups} lookups`,
  );
  if (stats.failed > 0) {
    console.warn(`⚠️  ${stats.failed} facilities could not be geocoded. Add manual entries to ${opts.cachePath}.`);
  }

  return { output, stats };
}
