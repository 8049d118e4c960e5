// Round trip for addresses the geocoder could not resolve:
//   missing   -> CSV of unresolved cache keys, latitude/longitude left blank
//   overrides -> read the filled-in CSV back as manual cache entries

import { promises as fs } from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { addressKey, normalizeKey } from "./address";
import { setEntry } from "./geocode_cache";
import type { FacilityRecord, GeocodeCache } from "./types";
import { validateCoordinates } from "./validation";

export class OverridesError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid overrides:\n  ${problems.join("\n  ")}`);
    this.name = "OverridesError";
  }
}

export type MissingRow = {
  address_key: string;
  facility_names: string;
  latitude: string;
  longitude: string;
};

export type Override = {
  key: string;
  latitude: number;
  longitude: number;
};

const COLUMNS = ["address_key", "facility_names", "latitude", "longitude"] as const;

const csvRowsSchema = z.array(z.record(z.string()));

export function collectMissing(cache: GeocodeCache, records: readonly FacilityRecord[] = []): MissingRow[] {
  const namesByKey = new Map<string, Set<string>>();
  for (const r of records) {
    const key = addressKey(r);
    if (!key) continue;
    const names = namesByKey.get(key) ?? new Set<string>();
    if (r.name) names.add(r.name);
    namesByKey.set(key, names);
  }

  return Object.keys(cache)
    .filter((key) => cache[key].latitude === null || cache[key].longitude === null)
    .sort()
    .map((key) => ({
      address_key: key,
      facility_names: [...(namesByKey.get(key) ?? [])].sort().join("; "),
      latitude: "",
      longitude: "",
    }));
}

export function missingCsv(rows: MissingRow[]): string {
  return stringify(rows, { header: true, columns: [...COLUMNS] });
}

export async function writeMissingCsv(rows: MissingRow[], outPath: string): Promise<void> {
  await fs.mkdir(path.dirname(outPath), { recursive: true });
  await fs.writeFile(outPath, missingCsv(rows), "utf8");
}

/**
 * Rows with both coordinates filled become overrides; rows left blank are
 * skipped. Any malformed row fails the whole import.
 */
export function parseOverridesCsv(text: string): Override[] {
  const rows = csvRowsSchema.parse(
    parse(text, {
      bom: true,
      columns: true,
      skip_empty_lines: true,
      trim: true,
    }),
  );

  const overrides: Override[] = [];
  const problems: string[] = [];

  rows.forEach((row, i) => {
    const line = i + 2;
    const key = normalizeKey(row.address_key ?? "");
    const latText = row.latitude ?? "";
    const lonText = row.longitude ?? "";

    if (!latText && !lonText) return;
    if (!key) {
      problems.push(`row ${line}: missing address_key`);
      return;
    }
    const latitude = Number(latText);
    const longitude = Number(lonText);
    if (!latText || !lonText || !Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      problems.push(`row ${line} (${key}): latitude and longitude must both be numbers`);
      return;
    }
    if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
      problems.push(`row ${line} (${key}): coordinates out of range: ${latitude}, ${longitude}`);
      return;
    }
    overrides.push({ key, latitude, longitude });
  });

  if (problems.length > 0) throw new OverridesError(problems);
  return overrides;
}

/** Returns a new cache with each override stored as a manual entry. */
export function applyOverrides(cache: Readonly<GeocodeCache>, overrides: readonly Override[]): GeocodeCache {
  const next: GeocodeCache = { ...cache };
  for (const o of overrides) {
    const check = validateCoordinates(o.latitude, o.longitude);
    for (const w of check.warnings) console.warn(`⚠️  ${o.key}: ${w}`);
    setEntry(next, o.key, { latitude: o.latitude, longitude: o.longitude, source: "manual" });
  }
  return next;
}
