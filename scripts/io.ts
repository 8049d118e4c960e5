import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { FacilityDataFile } from "./types";

const count = z.number().finite().nullable();
const coordinate = z.number().finite().nullable().optional();

const facilitySchema = z.object({
  name: z.string(),
  address: z.string(),
  city: z.string(),
  state: z.string(),
  zip: z.string(),
  male_criminal: count,
  male_non_criminal: count,
  female_criminal: count,
  female_non_criminal: count,
  threat_level_1: count,
  threat_level_2: count,
  threat_level_3: count,
  no_threat_level: count,
  latitude: coordinate,
  longitude: coordinate,
});

const facilityFileSchema = z.object({
  metadata: z.object({
    source_file: z.string(),
    source_date: z.string().nullable(),
    extraction_date: z.string().nullable(),
    last_checked_date: z.string(),
    total_facilities: z.number().int().nonnegative(),
    geocoded_at: z.string().optional(),
  }),
  facilities: z.array(facilitySchema),
});

export async function writeJson(p: string, data: unknown) {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, JSON.stringify(data, null, 2) + "\n", "utf8");
}

export async function readFacilitiesFile(p: string): Promise<FacilityDataFile> {
  const txt = await fs.readFile(p, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(txt);
  } catch (e) {
    throw new Error(`${p} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = facilityFileSchema.safeParse(json);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new Error(`${p} is not a facilities file: ${first.path.map(String).join(".")}: ${first.message}`);
  }
  return parsed.data;
}

/** Local-time stamp used in output file names, e.g. 20261019_143005. */
export function timestampSlug(d: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}` +
    `_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  );
}
