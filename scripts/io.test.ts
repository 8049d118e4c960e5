import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { readFacilitiesFile, timestampSlug, writeJson } from "./io";
import { facility } from "./testing";
import type { FacilityDataFile } from "./types";

describe("timestampSlug", () => {
  it("formats local time", () => {
    expect(timestampSlug(new Date(2025, 11, 3, 14, 30, 5))).toBe("20251203_143005");
  });
});

describe("readFacilitiesFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "io-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads back what writeJson wrote, keeping numeric precision", async () => {
    const data: FacilityDataFile = {
      metadata: {
        source_file: "data/FY25_detentionStats06202025.xlsx",
        source_date: null,
        extraction_date: null,
        last_checked_date: "2025-06-21T10:00:00.000Z",
        total_facilities: 1,
        geocoded_at: "2025-06-22T10:00:00.000Z",
      },
      facilities: [facility({ male_criminal: 12.345678901234, latitude: 29.760427123456, longitude: -95.369803987654 })],
    };
    const p = path.join(dir, "sub", "facilities.json");
    await writeJson(p, data);
    expect(await readFacilitiesFile(p)).toEqual(data);
  });

  it("rejects invalid JSON", async () => {
    const p = path.join(dir, "bad.json");
    await fs.writeFile(p, "{", "utf8");
    await expect(readFacilitiesFile(p)).rejects.toThrow(`${p} is not valid JSON`);
  });

  it("rejects a file of the wrong shape", async () => {
    const p = path.join(dir, "cache.json");
    await fs.writeFile(p, JSON.stringify({ "1 main st": { latitude: 1, longitude: 2, source: "api" } }), "utf8");
    await expect(readFacilitiesFile(p)).rejects.toThrow(`${p} is not a facilities file: metadata: Required`);
  });
});
