import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { CacheCorruptError, countEntries, getEntry, loadCache, parseCache, saveCache, serializeCache } from "./geocode_cache";
import type { GeocodeCache } from "./types";

describe("parseCache", () => {
  it("reads current entries", () => {
    const cache = parseCache(
      JSON.stringify({
        "1 main st, a, tx, 00001": { latitude: 30, longitude: -97, source: "api" },
        "2 main st, b, tx, 00002": { latitude: null, longitude: null, source: "api" },
      }),
    );
    expect(cache).toEqual({
      "1 main st, a, tx, 00001": { latitude: 30, longitude: -97, source: "api" },
      "2 main st, b, tx, 00002": { latitude: null, longitude: null, source: "api" },
    });
  });

  it("reads legacy {lat, lon} entries as api results and drops null ones", () => {
    const cache = parseCache(JSON.stringify({ "1 Main St, A, TX, 00001": { lat: 30.5, lon: -97.25 }, "x, y": null }));
    expect(cache).toEqual({
      "1 main st, a, tx, 00001": { latitude: 30.5, longitude: -97.25, source: "api" },
    });
  });

  it("normalizes hand-edited keys", () => {
    const cache = parseCache(
      JSON.stringify({ " 9 Pine  Rd ,Town, NM": { latitude: 35, longitude: -106, source: "manual" } }),
    );
    expect(Object.keys(cache)).toEqual(["9 pine rd, town, nm"]);
  });

  it("keeps the manual entry when two keys collapse together", () => {
    const cache = parseCache(
      JSON.stringify({
        "9 pine rd, town, nm": { latitude: null, longitude: null, source: "api" },
        "9 Pine Rd, Town, NM": { latitude: 35, longitude: -106, source: "manual" },
      }),
    );
    expect(cache).toEqual({ "9 pine rd, town, nm": { latitude: 35, longitude: -106, source: "manual" } });
  });

  it("keeps the first entry when neither is manual", () => {
    const cache = parseCache(
      JSON.stringify({
        "9 pine rd, town, nm": { latitude: 1, longitude: 2, source: "api" },
        "9 PINE RD, TOWN, NM": { latitude: 3, longitude: 4, source: "api" },
      }),
    );
    expect(cache["9 pine rd, town, nm"]).toEqual({ latitude: 1, longitude: 2, source: "api" });
  });

  it("keeps keys named like object members as ordinary entries", () => {
    const cache = parseCache(
      '{"__proto__": {"latitude": 40, "longitude": -80, "source": "api"},' +
        ' "constructor": {"latitude": null, "longitude": null, "source": "api"}}',
    );

    expect(Object.getPrototypeOf(cache)).toBe(Object.prototype);
    expect(Object.keys(cache)).toEqual(["__proto__", "constructor"]);
    expect(getEntry(cache, "__proto__")).toEqual({ latitude: 40, longitude: -80, source: "api" });
    expect(getEntry(cache, "constructor")).toEqual({ latitude: null, longitude: null, source: "api" });
    expect(getEntry(cache, "toString")).toBeUndefined();
  });

  it("rejects invalid JSON", () => {
    expect(() => parseCache("{not json", "data/cache.json")).toThrow(CacheCorruptError);
    expect(() => parseCache("{not json", "data/cache.json")).toThrow(/^Geocode cache data\/cache.json is corrupt: invalid JSON/);
  });

  it("rejects entries with only one coordinate", () => {
    expect(() => parseCache(JSON.stringify({ k: { latitude: 1, longitude: null, source: "api" } }))).toThrow(
      CacheCorruptError,
    );
  });

  it("rejects an unknown source", () => {
    expect(() => parseCache(JSON.stringify({ k: { latitude: 1, longitude: 2, source: "guess" } }))).toThrow(
      CacheCorruptError,
    );
  });

  it("rejects a top-level array", () => {
    expect(() => parseCache("[]")).toThrow(CacheCorruptError);
  });
});

describe("serializeCache", () => {
  it("sorts keys and ends with a newline", () => {
    const text = serializeCache({
      b: { latitude: 1, longitude: 2, source: "api" },
      a: { latitude: null, longitude: null, source: "api" },
    });
    expect(Object.keys(JSON.parse(text))).toEqual(["a", "b"]);
    expect(text.endsWith("}\n")).toBe(true);
    expect(text).toContain('\n  "a": {\n    "latitude": null,');
  });
});

describe("countEntries", () => {
  it("counts manual and unresolved entries", () => {
    const cache: GeocodeCache = {
      a: { latitude: 1, longitude: 2, source: "api" },
      b: { latitude: null, longitude: null, source: "api" },
      c: { latitude: 3, longitude: 4, source: "manual" },
    };
    expect(countEntries(cache)).toEqual({ total: 3, manual: 1, unresolved: 1 });
  });
});

describe("loadCache / saveCache", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "geocode-cache-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("treats a missing file as an empty cache", async () => {
    expect(await loadCache(path.join(dir, "nope.json"))).toEqual({});
  });

  it("round-trips through disk and leaves no temp file behind", async () => {
    const cachePath = path.join(dir, "nested", "geocode_cache.json");
    const cache: GeocodeCache = {
      "1 main st, a, tx, 00001": { latitude: 30, longitude: -97, source: "api" },
      "2 main st, b, tx, 00002": { latitude: 31, longitude: -98, source: "manual" },
    };
    await saveCache(cachePath, cache);
    expect(await loadCache(cachePath)).toEqual(cache);
    expect(await fs.readdir(path.dirname(cachePath))).toEqual(["geocode_cache.json"]);
  });

  it("refuses to load a corrupt file", async () => {
    const cachePath = path.join(dir, "geocode_cache.json");
    await fs.writeFile(cachePath, '{"a": 1}', "utf8");
    await expect(loadCache(cachePath)).rejects.toThrow(CacheCorruptError);
  });
});
