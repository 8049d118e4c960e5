import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  buildFacilityFeatures,
  escapeHtml,
  findLatestGeocodedFile,
  lastCheckedDate,
  makePopup,
  markerStyle,
  renderMapFile,
  renderMapHtml,
  roundCount,
  scriptJson,
  summarize,
} from "./render_map";
import { facility } from "./testing";
import type { FacilityDataFile } from "./types";

const metadata = {
  source_file: "data/FY25_detentionStats06202025.xlsx",
  source_date: "2025-06-20",
  extraction_date: "2025-06-20",
  last_checked_date: "2025-06-21T10:00:00.000Z",
  total_facilities: 2,
};

describe("escapeHtml", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml(`O'Brien & Sons <"Unit">`)).toBe("O&#39;Brien &amp; Sons &lt;&quot;Unit&quot;&gt;");
  });
});

describe("roundCount", () => {
  it("rounds and treats unknown as zero", () => {
    expect(roundCount(2.5)).toBe(3);
    expect(roundCount(2.4)).toBe(2);
    expect(roundCount(null)).toBe(0);
  });
});

describe("markerStyle", () => {
  it.each([
    [0, 6],
    [49, 6],
    [50, 9],
    [199, 9],
    [200, 12],
    [499, 12],
    [500, 15],
    [2000, 15],
  ])("gives %i people a radius of %i", (total, radius) => {
    expect(markerStyle(total).radius).toBe(radius);
  });
});

describe("makePopup", () => {
  it("shows name, address and rounded counts", () => {
    expect(makePopup(facility())).toBe(
      "<b>Test Processing Center</b><br/>1 Main St, A, TX 00001<br/>Criminals: <b>11</b><br/>" +
        "Non-Criminals: <b>22</b><br/>Percentage Criminal: <b>33%</b>",
    );
  });

  it("adds the threat level breakdown when reported", () => {
    const popup = makePopup(facility({ threat_level_1: 4.6, threat_level_3: 0, no_threat_level: 12 }));
    expect(popup.endsWith(
      '<hr style="margin:0.3em 0;"><br/><b>ICE Threat Level Breakdown</b><br/>ICE Threat Level 1: <b>5</b><br/>' +
        "ICE Threat Level 3: <b>0</b><br/>No ICE Threat Level: <b>12</b>",
    )).toBe(true);
  });

  it("reports N/A when there is no population", () => {
    const empty = facility({ male_criminal: null, male_non_criminal: null, female_criminal: null, female_non_criminal: null });
    expect(makePopup(empty)).toContain("Criminals: <b>0</b><br/>Non-Criminals: <b>0</b><br/>Percentage Criminal: <b>N/A</b>");
  });

  it("escapes facility text", () => {
    expect(makePopup(facility({ name: "<script>" })).startsWith("<b>&lt;script&gt;</b>")).toBe(true);
  });
});

describe("buildFacilityFeatures", () => {
  it("emits points for geocoded records only", () => {
    const geo = buildFacilityFeatures([
      facility({ name: "Mapped", latitude: 30.25, longitude: -97.75, male_criminal: 300 }),
      facility({ name: "Unmapped", latitude: null, longitude: null }),
      facility({ name: "Never geocoded" }),
    ]);

    expect(geo.features).toHaveLength(1);
    const [feature] = geo.features;
    expect(feature.geometry.coordinates).toEqual([-97.75, 30.25]);
    expect(feature.properties).toMatchObject({ name: "Mapped", total: 323, radius: 12 });
  });
});

describe("summarize", () => {
  it("totals population across all records", () => {
    const summary = summarize([
      facility({ latitude: 30, longitude: -97 }),
      facility({ male_criminal: 0, female_criminal: 0, male_non_criminal: 60, female_non_criminal: 7 }),
    ]);
    // 33 + 67 people, 22 + 67 without a criminal record
    expect(summary).toEqual({ totalPeople: 100, nonCriminalPct: "89%", mapped: 1, unmapped: 1 });
  });
});

describe("lastCheckedDate", () => {
  it("prefers the publication date", () => {
    expect(lastCheckedDate(metadata)).toBe("2025-06-20");
  });

  it("falls back to the check time", () => {
    expect(lastCheckedDate({ ...metadata, extraction_date: null })).toBe("2025-06-21");
  });

  it("is null without metadata", () => {
    expect(lastCheckedDate(undefined)).toBeNull();
  });
});

describe("scriptJson", () => {
  it("cannot close the surrounding script element", () => {
    expect(scriptJson({ popup: "</script>" })).toBe('{"popup":"\\u003c/script>"}');
  });
});

describe("renderMapHtml", () => {
  const data: FacilityDataFile = {
    metadata,
    facilities: [facility({ latitude: 30, longitude: -97 }), facility({ name: "Elsewhere" })],
  };

  it("renders the header stats and last checked date", () => {
    const html = renderMapHtml(data);
    expect(html.startsWith("<!DOCTYPE html>")).toBe(true);
    expect(html).toContain("<strong>66</strong> people in ICE detention");
    expect(html).toContain("<strong>67%</strong> without criminal records");
    expect(html).toContain('<div id="last-updated">last checked 2025-06-20</div>');
  });

  it("embeds the mapped facilities as GeoJSON", () => {
    const html = renderMapHtml(data);
    expect(html).toContain(`const facilities = ${scriptJson(buildFacilityFeatures(data.facilities))};`);
    expect(html).toContain('"coordinates":[-97,30]');
  });
});

describe("findLatestGeocodedFile / renderMapFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "render-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("picks the newest geocoded file by name", async () => {
    for (const name of [
      "facilities_geocoded_20250101_000000.json",
      "facilities_geocoded_20250620_120000.json",
      "facilities_20250701_000000.json",
    ]) {
      await fs.writeFile(path.join(dir, name), "{}", "utf8");
    }
    expect(await findLatestGeocodedFile(dir)).toBe(path.join(dir, "facilities_geocoded_20250620_120000.json"));
  });

  it("fails when there is nothing to render", async () => {
    await expect(findLatestGeocodedFile(dir)).rejects.toThrow(`No geocoded facilities found in ${dir}`);
    const missing = path.join(dir, "missing");
    await expect(findLatestGeocodedFile(missing)).rejects.toThrow(`No geocoded facilities found in ${missing}`);
  });

  it("writes the page", async () => {
    const input = path.join(dir, "facilities_geocoded_20250620_120000.json");
    const output = path.join(dir, "docs", "index.html");
    const data: FacilityDataFile = { metadata, facilities: [facility({ latitude: 30, longitude: -97 })] };
    await fs.writeFile(input, JSON.stringify(data), "utf8");

    const summary = await renderMapFile(input, output);

    expect(summary).toEqual({ totalPeople: 33, nonCriminalPct: "67%", mapped: 1, unmapped: 0 });
    expect(await fs.readFile(output, "utf8")).toBe(renderMapHtml(data));
  });
});
