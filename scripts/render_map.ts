import { promises as fs } from "node:fs";
import path from "node:path";
import type { Feature, FeatureCollection, Point } from "geojson";
import type { CircleLayerSpecification, StyleSpecification } from "@maplibre/maplibre-gl-style-spec";
import { readFacilitiesFile } from "./io";
import type { FacilityDataFile, FacilityMetadata, FacilityRecord } from "./types";

const MAPLIBRE_VERSION = "4.7.1";
const US_CENTER: [number, number] = [-98.5795, 39.8283]; // [lng, lat]

export type FacilityMarkerProps = {
  name: string;
  popup: string;
  total: number;
  color: string;
  radius: number;
};

export type MarkerStyle = { color: string; radius: number; label: string };

const MARKER_STYLES: Array<MarkerStyle & { below: number }> = [
  { below: 50, color: "rgba(76,175,80,0.7)", radius: 6, label: "&lt; 50 people" },
  { below: 200, color: "rgba(255,235,59,0.7)", radius: 9, label: "50–199 people" },
  { below: 500, color: "rgba(255,152,0,0.7)", radius: 12, label: "200–499 people" },
  { below: Infinity, color: "rgba(244,67,54,0.7)", radius: 15, label: "500+ people" },
];

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** Round a population figure for display; unknown counts as 0. */
export function roundCount(v: number | null | undefined): number {
  if (v === null || v === undefined || !Number.isFinite(v)) return 0;
  return Math.round(v);
}

function sumKnown(a: number | null, b: number | null): number | null {
  if (a === null && b === null) return null;
  return (a ?? 0) + (b ?? 0);
}

export function criminalCount(r: FacilityRecord): number | null {
  return sumKnown(r.male_criminal, r.female_criminal);
}

export function nonCriminalCount(r: FacilityRecord): number | null {
  return sumKnown(r.male_non_criminal, r.female_non_criminal);
}

function populationOf(r: FacilityRecord) {
  const criminals = roundCount(criminalCount(r));
  const nonCriminals = roundCount(nonCriminalCount(r));
  return { criminals, nonCriminals, total: criminals + nonCriminals };
}

export function markerStyle(total: number): MarkerStyle {
  const style = MARKER_STYLES.find((s) => total < s.below) ?? MARKER_STYLES[MARKER_STYLES.length - 1];
  return { color: style.color, radius: style.radius, label: style.label };
}

export function makePopup(r: FacilityRecord): string {
  const { criminals, nonCriminals, total } = populationOf(r);
  const pctCriminal = total > 0 ? `${Math.round((100 * criminals) / total)}%` : "N/A";
  const stateZip = [r.state, r.zip].filter(Boolean).join(" ");
  const addressLine = [r.address, r.city, stateZip].filter(Boolean).join(", ");

  const lines = [
    `<b>${escapeHtml(r.name || "Unknown")}</b>`,
    escapeHtml(addressLine),
    `Criminals: <b>${criminals}</b>`,
    `Non-Criminals: <b>${nonCriminals}</b>`,
    `Percentage Criminal: <b>${pctCriminal}</b>`,
  ];

  const threatLevels: Array<[string, number | null]> = [
    ["ICE Threat Level 1", r.threat_level_1],
    ["ICE Threat Level 2", r.threat_level_2],
    ["ICE Threat Level 3", r.threat_level_3],
    ["No ICE Threat Level", r.no_threat_level],
  ];
  if (threatLevels.some(([, v]) => v !== null)) {
    lines.push('<hr style="margin:0.3em 0;">');
    lines.push("<b>ICE Threat Level Breakdown</b>");
    for (const [label, v] of threatLevels) {
      if (v !== null) lines.push(`${label}: <b>${roundCount(v)}</b>`);
    }
  }
  return lines.join("<br/>");
}

function hasCoordinates(r: FacilityRecord): r is FacilityRecord & { latitude: number; longitude: number } {
  return (
    typeof r.latitude === "number" &&
    typeof r.longitude === "number" &&
    Number.isFinite(r.latitude) &&
    Number.isFinite(r.longitude)
  );
}

export function buildFacilityFeatures(records: readonly FacilityRecord[]): FeatureCollection<Point, FacilityMarkerProps> {
  const features: Feature<Point, FacilityMarkerProps>[] = [];
  for (const r of records) {
    if (!hasCoordinates(r)) continue;
    const { total } = populationOf(r);
    const { color, radius } = markerStyle(total);
    features.push({
      type: "Feature",
      geometry: { type: "Point", coordinates: [r.longitude, r.latitude] },
      properties: { name: r.name, popup: makePopup(r), total, color, radius },
    });
  }
  return { type: "FeatureCollection", features };
}

export type MapSummary = {
  totalPeople: number;
  nonCriminalPct: string;
  mapped: number;
  unmapped: number;
};

export function summarize(records: readonly FacilityRecord[]): MapSummary {
  let criminals = 0;
  let nonCriminals = 0;
  let mapped = 0;
  for (const r of records) {
    const p = populationOf(r);
    criminals += p.criminals;
    nonCriminals += p.nonCriminals;
    if (hasCoordinates(r)) mapped++;
  }
  const totalPeople = criminals + nonCriminals;
  return {
    totalPeople,
    nonCriminalPct: totalPeople > 0 ? `${Math.round((100 * nonCriminals) / totalPeople)}%` : "N/A",
    mapped,
    unmapped: records.length - mapped,
  };
}

/** YYYY-MM-DD of the date the data was published, falling back to when it was checked. */
export function lastCheckedDate(metadata: FacilityMetadata | undefined): string | null {
  const raw = metadata?.extraction_date ?? metadata?.last_checked_date ?? null;
  if (!raw) return null;
  const m = /^(\d{4}-\d{2}-\d{2})/.exec(raw);
  return m ? m[1] : raw.split("T")[0];
}

/** JSON safe to inline in a <script> element. */
export function scriptJson(data: unknown): string {
  return JSON.stringify(data)
    .replace(/</g, "\\u003c")
    .replace(/\u2028/g, "\\u2028")
    .replace(/\u2029/g, "\\u2029");
}

export const MAP_STYLE: StyleSpecification = {
  version: 8,
  sources: {
    osm: {
      type: "raster",
      tiles: ["https://tile.openstreetmap.org/{z}/{x}/{y}.png"],
      tileSize: 256,
      attribution: '© <a href="https://www.openstreetmap.org/copyright">OpenStreetMap</a> contributors',
    },
  },
  layers: [{ id: "osm", type: "raster", source: "osm" }],
};

export const FACILITY_LAYER: CircleLayerSpecification = {
  id: "facilities-points",
  type: "circle",
  source: "facilities",
  paint: {
    "circle-radius": ["get", "radius"],
    "circle-color": ["get", "color"],
    "circle-stroke-width": 2,
    "circle-stroke-color": "#222222",
  },
};

function legendHtml(): string {
  return MARKER_STYLES.map((s) => {
    const d = s.radius * 2;
    return `      <div class="legend-row"><span class="legend-icon" style="background:${s.color};width:${d}px;height:${d}px;"></span><span class="legend-label">${s.label}</span></div>`;
  }).join("\n");
}

export function renderMapHtml(data: FacilityDataFile): string {
  const summary = summarize(data.facilities);
  const geojson = buildFacilityFeatures(data.facilities);
  const checked = lastCheckedDate(data.metadata);

  const stats = [
    `<div class="stat-item"><strong>${summary.totalPeople.toLocaleString("en-US")}</strong> people in ICE detention</div>`,
    `<div class="stat-item"><strong>${summary.nonCriminalPct}</strong> without criminal records</div>`,
  ].join("\n        ");

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <title>ICE Detention Map</title>
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <link rel="stylesheet" href="https://unpkg.com/maplibre-gl@${MAPLIBRE_VERSION}/dist/maplibre-gl.css" />
  <style>
    html, body { margin: 0; height: 100%; font-family: system-ui, sans-serif; }
    body { display: flex; flex-direction: column; }
    #header-bar { display: flex; flex-wrap: wrap; gap: 1.5em; align-items: center; padding: 0.5em 1em; background: #1e293b; color: #f8fafc; }
    #header-title { font-weight: 700; font-size: 1.2em; }
    #header-stats { display: flex; gap: 1.5em; }
    main { position: relative; flex: 1; }
    #map { position: absolute; inset: 0; }
    .legend { position: absolute; bottom: 30px; left: 20px; background: rgba(255,255,255,0.92); padding: 0.6em 0.8em; border-radius: 6px; font-size: 0.85em; }
    .legend-row { display: flex; align-items: center; gap: 0.5em; margin: 0.2em 0; }
    .legend-icon { display: inline-block; border-radius: 50%; border: 2px solid #222; }
    #last-updated { position: absolute; bottom: 8px; right: 12px; font-size: 0.75em; color: #334155; }
  </style>
</head>
<body>
  <header>
    <nav id="header-bar">
      <div id="header-title">ICE Detention Map</div>
      <div id="header-stats">
        ${stats}
      </div>
    </nav>
  </header>
  <main>
    <div id="map"></div>
    <div class="legend" id="legend-box">
      <div style="font-weight:600; margin-bottom:0.5em;">Legend</div>
${legendHtml()}
    </div>${checked ? `\n    <div id="last-updated">last checked ${escapeHtml(checked)}</div>` : ""}
  </main>
  <script src="https://unpkg.com/maplibre-gl@${MAPLIBRE_VERSION}/dist/maplibre-gl.js"></script>
  <script>
    const facilities = ${scriptJson(geojson)};
    const map = new maplibregl.Map({
      container: "map",
      style: ${scriptJson(MAP_STYLE)},
      center: ${JSON.stringify(US_CENTER)},
      zoom: 3,
      maxZoom: 18,
    });
    map.addControl(new maplibregl.NavigationControl(), "top-left");

    map.on("load", () => {
      map.addSource("facilities", { type: "geojson", data: facilities });
      map.addLayer(${scriptJson(FACILITY_LAYER)});

      map.on("click", "${FACILITY_LAYER.id}", (e) => {
        const f = e.features && e.features[0];
        if (!f) return;
        new maplibregl.Popup()
          .setLngLat(f.geometry.coordinates.slice())
          .setHTML(f.properties.popup)
          .addTo(map);
      });
      map.on("mouseenter", "${FACILITY_LAYER.id}", () => { map.getCanvas().style.cursor = "pointer"; });
      map.on("mouseleave", "${FACILITY_LAYER.id}", () => { map.getCanvas().style.cursor = ""; });
    });
  </script>
</body>
</html>
`;
}

const GEOCODED_FILE = /^facilities_geocoded_.*\.json$/;

/** Newest geocoded facilities file in `dir`, by file name (names carry the run timestamp). */
export async function findLatestGeocodedFile(dir: string): Promise<string> {
  let names: string[] = [];
  try {
    names = await fs.readdir(dir);
  } catch (e) {
    if (!(e instanceof Error && "code" in e && e.code === "ENOENT")) throw e;
  }
  const matches = names.filter((n) => GEOCODED_FILE.test(n)).sort();
  const latest = matches[matches.length - 1];
  if (!latest) throw new Error(`No geocoded facilities found in ${dir}`);
  return path.join(dir, latest);
}

export async function renderMapFile(input: string, output: string): Promise<MapSummary> {
  const data = await readFacilitiesFile(input);
  const html = renderMapHtml(data);
  await fs.mkdir(path.dirname(output), { recursive: true });
  await fs.writeFile(output, html, "utf8");

  const summary = summarize(data.facilities);
  console.log(`✅ Map written to: ${output}`);
  console.log(`📊 ${summary.mapped} facilities mapped, ${summary.unmapped} without coordinates`);
  return summary;
}
