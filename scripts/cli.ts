import "dotenv/config";
import { promises as fs } from "node:fs";
import { Command, InvalidArgumentError } from "commander";
import { config } from "./config";
import { extractFacilitiesFile, writeFacilitiesFile } from "./extract_facilities";
import { downloadWorkbook, extractDateFromFilename, verifyWorkbook } from "./fetch_stats";
import { geocodeFile } from "./geocode";
import { countEntries, loadCache, saveCache } from "./geocode_cache";
import { createGeocoder } from "./geocoders";
import { readFacilitiesFile } from "./io";
import { applyOverrides, collectMissing, parseOverridesCsv, writeMissingCsv } from "./missing_coords";
import { RequestScheduler } from "./rate_limiter";
import { findLatestGeocodedFile, renderMapFile } from "./render_map";
import { withErrorHandling } from "./validation";

interface FetchOptions {
  readonly url?: string;
  readonly outputDir: string;
  readonly autoFind: boolean;
  readonly verify?: boolean;
  readonly extractJson?: boolean;
  readonly extractFromFile?: string;
  readonly sheet?: string;
}

interface GeocodeOptions {
  readonly input: string;
  readonly output?: string;
  readonly cache: string;
  readonly delay: number;
  readonly userAgent: string;
  readonly retries: number;
  readonly retryFailed?: boolean;
  readonly report: string;
}

interface RenderOptions {
  readonly input?: string;
  readonly dataDir: string;
  readonly output: string;
}

interface MissingOptions {
  readonly cache: string;
  readonly input?: string;
  readonly output: string;
}

interface OverridesOptions {
  readonly input: string;
  readonly cache: string;
}

function nonNegativeNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative number.");
  return n;
}

function nonNegativeInt(value: string): number {
  const n = nonNegativeNumber(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError("Expected a whole number.");
  return n;
}

/** Runs a stage and prints the path it produced as the last line of output. */
async function runStage(context: string, operation: () => Promise<string>): Promise<void> {
  const result = await withErrorHandling(operation, context);
  if (result.success) {
    console.log(result.data);
  } else {
    console.error(`❌ ${result.error}`);
    process.exitCode = 1;
  }
}

async function extractToJson(xlsxPath: string, outputDir: string, sheet?: string): Promise<string> {
  const sourceDate = extractDateFromFilename(xlsxPath);
  const data = await extractFacilitiesFile(xlsxPath, sourceDate, { sheetName: sheet });
  return writeFacilitiesFile(data, outputDir);
}

async function executeFetch(options: FetchOptions): Promise<string> {
  if (options.extractFromFile) {
    console.log(`📄 Extracting facilities data from existing file: ${options.extractFromFile}`);
    await fs.access(options.extractFromFile);
    return extractToJson(options.extractFromFile, options.outputDir, options.sheet);
  }

  const { filePath } = await downloadWorkbook({
    url: options.url,
    outputDir: options.outputDir,
    autoFind: options.autoFind,
  });

  if (options.verify) {
    console.log("🔍 Verifying downloaded file...");
    const sheets = await verifyWorkbook(filePath);
    console.log(`   Workbook contains ${sheets.length} sheets:`);
    for (const s of sheets) console.log(`   - ${s.name}: ${s.rows} rows, ${s.columns} columns`);
  }

  return options.extractJson ? extractToJson(filePath, options.outputDir, options.sheet) : filePath;
}

async function executeGeocode(options: GeocodeOptions): Promise<string> {
  const geocoder = createGeocoder({
    userAgent: options.userAgent,
    mapboxAccessToken: config.mapboxAccessToken,
    nominatimBaseUrl: config.nominatimBaseUrl,
  });
  const { output } = await geocodeFile({
    input: options.input,
    output: options.output,
    cachePath: options.cache,
    reportPath: options.report,
    geocoder,
    scheduler: new RequestScheduler(options.delay * 1000),
    retries: options.retries,
    retryFailed: options.retryFailed,
  });
  return output;
}

async function executeRender(options: RenderOptions): Promise<string> {
  const input = options.input ?? (await findLatestGeocodedFile(options.dataDir));
  console.log(`📄 Rendering ${input}`);
  await renderMapFile(input, options.output);
  return options.output;
}

async function executeMissing(options: MissingOptions): Promise<string> {
  const cache = await loadCache(options.cache);
  const records = options.input ? (await readFacilitiesFile(options.input)).facilities : [];
  const rows = collectMissing(cache, records);
  await writeMissingCsv(rows, options.output);
  console.log(`📊 ${rows.length} addresses without coordinates`);
  console.log(`✅ Written to: ${options.output}`);
  console.log(`\nFill in latitude/longitude, then run: npm run overrides -- --input ${options.output}`);
  return options.output;
}

async function executeOverrides(options: OverridesOptions): Promise<string> {
  const overrides = parseOverridesCsv(await fs.readFile(options.input, "utf8"));
  const cache = await loadCache(options.cache);
  const next = applyOverrides(cache, overrides);
  await saveCache(options.cache, next);
  const counts = countEntries(next);
  console.log(`✅ Applied ${overrides.length} manual entries to ${options.cache}`);
  console.log(`📊 Cache: ${counts.total} entries, ${counts.manual} manual, ${counts.unresolved} unresolved`);
  return options.cache;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("detention-map")
    .description("Download ICE detention statistics, geocode facilities and render a static map")
    .showHelpAfterError();

  program
    .command("fetch")
    .description("Download the detention statistics workbook, optionally extracting facilities to JSON")
    .option("--url <url>", "Direct URL of the workbook")
    .option("--output-dir <dir>", "Directory for the workbook and JSON", config.dataDir)
    .option("--no-auto-find", "Do not scan the statistics page for the latest link")
    .option("--verify", "Open the downloaded workbook and list its sheets")
    .option("--extract-json", "Extract facilities to JSON after downloading")
    .option("--extract-from-file <xlsx>", "Extract facilities from an existing workbook instead of downloading")
    .option("--sheet <name>", "Facilities sheet name (default: first sheet named Facilities*)")
    .action(async (options: FetchOptions) => {
      await runStage("Fetch", () => executeFetch(options));
    });

  const geocode = program
    .command("geocode")
    .description("Geocode a facilities JSON file through the persistent cache")
    .requiredOption("--input <json>", "Facilities JSON file")
    .option("--output <json>", "Output file (default: facilities_geocoded_<timestamp>.json beside the input)")
    .option("--cache <json>", "Geocode cache file", config.cachePath)
    .option("--delay <seconds>", "Minimum delay between geocoding requests", nonNegativeNumber, config.geocodeDelaySeconds)
    .option("--retries <n>", "Extra attempts per address after a request error", nonNegativeInt, 0)
    .option("--retry-failed", "Look up again addresses cached as not found (manual entries are never touched)")
    .option("--report <json>", "Validation report path", config.geocodeReportPath);
  if (config.geocodeUserAgent) {
    geocode.requiredOption("--user-agent <string>", "Identifying User-Agent sent with every geocoding request", config.geocodeUserAgent);
  } else {
    geocode.requiredOption("--user-agent <string>", "Identifying User-Agent sent with every geocoding request (or GEOCODE_USER_AGENT)");
  }
  geocode.action(async (options: GeocodeOptions) => {
    await runStage("Geocoding process", () => executeGeocode(options));
  });

  program
    .command("render")
    .description("Render the static facilities map")
    .option("--input <json>", "Geocoded facilities file (default: latest in --data-dir)")
    .option("--data-dir <dir>", "Where to look for the latest geocoded file", config.dataDir)
    .option("--output <html>", "Output HTML file", config.mapOutputPath)
    .action(async (options: RenderOptions) => {
      await runStage("Map render", () => executeRender(options));
    });

  program
    .command("missing")
    .description("Export addresses cached without coordinates to CSV for manual geocoding")
    .option("--cache <json>", "Geocode cache file", config.cachePath)
    .option("--input <json>", "Facilities file used to list facility names per address")
    .option("--output <csv>", "CSV to write", config.missingCsvPath)
    .action(async (options: MissingOptions) => {
      await runStage("Missing export", () => executeMissing(options));
    });

  program
    .command("overrides")
    .description("Import manually geocoded addresses from CSV into the cache")
    .requiredOption("--input <csv>", "CSV with address_key, latitude, longitude columns")
    .option("--cache <json>", "Geocode cache file", config.cachePath)
    .action(async (options: OverridesOptions) => {
      await runStage("Overrides import", () => executeOverrides(options));
    });

  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((err) => {
    console.error("❌ detention-map failed:", err);
    process.exit(1);
  });
