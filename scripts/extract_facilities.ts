import { promises as fs } from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { normalizeZip } from "./address";
import { timestampSlug, writeJson } from "./io";
import type { FacilityDataFile, FacilityRecord } from "./types";
import { validateFacilityRecord } from "./validation";

export class MalformedWorkbookError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedWorkbookError";
  }
}

type TextField = "name" | "address" | "city" | "state" | "zip";
type CountField = Exclude<keyof FacilityRecord, TextField | "latitude" | "longitude">;

// Spreadsheet header -> record field
const TEXT_COLUMNS: Record<TextField, string> = {
  name: "Name",
  address: "Address",
  city: "City",
  state: "State",
  zip: "Zip",
};

const COUNT_COLUMNS: ReadonlyArray<readonly [CountField, string]> = [
  ["male_criminal", "Male Crim"],
  ["male_non_criminal", "Male Non-Crim"],
  ["female_criminal", "Female Crim"],
  ["female_non_criminal", "Female Non-Crim"],
  ["threat_level_1", "ICE Threat Level 1"],
  ["threat_level_2", "ICE Threat Level 2"],
  ["threat_level_3", "ICE Threat Level 3"],
  ["no_threat_level", "No ICE Threat Level"],
];

// Row 7 in Excel; the rows above hold titles and footnotes
export const DEFAULT_HEADER_ROW = 6;

export type ExtractOptions = {
  sheetName?: string;
  headerRow?: number;
};

function cellText(v: unknown): string {
  if (v === null || v === undefined) return "";
  return String(v).trim();
}

export function parseCount(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const s = cellText(v).replace(/,/g, "");
  if (!s) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function headerKey(h: unknown): string {
  return cellText(h).replace(/\s+/g, " ").toLowerCase();
}

export function pickFacilitySheet(workbook: XLSX.WorkBook, sheetName?: string): string {
  if (sheetName) {
    if (!workbook.SheetNames.includes(sheetName)) {
      throw new MalformedWorkbookError(
        `Sheet "${sheetName}" not found (available: ${workbook.SheetNames.join(", ")})`,
      );
    }
    return sheetName;
  }
  const found = workbook.SheetNames.find((n) => /^facilities/i.test(n.trim()));
  if (!found) {
    throw new MalformedWorkbookError(
      `No "Facilities" sheet found (available: ${workbook.SheetNames.join(", ")})`,
    );
  }
  return found;
}

/**
 * Parse the facilities sheet into records. Throws MalformedWorkbookError
 * (and returns nothing) when the sheet or a required address column is missing.
 */
export function extractFacilities(workbook: XLSX.WorkBook, opts: ExtractOptions = {}): FacilityRecord[] {
  const sheetName = pickFacilitySheet(workbook, opts.sheetName);
  const sheet = workbook.Sheets[sheetName];
  const headerRow = opts.headerRow ?? DEFAULT_HEADER_ROW;

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    range: headerRow,
    defval: null,
    blankrows: false,
    raw: true,
  });
  if (rows.length === 0) {
    throw new MalformedWorkbookError(`Sheet "${sheetName}" has no header at row ${headerRow + 1}`);
  }

  const [header, ...body] = rows;
  const index = new Map<string, number>();
  header.forEach((h, i) => {
    const k = headerKey(h);
    if (k && !index.has(k)) index.set(k, i);
  });
  const col = (name: string) => index.get(headerKey(name));

  const missingRequired = Object.values(TEXT_COLUMNS).filter((c) => col(c) === undefined);
  if (missingRequired.length > 0) {
    throw new MalformedWorkbookError(
      `Sheet "${sheetName}" is missing required columns: ${missingRequired.join(", ")} ` +
        `(found: ${header.map(cellText).filter(Boolean).join(", ")})`,
    );
  }

  const missingCounts = COUNT_COLUMNS.map(([, c]) => c).filter((c) => col(c) === undefined);
  if (missingCounts.length > 0) {
    console.warn(`⚠️  Missing expected columns: ${missingCounts.join(", ")}`);
  }

  const value = (row: unknown[], column: string): unknown => {
    const i = col(column);
    return i === undefined ? null : row[i];
  };

  const facilities: FacilityRecord[] = [];
  for (const row of body) {
    if (row.every((v) => cellText(v) === "")) continue;

    const record: FacilityRecord = {
      name: cellText(value(row, TEXT_COLUMNS.name)),
      address: cellText(value(row, TEXT_COLUMNS.address)),
      city: cellText(value(row, TEXT_COLUMNS.city)),
      state: cellText(value(row, TEXT_COLUMNS.state)),
      zip: normalizeZip(cellText(value(row, TEXT_COLUMNS.zip))),
      male_criminal: null,
      male_non_criminal: null,
      female_criminal: null,
      female_non_criminal: null,
      threat_level_1: null,
      threat_level_2: null,
      threat_level_3: null,
      no_threat_level: null,
    };
    for (const [field, column] of COUNT_COLUMNS) {
      record[field] = parseCount(value(row, column));
    }
    facilities.push(record);
  }

  return facilities;
}

export async function readWorkbookFile(filePath: string): Promise<XLSX.WorkBook> {
  const buf = await fs.readFile(filePath);
  try {
    return XLSX.read(buf, { type: "buffer" });
  } catch (e) {
    throw new MalformedWorkbookError(
      `${filePath} could not be read as a workbook: ${e instanceof Error ? e.message : String(e)}`,
    );
  }
}

export async function extractFacilitiesFile(
  filePath: string,
  sourceDate: string | null,
  opts: ExtractOptions & { now?: Date } = {},
): Promise<FacilityDataFile> {
  const workbook = await readWorkbookFile(filePath);
  const facilities = extractFacilities(workbook, opts);

  const incomplete = facilities.map(validateFacilityRecord).filter((r) => !r.isValid).length;
  console.log(`📊 Extracted ${facilities.length} facilities from ${filePath}`);
  if (incomplete > 0) {
    console.warn(`⚠️  ${incomplete} facilities are missing a name or street address`);
  }

  return {
    metadata: {
      source_file: filePath,
      source_date: sourceDate,
      extraction_date: sourceDate,
      last_checked_date: (opts.now ?? new Date()).toISOString(),
      total_facilities: facilities.length,
    },
    facilities,
  };
}

export async function writeFacilitiesFile(
  data: FacilityDataFile,
  outputDir: string,
  now: Date = new Date(),
): Promise<string> {
  const out = path.join(outputDir, `facilities_${timestampSlug(now)}.json`);
  await writeJson(out, data);
  console.log(`✅ Facilities data saved to: ${out}`);
  return out;
}
