import { promises as fs } from "node:fs";
import path from "node:path";
import * as cheerio from "cheerio";
import * as XLSX from "xlsx";
import { readWorkbookFile } from "./extract_facilities";
import type { FetchLike } from "./geocoders";
import { timestampSlug } from "./io";

export const STATS_PAGE_URL = "https://www.ice.gov/detain/detention-management";
export const DEFAULT_WORKBOOK_URL = "https://www.ice.gov/doclib/detention/FY25_detentionStats06202025.xlsx";

// The stats page rejects non-browser agents
const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0 Safari/537.36";

const LINK_KEYWORDS = [
  "detention",
  "statistics",
  "FY25",
  "FY26",
  "YTD",
  "xlsx",
  "excel",
  "detentionStats",
  "FY2025",
  "FY2026",
];

export class DownloadError extends Error {
  constructor(
    message: string,
    readonly url: string,
  ) {
    super(message);
    this.name = "DownloadError";
  }
}

export type StatsLink = {
  url: string;
  text: string;
  score: number;
};

function absUrl(base: string, href: string) {
  if (href.startsWith("http")) return href;
  return new URL(href, base).toString();
}

/**
 * Score every link on the page by how many keywords its href or text contains.
 * Best first: highest score, then links that point at an .xlsx file.
 */
export function rankStatsLinks(html: string, pageUrl: string): StatsLink[] {
  const $ = cheerio.load(html);
  const links: StatsLink[] = [];

  $("a[href]").each((_, a) => {
    const rawHref = String($(a).attr("href") || "").trim();
    if (!rawHref || rawHref.startsWith("#") || rawHref.startsWith("mailto:")) return;
    const href = rawHref.toLowerCase();
    const text = $(a).text().trim();
    const lowerText = text.toLowerCase();

    const score = LINK_KEYWORDS.filter((k) => {
      const kw = k.toLowerCase();
      return href.includes(kw) || lowerText.includes(kw);
    }).length;
    if (score === 0) return;

    links.push({ url: absUrl(pageUrl, rawHref), text, score });
  });

  const isXlsx = (l: StatsLink) => (l.url.toLowerCase().includes(".xlsx") ? 1 : 0);
  return links.sort((a, b) => b.score - a.score || isXlsx(b) - isXlsx(a));
}

export async function findDetentionStatsLink(
  pageUrl: string = STATS_PAGE_URL,
  fetchImpl: FetchLike = fetch,
): Promise<string | null> {
  console.log(`🔎 Scraping page: ${pageUrl}`);
  let html: string;
  try {
    const res = await fetchImpl(pageUrl, {
      headers: {
        "User-Agent": BROWSER_USER_AGENT,
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
      },
      signal: AbortSignal.timeout(30_000),
    });
    if (!res.ok) {
      console.error(`❌ Failed to scrape page: ${res.status} ${res.statusText}`);
      return null;
    }
    html = await res.text();
  } catch (e) {
    console.error(`❌ Failed to scrape page: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }

  const links = rankStatsLinks(html, pageUrl);
  if (links.length === 0) {
    console.warn("⚠️  No relevant links found on the page");
    return null;
  }
  for (const l of links) console.log(`  found: ${l.text || "(no text)"} -> ${l.url} (score ${l.score})`);

  const best = links[0];
  console.log(`  selected: ${best.text || "(no text)"} -> ${best.url}`);
  return best.url;
}

function isValidDate(year: number, month: number, day: number): boolean {
  const d = new Date(Date.UTC(year, month - 1, day));
  const real = d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
  return real && d.getTime() > Date.UTC(2025, 0, 1);
}

const DATE_PATTERNS = [
  /(?<month>\d{2})(?<day>\d{2})(?<year>\d{4})\.xlsx/i, // MMDDYYYY
  /(?<year>\d{4})(?<month>\d{2})(?<day>\d{2})\.xlsx/i, // YYYYMMDD
  /(?<month>\d{2})(?<day>\d{2})(?<year>\d{2})\.xlsx/i, // MMDDYY
];

/**
 * Publication date from a workbook name like FY25_detentionStats06202025.xlsx.
 * Returns YYYY-MM-DD, or null when no pattern yields a plausible date.
 */
export function extractDateFromFilename(urlOrPath: string): string | null {
  let pathname = urlOrPath;
  try {
    pathname = new URL(urlOrPath).pathname;
  } catch {
    // not a URL, treat as a file path
  }
  const filename = path.posix.basename(pathname.replace(/\\/g, "/"));

  for (const pattern of DATE_PATTERNS) {
    const groups = pattern.exec(filename)?.groups;
    if (!groups) continue;
    let year = Number(groups.year);
    const month = Number(groups.month);
    const day = Number(groups.day);
    if (year < 100) year += 2000;
    if (isValidDate(year, month, day)) {
      return `${year}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
    }
  }

  console.warn(`⚠️  Could not extract date from filename: ${filename}`);
  return null;
}

export function workbookFilename(url: string, now: Date = new Date()): string {
  const base = path.posix.basename(new URL(url).pathname);
  if (base.toLowerCase().endsWith(".xlsx")) return base;
  return `detention_stats_${timestampSlug(now)}.xlsx`;
}

export type DownloadOptions = {
  url?: string;
  outputDir: string;
  autoFind?: boolean;
  pageUrl?: string;
  fetchImpl?: FetchLike;
  now?: Date;
};

export type DownloadResult = {
  filePath: string;
  sourceDate: string | null;
  url: string;
};

/**
 * Fetch stage: discover the current workbook link (unless disabled), download
 * it into `outputDir`. Throws DownloadError when the download fails.
 */
export async function downloadWorkbook(opts: DownloadOptions): Promise<DownloadResult> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  let url = opts.url;

  if (opts.autoFind ?? true) {
    console.log("🔎 Auto-finding latest detention statistics link...");
    const found = await findDetentionStatsLink(opts.pageUrl ?? STATS_PAGE_URL, fetchImpl);
    if (found) url = found;
    else console.warn("⚠️  Could not find latest link, using fallback URL");
  }
  url ??= DEFAULT_WORKBOOK_URL;

  const filePath = path.join(opts.outputDir, workbookFilename(url, opts.now));
  const sourceDate = extractDateFromFilename(url);

  console.log(`📥 Starting download from: ${url}`);
  let res: Response;
  try {
    res = await fetchImpl(url, {
      headers: {
        "User-Agent": BROWSER_USER_AGENT,
        Accept:
          "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet,application/vnd.ms-excel,application/octet-stream",
      },
      signal: AbortSignal.timeout(60_000),
    });
  } catch (e) {
    throw new DownloadError(`Download failed: ${e instanceof Error ? e.message : String(e)}`, url);
  }
  if (!res.ok) {
    throw new DownloadError(`Download failed ${res.status} ${res.statusText}: ${url}`, url);
  }

  const contentType = (res.headers.get("content-type") ?? "").toLowerCase();
  if (!["excel", "spreadsheet", "octet-stream"].some((t) => contentType.includes(t))) {
    console.warn(`⚠️  Unexpected content type: ${contentType || "(none)"}`);
  }

  const body = Buffer.from(await res.arrayBuffer());
  await fs.mkdir(opts.outputDir, { recursive: true });
  await fs.writeFile(filePath, body);

  console.log(`✅ File saved to: ${filePath} (${(body.length / 1024).toFixed(1)} KB)`);
  if (sourceDate) console.log(`   Source date: ${sourceDate}`);

  return { filePath, sourceDate, url };
}

export type SheetSummary = { name: string; rows: number; columns: number };

/** Open a downloaded workbook and list its sheets; throws when it is not a readable workbook. */
export async function verifyWorkbook(filePath: string): Promise<SheetSummary[]> {
  const workbook = await readWorkbookFile(filePath);
  if (workbook.SheetNames.length === 0) throw new Error(`${filePath} contains no sheets`);

  return workbook.SheetNames.map((name) => {
    const ref = workbook.Sheets[name]["!ref"];
    if (!ref) return { name, rows: 0, columns: 0 };
    const range = XLSX.utils.decode_range(ref);
    return { name, rows: range.e.r - range.s.r + 1, columns: range.e.c - range.s.c + 1 };
  });
}
