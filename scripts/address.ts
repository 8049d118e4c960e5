import type { FacilityRecord } from "./types";

type AddressParts = Pick<FacilityRecord, "address" | "city" | "state" | "zip">;

function normalizeAddress(a: string) {
  return a.trim().replace(/\s+/g, " ");
}

function addressParts(r: AddressParts): string[] {
  return [r.address, r.city, r.state, r.zip]
    .map((p) => normalizeAddress(String(p ?? "")))
    .filter(Boolean);
}

/**
 * One-line address sent as the geocoder query,
 * e.g. "123 Main St, Springfield, IL, 62701".
 */
export function formatAddress(r: AddressParts): string {
  return addressParts(r).join(", ");
}

/**
 * Cache key for a facility address. Empty when every part is blank.
 * Commas inside a part split it like any other separator, so a key read
 * back from the cache file normalizes to itself.
 */
export function addressKey(r: AddressParts): string {
  return normalizeKey(formatAddress(r));
}

/**
 * Normalize a key that may have been typed by hand into the cache file
 * or the overrides CSV.
 */
export function normalizeKey(key: string): string {
  return key
    .split(",")
    .map((p) => normalizeAddress(p))
    .filter(Boolean)
    .join(", ")
    .toLowerCase();
}

/** Left-pad all-digit zip codes that lost their leading zeros ("2134" -> "02134"). */
export function normalizeZip(zip: string): string {
  const z = zip.trim();
  return /^\d{1,4}$/.test(z) ? z.padStart(5, "0") : z;
}
