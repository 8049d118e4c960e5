import { writeJson } from "./io";
import type { FacilityRecord } from "./types";

// Shared validation utilities for data processing pipeline

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export type ProcessingResult<T> = { success: true; data: T } | { success: false; error: string };

/** A validation result tied to the record it was computed for. */
export type ReportEntry = {
  label: string;
  result: ValidationResult;
};

// United States incl. Alaska, Hawaii, Puerto Rico, Guam and the Marianas
const US_BOUNDS = { minLat: 13.0, maxLat: 72.0, minLon: -180.0, maxLon: -64.0 };
const GUAM_BOUNDS = { minLat: 13.0, maxLat: 21.0, minLon: 144.0, maxLon: 146.5 };

function inBounds(lat: number, lon: number, b: typeof US_BOUNDS) {
  return lat >= b.minLat && lat <= b.maxLat && lon >= b.minLon && lon <= b.maxLon;
}

/**
 * Validate geocoding coordinates are reasonable for a US facility
 */
export function validateCoordinates(lat: number | null, lon: number | null): ValidationResult {
  const result: ValidationResult = {
    isValid: true,
    errors: [],
    warnings: [],
  };

  if (lat === null || lon === null) {
    result.isValid = false;
    result.errors.push("Missing latitude or longitude");
    return result;
  }

  if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
    result.isValid = false;
    result.errors.push("Invalid latitude or longitude values");
    return result;
  }

  if (Math.abs(lat) > 90 || Math.abs(lon) > 180) {
    result.isValid = false;
    result.errors.push(`Coordinates out of range: ${lat}, ${lon}`);
    return result;
  }

  if (!inBounds(lat, lon, US_BOUNDS) && !inBounds(lat, lon, GUAM_BOUNDS)) {
    if (inBounds(lon, lat, US_BOUNDS)) {
      result.warnings.push(`Coordinates look swapped: ${lat}, ${lon}`);
    } else {
      result.warnings.push(`Coordinates outside US bounds: ${lat}, ${lon}`);
    }
  }

  return result;
}

/**
 * Validate facility record completeness
 */
export function validateFacilityRecord(record: FacilityRecord): ValidationResult {
  const result: ValidationResult = {
    isValid: true,
    errors: [],
    warnings: [],
  };

  const requiredFields = ["name", "address"] as const;
  const recommendedFields = ["city", "state", "zip"] as const;

  for (const field of requiredFields) {
    if (!record[field].trim()) {
      result.isValid = false;
      result.errors.push(`Missing required field: ${field}`);
    }
  }

  for (const field of recommendedFields) {
    if (!record[field].trim()) {
      result.warnings.push(`Missing recommended field: ${field}`);
    }
  }

  return result;
}

/**
 * Run a pipeline stage, capturing any failure as `${context}: ${message}`
 * instead of throwing. The caller reports it.
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  context: string
): Promise<ProcessingResult<T>> {
  try {
    return { success: true, data: await operation() };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return { success: false, error: `${context}: ${errorMessage}` };
  }
}

/**
 * Write a summary of the checks, listing only the records that have
 * errors or warnings.
 */
export async function writeValidationReport(
  reportPath: string,
  entries: ReportEntry[],
  context: string,
  now: Date = new Date()
): Promise<void> {
  const failed = entries.filter((e) => !e.result.isValid).length;
  const totalWarnings = entries.reduce((sum, e) => sum + e.result.warnings.length, 0);
  const report = {
    generated_at: now.toISOString(),
    context,
    total_checks: entries.length,
    passed: entries.length - failed,
    failed,
    total_warnings: totalWarnings,
    issues: entries
      .filter((e) => e.result.errors.length > 0 || e.result.warnings.length > 0)
      .map((e) => ({ label: e.label, errors: e.result.errors, warnings: e.result.warnings })),
  };

  await writeJson(reportPath, report);

  console.log(`📊 Validation report written to ${reportPath}`);
  console.log(`   ✅ ${report.passed}/${report.total_checks} checks passed`);
  if (failed > 0) console.log(`   ❌ ${failed} checks failed`);
  if (totalWarnings > 0) console.log(`   ⚠️  ${totalWarnings} warnings`);
}
