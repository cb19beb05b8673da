import { promises as fs } from "node:fs";
import path from "node:path";
import booleanPointInPolygon from "@turf/boolean-point-in-polygon";
import { point, polygon } from "@turf/helpers";
import { canonicalCountry } from "@/lib/geocoder";
import { isSicuCategory, type SicuRow } from "@/lib/types";
import countryBounds from "./country-bounds.json";

// Shared validation utilities for the batch scripts

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
  metrics?: Record<string, unknown>;
}

export interface ProcessingResult<T> {
  success: boolean;
  data?: T;
  errors: string[];
  warnings: string[];
  metrics: Record<string, unknown>;
}

type BBox = [number, number, number, number];

const BOUNDS: Record<string, BBox> = {};
for (const [country, box] of Object.entries(countryBounds)) {
  const [minLon, minLat, maxLon, maxLat] = box;
  BOUNDS[country] = [minLon, minLat, maxLon, maxLat];
}

function boundsPolygon([minLon, minLat, maxLon, maxLat]: BBox) {
  return polygon([
    [
      [minLon, minLat],
      [maxLon, minLat],
      [maxLon, maxLat],
      [minLon, maxLat],
      [minLon, minLat],
    ],
  ]);
}

/**
 * Validate coordinates; a point outside the country's rough bounding box is a
 * warning, not an error (geocoders sometimes land just across a border).
 */
export function validateCoordinates(lat: number | null, lon: number | null, country?: string | null): ValidationResult {
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

  if (!Number.isFinite(lat) || !Number.isFinite(lon) || Math.abs(lat) > 90 || Math.abs(lon) > 180) {
    result.isValid = false;
    result.errors.push(`Invalid latitude or longitude values: ${lat}, ${lon}`);
    return result;
  }

  const canonical = canonicalCountry(country);
  const box = canonical ? BOUNDS[canonical.toLowerCase()] : undefined;
  if (canonical && box && !booleanPointInPolygon(point([lon, lat]), boundsPolygon(box))) {
    result.warnings.push(`Coordinates outside ${canonical} bounds: ${lat}, ${lon}`);
  }

  return result;
}

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || String(value).trim() === "";
}

function checkFields(
  record: Record<string, unknown>,
  required: readonly string[],
  recommended: readonly string[],
): ValidationResult {
  const result: ValidationResult = {
    isValid: true,
    errors: [],
    warnings: [],
  };

  for (const field of required) {
    if (isBlank(record[field])) {
      result.isValid = false;
      result.errors.push(`Missing required field: ${field}`);
    }
  }

  for (const field of recommended) {
    if (isBlank(record[field])) {
      result.warnings.push(`Missing recommended field: ${field}`);
    }
  }

  return result;
}

/**
 * Validate a ledger incident (or an import row shaped like one)
 */
export function validateIncidentRecord(record: Record<string, unknown>): ValidationResult {
  const result = checkFields(record, ["pais", "categoria", "descripcion"], ["place", "fuente"]);
  const categoria = record.categoria;
  if (typeof categoria === "string" && categoria.trim() && !isSicuCategory(categoria.trim())) {
    result.warnings.push(`Unknown category: ${categoria}`);
  }
  return result;
}

export function validateSicuRow(row: SicuRow): ValidationResult {
  const result = checkFields(row, ["fecha", "pais", "categoria_sicu", "descripcion"], ["localizacion", "fuente_URL"]);
  if (row.categoria_sicu.trim() && !isSicuCategory(row.categoria_sicu.trim())) {
    result.warnings.push(`Unknown category: ${row.categoria_sicu}`);
  }
  if (row.hora.trim() && !/^\d{1,2}:\d{2}(:\d{2})?$/.test(row.hora.trim())) {
    result.warnings.push(`Unparseable time: ${row.hora}`);
  }
  return result;
}

/**
 * Check for rows sharing the same key in a dataset
 */
export function detectDuplicateRows<T>(records: readonly T[], keyOf: (record: T) => string): ValidationResult {
  const groups = new Map<string, number>();
  for (const record of records) {
    const key = keyOf(record);
    groups.set(key, (groups.get(key) ?? 0) + 1);
  }

  const duplicates = [...groups.entries()]
    .filter(([, count]) => count > 1)
    .map(([key, count]) => ({ key, count }));

  const result: ValidationResult = {
    isValid: duplicates.length === 0,
    errors: [],
    warnings: [],
    metrics: { total_records: records.length, duplicates },
  };
  if (duplicates.length > 0) {
    result.errors.push(`Found ${duplicates.length} duplicated keys`);
  }
  return result;
}

/**
 * Structured error handling wrapper for async functions
 */
export async function withErrorHandling<T>(operation: () => Promise<T>, context: string): Promise<ProcessingResult<T>> {
  try {
    const data = await operation();
    return {
      success: true,
      data,
      errors: [],
      warnings: [],
      metrics: {},
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error(`❌ ${context} failed:`, errorMessage);

    return {
      success: false,
      errors: [`${context}: ${errorMessage}`],
      warnings: [],
      metrics: {},
    };
  }
}

export function summarizeValidation(results: readonly ValidationResult[], context: string, timestamp = new Date()) {
  return {
    timestamp: timestamp.toISOString(),
    context,
    total_checks: results.length,
    passed: results.filter((r) => r.isValid).length,
    failed: results.filter((r) => !r.isValid).length,
    total_errors: results.reduce((sum, r) => sum + r.errors.length, 0),
    total_warnings: results.reduce((sum, r) => sum + r.warnings.length, 0),
    details: results,
  };
}

/**
 * Write validation report to file
 */
export async function writeValidationReport(
  reportPath: string,
  results: readonly ValidationResult[],
  context: string,
): Promise<void> {
  const summary = summarizeValidation(results, context);

  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, JSON.stringify(summary, null, 2), "utf8");

  console.log(`📊 Validation report written to ${reportPath}`);
  console.log(`   ✅ ${summary.passed}/${summary.total_checks} checks passed`);
  if (summary.failed > 0) {
    console.log(`   ❌ ${summary.failed} checks failed`);
  }
  if (summary.total_warnings > 0) {
    console.log(`   ⚠️  ${summary.total_warnings} warnings`);
  }
}
