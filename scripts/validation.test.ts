import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { SicuRow } from "@/lib/types";
import {
  detectDuplicateRows,
  summarizeValidation,
  validateCoordinates,
  validateIncidentRecord,
  validateSicuRow,
  withErrorHandling,
  writeValidationReport,
} from "./validation";

const ROW: SicuRow = {
  fecha: "2025-01-04",
  hora: "08:15",
  pais: "Libia",
  categoria_sicu: "Hazards",
  descripcion: "Lluvias",
  localizacion: "Derna",
  lat: "32.767",
  lon: "22.6367",
  fuente_URL: "otro",
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("validateCoordinates", () => {
  it("accepts a point inside the country box", () => {
    expect(validateCoordinates(32.8872, 13.1913, "Libia")).toEqual({ isValid: true, errors: [], warnings: [] });
  });

  it("warns when the point falls outside the country box", () => {
    expect(validateCoordinates(48.85, 2.35, "Libia").warnings).toEqual([
      "Coordinates outside Libya bounds: 48.85, 2.35",
    ]);
    expect(validateCoordinates(48.85, 2.35, "Narnia").warnings).toEqual([]);
  });

  it("rejects missing or impossible values", () => {
    expect(validateCoordinates(null, 13.19).errors).toEqual(["Missing latitude or longitude"]);
    expect(validateCoordinates(95, 13, "Libia")).toEqual({
      isValid: false,
      errors: ["Invalid latitude or longitude values: 95, 13"],
      warnings: [],
    });
  });
});

describe("validateSicuRow", () => {
  it("passes a complete row", () => {
    expect(validateSicuRow(ROW)).toEqual({ isValid: true, errors: [], warnings: [] });
  });

  it("warns on soft problems and fails on missing required fields", () => {
    expect(validateSicuRow({ ...ROW, categoria_sicu: "Protestas", hora: "8h", localizacion: "" })).toEqual({
      isValid: true,
      errors: [],
      warnings: ["Missing recommended field: localizacion", "Unknown category: Protestas", "Unparseable time: 8h"],
    });
    expect(validateSicuRow({ ...ROW, descripcion: " " }).errors).toEqual(["Missing required field: descripcion"]);
  });
});

describe("validateIncidentRecord", () => {
  it("flags unknown categories and missing places", () => {
    expect(
      validateIncidentRecord({ pais: "Libia", categoria: "X", descripcion: "d", place: null, fuente: "canal" }),
    ).toEqual({
      isValid: true,
      errors: [],
      warnings: ["Missing recommended field: place", "Unknown category: X"],
    });
  });
});

describe("detectDuplicateRows", () => {
  it("counts rows sharing a key", () => {
    expect(detectDuplicateRows(["a", "b", "a", "A"], (s) => s.toLowerCase())).toEqual({
      isValid: false,
      errors: ["Found 1 duplicated keys"],
      warnings: [],
      metrics: { total_records: 4, duplicates: [{ key: "a", count: 3 }] },
    });
  });
});

describe("withErrorHandling", () => {
  it("wraps the result", async () => {
    await expect(withErrorHandling(async () => 42, "Answer")).resolves.toMatchObject({ success: true, data: 42 });
  });

  it("captures the error message", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const result = await withErrorHandling(async () => {
      throw new Error("disk full");
    }, "Export");
    expect(result).toEqual({ success: false, errors: ["Export: disk full"], warnings: [], metrics: {} });
  });
});

describe("validation reports", () => {
  const results = [
    { isValid: true, errors: [], warnings: ["w"] },
    { isValid: false, errors: ["e1", "e2"], warnings: [] },
  ];

  it("summarizes results", () => {
    expect(summarizeValidation(results, "SICU build", new Date("2025-01-04T10:00:00Z"))).toEqual({
      timestamp: "2025-01-04T10:00:00.000Z",
      context: "SICU build",
      total_checks: 2,
      passed: 1,
      failed: 1,
      total_errors: 2,
      total_warnings: 1,
      details: results,
    });
  });

  it("writes the summary as JSON", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "sicu-validation-"));
    const file = path.join(dir, "nested", "report.json");
    await writeValidationReport(file, results, "SICU build");
    const written: unknown = JSON.parse(await fs.readFile(file, "utf8"));
    expect(written).toMatchObject({ context: "SICU build", passed: 1, failed: 1 });
    await fs.rm(dir, { recursive: true, force: true });
  });
});
