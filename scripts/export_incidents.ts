import { promises as fs } from "node:fs";
import path from "node:path";
import { countrySlug, loadConfig } from "@/lib/config";
import { incidentsToCsv, sicuRowsToGeoJson, sicuRowsToKml } from "@/lib/export";
import { lastOpdays, opdayBounds } from "@/lib/opday";
import { sicuRowFromIncident } from "@/lib/records";
import { openRuntime } from "@/lib/runtime";
import { validateCoordinates, validateIncidentRecord, withErrorHandling, writeValidationReport } from "./validation";
import type { ValidationResult } from "./validation";

// Usage: tsx scripts/export_incidents.ts [pais|all] [days=1] [categoria,categoria...]
const PAIS_ARG = process.argv[2] || "all";
const DAYS = Number.parseInt(process.argv[3] || "1", 10);
const CATEGORIAS = (process.argv[4] || "")
  .split(",")
  .map((c) => c.trim())
  .filter(Boolean);

async function main() {
  if (!Number.isFinite(DAYS) || DAYS < 1) {
    console.error(`❌ Invalid day count "${process.argv[3]}"`);
    process.exit(1);
  }
  const config = loadConfig();
  const pais = PAIS_ARG === "all" ? undefined : PAIS_ARG;

  const result = await withErrorHandling(async () => {
    const days = lastOpdays(config.timezone, DAYS);
    const newest = days[0];
    const oldest = days[days.length - 1];
    const start = opdayBounds(config.timezone, oldest).start.toDate();
    const end = opdayBounds(config.timezone, newest).end.toDate();

    const runtime = await openRuntime(config);
    const incidents = (() => {
      try {
        return runtime.store.list({ pais, categorias: CATEGORIAS, start, end, includeWithoutCoords: true, order: "asc" });
      } finally {
        runtime.close();
      }
    })();

    const label = `${pais ? countrySlug(pais) : "all"}_${oldest}_${newest}`;
    const outBase = path.join(config.outputDir, "incidentes", `incidentes_${label}`);
    const rows = incidents.map(sicuRowFromIncident);

    const validationResults: ValidationResult[] = incidents.map((incident) => {
      const check = validateIncidentRecord(incident);
      if (incident.lat !== null && incident.lon !== null) {
        const coords = validateCoordinates(incident.lat, incident.lon, incident.pais);
        check.isValid = check.isValid && coords.isValid;
        check.errors.push(...coords.errors);
        check.warnings.push(...coords.warnings);
      }
      return check;
    });

    await fs.mkdir(path.dirname(outBase), { recursive: true });
    await fs.writeFile(`${outBase}.csv`, incidentsToCsv(incidents), "utf8");
    await fs.writeFile(`${outBase}.kml`, sicuRowsToKml(rows, `Incidentes ${label}`), "utf8");
    await fs.writeFile(`${outBase}.geojson`, JSON.stringify(sicuRowsToGeoJson(rows), null, 2), "utf8");
    await writeValidationReport(`${outBase}_validation.json`, validationResults, "Incident export");

    const located = incidents.filter((i) => i.lat !== null && i.lon !== null).length;
    console.log(`✅ Exported ${incidents.length} incidents (${located} located) to ${outBase}.{csv,kml,geojson}`);
    return incidents.length;
  }, "Incident export");

  if (!result.success) {
    console.error("❌ Incident export failed with errors:", result.errors);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("❌ export_incidents failed:", err);
  process.exit(1);
});
