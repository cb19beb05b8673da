import { promises as fs } from "node:fs";
import path from "node:path";
import dayjs from "dayjs";
import { parse } from "csv-parse/sync";
import { countrySlug, loadConfig } from "@/lib/config";
import { sicuRowsToCsv, sicuRowsToGeoJson, sicuRowsToKml } from "@/lib/export";
import { parseFeed } from "@/lib/feed";
import { canonicalCountry } from "@/lib/geocoder";
import { isDayString, localTime, opdayToday } from "@/lib/opday";
import { buildSicuRows, resolveSicuRows } from "@/lib/pipeline";
import { parseCoordinate, sicuRowFromRecord } from "@/lib/records";
import { buildNarrativeReport } from "@/lib/report";
import { openRuntime, readFeed } from "@/lib/runtime";
import { deduplicateSicu } from "@/lib/sicu-dedupe";
import type { FeedEntry, SicuRow } from "@/lib/types";
import type { BatchSummary, CsvRecord } from "./types";
import {
  detectDuplicateRows,
  validateCoordinates,
  validateSicuRow,
  withErrorHandling,
  writeValidationReport,
} from "./validation";
import type { ValidationResult } from "./validation";

// Usage: tsx scripts/build_sicu.ts <pais> [YYYY-MM-DD] [extra_rows.csv]
const PAIS = process.argv[2];
const DAY_ARG = process.argv[3];
const EXTRA_CSV = process.argv[4];

async function readExtraRows(file: string, pais: string): Promise<SicuRow[]> {
  const records = parse(await fs.readFile(file, "utf8"), {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    bom: true,
  }) as CsvRecord[];
  return records.map((r) => {
    const row = sicuRowFromRecord(r);
    return { ...row, pais: row.pais || pais, categoria_sicu: row.categoria_sicu || "Otros" };
  });
}

async function main() {
  if (!PAIS) {
    console.error("❌ Usage: tsx scripts/build_sicu.ts <pais> [YYYY-MM-DD] [extra_rows.csv]");
    process.exit(1);
  }
  const config = loadConfig();
  const day = DAY_ARG || opdayToday(config.timezone);
  if (!isDayString(day)) {
    console.error(`❌ Invalid day "${day}", expected YYYY-MM-DD`);
    process.exit(1);
  }

  const outDir = path.join(config.outputDir, countrySlug(PAIS));
  const base = path.join(outDir, `sicu_${day}`);

  const result = await withErrorHandling(async (): Promise<BatchSummary> => {
    // an op-day spills into the next calendar day's dump until 07:00
    const entries: FeedEntry[] = [];
    for (const d of [day, dayjs(day).add(1, "day").format("YYYY-MM-DD")]) {
      const text = await readFeed(config, PAIS, d);
      if (text !== null) entries.push(...parseFeed(text));
    }

    const runtime = await openRuntime(config);
    let rows: SicuRow[] = [];
    let filled = 0;
    try {
      const gazetteer = await runtime.gazetteers.get(PAIS, canonicalCountry(PAIS));
      rows = await buildSicuRows(entries, { pais: PAIS, day, gazetteer });
      if (EXTRA_CSV) rows.push(...(await readExtraRows(EXTRA_CSV, PAIS)));
      console.log(`📊 ${entries.length} feed entries, ${rows.length} SICU rows for ${PAIS} ${day}`);
      filled = await resolveSicuRows(rows, runtime.resolver);
    } finally {
      runtime.close();
    }

    const deduped = deduplicateSicu(rows);

    const validationResults: ValidationResult[] = deduped.map((row) => {
      const check = validateSicuRow(row);
      if (row.lat && row.lon) {
        const coords = validateCoordinates(parseCoordinate(row.lat), parseCoordinate(row.lon), row.pais);
        check.isValid = check.isValid && coords.isValid;
        check.errors.push(...coords.errors);
        check.warnings.push(...coords.warnings);
      }
      return check;
    });
    validationResults.push(
      detectDuplicateRows(deduped, (r) =>
        [r.pais, r.categoria_sicu, r.fecha, r.localizacion, r.descripcion].map((s) => s.trim().toLowerCase()).join("|"),
      ),
    );

    const written = [`${base}.csv`, `${base}.kml`, `${base}.geojson`, path.join(outDir, `informe_${day}.txt`)];
    await fs.mkdir(outDir, { recursive: true });
    await fs.writeFile(written[0], sicuRowsToCsv(deduped), "utf8");
    await fs.writeFile(written[1], sicuRowsToKml(deduped, `SICU ${PAIS} ${day}`), "utf8");
    await fs.writeFile(written[2], JSON.stringify(sicuRowsToGeoJson(deduped), null, 2), "utf8");
    await fs.writeFile(
      written[3],
      buildNarrativeReport(deduped, { pais: PAIS, day, editedAt: localTime(config.timezone) }),
      "utf8",
    );
    await writeValidationReport(path.join(outDir, `sicu_${day}_validation.json`), validationResults, "SICU build");

    const withCoords = deduped.filter((r) => r.lat && r.lon).length;
    console.log(`✅ ${rows.length} rows → ${deduped.length} after dedup (${rows.length - deduped.length} merged)`);
    console.log(`   - With coordinates: ${withCoords}/${deduped.length} (${filled} filled by the resolver)`);
    for (const file of written) console.log(`✅ Wrote ${file}`);

    return { pais: PAIS, day, entries: entries.length, rows: deduped.length, written };
  }, "SICU build");

  if (!result.success) {
    console.error("❌ SICU build failed with errors:", result.errors);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("❌ build_sicu failed:", err);
  process.exit(1);
});
