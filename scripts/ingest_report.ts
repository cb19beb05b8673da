import { promises as fs } from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { loadConfig } from "@/lib/config";
import { candidateFromRecord } from "@/lib/records";
import { openRuntime } from "@/lib/runtime";
import type { CsvRecord } from "./types";
import { validateIncidentRecord, withErrorHandling, writeValidationReport } from "./validation";

// Usage: tsx scripts/ingest_report.ts <pais> <file.txt|file.csv> [fuente]
// .txt files are categorized reports (section headers + bullets); .csv files
// are incident tables with pais/categoria/descripcion/place/lat/lon columns.
const PAIS = process.argv[2];
const FILE = process.argv[3];
const FUENTE = process.argv[4];

async function main() {
  if (!PAIS || !FILE) {
    console.error("❌ Usage: tsx scripts/ingest_report.ts <pais> <file.txt|file.csv> [fuente]");
    process.exit(1);
  }
  const config = loadConfig();

  const result = await withErrorHandling(async () => {
    const text = await fs.readFile(FILE, "utf8");
    const runtime = await openRuntime(config);
    try {
      if (path.extname(FILE).toLowerCase() !== ".csv") {
        const inserted = await runtime.registrar.registerFromReport(PAIS, text, { fuente: FUENTE });
        console.log(`✅ ${inserted} new incidents from report ${FILE}`);
        return inserted;
      }

      const records = parse(text, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
        bom: true,
      }) as CsvRecord[];
      console.log(`📊 Importing ${records.length} rows from ${FILE}`);

      const validation = records.map((r) => validateIncidentRecord({ pais: PAIS, ...r }));
      const candidates = records.map(candidateFromRecord).map((c) => (FUENTE && !c.fuente ? { ...c, fuente: FUENTE } : c));
      const inserted = await runtime.registrar.registerMany(PAIS, candidates);

      await writeValidationReport(
        path.join(config.outputDir, `import_validation_${path.basename(FILE, ".csv")}.json`),
        validation,
        "Incident CSV import",
      );
      console.log(`✅ ${inserted}/${records.length} rows inserted (the rest were duplicates or empty)`);
      return inserted;
    } finally {
      runtime.close();
    }
  }, "Report ingest");

  if (!result.success) {
    console.error("❌ Report ingest failed with errors:", result.errors);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("❌ ingest_report failed:", err);
  process.exit(1);
});
