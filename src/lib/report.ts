import type { SicuCategory, SicuRow } from "./types";

export const REPORT_SECTIONS: ReadonlyArray<{ categoria: Exclude<SicuCategory, "Otros">; title: string }> = [
  { categoria: "Terrorismo", title: "2.1. TERRORISMO" },
  { categoria: "Conflicto Armado", title: "2.2. CONFLICTO ARMADO" },
  { categoria: "Criminalidad", title: "2.3. CRIMINALIDAD" },
  { categoria: "Disturbios Civiles", title: "2.4. DISTURBIOS CIVILES" },
  { categoria: "Hazards", title: "2.5. HAZARDS" },
];

const SEPARATOR = "⸻";
const UNKNOWN_LOCATION = "Localización no especificada";

export type ReportOptions = {
  pais: string;
  day: string;
  /** Edition time printed in the header, e.g. "08:15". */
  editedAt?: string;
};

function locationOf(row: SicuRow): string {
  return row.localizacion.trim() || UNKNOWN_LOCATION;
}

/** Most frequent locations first; ties keep first-appearance order. */
export function topLocations(rows: readonly SicuRow[], limit = 3): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const loc = locationOf(row);
    counts.set(loc, (counts.get(loc) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

function groupByCategory(rows: readonly SicuRow[]): Map<string, SicuRow[]> {
  const out = new Map<string, SicuRow[]>();
  for (const row of rows) {
    const list = out.get(row.categoria_sicu) ?? [];
    list.push(row);
    out.set(row.categoria_sicu, list);
  }
  return out;
}

/** Plain-text day report over deduplicated rows. Rows in "Otros" are not reported. */
export function buildNarrativeReport(rows: readonly SicuRow[], options: ReportOptions): string {
  const byCategory = groupByCategory(rows);
  const total = REPORT_SECTIONS.reduce((sum, s) => sum + (byCategory.get(s.categoria)?.length ?? 0), 0);
  const lines: string[] = [];

  lines.push("INFORME SICU", SEPARATOR, "0. ENCABEZADO");
  lines.push(`\t• País: ${options.pais}`);
  lines.push(`\t• Fecha (día operativo): ${options.day}`);
  if (options.editedAt) lines.push(`\t• Hora de edición: ${options.editedAt}`);
  lines.push("\t• Fuentes abiertas + incidentes SICU del día", "");

  lines.push(SEPARATOR, "1. RESUMEN EJECUTIVO", "");
  lines.push(`(Día operativo ${options.day} – total incidentes SICU: ${total})`, "");
  for (const { categoria } of REPORT_SECTIONS) {
    const n = byCategory.get(categoria)?.length ?? 0;
    if (n) lines.push(`• ${categoria}: ${n} incidente(s) registrado(s).`);
  }
  lines.push("");

  lines.push(SEPARATOR, "2. DESGLOSE DE EVENTOS POR CATEGORÍAS SICU", "");
  for (const { categoria, title } of REPORT_SECTIONS) {
    const items = byCategory.get(categoria) ?? [];
    lines.push(SEPARATOR, title, "");
    if (items.length === 0) {
      lines.push("\tNo se registraron incidentes en esta categoría durante el día operativo.", "");
      continue;
    }
    const top = topLocations(items)
      .map(([loc, n]) => `${loc} (${n})`)
      .join(", ");
    lines.push(`\t• Incidentes registrados: ${items.length}`);
    lines.push(`\t• Principales áreas afectadas: ${top}`, "");
    for (const item of items) {
      lines.push(`\t• Localización: ${locationOf(item)}`);
      lines.push(`\t\tBreve descripción: ${item.descripcion.trim()}`);
      lines.push(`\t\tFecha/Hora: ${item.fecha} ${item.hora}`.trimEnd());
      if (item.fuente_URL.trim()) lines.push(`\t\tFuente: ${item.fuente_URL.trim()}`);
      lines.push("");
    }
  }

  lines.push(SEPARATOR, "3. FOCOS DEL DÍA", "");
  for (const { categoria } of REPORT_SECTIONS) {
    const items = byCategory.get(categoria) ?? [];
    if (items.length === 0) continue;
    const areas = [...new Set(items.map(locationOf))].join(", ");
    lines.push(`\t• ${categoria}: ${items.length} foco(s) – principales áreas: ${areas}`);
  }
  if (total === 0) lines.push("\t• Sin focos SICU identificados en el día operativo.");
  lines.push("");

  return lines.join("\n");
}
