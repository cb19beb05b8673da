import { similarity } from "./similarity";
import type { SicuRow } from "./types";

export const SIMILARITY_THRESHOLD = 0.75;
export const MAX_TIME_GAP_MINUTES = 120;

const HORA_RE = /^(\d{1,2})(?::(\d{1,2}))?(?::\d{1,2})?$/;

/** "HH:MM" (seconds optional) to minutes since midnight; null when unparseable. */
export function parseHoraMinutes(hora: string | null | undefined): number | null {
  const m = (hora ?? "").trim().match(HORA_RE);
  if (!m) return null;
  return Number(m[1]) * 60 + (m[2] ? Number(m[2]) : 0);
}

function groupKey(row: SicuRow): string {
  return [
    row.pais.trim().toLowerCase(),
    row.categoria_sicu.trim().toLowerCase(),
    row.fecha.trim(),
    row.localizacion.trim().toLowerCase(),
  ].join("\u0000");
}

function belongsTo(row: SicuRow, representative: SicuRow): boolean {
  if (similarity(row.descripcion, representative.descripcion) < SIMILARITY_THRESHOLD) return false;
  const t = parseHoraMinutes(row.hora);
  const repT = parseHoraMinutes(representative.hora);
  // Unknown time on either side does not block the match.
  if (t === null || repT === null) return true;
  return Math.abs(t - repT) <= MAX_TIME_GAP_MINUTES;
}

export function mergeCluster(cluster: readonly SicuRow[]): SicuRow {
  const [first] = cluster;
  const base: SicuRow = { ...first };

  const sources: string[] = [];
  for (const row of cluster) {
    const source = row.fuente_URL.trim();
    if (source && !sources.includes(source)) sources.push(source);
  }
  if (sources.length > 0) base.fuente_URL = sources.join(" | ");

  if (!base.lat.trim()) base.lat = cluster.map((r) => r.lat.trim()).find(Boolean) ?? base.lat;
  if (!base.lon.trim()) base.lon = cluster.map((r) => r.lon.trim()).find(Boolean) ?? base.lon;

  return base;
}

/**
 * Collapse repeated reports of the same event. Rows are grouped by
 * (country, category, date, location); inside a group each row joins the
 * first cluster whose first row is similar enough and close enough in time,
 * otherwise it opens a new cluster. Groups keep first-appearance order.
 */
export function deduplicateSicu(rows: readonly SicuRow[]): SicuRow[] {
  const groups = new Map<string, SicuRow[]>();
  for (const row of rows) {
    const key = groupKey(row);
    const group = groups.get(key);
    if (group) group.push(row);
    else groups.set(key, [row]);
  }

  const out: SicuRow[] = [];
  for (const items of groups.values()) {
    const clusters: SicuRow[][] = [];
    for (const row of items) {
      const target = clusters.find((cluster) => belongsTo(row, cluster[0]));
      if (target) target.push(row);
      else clusters.push([row]);
    }
    for (const cluster of clusters) {
      out.push(cluster.length === 1 ? cluster[0] : mergeCluster(cluster));
    }
  }
  return out;
}
