import { classify } from "./categorize";
import { parseFeed } from "./feed";
import type { Gazetteer } from "./gazetteer";
import type { LocationResolver } from "./geocoder";
import { pipelineLock, type BatchLock } from "./lock";
import { cleanSummary, extractUrls, normalizeKey, normalizeText } from "./normalize";
import { opdayForLocal } from "./opday";
import { extractLocation } from "./place";
import type { IncidentRegistrar } from "./registrar";
import type { FeedEntry, IncidentCandidate, Logger, SicuRow } from "./types";

/** Optional translation hook (to Spanish); null or "" keeps the original text. */
export type Translate = (text: string) => Promise<string | null> | string | null;

export type FeedCandidate = IncidentCandidate & { datetime: string };

async function translated(text: string, translate: Translate | undefined): Promise<string> {
  if (!translate) return text;
  const out = await translate(text);
  return out?.trim() ? out : text;
}

/**
 * One candidate per distinct message: normalized description, category and
 * best place. Messages that normalize to the same text are kept once.
 */
export async function extractCandidates(
  entries: readonly FeedEntry[],
  options: { translate?: Translate } = {},
): Promise<FeedCandidate[]> {
  const seen = new Set<string>();
  const out: FeedCandidate[] = [];
  for (const entry of entries) {
    const original = entry.body;
    if (!original) continue;
    const body = await translated(original, options.translate);
    const descripcion = normalizeText(body);
    const key = normalizeKey(descripcion || original);
    if (!key || seen.has(key)) continue;
    seen.add(key);

    out.push({
      categoria: classify(descripcion),
      descripcion,
      place: extractLocation(body, original) || null,
      fuente: entry.channel,
      lat: null,
      lon: null,
      datetime: entry.datetime,
    });
  }
  return out;
}

export type FeedIngestResult = {
  entries: number;
  candidates: number;
  inserted: number;
};

/** Parse a feed and register its incidents. Runs one at a time per process. */
export async function runFeedIngest(params: {
  pais: string;
  text: string;
  registrar: IncidentRegistrar;
  translate?: Translate;
  countryHint?: string;
  resolveNow?: boolean;
  lock?: BatchLock;
  logger?: Logger;
}): Promise<FeedIngestResult> {
  const lock = params.lock ?? pipelineLock;
  const logger = params.logger ?? console;
  return lock.run(async () => {
    const entries = parseFeed(params.text);
    const candidates = await extractCandidates(entries, { translate: params.translate });
    logger.log(`📊 ${params.pais}: ${entries.length} entries, ${candidates.length} distinct candidates`);
    const inserted = await params.registrar.registerMany(params.pais, candidates, {
      resolveNow: params.resolveNow ?? true,
      countryHint: params.countryHint ?? params.pais,
    });
    return { entries: entries.length, candidates: candidates.length, inserted };
  });
}

function splitDatetime(datetime: string): { fecha: string; hora: string } {
  const m = datetime.match(/^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2})/);
  return m ? { fecha: m[1], hora: m[2] } : { fecha: "", hora: "" };
}

/**
 * Day report rows straight from a feed: summary, category, a gazetteer place
 * found in the text (with its coordinates) or else the extracted place.
 * With `day`, only entries of that operational day are kept.
 */
export async function buildSicuRows(
  entries: readonly FeedEntry[],
  options: { pais: string; day?: string; gazetteer?: Gazetteer | null; translate?: Translate },
): Promise<SicuRow[]> {
  const rows: SicuRow[] = [];
  for (const entry of entries) {
    if (options.day && opdayForLocal(entry.datetime) !== options.day) continue;
    const original = entry.body;
    if (!original) continue;

    const body = await translated(original, options.translate);
    const summary = cleanSummary(body);
    if (!summary) continue;

    const match = options.gazetteer?.lookupInText(summary) ?? options.gazetteer?.lookupInText(original) ?? null;
    const { fecha, hora } = splitDatetime(entry.datetime);

    rows.push({
      fecha: fecha || options.day || "",
      hora,
      pais: options.pais,
      categoria_sicu: classify(summary),
      descripcion: summary,
      localizacion: match ? match.entry.name : extractLocation(summary, original),
      lat: match ? match.entry.lat.toFixed(6) : "",
      lon: match ? match.entry.lon.toFixed(6) : "",
      fuente_URL: extractUrls(original)[0] ?? entry.channel,
    });
  }
  return rows;
}

/** Fill missing coordinates of report rows through the resolver. Returns how many were filled. */
export async function resolveSicuRows(rows: SicuRow[], resolver: LocationResolver): Promise<number> {
  let filled = 0;
  for (const row of rows) {
    if (row.lat.trim() && row.lon.trim()) continue;
    if (!row.localizacion.trim()) continue;
    const result = await resolver.geocode(row.localizacion, row.pais || null, { description: row.descripcion });
    if (!result) continue;
    row.lat = result.lat.toFixed(6);
    row.lon = result.lon.toFixed(6);
    filled++;
  }
  return filled;
}
