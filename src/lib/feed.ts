import { splitLines } from "./normalize";
import type { FeedEntry, SicuCategory } from "./types";

const ENTRY_HEADER_RE = /^---\s*(.+?)\s*@\s*(\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2})\s*---\s*$/;

/**
 * Split a collected channel dump into entries. Everything before the first
 * `--- <channel> @ <YYYY-MM-DD HH:MM:SS> ---` header (weather, exchange
 * blocks and the like) is dropped.
 */
export function parseFeed(text: string): FeedEntry[] {
  const entries: FeedEntry[] = [];
  let current: { channel: string; datetime: string; lines: string[] } | null = null;

  const flush = () => {
    if (!current) return;
    entries.push({ ...current, body: current.lines.join("\n").trim() });
  };

  for (const line of splitLines(text)) {
    const m = line.match(ENTRY_HEADER_RE);
    if (m) {
      flush();
      current = { channel: m[1].trim(), datetime: m[2], lines: [] };
      continue;
    }
    current?.lines.push(line);
  }
  flush();

  return entries;
}

const SECTION_HEADERS: Record<string, SicuCategory> = {
  "conflicto armado": "Conflicto Armado",
  terrorismo: "Terrorismo",
  delincuencia: "Criminalidad",
  criminalidad: "Criminalidad",
  "disturbios civiles": "Disturbios Civiles",
  hazards: "Hazards",
  otros: "Otros",
};

const SECTION_HEADER_RE =
  /^(conflicto armado|terrorismo|delincuencia|criminalidad|disturbios civiles|hazards|otros)\s*:?$/i;
const BULLET_RE = /^[-•*]\s+(.+)$/;

// Most specific first; the place must start with an uppercase letter.
const INLINE_PLACE_PATTERNS: RegExp[] = [
  /\ben la zona de\s+(\p{Lu}[\p{L}\p{N}_\-\s'’.]+)/u,
  /\ben el distrito de\s+(\p{Lu}[\p{L}\p{N}_\-\s'’.]+)/u,
  /\ben\s+(\p{Lu}[\p{L}\p{N}_\-\s'’.]+)/u,
];

export function extractInlinePlace(text: string): string | null {
  for (const re of INLINE_PLACE_PATTERNS) {
    const m = text.match(re);
    if (!m) continue;
    const place = m[1].trim().replace(/[.,;: ]+$/, "");
    if (place) return place;
  }
  return null;
}

export type ReportIncident = {
  categoria: SicuCategory;
  descripcion: string;
  place: string | null;
  fuente: string;
};

/**
 * Read a report laid out as category headers followed by bullet lines.
 * Bullets seen before any header are dropped.
 */
export function parseCategorizedReport(text: string, defaultFuente = "Informe"): ReportIncident[] {
  const out: ReportIncident[] = [];
  let section: SicuCategory | null = null;

  for (const raw of splitLines(text)) {
    const line = raw.trim();
    if (!line) continue;

    const header = line.match(SECTION_HEADER_RE);
    if (header) {
      section = SECTION_HEADERS[header[1].toLowerCase()] ?? "Otros";
      continue;
    }

    const bullet = line.match(BULLET_RE);
    if (!bullet || !section) continue;

    const descripcion = bullet[1].trim();
    out.push({
      categoria: section,
      descripcion,
      place: extractInlinePlace(descripcion),
      fuente: defaultFuente,
    });
  }

  return out;
}
