import { promises as fs } from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { countrySlug } from "./config";
import { collapseWhitespace, foldText } from "./normalize";
import type { Logger } from "./types";

export type GazetteerEntry = {
  name: string;
  aliases: string[];
  admin1: string | null;
  admin2: string | null;
  kind: string;
  lat: number;
  lon: number;
};

export type GazetteerMatch = {
  entry: GazetteerEntry;
  /** The name or alias that matched. */
  matched: string;
  score: number;
};

type Column = "name" | "admin1" | "admin2" | "lat" | "lon" | "aliases" | "kind";

const HEADER_ALIASES: Record<Column, readonly string[]> = {
  name: ["name", "nombre", "localidad", "city", "town"],
  admin1: ["admin1", "adm1", "provincia", "departamento"],
  admin2: ["admin2", "adm2", "municipio", "distrito", "commune"],
  lat: ["lat", "latitude", "y"],
  lon: ["lon", "long", "lng", "longitude", "x"],
  aliases: ["aliases", "alias"],
  kind: ["kind", "tipo", "type"],
};

const KIND_SCORES: Array<[readonly string[], number]> = [
  [["airport", "aeropuerto", "aéroport"], 100],
  [["official", "palace", "embassy", "gov", "government"], 90],
  [["neighbourhood", "barrio", "district"], 80],
  [["town", "village", "pueblo"], 70],
  [["city", "ciudad"], 60],
];

/** airport > official > neighbourhood > town > city > anything else */
export function kindScore(kind: string): number {
  const k = kind.trim().toLowerCase();
  for (const [kinds, score] of KIND_SCORES) {
    if (kinds.includes(k)) return score;
  }
  return 50;
}

function toNumber(value: string | undefined): number | null {
  let s = (value ?? "").trim();
  if (!s) return null;
  // decimal comma
  if (s.includes(",") && !s.includes(".")) s = s.replace(",", ".");
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

function mapColumns(headers: string[]): Partial<Record<Column, string>> {
  const colmap: Partial<Record<Column, string>> = {};
  for (const header of headers) {
    const low = header.trim().toLowerCase();
    for (const [column, aliases] of Object.entries(HEADER_ALIASES)) {
      if (aliases.includes(low) && isColumn(column)) colmap[column] = header;
    }
  }
  return colmap;
}

function isColumn(value: string): value is Column {
  return value in HEADER_ALIASES;
}

function key(s: string): string {
  return collapseWhitespace(foldText(s));
}

export class Gazetteer {
  constructor(readonly entries: readonly GazetteerEntry[]) {}

  static fromCsv(csvText: string): Gazetteer {
    const rows = parse(csvText, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    }) as Record<string, string>[];
    if (rows.length === 0) return new Gazetteer([]);

    const colmap = mapColumns(Object.keys(rows[0]));
    const get = (row: Record<string, string>, column: Column) => {
      const real = colmap[column];
      return real ? (row[real] ?? "").trim() : "";
    };

    const entries: GazetteerEntry[] = [];
    for (const row of rows) {
      const name = get(row, "name");
      const lat = toNumber(get(row, "lat"));
      const lon = toNumber(get(row, "lon"));
      if (!name || lat === null || lon === null) continue;
      entries.push({
        name,
        aliases: get(row, "aliases")
          .split("|")
          .map((a) => a.trim())
          .filter(Boolean),
        admin1: get(row, "admin1") || null,
        admin2: get(row, "admin2") || null,
        kind: get(row, "kind") || "city",
        lat,
        lon,
      });
    }
    return new Gazetteer(entries);
  }

  get size(): number {
    return this.entries.length;
  }

  /** Exact (case and diacritic insensitive) match on the primary name only. */
  findByName(name: string): GazetteerEntry | null {
    const wanted = key(name);
    return this.entries.find((e) => key(e.name) === wanted) ?? null;
  }

  private bestExact(segment: string): GazetteerMatch | null {
    const wanted = key(segment);
    if (!wanted) return null;
    let best: GazetteerMatch | null = null;
    for (const entry of this.entries) {
      const score = kindScore(entry.kind);
      for (const candidate of [entry.name, ...entry.aliases]) {
        if (key(candidate) !== wanted) continue;
        if (!best || score > best.score) best = { entry, matched: candidate, score };
      }
    }
    return best;
  }

  /**
   * Try each segment of a place string ("Ain Zara, Tripoli, Libya") in order,
   * most specific first. The first segment with any exact match wins; ties
   * inside a segment go to the higher kind score.
   */
  lookupBySegments(place: string): GazetteerMatch | null {
    const segments = place
      .split(/[,/()]/)
      .map((s) => s.trim())
      .filter(Boolean);
    for (const segment of segments) {
      const match = this.bestExact(segment);
      if (match) return match;
    }
    return null;
  }

  /** Any name or alias (3+ chars) appearing inside the text; best kind score wins. */
  lookupInText(text: string): GazetteerMatch | null {
    const haystack = key(text);
    if (!haystack) return null;
    let best: GazetteerMatch | null = null;
    for (const entry of this.entries) {
      const score = kindScore(entry.kind);
      for (const candidate of [entry.name, ...entry.aliases]) {
        const token = key(candidate);
        if (token.length < 3 || !haystack.includes(token)) continue;
        if (!best || score > best.score) best = { entry, matched: candidate, score };
      }
    }
    return best;
  }
}

// Gazetteer files are named after the Spanish country slug.
const FILE_SLUG_ALIASES: Record<string, string> = {
  libya: "libia",
  gaza_strip: "gaza",
  state_of_palestine: "gaza",
  palestina: "gaza",
  haití: "haiti",
};

/**
 * Loads `<dir>/<slug>.csv` on first use and keeps it for the life of the
 * process. Missing files are remembered as absent.
 */
export class GazetteerRegistry {
  private readonly loaded = new Map<string, Promise<Gazetteer | null>>();

  constructor(
    private readonly dir: string,
    private readonly logger: Logger = console,
  ) {}

  static fromEntries(byCountry: Record<string, Gazetteer>): GazetteerRegistry {
    const registry = new GazetteerRegistry("");
    for (const [country, gazetteer] of Object.entries(byCountry)) {
      const slug = countrySlug(country);
      registry.loaded.set(FILE_SLUG_ALIASES[slug] ?? slug, Promise.resolve(gazetteer));
    }
    return registry;
  }

  async get(...countries: Array<string | null | undefined>): Promise<Gazetteer | null> {
    for (const country of countries) {
      if (!country?.trim()) continue;
      const slug = countrySlug(country);
      const gazetteer = await this.load(FILE_SLUG_ALIASES[slug] ?? slug);
      if (gazetteer) return gazetteer;
    }
    return null;
  }

  private load(slug: string): Promise<Gazetteer | null> {
    let pending = this.loaded.get(slug);
    if (!pending) {
      pending = this.read(slug);
      this.loaded.set(slug, pending);
    }
    return pending;
  }

  private async read(slug: string): Promise<Gazetteer | null> {
    if (!this.dir) return null;
    const file = path.join(this.dir, `${slug}.csv`);
    let text: string;
    try {
      text = await fs.readFile(file, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }
    const gazetteer = Gazetteer.fromCsv(text);
    this.logger.log(`📊 Loaded gazetteer ${file} (${gazetteer.size} places)`);
    return gazetteer;
  }
}
