import type { GeocodeCache } from "./geocache";
import type { Gazetteer, GazetteerMatch, GazetteerRegistry } from "./gazetteer";
import { heuristicLocation } from "./heuristics";
import type { GeocodeResult, Logger } from "./types";

const COUNTRY_ALIASES: Record<string, string> = {
  libia: "Libya",
  libya: "Libya",
  haiti: "Haiti",
  haití: "Haiti",
  colombia: "Colombia",
  campello: "Spain",
  españa: "Spain",
  spain: "Spain",
  gaza: "Gaza Strip",
  "gaza strip": "Gaza Strip",
  palestine: "State of Palestine",
  palestina: "State of Palestine",
  "state of palestine": "State of Palestine",
  liberia: "Liberia",
};

export function canonicalCountry(country: string | null | undefined): string | null {
  const trimmed = (country ?? "").trim();
  if (!trimmed) return null;
  return COUNTRY_ALIASES[trimmed.toLowerCase()] ?? trimmed;
}

const LEADING_DIRECTION_RE =
  /^(?:(?:al|a la|a los|a las|towards)\s+)?(?:norte|sur|este|oeste|noreste|noroeste|sureste|suroeste|north|south|east|west)\s+(?:de|of)\s+/iu;
const LEADING_NEAR_RE =
  /^(?:cerca de|en las cercan[ií]as de|en las proximidades de|pr[oó]ximo a|alrededor de|near|around|adjacent to|junto a la|junto al|junto a)\s+/iu;
const LEADING_ARTICLE_RE = /^(?:la|el|los|las|the)\s+/iu;
const LEADING_PLACE_TYPE_RE =
  /^(?:ciudad|city|pueblo|town|provincia|province|estado|state|departamento|department|region|región|distrito|district|gobernación|governorate)\s+(?:(?:de|of)\s+)?/iu;
const TRAILING_QUALIFIER_RE =
  /(?<![\p{L}\p{N}_])(?:city|ciudad|province|provincia|state|estado|region|región|district|distrito|governorate)\.?$/iu;
const EDGE_JUNK_RE = /^[\s,;:-]+|[\s,;:-]+$/g;

/**
 * Drop direction/near wording, leading articles, place-type prefixes
 * ("ciudad de"), stray markers and a trailing place-type word.
 */
export function sanitizePlace(place: string): string {
  let cleaned = place.trim().replace(/^[,.;]+|[,.;]+$/g, "");
  cleaned = cleaned.replace(/[#•●]/g, " ");
  cleaned = cleaned.replace(/\s+/g, " ").trim();
  let previous = "";
  while (previous !== cleaned) {
    previous = cleaned;
    cleaned = cleaned
      .replace(LEADING_DIRECTION_RE, "")
      .replace(LEADING_NEAR_RE, "")
      .replace(LEADING_ARTICLE_RE, "")
      .replace(LEADING_PLACE_TYPE_RE, "");
  }
  cleaned = cleaned.replace(EDGE_JUNK_RE, "");
  return cleaned.replace(TRAILING_QUALIFIER_RE, "").replace(EDGE_JUNK_RE, "");
}

export function cacheKey(place: string, country: string | null | undefined): string {
  return `${sanitizePlace(place).toLowerCase()}||${(canonicalCountry(country) ?? "").toLowerCase()}`;
}

function* altTokens(place: string): Generator<string> {
  for (const m of place.matchAll(/\(([^)]+)\)/g)) {
    const chunk = sanitizePlace(m[1]);
    if (chunk) yield chunk;
  }
  const comma = place.indexOf(",");
  if (comma >= 0) {
    const head = sanitizePlace(place.slice(0, comma));
    const tail = sanitizePlace(place.slice(comma + 1));
    if (head) yield head;
    if (tail && tail !== head) yield tail;
  }
  if (place.includes("/")) {
    for (const piece of place.split("/")) {
      const cleaned = sanitizePlace(piece);
      if (cleaned) yield cleaned;
    }
  }
}

/**
 * Query strings for the online geocoder, most specific first, deduplicated
 * case-insensitively.
 */
export function buildQueries(place: string, country: string | null): string[] {
  const queries: string[] = [];
  const seen = new Set<string>();
  const add = (candidate: string) => {
    const c = candidate.replace(/^[,\s]+|[,\s]+$/g, "");
    if (!c || seen.has(c.toLowerCase())) return;
    seen.add(c.toLowerCase());
    queries.push(c);
  };

  const base = sanitizePlace(place);
  if (base) {
    add(base);
    if (country) add(`${base}, ${country}`);
  }
  for (const token of altTokens(place)) {
    add(token);
    if (country) add(`${token}, ${country}`);
  }
  if (queries.length === 0 && country) add(country);
  return queries;
}

export class GeocoderHttpError extends Error {
  constructor(
    readonly status: number,
    readonly query: string,
  ) {
    super(`Geocoder returned HTTP ${status} for "${query}"`);
    this.name = "GeocoderHttpError";
  }
}

export class GeocoderResponseError extends Error {
  constructor(
    readonly query: string,
    options?: { cause?: unknown },
  ) {
    super(`Geocoder returned an unreadable body for "${query}"`, options);
    this.name = "GeocoderResponseError";
  }
}

type NominatimHit = {
  lat: number;
  lon: number;
  type: string | null;
  address: Record<string, string>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string | null {
  const v = record[key];
  return typeof v === "string" && v.trim() ? v : null;
}

/** First hit of a search response, or null when it is empty or has no usable coordinates. */
export function readNominatimHit(data: unknown): NominatimHit | null {
  if (!Array.isArray(data) || data.length === 0) return null;
  const [first]: unknown[] = data;
  if (!isRecord(first)) return null;
  const lat = Number(first.lat);
  const lon = Number(first.lon);
  if (first.lat == null || first.lon == null || !Number.isFinite(lat) || !Number.isFinite(lon)) return null;

  const address: Record<string, string> = {};
  if (isRecord(first.address)) {
    for (const [k, v] of Object.entries(first.address)) {
      if (typeof v === "string") address[k] = v;
    }
  }
  return { lat, lon, type: stringField(first, "type"), address };
}

export type LocationResolverOptions = {
  cache: GeocodeCache;
  gazetteers?: GazetteerRegistry;
  online?: boolean;
  url?: string;
  userAgent?: string;
  minDelayMs?: number;
  rateLimitWaitMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
  logger?: Logger;
};

export type GeocodeContext = {
  /** Free text searched for gazetteer names and used by the heuristics. */
  description?: string | null;
};

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

function fromGazetteer(match: GazetteerMatch): GeocodeResult {
  const { entry } = match;
  return {
    lat: entry.lat,
    lon: entry.lon,
    admin1: entry.admin1,
    admin2: entry.admin2,
    accuracy: entry.kind,
    source: "gazetteer",
  };
}

/**
 * Place string (+ country hint) to coordinates: cache, then gazetteer
 * segments, then gazetteer names inside the text, then Nominatim, then a
 * country heuristic. Lookup failures come back as null (the incident stays
 * pending); only cache write errors propagate.
 */
export class LocationResolver {
  private readonly cache: GeocodeCache;
  private readonly gazetteers: GazetteerRegistry | null;
  private readonly online: boolean;
  private readonly url: string;
  private readonly userAgent: string;
  private readonly minDelayMs: number;
  private readonly rateLimitWaitMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private lastRequestAt = Number.NEGATIVE_INFINITY;

  constructor(options: LocationResolverOptions) {
    this.cache = options.cache;
    this.gazetteers = options.gazetteers ?? null;
    this.online = options.online ?? true;
    this.url = options.url ?? "https://nominatim.openstreetmap.org/search";
    this.userAgent = options.userAgent ?? "sicu-incident-pipeline/0.1";
    this.minDelayMs = options.minDelayMs ?? 1050;
    this.rateLimitWaitMs = options.rateLimitWaitMs ?? 5000;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? console;
  }

  async geocode(place: string, country: string | null, context: GeocodeContext = {}): Promise<GeocodeResult | null> {
    if (!place.trim()) return null;

    const canonical = canonicalCountry(country);
    const key = cacheKey(place, canonical);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const sanitized = sanitizePlace(place);
    const gazetteer = this.gazetteers ? await this.gazetteers.get(country, canonical) : null;
    const text = [place, context.description ?? ""].join(" ");

    if (gazetteer) {
      const match = gazetteer.lookupBySegments(sanitized) ?? gazetteer.lookupInText(text);
      if (match) {
        const result = fromGazetteer(match);
        await this.cache.put(key, result, canonical);
        return result;
      }
    }

    if (this.online) {
      const outcome = await this.searchOnline(buildQueries(place, canonical));
      if (outcome === "aborted") return null;
      if (outcome) {
        await this.cache.put(key, outcome, canonical);
        return outcome;
      }
    }

    const estimate = this.estimate(text, [country, canonical], gazetteer);
    if (estimate) await this.cache.put(key, estimate, canonical);
    return estimate;
  }

  private estimate(
    text: string,
    countries: Array<string | null>,
    gazetteer: Gazetteer | null,
  ): GeocodeResult | null {
    const hit = heuristicLocation(countries, text, gazetteer);
    if (!hit) return null;
    return { lat: hit.lat, lon: hit.lon, admin1: null, admin2: null, accuracy: "estimated", source: "heuristic" };
  }

  private async searchOnline(queries: string[]): Promise<GeocodeResult | "aborted" | null> {
    for (const query of queries) {
      let hit: NominatimHit | null;
      try {
        hit = await this.search(query);
      } catch (err) {
        if (err instanceof GeocoderHttpError && (err.status === 429 || err.status === 503)) {
          this.logger.warn(`⚠️  Geocoder rate limited (${err.status}); waiting before next query`);
          await this.sleep(this.rateLimitWaitMs);
          continue;
        }
        const message = err instanceof Error ? err.message : String(err);
        this.logger.warn(`⚠️  Geocoding aborted for "${query}": ${message}`);
        return "aborted";
      }
      if (!hit) continue;

      const { address } = hit;
      return {
        lat: hit.lat,
        lon: hit.lon,
        admin1: address.state || address.region || null,
        admin2: address.county || address.city_district || address.municipality || address.city || null,
        accuracy: hit.type,
        source: "nominatim",
      };
    }
    return null;
  }

  /** The slot is booked before waiting, so concurrent lookups queue up. */
  private async throttle(): Promise<void> {
    const now = this.clock();
    const slot = Math.max(now, this.lastRequestAt + this.minDelayMs);
    this.lastRequestAt = slot;
    if (slot > now) await this.sleep(slot - now);
  }

  private async search(query: string): Promise<NominatimHit | null> {
    const url = new URL(this.url);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "json");
    url.searchParams.set("limit", "1");
    url.searchParams.set("addressdetails", "1");

    await this.throttle();
    const res = await this.fetchFn(url.toString(), {
      headers: {
        "User-Agent": this.userAgent,
        "Accept-Language": "en",
      },
    });
    if (!res.ok) throw new GeocoderHttpError(res.status, query);

    let data: unknown;
    try {
      data = await res.json();
    } catch (err) {
      throw new GeocoderResponseError(query, { cause: err });
    }
    return readNominatimHit(data);
  }
}
