import { promises as fs } from "node:fs";
import path from "node:path";
import type { GeocodeCacheEntry, GeocodeResult } from "./types";

/** Backing store for the geocode cache: a table, a JSON file, ... */
export interface GeocodeCacheStore {
  readGeocache(key: string): GeocodeCacheEntry | null;
  writeGeocache(entry: Omit<GeocodeCacheEntry, "updated_at">): Promise<void>;
}

/**
 * Memoized place lookups shared by every resolver in the process. Entries
 * never expire; a put overwrites.
 */
export class GeocodeCache {
  constructor(private readonly store: GeocodeCacheStore) {}

  get(key: string): GeocodeResult | null {
    const entry = this.store.readGeocache(key);
    if (!entry) return null;
    return {
      lat: entry.lat,
      lon: entry.lon,
      admin1: entry.admin1,
      admin2: entry.admin2,
      accuracy: entry.accuracy,
      source: "cache",
    };
  }

  async put(key: string, result: GeocodeResult, country: string | null): Promise<void> {
    await this.store.writeGeocache({
      key,
      lat: result.lat,
      lon: result.lon,
      country,
      admin1: result.admin1,
      admin2: result.admin2,
      accuracy: result.accuracy,
      source: result.source,
    });
  }
}

async function readJsonIfExists<T>(p: string, fallback: T): Promise<T> {
  try {
    const txt = await fs.readFile(p, "utf8");
    return JSON.parse(txt) as T;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return fallback;
    throw err;
  }
}

async function writeJson(p: string, data: unknown) {
  await fs.mkdir(path.dirname(p), { recursive: true });
  await fs.writeFile(p, JSON.stringify(data, null, 2), "utf8");
}

/** File-backed store for runs without the SQLite ledger. */
export class JsonGeocodeStore implements GeocodeCacheStore {
  private constructor(
    private readonly file: string,
    private readonly entries: Record<string, GeocodeCacheEntry>,
    private readonly now: () => Date,
  ) {}

  static async open(file: string, now: () => Date = () => new Date()): Promise<JsonGeocodeStore> {
    const entries = await readJsonIfExists<Record<string, GeocodeCacheEntry>>(file, {});
    return new JsonGeocodeStore(file, entries, now);
  }

  get size(): number {
    return Object.keys(this.entries).length;
  }

  readGeocache(key: string): GeocodeCacheEntry | null {
    return this.entries[key] ?? null;
  }

  async writeGeocache(entry: Omit<GeocodeCacheEntry, "updated_at">): Promise<void> {
    this.entries[entry.key] = { ...entry, updated_at: this.now().toISOString().slice(0, 19) };
    await writeJson(this.file, this.entries);
  }
}
