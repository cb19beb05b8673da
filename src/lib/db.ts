import { promises as fs } from "node:fs";
import path from "node:path";
import initSqlJs from "sql.js";
import type { Database, SqlJsStatic, SqlValue } from "sql.js";
import { BatchLock } from "./lock";
import {
  isSicuCategory,
  type GeocodeCacheEntry,
  type GeocodeResult,
  type GeocodeSource,
  type Incident,
  type Logger,
  type SicuCategory,
} from "./types";

export type Db = Database;

type Row = Record<string, SqlValue>;

export type RetryOptions = {
  attempts?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

let engine: Promise<SqlJsStatic> | null = null;
let saves = 0;

/** The WASM engine is compiled once per process. */
export function loadSqlJs(): Promise<SqlJsStatic> {
  engine ??= initSqlJs();
  return engine;
}

export function isBusyError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = "code" in err && typeof err.code === "string" ? err.code : "";
  if (code.startsWith("SQLITE_BUSY") || code.startsWith("SQLITE_LOCKED") || code === "EBUSY") return true;
  return /database (table )?is (locked|busy)/i.test(err.message);
}

/**
 * Run a write, retrying on lock contention with exponential backoff
 * (baseDelayMs * 2^attempt). Any other error, or the last busy error,
 * is rethrown.
 */
export async function withBusyRetry<T>(op: () => T | Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 6);
  const baseDelayMs = options.baseDelayMs ?? 50;
  const wait = options.sleep ?? sleep;
  for (let attempt = 0; ; attempt++) {
    try {
      return await op();
    } catch (err) {
      if (!isBusyError(err) || attempt >= attempts - 1) throw err;
      await wait(baseDelayMs * 2 ** attempt);
    }
  }
}

export function all(db: Db, sql: string, params: SqlValue[] = []): Row[] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const rows: Row[] = [];
    while (stmt.step()) rows.push(stmt.getAsObject());
    return rows;
  } finally {
    stmt.free();
  }
}

function first(db: Db, sql: string, params: SqlValue[] = []): Row | null {
  return all(db, sql, params)[0] ?? null;
}

function text(row: Row, key: string): string {
  const value = row[key];
  return value == null ? "" : String(value);
}

function textOrNull(row: Row, key: string): string | null {
  const value = row[key];
  return value == null ? null : String(value);
}

function num(row: Row, key: string): number {
  const value = row[key];
  return typeof value === "number" ? value : Number(value ?? 0);
}

function numOrNull(row: Row, key: string): number | null {
  const value = row[key];
  if (value == null) return null;
  return typeof value === "number" ? value : Number(value);
}

const SCHEMA = `
CREATE TABLE IF NOT EXISTS incidentes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  pais TEXT NOT NULL,
  categoria TEXT NOT NULL,
  descripcion TEXT NOT NULL,
  fuente TEXT NOT NULL DEFAULT '',
  lat REAL,
  lon REAL,
  place TEXT,
  admin1 TEXT,
  admin2 TEXT,
  accuracy TEXT,
  geocode_source TEXT,
  geocode_attempts INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS geocache (
  key TEXT PRIMARY KEY,
  lat REAL NOT NULL,
  lon REAL NOT NULL,
  country TEXT,
  admin1 TEXT,
  admin2 TEXT,
  accuracy TEXT,
  source TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

const DEDUP_COLUMNS = "lower(pais), categoria, trim(descripcion), trim(coalesce(place, ''))";

const DEDUP_INDEX = `CREATE UNIQUE INDEX IF NOT EXISTS incidentes_dedup ON incidentes (${DEDUP_COLUMNS})`;

/**
 * Bring a ledger up to the current schema. Ledgers written before the unique
 * index existed may hold repeated tuples; all but the lowest id of each are
 * deleted so the index can be built.
 */
export function migrate(db: Db, logger: Logger = console): void {
  db.exec(SCHEMA);
  const columns = all(db, "PRAGMA table_info(incidentes)");
  if (!columns.some((c) => c.name === "geocode_attempts")) {
    db.exec("ALTER TABLE incidentes ADD COLUMN geocode_attempts INTEGER NOT NULL DEFAULT 0");
  }
  const indexed = first(db, "SELECT name FROM sqlite_master WHERE type = 'index' AND name = 'incidentes_dedup'");
  if (indexed) return;

  db.run(`DELETE FROM incidentes WHERE id NOT IN (SELECT min(id) FROM incidentes GROUP BY ${DEDUP_COLUMNS})`);
  const removed = db.getRowsModified();
  if (removed > 0) logger.warn(`⚠️  Removed ${removed} duplicated incident(s) before indexing`);
  db.exec(DEDUP_INDEX);
}

async function readLedger(file: string): Promise<Uint8Array | null> {
  try {
    return await fs.readFile(file);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

/** Identity of the file on disk; changes whenever another writer replaces it. */
async function fileStamp(file: string): Promise<string | null> {
  try {
    const stat = await fs.stat(file, { bigint: true });
    return `${stat.ino}:${stat.mtimeNs}:${stat.size}`;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}

export async function openDatabase(file: string, logger: Logger = console): Promise<Db> {
  const SQL = await loadSqlJs();
  const data = file === ":memory:" ? null : await readLedger(file);
  const db = new SQL.Database(data);
  migrate(db, logger);
  return db;
}

const GEOCODE_SOURCES: readonly GeocodeSource[] = ["cache", "nominatim", "gazetteer", "heuristic"];

function toGeocodeSource(value: string | null): GeocodeSource | null {
  return GEOCODE_SOURCES.find((s) => s === value) ?? null;
}

function toIncident(row: Row): Incident {
  const categoria = text(row, "categoria");
  return {
    id: num(row, "id"),
    pais: text(row, "pais"),
    categoria: isSicuCategory(categoria) ? categoria : "Otros",
    descripcion: text(row, "descripcion"),
    fuente: text(row, "fuente"),
    lat: numOrNull(row, "lat"),
    lon: numOrNull(row, "lon"),
    place: textOrNull(row, "place"),
    admin1: textOrNull(row, "admin1"),
    admin2: textOrNull(row, "admin2"),
    accuracy: textOrNull(row, "accuracy"),
    geocode_source: toGeocodeSource(textOrNull(row, "geocode_source")),
    geocode_attempts: num(row, "geocode_attempts"),
    created_at: text(row, "created_at"),
    updated_at: text(row, "updated_at"),
  };
}

function toGeocacheEntry(row: Row): GeocodeCacheEntry {
  return {
    key: text(row, "key"),
    lat: num(row, "lat"),
    lon: num(row, "lon"),
    country: textOrNull(row, "country"),
    admin1: textOrNull(row, "admin1"),
    admin2: textOrNull(row, "admin2"),
    accuracy: textOrNull(row, "accuracy"),
    source: text(row, "source"),
    updated_at: text(row, "updated_at"),
  };
}

export type NewIncident = {
  pais: string;
  categoria: SicuCategory;
  descripcion: string;
  fuente: string;
  lat?: number | null;
  lon?: number | null;
  place?: string | null;
};

export type DedupKey = Pick<NewIncident, "pais" | "categoria" | "descripcion" | "place">;

export type IncidentFilter = {
  pais?: string;
  categorias?: string[];
  includeWithoutCoords?: boolean;
  start?: string | Date;
  end?: string | Date;
  limit?: number;
  order?: "asc" | "desc";
};

function isoSeconds(d: Date): string {
  return d.toISOString().slice(0, 19);
}

function cleanPlace(place: string | null | undefined): string | null {
  const p = (place ?? "").trim();
  return p ? p : null;
}

export type IncidentStoreOptions = {
  now?: () => Date;
  retry?: RetryOptions;
  logger?: Logger;
};

/**
 * Append-only incident ledger plus the geocode cache table.
 *
 * The database lives in memory and every write is saved to `file` (temp file
 * then rename). Writes in one process are serialized; before each write the
 * store reloads the file if another process replaced it since the last save.
 * Reads see the state as of the last write or reload.
 */
export class IncidentStore {
  private readonly now: () => Date;
  private readonly retry: RetryOptions;
  private readonly logger: Logger;
  private readonly writes = new BatchLock();
  private stamp: string | null = null;

  private constructor(
    private db: Db,
    readonly file: string | null,
    options: IncidentStoreOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.retry = options.retry ?? {};
    this.logger = options.logger ?? console;
  }

  /** `":memory:"` keeps the ledger off disk. */
  static async open(file: string, options: IncidentStoreOptions = {}): Promise<IncidentStore> {
    const db = await openDatabase(file, options.logger);
    const store = new IncidentStore(db, file === ":memory:" ? null : file, options);
    await store.writes.run(() => store.save());
    return store;
  }

  close(): void {
    this.db.close();
  }

  private async reloadIfChanged(): Promise<void> {
    if (!this.file) return;
    const stamp = await fileStamp(this.file);
    if (stamp === null || stamp === this.stamp) return;
    const next = await openDatabase(this.file, this.logger);
    this.db.close();
    this.db = next;
    this.stamp = stamp;
  }

  private async save(): Promise<void> {
    const file = this.file;
    if (!file) return;
    const data = this.db.export();
    const tmp = `${file}.${process.pid}.${++saves}.tmp`;
    await withBusyRetry(async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(tmp, data);
      await fs.rename(tmp, file);
    }, this.retry);
    this.stamp = await fileStamp(file);
  }

  private write<T>(op: (db: Db) => T): Promise<T> {
    return this.writes.run(async () => {
      await this.reloadIfChanged();
      const result = op(this.db);
      await this.save();
      return result;
    });
  }

  findDuplicate(key: DedupKey): number | null {
    const row = first(
      this.db,
      `SELECT id FROM incidentes
        WHERE lower(pais) = lower(?)
          AND categoria = ?
          AND trim(descripcion) = ?
          AND trim(coalesce(place, '')) = ?
        LIMIT 1`,
      [key.pais, key.categoria, key.descripcion.trim(), cleanPlace(key.place) ?? ""],
    );
    return row ? num(row, "id") : null;
  }

  exists(key: DedupKey): boolean {
    return this.findDuplicate(key) !== null;
  }

  /**
   * Insert unless the (pais, categoria, descripcion, place) tuple is already
   * stored. The unique index decides, so concurrent writers cannot both win.
   */
  async insert(input: NewIncident): Promise<{ id: number; inserted: boolean }> {
    const ts = isoSeconds(this.now());
    return this.write((db) => {
      db.run(
        `INSERT INTO incidentes (pais, categoria, descripcion, fuente, lat, lon, place, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT DO NOTHING`,
        [
          input.pais,
          input.categoria,
          input.descripcion.trim(),
          input.fuente,
          input.lat ?? null,
          input.lon ?? null,
          cleanPlace(input.place),
          ts,
          ts,
        ],
      );
      if (db.getRowsModified() > 0) {
        const row = first(db, "SELECT last_insert_rowid() AS id");
        if (row) return { id: num(row, "id"), inserted: true };
      }

      const existing = this.findDuplicate(input);
      if (existing === null) throw new Error("Insert was ignored but no matching incident exists");
      return { id: existing, inserted: false };
    });
  }

  get(id: number): Incident | null {
    const row = first(this.db, "SELECT * FROM incidentes WHERE id = ?", [id]);
    return row ? toIncident(row) : null;
  }

  /**
   * Incidents with a place but no coordinates. With `maxAttempts`, those that
   * already failed that many resolution passes are left out.
   */
  pending(maxAttempts?: number): Incident[] {
    return all(
      this.db,
      `SELECT * FROM incidentes
        WHERE (lat IS NULL OR lon IS NULL)
          AND place IS NOT NULL AND trim(place) <> ''
          AND geocode_attempts < ?
        ORDER BY id ASC`,
      [maxAttempts ?? Number.MAX_SAFE_INTEGER],
    ).map(toIncident);
  }

  async updateGeocode(id: number, result: GeocodeResult): Promise<void> {
    const ts = isoSeconds(this.now());
    await this.write((db) =>
      db.run(
        `UPDATE incidentes
            SET lat = ?, lon = ?, admin1 = ?, admin2 = ?, accuracy = ?, geocode_source = ?, updated_at = ?
          WHERE id = ?`,
        [result.lat, result.lon, result.admin1, result.admin2, result.accuracy, result.source, ts, id],
      ),
    );
  }

  async markGeocodeFailed(id: number): Promise<void> {
    const ts = isoSeconds(this.now());
    await this.write((db) =>
      db.run("UPDATE incidentes SET geocode_attempts = geocode_attempts + 1, updated_at = ? WHERE id = ?", [ts, id]),
    );
  }

  list(filter: IncidentFilter = {}): Incident[] {
    const where: string[] = [];
    const params: Array<string | number> = [];

    if (!filter.includeWithoutCoords) where.push("lat IS NOT NULL AND lon IS NOT NULL");
    if (filter.pais?.trim()) {
      where.push("lower(pais) = lower(?)");
      params.push(filter.pais.trim());
    }
    const categorias = (filter.categorias ?? []).map((c) => c.trim()).filter(Boolean);
    if (categorias.length > 0) {
      where.push(`categoria IN (${categorias.map(() => "?").join(", ")})`);
      params.push(...categorias);
    }
    if (filter.start) {
      where.push("datetime(created_at) >= datetime(?)");
      params.push(typeof filter.start === "string" ? filter.start : isoSeconds(filter.start));
    }
    if (filter.end) {
      where.push("datetime(created_at) <= datetime(?)");
      params.push(typeof filter.end === "string" ? filter.end : isoSeconds(filter.end));
    }

    const whereClause = where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
    const order = filter.order === "asc" ? "ASC" : "DESC";
    let sql = `SELECT * FROM incidentes ${whereClause} ORDER BY created_at ${order}, id ${order}`;
    if (filter.limit && filter.limit > 0) {
      sql += " LIMIT ?";
      params.push(Math.floor(filter.limit));
    }
    return all(this.db, sql, params).map(toIncident);
  }

  readGeocache(key: string): GeocodeCacheEntry | null {
    const row = first(this.db, "SELECT * FROM geocache WHERE key = ?", [key]);
    return row ? toGeocacheEntry(row) : null;
  }

  async writeGeocache(entry: Omit<GeocodeCacheEntry, "updated_at">): Promise<void> {
    const ts = isoSeconds(this.now());
    await this.write((db) =>
      db.run(
        `INSERT INTO geocache (key, lat, lon, country, admin1, admin2, accuracy, source, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET
           lat = excluded.lat,
           lon = excluded.lon,
           country = excluded.country,
           admin1 = excluded.admin1,
           admin2 = excluded.admin2,
           accuracy = excluded.accuracy,
           source = excluded.source,
           updated_at = excluded.updated_at`,
        [entry.key, entry.lat, entry.lon, entry.country, entry.admin1, entry.admin2, entry.accuracy, entry.source, ts],
      ),
    );
  }
}
