export const SICU_CATEGORIES = [
  "Conflicto Armado",
  "Terrorismo",
  "Criminalidad",
  "Disturbios Civiles",
  "Hazards",
  "Otros",
] as const;

export type SicuCategory = (typeof SICU_CATEGORIES)[number];

export function isSicuCategory(value: string): value is SicuCategory {
  return (SICU_CATEGORIES as readonly string[]).includes(value);
}

/** One timestamped block of a collected channel dump. */
export type FeedEntry = {
  channel: string;
  datetime: string; // "YYYY-MM-DD HH:MM:SS" as written in the header
  lines: string[];
  body: string;
};

/** Produced by the parsers, never stored directly. */
export type IncidentCandidate = {
  categoria: SicuCategory;
  descripcion: string;
  place: string | null;
  fuente: string;
  lat: number | null;
  lon: number | null;
};

export type GeocodeSource = "cache" | "nominatim" | "gazetteer" | "heuristic";

export type Incident = {
  id: number;
  pais: string;
  categoria: SicuCategory;
  descripcion: string;
  fuente: string;
  lat: number | null;
  lon: number | null;
  place: string | null;
  admin1: string | null;
  admin2: string | null;
  accuracy: string | null;
  geocode_source: GeocodeSource | null;
  geocode_attempts: number;
  created_at: string;
  updated_at: string;
};

export type GeocodeResult = {
  lat: number;
  lon: number;
  admin1: string | null;
  admin2: string | null;
  accuracy: string | null;
  source: GeocodeSource;
};

export type GeocodeCacheEntry = {
  key: string;
  lat: number;
  lon: number;
  country: string | null;
  admin1: string | null;
  admin2: string | null;
  accuracy: string | null;
  source: string;
  updated_at: string;
};

/** Day-scoped categorized record, CSV-shaped (every field is text). */
export type SicuRow = {
  fecha: string;
  hora: string;
  pais: string;
  categoria_sicu: string;
  descripcion: string;
  localizacion: string;
  lat: string;
  lon: string;
  fuente_URL: string;
};

export const SICU_COLUMNS = [
  "fecha",
  "hora",
  "pais",
  "categoria_sicu",
  "descripcion",
  "localizacion",
  "lat",
  "lon",
  "fuente_URL",
] as const satisfies ReadonlyArray<keyof SicuRow>;

/** A GeoJSON Feature whose properties carry one SICU row. */
export type SicuFeature = GeoJSON.Feature<GeoJSON.Point, SicuRow>;

export type Logger = Pick<Console, "log" | "warn">;
