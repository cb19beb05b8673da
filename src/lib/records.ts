// Adapters between loosely-headed CSV/dict records and the canonical shapes.

import type { CandidateInput } from "./registrar";
import { isSicuCategory, type Incident, type SicuRow } from "./types";

type LooseRecord = Record<string, string | number | null | undefined>;

const SICU_FIELD_ALIASES: Record<keyof SicuRow, readonly string[]> = {
  fecha: ["fecha", "date", "día", "dia"],
  hora: ["hora", "time"],
  pais: ["pais", "país", "country"],
  categoria_sicu: ["categoria_sicu", "categoría_sicu", "categoria sicu", "categoría sicu", "categoria", "categoría"],
  descripcion: ["descripcion", "descripción", "breve descripcion", "breve descripción", "description"],
  localizacion: ["localizacion", "localización", "place", "location"],
  lat: ["lat", "latitude"],
  lon: ["lon", "lng", "long", "longitude"],
  fuente_URL: ["fuente_url", "fuente url", "fuente", "source", "url"],
};

function lowerKeys(record: LooseRecord): Map<string, string> {
  const out = new Map<string, string>();
  for (const [k, v] of Object.entries(record)) {
    if (v === null || v === undefined) continue;
    const key = k.trim().toLowerCase();
    const value = String(v).trim();
    // first non-empty value wins for duplicate spellings
    if (!out.get(key)) out.set(key, value);
  }
  return out;
}

function pick(fields: Map<string, string>, aliases: readonly string[]): string {
  for (const alias of aliases) {
    const v = fields.get(alias);
    if (v) return v;
  }
  return "";
}

export function sicuRowFromRecord(record: LooseRecord): SicuRow {
  const fields = lowerKeys(record);
  return {
    fecha: pick(fields, SICU_FIELD_ALIASES.fecha),
    hora: pick(fields, SICU_FIELD_ALIASES.hora),
    pais: pick(fields, SICU_FIELD_ALIASES.pais),
    categoria_sicu: pick(fields, SICU_FIELD_ALIASES.categoria_sicu),
    descripcion: pick(fields, SICU_FIELD_ALIASES.descripcion),
    localizacion: pick(fields, SICU_FIELD_ALIASES.localizacion),
    lat: pick(fields, SICU_FIELD_ALIASES.lat),
    lon: pick(fields, SICU_FIELD_ALIASES.lon),
    fuente_URL: pick(fields, SICU_FIELD_ALIASES.fuente_URL),
  };
}

export function parseCoordinate(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  let s = value.trim();
  if (!s) return null;
  if (s.includes(",") && !s.includes(".")) s = s.replace(",", ".");
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function candidateFromRecord(record: LooseRecord): CandidateInput {
  const fields = lowerKeys(record);
  const categoria = pick(fields, ["categoria", "categoria_sicu", "categoría", "categoría sicu"]);
  return {
    categoria: isSicuCategory(categoria) ? categoria : categoria ? "Otros" : undefined,
    descripcion: pick(fields, SICU_FIELD_ALIASES.descripcion),
    place: pick(fields, ["place", "localizacion", "localización"]) || null,
    fuente: pick(fields, ["fuente", "fuente_url", "fuente url", "source"]) || null,
    lat: parseCoordinate(pick(fields, SICU_FIELD_ALIASES.lat)),
    lon: parseCoordinate(pick(fields, SICU_FIELD_ALIASES.lon)),
  };
}

function formatCoordinate(value: number | null): string {
  return value === null ? "" : value.toFixed(6);
}

/** Ledger incident as a SICU row; date and time come from `created_at`. */
export function sicuRowFromIncident(incident: Incident): SicuRow {
  const [fecha = "", time = ""] = incident.created_at.split("T");
  return {
    fecha,
    hora: time.slice(0, 5),
    pais: incident.pais,
    categoria_sicu: incident.categoria,
    descripcion: incident.descripcion,
    localizacion: incident.place ?? "",
    lat: formatCoordinate(incident.lat),
    lon: formatCoordinate(incident.lon),
    fuente_URL: incident.fuente,
  };
}
