import { featureCollection, point } from "@turf/helpers";
import { stringify } from "csv-stringify/sync";
import { forward } from "mgrs";
import { parseCoordinate } from "./records";
import { SICU_CATEGORIES, SICU_COLUMNS, type Incident, type SicuFeature, type SicuRow } from "./types";

export const INCIDENT_COLUMNS = [
  "id",
  "pais",
  "categoria",
  "descripcion",
  "fuente",
  "lat",
  "lon",
  "mgrs",
  "place",
  "admin1",
  "admin2",
  "accuracy",
  "geocode_source",
  "created_at",
  "updated_at",
] as const;

/** 1 m MGRS grid reference; "" outside the UTM band range or without coordinates. */
export function toMgrs(lat: number | null, lon: number | null): string {
  if (lat === null || lon === null) return "";
  if (lat < -80 || lat > 84) return "";
  try {
    return forward([lon, lat], 5);
  } catch (err) {
    console.warn(`⚠️  MGRS conversion failed for ${lat}, ${lon}:`, err instanceof Error ? err.message : err);
    return "";
  }
}

export function sicuRowsToCsv(rows: readonly SicuRow[]): string {
  return stringify([...rows], { header: true, columns: [...SICU_COLUMNS] });
}

export function incidentsToCsv(incidents: readonly Incident[]): string {
  const records = incidents.map((i) => ({
    ...i,
    lat: i.lat ?? "",
    lon: i.lon ?? "",
    mgrs: toMgrs(i.lat, i.lon),
    place: i.place ?? "",
    admin1: i.admin1 ?? "",
    admin2: i.admin2 ?? "",
    accuracy: i.accuracy ?? "",
    geocode_source: i.geocode_source ?? "",
  }));
  return stringify(records, { header: true, columns: [...INCIDENT_COLUMNS] });
}

function rowPoint(row: SicuRow): [number, number] | null {
  const lat = parseCoordinate(row.lat);
  const lon = parseCoordinate(row.lon);
  return lat === null || lon === null ? null : [lon, lat];
}

/** Rows with coordinates as point features; the rest are left out. */
export function sicuRowsToGeoJson(rows: readonly SicuRow[]): GeoJSON.FeatureCollection<GeoJSON.Point, SicuRow> {
  const features: SicuFeature[] = [];
  for (const row of rows) {
    const coords = rowPoint(row);
    if (coords) features.push(point(coords, { ...row }));
  }
  return featureCollection(features);
}

// KML colors are aabbggrr
export const SICU_STYLES: Record<string, string> = {
  "Conflicto Armado": "ff0000ff",
  Terrorismo: "ff000000",
  Criminalidad: "ff00a5ff",
  "Disturbios Civiles": "ffff0000",
  Hazards: "ff008000",
  Otros: "ff808080",
};

export function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function styleId(categoria: string): string {
  return `sicu-${categoria.toLowerCase().replace(/\s+/g, "-")}`;
}

function placemark(row: SicuRow, [lon, lat]: [number, number]): string {
  const name = row.localizacion || row.categoria_sicu;
  const lines = [
    `${row.fecha} ${row.hora}`.trim(),
    row.descripcion,
    row.fuente_URL ? `Fuente: ${row.fuente_URL}` : "",
  ].filter(Boolean);
  return [
    "      <Placemark>",
    `        <name>${escapeXml(name)}</name>`,
    `        <description>${escapeXml(lines.join("\n"))}</description>`,
    `        <styleUrl>#${styleId(row.categoria_sicu)}</styleUrl>`,
    `        <Point><coordinates>${lon},${lat},0</coordinates></Point>`,
    "      </Placemark>",
  ].join("\n");
}

/** One folder per category (fixed order), rows without coordinates skipped. */
export function sicuRowsToKml(rows: readonly SicuRow[], title: string): string {
  const out: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<kml xmlns="http://www.opengis.net/kml/2.2">',
    "  <Document>",
    `    <name>${escapeXml(title)}</name>`,
  ];
  for (const categoria of SICU_CATEGORIES) {
    out.push(
      `    <Style id="${styleId(categoria)}"><IconStyle><color>${SICU_STYLES[categoria]}</color></IconStyle></Style>`,
    );
  }
  for (const categoria of SICU_CATEGORIES) {
    const placemarks: string[] = [];
    for (const row of rows) {
      const rowCategory = SICU_STYLES[row.categoria_sicu] ? row.categoria_sicu : "Otros";
      if (rowCategory !== categoria) continue;
      const coords = rowPoint(row);
      if (!coords) continue;
      placemarks.push(placemark({ ...row, categoria_sicu: rowCategory }, coords));
    }
    if (placemarks.length === 0) continue;
    out.push("    <Folder>", `      <name>${escapeXml(categoria)}</name>`, ...placemarks, "    </Folder>");
  }
  out.push("  </Document>", "</kml>", "");
  return out.join("\n");
}
