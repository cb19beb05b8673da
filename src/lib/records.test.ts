import { describe, expect, it } from "vitest";
import { candidateFromRecord, parseCoordinate, sicuRowFromIncident, sicuRowFromRecord } from "./records";
import type { Incident } from "./types";

describe("sicuRowFromRecord", () => {
  it("maps accented and alternate headers onto SICU fields", () => {
    const row = sicuRowFromRecord({
      Fecha: "2025-01-04",
      Hora: "08:15",
      País: "Libia",
      Categoria: "Terrorismo",
      Descripción: "Explosión en un mercado",
      Localización: "Trípoli",
      Lat: "32,8872",
      Lon: 13.1913,
      Fuente: "https://t.me/canal_libia/1",
    });
    expect(row).toEqual({
      fecha: "2025-01-04",
      hora: "08:15",
      pais: "Libia",
      categoria_sicu: "Terrorismo",
      descripcion: "Explosión en un mercado",
      localizacion: "Trípoli",
      lat: "32,8872",
      lon: "13.1913",
      fuente_URL: "https://t.me/canal_libia/1",
    });
  });

  it("leaves missing fields empty", () => {
    expect(sicuRowFromRecord({ descripcion: "Algo", lat: null })).toMatchObject({ fecha: "", lat: "", descripcion: "Algo" });
  });
});

describe("parseCoordinate", () => {
  it("reads decimal commas and numbers", () => {
    expect(parseCoordinate("32,8872")).toBe(32.8872);
    expect(parseCoordinate(" 13.19 ")).toBe(13.19);
    expect(parseCoordinate(5)).toBe(5);
  });

  it("returns null for blanks and garbage", () => {
    expect(parseCoordinate(" ")).toBeNull();
    expect(parseCoordinate("n/a")).toBeNull();
    expect(parseCoordinate(Number.NaN)).toBeNull();
    expect(parseCoordinate(undefined)).toBeNull();
  });
});

describe("candidateFromRecord", () => {
  it("keeps known categories and parses coordinates", () => {
    expect(
      candidateFromRecord({ categoria: "Hazards", descripcion: "Inundación", place: "Derna", fuente: "", lat: "32.76", lon: "" }),
    ).toEqual({ categoria: "Hazards", descripcion: "Inundación", place: "Derna", fuente: null, lat: 32.76, lon: null });
  });

  it("maps unknown categories to Otros and leaves a missing one unset", () => {
    expect(candidateFromRecord({ categoria: "Protesta", descripcion: "x" }).categoria).toBe("Otros");
    expect(candidateFromRecord({ descripcion: "x" }).categoria).toBeUndefined();
  });
});

describe("sicuRowFromIncident", () => {
  it("splits created_at and formats coordinates", () => {
    const incident: Incident = {
      id: 7,
      pais: "Libia",
      categoria: "Criminalidad",
      descripcion: "Robo a mano armada",
      fuente: "canal_libia",
      lat: 32.8872,
      lon: 13.1913,
      place: "Tripoli",
      admin1: null,
      admin2: null,
      accuracy: "city",
      geocode_source: "gazetteer",
      geocode_attempts: 0,
      created_at: "2025-01-04T08:15:30",
      updated_at: "2025-01-04T08:15:30",
    };
    expect(sicuRowFromIncident(incident)).toEqual({
      fecha: "2025-01-04",
      hora: "08:15",
      pais: "Libia",
      categoria_sicu: "Criminalidad",
      descripcion: "Robo a mano armada",
      localizacion: "Tripoli",
      lat: "32.887200",
      lon: "13.191300",
      fuente_URL: "canal_libia",
    });
    expect(sicuRowFromIncident({ ...incident, lat: null, lon: null, place: null })).toMatchObject({
      localizacion: "",
      lat: "",
      lon: "",
    });
  });
});
