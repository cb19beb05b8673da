import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { IncidentStore } from "./db";
import { Gazetteer, GazetteerRegistry } from "./gazetteer";
import { GeocodeCache } from "./geocache";
import { LocationResolver } from "./geocoder";
import { IncidentRegistrar } from "./registrar";

const libya = Gazetteer.fromCsv("name,lat,lon,kind\nTripoli,32.8872,13.1913,city\n");

describe("IncidentRegistrar", () => {
  let store: IncidentStore;
  let registrar: IncidentRegistrar;
  const logger = { log: vi.fn(), warn: vi.fn() };

  beforeEach(async () => {
    store = await IncidentStore.open(":memory:");
    const resolver = new LocationResolver({
      cache: new GeocodeCache(store),
      gazetteers: GazetteerRegistry.fromEntries({ Libia: libya }),
      online: false,
      logger,
    });
    registrar = new IncidentRegistrar(store, resolver, { maxGeocodeAttempts: 1, logger });
  });

  afterEach(() => {
    store.close();
  });

  it("skips blanks and duplicates, then resolves what it stored", async () => {
    const candidate = {
      categoria: "Terrorismo" as const,
      descripcion: "Ataque con bomba en Trípoli",
      place: "Trípoli",
      fuente: "@canal1",
    };
    const inserted = await registrar.registerMany("Libia", [candidate, { ...candidate, fuente: "@canal2" }, { descripcion: "  " }]);

    expect(inserted).toBe(1);
    expect(store.get(1)).toMatchObject({
      fuente: "@canal1",
      lat: 32.8872,
      lon: 13.1913,
      geocode_source: "gazetteer",
    });
    expect(store.pending()).toEqual([]);
  });

  it("fills in default category and source", async () => {
    await registrar.registerMany("Libia", [{ descripcion: "Sin clasificar" }], { resolveNow: false });
    expect(store.get(1)).toMatchObject({ categoria: "Otros", fuente: "Informe Diario", place: null });
  });

  it("counts failed resolutions and stops retrying at the ceiling", async () => {
    const id = await registrar.register({
      pais: "Haiti",
      categoria: "Criminalidad",
      descripcion: "Secuestro",
      fuente: "@canal1",
      place: "Cap Inconnu",
    });
    expect(store.get(id)?.geocode_attempts).toBe(1);

    await expect(registrar.resolvePending()).resolves.toBe(0);
    expect(store.get(id)?.geocode_attempts).toBe(1);
  });

  it("returns the existing id for a repeated incident", async () => {
    const input = { pais: "Libia", categoria: "Hazards" as const, descripcion: "Inundación", fuente: "x", place: "Derna" };
    const first = await registrar.register(input, { resolveNow: false });
    const second = await registrar.register({ ...input, fuente: "y" }, { resolveNow: false });
    expect(second).toBe(first);
  });

  it("registers categorized report bullets", async () => {
    const inserted = await registrar.registerFromReport(
      "Libia",
      ["Terrorismo:", "- Explosión en Trípoli", "Hazards:", "- Lluvias intensas"].join("\n"),
    );
    expect(inserted).toBe(2);
    expect(store.list({ includeWithoutCoords: true, order: "asc" })).toMatchObject([
      { categoria: "Terrorismo", place: "Trípoli", fuente: "Informe Diario", geocode_source: "gazetteer" },
      { categoria: "Hazards", place: null, fuente: "Informe Diario", lat: null },
    ]);
  });

  it("stores without resolving when there is no resolver", async () => {
    const bare = new IncidentRegistrar(store, null, { logger });
    await bare.registerMany("Libia", [{ descripcion: "Disparos", place: "Tripoli" }]);
    expect(store.pending()).toHaveLength(1);
    await expect(bare.resolvePending()).resolves.toBe(0);
  });
});
