import { describe, expect, it, vi } from "vitest";
import { Gazetteer, GazetteerRegistry } from "./gazetteer";
import { GeocodeCache, type GeocodeCacheStore } from "./geocache";
import {
  LocationResolver,
  buildQueries,
  cacheKey,
  canonicalCountry,
  readNominatimHit,
  sanitizePlace,
  type LocationResolverOptions,
} from "./geocoder";
import type { GeocodeCacheEntry } from "./types";

class MemoryStore implements GeocodeCacheStore {
  readonly entries = new Map<string, GeocodeCacheEntry>();

  readGeocache(key: string): GeocodeCacheEntry | null {
    return this.entries.get(key) ?? null;
  }

  async writeGeocache(entry: Omit<GeocodeCacheEntry, "updated_at">): Promise<void> {
    this.entries.set(entry.key, { ...entry, updated_at: "2025-01-05T10:00:00" });
  }
}

const tripoliOnly = Gazetteer.fromCsv("name,admin1,lat,lon,kind\nTripoli,Tripolitania,32.8872,13.1913,city\n");
const withBenghazi = Gazetteer.fromCsv("name,lat,lon,kind\nBenghazi,32.1167,20.0667,city\n");

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

const BENGHAZI_HIT = [
  { lat: "32.1167", lon: "20.0667", type: "city", address: { state: "Cyrenaica", city: "Benghazi" } },
];

function setup(options: Partial<LocationResolverOptions> & { gazetteer?: Gazetteer } = {}) {
  const store = new MemoryStore();
  let now = 0;
  const sleep = vi.fn(async (ms: number) => {
    now += ms;
  });
  const fetchMock = vi.fn<typeof fetch>(async () => json([]));
  const logger = { log: vi.fn(), warn: vi.fn() };
  const resolver = new LocationResolver({
    cache: new GeocodeCache(store),
    gazetteers: options.gazetteer ? GazetteerRegistry.fromEntries({ Libia: options.gazetteer }) : undefined,
    userAgent: "test-agent",
    fetch: fetchMock,
    sleep,
    clock: () => now,
    logger,
    ...options,
  });
  return { resolver, store, sleep, fetchMock, logger };
}

describe("place helpers", () => {
  it("sanitizes proximity wording, markers and place-type suffixes", () => {
    expect(sanitizePlace("cerca de Trípoli")).toBe("Trípoli");
    expect(sanitizePlace("al norte de Sirte")).toBe("Sirte");
    expect(sanitizePlace("Misrata city")).toBe("Misrata");
    expect(sanitizePlace("#Zawiya.")).toBe("Zawiya");
    expect(sanitizePlace("Deir al-Balah")).toBe("Deir al-Balah");
  });

  it("strips leading articles and place-type prefixes", () => {
    expect(sanitizePlace("la ciudad de Trípoli")).toBe("Trípoli");
    expect(sanitizePlace("the city of Benghazi")).toBe("Benghazi");
    expect(sanitizePlace("Provincia de Sirte")).toBe("Sirte");
    expect(sanitizePlace("cerca de la ciudad de Misrata")).toBe("Misrata");
    expect(sanitizePlace("La")).toBe("La");
  });

  it("keys the cache by sanitized place and canonical country", () => {
    expect(cacheKey("  Cerca de Trípoli ", "libia")).toBe("trípoli||libya");
    expect(cacheKey("Tripoli", null)).toBe("tripoli||");
    expect(cacheKey("la ciudad de Trípoli", "Libia")).toBe("trípoli||libya");
  });

  it("canonicalizes country names", () => {
    expect(canonicalCountry("Palestina")).toBe("State of Palestine");
    expect(canonicalCountry("Narnia")).toBe("Narnia");
    expect(canonicalCountry("  ")).toBeNull();
  });

  it("builds queries from the full place, then its pieces", () => {
    expect(buildQueries("Abu Salim/Tripoli", "Libya")).toEqual([
      "Abu Salim/Tripoli",
      "Abu Salim/Tripoli, Libya",
      "Abu Salim",
      "Abu Salim, Libya",
      "Tripoli",
      "Tripoli, Libya",
    ]);
    expect(buildQueries("Tripoli, Libya", null)).toEqual(["Tripoli, Libya", "Tripoli", "Libya"]);
    expect(buildQueries("", "Libya")).toEqual(["Libya"]);
  });

  it("reads the first usable search hit", () => {
    expect(readNominatimHit([{ lat: "32.1", lon: "20", type: "city", address: { state: "Cyrenaica", n: 1 } }])).toEqual({
      lat: 32.1,
      lon: 20,
      type: "city",
      address: { state: "Cyrenaica" },
    });
    expect(readNominatimHit([])).toBeNull();
    expect(readNominatimHit([{ lat: null, lon: "1" }])).toBeNull();
    expect(readNominatimHit({ lat: "1", lon: "1" })).toBeNull();
  });
});

describe("LocationResolver", () => {
  it("tries place segments in order against the gazetteer", async () => {
    const { resolver, fetchMock } = setup({ gazetteer: tripoliOnly });
    await expect(resolver.geocode("Ain Zara, Tripoli, Libya", "Libia")).resolves.toEqual({
      lat: 32.8872,
      lon: 13.1913,
      admin1: "Tripolitania",
      admin2: null,
      accuracy: "city",
      source: "gazetteer",
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("finds gazetteer names inside the description", async () => {
    const { resolver, fetchMock } = setup({ gazetteer: withBenghazi });
    const result = await resolver.geocode("zona portuaria", "Libia", {
      description: "Explosión en la zona portuaria de Benghazi",
    });
    expect(result).toMatchObject({ lat: 32.1167, lon: 20.0667, source: "gazetteer" });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("serves repeated lookups from the cache", async () => {
    const { resolver, store } = setup({ gazetteer: tripoliOnly });
    const first = await resolver.geocode("Tripoli", "Libia");
    const second = await resolver.geocode("cerca de Tripoli", "Libya");
    expect(second).toEqual({ ...first, source: "cache" });
    expect(store.entries.size).toBe(1);
  });

  it("queries the online geocoder and caches the hit", async () => {
    const { resolver, fetchMock, store } = setup();
    fetchMock.mockResolvedValueOnce(json(BENGHAZI_HIT));

    await expect(resolver.geocode("Benghazi", "Libia")).resolves.toEqual({
      lat: 32.1167,
      lon: 20.0667,
      admin1: "Cyrenaica",
      admin2: "Benghazi",
      accuracy: "city",
      source: "nominatim",
    });

    const [input, init] = fetchMock.mock.calls[0];
    const url = new URL(String(input));
    expect(url.searchParams.get("q")).toBe("Benghazi");
    expect(url.searchParams.get("format")).toBe("json");
    expect(url.searchParams.get("limit")).toBe("1");
    expect(url.searchParams.get("addressdetails")).toBe("1");
    expect(init?.headers).toEqual({ "User-Agent": "test-agent", "Accept-Language": "en" });
    expect(store.readGeocache("benghazi||libya")?.source).toBe("nominatim");
  });

  it("waits out a rate limit and moves on to the next query", async () => {
    const { resolver, fetchMock, sleep } = setup({ rateLimitWaitMs: 5000 });
    fetchMock.mockResolvedValueOnce(json({}, 429)).mockResolvedValueOnce(json(BENGHAZI_HIT));

    const result = await resolver.geocode("Benghazi", "Libia");
    expect(result?.source).toBe("nominatim");
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000]);
    expect(new URL(String(fetchMock.mock.calls[1][0])).searchParams.get("q")).toBe("Benghazi, Libya");
  });

  it("keeps a minimum delay between requests", async () => {
    const { resolver, fetchMock, sleep } = setup({ minDelayMs: 1050 });
    fetchMock.mockImplementation(async () => json(BENGHAZI_HIT));

    await resolver.geocode("Sirte", "Libia");
    await resolver.geocode("Sabha", "Libia");
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1050]);
  });

  it("spaces concurrent lookups by the minimum delay", async () => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
    try {
      const start = Date.now();
      const requestedAt: number[] = [];
      const resolver = new LocationResolver({
        cache: new GeocodeCache(new MemoryStore()),
        userAgent: "test-agent",
        minDelayMs: 200,
        fetch: async () => {
          requestedAt.push(Date.now() - start);
          return json(BENGHAZI_HIT);
        },
        logger: { log: vi.fn(), warn: vi.fn() },
      });

      const lookups = Promise.all(["Sirte", "Sabha", "Derna"].map((place) => resolver.geocode(place, "Libia")));
      await vi.advanceTimersByTimeAsync(1000);
      const results = await lookups;

      expect(results.map((r) => r?.source)).toEqual(["nominatim", "nominatim", "nominatim"]);
      expect(requestedAt).toEqual([0, 200, 400]);
    } finally {
      vi.useRealTimers();
    }
  });

  it("gives up on transport errors without estimating", async () => {
    const { resolver, fetchMock, logger } = setup({ gazetteer: tripoliOnly });
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(resolver.geocode("Wadi Desconocido", "Libia")).resolves.toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("gives up on server errors", async () => {
    const { resolver, fetchMock } = setup();
    fetchMock.mockResolvedValueOnce(json({}, 500));
    await expect(resolver.geocode("Benghazi", "Libia")).resolves.toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("falls back to a country estimate when nothing matches and caches it", async () => {
    const { resolver, fetchMock, store } = setup({ gazetteer: tripoliOnly });

    await expect(resolver.geocode("Wadi Desconocido", "Libia")).resolves.toEqual({
      lat: 32.8872,
      lon: 13.1913,
      admin1: null,
      admin2: null,
      accuracy: "estimated",
      source: "heuristic",
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(store.readGeocache("wadi desconocido||libya")?.source).toBe("heuristic");

    await expect(resolver.geocode("Wadi Desconocido", "Libia")).resolves.toEqual({
      lat: 32.8872,
      lon: 13.1913,
      admin1: null,
      admin2: null,
      accuracy: "estimated",
      source: "cache",
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("skips the network when offline", async () => {
    const { resolver, fetchMock } = setup({ gazetteer: tripoliOnly, online: false });
    const result = await resolver.geocode("Wadi Desconocido", "Libia", { description: "Ataque en Bengasi" });
    expect(result).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("returns null for a blank place", async () => {
    const { resolver } = setup();
    await expect(resolver.geocode("   ", "Libia")).resolves.toBeNull();
  });
});
