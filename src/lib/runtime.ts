import { promises as fs } from "node:fs";
import path from "node:path";
import { countrySlug, type PipelineConfig } from "./config";
import { IncidentStore } from "./db";
import { GazetteerRegistry } from "./gazetteer";
import { GeocodeCache } from "./geocache";
import { LocationResolver } from "./geocoder";
import { IncidentRegistrar } from "./registrar";
import type { Logger } from "./types";

export type PipelineRuntime = {
  store: IncidentStore;
  gazetteers: GazetteerRegistry;
  resolver: LocationResolver;
  registrar: IncidentRegistrar;
  close(): void;
};

/** Ledger, gazetteers, resolver and registrar wired from one config. */
export async function openRuntime(config: PipelineConfig, logger: Logger = console): Promise<PipelineRuntime> {
  const store = await IncidentStore.open(config.dbPath, { logger });
  const gazetteers = new GazetteerRegistry(config.gazetteerDir, logger);
  const resolver = new LocationResolver({
    cache: new GeocodeCache(store),
    gazetteers,
    online: config.geocoder.online,
    url: config.geocoder.url,
    userAgent: config.geocoder.userAgent,
    minDelayMs: config.geocoder.minDelayMs,
    rateLimitWaitMs: config.geocoder.rateLimitWaitMs,
    logger,
  });
  const registrar = new IncidentRegistrar(store, resolver, {
    maxGeocodeAttempts: config.geocoder.maxAttempts,
    logger,
  });
  return { store, gazetteers, resolver, registrar, close: () => store.close() };
}

/** `<dataDir>/<slug>/<day>.txt` */
export function feedPath(config: PipelineConfig, pais: string, day: string): string {
  return path.join(config.dataDir, countrySlug(pais), `${day}.txt`);
}

/** Feed text of a day, or null when the collector wrote nothing for it. */
export async function readFeed(config: PipelineConfig, pais: string, day: string): Promise<string | null> {
  try {
    return await fs.readFile(feedPath(config, pais, day), "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}
