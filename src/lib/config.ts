import path from "node:path";

export type PipelineConfig = {
  dataDir: string;
  outputDir: string;
  gazetteerDir: string;
  dbPath: string;
  timezone: string;
  geocoder: {
    online: boolean;
    url: string;
    userAgent: string;
    minDelayMs: number;
    rateLimitWaitMs: number;
    maxAttempts: number;
  };
};

// Nominatim usage policy expects a UA identifying the app
const DEFAULT_USER_AGENT = "sicu-incident-pipeline/0.1";

function readBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === "") return fallback;
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number.parseInt(value, 10);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const dataDir = env.DATA_DIR?.trim() || "data";
  return {
    dataDir,
    outputDir: env.OUTPUT_DIR?.trim() || "output",
    gazetteerDir: env.GAZETTEER_DIR?.trim() || path.join(dataDir, "gazetteer"),
    dbPath: env.INCIDENTS_DB?.trim() || path.join(dataDir, "incidentes.sqlite3"),
    timezone: env.TZ_NAME?.trim() || env.TZ?.trim() || "Africa/Tripoli",
    geocoder: {
      online: readBool(env.GEOCODER_ONLINE, true),
      url: env.NOMINATIM_URL?.trim() || "https://nominatim.openstreetmap.org/search",
      userAgent: env.GEOCODER_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
      minDelayMs: readInt(env.GEOCODER_MIN_DELAY_MS, 1050),
      rateLimitWaitMs: readInt(env.GEOCODER_RATE_LIMIT_WAIT_MS, 5000),
      maxAttempts: readInt(env.GEOCODER_MAX_ATTEMPTS, 5),
    },
  };
}

/** Lowercase slug used for per-country folders and gazetteer files. */
export function countrySlug(country: string): string {
  return country.trim().toLowerCase().replace(/\s+/g, "_");
}
