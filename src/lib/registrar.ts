import type { IncidentStore, NewIncident } from "./db";
import { parseCategorizedReport } from "./feed";
import type { LocationResolver } from "./geocoder";
import type { IncidentCandidate, Logger } from "./types";

export type RegisterOptions = {
  /** Run a resolution pass over every pending incident afterwards (default true). */
  resolveNow?: boolean;
  /** Country used by the resolver for incidents that carry none. */
  countryHint?: string | null;
};

export type CandidateInput = Partial<{ [K in keyof IncidentCandidate]: IncidentCandidate[K] | null }>;

export type IncidentRegistrarOptions = {
  /** Failed resolution passes after which an incident stops being retried. */
  maxGeocodeAttempts?: number;
  logger?: Logger;
};

export const DEFAULT_FUENTE = "Informe Diario";

/**
 * Entry point for new incidents: dedup-on-insert against the ledger, then
 * fill in coordinates of whatever is still pending.
 */
export class IncidentRegistrar {
  private readonly maxGeocodeAttempts: number | undefined;
  private readonly logger: Logger;

  constructor(
    private readonly store: IncidentStore,
    private readonly resolver: LocationResolver | null,
    options: IncidentRegistrarOptions = {},
  ) {
    this.maxGeocodeAttempts = options.maxGeocodeAttempts;
    this.logger = options.logger ?? console;
  }

  /** Returns the new id, or the id of the incident already holding the same tuple. */
  async register(input: NewIncident, options: RegisterOptions = {}): Promise<number> {
    const { id } = await this.store.insert(input);
    if (options.resolveNow ?? true) {
      await this.resolvePending(options.countryHint ?? input.pais);
    }
    return id;
  }

  /** Returns how many candidates were actually inserted. */
  async registerMany(pais: string, candidates: Iterable<CandidateInput>, options: RegisterOptions = {}): Promise<number> {
    let inserted = 0;
    for (const candidate of candidates) {
      const descripcion = (candidate.descripcion ?? "").trim();
      if (!descripcion) continue;
      const result = await this.store.insert({
        pais,
        categoria: candidate.categoria ?? "Otros",
        descripcion,
        fuente: candidate.fuente?.trim() || DEFAULT_FUENTE,
        lat: candidate.lat ?? null,
        lon: candidate.lon ?? null,
        place: candidate.place ?? null,
      });
      if (result.inserted) inserted++;
    }

    if (options.resolveNow ?? true) {
      await this.resolvePending(options.countryHint ?? pais);
    }
    return inserted;
  }

  /** Categorized report text (section headers + bullets) straight into the ledger. */
  async registerFromReport(
    pais: string,
    text: string,
    options: RegisterOptions & { fuente?: string } = {},
  ): Promise<number> {
    const incidents = parseCategorizedReport(text, options.fuente ?? DEFAULT_FUENTE);
    return this.registerMany(pais, incidents, { ...options, countryHint: options.countryHint ?? pais });
  }

  /** Geocode every pending incident; returns how many got coordinates. */
  async resolvePending(defaultCountryHint?: string | null): Promise<number> {
    if (!this.resolver) return 0;
    const pending = this.store.pending(this.maxGeocodeAttempts);
    let resolved = 0;
    for (const incident of pending) {
      if (!incident.place) continue;
      const country = incident.pais || defaultCountryHint || null;
      const result = await this.resolver.geocode(incident.place, country, { description: incident.descripcion });
      if (!result) {
        await this.store.markGeocodeFailed(incident.id);
        continue;
      }
      await this.store.updateGeocode(incident.id, result);
      resolved++;
    }
    if (pending.length > 0) {
      this.logger.log(`📊 Resolved ${resolved}/${pending.length} pending incidents`);
    }
    return resolved;
  }
}
