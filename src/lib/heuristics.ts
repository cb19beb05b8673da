import tables from "./heuristics.json";
import type { Gazetteer } from "./gazetteer";
import { foldText } from "./normalize";

export type HeuristicHit = { name: string; lat: number; lon: number };

type Rule = {
  appliesTo: (country: string) => boolean;
  locate: (text: string, gazetteer: Gazetteer | null) => HeuristicHit | null;
};

function countryMatcher(countries: readonly string[]) {
  const folded = new Set(countries.map(foldText));
  return (country: string) => folded.has(foldText(country.trim()));
}

// Known city named in the text, else the capital; coordinates come from the gazetteer.
const cityKeywordsRule: Rule = {
  appliesTo: countryMatcher(tables.cityKeywords.countries),
  locate(text, gazetteer) {
    if (!gazetteer) return null;
    const haystack = foldText(text);
    const target =
      tables.cityKeywords.targets.find((t) => t.keywords.some((k) => haystack.includes(foldText(k))))?.name ??
      tables.cityKeywords.fallback;
    const entry = gazetteer.findByName(target);
    return entry ? { name: entry.name, lat: entry.lat, lon: entry.lon } : null;
  },
};

const fixedPointsRule: Rule = {
  appliesTo: countryMatcher(tables.fixedPoints.countries),
  locate(text) {
    const haystack = foldText(text);
    const place = tables.fixedPoints.places.find((p) => p.keywords.some((k) => haystack.includes(k)));
    return place ? { name: place.name, lat: place.lat, lon: place.lon } : null;
  },
};

const RULES: readonly Rule[] = [cityKeywordsRule, fixedPointsRule];

/**
 * Country-specific last resort once the gazetteer and the online geocoder
 * have both failed. The result is an estimate.
 */
export function heuristicLocation(
  countries: ReadonlyArray<string | null | undefined>,
  text: string,
  gazetteer: Gazetteer | null,
): HeuristicHit | null {
  for (const country of countries) {
    if (!country) continue;
    const rule = RULES.find((r) => r.appliesTo(country));
    if (rule) return rule.locate(text, gazetteer);
  }
  return null;
}
