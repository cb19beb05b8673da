// Picks the single most plausible place name out of free incident text.
// Rules are tried in a fixed order and the first accepted candidate wins.

const NOT_WORD = "(?<![\\p{L}\\p{N}_])";
const PHRASE = "(\\p{L}[^.,;\\n]+)";

const MAIN_PATTERNS: RegExp[] = [
  new RegExp(`${NOT_WORD}(?:en las|en los|en la|en el|en|in|at|within|inside)\\s+${PHRASE}`, "giu"),
  new RegExp(
    `${NOT_WORD}(?:en las cercan[ií]as de|en las proximidades de|cerca de|pr[oó]ximo a|alrededor de|junto a|` +
      `cerca|near|around|outside|west of|east of|south of|north of)\\s+${PHRASE}`,
    "giu",
  ),
  new RegExp(
    `${NOT_WORD}(?:al|a la|a los|a las|towards)\\s+(?:norte|sur|este|oeste|sureste|suroeste|noreste|noroeste|` +
      `north|south|east|west|northwest|northeast|southwest|southeast)\\s+de\\s+${PHRASE}`,
    "giu",
  ),
  /^\s*(\p{Lu}[\p{L}\p{N}_\s'’\-()/]+?)\s*[:\-–]\s/gmu,
  new RegExp(`${NOT_WORD}(\\p{Lu}[\\p{L}\\p{N}_\\s'’\\-()/]+?\\([^)]+\\))`, "gu"),
];

const HASHTAG_RE = /#([^\s#.,;:]+)/g;
const CAPITALIZED_RE = /(\p{Lu}[\p{L}\p{N}_'’-]+(?:\s+\p{Lu}[\p{L}\p{N}_'’-]+){0,3})/gu;

const GENERIC_TAGS = new Set([
  "libia",
  "libya",
  "news",
  "noticias",
  "breaking",
  "ultimahora",
  "alerta",
  "urgent",
  "breakingnews",
  "ultima",
  "última",
  "aljazeera",
  "الجزيرة",
  "occidental",
  "oriental",
  "meridional",
  "septentrional",
  "hamas",
]);

const FALLBACK_EXCLUDE = new Set([
  "ministerio",
  "gobierno",
  "presidente",
  "ministro",
  "defensa",
  "fuerzas",
  "ejército",
  "army",
  "forces",
  "breaking",
  "urgent",
  "occidental",
  "oriental",
  "meridional",
  "septentrional",
  "seguridad",
  "ataques",
  "taller",
  "fuera",
]);

const SOURCE_PREFIXES = [
  "primer ministro",
  "ministro",
  "ministerio",
  "presidente",
  "canal",
  "reuters",
  "agencia",
  "oficina",
  "fuente",
  "ejército",
  "army",
  "forces",
  "taller",
];

const RELATIVE_STARTS = ["que ", "el que ", "la que ", "los que ", "las que "];
const BARE_ARTICLES = new Set(["los", "las", "el", "la", "lo"]);

const DIRECTION_PREFIX_RE =
  /^(?:al|a la|a los|a las)\s+(?:norte|sur|este|oeste|noreste|noroeste|sureste|suroeste|centro|nordeste|sudeste|sudoeste)\s+de\s+/iu;
const NEAR_PREFIX_RE =
  /^(?:cerca de|cercan[ií]as de|en las cercan[ií]as de|en las proximidades de|pr[oó]ximo a|alrededor de|junto a|near|around|outside|by)\s+/iu;
const ARTICLE_PREFIX_RE = /^(?:la|el|los|las|the)\s+/iu;
const PLACE_PREFIX_RE =
  /^(?:ciudad|city|pueblo|town|provincia|province|estado|state|departamento|department|region|región|distrito|district|gobernación|governorate)\s+(?:de\s+)?/iu;
const OF_PREFIX_RE = /^(?:of|de|del|de la|de los|de las)\s+/iu;
const PLACE_SUFFIX_RE =
  /\s+(?:city|ciudad|province|provincia|state|estado|region|región|district|distrito|governorate|gobierno)$/iu;
const BULLET_RE = /^[•●]\s*/;
const LEADING_QUOTES_RE = /^["'“‘([]+/;
const TRAILING_QUOTES_RE = /["'”’)\]]+$/;

const KNOWN_PLACE_REWRITES: Record<string, string> = {
  "gaza strip": "Gaza Strip",
  "gaza city": "Gaza City",
  "tripoli libya": "Tripoli, Libya",
};

const CLAUSE_STOPPERS = [
  " que ",
  " ha ",
  " han ",
  " está ",
  " están ",
  " estan ",
  " será ",
  " seran ",
  " serán ",
  " fueron ",
  " informan ",
  " indicando ",
];
const ARTICLE_STOPPERS = [" en el ", " en la ", " en los ", " en las "];

export function isAllCaps(s: string): boolean {
  return s === s.toUpperCase() && s !== s.toLowerCase();
}

export function titleCase(s: string): string {
  return s.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_m, before: string, letter: string) => before + letter.toUpperCase());
}

function startsUppercase(s: string): boolean {
  return /^\p{Lu}/u.test(s);
}

function truncateAt(token: string, stoppers: string[]): string {
  let out = token;
  for (const stopper of stoppers) {
    const idx = out.toLowerCase().indexOf(stopper);
    if (idx > 3) {
      out = out.slice(0, idx).replace(/^[ ,.;:-]+|[ ,.;:-]+$/g, "");
    }
  }
  return out;
}

/**
 * Strip bullets, quotes, direction/near/article/place-type wording around a
 * raw candidate, apply known rewrites and cut trailing relative clauses.
 */
export function cleanLocationToken(raw: string): string {
  let token = raw.trim();
  token = token.replace(BULLET_RE, "");
  token = token.replace(LEADING_QUOTES_RE, "");
  token = token.replace(TRAILING_QUOTES_RE, "");
  token = token.replace(/_/g, " ");
  token = token.replace(/\s+/g, " ").trim();
  token = token.replace(DIRECTION_PREFIX_RE, "");
  token = token.replace(ARTICLE_PREFIX_RE, "");
  token = token.replace(NEAR_PREFIX_RE, "");
  token = token.replace(PLACE_PREFIX_RE, "");
  token = token.replace(OF_PREFIX_RE, "");
  token = token.replace(PLACE_SUFFIX_RE, "");

  const rewrite = KNOWN_PLACE_REWRITES[token.toLowerCase()];
  if (rewrite) token = rewrite;

  token = truncateAt(token, CLAUSE_STOPPERS);
  token = truncateAt(token, ARTICLE_STOPPERS);
  return token;
}

/** Returns the accepted form of a cleaned candidate, or null when it is rejected. */
export function acceptCandidate(cleaned: string): string | null {
  if (!cleaned) return null;
  let candidate = cleaned;
  if (isAllCaps(candidate) && candidate.length > 4) {
    candidate = titleCase(candidate);
  }
  const lowered = candidate.toLowerCase();
  if (GENERIC_TAGS.has(lowered)) return null;
  if (RELATIVE_STARTS.some((p) => lowered.startsWith(p))) return null;
  if (SOURCE_PREFIXES.some((p) => lowered.startsWith(p))) return null;
  if (lowered.includes(" informan ")) return null;
  if (candidate.length <= 2 || BARE_ARTICLES.has(lowered)) return null;
  if (isAllCaps(candidate) && candidate.length <= 4) return null;
  return candidate;
}

function fromPatterns(text: string): string | null {
  for (const pattern of MAIN_PATTERNS) {
    for (const m of text.matchAll(pattern)) {
      const cleaned = cleanLocationToken(m[1]);
      if (!startsUppercase(cleaned)) continue;
      // Only the first qualifying hit of each pattern is considered.
      const accepted = acceptCandidate(cleaned);
      if (accepted) return accepted;
      break;
    }
  }
  return null;
}

function fromHashtags(text: string): string | null {
  for (const m of text.matchAll(HASHTAG_RE)) {
    const accepted = acceptCandidate(cleanLocationToken(m[1]));
    if (accepted) return accepted;
  }
  return null;
}

function fromCapitalizedWords(text: string): string | null {
  for (const m of text.matchAll(CAPITALIZED_RE)) {
    const chunk = m[1];
    if (chunk.length < 3) continue;
    const words = chunk.split(/\s+/);
    if (isAllCaps(chunk) && words.length === 1) continue;
    if (words.some((w) => FALLBACK_EXCLUDE.has(w.toLowerCase()))) continue;
    const accepted = acceptCandidate(cleanLocationToken(chunk));
    if (accepted) return accepted;
  }
  return null;
}

/**
 * Best single place mentioned in the given texts (e.g. translated body, then
 * original). The first text that yields anything stops the search; candidates
 * are never merged across texts. Returns "" when nothing qualifies.
 */
export function extractLocation(...texts: Array<string | null | undefined>): string {
  for (const text of texts) {
    if (!text) continue;
    const found = fromPatterns(text) ?? fromHashtags(text) ?? fromCapitalizedWords(text);
    if (found) return found;
  }
  return "";
}
