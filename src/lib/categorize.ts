import keywordTable from "./sicu-keywords.json";
import { isSicuCategory, type SicuCategory } from "./types";

export type KeywordRule = { categoria: SicuCategory; keywords: readonly string[] };

function loadRules(raw: ReadonlyArray<{ categoria: string; keywords: string[] }>): KeywordRule[] {
  return raw.map((entry) => {
    if (!isSicuCategory(entry.categoria)) {
      throw new Error(`Unknown SICU category in keyword table: ${entry.categoria}`);
    }
    return { categoria: entry.categoria, keywords: entry.keywords.map((k) => k.toLowerCase()) };
  });
}

/** Ordered: the first category with any keyword hit wins. */
export const CATEGORY_RULES: readonly KeywordRule[] = loadRules(keywordTable);

export type Classification = { categoria: SicuCategory; keyword: string | null };

/**
 * Lowercase substring matching, so a keyword also hits inside longer words
 * ("armado" inside "desarmado").
 */
export function classifyWithKeyword(text: string, rules: readonly KeywordRule[] = CATEGORY_RULES): Classification {
  if (!text) return { categoria: "Otros", keyword: null };
  const lowered = text.toLowerCase();
  for (const rule of rules) {
    const hit = rule.keywords.find((k) => lowered.includes(k));
    if (hit) return { categoria: rule.categoria, keyword: hit };
  }
  return { categoria: "Otros", keyword: null };
}

export function classify(text: string, rules: readonly KeywordRule[] = CATEGORY_RULES): SicuCategory {
  return classifyWithKeyword(text, rules).categoria;
}
