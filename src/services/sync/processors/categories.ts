/**
 * Heritage category resolution from free-text type labels.
 */

import { foldDiacritics } from "../../../sparql/normalizer.js";

import type { HeritageCategory } from "../../../types/index.js";

interface KeywordGroup {
  category: HeritageCategory;
  keywords: readonly string[];
}

/**
 * Checked in order; the first group with a matching keyword wins. Labels
 * are folded to lowercase ASCII before matching.
 */
export const KEYWORD_GROUPS: readonly KeywordGroup[] = [
  {
    category: "WORLD_HERITAGE",
    keywords: [
      "unesco",
      "patrimonio mundial",
      "patrimonio de la humanidad",
      "world heritage",
    ],
  },
  {
    category: "ARCHAEOLOGICAL",
    keywords: ["arqueolog", "archaeolog", "archeolog"],
  },
  {
    category: "RELIGIOUS",
    keywords: [
      "iglesia",
      "catedral",
      "basilica",
      "capilla",
      "convento",
      "monasterio",
      "santuario",
      "religios",
      "church",
      "cathedral",
      "chapel",
      "monastery",
      "convent",
    ],
  },
  { category: "MUSEUM", keywords: ["museo", "museum"] },
  {
    category: "HISTORIC_CENTER",
    keywords: ["historic", "centro historico", "casco colonial"],
  },
  {
    category: "MONUMENT",
    keywords: ["monument", "estatua", "statue", "memorial"],
  },
  {
    category: "FORTIFICATION",
    keywords: ["fortaleza", "fortific", "fortress", "castillo", "castle"],
  },
  { category: "PALACE", keywords: ["palacio", "palace"] },
  { category: "LIBRARY", keywords: ["biblioteca", "library"] },
  { category: "THEATER", keywords: ["teatro", "theater", "theatre"] },
  { category: "MARKET", keywords: ["mercado", "market"] },
];

export const DEFAULT_CATEGORY: HeritageCategory = "HISTORIC_CENTER";

const CATEGORY_ORDER: readonly HeritageCategory[] = KEYWORD_GROUPS.map(
  (group) => group.category
);

export function isHeritageCategory(value: unknown): value is HeritageCategory {
  return CATEGORY_ORDER.some((category) => category === value);
}

/**
 * Category implied by a type label, or null when no keyword matches.
 */
export function matchCategory(label: string | null): HeritageCategory | null {
  if (label === null) {
    return null;
  }
  const folded = foldDiacritics(label);
  const group = KEYWORD_GROUPS.find((candidate) =>
    candidate.keywords.some((keyword) => folded.includes(keyword))
  );
  return group?.category ?? null;
}

/**
 * Highest-priority category among those bound by the query branches.
 */
export function pickBoundCategory(
  candidates: readonly HeritageCategory[]
): HeritageCategory | null {
  return CATEGORY_ORDER.find((category) => candidates.includes(category)) ?? null;
}

/**
 * Keyword match on the label first, then the bound category, then the
 * default.
 */
export function resolveHeritageCategory(
  label: string | null,
  fallback: HeritageCategory | null = null
): HeritageCategory {
  return matchCategory(label) ?? fallback ?? DEFAULT_CATEGORY;
}
