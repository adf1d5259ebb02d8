/**
 * Name normalization used for every cross-source name join.
 *
 * "Provincia del Guayas" and "Guayas Province" both map to "guayas".
 */

const STOP_WORDS: ReadonlySet<string> = new Set([
  "provincia",
  "province",
  "ecuador",
  "islas",
  "de",
  "del",
  "la",
  "las",
  "los",
  "el",
  "the",
  "of",
]);

export const NORMALIZER_CACHE_SIZE = 200;

/**
 * Lowercase with diacritics removed ("Histórico" becomes "historico").
 */
export function foldDiacritics(text: string): string {
  return text
    .normalize("NFKD")
    .replaceAll(/[\u0300-\u036F]/g, "")
    .toLowerCase();
}

/**
 * Canonical join key for a human-readable name.
 */
export function normalizeName(name: string): string {
  return foldDiacritics(name)
    .replaceAll(/[^a-z0-9]+/g, " ")
    .split(" ")
    .filter((token) => token !== "" && !STOP_WORDS.has(token))
    .join(" ");
}

/**
 * `normalizeName` with a bounded LRU memo. Each owner keeps its own
 * instance, so the memo lives exactly as long as the index or run using it.
 */
export class NameNormalizer {
  // Map keeps insertion order, so the first key is the least recently used
  private cache = new Map<string, string>();

  constructor(readonly capacity = NORMALIZER_CACHE_SIZE) {}

  get size(): number {
    return this.cache.size;
  }

  normalize(name: string): string {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      this.cache.delete(name);
      this.cache.set(name, cached);
      return cached;
    }

    const key = normalizeName(name);
    this.cache.set(name, key);

    if (this.cache.size > this.capacity) {
      const oldest = this.cache.keys().next();
      if (oldest.done !== true) {
        this.cache.delete(oldest.value);
      }
    }

    return key;
  }
}
