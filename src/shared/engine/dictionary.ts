import type { Dictionary } from './types';

/** Dictionary over a fixed word set that also reports its size. */
export interface WordSetDictionary extends Dictionary {
  readonly size: number;
}

/**
 * In-memory dictionary over a fixed word set. Words are trimmed and
 * case-folded on the way in; blank entries are skipped.
 */
export function createWordSetDictionary(words: Iterable<string>): WordSetDictionary {
  const entries = new Set<string>();
  for (const word of words) {
    const normalized = word.trim().toLowerCase();
    if (normalized) entries.add(normalized);
  }
  return {
    size: entries.size,
    contains: (word: string) => entries.has(word.toLowerCase()),
  };
}

/** Dictionary used when none is supplied: nothing outside the theme counts. */
export const EMPTY_DICTIONARY: Dictionary = {
  contains: () => false,
};
