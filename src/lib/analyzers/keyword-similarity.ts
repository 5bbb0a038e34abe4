import { DEFAULT_WORD_LISTS } from '../config';

/** Lowercases a keyword and removes stop words so near-identical phrasings compare equal. */
export function normalizeKeyword(
  keyword: string,
  stopWords: readonly string[] = DEFAULT_WORD_LISTS.stopWords,
): string {
  return keyword
    .toLowerCase()
    .split(/\s+/)
    .filter(word => word !== '' && !stopWords.includes(word))
    .join(' ');
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Similarity percentage (0-100) between two keywords after normalization.
 * Containment scores 90; otherwise the higher of edit-distance similarity
 * and word overlap.
 */
export function calculateKeywordSimilarity(
  keyword1: string,
  keyword2: string,
  stopWords: readonly string[] = DEFAULT_WORD_LISTS.stopWords,
): number {
  const a = normalizeKeyword(keyword1, stopWords);
  const b = normalizeKeyword(keyword2, stopWords);

  if (a === b) return 100;
  if (a === '' || b === '') return 0;
  if (a.includes(b) || b.includes(a)) return 90;

  const maxLength = Math.max(a.length, b.length);
  const editSimilarity = (1 - levenshtein(a, b) / maxLength) * 100;

  const words1 = new Set(a.split(' '));
  const words2 = new Set(b.split(' '));
  const common = [...words1].filter(word => words2.has(word)).length;
  const total = new Set([...words1, ...words2]).size;
  const overlap = (common / total) * 100;

  return Math.max(editSimilarity, overlap);
}
