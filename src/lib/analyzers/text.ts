// Shared text helpers for the keyword, readability and audience analyzers.

const WORD_TOKEN = /\p{L}[\p{L}'-]*/gu;

/** Whitespace-delimited word count. */
export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

/** Alphabetic word tokens; digits and punctuation-only fragments are not words. */
export function wordTokens(text: string): string[] {
  return text.match(WORD_TOKEN) ?? [];
}

export function countWordTokens(text: string): number {
  return wordTokens(text).length;
}

/** Splits after `.`, `?` or `!` followed by whitespace; empty fragments are dropped. */
export function splitSentences(text: string): string[] {
  return text.split(/(?<=[.?!])\s+/).filter(sentence => sentence !== '');
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive, non-overlapping match offsets. */
export function findOccurrences(haystack: string, needle: string): number[] {
  if (!needle) return [];
  const text = haystack.toLowerCase();
  const target = needle.toLowerCase();
  const positions: number[] = [];
  let offset = 0;
  let pos = text.indexOf(target, offset);
  while (pos !== -1) {
    positions.push(pos);
    offset = pos + target.length;
    pos = text.indexOf(target, offset);
  }
  return positions;
}

export function countOccurrences(haystack: string, needle: string): number {
  return findOccurrences(haystack, needle).length;
}

export function containsIgnoreCase(haystack: string, needle: string): boolean {
  return needle !== '' && haystack.toLowerCase().includes(needle.toLowerCase());
}

/** Counts per term, ordered by descending count; ties keep first-seen order. */
export function rankFrequencies(terms: string[]): { term: string; count: number }[] {
  const counts = new Map<string, number>();
  for (const term of terms) counts.set(term, (counts.get(term) ?? 0) + 1);
  return [...counts.entries()]
    .map(([term, count]) => ({ term, count }))
    .sort((a, b) => b.count - a.count);
}
