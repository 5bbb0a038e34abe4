import { DEFAULT_CONFIG, DEFAULT_WORD_LISTS, type AnalyzerConfig, type WordLists } from '../config';
import {
  ParagraphStructure,
  PassiveVoiceAnalysis,
  ReadabilityAnalysis,
  SentenceLengthBucket,
  SentenceLengthDistribution,
  TransitionWordAnalysis,
  round,
} from '../types';
import { countWordTokens, escapeRegExp, wordTokens } from './text';

const CJK_LANGUAGES = ['zh', 'ja', 'ko'];

const PASSIVE_PATTERNS = [
  /\b(is|are|was|were|be|been|being)\s+(\w+ed)\b/i,
  /\b(is|are|was|were|be|been|being)\s+(\w+en)\b/i,
  /\b(is|are|was|were|be|been|being)\s+(\w+t)\b/i,
];

const PARAGRAPH_THRESHOLDS = [20, 40, 60, 100];

const GRADE_LEVELS: [number, string][] = [
  [90, '5th grade (Very easy to read)'],
  [80, '6th grade (Easy to read)'],
  [70, '7th grade (Fairly easy to read)'],
  [60, '8th-9th grade (Plain English)'],
  [50, '10th-12th grade (Fairly difficult)'],
  [30, 'College (Difficult)'],
];

export const GRADE_NOT_APPLICABLE = 'Analysis not applicable for this language';
export const GRADE_NOT_APPLICABLE_CJK = 'N/A for CJK languages';

/** Primary subtag of a language tag, lowercased: `en-US` becomes `en`. Defaults to `en`. */
export function primaryLanguage(language: string): string {
  const primary = language.trim().toLowerCase().split(/[-_]/)[0];
  return primary || 'en';
}

export function isCjkLanguage(language: string): boolean {
  return CJK_LANGUAGES.includes(primaryLanguage(language));
}

/** Characters without punctuation or spaces for CJK scripts, whitespace-delimited words otherwise. */
export function countWordsForLanguage(text: string, language: string): number {
  const trimmed = text.trim();
  if (!trimmed) return 0;
  if (isCjkLanguage(language)) {
    return [...trimmed.replace(/[\p{P}\p{Zs}\s]/gu, '')].length;
  }
  return trimmed.split(/\s+/u).length;
}

export function splitIntoSentences(text: string): string[] {
  return text.split(/(?<=[.!?])\s+/u).filter(sentence => countWordTokens(sentence) > 0);
}

export function countSyllables(text: string, language: string): number {
  if (primaryLanguage(language) !== 'en') {
    return (text.match(/[aeiouyàáâäãåèéêëìíîïòóôöõùúûüæœ]/gi) ?? []).length;
  }
  return wordTokens(text).reduce((sum, word) => sum + countWordSyllables(word), 0);
}

/** Vowel-group estimate for an English word. */
export function countWordSyllables(word: string): number {
  let cleaned = word.toLowerCase().replace(/[^a-z]/g, '');
  if (!cleaned) return 0;
  if (cleaned.length <= 3) return 1;

  cleaned = cleaned.replace(/e$/, '').replace(/es$/, '').replace(/ed$/, '');
  const groups = cleaned.match(/[aeiouy]{1,3}/g) ?? [];
  return Math.max(1, groups.length);
}

export function countComplexWords(
  text: string,
  language: string,
  wordLists: WordLists = DEFAULT_WORD_LISTS,
): number {
  const exceptions = new Set(wordLists.nonComplexWords[primaryLanguage(language)] ?? []);
  return wordTokens(text).filter(word => !exceptions.has(word.toLowerCase()) && countWordSyllables(word) >= 3).length;
}

export function calculateFleschReadingEase(sentenceCount: number, wordCount: number, syllableCount: number): number {
  if (wordCount === 0 || sentenceCount === 0) return 0;
  const score = 206.835 - 1.015 * (wordCount / sentenceCount) - 84.6 * (syllableCount / wordCount);
  return Math.max(0, Math.min(100, score));
}

export function fleschToGradeLevel(score: number): string {
  for (const [min, label] of GRADE_LEVELS) {
    if (score >= min) return label;
  }
  return 'College graduate (Very difficult)';
}

/** SMOG grade; samples under 30 sentences have their complex-word count scaled up to 30. */
export function calculateSmogIndex(sentenceCount: number, complexWords: number): number {
  let sentences = sentenceCount;
  let complex = complexWords;
  if (sentences < 30) {
    sentences = Math.max(1, sentences);
    complex *= 30 / sentences;
  }
  return 1.043 * Math.sqrt(complex * (30 / sentences)) + 3.1291;
}

export function calculateColemanLiauIndex(text: string, wordCount: number, sentenceCount: number): number {
  if (wordCount === 0 || sentenceCount === 0) return 0;
  const characters = [...text.replace(/\s+/g, '')].length;
  const l = (characters / wordCount) * 100;
  const s = (sentenceCount / wordCount) * 100;
  return 0.0588 * l - 0.296 * s - 15.8;
}

function sentenceBucket(words: number): SentenceLengthBucket {
  if (words <= 5) return 'very_short';
  if (words <= 10) return 'short';
  if (words <= 15) return 'medium';
  if (words <= 20) return 'long';
  if (words <= 25) return 'very_long';
  return 'extremely_long';
}

export function analyzeSentenceLengthDistribution(sentences: string[]): SentenceLengthDistribution {
  const counts: Record<SentenceLengthBucket, number> = {
    very_short: 0,
    short: 0,
    medium: 0,
    long: 0,
    very_long: 0,
    extremely_long: 0,
  };
  const longSentences: string[] = [];

  for (const sentence of sentences) {
    const bucket = sentenceBucket(countWordTokens(sentence));
    counts[bucket]++;
    if (bucket === 'very_long' || bucket === 'extremely_long') longSentences.push(sentence);
  }

  const percentages: Partial<Record<SentenceLengthBucket, number>> = {};
  if (sentences.length > 0) {
    for (const [bucket, count] of Object.entries(counts)) {
      if (isBucket(bucket)) percentages[bucket] = round((count / sentences.length) * 100);
    }
  }

  return {
    counts,
    percentages,
    totalSentences: sentences.length,
    longSentences: longSentences.slice(0, 5),
  };
}

function isBucket(value: string): value is SentenceLengthBucket {
  return ['very_short', 'short', 'medium', 'long', 'very_long', 'extremely_long'].includes(value);
}

export function analyzeParagraphStructure(
  paragraphs: string[],
  config: AnalyzerConfig = DEFAULT_CONFIG,
): ParagraphStructure {
  const wordCounts = paragraphs.map(countWordTokens);
  const long = paragraphs.filter((_, i) => wordCounts[i] > config.longParagraphWords);
  const total = wordCounts.reduce((sum, n) => sum + n, 0);

  return {
    count: paragraphs.length,
    averageWords: paragraphs.length > 0 ? round(total / paragraphs.length) : 0,
    longParagraphs: long.length,
    longParagraphExamples: long.slice(0, 3).map(p => `${p.slice(0, 150)}...`),
    distribution: bucketValues(wordCounts, PARAGRAPH_THRESHOLDS),
  };
}

/** Counts values into `0-a`, `a-b`, ..., `z+` ranges; upper bounds are inclusive. */
function bucketValues(values: number[], thresholds: number[]): Record<string, number> {
  const labels = [
    `0-${thresholds[0]}`,
    ...thresholds.slice(1).map((upper, i) => `${thresholds[i]}-${upper}`),
    `${thresholds[thresholds.length - 1]}+`,
  ];
  const counts: Record<string, number> = Object.fromEntries(labels.map(label => [label, 0]));

  for (const value of values) {
    const index = thresholds.findIndex(upper => value <= upper);
    const label = labels[index === -1 ? labels.length - 1 : index];
    counts[label]++;
  }
  return counts;
}

export function analyzePassiveVoice(text: string, config: AnalyzerConfig = DEFAULT_CONFIG): PassiveVoiceAnalysis {
  const sentences = splitIntoSentences(text);
  const passive = sentences.filter(sentence => PASSIVE_PATTERNS.some(pattern => pattern.test(sentence)));
  const percentage = sentences.length > 0 ? (passive.length / sentences.length) * 100 : 0;

  return {
    count: passive.length,
    percentage: round(percentage),
    examples: passive.slice(0, 3),
    exceedsThreshold: percentage > config.passiveVoiceThreshold,
  };
}

export function getTransitionWords(language: string, wordLists: WordLists = DEFAULT_WORD_LISTS): string[] {
  return wordLists.transitionWords[primaryLanguage(language)] ?? wordLists.transitionWords.en ?? [];
}

export function analyzeTransitionWords(
  text: string,
  language: string,
  config: AnalyzerConfig = DEFAULT_CONFIG,
  wordLists: WordLists = DEFAULT_WORD_LISTS,
): TransitionWordAnalysis {
  const sentences = splitIntoSentences(text);
  const patterns = getTransitionWords(language, wordLists).map(
    word => new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(word)}(?![\\p{L}\\p{N}_])`, 'iu'),
  );
  const withTransitions = sentences.filter(sentence => patterns.some(pattern => pattern.test(sentence))).length;
  const percentage = sentences.length > 0 ? (withTransitions / sentences.length) * 100 : 0;

  return {
    sentencesWithTransitions: withTransitions,
    percentage: round(percentage),
    meetsThreshold: percentage >= config.transitionWordsThreshold,
  };
}

/**
 * Readability metrics for extracted content. CJK text is measured in
 * characters and skips every syllable-based score.
 */
export function analyzeReadability(
  text: string,
  paragraphs: string[],
  language: string,
  config: AnalyzerConfig = DEFAULT_CONFIG,
  wordLists: WordLists = DEFAULT_WORD_LISTS,
): ReadabilityAnalysis {
  const cleaned = text.trim();
  const isCjk = isCjkLanguage(language);
  const wordCount = countWordsForLanguage(cleaned, language);
  const sentences = splitIntoSentences(cleaned);
  const sentenceCount = sentences.length;
  const avgWordsPerSentence = sentenceCount > 0 ? wordCount / sentenceCount : 0;

  const base = {
    language: primaryLanguage(language),
    isCjk,
    wordCount,
    sentenceCount,
    avgWordsPerSentence: round(avgWordsPerSentence),
    colemanLiauIndex: round(calculateColemanLiauIndex(cleaned, wordCount, sentenceCount)),
    sentenceLengths: analyzeSentenceLengthDistribution(sentences),
    paragraphs: analyzeParagraphStructure(paragraphs, config),
  };

  if (isCjk) {
    return {
      ...base,
      syllableCount: 0,
      complexWordCount: 0,
      complexWordsPercentage: 0,
      exceedsComplexWordsThreshold: false,
      avgSyllablesPerWord: 0,
      fleschReadingEase: 0,
      gradeLevel: GRADE_NOT_APPLICABLE_CJK,
      smogIndex: 0,
      passiveVoice: { count: 0, percentage: 0, examples: [], exceedsThreshold: false },
      transitionWords: { sentencesWithTransitions: 0, percentage: 0, meetsThreshold: false },
    };
  }

  const syllableCount = countSyllables(cleaned, language);
  const complexWordCount = countComplexWords(cleaned, language, wordLists);
  const complexWordsPercentage = wordCount > 0 ? (complexWordCount / wordCount) * 100 : 0;
  const flesch = calculateFleschReadingEase(sentenceCount, wordCount, syllableCount);

  return {
    ...base,
    syllableCount,
    complexWordCount,
    complexWordsPercentage: round(complexWordsPercentage),
    exceedsComplexWordsThreshold: complexWordsPercentage > config.complexWordsThreshold,
    avgSyllablesPerWord: round(wordCount > 0 ? syllableCount / wordCount : 0),
    fleschReadingEase: round(flesch),
    gradeLevel: syllableCount > 0 ? fleschToGradeLevel(flesch) : GRADE_NOT_APPLICABLE,
    smogIndex: round(calculateSmogIndex(sentenceCount, complexWordCount)),
    passiveVoice: analyzePassiveVoice(cleaned, config),
    transitionWords: analyzeTransitionWords(cleaned, language, config, wordLists),
  };
}
