import { DEFAULT_WORD_LISTS, type WordLists } from '../config';
import {
  AudienceMatch,
  ReadabilityAnalysis,
  ReadingLevelMatch,
  TargetAudience,
  TechnicalLevelMatch,
  ToneAnalysis,
  ToneMatch,
  round,
} from '../types';
import { splitIntoSentences } from './readability';
import { countOccurrences, countWordTokens } from './text';

const CONVERSATIONAL_INDUSTRIES = ['entertainment', 'ecommerce', 'travel', 'food'];
const QUESTION_INDUSTRIES = ['education', 'entertainment'];

const TECHNICAL_TARGETS: Record<string, { complexWords: number; technicalTone: number }> = {
  beginner: { complexWords: 5, technicalTone: 2 },
  medium: { complexWords: 10, technicalTone: 5 },
  expert: { complexWords: 15, technicalTone: 8 },
};
const DEFAULT_TECHNICAL_TARGET = { complexWords: 8, technicalTone: 4 };

// Points outside the target band at which the reading-level score reaches zero.
const MAX_OUTSIDE_DISTANCE = 30;

export function analyzeTone(text: string, wordLists: WordLists = DEFAULT_WORD_LISTS): ToneAnalysis {
  const totalWords = countWordTokens(text);
  const toneScores: Record<string, number> = {};

  for (const [tone, indicators] of Object.entries(wordLists.toneIndicators)) {
    const occurrences = indicators.reduce((sum, indicator) => sum + countOccurrences(text, indicator), 0);
    toneScores[tone] = round(Math.min(10, (occurrences / Math.max(1, totalWords)) * 1000));
  }

  const dominantTones = Object.entries(toneScores)
    .sort((a, b) => b[1] - a[1])
    .slice(0, 3)
    .map(([tone]) => tone);

  const sentenceCount = splitIntoSentences(text).length;
  const perSentence = (count: number) => (sentenceCount > 0 ? round((count / sentenceCount) * 100) : 0);
  const perWord = (count: number) => (totalWords > 0 ? round((count / totalWords) * 100) : 0);

  return {
    toneScores,
    dominantTones,
    sentenceCharacteristics: {
      avgSentenceLength: sentenceCount > 0 ? round(totalWords / sentenceCount) : 0,
      questionRatio: perSentence(text.split('?').length - 1),
      exclamationRatio: perSentence(text.split('!').length - 1),
      firstPersonRatio: perWord((text.match(/\b(?:I|we|our|us|myself|ourselves)\b/gi) ?? []).length),
      secondPersonRatio: perWord((text.match(/\b(?:you|your|yours|yourself|yourselves)\b/gi) ?? []).length),
    },
  };
}

export function matchReadingLevel(
  readability: Pick<ReadabilityAnalysis, 'fleschReadingEase'>,
  educationLevel: string,
  wordLists: WordLists = DEFAULT_WORD_LISTS,
): ReadingLevelMatch {
  const targets = wordLists.educationTargets;
  const targetRange = targets[educationLevel] ?? targets.general ?? { min: 60, max: 80, ideal: 70 };
  const actual = readability.fleschReadingEase;

  const tooComplex = actual < targetRange.min;
  const tooSimple = actual > targetRange.max;
  const ideal = !tooComplex && !tooSimple;

  let score: number;
  if (ideal) {
    const maxDistance = Math.max(targetRange.ideal - targetRange.min, targetRange.max - targetRange.ideal);
    score = 1 - Math.min(1, Math.abs(actual - targetRange.ideal) / Math.max(1, maxDistance));
  } else {
    const distance = tooComplex ? targetRange.min - actual : actual - targetRange.max;
    score = Math.max(0, 1 - distance / MAX_OUTSIDE_DISTANCE);
  }

  return { score: round(score), ideal, tooComplex, tooSimple, actualScore: actual, targetRange };
}

export function matchTone(tone: ToneAnalysis, industry: string, wordLists: WordLists = DEFAULT_WORD_LISTS): ToneMatch {
  const preferredTones = wordLists.industryTones[industry] ?? wordLists.industryTones.general ?? [];
  const matchingTones = preferredTones.filter(t => tone.dominantTones.includes(t));
  const base = preferredTones.length > 0 ? Math.min(1, matchingTones.length / preferredTones.length) : 0;

  const traits = tone.sentenceCharacteristics;
  const isConversational = traits.firstPersonRatio > 0.5 || traits.secondPersonRatio > 1;
  const hasQuestions = traits.questionRatio > 5;

  let adjustment = 0;
  if (isConversational) adjustment += CONVERSATIONAL_INDUSTRIES.includes(industry) ? 0.1 : -0.1;
  if (hasQuestions) adjustment += QUESTION_INDUSTRIES.includes(industry) ? 0.1 : -0.1;

  return {
    score: round(Math.max(0, Math.min(1, base + adjustment))),
    matchingTones,
    preferredTones,
    dominantTones: tone.dominantTones,
    isConversational,
  };
}

export function matchTechnicalLevel(
  readability: Pick<ReadabilityAnalysis, 'complexWordsPercentage'>,
  tone: ToneAnalysis,
  technicalProficiency: string,
): TechnicalLevelMatch {
  const target = TECHNICAL_TARGETS[technicalProficiency] ?? DEFAULT_TECHNICAL_TARGET;
  const complexWords = readability.complexWordsPercentage;
  const technicalTone = tone.toneScores.technical ?? 0;

  const tooTechnical = complexWords > target.complexWords + 5 || technicalTone > target.technicalTone + 3;
  const notTechnicalEnough = complexWords < target.complexWords - 3 && technicalTone < target.technicalTone - 2;

  const complexScore = Math.max(0, 1 - Math.abs(complexWords - target.complexWords) / 10);
  const toneScore = Math.max(0, 1 - Math.abs(technicalTone - target.technicalTone) / 5);

  return {
    score: round(complexScore * 0.6 + toneScore * 0.4),
    appropriate: !tooTechnical && !notTechnicalEnough,
    tooTechnical,
    notTechnicalEnough,
    complexWords: { actual: complexWords, target: target.complexWords, matchScore: round(complexScore) },
    technicalTone: { actual: technicalTone, target: target.technicalTone, matchScore: round(toneScore) },
  };
}

export function compareWithTargetAudience(
  readability: ReadabilityAnalysis,
  tone: ToneAnalysis,
  audience: TargetAudience,
  wordLists: WordLists = DEFAULT_WORD_LISTS,
): AudienceMatch {
  return {
    readingLevel: matchReadingLevel(readability, audience.educationLevel, wordLists),
    tone: matchTone(tone, audience.industry, wordLists),
    technicalLevel: matchTechnicalLevel(readability, tone, audience.technicalProficiency),
  };
}
