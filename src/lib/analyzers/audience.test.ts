import { describe, expect, it } from 'vitest';
import { analyzeTone, matchReadingLevel, matchTechnicalLevel, matchTone } from './audience';
import { ToneAnalysis } from '../types';

function makeTone(technical: number): ToneAnalysis {
  return {
    toneScores: { technical },
    dominantTones: ['technical'],
    sentenceCharacteristics: {
      avgSentenceLength: 12,
      questionRatio: 0,
      exclamationRatio: 0,
      firstPersonRatio: 0,
      secondPersonRatio: 0,
    },
  };
}

describe('analyzeTone', () => {
  it('scores tones by indicator density', () => {
    const tone = analyzeTone('We explore the data. Do you agree?');

    expect(tone.toneScores.engaging).toBe(10);
    expect(tone.toneScores.informative).toBe(10);
    expect(tone.toneScores.formal).toBe(0);
    expect(tone.dominantTones).toEqual(['engaging', 'informative', 'formal']);
    expect(tone.sentenceCharacteristics).toEqual({
      avgSentenceLength: 3.5,
      questionRatio: 50,
      exclamationRatio: 0,
      firstPersonRatio: 14.29, // 1 of 7 words
      secondPersonRatio: 14.29,
    });
  });
});

describe('matchReadingLevel', () => {
  it('scores 1 at the ideal point of the band', () => {
    expect(matchReadingLevel({ fleschReadingEase: 70 }, 'high_school')).toMatchObject({ score: 1, ideal: true });
  });

  it('decays outside the band', () => {
    const result = matchReadingLevel({ fleschReadingEase: 45 }, 'high_school');
    expect(result.tooComplex).toBe(true);
    expect(result.score).toBe(0.5); // 1 - 15 / 30
  });

  it('falls back to the general band', () => {
    expect(matchReadingLevel({ fleschReadingEase: 70 }, 'unknown').targetRange).toEqual({ min: 60, max: 80, ideal: 70 });
  });
});

describe('matchTone', () => {
  it('adjusts for conversational style and questions by industry', () => {
    const tone = analyzeTone('We explore the data. Do you agree?');
    const result = matchTone(tone, 'education');

    expect(result.matchingTones).toEqual(['informative']);
    expect(result.isConversational).toBe(true);
    expect(result.score).toBe(0.33); // 1/3 - 0.1 + 0.1
  });
});

describe('matchTechnicalLevel', () => {
  it('accepts content on target', () => {
    const result = matchTechnicalLevel({ complexWordsPercentage: 10 }, makeTone(5), 'medium');
    expect(result.score).toBe(1);
    expect(result.appropriate).toBe(true);
  });

  it('flags content too technical for beginners', () => {
    const result = matchTechnicalLevel({ complexWordsPercentage: 20 }, makeTone(2), 'beginner');
    expect(result.tooTechnical).toBe(true);
    expect(result.complexWords).toEqual({ actual: 20, target: 5, matchScore: 0 });
  });
});
