import { describe, expect, it } from 'vitest';
import {
  analyzeParagraphStructure,
  analyzePassiveVoice,
  analyzeReadability,
  analyzeSentenceLengthDistribution,
  analyzeTransitionWords,
  calculateFleschReadingEase,
  calculateSmogIndex,
  countWordSyllables,
  countWordsForLanguage,
  fleschToGradeLevel,
  isCjkLanguage,
  splitIntoSentences,
} from './readability';

describe('language handling', () => {
  it('detects CJK languages by primary subtag', () => {
    expect(isCjkLanguage('zh-CN')).toBe(true);
    expect(isCjkLanguage('ja')).toBe(true);
    expect(isCjkLanguage('en-US')).toBe(false);
  });

  it('counts CJK characters without punctuation', () => {
    expect(countWordsForLanguage('你好，世界。', 'zh')).toBe(4);
    expect(countWordsForLanguage('  hello   wide world ', 'en')).toBe(3);
  });
});

describe('splitIntoSentences', () => {
  it('drops fragments without words', () => {
    expect(splitIntoSentences('One here. 42! Two there?')).toEqual(['One here.', 'Two there?']);
  });
});

describe('countWordSyllables', () => {
  it('estimates vowel groups', () => {
    expect(countWordSyllables('cat')).toBe(1);
    expect(countWordSyllables('make')).toBe(1);
    expect(countWordSyllables('reading')).toBe(2);
    expect(countWordSyllables('beautiful')).toBe(3);
    expect(countWordSyllables('123')).toBe(0);
  });
});

describe('calculateFleschReadingEase', () => {
  it('does not increase as sentences get longer', () => {
    // 1.5 syllables per word throughout
    const short = calculateFleschReadingEase(1, 10, 15);
    const medium = calculateFleschReadingEase(1, 20, 30);
    const long = calculateFleschReadingEase(1, 40, 60);
    expect(short).toBeGreaterThanOrEqual(medium);
    expect(medium).toBeGreaterThanOrEqual(long);
    expect(short).toBeCloseTo(69.785, 10);
  });

  it('is clamped to 0-100', () => {
    expect(calculateFleschReadingEase(1, 10, 1)).toBe(100);
    expect(calculateFleschReadingEase(1, 100, 300)).toBe(0);
    expect(calculateFleschReadingEase(0, 10, 10)).toBe(0);
  });

  it('maps scores to grade bands', () => {
    expect(fleschToGradeLevel(95)).toBe('5th grade (Very easy to read)');
    expect(fleschToGradeLevel(65)).toBe('8th-9th grade (Plain English)');
    expect(fleschToGradeLevel(10)).toBe('College graduate (Very difficult)');
  });
});

describe('calculateSmogIndex', () => {
  it('scales complex words up for short samples', () => {
    expect(calculateSmogIndex(30, 0)).toBeCloseTo(3.1291, 10);
    // 3 complex words over 10 sentences become 9, then 9 * 30 / 10
    expect(calculateSmogIndex(10, 3)).toBeCloseTo(1.043 * Math.sqrt(27) + 3.1291, 10);
  });
});

describe('analyzeSentenceLengthDistribution', () => {
  it('buckets sentences by word count', () => {
    const long = `${'word '.repeat(22).trim()}.`;
    const result = analyzeSentenceLengthDistribution(['Short one.', long]);

    expect(result.counts.very_short).toBe(1);
    expect(result.counts.very_long).toBe(1);
    expect(result.percentages).toEqual({
      very_short: 50,
      short: 0,
      medium: 0,
      long: 0,
      very_long: 50,
      extremely_long: 0,
    });
    expect(result.longSentences).toEqual([long]);
  });
});

describe('analyzeParagraphStructure', () => {
  it('flags paragraphs over the configured length', () => {
    const long = 'word '.repeat(101).trim();
    const result = analyzeParagraphStructure(['one two three', long]);

    expect(result.count).toBe(2);
    expect(result.averageWords).toBe(52);
    expect(result.longParagraphs).toBe(1);
    expect(result.longParagraphExamples).toEqual([`${long.slice(0, 150)}...`]);
    expect(result.distribution).toEqual({ '0-20': 1, '20-40': 0, '40-60': 0, '60-100': 0, '100+': 1 });
  });
});

describe('analyzePassiveVoice', () => {
  it('counts sentences with a be-verb and participle', () => {
    const result = analyzePassiveVoice('The cake was baked by Sam. Sam eats cake.');
    expect(result).toEqual({
      count: 1,
      percentage: 50,
      examples: ['The cake was baked by Sam.'],
      exceedsThreshold: true,
    });
  });
});

describe('analyzeTransitionWords', () => {
  it('uses the language list and falls back to English', () => {
    expect(analyzeTransitionWords('However, it rained. We stayed home.', 'en')).toEqual({
      sentencesWithTransitions: 1,
      percentage: 50,
      meetsThreshold: true,
    });
    expect(analyzeTransitionWords('Jedoch regnete es. Wir blieben.', 'de').sentencesWithTransitions).toBe(1);
    expect(analyzeTransitionWords('Il pleut également.', 'fr').percentage).toBe(100);
    expect(analyzeTransitionWords('However, it rained.', 'xx').sentencesWithTransitions).toBe(1);
  });
});

describe('analyzeReadability', () => {
  it('scores simple English text', () => {
    const result = analyzeReadability('The cat sat. The dog ran.', ['The cat sat. The dog ran.'], 'en');

    expect(result.wordCount).toBe(6);
    expect(result.sentenceCount).toBe(2);
    expect(result.syllableCount).toBe(6);
    expect(result.avgWordsPerSentence).toBe(3);
    expect(result.fleschReadingEase).toBe(100);
    expect(result.gradeLevel).toBe('5th grade (Very easy to read)');
    expect(result.smogIndex).toBe(3.13);
    expect(result.colemanLiauIndex).toBe(-6.07);
  });

  it('returns not-applicable values for CJK text', () => {
    const result = analyzeReadability('你好世界。今天很好。', [], 'ja');

    expect(result.isCjk).toBe(true);
    expect(result.wordCount).toBe(8);
    expect(result.fleschReadingEase).toBe(0);
    expect(result.gradeLevel).toBe('N/A for CJK languages');
    expect(result.passiveVoice.count).toBe(0);
  });

  it('handles empty content', () => {
    const result = analyzeReadability('', [], 'en');
    expect(result.wordCount).toBe(0);
    expect(result.sentenceCount).toBe(0);
    expect(result.fleschReadingEase).toBe(0);
  });
});
