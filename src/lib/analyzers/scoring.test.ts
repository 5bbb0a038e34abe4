import { describe, expect, it } from 'vitest';
import {
  calculateOverallScore,
  scoreIntent,
  scoreKeywordUsage,
  scoreReadability,
  scoreStructuredData,
} from './scoring';
import { analyzeKeywordSet } from './keyword-analyzer';
import { extractContent } from './content-extractor';
import { validateSchemas } from './schema-validator';
import { buildDocument } from '../document/document';
import {
  AudienceMatch,
  CategoryScore,
  IntentProfile,
  ReadabilityAnalysis,
  ReportCategories,
  SchemaEntity,
  SchemaReport,
} from '../types';

function makeReadability(overrides: Partial<ReadabilityAnalysis> = {}): ReadabilityAnalysis {
  return {
    language: 'en',
    isCjk: false,
    wordCount: 400,
    sentenceCount: 22,
    syllableCount: 560,
    complexWordCount: 20,
    complexWordsPercentage: 5,
    exceedsComplexWordsThreshold: false,
    avgWordsPerSentence: 18.18,
    avgSyllablesPerWord: 1.4,
    fleschReadingEase: 65,
    gradeLevel: '8th-9th grade',
    smogIndex: 9,
    colemanLiauIndex: 9,
    sentenceLengths: {
      counts: { very_short: 0, short: 10, medium: 12, long: 0, very_long: 0, extremely_long: 0 },
      percentages: {},
      totalSentences: 22,
      longSentences: [],
    },
    paragraphs: { count: 8, averageWords: 50, longParagraphs: 0, longParagraphExamples: [], distribution: {} },
    passiveVoice: { count: 1, percentage: 4.55, examples: [], exceedsThreshold: false },
    transitionWords: { sentencesWithTransitions: 8, percentage: 36.36, meetsThreshold: true },
    ...overrides,
  };
}

function makeAudience(reading: number, tone: number, technical: number): AudienceMatch {
  return {
    readingLevel: {
      score: reading,
      ideal: false,
      tooComplex: false,
      tooSimple: true,
      actualScore: 85,
      targetRange: { min: 60, max: 80, ideal: 70 },
    },
    tone: { score: tone, matchingTones: [], preferredTones: ['friendly'], dominantTones: [], isConversational: false },
    technicalLevel: {
      score: technical,
      appropriate: true,
      tooTechnical: false,
      notTechnicalEnough: false,
      complexWords: { actual: 5, target: 5, matchScore: 1 },
      technicalTone: { actual: 0, target: 1, matchScore: 0.8 },
    },
  };
}

function makeCategory(score: number, weight: number): CategoryScore {
  return { score, grade: 'C', weight, findings: [], recommendations: [] };
}

const PERSON: SchemaEntity = {
  type: 'Person',
  source: 'json-ld',
  properties: { '@type': 'Person', name: 'Ann', image: 'a.png', jobTitle: 'Editor', worksFor: 'Acme', sameAs: 'x' },
};

const GRINDER_PAGE = `<html><head><title>Coffee Grinder Guide</title></head><body>
<h1>Choosing a grinder</h1>
<p>A coffee grinder turns beans into grounds.</p>
<p>Burr models grind evenly.</p>
<p>Clean the coffee grinder weekly.</p>
</body></html>`;

function grinderKeywords(secondaryKeywords: string[] = []) {
  const source = buildDocument(GRINDER_PAGE);
  return analyzeKeywordSet(
    { primaryKeyword: 'Coffee Grinder', secondaryKeywords, title: 'Coffee Grinder Guide' },
    { source, extraction: extractContent(source) },
  );
}

describe('scoreKeywordUsage', () => {
  it('fails outright without a keyword', () => {
    const category = scoreKeywordUsage(null);
    expect(category.score).toBe(0);
    expect(category.grade).toBe('F');
    expect(category.weight).toBe(0.35);
  });

  it('grades title, paragraph, heading, density and distribution checks', () => {
    const category = scoreKeywordUsage(grinderKeywords());

    expect(category.findings[0]).toEqual({
      check: 'Primary keyword density',
      status: 'fail',
      // 2 mentions in 19 words; short-content range is 0.5*0.8 to 3*1.2
      details: '"coffee grinder" appears 2 time(s), 10.53% density (optimal 0.4-3.6%)',
      points: 0,
      maxPoints: 25,
    });
    expect(category.findings.map(f => [f.check, f.points])).toEqual([
      ['Primary keyword density', 0],
      ['Keyword in title', 15],
      ['Keyword in first paragraph', 15],
      ['Keyword in headings', 0],
      ['Keyword distribution', 0],
    ]);
    // 30 / 85
    expect(category.score).toBe(35);
    expect(category.recommendations).toEqual([
      'Remove about 2 mention(s) of "coffee grinder" to reach the optimal density range.',
      'Use the primary keyword in at least one subheading.',
      'Spread keyword mentions evenly through the introduction, body and conclusion.',
    ]);
  });

  it('adds a balance check when secondary keywords are present', () => {
    const category = scoreKeywordUsage(grinderKeywords(['Burr']));

    expect(category.findings[category.findings.length - 1]).toEqual({
      check: 'Primary and secondary keyword balance',
      status: 'pass',
      // 10.53 / 5.26
      details: 'Primary to secondary density ratio 2',
      points: 15,
      maxPoints: 15,
    });
    // 45 / 100
    expect(category.score).toBe(45);
  });
});

describe('scoreReadability', () => {
  it('gives full marks to easy, well-structured content', () => {
    const category = scoreReadability(makeReadability());
    expect(category.findings).toHaveLength(7);
    expect(category.score).toBe(100);
    expect(category.grade).toBe('A+');
    expect(category.recommendations).toEqual([]);
  });

  it('skips syllable-based checks for CJK text', () => {
    const category = scoreReadability(
      makeReadability({
        isCjk: true,
        wordCount: 150,
        sentenceCount: 5,
        avgWordsPerSentence: 30,
        paragraphs: { count: 3, averageWords: 50, longParagraphs: 1, longParagraphExamples: [], distribution: {} },
      }),
    );

    expect(category.findings.map(f => f.check)).toEqual(['Content length', 'Sentence length', 'Paragraph length']);
    // (8 + 0 + 8) / 45
    expect(category.score).toBe(36);
  });

  it('weighs the target audience match', () => {
    const category = scoreReadability(makeReadability(), makeAudience(0.9, 0.3, 0.6));
    const fit = category.findings.find(f => f.check === 'Target audience fit');

    expect(fit).toMatchObject({ status: 'partial', points: 9, maxPoints: 15 });
    // (95 + 9) / 110
    expect(category.score).toBe(95);
    expect(category.recommendations).toEqual(['The content reads simpler than the target audience expects.']);
  });
});

describe('scoreStructuredData', () => {
  it('recommends the suggested types when nothing is marked up', () => {
    const schema: SchemaReport = {
      entities: [],
      types: [],
      validation: validateSchemas([]),
      localBusiness: null,
      suggestions: { suggestedTypes: ['Article'], presentTypes: [], missingTypes: ['Article'] },
    };

    const category = scoreStructuredData(schema);
    expect(category.score).toBe(0);
    expect(category.recommendations).toEqual(['Add schema markup for: Article.']);
  });

  it('rewards valid markup that covers the suggestions', () => {
    const schema: SchemaReport = {
      entities: [PERSON],
      types: ['Person'],
      validation: validateSchemas([PERSON]),
      localBusiness: null,
      suggestions: { suggestedTypes: ['Person'], presentTypes: ['Person'], missingTypes: [] },
    };

    const category = scoreStructuredData(schema);
    expect(category.findings.map(f => f.status)).toEqual(['pass', 'pass', 'pass', 'pass']);
    expect(category.score).toBe(100);
  });

  it('scores local business completeness', () => {
    const schema: SchemaReport = {
      entities: [PERSON],
      types: ['Person'],
      validation: validateSchemas([PERSON]),
      localBusiness: {
        valid: false,
        completeness: 38.46,
        missingRequired: ['address'],
        missingRecommended: [],
        incompleteProperties: [],
        schemaType: 'Restaurant',
      },
      suggestions: { suggestedTypes: [], presentTypes: ['Person'], missingTypes: [] },
    };

    const category = scoreStructuredData(schema);
    expect(category.findings.find(f => f.check === 'Local business completeness')).toEqual({
      check: 'Local business completeness',
      status: 'fail',
      details: 'Restaurant schema is 38.46% complete',
      points: 6,
      maxPoints: 15,
    });
    expect(category.recommendations).toEqual(['Add required Restaurant properties: address.']);
  });
});

describe('scoreIntent', () => {
  it('combines satisfaction and marker coverage', () => {
    const profile: IntentProfile = {
      keyword: 'buy running shoes',
      detectedIntent: 'transactional',
      scores: { informational: 0, transactional: 3, navigational: 0, commercial: 0 },
      markers: { hasStructuredContent: true, hasPricing: true, hasCallToAction: false, hasTrustSignals: false },
      satisfactionScore: 0.75,
    };

    const category = scoreIntent(profile);
    // 45 (0.75 * 60) + 20 (2 of 4 markers * 40)
    expect(category.score).toBe(65);
    expect(category.findings.map(f => f.status)).toEqual(['pass', 'partial']);
    expect(category.recommendations).toEqual([
      'Add a clear call to action such as a buy, order or sign-up button.',
      'Mention guarantees, warranties or return policies to build purchase confidence.',
    ]);
  });

  it('fails without a classified keyword', () => {
    expect(scoreIntent(null).score).toBe(0);
  });
});

describe('calculateOverallScore', () => {
  it('weights each category', () => {
    const categories: ReportCategories = {
      keywordUsage: makeCategory(80, 0.35),
      readability: makeCategory(60, 0.25),
      structuredData: makeCategory(40, 0.2),
      intent: makeCategory(100, 0.2),
    };
    // 28 + 15 + 8 + 20
    expect(calculateOverallScore(categories)).toBe(71);
  });
});
