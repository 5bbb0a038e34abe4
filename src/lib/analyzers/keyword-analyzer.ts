import { DEFAULT_CONFIG, DEFAULT_WORD_LISTS, type AnalyzerConfig } from '../config';
import { collapseWhitespace, urlPath, type Document, type DocumentResult } from '../document/document';
import {
  CompetitiveMetrics,
  ContentExtraction,
  DensityBalance,
  DensityStatus,
  DistributionMetrics,
  FirstParagraphUsage,
  HEADING_TAGS,
  HeadingBlock,
  HeadingLevelKeywordUsage,
  HeadingLevelUsage,
  HeadingTag,
  HeadingsKeywordUsage,
  ImportantElementsUsage,
  InContentCannibalization,
  KeywordAnalysis,
  KeywordDensityAnalysis,
  KeywordDistribution,
  KeywordHeadingsSummary,
  KeywordPresence,
  KeywordProximity,
  KeywordReport,
  KeywordSentenceReadability,
  KeywordsDistribution,
  KeywordStructure,
  NaturalUsage,
  RelatedKeywordAnalysis,
  SectionStats,
  SectionUsage,
  SemanticUsage,
  TermFrequency,
  TitleKeywordUsage,
  round,
} from '../types';
import { isBoilerplate } from './content-extractor';
import {
  containsIgnoreCase,
  countOccurrences,
  countWords,
  countWordTokens,
  escapeRegExp,
  findOccurrences,
  rankFrequencies,
  splitSentences,
  wordTokens,
} from './text';

const CONTEXT_SIGNAL_WORDS = [
  'relevant', 'important', 'significant', 'key', 'essential', 'crucial',
  'related', 'similar', 'also', 'additionally', 'furthermore', 'moreover',
  'example', 'instance', 'such as', 'like', 'including', 'includes',
  'because', 'therefore', 'thus', 'hence', 'accordingly', 'consequently',
];

const TITLE_THRESHOLD = 0.8;
const FIRST_PARAGRAPH_THRESHOLD = 0.7;

export interface KeywordContext {
  source: DocumentResult;
  extraction: ContentExtraction;
}

export function normalizeKeywordInput(keyword: string): string {
  return keyword.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Naive plural/singular counterpart of a keyword. */
export function getKeywordVariations(keyword: string): string[] {
  const normalized = normalizeKeywordInput(keyword);
  if (!normalized) return [];
  return normalized.endsWith('s') ? [normalized.slice(0, -1)] : [`${normalized}s`];
}

export function calculateDensity(count: number, wordCount: number): number {
  if (count === 0 || wordCount === 0) return 0;
  return (count / wordCount) * 100;
}

export function analyzeKeywordInContent(
  keyword: string,
  ctx: KeywordContext,
  config: AnalyzerConfig = DEFAULT_CONFIG,
  stopWords: readonly string[] = DEFAULT_WORD_LISTS.stopWords,
): KeywordAnalysis {
  const kw = normalizeKeywordInput(keyword);
  const text = ctx.extraction.text;
  const positions = findOccurrences(text, kw);
  const count = positions.length;
  const wordCount = countWords(text);
  const density = calculateDensity(count, wordCount);

  const document = ctx.source.outcome === 'ok' ? ctx.source.document : null;
  const structure = document ? analyzeKeywordStructure(kw, document, ctx.extraction) : null;
  const headings = document
    ? summarizeHeadings(kw, document)
    : summarizeHeadingsFallback(kw, ctx.source.outcome === 'parse_failure' ? ctx.source.html : '');
  const inFirstParagraph = structure
    ? structure.firstParagraph.hasKeyword
    : containsIgnoreCase(ctx.extraction.paragraphs[0] ?? '', kw);

  const variations: Record<string, number> = {};
  for (const variation of getKeywordVariations(kw)) {
    variations[variation] = countOccurrences(text, variation);
  }

  const length = Math.max(text.length, 1);
  const positionPercent = count > 0 ? round((positions[0] / length) * 100) : null;
  const distributionSpread = count > 1 ? round((positions[positions.length - 1] - positions[0]) / length) : 0;

  const contextualScore = kw
    ? (text.match(new RegExp(`\\b${escapeRegExp(kw)}\\b.{0,50}(improve|ranking|optimi[sz]e|visibility)`, 'gi')) ?? []).length
    : 0;

  const hasSufficientUsage =
    count > 0 &&
    density >= config.density.optimalMin &&
    density <= config.density.optimalMax &&
    positionPercent !== null &&
    positionPercent < config.sufficientUsageMaxPosition &&
    distributionSpread > config.sufficientUsageMinSpread;

  return {
    keyword: kw,
    count,
    wordCount,
    density: round(density),
    densityStatus: getKeywordDensityStatus(density, config.density.optimalMin, config.density.optimalMax, config),
    positionPercent,
    distributionSpread,
    contextualScore,
    hasSufficientUsage,
    variations,
    headings,
    inFirstParagraph,
    structure,
    semantic: analyzeSemanticUsage(kw, text, variations, config),
    competitive: analyzeCompetitiveMetrics(density, count, wordCount, config),
    sentenceReadability: analyzeKeywordSentenceReadability(kw, text),
    lsiKeywords: findLsiKeywords(kw, text, stopWords),
    cannibalization: checkInContentCannibalization(kw, text),
    fallbackUsed: ctx.extraction.fallbackUsed,
  };
}

export function analyzeKeywordStructure(keyword: string, document: Document, extraction: ContentExtraction): KeywordStructure {
  const { $ } = document;
  const level = (tag: HeadingTag): HeadingLevelUsage => {
    const texts = $(tag)
      .toArray()
      .filter(el => !isBoilerplate(el))
      .map(el => collapseWhitespace($(el).text()));
    return {
      count: texts.length,
      keywordMatches: texts.filter(t => containsIgnoreCase(t, keyword)).length,
      texts,
    };
  };
  const headings: Record<HeadingTag, HeadingLevelUsage> = {
    h1: level('h1'),
    h2: level('h2'),
    h3: level('h3'),
    h4: level('h4'),
    h5: level('h5'),
    h6: level('h6'),
  };

  const paragraphs = extraction.paragraphs;
  const withKeyword = paragraphs.filter(p => containsIgnoreCase(p, keyword)).length;
  const path = safeDecode(urlPath(document.baseUrl)).toLowerCase();

  return {
    headings,
    paragraphs: {
      total: paragraphs.length,
      withKeyword,
      distributionPercentage: paragraphs.length > 0 ? round((withKeyword / paragraphs.length) * 100) : 0,
    },
    firstParagraph: { hasKeyword: containsIgnoreCase(paragraphs[0] ?? '', keyword) },
    meta: {
      titleHasKeyword: containsIgnoreCase(document.title, keyword),
      descriptionHasKeyword: containsIgnoreCase(document.metaDescription, keyword),
    },
    urlHasKeyword: keyword !== '' && (path.includes(keyword) || path.includes(keyword.replace(/ /g, '-'))),
  };
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function summarizeHeadings(keyword: string, document: Document): KeywordHeadingsSummary {
  const { $ } = document;
  const nodes = $('h1, h2, h3, h4, h5, h6')
    .toArray()
    .filter(el => !isBoilerplate(el));
  const levels: Partial<Record<HeadingTag, number>> = {};
  let count = 0;
  for (const el of nodes) {
    if (!containsIgnoreCase($(el).text(), keyword)) continue;
    count++;
    const tag = toHeadingTag(el.name);
    if (tag) levels[tag] = (levels[tag] ?? 0) + 1;
  }
  return { count, levels, totalHeadings: nodes.length };
}

function summarizeHeadingsFallback(keyword: string, html: string): KeywordHeadingsSummary {
  const all = html.match(/<h[1-6]\b[^>]*>[\s\S]*?<\/h[1-6]>/gi) ?? [];
  if (!keyword) return { count: 0, levels: {}, totalHeadings: all.length };
  const pattern = new RegExp(`<h([1-6])\\b[^>]*>[^<]*?${escapeRegExp(keyword)}[\\s\\S]*?<\\/h[1-6]>`, 'gi');
  const levels: Partial<Record<HeadingTag, number>> = {};
  let count = 0;
  for (const match of html.matchAll(pattern)) {
    count++;
    const tag = toHeadingTag(`h${match[1]}`);
    if (tag) levels[tag] = (levels[tag] ?? 0) + 1;
  }
  return { count, levels, totalHeadings: all.length };
}

function toHeadingTag(name: string): HeadingTag | null {
  const lowered = name.toLowerCase();
  return HEADING_TAGS.find(tag => tag === lowered) ?? null;
}

export function analyzeSemanticUsage(
  keyword: string,
  text: string,
  variations: Record<string, number>,
  config: AnalyzerConfig = DEFAULT_CONFIG,
): SemanticUsage {
  const contexts = keyword ? splitSentences(text).filter(s => containsIgnoreCase(s, keyword)) : [];
  return {
    variations,
    contexts: contexts.slice(0, 5),
    naturalUsage: assessNaturalUsage(keyword, contexts, config),
    proximity: analyzeKeywordProximity(keyword, text),
  };
}

/** Counts keyword-bearing sentences that read as stuffed. */
export function assessNaturalUsage(keyword: string, contexts: string[], config: AnalyzerConfig = DEFAULT_CONFIG): NaturalUsage {
  const kw = escapeRegExp(keyword);
  const patterns = [
    new RegExp(`${kw}.{0,10}${kw}`, 'i'),
    new RegExp(`^${kw}`, 'i'),
    new RegExp(`${kw}\\s*,\\s*${kw}`, 'i'),
  ];

  let stuffingIndicators = 0;
  for (const context of contexts) {
    if (patterns.some(pattern => pattern.test(context))) stuffingIndicators++;
  }

  const forcedUsagePercentage = contexts.length > 0 ? round((stuffingIndicators / contexts.length) * 100) : 0;
  return {
    stuffingIndicators,
    appearsNatural: forcedUsagePercentage < config.naturalUsageMaxForcedPercentage,
    forcedUsagePercentage,
  };
}

export function analyzeKeywordProximity(keyword: string, text: string): KeywordProximity {
  const positions = findOccurrences(text, keyword);
  let total = 0;
  for (let i = 1; i < positions.length; i++) total += positions[i] - positions[i - 1];
  const gaps = positions.length - 1;

  return {
    occurrences: positions.length,
    averageDistance: gaps > 0 ? round(total / gaps) : 0,
    distributionScore: calculateDistributionScore(positions, text.length),
  };
}

/**
 * 0-10 score comparing occurrence offsets with an evenly spaced ladder
 * (`length / (n + 1) * i`). 10 means the keyword is spread perfectly.
 */
export function calculateDistributionScore(positions: number[], contentLength: number): number {
  if (positions.length === 0 || contentLength === 0) return 0;

  const idealGap = contentLength / (positions.length + 1);
  let totalDeviation = 0;
  positions.forEach((pos, i) => {
    totalDeviation += Math.abs(pos - idealGap * (i + 1));
  });
  const avgDeviation = totalDeviation / positions.length;
  const score = round(10 - (avgDeviation / (contentLength / 2)) * 10, 1);
  return Math.max(0, Math.min(10, score));
}

export function analyzeCompetitiveMetrics(
  density: number,
  count: number,
  wordCount: number,
  config: AnalyzerConfig = DEFAULT_CONFIG,
): CompetitiveMetrics {
  const ideal = { min: config.density.competitiveIdealMin, max: config.density.competitiveIdealMax };
  const recommendedCount = Math.ceil(wordCount / 100);
  const countRatio = recommendedCount > 0 ? count / recommendedCount : 0;

  return {
    densityStatus: density < ideal.min ? 'underdensity' : density > ideal.max ? 'overdensity' : 'optimal',
    idealDensityRange: ideal,
    recommendedCount,
    countStatus: countRatio < 0.7 ? 'insufficient' : countRatio > 1.5 ? 'excessive' : 'optimal',
    countRatio: round(countRatio),
  };
}

export function getKeywordDensityStatus(
  density: number,
  optimalMin: number,
  optimalMax: number,
  config: AnalyzerConfig = DEFAULT_CONFIG,
): DensityStatus {
  if (density < optimalMin) {
    return density < config.density.underuse ? 'severely_underused' : 'underused';
  }
  if (density > optimalMax) {
    return density > config.density.severeOveruse ? 'severely_overused' : 'overused';
  }
  return 'optimal';
}

export function calculateKeywordDensityScore(density: number, optimalMin: number, optimalMax: number): number {
  if (density >= optimalMin && density <= optimalMax) return 1;
  let score: number;
  if (density < optimalMin) {
    if (density <= 0) return 0;
    score = density / optimalMin;
  } else {
    const excess = (density - optimalMax) / optimalMax;
    score = 1 - Math.min(1, excess * 1.5);
  }
  return Math.max(0, Math.min(1, score));
}

export function findLsiKeywords(
  keyword: string,
  text: string,
  stopWords: readonly string[] = DEFAULT_WORD_LISTS.stopWords,
): TermFrequency[] {
  const excluded = new Set([...stopWords, ...keyword.split(' ')]);
  return rankFrequencies(wordTokens(text).map(w => w.toLowerCase()))
    .filter(entry => !excluded.has(entry.term))
    .slice(0, 10);
}

/** Frequent single words that outnumber the keyword inside the same text. */
export function checkInContentCannibalization(keyword: string, text: string): InContentCannibalization {
  const keywordCount = countOccurrences(text, keyword);
  const potentialCompetingKeywords = rankFrequencies(wordTokens(text).map(w => w.toLowerCase()))
    .slice(0, 5)
    .filter(entry => entry.count > keywordCount && entry.term.length > 3);

  return {
    primaryKeywordCount: keywordCount,
    potentialCompetingKeywords,
    hasCannibalizationRisk: potentialCompetingKeywords.length > 0,
  };
}

export function analyzeKeywordSentenceReadability(keyword: string, text: string): KeywordSentenceReadability {
  const sentences = keyword ? splitSentences(text).filter(s => containsIgnoreCase(s, keyword)) : [];
  const avg = sentences.length > 0
    ? sentences.reduce((sum, s) => sum + countWordTokens(s), 0) / sentences.length
    : 0;
  const score = 10 - Math.min(10, Math.abs(avg - 15));

  return {
    averageSentenceLength: round(avg, 1),
    score: round(score, 1),
    status: score < 4 ? 'poor' : score < 7 ? 'average' : 'good',
  };
}

export interface DensityOptions {
  isPrimary: boolean;
  isShortContent: boolean;
}

export function analyzeKeywordDensity(
  analysis: KeywordAnalysis,
  totalWordCount: number,
  options: DensityOptions,
  config: AnalyzerConfig = DEFAULT_CONFIG,
): KeywordDensityAnalysis {
  const d = config.density;
  let optimalMin = options.isShortContent ? d.optimalMin * d.shortContentMinFactor : d.optimalMin;
  let optimalMax = options.isShortContent ? d.optimalMax * d.shortContentMaxFactor : d.optimalMax;
  if (!options.isPrimary) {
    optimalMin *= d.secondaryFactor;
    optimalMax *= d.secondaryFactor;
  }

  const status = getKeywordDensityStatus(analysis.density, optimalMin, optimalMax, config);
  const expectedMin = Math.ceil((totalWordCount * optimalMin) / 100);
  const expectedMax = Math.floor((totalWordCount * optimalMax) / 100);
  let adjustmentNeeded = 0;
  if (status === 'underused' || status === 'severely_underused') adjustmentNeeded = expectedMin - analysis.count;
  else if (status === 'overused' || status === 'severely_overused') adjustmentNeeded = analysis.count - expectedMax;

  const structure = analysis.structure;
  return {
    keyword: analysis.keyword,
    isPrimary: options.isPrimary,
    count: analysis.count,
    density: analysis.density,
    status,
    optimalRange: { min: round(optimalMin), max: round(optimalMax) },
    expectedCount: { min: expectedMin, max: expectedMax },
    adjustmentNeeded,
    score: round(calculateKeywordDensityScore(analysis.density, optimalMin, optimalMax)),
    structuralUsage: {
      inTitle: structure?.meta.titleHasKeyword ?? false,
      inMetaDescription: structure?.meta.descriptionHasKeyword ?? false,
      inUrl: structure?.urlHasKeyword ?? false,
      inHeadings: analysis.headings.count > 0,
      inFirstParagraph: analysis.inFirstParagraph,
    },
    distributionSpread: analysis.distributionSpread,
    variations: analysis.variations,
  };
}

export function calculateDensityBalance(
  primary: { density: number } | null,
  secondaries: { density: number }[],
): DensityBalance {
  if (!primary || secondaries.length === 0) {
    return {
      status: 'incomplete',
      ratio: 0,
      score: 0.5,
      message: 'Cannot calculate balance without both primary and secondary keywords',
    };
  }

  const avgSecondary = secondaries.reduce((sum, s) => sum + s.density, 0) / secondaries.length;
  const ratio = avgSecondary > 0 ? primary.density / avgSecondary : Number.POSITIVE_INFINITY;
  const capped = round(Math.min(ratio, 100));

  if (ratio < 1) {
    return {
      status: 'secondary_dominant',
      ratio: capped,
      score: 0.6,
      message: 'Secondary keywords are more prominent than your primary keyword. Consider rebalancing.',
    };
  }
  if (ratio <= 3) {
    return {
      status: 'well_balanced',
      ratio: capped,
      score: 1,
      message: 'Good balance between primary and secondary keywords.',
    };
  }
  if (ratio <= 5) {
    return {
      status: 'primary_heavy',
      ratio: capped,
      score: 0.7,
      message: 'Primary keyword is significantly more used than secondary keywords. Consider more topic diversity.',
    };
  }
  return {
    status: 'primary_dominant',
    ratio: capped,
    score: 0.4,
    message: 'Content focuses too heavily on primary keyword at the expense of topic diversity.',
  };
}

export function analyzeTitleKeywordUsage(keyword: string, title: string): TitleKeywordUsage {
  const kw = normalizeKeywordInput(keyword);
  const normalizedTitle = title.trim().toLowerCase();
  const position = kw ? normalizedTitle.indexOf(kw) : -1;
  const hasKeyword = position !== -1;
  const atBeginning = position === 0;
  const score = hasKeyword ? (atBeginning ? 1 : 0.8) : 0;

  return {
    title: title.trim(),
    hasKeyword,
    atBeginning,
    positionPercentage: hasKeyword ? round((position / normalizedTitle.length) * 100) : null,
    score,
    meetsThreshold: score >= TITLE_THRESHOLD,
  };
}

export function analyzeHeadingsKeywordUsage(keywords: string[], headings: HeadingBlock[]): HeadingsKeywordUsage {
  const usable = keywords.map(normalizeKeywordInput).filter(Boolean);
  const levels: Partial<Record<HeadingTag, HeadingLevelKeywordUsage>> = {};
  let headingsWithKeywords = 0;

  for (const heading of headings) {
    const tag = toHeadingTag(`h${heading.level}`);
    if (!tag) continue;
    const info = levels[tag] ?? { total: 0, withKeywords: 0, keywordCoverage: {}, headings: [] };
    levels[tag] = info;

    const keywordsFound = usable.filter(kw => containsIgnoreCase(heading.text, kw));
    for (const kw of keywordsFound) info.keywordCoverage[kw] = (info.keywordCoverage[kw] ?? 0) + 1;
    info.total++;
    info.headings.push({ text: heading.text, hasKeyword: keywordsFound.length > 0, keywordsFound });
    if (keywordsFound.length > 0) {
      info.withKeywords++;
      headingsWithKeywords++;
    }
  }

  const total = headings.length;
  return {
    levels,
    totalHeadings: total,
    headingsWithKeywords,
    coveragePercentage: total > 0 ? round((headingsWithKeywords / total) * 100) : 0,
    coverageScore: total > 0 ? round(headingsWithKeywords / total) : 0,
  };
}

export function analyzeFirstParagraphKeywordUsage(keyword: string, paragraphs: string[]): FirstParagraphUsage {
  const text = paragraphs[0] ?? '';
  const hasPrimaryKeyword = containsIgnoreCase(text, normalizeKeywordInput(keyword));
  const score = hasPrimaryKeyword ? 1 : 0;
  return {
    text,
    hasPrimaryKeyword,
    wordCount: countWordTokens(text),
    score,
    meetsThreshold: score >= FIRST_PARAGRAPH_THRESHOLD,
  };
}

export function calculateDistributionMetrics(positions: number[], contentLength: number): DistributionMetrics {
  if (positions.length <= 1) {
    return {
      score: positions.length === 1 ? 0.1 : 0,
      quality: 'poor',
      coveragePercentage: positions.length === 1 && contentLength > 0 ? round((positions[0] / contentLength) * 100) : 0,
    };
  }

  const n = positions.length;
  const idealGap = contentLength / (n + 1);
  let totalDeviation = 0;
  positions.forEach((pos, i) => {
    totalDeviation += Math.abs(pos - idealGap * (i + 1));
  });
  const averageDeviation = totalDeviation / n / contentLength;
  const score = 1 - Math.min(1, averageDeviation * 5);
  const quality = score > 0.7 ? 'excellent' : score > 0.5 ? 'good' : score > 0.3 ? 'fair' : 'poor';

  return {
    score: round(score),
    quality,
    coveragePercentage: round(((positions[n - 1] - positions[0]) / contentLength) * 100),
  };
}

export function analyzeKeywordsDistribution(keywords: string[], text: string): KeywordsDistribution {
  const result: Record<string, KeywordDistribution> = {};
  let total = 0;
  let present = 0;

  for (const keyword of keywords) {
    const kw = normalizeKeywordInput(keyword);
    if (!kw) continue;
    const positions = findOccurrences(text, kw);
    const metrics = calculateDistributionMetrics(positions, text.length);
    result[kw] = { occurrences: positions.length, positions, ...metrics };
    if (positions.length > 0) {
      total += metrics.score;
      present++;
    }
  }

  return { keywords: result, averageScore: present > 0 ? round(total / present) : 0 };
}

export function analyzeContentSections(keywords: string[], paragraphs: string[]): SectionUsage {
  const n = paragraphs.length;
  if (n === 0) return { sections: null, sectionCoverageScore: 0 };

  const edgeSize = Math.max(1, Math.min(2, Math.floor(n * 0.2)));
  const bodySize = Math.max(0, n - edgeSize * 2);
  const sections = {
    introduction: analyzeSection(keywords, paragraphs.slice(0, edgeSize)),
    body: analyzeSection(keywords, paragraphs.slice(edgeSize, edgeSize + bodySize)),
    conclusion: analyzeSection(keywords, paragraphs.slice(edgeSize + bodySize)),
  };
  const withKeywords = Object.values(sections).filter(s => s.keywordsFound > 0).length;

  return { sections, sectionCoverageScore: round(withKeywords / 3) };
}

export function analyzeSection(keywords: string[], paragraphs: string[]): SectionStats {
  const combined = paragraphs.join(' ');
  const breakdown: Record<string, number> = {};
  for (const keyword of keywords) {
    const kw = normalizeKeywordInput(keyword);
    if (!kw) continue;
    const count = countOccurrences(combined, kw);
    if (count > 0) breakdown[kw] = count;
  }

  const words = countWordTokens(combined);
  const occurrences = Object.values(breakdown).reduce((sum, c) => sum + c, 0);
  return {
    paragraphs: paragraphs.length,
    words,
    keywordsFound: Object.keys(breakdown).length,
    breakdown,
    density: words > 0 ? round((occurrences / words) * 100) : 0,
  };
}

/** Spacing regularity of a keyword, 0-1; 0.5 when there is too little to judge. */
export function keywordDistributionScore(keyword: string, text: string): number {
  const positions = findOccurrences(text, keyword);
  if (positions.length < 2) return 0.5;

  const idealSpacing = text.length / (positions.length + 1);
  let variance = 0;
  for (let i = 0; i < positions.length - 1; i++) {
    variance += Math.abs(positions[i + 1] - positions[i] - idealSpacing) / idealSpacing;
  }
  const avgVariance = variance / (positions.length - 1);
  return Math.max(0, 1 - Math.min(1, avgVariance));
}

export function semanticContextScore(related: string, primary: string, text: string): number {
  let withRelated = 0;
  let withBoth = 0;
  let withContext = 0;

  for (const sentence of text.split(/(?<=[.!?])\s+/).filter(Boolean)) {
    const lowered = sentence.toLowerCase();
    const keywordPos = lowered.indexOf(related);
    if (keywordPos === -1) continue;
    withRelated++;
    if (primary && lowered.includes(primary)) withBoth++;
    const hasSignal = CONTEXT_SIGNAL_WORDS.some(signal => {
      const signalPos = lowered.indexOf(signal);
      return signalPos !== -1 && Math.abs(keywordPos - signalPos) < 50;
    });
    if (hasSignal) withContext++;
  }

  if (withRelated === 0) return 0;
  return (withBoth / withRelated) * 0.6 + (withContext / withRelated) * 0.4;
}

export function calculateProximityToPrimary(related: string, primary: string, text: string): number {
  const primaryPositions = findOccurrences(text, primary);
  const relatedPositions = findOccurrences(text, related);
  if (primaryPositions.length === 0 || relatedPositions.length === 0) return 0;

  // Both position lists ascend, so the nearest primary only moves forward.
  let nearest = 0;
  let totalDistance = 0;
  for (const r of relatedPositions) {
    while (
      nearest + 1 < primaryPositions.length &&
      Math.abs(primaryPositions[nearest + 1] - r) <= Math.abs(primaryPositions[nearest] - r)
    ) {
      nearest++;
    }
    totalDistance += Math.abs(primaryPositions[nearest] - r);
  }
  const avgMinDistance = totalDistance / relatedPositions.length;
  return 1 - Math.min(1, avgMinDistance / (text.length / 4));
}

export function checkKeywordOnImportantElements(keyword: string, extraction: ContentExtraction): ImportantElementsUsage {
  const paragraphs = extraction.paragraphs;
  return {
    headings: extraction.headings.some(h => containsIgnoreCase(h.text, keyword)),
    firstParagraph: containsIgnoreCase(paragraphs[0] ?? '', keyword),
    lastParagraph: containsIgnoreCase(paragraphs[paragraphs.length - 1] ?? '', keyword),
  };
}

export function analyzeRelatedKeyword(
  relatedKeyword: string,
  primaryKeyword: string,
  extraction: ContentExtraction,
  totalWordCount: number,
): RelatedKeywordAnalysis {
  const related = normalizeKeywordInput(relatedKeyword);
  const primary = normalizeKeywordInput(primaryKeyword);
  const text = extraction.text;
  const count = countOccurrences(text, related);

  if (count === 0) {
    return {
      keyword: related,
      count: 0,
      isPresent: false,
      density: 0,
      distributionScore: 0,
      contextScore: 0,
      proximityToPrimary: 0,
      inImportantElements: { headings: false, firstParagraph: false, lastParagraph: false },
    };
  }

  return {
    keyword: related,
    count,
    isPresent: true,
    density: round(calculateDensity(count, totalWordCount)),
    distributionScore: round(keywordDistributionScore(related, text)),
    contextScore: round(semanticContextScore(related, primary, text)),
    proximityToPrimary: round(calculateProximityToPrimary(related, primary, text)),
    inImportantElements: checkKeywordOnImportantElements(related, extraction),
  };
}

export function checkKeywordPresence(text: string, keywords: string[]): KeywordPresence {
  const trimmed = text.trim();
  const details: Record<string, boolean> = {};
  let found = 0;
  for (const keyword of keywords) {
    const present = trimmed !== '' && containsIgnoreCase(trimmed, keyword);
    details[keyword] = present;
    if (present) found++;
  }
  return {
    hasAnyKeyword: found > 0,
    keywordsFound: found,
    keywordsMissing: keywords.length - found,
    details,
  };
}

export interface KeywordSetInput {
  primaryKeyword: string;
  secondaryKeywords: string[];
  title: string;
}

/** Primary and secondary keywords analyzed together against one document. */
export function analyzeKeywordSet(
  input: KeywordSetInput,
  ctx: KeywordContext,
  config: AnalyzerConfig = DEFAULT_CONFIG,
  stopWords: readonly string[] = DEFAULT_WORD_LISTS.stopWords,
): KeywordReport {
  const primary = analyzeKeywordInContent(input.primaryKeyword, ctx, config, stopWords);
  const secondaryKeywords = [...new Set(input.secondaryKeywords.map(normalizeKeywordInput))].filter(
    kw => kw && kw !== primary.keyword,
  );
  const secondary = secondaryKeywords.map(kw => analyzeKeywordInContent(kw, ctx, config, stopWords));

  const totalWords = primary.wordCount;
  const isShortContent = totalWords < config.density.shortContentWords;
  const density = [
    analyzeKeywordDensity(primary, totalWords, { isPrimary: true, isShortContent }, config),
    ...secondary.map(analysis => analyzeKeywordDensity(analysis, totalWords, { isPrimary: false, isShortContent }, config)),
  ];
  const all = [primary.keyword, ...secondaryKeywords];

  return {
    primary,
    secondary,
    density,
    balance: calculateDensityBalance(primary, secondary),
    title: analyzeTitleKeywordUsage(primary.keyword, input.title),
    headings: analyzeHeadingsKeywordUsage(all, ctx.extraction.headings),
    firstParagraph: analyzeFirstParagraphKeywordUsage(primary.keyword, ctx.extraction.paragraphs),
    distribution: analyzeKeywordsDistribution(all, ctx.extraction.text),
    sections: analyzeContentSections(all, ctx.extraction.paragraphs),
    related: secondaryKeywords.map(kw => analyzeRelatedKeyword(kw, primary.keyword, ctx.extraction, totalWords)),
  };
}
