import { DEFAULT_CONFIG, DEFAULT_WORD_LISTS, type AnalyzerConfig } from '../config';
import {
  CannibalizationIssue,
  ConflictingPage,
  KeywordCount,
  KeywordCoverage,
  KeywordGap,
  KeywordMapEntry,
  TopicCluster,
  round,
} from '../types';
import { normalizeKeywordInput } from './keyword-analyzer';
import { calculateKeywordSimilarity, normalizeKeyword } from './keyword-similarity';
import { rankFrequencies } from './text';

const RECOMMENDATIONS = {
  primary_keyword_conflict: 'Consolidate content or reassign primary keywords to prevent cannibalization',
  keyword_overuse: 'Consider consolidating content or creating a more focused topic cluster',
  semantic_similarity: 'Differentiate content focus or combine into a single comprehensive page',
} as const;

export function detectCannibalizationIssues(
  entries: KeywordMapEntry[],
  config: AnalyzerConfig = DEFAULT_CONFIG,
  stopWords: readonly string[] = DEFAULT_WORD_LISTS.stopWords,
): CannibalizationIssue[] {
  const targets = new Map<string, ConflictingPage[]>();
  const addTarget = (keyword: string, page: ConflictingPage) => {
    const normalized = normalizeKeyword(keyword, stopWords);
    if (!normalized) return;
    const pages = targets.get(normalized) ?? [];
    pages.push(page);
    targets.set(normalized, pages);
  };

  for (const entry of entries) {
    const base = { documentId: entry.documentId, title: entry.title, url: entry.url };
    if (entry.primaryKeyword.trim()) addTarget(entry.primaryKeyword, { ...base, role: 'primary' });
    for (const secondary of entry.secondaryKeywords) addTarget(secondary, { ...base, role: 'secondary' });
  }

  const issues: CannibalizationIssue[] = [];
  for (const [keyword, pages] of targets) {
    const primaryTargets = pages.filter(page => page.role === 'primary');
    if (primaryTargets.length > 1) {
      issues.push({
        type: 'primary_keyword_conflict',
        severity: 'high',
        keyword,
        conflictingPages: primaryTargets,
        recommendation: RECOMMENDATIONS.primary_keyword_conflict,
      });
    }

    const documents = new Set(pages.map(page => page.documentId));
    if (documents.size > 2) {
      issues.push({
        type: 'keyword_overuse',
        severity: 'medium',
        keyword,
        conflictingPages: pages,
        recommendation: RECOMMENDATIONS.keyword_overuse,
      });
    }
  }

  return [...issues, ...detectSemanticCannibalization(entries, config, stopWords)];
}

/**
 * Pairs of documents whose primary keywords differ after normalization but
 * score at or above the cannibalization threshold. Each pair is reported once.
 */
export function detectSemanticCannibalization(
  entries: KeywordMapEntry[],
  config: AnalyzerConfig = DEFAULT_CONFIG,
  stopWords: readonly string[] = DEFAULT_WORD_LISTS.stopWords,
): CannibalizationIssue[] {
  const withPrimary = entries.filter(entry => entry.primaryKeyword.trim() !== '');
  const issues: CannibalizationIssue[] = [];

  for (let i = 0; i < withPrimary.length; i++) {
    for (let j = i + 1; j < withPrimary.length; j++) {
      const first = withPrimary[i];
      const second = withPrimary[j];
      if (first.documentId === second.documentId) continue;
      if (normalizeKeyword(first.primaryKeyword, stopWords) === normalizeKeyword(second.primaryKeyword, stopWords)) {
        continue;
      }

      const similarity = calculateKeywordSimilarity(first.primaryKeyword, second.primaryKeyword, stopWords);
      if (similarity < config.cannibalizationThreshold) continue;

      issues.push({
        type: 'semantic_similarity',
        severity: 'medium',
        keywords: [first.primaryKeyword, second.primaryKeyword],
        similarity: round(similarity),
        conflictingPages: [
          { documentId: first.documentId, title: first.title, url: first.url, keyword: first.primaryKeyword },
          { documentId: second.documentId, title: second.title, url: second.url, keyword: second.primaryKeyword },
        ],
        recommendation: RECOMMENDATIONS.semantic_similarity,
      });
    }
  }

  return issues;
}

/** Issues involving one document, with that document removed from each page list. */
export function findConflictsForDocument(documentId: string, issues: CannibalizationIssue[]): CannibalizationIssue[] {
  return issues
    .filter(issue => issue.conflictingPages.some(page => page.documentId === documentId))
    .map(issue => ({
      ...issue,
      conflictingPages: issue.conflictingPages.filter(page => page.documentId !== documentId),
    }));
}

export function analyzeKeywordCoverage(entries: KeywordMapEntry[]): KeywordCoverage {
  const all = entries
    .flatMap(entry => [entry.primaryKeyword, ...entry.secondaryKeywords])
    .map(normalizeKeywordInput)
    .filter(keyword => keyword !== '');

  const frequency: KeywordCount[] = rankFrequencies(all).map(({ term, count }) => ({ keyword: term, count }));
  const unique = frequency.length;

  return {
    totalKeywords: all.length,
    uniqueKeywords: unique,
    diversityScore: unique > 0 ? round(all.length / unique) : 0,
    mostUsed: frequency.slice(0, 10),
    overused: frequency.filter(k => k.count > 3),
    underused: frequency.filter(k => k.count === 1),
    gaps: identifyKeywordGaps(frequency),
  };
}

/** Drop-one-word variations of multi-word keywords that no document targets yet. */
export function identifyKeywordGaps(frequency: KeywordCount[]): KeywordGap[] {
  const keywords = frequency.map(k => normalizeKeywordInput(k.keyword));
  const existing = new Set(keywords);
  const gaps = new Map<string, KeywordGap>();

  for (const keyword of keywords) {
    const words = keyword.split(' ');
    if (words.length < 2) continue;

    for (let i = 0; i < words.length; i++) {
      const variation = [...words.slice(0, i), ...words.slice(i + 1)].join(' ');
      if (existing.has(variation) || variation.length <= 5 || gaps.has(variation)) continue;
      gaps.set(variation, { keyword: variation, derivedFrom: keyword, type: 'variation' });
    }
  }

  return [...gaps.values()].slice(0, 10);
}

export function generateTopicClusters(
  entries: KeywordMapEntry[],
  config: AnalyzerConfig = DEFAULT_CONFIG,
  stopWords: readonly string[] = DEFAULT_WORD_LISTS.stopWords,
): TopicCluster[] {
  const clusters: TopicCluster[] = [];
  const processed = new Set<string>();

  for (const entry of entries) {
    const primary = normalizeKeywordInput(entry.primaryKeyword);
    if (!primary || processed.has(primary)) continue;
    const secondaries = normalizedSet(entry.secondaryKeywords);

    const supportingPages: TopicCluster['supportingPages'] = [];
    for (const candidate of entries) {
      if (candidate.documentId === entry.documentId) continue;

      const similar =
        candidate.primaryKeyword.trim() !== '' &&
        calculateKeywordSimilarity(primary, candidate.primaryKeyword, stopWords) >= config.clusterSimilarityThreshold;
      const candidateSecondaries = normalizedSet(candidate.secondaryKeywords);
      const sharesSecondary = [...secondaries].some(k => candidateSecondaries.has(k));

      if (similar || sharesSecondary) {
        supportingPages.push({
          documentId: candidate.documentId,
          title: candidate.title,
          url: candidate.url,
          primaryKeyword: candidate.primaryKeyword,
        });
      }
    }

    if (supportingPages.length > 0) {
      clusters.push({
        mainTopic: primary,
        pillarPage: { documentId: entry.documentId, title: entry.title, url: entry.url },
        supportingPages,
        relatedKeywords: [...secondaries],
      });
    }
    processed.add(primary);
  }

  return clusters;
}

function normalizedSet(keywords: string[]): Set<string> {
  return new Set(keywords.map(normalizeKeywordInput).filter(keyword => keyword !== ''));
}
