import { describe, expect, it } from 'vitest';
import {
  analyzeKeywordCoverage,
  detectCannibalizationIssues,
  findConflictsForDocument,
  generateTopicClusters,
  identifyKeywordGaps,
} from './cannibalization';
import { KeywordMapEntry } from '../types';

function makeEntry(documentId: string, primaryKeyword: string, secondaryKeywords: string[] = []): KeywordMapEntry {
  return {
    documentId,
    title: `Page ${documentId}`,
    url: `https://example.com/${documentId}`,
    primaryKeyword,
    secondaryKeywords,
    categories: [],
  };
}

describe('detectCannibalizationIssues', () => {
  it('flags two documents sharing a primary keyword', () => {
    const issues = detectCannibalizationIssues([
      makeEntry('1', 'best coffee maker'),
      makeEntry('2', 'best coffee maker'),
    ]);

    expect(issues).toEqual([
      {
        type: 'primary_keyword_conflict',
        severity: 'high',
        keyword: 'best coffee maker',
        conflictingPages: [
          { documentId: '1', title: 'Page 1', url: 'https://example.com/1', role: 'primary' },
          { documentId: '2', title: 'Page 2', url: 'https://example.com/2', role: 'primary' },
        ],
        recommendation: 'Consolidate content or reassign primary keywords to prevent cannibalization',
      },
    ]);
  });

  it('flags a keyword targeted by more than two documents', () => {
    const issues = detectCannibalizationIssues([
      makeEntry('1', 'espresso', ['milk frother']),
      makeEntry('2', 'latte art', ['milk frother']),
      makeEntry('3', 'cappuccino', ['milk frother']),
    ]);
    const overuse = issues.filter(issue => issue.type === 'keyword_overuse');

    expect(overuse).toHaveLength(1);
    expect(overuse[0].conflictingPages.map(page => page.documentId)).toEqual(['1', '2', '3']);
  });

  it('reports each similar primary pair once', () => {
    const issues = detectCannibalizationIssues([
      makeEntry('1', 'coffee grinder'),
      makeEntry('2', 'coffee grinders'),
    ]);

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      type: 'semantic_similarity',
      keywords: ['coffee grinder', 'coffee grinders'],
      similarity: 90,
    });
  });
});

describe('findConflictsForDocument', () => {
  it('keeps only the other pages of each issue', () => {
    const issues = detectCannibalizationIssues([
      makeEntry('1', 'best coffee maker'),
      makeEntry('2', 'best coffee maker'),
      makeEntry('3', 'green tea'),
    ]);

    const conflicts = findConflictsForDocument('1', issues);
    expect(conflicts).toHaveLength(1);
    expect(conflicts[0].conflictingPages.map(page => page.documentId)).toEqual(['2']);
    expect(findConflictsForDocument('3', issues)).toEqual([]);
  });
});

describe('analyzeKeywordCoverage', () => {
  it('summarizes keyword frequency across documents', () => {
    const coverage = analyzeKeywordCoverage([
      makeEntry('1', 'coffee', ['french press']),
      makeEntry('2', 'coffee', ['pour over coffee']),
    ]);

    expect(coverage.totalKeywords).toBe(4);
    expect(coverage.uniqueKeywords).toBe(3);
    expect(coverage.diversityScore).toBe(1.33); // 4 / 3
    expect(coverage.mostUsed[0]).toEqual({ keyword: 'coffee', count: 2 });
    expect(coverage.underused.map(k => k.keyword)).toEqual(['french press', 'pour over coffee']);
    expect(coverage.overused).toEqual([]);
  });
});

describe('keyword case and spacing', () => {
  const entries = [
    makeEntry('1', 'Coffee Maker', ['Drip Brewer']),
    makeEntry('2', 'coffee  maker', ['drip brewer']),
    makeEntry('3', 'tea kettle'),
  ];

  it('counts mixed-case keywords once in coverage', () => {
    const coverage = analyzeKeywordCoverage(entries);

    expect(coverage.totalKeywords).toBe(5);
    expect(coverage.uniqueKeywords).toBe(3);
    expect(coverage.mostUsed).toEqual([
      { keyword: 'coffee maker', count: 2 },
      { keyword: 'drip brewer', count: 2 },
      { keyword: 'tea kettle', count: 1 },
    ]);
  });

  it('builds one cluster per normalized primary keyword', () => {
    expect(generateTopicClusters(entries)).toEqual([
      {
        mainTopic: 'coffee maker',
        pillarPage: { documentId: '1', title: 'Page 1', url: 'https://example.com/1' },
        supportingPages: [
          { documentId: '2', title: 'Page 2', url: 'https://example.com/2', primaryKeyword: 'coffee  maker' },
        ],
        relatedKeywords: ['drip brewer'],
      },
    ]);
  });
});

describe('identifyKeywordGaps', () => {
  it('derives drop-one-word variations longer than five characters', () => {
    const gaps = identifyKeywordGaps([
      { keyword: 'cold brew coffee', count: 1 },
      { keyword: 'brew coffee', count: 1 },
    ]);

    expect(gaps).toEqual([
      { keyword: 'cold coffee', derivedFrom: 'cold brew coffee', type: 'variation' },
      { keyword: 'cold brew', derivedFrom: 'cold brew coffee', type: 'variation' },
      { keyword: 'coffee', derivedFrom: 'brew coffee', type: 'variation' },
    ]);
  });
});

describe('generateTopicClusters', () => {
  it('groups pages by similar primaries or shared secondaries', () => {
    const clusters = generateTopicClusters([
      makeEntry('1', 'coffee brewing', ['grind size']),
      makeEntry('2', 'coffee brewing guide'),
      makeEntry('3', 'bean storage', ['grind size']),
      makeEntry('4', 'garden tools'),
    ]);

    expect(clusters[0].mainTopic).toBe('coffee brewing');
    expect(clusters[0].supportingPages.map(page => page.documentId)).toEqual(['2', '3']);
    expect(clusters.some(cluster => cluster.mainTopic === 'garden tools')).toBe(false);
  });
});
