import { z } from 'zod';
import {
  resolveConfig,
  resolveIntentRules,
  resolveSchemaRules,
  resolveWordLists,
  type AnalyzerConfig,
  type IntentRules,
  type SchemaRules,
  type WordLists,
} from '../config';
import { buildDocument, stripTags, type Document, type DocumentResult, type HtmlParser } from '../document/document';
import {
  AnalysisOutcome,
  AnalysisResult,
  AudienceMatch,
  ContentExtraction,
  DocumentReport,
  IntentProfile,
  KeywordMapEntry,
  KeywordReport,
  ReadabilityAnalysis,
  SchemaReport,
  SiteKeywordReport,
  ToneAnalysis,
  getGrade,
} from '../types';
import { analyzeTone, compareWithTargetAudience } from './audience';
import {
  analyzeKeywordCoverage,
  detectCannibalizationIssues,
  findConflictsForDocument,
  generateTopicClusters,
} from './cannibalization';
import { extractContent } from './content-extractor';
import { analyzeIntent } from './intent-classifier';
import { analyzeKeywordSet, normalizeKeywordInput } from './keyword-analyzer';
import { analyzeReadability } from './readability';
import { extractSchemaData, extractSchemaTypes } from './schema-extractor';
import { buildSchemaSuggestions } from './schema-suggestions';
import { findLocalBusinessSchema, validateLocalBusinessSchema, validateSchemas } from './schema-validator';
import { buildReportCategories, calculateOverallScore } from './scoring';
import { countWords } from './text';

const DEFAULT_LANGUAGE = 'en';

export const TargetAudienceSchema = z.object({
  educationLevel: z.string().default('general'),
  industry: z.string().default('general'),
  technicalProficiency: z.string().default('medium'),
});

export const DocumentRequestSchema = z.object({
  html: z.string(),
  primaryKeyword: z.string().default(''),
  secondaryKeywords: z.array(z.string()).default([]),
  postType: z.string().default('post'),
  language: z.string().optional(),
  url: z.string().default(''),
  title: z.string().optional(),
  audience: TargetAudienceSchema.optional(),
});

export const KeywordMapEntrySchema = z.object({
  documentId: z.string().min(1),
  title: z.string().default(''),
  url: z.string().default(''),
  primaryKeyword: z.string(),
  secondaryKeywords: z.array(z.string()).default([]),
  categories: z.array(z.string()).default([]),
});

export const SiteRequestSchema = z.object({
  entries: z.array(KeywordMapEntrySchema),
});

export type DocumentRequest = z.input<typeof DocumentRequestSchema>;
export type SiteRequest = z.input<typeof SiteRequestSchema>;

export interface AnalysisEngineOptions {
  /** Partial analyzer config; validated with the config schema. */
  config?: unknown;
  wordLists?: Partial<WordLists>;
  schemaRules?: Partial<SchemaRules>;
  intentRules?: Partial<IntentRules>;
  parse?: HtmlParser;
}

export interface AnalysisEngine {
  analyzeDocument(request: DocumentRequest): Promise<AnalysisResult>;
  analyzeSite(request: SiteRequest): Promise<SiteKeywordReport>;
}

interface EngineDeps {
  config: AnalyzerConfig;
  wordLists: WordLists;
  schemaRules: SchemaRules;
  intentRules: IntentRules;
  parse?: HtmlParser;
}

export function createAnalysisEngine(options: AnalysisEngineOptions = {}): AnalysisEngine {
  const deps: EngineDeps = {
    config: resolveConfig(options.config ?? {}),
    wordLists: resolveWordLists(options.wordLists),
    schemaRules: resolveSchemaRules(options.schemaRules),
    intentRules: resolveIntentRules(options.intentRules),
    parse: options.parse,
  };

  return {
    analyzeDocument: async request => analyzeDocument(DocumentRequestSchema.parse(request), deps),
    analyzeSite: async request => analyzeSite(SiteRequestSchema.parse(request).entries, deps),
  };
}

type ParsedDocumentRequest = z.output<typeof DocumentRequestSchema>;

async function analyzeDocument(request: ParsedDocumentRequest, deps: EngineDeps): Promise<AnalysisResult> {
  const source = buildDocument(request.html, { baseUrl: request.url, parse: deps.parse });
  const extraction = extractContent(source);
  const document = source.outcome === 'ok' ? source.document : null;

  const title = request.title ?? (document ? document.title : titleFromHtml(request.html));
  const language = request.language || document?.language || DEFAULT_LANGUAGE;
  const hasKeyword = request.primaryKeyword.trim() !== '';

  const [keywords, text, schema, intent] = await Promise.all([
    hasKeyword ? runKeywordAnalysis(request, title, source, extraction, deps) : Promise.resolve(null),
    runTextAnalysis(extraction, language, request.audience ?? null, deps),
    runSchemaAnalysis(document, request.postType, deps),
    hasKeyword ? runIntentAnalysis(request, extraction, deps) : Promise.resolve(null),
  ]);

  const categories = buildReportCategories({
    keywords,
    readability: text.readability,
    audience: text.audience,
    schema,
    intent,
  });
  const overallScore = calculateOverallScore(categories);

  const report: DocumentReport = {
    url: request.url,
    title,
    metaDescription: document?.metaDescription ?? '',
    language,
    postType: request.postType,
    content: {
      paragraphCount: extraction.paragraphs.length,
      headingCount: extraction.headings.length,
      wordCount: countWords(extraction.text),
      fallbackUsed: extraction.fallbackUsed,
    },
    keywords,
    readability: text.readability,
    tone: text.tone,
    audience: text.audience,
    schema,
    intent,
    categories,
    overallScore,
    overallGrade: getGrade(overallScore),
  };

  return { outcome: resolveOutcome(source, hasKeyword), report };
}

function resolveOutcome(source: DocumentResult, hasKeyword: boolean): AnalysisOutcome {
  if (source.outcome === 'empty' || !hasKeyword) return 'empty';
  return source.outcome;
}

async function runKeywordAnalysis(
  request: ParsedDocumentRequest,
  title: string,
  source: DocumentResult,
  extraction: ContentExtraction,
  deps: EngineDeps,
): Promise<KeywordReport> {
  return analyzeKeywordSet(
    { primaryKeyword: request.primaryKeyword, secondaryKeywords: request.secondaryKeywords, title },
    { source, extraction },
    deps.config,
    deps.wordLists.stopWords,
  );
}

async function runTextAnalysis(
  extraction: ContentExtraction,
  language: string,
  audience: z.output<typeof TargetAudienceSchema> | null,
  deps: EngineDeps,
): Promise<{ readability: ReadabilityAnalysis; tone: ToneAnalysis; audience: AudienceMatch | null }> {
  // Paragraph text only: headings carry no sentence punctuation.
  const body = extraction.paragraphs.join('\n');
  const readability = analyzeReadability(body, extraction.paragraphs, language, deps.config, deps.wordLists);
  const tone = analyzeTone(body, deps.wordLists);
  return {
    readability,
    tone,
    audience: audience ? compareWithTargetAudience(readability, tone, audience, deps.wordLists) : null,
  };
}

async function runSchemaAnalysis(document: Document | null, postType: string, deps: EngineDeps): Promise<SchemaReport> {
  const entities = document ? extractSchemaData(document) : [];
  const types = extractSchemaTypes(entities);
  const localBusiness = findLocalBusinessSchema(entities, deps.schemaRules);

  return {
    entities,
    types,
    validation: validateSchemas(entities, deps.schemaRules),
    localBusiness: localBusiness ? validateLocalBusinessSchema(localBusiness, deps.schemaRules) : null,
    suggestions: document
      ? buildSchemaSuggestions(document, postType, types)
      : { suggestedTypes: [], presentTypes: types, missingTypes: [] },
  };
}

async function runIntentAnalysis(
  request: ParsedDocumentRequest,
  extraction: ContentExtraction,
  deps: EngineDeps,
): Promise<IntentProfile> {
  return analyzeIntent(
    normalizeKeywordInput(request.primaryKeyword),
    request.postType,
    request.html,
    extraction.text,
    deps.intentRules,
  );
}

async function analyzeSite(entries: KeywordMapEntry[], deps: EngineDeps): Promise<SiteKeywordReport> {
  const stopWords = deps.wordLists.stopWords;
  const issues = detectCannibalizationIssues(entries, deps.config, stopWords);

  const conflictsByDocument: Record<string, SiteKeywordReport['issues']> = {};
  for (const entry of entries) {
    const conflicts = findConflictsForDocument(entry.documentId, issues);
    if (conflicts.length > 0) conflictsByDocument[entry.documentId] = conflicts;
  }

  return {
    documentCount: entries.length,
    issues,
    conflictsByDocument,
    coverage: analyzeKeywordCoverage(entries),
    clusters: generateTopicClusters(entries, deps.config, stopWords),
  };
}

function titleFromHtml(html: string): string {
  const match = html.match(/<title\b[^>]*>([\s\S]*?)<\/title>/i);
  return match ? stripTags(match[1]) : '';
}
