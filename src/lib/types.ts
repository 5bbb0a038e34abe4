export type HeadingTag = 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6';

export const HEADING_TAGS: readonly HeadingTag[] = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

export type AnalysisOutcome = 'ok' | 'empty' | 'parse_failure';

// Content extraction

export interface HeadingBlock {
  level: number;
  text: string;
}

export type ContentBlock =
  | { type: 'heading'; level: number; text: string }
  | { type: 'paragraph'; text: string };

export interface ContentExtraction {
  blocks: ContentBlock[];
  paragraphs: string[];
  headings: HeadingBlock[];
  text: string;
  fallbackUsed: boolean;
}

// Keyword analysis

export type DensityStatus = 'severely_underused' | 'underused' | 'optimal' | 'overused' | 'severely_overused';

export interface HeadingLevelUsage {
  count: number;
  keywordMatches: number;
  texts: string[];
}

export interface KeywordStructure {
  headings: Record<HeadingTag, HeadingLevelUsage>;
  paragraphs: { total: number; withKeyword: number; distributionPercentage: number };
  firstParagraph: { hasKeyword: boolean };
  meta: { titleHasKeyword: boolean; descriptionHasKeyword: boolean };
  urlHasKeyword: boolean;
}

export interface KeywordHeadingsSummary {
  count: number;
  levels: Partial<Record<HeadingTag, number>>;
  totalHeadings: number;
}

export interface NaturalUsage {
  stuffingIndicators: number;
  appearsNatural: boolean;
  forcedUsagePercentage: number;
}

export interface KeywordProximity {
  occurrences: number;
  averageDistance: number;
  distributionScore: number;
}

export interface SemanticUsage {
  variations: Record<string, number>;
  contexts: string[];
  naturalUsage: NaturalUsage;
  proximity: KeywordProximity;
}

export interface CompetitiveMetrics {
  densityStatus: 'underdensity' | 'optimal' | 'overdensity';
  idealDensityRange: { min: number; max: number };
  recommendedCount: number;
  countStatus: 'insufficient' | 'optimal' | 'excessive';
  countRatio: number;
}

export interface KeywordSentenceReadability {
  averageSentenceLength: number;
  score: number;
  status: 'poor' | 'average' | 'good';
}

export interface TermFrequency {
  term: string;
  count: number;
}

export interface InContentCannibalization {
  primaryKeywordCount: number;
  potentialCompetingKeywords: TermFrequency[];
  hasCannibalizationRisk: boolean;
}

export interface KeywordAnalysis {
  keyword: string;
  count: number;
  wordCount: number;
  density: number;
  densityStatus: DensityStatus;
  positionPercent: number | null;
  distributionSpread: number;
  contextualScore: number;
  hasSufficientUsage: boolean;
  variations: Record<string, number>;
  headings: KeywordHeadingsSummary;
  inFirstParagraph: boolean;
  structure: KeywordStructure | null;
  semantic: SemanticUsage;
  competitive: CompetitiveMetrics;
  sentenceReadability: KeywordSentenceReadability;
  lsiKeywords: TermFrequency[];
  cannibalization: InContentCannibalization;
  fallbackUsed: boolean;
}

export interface KeywordDensityAnalysis {
  keyword: string;
  isPrimary: boolean;
  count: number;
  density: number;
  status: DensityStatus;
  optimalRange: { min: number; max: number };
  expectedCount: { min: number; max: number };
  adjustmentNeeded: number;
  score: number;
  structuralUsage: StructuralKeywordUsage;
  distributionSpread: number;
  variations: Record<string, number>;
}

export interface StructuralKeywordUsage {
  inTitle: boolean;
  inMetaDescription: boolean;
  inUrl: boolean;
  inHeadings: boolean;
  inFirstParagraph: boolean;
}

export type DensityBalanceStatus =
  | 'incomplete'
  | 'secondary_dominant'
  | 'well_balanced'
  | 'primary_heavy'
  | 'primary_dominant';

export interface DensityBalance {
  status: DensityBalanceStatus;
  ratio: number;
  score: number;
  message: string;
}

export interface TitleKeywordUsage {
  title: string;
  hasKeyword: boolean;
  atBeginning: boolean;
  positionPercentage: number | null;
  score: number;
  meetsThreshold: boolean;
}

export interface HeadingKeywordMatch {
  text: string;
  hasKeyword: boolean;
  keywordsFound: string[];
}

export interface HeadingLevelKeywordUsage {
  total: number;
  withKeywords: number;
  keywordCoverage: Record<string, number>;
  headings: HeadingKeywordMatch[];
}

export interface HeadingsKeywordUsage {
  levels: Partial<Record<HeadingTag, HeadingLevelKeywordUsage>>;
  totalHeadings: number;
  headingsWithKeywords: number;
  coveragePercentage: number;
  coverageScore: number;
}

export interface FirstParagraphUsage {
  text: string;
  hasPrimaryKeyword: boolean;
  wordCount: number;
  score: number;
  meetsThreshold: boolean;
}

export type DistributionQuality = 'excellent' | 'good' | 'fair' | 'poor';

export interface DistributionMetrics {
  score: number;
  quality: DistributionQuality;
  coveragePercentage: number;
}

export interface KeywordDistribution extends DistributionMetrics {
  occurrences: number;
  positions: number[];
}

export interface KeywordsDistribution {
  keywords: Record<string, KeywordDistribution>;
  averageScore: number;
}

export interface SectionStats {
  paragraphs: number;
  words: number;
  keywordsFound: number;
  breakdown: Record<string, number>;
  density: number;
}

export interface SectionUsage {
  sections: { introduction: SectionStats; body: SectionStats; conclusion: SectionStats } | null;
  sectionCoverageScore: number;
}

export interface ImportantElementsUsage {
  headings: boolean;
  firstParagraph: boolean;
  lastParagraph: boolean;
}

export interface RelatedKeywordAnalysis {
  keyword: string;
  count: number;
  isPresent: boolean;
  density: number;
  distributionScore: number;
  contextScore: number;
  proximityToPrimary: number;
  inImportantElements: ImportantElementsUsage;
}

export interface KeywordPresence {
  hasAnyKeyword: boolean;
  keywordsFound: number;
  keywordsMissing: number;
  details: Record<string, boolean>;
}

// Cross-document keyword analysis

export interface KeywordMapEntry {
  documentId: string;
  title: string;
  url: string;
  primaryKeyword: string;
  secondaryKeywords: string[];
  categories: string[];
}

export type KeywordRole = 'primary' | 'secondary';

export interface ConflictingPage {
  documentId: string;
  title: string;
  url: string;
  role?: KeywordRole;
  keyword?: string;
}

export type CannibalizationIssue =
  | {
      type: 'primary_keyword_conflict';
      severity: 'high';
      keyword: string;
      conflictingPages: ConflictingPage[];
      recommendation: string;
    }
  | {
      type: 'keyword_overuse';
      severity: 'medium';
      keyword: string;
      conflictingPages: ConflictingPage[];
      recommendation: string;
    }
  | {
      type: 'semantic_similarity';
      severity: 'medium';
      keywords: [string, string];
      similarity: number;
      conflictingPages: ConflictingPage[];
      recommendation: string;
    };

export interface KeywordCount {
  keyword: string;
  count: number;
}

export interface KeywordGap {
  keyword: string;
  derivedFrom: string;
  type: 'variation';
}

export interface KeywordCoverage {
  totalKeywords: number;
  uniqueKeywords: number;
  diversityScore: number;
  mostUsed: KeywordCount[];
  overused: KeywordCount[];
  underused: KeywordCount[];
  gaps: KeywordGap[];
}

export interface TopicCluster {
  mainTopic: string;
  pillarPage: { documentId: string; title: string; url: string };
  supportingPages: { documentId: string; title: string; url: string; primaryKeyword: string }[];
  relatedKeywords: string[];
}

export interface SiteKeywordReport {
  documentCount: number;
  issues: CannibalizationIssue[];
  conflictsByDocument: Record<string, CannibalizationIssue[]>;
  coverage: KeywordCoverage;
  clusters: TopicCluster[];
}

// Readability

export type SentenceLengthBucket = 'very_short' | 'short' | 'medium' | 'long' | 'very_long' | 'extremely_long';

export interface SentenceLengthDistribution {
  counts: Record<SentenceLengthBucket, number>;
  percentages: Partial<Record<SentenceLengthBucket, number>>;
  totalSentences: number;
  longSentences: string[];
}

export interface ParagraphStructure {
  count: number;
  averageWords: number;
  longParagraphs: number;
  longParagraphExamples: string[];
  distribution: Record<string, number>;
}

export interface PassiveVoiceAnalysis {
  count: number;
  percentage: number;
  examples: string[];
  exceedsThreshold: boolean;
}

export interface TransitionWordAnalysis {
  sentencesWithTransitions: number;
  percentage: number;
  meetsThreshold: boolean;
}

export interface ReadabilityAnalysis {
  language: string;
  isCjk: boolean;
  wordCount: number;
  sentenceCount: number;
  syllableCount: number;
  complexWordCount: number;
  complexWordsPercentage: number;
  exceedsComplexWordsThreshold: boolean;
  avgWordsPerSentence: number;
  avgSyllablesPerWord: number;
  fleschReadingEase: number;
  gradeLevel: string;
  smogIndex: number;
  colemanLiauIndex: number;
  sentenceLengths: SentenceLengthDistribution;
  paragraphs: ParagraphStructure;
  passiveVoice: PassiveVoiceAnalysis;
  transitionWords: TransitionWordAnalysis;
}

// Tone and audience

export interface SentenceCharacteristics {
  avgSentenceLength: number;
  questionRatio: number;
  exclamationRatio: number;
  firstPersonRatio: number;
  secondPersonRatio: number;
}

export interface ToneAnalysis {
  toneScores: Record<string, number>;
  dominantTones: string[];
  sentenceCharacteristics: SentenceCharacteristics;
}

export interface TargetAudience {
  educationLevel: string;
  industry: string;
  technicalProficiency: string;
}

export interface ReadingLevelMatch {
  score: number;
  ideal: boolean;
  tooComplex: boolean;
  tooSimple: boolean;
  actualScore: number;
  targetRange: { min: number; max: number; ideal: number };
}

export interface ToneMatch {
  score: number;
  matchingTones: string[];
  preferredTones: string[];
  dominantTones: string[];
  isConversational: boolean;
}

export interface TechnicalLevelMatch {
  score: number;
  appropriate: boolean;
  tooTechnical: boolean;
  notTechnicalEnough: boolean;
  complexWords: { actual: number; target: number; matchScore: number };
  technicalTone: { actual: number; target: number; matchScore: number };
}

export interface AudienceMatch {
  readingLevel: ReadingLevelMatch;
  tone: ToneMatch;
  technicalLevel: TechnicalLevelMatch;
}

// Structured data

export type SchemaValue = string | number | boolean | null | SchemaValue[] | SchemaObject;

export interface SchemaObject {
  [key: string]: SchemaValue;
}

export type SchemaSource = 'json-ld' | 'microdata' | 'rdfa';

export interface SchemaEntity {
  type: string | string[];
  source: SchemaSource;
  properties: SchemaObject;
}

export interface ValidationResult {
  valid: boolean;
  issues: string[];
  warnings: string[];
}

export interface IndexedSchemaMessage {
  schemaIndex: number;
  schemaType: string;
  message: string;
}

export interface SchemaValidationSummary {
  validSchemas: number;
  invalidSchemas: number;
  issues: IndexedSchemaMessage[];
  warnings: IndexedSchemaMessage[];
  overallScore: number;
  results: ValidationResult[];
}

export interface LocalBusinessValidation {
  valid: boolean;
  completeness: number;
  missingRequired: string[];
  missingRecommended: string[];
  incompleteProperties: string[];
  schemaType: string;
}

export interface SchemaSuggestions {
  suggestedTypes: string[];
  presentTypes: string[];
  missingTypes: string[];
}

export interface SchemaReport {
  entities: SchemaEntity[];
  types: string[];
  validation: SchemaValidationSummary;
  localBusiness: LocalBusinessValidation | null;
  suggestions: SchemaSuggestions;
}

// Searcher intent

export type Intent = 'informational' | 'transactional' | 'navigational' | 'commercial';

export type DetectedIntent = Exclude<Intent, 'commercial'>;

export type IntentScores = Record<Intent, number>;

export type IntentMarkers = Record<string, boolean>;

export interface IntentProfile {
  keyword: string;
  detectedIntent: DetectedIntent;
  scores: IntentScores;
  markers: IntentMarkers;
  satisfactionScore: number;
}

// Reports

export interface CategoryScore {
  score: number;
  grade: string;
  weight: number;
  findings: Finding[];
  recommendations: string[];
}

export interface Finding {
  check: string;
  status: 'pass' | 'partial' | 'fail';
  details: string;
  points: number;
  maxPoints: number;
}

export interface ReportCategories {
  keywordUsage: CategoryScore;
  readability: CategoryScore;
  structuredData: CategoryScore;
  intent: CategoryScore;
}

export interface KeywordReport {
  primary: KeywordAnalysis;
  secondary: KeywordAnalysis[];
  density: KeywordDensityAnalysis[];
  balance: DensityBalance;
  title: TitleKeywordUsage;
  headings: HeadingsKeywordUsage;
  firstParagraph: FirstParagraphUsage;
  distribution: KeywordsDistribution;
  sections: SectionUsage;
  related: RelatedKeywordAnalysis[];
}

export interface ContentSummary {
  paragraphCount: number;
  headingCount: number;
  wordCount: number;
  fallbackUsed: boolean;
}

export interface DocumentReport {
  url: string;
  title: string;
  metaDescription: string;
  language: string;
  postType: string;
  content: ContentSummary;
  keywords: KeywordReport | null;
  readability: ReadabilityAnalysis;
  tone: ToneAnalysis;
  audience: AudienceMatch | null;
  schema: SchemaReport;
  intent: IntentProfile | null;
  categories: ReportCategories;
  overallScore: number;
  overallGrade: string;
}

export interface AnalysisResult {
  outcome: AnalysisOutcome;
  report: DocumentReport;
}

export function getGrade(score: number): string {
  if (score >= 90) return 'A+';
  if (score >= 80) return 'A';
  if (score >= 70) return 'B';
  if (score >= 60) return 'C';
  if (score >= 50) return 'D';
  return 'F';
}

export const REPORT_WEIGHTS: Record<keyof ReportCategories, number> = {
  keywordUsage: 0.35,
  readability: 0.25,
  structuredData: 0.2,
  intent: 0.2,
};

// Half away from zero, so -2.5 rounds to -3 like 2.5 rounds to 3.
export function round(value: number, precision = 2): number {
  if (value === 0 || !Number.isFinite(value)) return value === 0 ? 0 : value;
  const factor = 10 ** precision;
  return (Math.sign(value) * Math.round(Math.abs(value) * factor * (1 + Number.EPSILON))) / factor;
}
