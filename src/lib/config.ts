import { z } from 'zod';
import stopWords from '../../data/stop-words.json';
import transitionWords from '../../data/transition-words.json';
import nonComplexWords from '../../data/non-complex-words.json';
import toneData from '../../data/tone-indicators.json';
import schemaRuleData from '../../data/schema-rules.json';
import intentPatternData from '../../data/intent-patterns.json';

const percentage = z.number().min(0).max(100);

const DensityConfigSchema = z.object({
  optimalMin: z.number().nonnegative().default(0.5),
  optimalMax: z.number().positive().default(3.0),
  underuse: z.number().nonnegative().default(0.1),
  severeOveruse: z.number().positive().default(5.0),
  competitiveIdealMin: z.number().nonnegative().default(0.5),
  competitiveIdealMax: z.number().positive().default(2.5),
  shortContentWords: z.number().int().nonnegative().default(300),
  shortContentMinFactor: z.number().positive().default(0.8),
  shortContentMaxFactor: z.number().positive().default(1.2),
  secondaryFactor: z.number().positive().default(0.7),
});

export const AnalyzerConfigSchema = z.object({
  density: DensityConfigSchema.default({}),
  cannibalizationThreshold: percentage.default(70),
  clusterSimilarityThreshold: percentage.default(40),
  passiveVoiceThreshold: percentage.default(10),
  transitionWordsThreshold: percentage.default(30),
  complexWordsThreshold: percentage.default(10),
  longParagraphWords: z.number().int().positive().default(100),
  naturalUsageMaxForcedPercentage: percentage.default(30),
  sufficientUsageMaxPosition: percentage.default(30),
  sufficientUsageMinSpread: z.number().min(0).max(1).default(0.1),
});

export type AnalyzerConfig = z.infer<typeof AnalyzerConfigSchema>;

export function resolveConfig(input: unknown = {}): AnalyzerConfig {
  return AnalyzerConfigSchema.parse(input);
}

export const DEFAULT_CONFIG: AnalyzerConfig = resolveConfig();

const RangeSchema = z.object({ min: z.number(), max: z.number(), ideal: z.number() });

const WordListsSchema = z.object({
  stopWords: z.array(z.string()),
  transitionWords: z.record(z.array(z.string())),
  nonComplexWords: z.record(z.array(z.string())),
  toneIndicators: z.record(z.array(z.string())),
  educationTargets: z.record(RangeSchema),
  industryTones: z.record(z.array(z.string())),
});

export type WordLists = z.infer<typeof WordListsSchema>;

const PropertyRuleSchema = z.object({
  required: z.array(z.string()),
  recommended: z.array(z.string()),
});

const SchemaRulesSchema = z.object({
  typeRules: z.record(PropertyRuleSchema),
  defaultRule: PropertyRuleSchema,
  genericallyValidatedTypes: z.array(z.string()),
  localBusinessSubtypes: z.array(z.string()),
  typeHierarchy: z.record(z.array(z.string())),
  offerAvailability: z.array(z.string()),
  addressRequired: z.array(z.string()),
});

const WeightedPatternSchema = z.object({ pattern: z.string(), weight: z.number().positive() });
const IntentWeightsSchema = z.object({
  informational: z.number().optional(),
  transactional: z.number().optional(),
  navigational: z.number().optional(),
  commercial: z.number().optional(),
});
const perIntent = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({ informational: schema, transactional: schema, navigational: schema, commercial: schema });

const IntentRulesSchema = z.object({
  keywordPatterns: perIntent(z.array(WeightedPatternSchema)),
  postTypePriors: z.record(IntentWeightsSchema),
  brandPattern: z.string(),
  brandBoost: z.number(),
  productTerms: z.array(z.string()),
  productTermBoost: IntentWeightsSchema,
  markerWeights: perIntent(z.record(z.number())).extend({ common: z.record(z.number()) }),
});

export type PropertyRule = z.infer<typeof PropertyRuleSchema>;
export type SchemaRules = z.infer<typeof SchemaRulesSchema>;
export type IntentRules = z.infer<typeof IntentRulesSchema>;
export type IntentWeights = z.infer<typeof IntentWeightsSchema>;

export const DEFAULT_WORD_LISTS: WordLists = WordListsSchema.parse({
  stopWords,
  transitionWords,
  nonComplexWords,
  toneIndicators: toneData.toneIndicators,
  educationTargets: toneData.educationTargets,
  industryTones: toneData.industryTones,
});

export const DEFAULT_SCHEMA_RULES: SchemaRules = SchemaRulesSchema.parse(schemaRuleData);

export const DEFAULT_INTENT_RULES: IntentRules = IntentRulesSchema.parse(intentPatternData);

/**
 * Swap one or more word lists (for another locale or a test) while keeping
 * the defaults for everything not supplied.
 */
export function resolveWordLists(overrides: Partial<WordLists> = {}): WordLists {
  return WordListsSchema.parse({ ...DEFAULT_WORD_LISTS, ...overrides });
}

export function resolveSchemaRules(overrides: Partial<SchemaRules> = {}): SchemaRules {
  return SchemaRulesSchema.parse({ ...DEFAULT_SCHEMA_RULES, ...overrides });
}

export function resolveIntentRules(overrides: Partial<IntentRules> = {}): IntentRules {
  return IntentRulesSchema.parse({ ...DEFAULT_INTENT_RULES, ...overrides });
}
