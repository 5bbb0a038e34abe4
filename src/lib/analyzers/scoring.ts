import {
  AudienceMatch,
  CategoryScore,
  DensityStatus,
  Finding,
  IntentProfile,
  KeywordReport,
  ReadabilityAnalysis,
  REPORT_WEIGHTS,
  ReportCategories,
  SchemaReport,
  getGrade,
} from '../types';

export interface ScoringInput {
  keywords: KeywordReport | null;
  readability: ReadabilityAnalysis;
  audience: AudienceMatch | null;
  schema: SchemaReport;
  intent: IntentProfile | null;
}

const MIN_WORDS = 300;
const SHORT_WORDS = 100;
const MAX_SENTENCE_WORDS = 20;

const DENSITY_POINTS: Record<DensityStatus, { status: Finding['status']; points: number }> = {
  optimal: { status: 'pass', points: 25 },
  underused: { status: 'partial', points: 12 },
  overused: { status: 'partial', points: 12 },
  severely_underused: { status: 'fail', points: 0 },
  severely_overused: { status: 'fail', points: 0 },
};

const MARKER_ADVICE: Record<string, string> = {
  hasDefinition: 'Define the topic early in plain terms so searchers get an answer in the first lines.',
  hasExamples: 'Add concrete examples that illustrate the main points.',
  hasStepByStep: 'Break instructions into a numbered list of steps.',
  hasCallToAction: 'Add a clear call to action such as a buy, order or sign-up button.',
  hasPricing: 'Show pricing on the page so buyers do not have to look for it.',
  hasTrustSignals: 'Mention guarantees, warranties or return policies to build purchase confidence.',
  hasDirectLinks: 'Link directly to the official destination (login, account, homepage) searchers expect.',
  hasContactInfo: 'Include contact details such as an email address or phone number.',
  hasComparison: 'Compare the options side by side, including alternatives.',
  hasReviews: 'Include reviews, ratings or testimonials.',
  hasProsCons: 'List pros and cons to help readers decide.',
};

function toCategory(findings: Finding[], recommendations: string[], weight: number): CategoryScore {
  const totalPoints = findings.reduce((s, f) => s + f.points, 0);
  const maxPoints = findings.reduce((s, f) => s + f.maxPoints, 0);
  const score = maxPoints > 0 ? Math.round((totalPoints / maxPoints) * 100) : 0;

  return { score, grade: getGrade(score), weight, findings, recommendations };
}

export function scoreKeywordUsage(keywords: KeywordReport | null): CategoryScore {
  const findings: Finding[] = [];
  const recommendations: string[] = [];

  if (!keywords) {
    findings.push({
      check: 'Primary keyword set',
      status: 'fail',
      details: 'No primary keyword was supplied',
      points: 0,
      maxPoints: 100,
    });
    recommendations.push('Choose a primary keyword for this page so its usage can be measured.');
    return toCategory(findings, recommendations, REPORT_WEIGHTS.keywordUsage);
  }

  const primary = keywords.primary;
  const primaryDensity = keywords.density.find(d => d.isPrimary);

  // Density
  if (primaryDensity) {
    const { status, points } = DENSITY_POINTS[primaryDensity.status];
    findings.push({
      check: 'Primary keyword density',
      status,
      details: `"${primary.keyword}" appears ${primaryDensity.count} time(s), ${primaryDensity.density}% density (optimal ${primaryDensity.optimalRange.min}-${primaryDensity.optimalRange.max}%)`,
      points,
      maxPoints: 25,
    });
    if (primaryDensity.adjustmentNeeded > 0) {
      const verb = primaryDensity.status.endsWith('underused') ? 'Add' : 'Remove';
      recommendations.push(
        `${verb} about ${primaryDensity.adjustmentNeeded} mention(s) of "${primary.keyword}" to reach the optimal density range.`,
      );
    }
  }

  // Title
  const title = keywords.title;
  findings.push({
    check: 'Keyword in title',
    status: title.atBeginning ? 'pass' : title.hasKeyword ? 'partial' : 'fail',
    details: title.hasKeyword
      ? `Title contains the keyword${title.atBeginning ? ' at the beginning' : ` at ${title.positionPercentage}% of its length`}`
      : 'Title does not contain the keyword',
    points: Math.round(title.score * 15),
    maxPoints: 15,
  });
  if (!title.hasKeyword) recommendations.push(`Include "${primary.keyword}" in the page title, ideally near the start.`);
  else if (!title.atBeginning) recommendations.push('Move the primary keyword closer to the start of the title.');

  // First paragraph
  const first = keywords.firstParagraph;
  findings.push({
    check: 'Keyword in first paragraph',
    status: first.hasPrimaryKeyword ? 'pass' : 'fail',
    details: first.hasPrimaryKeyword ? 'Opening paragraph mentions the keyword' : 'Opening paragraph does not mention the keyword',
    points: first.hasPrimaryKeyword ? 15 : 0,
    maxPoints: 15,
  });
  if (!first.hasPrimaryKeyword) recommendations.push('Mention the primary keyword in the first paragraph.');

  // Headings
  const inHeadings = primary.headings.count > 0;
  findings.push({
    check: 'Keyword in headings',
    status: inHeadings ? 'pass' : 'fail',
    details: `${primary.headings.count} of ${primary.headings.totalHeadings} heading(s) contain the keyword`,
    points: inHeadings ? 15 : 0,
    maxPoints: 15,
  });
  if (!inHeadings) recommendations.push('Use the primary keyword in at least one subheading.');

  // Distribution
  const distribution = keywords.distribution.keywords[primary.keyword];
  const quality = distribution?.quality ?? 'poor';
  const spread = quality === 'excellent' || quality === 'good';
  findings.push({
    check: 'Keyword distribution',
    status: spread ? 'pass' : quality === 'fair' ? 'partial' : 'fail',
    details: `Distribution quality: ${quality}`,
    points: spread ? 15 : quality === 'fair' ? 8 : 0,
    maxPoints: 15,
  });
  if (!spread) recommendations.push('Spread keyword mentions evenly through the introduction, body and conclusion.');

  // Balance, only meaningful with secondary keywords
  const balance = keywords.balance;
  if (balance.status !== 'incomplete') {
    const balanced = balance.status === 'well_balanced';
    findings.push({
      check: 'Primary and secondary keyword balance',
      status: balanced ? 'pass' : balance.status === 'primary_dominant' ? 'fail' : 'partial',
      details: `Primary to secondary density ratio ${balance.ratio}`,
      points: balanced ? 15 : balance.status === 'primary_dominant' ? 0 : 8,
      maxPoints: 15,
    });
    if (!balanced) recommendations.push(balance.message);
  }

  return toCategory(findings, recommendations, REPORT_WEIGHTS.keywordUsage);
}

export function scoreReadability(readability: ReadabilityAnalysis, audience: AudienceMatch | null = null): CategoryScore {
  const findings: Finding[] = [];
  const recommendations: string[] = [];
  const words = readability.wordCount;

  findings.push({
    check: 'Content length',
    status: words >= MIN_WORDS ? 'pass' : words >= SHORT_WORDS ? 'partial' : 'fail',
    details: `${words} word(s)`,
    points: words >= MIN_WORDS ? 15 : words >= SHORT_WORDS ? 8 : 0,
    maxPoints: 15,
  });
  if (words < MIN_WORDS) recommendations.push(`Expand the content to at least ${MIN_WORDS} words to cover the topic in depth.`);

  const avg = readability.avgWordsPerSentence;
  const hasSentences = readability.sentenceCount > 0;
  findings.push({
    check: 'Sentence length',
    status: hasSentences && avg <= MAX_SENTENCE_WORDS ? 'pass' : hasSentences && avg <= 25 ? 'partial' : 'fail',
    details: `Average sentence: ${avg} word(s)`,
    points: hasSentences && avg <= MAX_SENTENCE_WORDS ? 15 : hasSentences && avg <= 25 ? 8 : 0,
    maxPoints: 15,
  });
  if (hasSentences && avg > MAX_SENTENCE_WORDS) {
    recommendations.push(`Shorten sentences to an average of ${MAX_SENTENCE_WORDS} words or fewer.`);
  }

  const longParagraphs = readability.paragraphs.longParagraphs;
  findings.push({
    check: 'Paragraph length',
    status: longParagraphs === 0 ? 'pass' : longParagraphs <= 2 ? 'partial' : 'fail',
    details: `${longParagraphs} overly long paragraph(s)`,
    points: longParagraphs === 0 ? 15 : longParagraphs <= 2 ? 8 : 0,
    maxPoints: 15,
  });
  if (longParagraphs > 0) recommendations.push('Split long paragraphs so each one carries a single idea.');

  // Syllable-based checks do not apply to CJK text
  if (!readability.isCjk) {
    const ease = readability.fleschReadingEase;
    findings.push({
      check: 'Reading ease',
      status: ease >= 60 ? 'pass' : ease >= 30 ? 'partial' : 'fail',
      details: `Flesch reading ease ${ease} (${readability.gradeLevel})`,
      points: ease >= 60 ? 20 : ease >= 30 ? 10 : 0,
      maxPoints: 20,
    });
    if (ease < 60) recommendations.push('Use shorter words and sentences to raise the reading ease score above 60.');

    const passive = readability.passiveVoice;
    findings.push({
      check: 'Passive voice',
      status: passive.exceedsThreshold ? 'fail' : 'pass',
      details: `${passive.percentage}% of sentences use passive voice`,
      points: passive.exceedsThreshold ? 0 : 10,
      maxPoints: 10,
    });
    if (passive.exceedsThreshold) recommendations.push('Rewrite passive sentences in the active voice.');

    const transitions = readability.transitionWords;
    findings.push({
      check: 'Transition words',
      status: transitions.meetsThreshold ? 'pass' : transitions.percentage > 0 ? 'partial' : 'fail',
      details: `${transitions.percentage}% of sentences contain transition words`,
      points: transitions.meetsThreshold ? 10 : transitions.percentage > 0 ? 5 : 0,
      maxPoints: 10,
    });
    if (!transitions.meetsThreshold) recommendations.push('Connect sentences with transition words such as "however" or "for example".');

    findings.push({
      check: 'Complex words',
      status: readability.exceedsComplexWordsThreshold ? 'fail' : 'pass',
      details: `${readability.complexWordsPercentage}% complex words`,
      points: readability.exceedsComplexWordsThreshold ? 0 : 10,
      maxPoints: 10,
    });
    if (readability.exceedsComplexWordsThreshold) recommendations.push('Replace complex words with simpler alternatives.');
  }

  if (audience) {
    const fit = (audience.readingLevel.score + audience.tone.score + audience.technicalLevel.score) / 3;
    findings.push({
      check: 'Target audience fit',
      status: fit >= 0.7 ? 'pass' : fit >= 0.4 ? 'partial' : 'fail',
      details: `Reading level ${audience.readingLevel.score}, tone ${audience.tone.score}, technical level ${audience.technicalLevel.score}`,
      points: Math.round(fit * 15),
      maxPoints: 15,
    });
    if (audience.readingLevel.tooComplex) recommendations.push('Simplify the language for the target audience.');
    if (audience.readingLevel.tooSimple) recommendations.push('The content reads simpler than the target audience expects.');
    if (audience.technicalLevel.tooTechnical) recommendations.push('Reduce jargon or explain technical terms for this audience.');
  }

  return toCategory(findings, recommendations, REPORT_WEIGHTS.readability);
}

export function scoreStructuredData(schema: SchemaReport): CategoryScore {
  const findings: Finding[] = [];
  const recommendations: string[] = [];
  const count = schema.entities.length;

  findings.push({
    check: 'Structured data present',
    status: count > 0 ? 'pass' : 'fail',
    details: count > 0 ? `${count} schema item(s): ${schema.types.join(', ')}` : 'No JSON-LD, Microdata or RDFa found',
    points: count > 0 ? 25 : 0,
    maxPoints: 25,
  });

  if (count > 0) {
    const validation = schema.validation;
    findings.push({
      check: 'Schema validation',
      status: validation.invalidSchemas === 0 ? 'pass' : validation.validSchemas > 0 ? 'partial' : 'fail',
      details: `${validation.validSchemas} valid, ${validation.invalidSchemas} invalid`,
      points: Math.round((validation.overallScore / 100) * 25),
      maxPoints: 25,
    });
    for (const issue of validation.issues.slice(0, 3)) recommendations.push(`Fix ${issue.schemaType} schema: ${issue.message}`);

    findings.push({
      check: 'Schema warnings',
      status: validation.warnings.length === 0 ? 'pass' : 'partial',
      details: `${validation.warnings.length} warning(s)`,
      points: validation.warnings.length === 0 ? 10 : 5,
      maxPoints: 10,
    });
  }

  const { suggestedTypes, missingTypes } = schema.suggestions;
  if (suggestedTypes.length > 0) {
    const covered = suggestedTypes.length - missingTypes.length;
    findings.push({
      check: 'Suggested schema types',
      status: missingTypes.length === 0 ? 'pass' : covered > 0 ? 'partial' : 'fail',
      details: `${covered} of ${suggestedTypes.length} suggested type(s) present`,
      points: Math.round((covered / suggestedTypes.length) * 25),
      maxPoints: 25,
    });
    if (missingTypes.length > 0) recommendations.push(`Add schema markup for: ${missingTypes.join(', ')}.`);
  } else if (count === 0) {
    recommendations.push('Add JSON-LD structured data describing the page content.');
  }

  if (schema.localBusiness) {
    const business = schema.localBusiness;
    findings.push({
      check: 'Local business completeness',
      status: business.valid && business.completeness >= 80 ? 'pass' : business.completeness >= 50 ? 'partial' : 'fail',
      details: `${business.schemaType} schema is ${business.completeness}% complete`,
      points: Math.round((business.completeness / 100) * 15),
      maxPoints: 15,
    });
    if (business.missingRequired.length > 0) {
      recommendations.push(`Add required ${business.schemaType} properties: ${business.missingRequired.join(', ')}.`);
    }
  }

  return toCategory(findings, recommendations, REPORT_WEIGHTS.structuredData);
}

export function scoreIntent(intent: IntentProfile | null): CategoryScore {
  const findings: Finding[] = [];
  const recommendations: string[] = [];

  if (!intent) {
    findings.push({
      check: 'Search intent',
      status: 'fail',
      details: 'No keyword to classify',
      points: 0,
      maxPoints: 100,
    });
    return toCategory(findings, recommendations, REPORT_WEIGHTS.intent);
  }

  const satisfaction = intent.satisfactionScore;
  findings.push({
    check: 'Intent satisfaction',
    status: satisfaction >= 0.7 ? 'pass' : satisfaction >= 0.4 ? 'partial' : 'fail',
    details: `${intent.detectedIntent} intent, satisfaction ${satisfaction}`,
    points: Math.round(satisfaction * 60),
    maxPoints: 60,
  });

  const entries = Object.entries(intent.markers);
  const present = entries.filter(([, found]) => found).length;
  const ratio = entries.length > 0 ? present / entries.length : 0;
  findings.push({
    check: 'Intent markers',
    status: ratio >= 0.7 ? 'pass' : ratio >= 0.4 ? 'partial' : 'fail',
    details: `${present} of ${entries.length} expected content markers found`,
    points: Math.round(ratio * 40),
    maxPoints: 40,
  });

  for (const [marker, found] of entries) {
    const advice = MARKER_ADVICE[marker];
    if (!found && advice) recommendations.push(advice);
  }

  return toCategory(findings, recommendations, REPORT_WEIGHTS.intent);
}

export function buildReportCategories(input: ScoringInput): ReportCategories {
  return {
    keywordUsage: scoreKeywordUsage(input.keywords),
    readability: scoreReadability(input.readability, input.audience),
    structuredData: scoreStructuredData(input.schema),
    intent: scoreIntent(input.intent),
  };
}

export function calculateOverallScore(categories: ReportCategories): number {
  let score = 0;
  for (const category of Object.values(categories)) {
    score += category.score * category.weight;
  }
  return Math.round(score);
}
