import { DEFAULT_INTENT_RULES, type IntentRules } from '../config';
import { DetectedIntent, Intent, IntentMarkers, IntentProfile, IntentScores, round } from '../types';

// Score order doubles as the tie-break: earlier intents win equal scores.
export const INTENTS: readonly Intent[] = ['informational', 'transactional', 'navigational', 'commercial'];

type MarkerCheck = (html: string, text: string) => boolean;

const COMMON_MARKERS: Record<string, MarkerCheck> = {
  hasStructuredContent: html =>
    /<h[1-6][^>]*>.*?<\/h[1-6]>/is.test(html) &&
    (/<(?:ul|ol)[^>]*>.*?<\/(?:ul|ol)>/is.test(html) ||
      /<p[^>]*>.{40,}<\/p>/is.test(html) ||
      /<(?:section|div)[^>]*(?:class|id)="[^"]*(?:section|container|wrapper|block)[^"]*"[^>]*>/i.test(html)),
  hasMultimedia: html =>
    /<img[^>]*src="[^"]+"[^>]*>/i.test(html) ||
    /<(?:video|iframe)[^>]*>.*?<\/(?:video|iframe)>/is.test(html) ||
    /<iframe[^>]*(?:youtube|vimeo|wistia|loom|vidyard)[^>]*>/i.test(html) ||
    /<audio[^>]*>.*?<\/audio>/is.test(html) ||
    /<iframe[^>]*(?:spotify|soundcloud|apple.com\/podcast)[^>]*>/is.test(html) ||
    /<(?:canvas|svg|object|embed)[^>]*>.*?<\/(?:canvas|svg|object|embed)>/is.test(html),
  hasSemanticMarkup: html =>
    /itemscope|itemtype="https?:\/\/schema\.org/i.test(html) ||
    /<script[^>]*type="application\/ld\+json"[^>]*>.*?<\/script>/is.test(html) ||
    /<(?:article|section|nav|aside|header|footer|main|figure|figcaption|time|mark)[^>]*>/i.test(html) ||
    /aria-[a-z]+="[^"]*"/i.test(html) ||
    /<meta[^>]*(?:og:|twitter:|property="og:|name="twitter:)[^>]*>/i.test(html),
};

// Text patterns are case-sensitive: they look for running prose, not headings.
const INTENT_MARKERS: Record<Intent, Record<string, MarkerCheck>> = {
  informational: {
    hasDefinition: (_, text) =>
      /is a|refers to|defined as|means|describes|represents|constitutes|signifies|denotes|stands for|indicates/.test(text),
    hasExamples: (_, text) =>
      /example|for instance|such as|e\.g\.|to illustrate|case in point|specifically|in particular|notably|for example|like/.test(text),
    hasStepByStep: (html, text) =>
      /<ol[^>]*>.*?<\/ol>/is.test(html) ||
      /step \d|first|second|third|fourth|fifth|next|finally|lastly|initially|begin by|start with|follow with/.test(text),
    hasFaq: html =>
      html.toLowerCase().includes('faq') ||
      /<h[1-6][^>]*>.*?(?:frequently asked questions|common questions|questions and answers).*?<\/h[1-6]>/is.test(html) ||
      /<div[^>]*(?:faq|accordion).*?>.*?<\/div>/is.test(html),
    hasDataTables: html => /<table[^>]*>.*?<\/table>/is.test(html),
    hasStatistics: (_, text) =>
      /\d+%|\d+\s*percent|statistics|data shows|research indicates|according to|study found|survey|poll results/.test(text),
    hasExplanations: (_, text) =>
      /because|therefore|thus|hence|as a result|consequently|due to|since|explains why|reason for|cause of/.test(text),
    hasComparisons: (_, text) =>
      /compared to|in contrast|on the other hand|whereas|while|unlike|similarly|likewise|however|although|despite/.test(text),
    hasDiagrams: html => /<img[^>]*(?:diagram|chart|graph|infographic).*?>/is.test(html),
  },
  transactional: {
    hasPricing: (_, text) =>
      /\$\d+|\d+\s*(?:dollars|USD|EUR|GBP)|(?:price|cost|pricing|fee|charge|payment|subscription|plan)(?:\s+(?:is|of|at))?\s+\$?\d+/.test(text),
    hasCallToAction: html =>
      /<button[^>]*>.*?<\/button>/is.test(html) ||
      /<a[^>]*(?:btn|button|cta).*?>.*?<\/a>/is.test(html) ||
      /<a[^>]*>.*?(?:buy|shop|order|get|purchase|add to cart|checkout|subscribe|sign up|register|join now|start|try|download|book|reserve).*?<\/a>/is.test(html),
    hasProductDetails: (_, text) =>
      /specifications|features|details|dimensions|weight|size|measurements|materials?|ingredients|components|technical specs/.test(text),
    hasPurchaseOptions: (_, text) =>
      /options|variations|models|packages|bundles|plans|tiers|editions|versions|colors|sizes|styles|configurations/.test(text),
    hasTrustSignals: (_, text) =>
      /guarantee|warranty|secure checkout|money back|return policy|free returns|satisfaction|trusted|certified|official|authorized/.test(text),
    hasUrgency: (_, text) =>
      /limited time|offer ends|sale ends|expires|only \d+ left|while supplies last|act now|don't miss|hurry|today only/.test(text),
    hasShoppingCart: html => /<(?:form|div|button|a)[^>]*(?:cart|checkout|basket).*?>/is.test(html),
  },
  navigational: {
    hasDirectLinks: html =>
      /<a[^>]*>.*?(?:official|website|login|sign in|portal|dashboard|account|homepage|main page).*?<\/a>/is.test(html),
    hasContactInfo: (_, text) =>
      /contact|email|phone|call us|reach us|get in touch|support team|help desk|customer service/.test(text) ||
      /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/.test(text) ||
      /\b(?:\+\d{1,3}[-\s]?)?\(?\d{3}\)?[-\s]?\d{3}[-\s]?\d{4}\b/.test(text),
    hasLocationDetails: (html, text) =>
      /address|location|map|directions|where to find|how to get to|visit us|our office|headquarters|branch|store location/.test(text) ||
      /<iframe[^>]*(?:maps?\.google|maps?\.apple|openstreetmap).*?>/is.test(html),
    hasNavigationMenu: html => /<(?:nav|ul|ol|div)[^>]*(?:menu|navigation|navbar|nav-bar).*?>/is.test(html),
    hasSearchFunctionality: html => /<(?:form|input|div)[^>]*(?:search|find).*?>/is.test(html),
    hasHoursInfo: (_, text) =>
      /hours|open from|available from|schedule|availability|opening times|business hours|working hours/.test(text),
  },
  commercial: {
    hasComparison: (_, text) =>
      /compare|vs\.|versus|alternative|differences?|similarities|better than|worse than|compared to|in contrast to/.test(text),
    hasReviews: (html, text) =>
      /review|rating|stars?\b|score|feedback|testimonials?|opinions?|experiences?|what others say|customer reviews/.test(text) ||
      /<(?:div|span)[^>]*(?:rating|stars|reviews).*?>/is.test(html),
    hasProsCons: (_, text) =>
      /pros?\b|cons?\b|advantages?|disadvantages?|benefits?|drawbacks?|strengths?|weaknesses?|positives?|negatives?|good points|bad points/.test(text),
    hasRecommendations: (_, text) =>
      /recommend|best|top|suggested|ideal for|perfect for|suited for|designed for|made for|great for|excellent for|suitable for/.test(text),
    hasDecisionAids: (_, text) =>
      /buying guide|comparison chart|decision matrix|feature comparison|side by side|head to head|face off|showdown/.test(text),
    hasExpertOpinions: (_, text) =>
      /expert|specialist|professional opinion|according to|authority|industry leader|thought leader/.test(text),
    hasValueAssessment: (_, text) =>
      /value for money|worth the price|investment|cost-effective|budget-friendly|premium|luxury|affordable|expensive|overpriced|underpriced/.test(text),
  },
};

// Critical marker pairs earn a boost; a missing lead marker costs a penalty.
const INTENT_ADJUSTMENTS: Record<Intent, { lead: string; partner: string; funnel: string[]; penalty: number | null }> = {
  informational: { lead: 'hasDefinition', partner: 'hasExamples', funnel: ['hasStepByStep', 'hasExplanations'], penalty: null },
  transactional: { lead: 'hasCallToAction', partner: 'hasPricing', funnel: ['hasProductDetails', 'hasTrustSignals'], penalty: 0.6 },
  navigational: { lead: 'hasDirectLinks', partner: 'hasDirectLinks', funnel: ['hasNavigationMenu', 'hasSearchFunctionality'], penalty: 0.5 },
  commercial: { lead: 'hasComparison', partner: 'hasReviews', funnel: ['hasProsCons', 'hasRecommendations'], penalty: 0.7 },
};

function emptyScores(): IntentScores {
  return { informational: 0, transactional: 0, navigational: 0, commercial: 0 };
}

/** Pattern weights, post-type priors and term boosts summed per intent for a keyword. */
export function scoreIntents(keyword: string, postType: string, rules: IntentRules = DEFAULT_INTENT_RULES): IntentScores {
  const normalized = keyword.trim().toLowerCase();
  const scores = emptyScores();

  for (const intent of INTENTS) {
    for (const { pattern, weight } of rules.keywordPatterns[intent]) {
      if (new RegExp(pattern, 'i').test(normalized)) scores[intent] += weight;
    }
  }

  const prior = rules.postTypePriors[postType];
  if (prior) {
    for (const intent of INTENTS) scores[intent] += prior[intent] ?? 0;
  }

  if (new RegExp(rules.brandPattern, 'i').test(normalized)) {
    scores.navigational += rules.brandBoost;
  }

  for (const term of rules.productTerms) {
    if (!normalized.includes(term)) continue;
    for (const intent of INTENTS) scores[intent] += rules.productTermBoost[intent] ?? 0;
  }

  // A commercial lead on a keyword that says "buy" is a purchase.
  if (topIntent(scores) === 'commercial' && normalized.includes('buy')) {
    scores.transactional = Math.max(...Object.values(scores));
  }

  return scores;
}

function topIntent(scores: IntentScores): Intent {
  return INTENTS.reduce((best, intent) => (scores[intent] > scores[best] ? intent : best), INTENTS[0]);
}

/**
 * The winning intent for a keyword. Commercial investigation is reported as
 * transactional; a keyword that matches nothing is informational.
 */
export function detectIntent(keyword: string, postType: string, rules: IntentRules = DEFAULT_INTENT_RULES): DetectedIntent {
  return resolveDetectedIntent(scoreIntents(keyword, postType, rules));
}

function resolveDetectedIntent(scores: IntentScores): DetectedIntent {
  const top = topIntent(scores);
  if (scores[top] === 0) return 'informational';
  return top === 'commercial' ? 'transactional' : top;
}

export function checkIntentSatisfactionMarkers(html: string, text: string, intent: Intent): IntentMarkers {
  const markers: IntentMarkers = {};
  for (const [name, check] of Object.entries({ ...COMMON_MARKERS, ...INTENT_MARKERS[intent] })) {
    markers[name] = check(html, text);
  }
  return markers;
}

function qualityMultiplier(markers: IntentMarkers): number {
  const structured = markers.hasStructuredContent === true;
  const multimedia = markers.hasMultimedia === true;
  const semantic = markers.hasSemanticMarkup === true;

  if (structured && multimedia && semantic) return 1.2;
  if (structured && multimedia) return 1.1;
  if (structured) return 1.05;
  if (!multimedia && !semantic) return 0.8;
  return 1;
}

/** Weighted share of satisfied markers, adjusted for content quality and the intent's critical markers; 0-1. */
export function calculateIntentSatisfactionScore(
  markers: IntentMarkers,
  intent: Intent,
  rules: IntentRules = DEFAULT_INTENT_RULES,
): number {
  const entries = Object.entries(markers);
  if (entries.length === 0) return 0;

  const weights = { ...rules.markerWeights.common, ...rules.markerWeights[intent] };
  let satisfied = 0;
  let total = 0;
  for (const [name, present] of entries) {
    const weight = weights[name] ?? 1;
    if (present) satisfied += weight;
    total += weight;
  }

  let score = total > 0 ? satisfied / total : 0;
  score *= qualityMultiplier(markers);

  const { lead, partner, funnel, penalty } = INTENT_ADJUSTMENTS[intent];
  const has = (name: string) => markers[name] === true;

  if (has(lead) && has(partner)) score = Math.min(1, score * 1.15);
  if (penalty !== null && markers[lead] === false) score *= penalty;
  if (has(lead) && has(partner) && funnel.every(has)) score = Math.min(1, score * 1.1);

  return Math.max(0, Math.min(1, score));
}

export function analyzeIntent(
  keyword: string,
  postType: string,
  html: string,
  text: string,
  rules: IntentRules = DEFAULT_INTENT_RULES,
): IntentProfile {
  const scores = scoreIntents(keyword, postType, rules);
  const detectedIntent = resolveDetectedIntent(scores);
  const markers = checkIntentSatisfactionMarkers(html, text, detectedIntent);

  return {
    keyword,
    detectedIntent,
    scores,
    markers,
    satisfactionScore: round(calculateIntentSatisfactionScore(markers, detectedIntent, rules)),
  };
}
