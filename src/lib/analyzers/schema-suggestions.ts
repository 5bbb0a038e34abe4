import type * as cheerio from 'cheerio';
import type { Document } from '../document/document';
import { SchemaSuggestions } from '../types';
import { checkKeywordPresence } from './keyword-analyzer';

const ARTICLE_POST_TYPES = ['post', 'article', 'blog'];
const NEWS_KEYWORDS = ['news', 'breaking', 'report', 'announced', 'latest'];
const RECIPE_UNITS = ['cup', 'tbsp', 'tsp', 'gram', 'oz'];
const PRICE = /[$€£]\s*\d{1,3}(?:[.,]\d{3})*(?:[.,]\d{2})?/u;

const byClass = (...fragments: string[]) => fragments.map(f => `[class*="${f}"]`);

const SELECTORS = {
  newsDate: ['time', ...byClass('date', 'published', 'time')],
  blog: [...byClass('blog', 'post', 'author', 'comments', 'author-bio', 'about-author'), 'div[class*="author"] img'],
  faq: [...byClass('faq', 'question', 'answer'), '#faq'],
  breadcrumb: [...byClass('breadcrumb'), '#breadcrumbs', 'nav ol > li > a'],
  product: [...byClass('product', 'price', 'add-to-cart', 'buy-now', 'shop'), '[class*="item"] img'],
  recipe: byClass('recipe', 'ingredients', 'instructions', 'cooking-time', 'prep-time'),
  event: byClass('event', 'calendar', 'schedule', 'venue', 'location', 'date', 'time'),
  howTo: byClass('step', 'how-to', 'instructions'),
  review: [...byClass('review', 'rating', 'stars', 'testimonial'), 'span[class*="star"]'],
  video: [
    'video',
    'iframe[src*="youtube.com"]',
    'iframe[src*="vimeo.com"]',
    'iframe[src*="wistia.com"]',
    'object[data*=".mp4"]',
    'object[data*=".webm"]',
    ...byClass('video', 'player'),
  ],
};

function hasAny($: cheerio.CheerioAPI, selectors: string[]): boolean {
  return selectors.some(selector => $(selector).length > 0);
}

function someText($: cheerio.CheerioAPI, selector: string, test: (text: string) => boolean): boolean {
  return $(selector)
    .toArray()
    .some(el => test($(el).text()));
}

export function hasArticleStructure({ $ }: Document): boolean {
  if ($('article').length > 0) return true;
  return $('h1').length > 0 && $('p').length >= 3;
}

export function hasNewsArticleCharacteristics(document: Document): boolean {
  if (hasAny(document.$, SELECTORS.newsDate)) return true;
  return checkKeywordPresence(document.text, NEWS_KEYWORDS).hasAnyKeyword;
}

export function hasBlogPostCharacteristics({ $ }: Document): boolean {
  return hasAny($, SELECTORS.blog);
}

export function hasFaqStructure({ $ }: Document): boolean {
  if (hasAny($, SELECTORS.faq)) return true;
  // definition lists are a common Q&A markup
  if ($('dt').toArray().some(dt => $(dt).parent().find('dd').length > 0)) return true;

  const questions = $('h3, h4, strong')
    .toArray()
    .filter(el => $(el).parent().children('p').length > 0 && $(el).text().includes('?'));
  return questions.length >= 3;
}

export function hasBreadcrumbNavigation({ $ }: Document): boolean {
  if (hasAny($, SELECTORS.breadcrumb)) return true;
  return $('nav ul')
    .toArray()
    .some(ul => $(ul).children('li').children('a').length > 1);
}

export function hasProductStructure(document: Document): boolean {
  return hasAny(document.$, SELECTORS.product) || PRICE.test(document.text);
}

export function hasRecipeStructure({ $ }: Document): boolean {
  if (hasAny($, SELECTORS.recipe)) return true;
  if (someText($, 'h2, h3', text => text.toLowerCase().includes('ingredients'))) return true;

  const listsUnits = $('ul > li')
    .toArray()
    .some(li => {
      const text = $(li).text().toLowerCase();
      return RECIPE_UNITS.some(unit => text.includes(unit));
    });
  if (listsUnits) return true;

  return $('ol')
    .toArray()
    .some(ol => $(ol).prevAll().toArray().some(el => $(el).text().toLowerCase().includes('ingredients')));
}

export function hasEventStructure(document: Document): boolean {
  if (hasAny(document.$, SELECTORS.event)) return true;
  return ['Date:', 'Time:', 'Location:'].some(label => document.text.includes(label));
}

export function hasHowToStructure(document: Document): boolean {
  const { $ } = document;
  const mentionsHowTo = (text: string) => text.toLowerCase().includes('how to');
  if (mentionsHowTo(document.title) || someText($, 'h1, h2', mentionsHowTo)) return true;

  if (hasAny($, SELECTORS.howTo)) return true;
  if ($('ol').toArray().some(ol => $(ol).children('li').length >= 3)) return true;

  return someText($, 'h3, h4', text => text.includes('Step 1') || text.includes('Step 2'));
}

export function hasReviewStructure(document: Document): boolean {
  if (hasAny(document.$, SELECTORS.review)) return true;
  return document.text.includes('/5') || document.text.includes('/10');
}

export function hasVideoContent({ $ }: Document): boolean {
  return hasAny($, SELECTORS.video);
}

/** Schema types the page's structure and post type call for, in a fixed order. */
export function suggestSchemaTypes(document: Document, postType: string): string[] {
  const suggested: string[] = [];

  if (ARTICLE_POST_TYPES.includes(postType) || hasArticleStructure(document)) {
    suggested.push('Article');
    if (hasNewsArticleCharacteristics(document)) suggested.push('NewsArticle');
    if (postType === 'post' || hasBlogPostCharacteristics(document)) suggested.push('BlogPosting');
  }
  if (hasFaqStructure(document)) suggested.push('FAQPage');
  if (hasBreadcrumbNavigation(document)) suggested.push('BreadcrumbList');
  if (postType === 'product' || hasProductStructure(document)) suggested.push('Product');
  if (postType === 'recipe' || hasRecipeStructure(document)) suggested.push('Recipe');
  if (postType === 'event' || hasEventStructure(document)) suggested.push('Event');
  if (hasHowToStructure(document)) suggested.push('HowTo');
  if (hasVideoContent(document)) suggested.push('VideoObject');
  if (postType === 'review' || hasReviewStructure(document)) suggested.push('Review');

  return suggested;
}

export function missingSuggestedTypes(suggested: string[], present: string[]): string[] {
  return suggested.filter(type => !present.includes(type));
}

export function buildSchemaSuggestions(document: Document, postType: string, presentTypes: string[]): SchemaSuggestions {
  const suggestedTypes = suggestSchemaTypes(document, postType);
  return {
    suggestedTypes,
    presentTypes,
    missingTypes: missingSuggestedTypes(suggestedTypes, presentTypes),
  };
}
