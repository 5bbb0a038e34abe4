import type * as cheerio from 'cheerio';
import { isTag, isText, type Element } from 'domhandler';
import { collapseWhitespace, stripTags, type DocumentResult } from '../document/document';
import { ContentBlock, ContentExtraction, HeadingBlock } from '../types';

/** Main-content regions, most specific first. */
export const PRIORITY_SELECTORS = [
  'main p',
  'article p',
  'div[class*="entry-content"] p',
  'div[class*="post-content"] p',
  'div[class*="content"] p',
  'section[class*="content"] p',
  'div[id="content"] p',
  'div[id="primary"] p',
] as const;

export const BOILERPLATE_RULES = {
  maxDepth: 50,
  tags: ['aside', 'nav', 'header', 'footer', 'form'],
  roles: ['navigation', 'complementary', 'contentinfo', 'banner', 'search'],
  classFragments: [
    'sidebar', 'widget', 'widgets', 'menu', 'navigation', 'nav', 'header', 'footer',
    'comments', 'comment', 'reply', 'breadcrumb', 'breadcrumbs', 'modal', 'popup',
    'newsletter', 'subscribe', 'pagination', 'pager', 'author-box', 'related', 'sharing',
    'share', 'social', 'ads', 'ad-', 'promo', 'cookie', 'gdpr', 'notice', 'alert',
    'site-header', 'top-bar', 'masthead', 'navbar', 'site-footer', 'bottom-bar',
    'copyright', 'consent', 'announcement', 'advert', 'sponsor',
  ],
  idFragments: [
    'header', 'masthead', 'top', 'nav', 'menu', 'footer', 'bottom', 'copyright',
    'breadcrumbs', 'cookie', 'gdpr', 'notice', 'modal', 'popup',
  ],
  labelAttributes: ['aria-label', 'data-label', 'data-component'],
  labelFragments: ['menu', 'navigation', 'header', 'footer', 'breadcrumbs'],
} as const;

const MEDIA_TAGS = new Set(['img', 'svg', 'figure', 'iframe', 'video', 'audio', 'canvas']);
const LETTER_OR_DIGIT = /[\p{L}\p{N}]/u;

const EMPTY_EXTRACTION: ContentExtraction = {
  blocks: [],
  paragraphs: [],
  headings: [],
  text: '',
  fallbackUsed: false,
};

export function extractContent(result: DocumentResult): ContentExtraction {
  if (result.outcome === 'empty') return { ...EMPTY_EXTRACTION };
  if (result.outcome === 'parse_failure') return extractContentFallback(result.html);

  const { $ } = result.document;
  const order = documentOrder($);
  const byPosition = (a: Element, b: Element) => (order.get(a) ?? 0) - (order.get(b) ?? 0);

  const paragraphNodes = selectContentParagraphs($).sort(byPosition);
  const headingNodes = $('h1, h2, h3, h4, h5, h6')
    .toArray()
    .filter(el => !isBoilerplate(el));

  const entries: { el: Element; block: ContentBlock }[] = [];
  for (const el of paragraphNodes) {
    const text = collapseWhitespace($(el).text());
    if (text) entries.push({ el, block: { type: 'paragraph', text } });
  }
  for (const el of headingNodes) {
    const text = collapseWhitespace($(el).text());
    if (text) entries.push({ el, block: { type: 'heading', level: Number(el.name[1]), text } });
  }
  entries.sort((a, b) => byPosition(a.el, b.el));

  return fromBlocks(entries.map(e => e.block), false);
}

/**
 * Paragraph nodes inside the main-content regions, or every paragraph when
 * no region matched at all. Boilerplate and media-only paragraphs are dropped.
 */
export function selectContentParagraphs($: cheerio.CheerioAPI): Element[] {
  const result: Element[] = [];
  const seen = new Set<Element>();
  let found = 0;

  const pushIfEligible = (el: Element) => {
    if (seen.has(el)) return;
    seen.add(el);
    if (!isBoilerplate(el) && isMeaningfulParagraph(el)) result.push(el);
  };

  for (const selector of PRIORITY_SELECTORS) {
    $(selector).each((_, el) => {
      found++;
      pushIfEligible(el);
    });
  }

  if (found === 0) {
    $('p').each((_, el) => pushIfEligible(el));
  }

  return result;
}

export function isBoilerplate(el: Element): boolean {
  let node: Element | null = el;
  let depth = 0;
  while (node && depth < BOILERPLATE_RULES.maxDepth) {
    if (matchesBoilerplateRule(node)) return true;
    node = node.parent && isTag(node.parent) ? node.parent : null;
    depth++;
  }
  return false;
}

function matchesBoilerplateRule(node: Element): boolean {
  const tag = node.name.toLowerCase();
  if (includesValue(BOILERPLATE_RULES.tags, tag)) return true;

  const role = (node.attribs.role ?? '').trim().toLowerCase();
  if (role && includesValue(BOILERPLATE_RULES.roles, role)) return true;

  const className = node.attribs.class;
  if (className) {
    const padded = ` ${className.toLowerCase()} `;
    if (BOILERPLATE_RULES.classFragments.some(fragment => padded.includes(fragment))) return true;
  }

  const id = node.attribs.id;
  if (id) {
    const lowered = id.toLowerCase();
    if (BOILERPLATE_RULES.idFragments.some(fragment => lowered.includes(fragment))) return true;
  }

  for (const attribute of BOILERPLATE_RULES.labelAttributes) {
    const label = node.attribs[attribute];
    if (!label) continue;
    const lowered = label.toLowerCase();
    if (BOILERPLATE_RULES.labelFragments.some(fragment => lowered.includes(fragment))) return true;
  }

  return false;
}

function includesValue(list: readonly string[], value: string): boolean {
  return list.includes(value);
}

export function isMeaningfulParagraph(el: Element): boolean {
  if (el.name.toLowerCase() !== 'p') return false;

  for (const child of el.children) {
    if (isText(child) && LETTER_OR_DIGIT.test(child.data)) return true;
    if (!isTag(child)) continue;

    const tag = child.name.toLowerCase();
    if (tag === 'br' || MEDIA_TAGS.has(tag)) continue;
    // Anchors count through their label; other elements count by being there.
    if (tag === 'a') {
      if (LETTER_OR_DIGIT.test(textOf(child))) return true;
      continue;
    }
    return true;
  }
  return false;
}

function textOf(el: Element): string {
  let text = '';
  for (const child of el.children) {
    if (isText(child)) text += child.data;
    else if (isTag(child)) text += textOf(child);
  }
  return text;
}

function documentOrder($: cheerio.CheerioAPI): Map<Element, number> {
  const order = new Map<Element, number>();
  $<Element, '*'>('*').each((index, el) => {
    order.set(el, index);
  });
  return order;
}

/** Regex-only extraction used when the HTML could not be parsed. */
export function extractContentFallback(html: string): ContentExtraction {
  const found: { index: number; block: ContentBlock }[] = [];

  for (const match of html.matchAll(/<p\b[^>]*>([\s\S]*?)<\/p>/gi)) {
    const text = stripTags(match[1]);
    if (text) found.push({ index: match.index ?? 0, block: { type: 'paragraph', text } });
  }
  for (const match of html.matchAll(/<h([1-6])\b[^>]*>([\s\S]*?)<\/h\1>/gi)) {
    const text = stripTags(match[2]);
    if (text) found.push({ index: match.index ?? 0, block: { type: 'heading', level: Number(match[1]), text } });
  }
  found.sort((a, b) => a.index - b.index);

  return fromBlocks(found.map(f => f.block), true);
}

function fromBlocks(blocks: ContentBlock[], fallbackUsed: boolean): ContentExtraction {
  const paragraphs: string[] = [];
  const headings: HeadingBlock[] = [];
  for (const block of blocks) {
    if (block.type === 'paragraph') paragraphs.push(block.text);
    else headings.push({ level: block.level, text: block.text });
  }
  return {
    blocks,
    paragraphs,
    headings,
    text: blocks.map(b => b.text).join('\n'),
    fallbackUsed,
  };
}
