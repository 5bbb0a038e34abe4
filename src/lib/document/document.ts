import * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode } from 'domhandler';
import { decodeHTML } from 'entities';

export type HtmlParser = (html: string) => cheerio.CheerioAPI;

export interface Document {
  html: string;
  $: cheerio.CheerioAPI;
  baseUrl: string;
  text: string;
  title: string;
  metaDescription: string;
  language: string;
}

export type DocumentResult =
  | { outcome: 'ok'; document: Document }
  | { outcome: 'empty'; html: string; baseUrl: string }
  | { outcome: 'parse_failure'; html: string; baseUrl: string; reason: string };

export interface BuildDocumentOptions {
  baseUrl?: string;
  parse?: HtmlParser;
}

const NON_TEXT_TAGS = new Set(['script', 'style', 'noscript', 'template']);

const defaultParser: HtmlParser = html => cheerio.load(html);

export function buildDocument(html: string, options: BuildDocumentOptions = {}): DocumentResult {
  const baseUrl = options.baseUrl ?? '';
  if (html.trim() === '') {
    return { outcome: 'empty', html, baseUrl };
  }

  const parse = options.parse ?? defaultParser;
  let $: cheerio.CheerioAPI;
  try {
    $ = parse(html);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn('buildDocument: HTML parse failed, falling back to regex extraction:', reason);
    return { outcome: 'parse_failure', html, baseUrl, reason };
  }

  const root = $('body').length > 0 ? $('body').toArray() : $.root().toArray();
  const parts: string[] = [];
  collectText(root, parts);

  return {
    outcome: 'ok',
    document: {
      html,
      $,
      baseUrl: resolveBaseUrl($('base[href]').attr('href'), baseUrl),
      text: collapseWhitespace(parts.join(' ')),
      title: collapseWhitespace($('title').first().text()),
      metaDescription: collapseWhitespace($('meta[name="description"]').attr('content') ?? ''),
      language: ($('html').attr('lang') ?? '').trim().toLowerCase(),
    },
  };
}

function collectText(nodes: AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      out.push(node.data);
    } else if (isTag(node) && !NON_TEXT_TAGS.has(node.name)) {
      collectText(node.children, out);
    }
  }
}

function resolveBaseUrl(baseHref: string | undefined, fallback: string): string {
  if (!baseHref) return fallback;
  try {
    return fallback ? new URL(baseHref, fallback).toString() : new URL(baseHref).toString();
  } catch {
    return fallback;
  }
}

/** Path component of a URL, or the input itself when it does not parse. */
export function urlPath(url: string): string {
  if (!url) return '';
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

export function decodeEntities(value: string): string {
  return decodeHTML(value);
}

export function stripTags(html: string): string {
  const withoutCode = html.replace(/<(script|style|noscript)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ');
  return collapseWhitespace(decodeEntities(withoutCode.replace(/<[^>]+>/g, '')));
}
