import type * as cheerio from 'cheerio';
import { isTag, isText, type Element } from 'domhandler';
import { collapseWhitespace, type Document } from '../document/document';
import { SchemaEntity, SchemaObject, SchemaSource, SchemaValue } from '../types';
import { isSchemaObject, stripSchemaPrefix } from './schema-validator';

const SCHEMA_URL_PREFIXES = ['http://schema.org/', 'https://schema.org/'];
const RDFA_PREFIXES = ['schema:', ...SCHEMA_URL_PREFIXES];

/**
 * Every schema.org entity on the page, in source order within each syntax:
 * JSON-LD first, then Microdata, then RDFa.
 */
export function extractSchemaData(document: Document): SchemaEntity[] {
  const { $ } = document;
  return [...extractJsonLd($), ...extractMicrodata($), ...extractRdfa($)];
}

export function extractSchemaTypes(entities: SchemaEntity[]): string[] {
  const types = new Set<string>();
  for (const entity of entities) {
    for (const type of Array.isArray(entity.type) ? entity.type : [entity.type]) {
      if (type) types.add(type);
    }
  }
  return [...types];
}

function toEntity(properties: SchemaObject, source: SchemaSource): SchemaEntity {
  const declared = properties['@type'];
  let type: string | string[] = [];
  if (typeof declared === 'string') {
    type = stripSchemaPrefix(declared);
  } else if (Array.isArray(declared)) {
    type = declared.filter((t): t is string => typeof t === 'string').map(stripSchemaPrefix);
  }
  return { type, source, properties };
}

// JSON-LD

function extractJsonLd($: cheerio.CheerioAPI): SchemaEntity[] {
  const entities: SchemaEntity[] = [];

  $('script[type="application/ld+json"]').each((_, el) => {
    const raw = $(el).text().trim();
    if (!raw) return;

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      // invalid JSON-LD
      return;
    }

    const value = toSchemaValue(data);
    const graph = isSchemaObject(value) ? value['@graph'] : undefined;
    const items = Array.isArray(graph) ? graph : Array.isArray(value) ? value : [value];
    for (const item of items) {
      if (isSchemaObject(item)) entities.push(toEntity(item, 'json-ld'));
    }
  });

  return entities;
}

// Assigning this key on a plain object replaces its prototype.
const PROTO_KEY = '__proto__';

/** Narrows parsed JSON into the schema value model. */
function toSchemaValue(data: unknown): SchemaValue {
  if (data === null || typeof data === 'string' || typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }
  if (Array.isArray(data)) return data.map(toSchemaValue);
  if (typeof data === 'object') {
    const result: SchemaObject = {};
    for (const [key, value] of Object.entries(data)) {
      if (key !== PROTO_KEY) result[key] = toSchemaValue(value);
    }
    return result;
  }
  return null;
}

// Microdata and RDFa share one tree walk; they differ in which attributes mark a scope and a property.

interface Vocabulary {
  source: SchemaSource;
  isScope: (el: Element) => boolean;
  scopeType: (el: Element) => string | string[];
  propertyNames: (el: Element) => string[];
}

const MICRODATA: Vocabulary = {
  source: 'microdata',
  isScope: el => el.attribs.itemscope !== undefined,
  scopeType: el => schemaTypeList(el.attribs.itemtype ?? '', SCHEMA_URL_PREFIXES),
  propertyNames: el => splitNames(el.attribs.itemprop),
};

const RDFA: Vocabulary = {
  source: 'rdfa',
  isScope: el => el.attribs.typeof !== undefined,
  scopeType: el => schemaTypeList(el.attribs.typeof ?? '', RDFA_PREFIXES),
  propertyNames: el => splitNames(el.attribs.property).map(name => stripPrefixes(name, RDFA_PREFIXES)),
};

function extractMicrodata($: cheerio.CheerioAPI): SchemaEntity[] {
  return $('[itemscope]')
    .toArray()
    .filter(isTag)
    .filter(el => el.attribs.itemprop === undefined && (el.attribs.itemtype ?? '').includes('schema.org'))
    .map(el => toEntity(readScope(el, MICRODATA), MICRODATA.source));
}

function extractRdfa($: cheerio.CheerioAPI): SchemaEntity[] {
  return $('[typeof]')
    .toArray()
    .filter(isTag)
    .filter(el => el.attribs.property === undefined && isSchemaOrgRdfa(el))
    .map(el => toEntity(readScope(el, RDFA), RDFA.source));
}

function isSchemaOrgRdfa(el: Element): boolean {
  const typeOf = el.attribs.typeof ?? '';
  if (typeOf.includes('schema:') || typeOf.includes('schema.org')) return true;
  return (nearestAttribute(el, 'vocab') ?? '').includes('schema.org');
}

function nearestAttribute(el: Element, name: string): string | undefined {
  let current: Element | null = el;
  while (current) {
    const value = current.attribs[name];
    if (value !== undefined) return value;
    current = current.parent && isTag(current.parent) ? current.parent : null;
  }
  return undefined;
}

/** A scope's own properties; properties inside a nested scope belong to that scope. */
function readScope(scope: Element, vocabulary: Vocabulary): SchemaObject {
  const properties: SchemaObject = { '@type': vocabulary.scopeType(scope) };
  collectProperties(scope, vocabulary, properties);
  return properties;
}

function collectProperties(parent: Element, vocabulary: Vocabulary, into: SchemaObject): void {
  for (const child of parent.children) {
    if (!isTag(child)) continue;

    const names = vocabulary.propertyNames(child);
    const nestedScope = vocabulary.isScope(child);

    if (names.length > 0) {
      const value = nestedScope ? readScope(child, vocabulary) : propertyValue(child);
      if (value !== '') {
        for (const name of names) addProperty(into, name, value);
      }
    }
    if (!nestedScope) collectProperties(child, vocabulary, into);
  }
}

function addProperty(into: SchemaObject, name: string, value: SchemaValue): void {
  if (name === PROTO_KEY) return;
  const existing = Object.prototype.hasOwnProperty.call(into, name) ? into[name] : undefined;
  if (existing === undefined) {
    into[name] = value;
  } else if (Array.isArray(existing)) {
    existing.push(value);
  } else {
    into[name] = [existing, value];
  }
}

function propertyValue(el: Element): string {
  const attr = (name: string) => (el.attribs[name] ?? '').trim();

  switch (el.name) {
    case 'meta':
      return attr('content');
    case 'img':
    case 'audio':
    case 'video':
    case 'source':
    case 'iframe':
      return attr('src');
    case 'a':
    case 'link':
    case 'area':
      return attr('href');
    case 'time':
      return attr('datetime') || textOf(el);
  }
  if (el.attribs.content !== undefined) return attr('content');
  return textOf(el);
}

function textOf(el: Element): string {
  const parts: string[] = [];
  const walk = (node: Element) => {
    for (const child of node.children) {
      if (isText(child)) parts.push(child.data);
      else if (isTag(child)) walk(child);
    }
  };
  walk(el);
  return collapseWhitespace(parts.join(''));
}

function splitNames(value: string | undefined): string[] {
  return (value ?? '').split(/\s+/).filter(Boolean);
}

function stripPrefixes(value: string, prefixes: string[]): string {
  for (const prefix of prefixes) {
    if (value.startsWith(prefix)) return value.slice(prefix.length);
  }
  return value;
}

function schemaTypeList(value: string, prefixes: string[]): string | string[] {
  const types = splitNames(value).map(type => stripPrefixes(type, prefixes));
  return types.length === 1 ? types[0] : types;
}
