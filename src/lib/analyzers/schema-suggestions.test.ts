import { describe, expect, it } from 'vitest';
import { buildDocument, type Document } from '../document/document';
import { buildSchemaSuggestions, hasFaqStructure, missingSuggestedTypes, suggestSchemaTypes } from './schema-suggestions';

function makeDocument(html: string): Document {
  const result = buildDocument(html);
  if (result.outcome !== 'ok') throw new Error(`expected a parsed document, got ${result.outcome}`);
  return result.document;
}

const HELP_PAGE = `<h1>Help</h1>
<div><h3>What is it?</h3><p>A thing.</p><h3>Why use it?</h3><p>Speed.</p><h3>Who made it?</h3><p>Us.</p></div>
<ol><li>a</li><li>b</li><li>c</li></ol>
<iframe src="https://www.youtube.com/embed/abc"></iframe>`;

describe('suggestSchemaTypes', () => {
  it('suggests article types for blog posts', () => {
    const doc = makeDocument('<article><h1>Title</h1><p>One.</p></article>');
    expect(suggestSchemaTypes(doc, 'post')).toEqual(['Article', 'BlogPosting']);
  });

  it('detects structure on generic pages', () => {
    expect(suggestSchemaTypes(makeDocument(HELP_PAGE), 'page')).toEqual(['Article', 'FAQPage', 'HowTo', 'VideoObject']);
  });

  it('spots prices in visible text', () => {
    expect(suggestSchemaTypes(makeDocument('<p>Only $19.99 today</p>'), 'page')).toEqual(['Product']);
  });

  it('spots ingredient headings', () => {
    expect(suggestSchemaTypes(makeDocument('<h2>Ingredients</h2><ul><li>2 cups flour</li></ul>'), 'page')).toEqual([
      'Recipe',
    ]);
  });

  it('trusts the post type', () => {
    expect(suggestSchemaTypes(makeDocument('<p>Hello there</p>'), 'event')).toEqual(['Event']);
  });
});

describe('hasFaqStructure', () => {
  it('needs three questions', () => {
    expect(hasFaqStructure(makeDocument('<div><h3>Why?</h3><p>Because.</p></div>'))).toBe(false);
    expect(hasFaqStructure(makeDocument('<dl><dt>Term</dt><dd>Meaning</dd></dl>'))).toBe(true);
  });
});

describe('missing suggestions', () => {
  it('subtracts present types', () => {
    expect(missingSuggestedTypes(['Article', 'FAQPage'], ['FAQPage', 'Person'])).toEqual(['Article']);
    expect(buildSchemaSuggestions(makeDocument(HELP_PAGE), 'page', ['FAQPage'])).toEqual({
      suggestedTypes: ['Article', 'FAQPage', 'HowTo', 'VideoObject'],
      presentTypes: ['FAQPage'],
      missingTypes: ['Article', 'HowTo', 'VideoObject'],
    });
  });
});
