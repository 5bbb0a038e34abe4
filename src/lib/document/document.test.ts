import { describe, expect, it, vi } from 'vitest';
import { buildDocument, stripTags, urlPath } from './document';

describe('buildDocument', () => {
  it('treats blank input as empty', () => {
    expect(buildDocument('  \n', { baseUrl: 'https://example.com/' })).toEqual({
      outcome: 'empty',
      html: '  \n',
      baseUrl: 'https://example.com/',
    });
  });

  it('reads title, description, language and visible text', () => {
    const result = buildDocument(
      '<html lang=" EN-gb "><head><title> My  Page </title><meta name="description" content="About  things">' +
        '<style>p { color: red }</style></head>' +
        '<body><p>Hello <b>world</b></p><script>var a = 1;</script><noscript>enable js</noscript></body></html>',
    );
    if (result.outcome !== 'ok') throw new Error(`unexpected outcome ${result.outcome}`);

    expect(result.document.title).toBe('My Page');
    expect(result.document.metaDescription).toBe('About things');
    expect(result.document.language).toBe('en-gb');
    expect(result.document.text).toBe('Hello world');
  });

  it('resolves a base element against the page URL', () => {
    const result = buildDocument('<head><base href="/docs/"></head><p>x</p>', { baseUrl: 'https://example.com/a/b' });
    if (result.outcome !== 'ok') throw new Error(`unexpected outcome ${result.outcome}`);
    expect(result.document.baseUrl).toBe('https://example.com/docs/');
  });

  it('reports a parser failure instead of throwing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const result = buildDocument('<p>text</p>', {
      parse: () => {
        throw new Error('bad markup');
      },
    });

    expect(result).toEqual({ outcome: 'parse_failure', html: '<p>text</p>', baseUrl: '', reason: 'bad markup' });
    expect(warn).toHaveBeenCalledOnce();
    warn.mockRestore();
  });
});

describe('helpers', () => {
  it('extracts URL paths', () => {
    expect(urlPath('https://example.com/a/b?x=1')).toBe('/a/b');
    expect(urlPath('not a url')).toBe('not a url');
    expect(urlPath('')).toBe('');
  });

  it('strips tags and code, then decodes entities', () => {
    expect(stripTags('<p>Tom &amp; Jerry</p><script>alert(1)</script>')).toBe('Tom & Jerry');
  });
});
