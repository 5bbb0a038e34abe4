import { describe, expect, it } from 'vitest';
import {
  belongsToSchemaType,
  findLocalBusinessSchema,
  findMissingProperties,
  validateAddressStructure,
  validateGeoStructure,
  validateLocalBusinessSchema,
  validateSchema,
  validateSchemas,
} from './schema-validator';
import { SchemaEntity, SchemaObject } from '../types';

function makeEntity(properties: SchemaObject): SchemaEntity {
  const declared = properties['@type'];
  return {
    type: typeof declared === 'string' ? declared : [],
    source: 'json-ld',
    properties,
  };
}

const PRODUCT_RECOMMENDED = 'Missing recommended properties: image, description, brand, aggregateRating, review';

describe('findMissingProperties', () => {
  const schema: SchemaObject = { a: '  ', b: [null, ''], c: 0, d: 'x' };

  it('uses loose emptiness by default', () => {
    expect(findMissingProperties(schema, ['a', 'b', 'c', 'd', 'e'])).toEqual(['c', 'e']);
  });

  it('treats blank strings and lists of empty values as missing in strict mode', () => {
    expect(findMissingProperties(schema, ['a', 'b', 'c', 'd', 'e'], true)).toEqual(['a', 'b', 'c', 'e']);
  });
});

describe('validateSchema', () => {
  it('rejects entities without a type', () => {
    expect(validateSchema(makeEntity({ name: 'x' }))).toEqual({
      valid: false,
      issues: ['Missing @type property'],
      warnings: [],
    });
  });

  it('falls back to generic rules for unknown types', () => {
    expect(validateSchema(makeEntity({ '@type': 'Widget', name: 'Gadget' }))).toEqual({
      valid: true,
      issues: [],
      warnings: [
        "Schema type 'Widget' is not specifically validated. Using generic validation rules.",
        'Missing recommended properties: description',
      ],
    });
  });

  it('reports missing required properties', () => {
    const result = validateSchema(makeEntity({ '@type': 'Article', headline: 'Hi', author: 'Ann' }));
    expect(result.valid).toBe(false);
    expect(result.issues).toEqual(['Missing required properties: datePublished, publisher']);
  });

  it('treats blank required properties as missing', () => {
    const result = validateSchema(
      makeEntity({ '@type': 'Article', headline: '   ', author: 'Ann', datePublished: '2024-01-01', publisher: [] }),
    );
    expect(result.valid).toBe(false);
    expect(result.issues).toEqual(['Missing required properties: headline, publisher']);
  });

  it('treats blank question names as missing', () => {
    const result = validateSchema(
      makeEntity({
        '@type': 'FAQPage',
        mainEntity: [{ '@type': 'Question', name: ' ', acceptedAnswer: { '@type': 'Answer', text: 'Yes.' } }],
      }),
    );
    expect(result.issues).toEqual(["Question 0 is missing the required 'name' property."]);
  });

  it('warns on out-of-sequence breadcrumb positions', () => {
    const crumb = (position: number, name: string) => ({
      '@type': 'ListItem',
      position,
      name,
      item: `https://example.com/${name}`,
    });
    const result = validateSchema(
      makeEntity({ '@type': 'BreadcrumbList', itemListElement: [crumb(1, 'home'), crumb(2, 'shop'), crumb(4, 'shoes')] }),
    );

    expect(result.issues).toEqual([]);
    expect(result.warnings).toEqual([
      'ListItem 2 has incorrect position. Expected position 3 but found 4. Positions should be sequential starting from 1.',
    ]);
  });

  it('checks FAQ questions and answers', () => {
    const result = validateSchema(
      makeEntity({
        '@type': 'FAQPage',
        mainEntity: [
          { '@type': 'Thing', name: 'Not a question' },
          { '@type': 'Question', name: 'Why?' },
          { '@type': 'Question', name: 'How?', acceptedAnswer: { '@type': 'Answer', text: 'Like this.' } },
        ],
      }),
    );

    expect(result.issues).toEqual([
      "Item 0 in mainEntity should have @type: Question (found 'Thing').",
      "Question 1 is missing the 'acceptedAnswer' property or it is empty.",
    ]);
  });

  it('checks HowTo steps', () => {
    const result = validateSchema(
      makeEntity({ '@type': 'HowTo', name: 'Tie a knot', step: { '@type': 'HowToStep', text: 'Loop it.' } }),
    );
    expect(result.issues).toEqual([]);
    expect(result.warnings).toEqual([
      'Missing recommended properties: image, description, totalTime, supply, tool',
      "HowToStep 0 is missing the recommended 'name' property.",
    ]);
  });

  it('warns when an aggregate offer has highPrice below lowPrice', () => {
    const result = validateSchema(
      makeEntity({
        '@type': 'Product',
        name: 'Widget',
        offers: { '@type': 'AggregateOffer', lowPrice: 10, highPrice: 5, priceCurrency: 'USD' },
      }),
    );

    expect(result.valid).toBe(true);
    expect(result.issues).toEqual([]);
    expect(result.warnings).toEqual([
      PRODUCT_RECOMMENDED,
      "AggregateOffer is missing the recommended 'offerCount' property.",
      'AggregateOffer highPrice (5) is less than lowPrice (10).',
    ]);
  });

  it('validates each offer in a list', () => {
    const result = validateSchema(
      makeEntity({
        '@type': 'Product',
        name: 'Widget',
        offers: [
          { '@type': 'Offer', price: 'abc', priceCurrency: 'USD', availability: 'https://schema.org/InStock' },
          { '@type': 'Offer', price: '9.99', priceCurrency: 'USD', availability: 'Plenty' },
          'cheap',
        ],
      }),
    );

    expect(result.issues).toEqual([
      "Offer 0 price ('abc') must be a numeric value.",
      'Product schema "offers" list item 2 is invalid (not array, empty, or missing @type).',
    ]);
    expect(result.warnings).toEqual([
      PRODUCT_RECOMMENDED,
      "Offer 1 has an invalid availability value: 'Plenty'. Recommended to use standard schema.org values.",
    ]);
  });

  it('rejects offers of the wrong shape', () => {
    const result = validateSchema(makeEntity({ '@type': 'Product', name: 'Widget', offers: 'free' }));
    expect(result.issues).toEqual([
      'Product schema "offers" property has an invalid structure. Expected Offer, AggregateOffer, or array of Offers.',
    ]);
  });

  it('validates product reviews and ratings', () => {
    const result = validateSchema(
      makeEntity({
        '@type': 'Product',
        name: 'Widget',
        image: 'https://example.com/w.png',
        description: 'A widget',
        brand: 'Acme',
        offers: { '@type': 'Offer', price: 5, priceCurrency: 'EUR', availability: 'InStock' },
        review: {
          '@type': 'Review',
          reviewRating: { '@type': 'Rating', ratingValue: 'five' },
          author: { '@type': 'Person', name: 'Sam' },
        },
        aggregateRating: { '@type': 'AggregateRating', ratingValue: 4.5, reviewCount: 10, ratingCount: 12 },
      }),
    );

    expect(result.issues).toEqual(["Review item 0 'reviewRating' 'ratingValue' property ('five') must be a numeric value."]);
    expect(result.warnings).toEqual([
      'AggregateRating includes both reviewCount and ratingCount. Google typically prefers reviewCount if both are present.',
    ]);
  });

  it('requires a numeric count on aggregate ratings', () => {
    const result = validateSchema(
      makeEntity({
        '@type': 'Product',
        name: 'Widget',
        offers: { '@type': 'Offer', price: 5, priceCurrency: 'EUR', availability: 'InStock' },
        aggregateRating: { '@type': 'AggregateRating', ratingValue: ' ' },
      }),
    );

    expect(result.issues).toEqual([
      "AggregateRating is missing the required 'ratingValue' property or it is empty/non-numeric.",
      "AggregateRating 'ratingValue' (' ') must be a numeric value.",
      'AggregateRating must include either a numeric reviewCount or a numeric ratingCount property.',
    ]);
  });
});

describe('validateSchemas', () => {
  it('summarizes results with indexed messages', () => {
    const summary = validateSchemas([
      makeEntity({ '@type': 'Person', name: 'Ann', image: 'a.png', jobTitle: 'Editor', worksFor: 'Acme', sameAs: 'x' }),
      makeEntity({ name: 'untyped' }),
    ]);

    expect(summary.validSchemas).toBe(1);
    expect(summary.invalidSchemas).toBe(1);
    expect(summary.overallScore).toBe(50);
    expect(summary.issues).toEqual([{ schemaIndex: 1, schemaType: 'Unknown', message: 'Missing @type property' }]);
    expect(summary.warnings).toEqual([]);
  });

  it('scores zero with no schemas', () => {
    expect(validateSchemas([]).overallScore).toBe(0);
  });
});

describe('local business', () => {
  const restaurant = makeEntity({
    '@type': 'Restaurant',
    name: 'Cafe',
    telephone: '555-0100',
    openingHours: 'Mo-Fr 08:00-17:00',
    priceRange: '$$',
    address: {
      '@type': 'PostalAddress',
      streetAddress: '1 Main St',
      addressLocality: 'Springfield',
      addressRegion: 'IL',
      postalCode: '62701',
    },
    geo: { '@type': 'GeoCoordinates', latitude: '91', longitude: -74.006 },
  });

  it('scores completeness including address and geo problems', () => {
    expect(validateLocalBusinessSchema(restaurant)).toEqual({
      valid: false,
      // (13 - (0 + 7 + 1)) / 13
      completeness: 38.46,
      missingRequired: [],
      missingRecommended: ['description', 'image', 'url', 'sameAs', 'review', 'aggregateRating', 'hasMap'],
      incompleteProperties: ['Invalid latitude value: must be between -90 and 90.'],
      schemaType: 'Restaurant',
    });
  });

  it('checks address fields', () => {
    expect(validateAddressStructure({ '@type': 'PostalAddress', streetAddress: '1 Main St' })).toEqual([
      'Address is missing required field: addressLocality',
      'Address is missing required field: addressRegion',
      'Address is missing required field: postalCode',
    ]);
    expect(validateAddressStructure(undefined)).toEqual(['Address data is empty or missing.']);
  });

  it('checks geo coordinates', () => {
    expect(validateGeoStructure({ '@type': 'GeoCoordinates', latitude: 0, longitude: '1e2' })).toEqual([
      'Longitude must be in decimal format (e.g., -74.0060).',
    ]);
  });

  it('finds the local business entity', () => {
    const article = makeEntity({ '@type': 'Article' });
    const org = makeEntity({ '@type': 'Organization', address: 'Somewhere' });
    expect(findLocalBusinessSchema([article, org])).toBe(org);
    expect(findLocalBusinessSchema([article])).toBeNull();
  });

  it('resolves type hierarchy membership', () => {
    expect(belongsToSchemaType('Dentist', 'LocalBusiness')).toBe(true);
    expect(belongsToSchemaType('Article', 'CreativeWork')).toBe(true);
    expect(belongsToSchemaType('Article', 'Organization')).toBe(false);
    expect(belongsToSchemaType('Article', 'Thing')).toBe(false);
  });
});
