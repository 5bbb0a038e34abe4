import { DEFAULT_SCHEMA_RULES, type PropertyRule, type SchemaRules } from '../config';
import {
  IndexedSchemaMessage,
  LocalBusinessValidation,
  SchemaEntity,
  SchemaObject,
  SchemaValidationSummary,
  SchemaValue,
  ValidationResult,
  round,
} from '../types';

const SCHEMA_ORG_PREFIXES = ['http://schema.org/', 'https://schema.org/'];
const NUMERIC = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;
const DECIMAL = /^-?\d+(\.\d+)?$/;

interface Messages {
  issues: string[];
  warnings: string[];
}

export function isSchemaObject(value: SchemaValue | undefined): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Loose emptiness: null, '', '0', 0, false, empty lists and empty objects. */
export function isEmptyValue(value: SchemaValue | undefined): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === '' || value === '0') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isSchemaObject(value)) return Object.keys(value).length === 0;
  return false;
}

/** Strict emptiness also treats whitespace strings and containers of empty values as empty. */
export function isStrictlyEmpty(value: SchemaValue | undefined): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.every(isEmptyValue);
  if (isSchemaObject(value)) return Object.values(value).every(isEmptyValue);
  return isEmptyValue(value);
}

export function isNumericValue(value: SchemaValue | undefined): boolean {
  if (typeof value === 'number') return Number.isFinite(value);
  return typeof value === 'string' && NUMERIC.test(value);
}

function display(value: SchemaValue | undefined): string {
  if (value === undefined || value === null) return 'N/A';
  if (Array.isArray(value)) return value.map(display).join(', ');
  if (isSchemaObject(value)) return JSON.stringify(value);
  return String(value);
}

/** First declared `@type` of an object, without any schema.org URL prefix. */
export function primaryType(value: SchemaValue | undefined): string | null {
  if (!isSchemaObject(value)) return null;
  const type = value['@type'];
  const first = Array.isArray(type) ? type[0] : type;
  return typeof first === 'string' ? stripSchemaPrefix(first) : null;
}

export function stripSchemaPrefix(type: string): string {
  for (const prefix of SCHEMA_ORG_PREFIXES) {
    if (type.startsWith(prefix)) return type.slice(prefix.length);
  }
  return type;
}

export function entityTypes(entity: SchemaEntity): string[] {
  return Array.isArray(entity.type) ? entity.type : entity.type ? [entity.type] : [];
}

export function findMissingProperties(schema: SchemaObject, properties: string[], strict = false): string[] {
  return properties.filter(property => (strict ? isStrictlyEmpty(schema[property]) : isEmptyValue(schema[property])));
}

// A list stays a list; a single typed object becomes a one-item list; anything else is no list.
function ensureList(value: SchemaValue | undefined): SchemaValue[] {
  if (Array.isArray(value)) return value;
  if (isSchemaObject(value) && value['@type'] !== undefined) return [value];
  return [];
}

type Collection =
  | { kind: 'empty' }
  | { kind: 'list'; items: SchemaValue[] }
  | { kind: 'single'; item: SchemaObject }
  | { kind: 'invalid' };

function toCollection(value: SchemaValue | undefined): Collection {
  if (isEmptyValue(value)) return { kind: 'empty' };
  if (Array.isArray(value)) return { kind: 'list', items: value };
  if (isSchemaObject(value) && value['@type'] !== undefined) return { kind: 'single', item: value };
  return { kind: 'invalid' };
}

export function isLocalBusinessType(type: string, rules: SchemaRules = DEFAULT_SCHEMA_RULES): boolean {
  return type === 'LocalBusiness' || rules.localBusinessSubtypes.includes(type);
}

export function belongsToSchemaType(type: string, parentType: string, rules: SchemaRules = DEFAULT_SCHEMA_RULES): boolean {
  if (parentType === 'LocalBusiness') return rules.localBusinessSubtypes.includes(type);
  return rules.typeHierarchy[parentType]?.includes(type) ?? false;
}

function ruleFor(type: string, rules: SchemaRules): { rule: PropertyRule; generic: boolean } {
  const specific = rules.typeRules[type];
  if (specific) return { rule: specific, generic: false };
  const localBusiness = rules.typeRules.LocalBusiness;
  if (localBusiness && isLocalBusinessType(type, rules)) return { rule: localBusiness, generic: false };
  return { rule: rules.defaultRule, generic: true };
}

export function validateSchema(entity: SchemaEntity, rules: SchemaRules = DEFAULT_SCHEMA_RULES): ValidationResult {
  const type = entityTypes(entity)[0];
  if (!type) {
    return { valid: false, issues: ['Missing @type property'], warnings: [] };
  }

  const schema = entity.properties;
  const messages: Messages = { issues: [], warnings: [] };
  const { rule, generic } = ruleFor(type, rules);

  if (generic && !rules.genericallyValidatedTypes.includes(type)) {
    messages.warnings.push(`Schema type '${type}' is not specifically validated. Using generic validation rules.`);
  }

  const missingRequired = findMissingProperties(schema, rule.required, true);
  if (missingRequired.length > 0) {
    messages.issues.push(`Missing required properties: ${missingRequired.join(', ')}`);
  }
  const missingRecommended = findMissingProperties(schema, rule.recommended, true);
  if (missingRecommended.length > 0) {
    messages.warnings.push(`Missing recommended properties: ${missingRecommended.join(', ')}`);
  }

  if (type === 'FAQPage' && schema.mainEntity !== undefined && schema.mainEntity !== null) {
    validateFaqPageStructure(schema, messages);
  } else if (type === 'HowTo' && schema.step !== undefined && schema.step !== null) {
    validateHowToStructure(schema, messages);
  } else if (type === 'BreadcrumbList' && schema.itemListElement !== undefined && schema.itemListElement !== null) {
    validateBreadcrumbListStructure(schema, messages);
  } else if (type === 'Product' && schema.offers !== undefined && schema.offers !== null) {
    validateProductStructure(schema, messages, rules);
  }

  return { valid: messages.issues.length === 0, ...messages };
}

export function validateSchemas(entities: SchemaEntity[], rules: SchemaRules = DEFAULT_SCHEMA_RULES): SchemaValidationSummary {
  const issues: IndexedSchemaMessage[] = [];
  const warnings: IndexedSchemaMessage[] = [];
  const results: ValidationResult[] = [];
  let validSchemas = 0;

  entities.forEach((entity, schemaIndex) => {
    const result = validateSchema(entity, rules);
    results.push(result);
    const schemaType = entityTypes(entity)[0] ?? 'Unknown';

    if (result.valid) validSchemas++;
    for (const message of result.issues) issues.push({ schemaIndex, schemaType, message });
    for (const message of result.warnings) warnings.push({ schemaIndex, schemaType, message });
  });

  return {
    validSchemas,
    invalidSchemas: entities.length - validSchemas,
    issues,
    warnings,
    overallScore: entities.length > 0 ? round((validSchemas / entities.length) * 100) : 0,
    results,
  };
}

function validateFaqPageStructure(schema: SchemaObject, { issues }: Messages): void {
  const questions = ensureList(schema.mainEntity);
  if (questions.length === 0) {
    issues.push('mainEntity must be an array of Question items or a single Question object.');
    return;
  }

  questions.forEach((question, index) => {
    if (!isSchemaObject(question) || isEmptyValue(question)) {
      issues.push(`Item ${index} in mainEntity is not a valid object structure.`);
      return;
    }
    if (primaryType(question) !== 'Question') {
      issues.push(`Item ${index} in mainEntity should have @type: Question (found '${display(question['@type'])}').`);
      return;
    }
    for (const prop of findMissingProperties(question, ['name'], true)) {
      issues.push(`Question ${index} is missing the required '${prop}' property.`);
    }

    const answer = question.acceptedAnswer;
    if (isEmptyValue(answer)) {
      issues.push(`Question ${index} is missing the 'acceptedAnswer' property or it is empty.`);
      return;
    }
    if (!isSchemaObject(answer)) {
      issues.push(`AcceptedAnswer for question ${index} is not a valid object structure.`);
      return;
    }
    if (primaryType(answer) !== 'Answer') {
      issues.push(`AcceptedAnswer for question ${index} should have @type: Answer (found '${display(answer['@type'])}').`);
    }
    for (const prop of findMissingProperties(answer, ['text'], true)) {
      issues.push(`Answer for question ${index} is missing the required '${prop}' property.`);
    }
  });
}

function validateHowToStructure(schema: SchemaObject, { issues, warnings }: Messages): void {
  const steps = ensureList(schema.step);
  if (steps.length === 0) {
    issues.push('step must be an array of HowToStep items or a single HowToStep object.');
    return;
  }

  steps.forEach((step, index) => {
    if (!isSchemaObject(step) || isEmptyValue(step)) {
      issues.push(`Item ${index} in step list is not a valid object structure.`);
      return;
    }
    if (primaryType(step) !== 'HowToStep') {
      issues.push(`Item ${index} in step list should have @type: HowToStep (found '${display(step['@type'])}').`);
      return;
    }
    for (const prop of findMissingProperties(step, ['text'], true)) {
      issues.push(`HowToStep ${index} is missing the required '${prop}' property.`);
    }
    for (const prop of findMissingProperties(step, ['name'], true)) {
      warnings.push(`HowToStep ${index} is missing the recommended '${prop}' property.`);
    }
  });
}

function validateBreadcrumbListStructure(schema: SchemaObject, { issues, warnings }: Messages): void {
  const items = ensureList(schema.itemListElement);
  if (items.length === 0) {
    issues.push('itemListElement must be an array of ListItem objects or a single ListItem object.');
    return;
  }

  // The expected position advances for every entry, valid or not.
  items.forEach((item, index) => {
    const expected = index + 1;
    if (!isSchemaObject(item) || isEmptyValue(item)) {
      issues.push(`Item ${index} in itemListElement list is not a valid object structure.`);
      return;
    }
    if (primaryType(item) !== 'ListItem') {
      issues.push(`Item ${index} in itemListElement list should have @type: ListItem (found '${display(item['@type'])}').`);
      return;
    }
    for (const prop of findMissingProperties(item, ['position', 'item'], true)) {
      issues.push(`ListItem ${index} is missing the required '${prop}' property.`);
    }

    const position = item.position;
    if (position !== undefined && position !== null) {
      if (!isNumericValue(position) || Math.trunc(Number(position)) !== expected) {
        warnings.push(
          `ListItem ${index} has incorrect position. Expected position ${expected} but found ${display(position)}. Positions should be sequential starting from 1.`,
        );
      }
    }
  });
}

function validateProductStructure(schema: SchemaObject, messages: Messages, rules: SchemaRules): void {
  const { issues, warnings } = messages;
  const offers = toCollection(schema.offers);

  switch (offers.kind) {
    case 'empty':
      warnings.push('Product schema has an empty "offers" property.');
      break;
    case 'invalid':
      issues.push('Product schema "offers" property has an invalid structure. Expected Offer, AggregateOffer, or array of Offers.');
      break;
    case 'single': {
      const offerType = primaryType(offers.item);
      if (offerType === 'AggregateOffer') validateAggregateOfferStructure(offers.item, messages);
      else if (offerType === 'Offer') validateOfferStructure(offers.item, 0, messages, rules);
      else issues.push(`Product schema "offers" single object has an unexpected @type: ${display(offers.item['@type'])}. Expected Offer or AggregateOffer.`);
      break;
    }
    case 'list':
      offers.items.forEach((offer, index) => {
        if (!isSchemaObject(offer) || isEmptyValue(offer) || offer['@type'] === undefined) {
          issues.push(`Product schema "offers" list item ${index} is invalid (not array, empty, or missing @type).`);
          return;
        }
        if (primaryType(offer) === 'Offer') validateOfferStructure(offer, index, messages, rules);
        else issues.push(`Product schema "offers" list item ${index} has an unexpected @type: ${display(offer['@type'])}. Expected Offer.`);
      });
      break;
  }

  if (!isEmptyValue(schema.review)) {
    validateReviewStructure(schema.review, messages);
  }

  const rating = schema.aggregateRating;
  if (!isEmptyValue(rating)) {
    if (isSchemaObject(rating)) validateAggregateRatingStructure(rating, messages);
    else issues.push('Product schema "aggregateRating" property is present but not a valid object structure.');
  }
}

function validateOfferStructure(offer: SchemaObject, index: number, { issues, warnings }: Messages, rules: SchemaRules): void {
  if (primaryType(offer) !== 'Offer') {
    issues.push(`Offer ${index} should have @type: Offer (found '${display(offer['@type'])}').`);
  }
  for (const prop of findMissingProperties(offer, ['price', 'priceCurrency'], true)) {
    issues.push(`Offer ${index} is missing the required '${prop}' property.`);
  }
  for (const prop of findMissingProperties(offer, ['availability'], true)) {
    warnings.push(`Offer ${index} is missing the recommended '${prop}' property.`);
  }

  if (!isEmptyValue(offer.price) && !isNumericValue(offer.price)) {
    issues.push(`Offer ${index} price ('${display(offer.price)}') must be a numeric value.`);
  }

  const availability = offer.availability;
  if (!isEmptyValue(availability)) {
    if (typeof availability !== 'string') {
      warnings.push(`Offer ${index} 'availability' property has an unexpected format (expected string).`);
    } else if (!rules.offerAvailability.includes(stripSchemaPrefix(availability))) {
      warnings.push(
        `Offer ${index} has an invalid availability value: '${availability}'. Recommended to use standard schema.org values.`,
      );
    }
  }
}

function validateAggregateOfferStructure(offer: SchemaObject, { issues, warnings }: Messages): void {
  if (primaryType(offer) !== 'AggregateOffer') {
    issues.push(`AggregateOffer should have @type: AggregateOffer (found "${display(offer['@type'])}").`);
  }
  for (const prop of findMissingProperties(offer, ['lowPrice', 'priceCurrency'], true)) {
    issues.push(`AggregateOffer is missing the required '${prop}' property.`);
  }
  for (const prop of findMissingProperties(offer, ['highPrice', 'offerCount'], true)) {
    warnings.push(`AggregateOffer is missing the recommended '${prop}' property.`);
  }

  const { lowPrice, highPrice, offerCount } = offer;
  if (!isEmptyValue(lowPrice) && !isNumericValue(lowPrice)) {
    issues.push(`AggregateOffer lowPrice ('${display(lowPrice)}') must be a numeric value.`);
  }
  if (!isEmptyValue(highPrice)) {
    if (!isNumericValue(highPrice)) {
      issues.push(`AggregateOffer highPrice ('${display(highPrice)}') must be a numeric value.`);
    } else if (isNumericValue(lowPrice) && Number(highPrice) < Number(lowPrice)) {
      warnings.push(`AggregateOffer highPrice (${display(highPrice)}) is less than lowPrice (${display(lowPrice)}).`);
    }
  }
  if (!isEmptyValue(offerCount) && (!isNumericValue(offerCount) || Math.trunc(Number(offerCount)) <= 0)) {
    warnings.push(`AggregateOffer offerCount ('${display(offerCount)}') must be a positive integer.`);
  }
}

function validateReviewStructure(review: SchemaValue | undefined, { issues, warnings }: Messages): void {
  const reviews = ensureList(review);
  if (reviews.length === 0) {
    warnings.push('The "review" property is present but empty or has an invalid structure. Expected Review object(s).');
    return;
  }

  reviews.forEach((item, index) => {
    if (!isSchemaObject(item) || isEmptyValue(item)) {
      issues.push(`Review item ${index} is not a valid object structure.`);
      return;
    }
    if (primaryType(item) !== 'Review') {
      issues.push(`Review item ${index} should have @type: Review (found '${display(item['@type'])}').`);
    }
    for (const prop of findMissingProperties(item, ['reviewRating', 'author'], true)) {
      issues.push(`Review item ${index} is missing the required '${prop}' property.`);
    }

    const rating = item.reviewRating;
    if (!isEmptyValue(rating)) {
      if (!isSchemaObject(rating)) {
        issues.push(`Review item ${index} 'reviewRating' property is present but not a valid object structure.`);
      } else {
        if (primaryType(rating) !== 'Rating') {
          issues.push(`Review item ${index} 'reviewRating' should have @type: Rating (found '${display(rating['@type'])}').`);
        }
        for (const prop of findMissingProperties(rating, ['ratingValue'], true)) {
          issues.push(`Review item ${index} 'reviewRating' is missing the required '${prop}' property or it is empty/non-numeric.`);
        }
        if (!isEmptyValue(rating.ratingValue) && !isNumericValue(rating.ratingValue)) {
          issues.push(
            `Review item ${index} 'reviewRating' 'ratingValue' property ('${display(rating.ratingValue)}') must be a numeric value.`,
          );
        }
      }
    }

    const author = item.author;
    if (!isEmptyValue(author)) {
      if (!isSchemaObject(author)) {
        issues.push(`Review item ${index} 'author' property is present but not a valid object structure.`);
      } else {
        const authorType = primaryType(author);
        if (authorType !== 'Person' && authorType !== 'Organization') {
          issues.push(`Review item ${index} 'author' should have @type: Person or Organization (found '${display(author['@type'])}').`);
        }
        for (const prop of findMissingProperties(author, ['name'], true)) {
          issues.push(`Review item ${index} 'author' is missing the required '${prop}' property.`);
        }
      }
    }

    const reviewed = item.itemReviewed;
    if (!isEmptyValue(reviewed)) {
      const valid =
        isSchemaObject(reviewed) &&
        !isEmptyValue(reviewed.name) &&
        (!isEmptyValue(reviewed.id) || !isEmptyValue(reviewed['@id']));
      if (!valid) {
        issues.push(
          `Review item ${index} 'itemReviewed' property is present but invalid or missing recommended details (name, id/@id).`,
        );
      }
    }
  });
}

function validateAggregateRatingStructure(rating: SchemaObject, { issues, warnings }: Messages): void {
  if (primaryType(rating) !== 'AggregateRating') {
    issues.push(`AggregateRating should have @type: AggregateRating (found "${display(rating['@type'])}").`);
  }
  for (const prop of findMissingProperties(rating, ['ratingValue'], true)) {
    issues.push(`AggregateRating is missing the required '${prop}' property or it is empty/non-numeric.`);
  }
  if (!isEmptyValue(rating.ratingValue) && !isNumericValue(rating.ratingValue)) {
    issues.push(`AggregateRating 'ratingValue' ('${display(rating.ratingValue)}') must be a numeric value.`);
  }

  const hasReviewCount = isNumericValue(rating.reviewCount);
  const hasRatingCount = isNumericValue(rating.ratingCount);
  if (!hasReviewCount && !hasRatingCount) {
    issues.push('AggregateRating must include either a numeric reviewCount or a numeric ratingCount property.');
    return;
  }
  if (rating.reviewCount !== undefined && !hasReviewCount) {
    issues.push(`AggregateRating 'reviewCount' ('${display(rating.reviewCount)}') must be a numeric value.`);
  }
  if (rating.ratingCount !== undefined && !hasRatingCount) {
    issues.push(`AggregateRating 'ratingCount' ('${display(rating.ratingCount)}') must be a numeric value.`);
  }
  if (hasReviewCount && hasRatingCount) {
    warnings.push('AggregateRating includes both reviewCount and ratingCount. Google typically prefers reviewCount if both are present.');
  }
}

export function validateAddressStructure(address: SchemaValue | undefined, rules: SchemaRules = DEFAULT_SCHEMA_RULES): string[] {
  if (!isSchemaObject(address) || isEmptyValue(address)) return ['Address data is empty or missing.'];

  const issues: string[] = [];
  if (primaryType(address) !== 'PostalAddress') {
    issues.push('Address is missing @type: PostalAddress or type is incorrect.');
  }
  for (const field of rules.addressRequired) {
    if (isEmptyValue(address[field])) issues.push(`Address is missing required field: ${field}`);
  }
  return issues;
}

export function validateGeoStructure(geo: SchemaValue | undefined): string[] {
  if (!isSchemaObject(geo) || isEmptyValue(geo)) return ['Geo data is empty or missing.'];

  const issues: string[] = [];
  if (primaryType(geo) !== 'GeoCoordinates') {
    issues.push('Geo is missing @type: GeoCoordinates or type is incorrect.');
  }
  for (const field of ['latitude', 'longitude']) {
    if (isEmptyValue(geo[field]) && !isNumericValue(geo[field])) {
      issues.push(`Geo is missing required field or value is not numeric: ${field}`);
    }
  }

  const checks = [
    { field: 'latitude', label: 'Latitude', limit: 90, example: '40.7128' },
    { field: 'longitude', label: 'Longitude', limit: 180, example: '-74.0060' },
  ];
  for (const { field, label, limit, example } of checks) {
    const value = geo[field];
    if (isEmptyValue(value)) continue;
    if (!isNumericValue(value)) {
      issues.push(`${label} must be a numeric value.`);
      continue;
    }
    const numeric = Number(value);
    if (numeric < -limit || numeric > limit) {
      issues.push(`Invalid ${field} value: must be between -${limit} and ${limit}.`);
    }
    if (!DECIMAL.test(String(value))) {
      issues.push(`${label} must be in decimal format (e.g., ${example}).`);
    }
  }
  return issues;
}

/**
 * Completeness of a local business entity: required and recommended
 * properties plus address and geo structure, as a percentage.
 */
export function validateLocalBusinessSchema(
  entity: SchemaEntity,
  rules: SchemaRules = DEFAULT_SCHEMA_RULES,
): LocalBusinessValidation {
  const schema = entity.properties;
  const rule = rules.typeRules.LocalBusiness ?? rules.defaultRule;

  const missingRequired = findMissingProperties(schema, rule.required, true);
  const missingRecommended = findMissingProperties(schema, rule.recommended, true);
  const incompleteProperties = [...validateAddressStructure(schema.address, rules), ...validateGeoStructure(schema.geo)];

  const total = rule.required.length + rule.recommended.length;
  const missing = missingRequired.length + missingRecommended.length + incompleteProperties.length;

  return {
    valid: missingRequired.length === 0 && incompleteProperties.length === 0,
    completeness: total > 0 ? round(((total - missing) / total) * 100) : 0,
    missingRequired,
    missingRecommended,
    incompleteProperties,
    schemaType: entityTypes(entity)[0] ?? 'Unknown',
  };
}

export function findLocalBusinessSchema(
  entities: SchemaEntity[],
  rules: SchemaRules = DEFAULT_SCHEMA_RULES,
): SchemaEntity | null {
  for (const entity of entities) {
    const type = entityTypes(entity)[0];
    if (!type) continue;
    const props = entity.properties;

    if (isLocalBusinessType(type, rules)) return entity;
    if (type === 'Organization' && (props.location !== undefined || props.address !== undefined)) return entity;
    if (type === 'Place' && props.address !== undefined) return entity;
  }
  return null;
}
