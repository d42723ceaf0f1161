/**
 * Constraint Extractor
 *
 * Pulls structured filters out of free text with fixed patterns:
 * price bounds, skin types, key ingredients, concern tags, explicit
 * category/brand/author filters and minimum ratings. No model calls.
 *
 * @example
 * ```typescript
 * extractConstraints('Recommend a moisturizer under 1200 for oily skin');
 * // {
 * //   price: { kind: 'range', max: 1200 },
 * //   skin_type: { kind: 'contains', values: ['oily'] },
 * // }
 * ```
 *
 * Product-type nouns on their own ("a moisturizer") stay in the semantic
 * query. Only explicit phrasing ("only serums", "category: toner") becomes
 * a category filter.
 */

import type { ConstraintPredicate, Constraints } from '../search/types.js';

// ============================================================================
// Vocabularies
// ============================================================================

export const SKIN_TYPES = ['oily', 'dry', 'combination', 'sensitive', 'normal', 'acne-prone'] as const;

/** Surface form → canonical ingredient */
const INGREDIENTS: ReadonlyArray<[RegExp, string]> = [
  [/\bniacinamide\b/, 'niacinamide'],
  [/\bhyaluronic(?: acid)?\b/, 'hyaluronic acid'],
  [/\bsalicylic(?: acid)?\b|\bbha\b/, 'salicylic acid'],
  [/\bglycolic(?: acid)?\b/, 'glycolic acid'],
  [/\blactic acid\b/, 'lactic acid'],
  [/\bazelaic(?: acid)?\b/, 'azelaic acid'],
  [/\bretinol\b|\bretinoids?\b/, 'retinol'],
  [/\bvitamin c\b|\bascorbic acid\b/, 'vitamin c'],
  [/\bvitamin e\b/, 'vitamin e'],
  [/\bceramides?\b/, 'ceramides'],
  [/\bpeptides?\b/, 'peptides'],
  [/\bbenzoyl peroxide\b/, 'benzoyl peroxide'],
  [/\bzinc(?: oxide)?\b/, 'zinc'],
  [/\btea tree\b/, 'tea tree'],
  [/\baloe(?: vera)?\b/, 'aloe vera'],
  [/\bcentella\b|\bcica\b/, 'centella'],
  [/\bsqualane\b/, 'squalane'],
  [/\bsnail mucin\b/, 'snail mucin'],
];

/** Surface form → canonical concern tag */
const CONCERNS: ReadonlyArray<[RegExp, string]> = [
  [/\bacne\b|\bpimples?\b|\bbreakouts?\b/, 'acne'],
  [/\b(?:hyper)?pigmentation\b|\bdark spots?\b|\bmelasma\b/, 'pigmentation'],
  [/\banti[- ]?aging\b|\bageing\b|\baging\b|\bwrinkles?\b|\bfine lines\b/, 'aging'],
  [/\bredness\b/, 'redness'],
  [/\brosacea\b/, 'rosacea'],
  [/\beczema\b/, 'eczema'],
  [/\bdark circles?\b/, 'dark-circles'],
  [/\bpores?\b|\bblackheads?\b|\bwhiteheads?\b/, 'pores'],
  [/\bdull(?:ness)?\b/, 'dullness'],
  [/\bdehydrat(?:ed|ion)\b/, 'dehydration'],
  [/\bsun ?(?:damage|burn|tan)\b|\btanning\b/, 'sun-damage'],
];

/** Surface form (singular or plural) → canonical category */
const CATEGORY_FORMS: Readonly<Record<string, string>> = {
  moisturizer: 'moisturizer',
  moisturizers: 'moisturizer',
  moisturiser: 'moisturizer',
  moisturisers: 'moisturizer',
  serum: 'serum',
  serums: 'serum',
  sunscreen: 'sunscreen',
  sunscreens: 'sunscreen',
  cleanser: 'cleanser',
  cleansers: 'cleanser',
  'face wash': 'cleanser',
  'face washes': 'cleanser',
  toner: 'toner',
  toners: 'toner',
  mask: 'mask',
  masks: 'mask',
  exfoliant: 'exfoliant',
  exfoliants: 'exfoliant',
  'eye cream': 'eye cream',
  'eye creams': 'eye cream',
  'lip balm': 'lip balm',
  'lip balms': 'lip balm',
  'face oil': 'face oil',
  'face oils': 'face oil',
};

/** Product-type nouns, used as catalog signals by the classifier */
export const PRODUCT_NOUN_PATTERN = new RegExp(
  `\\b(?:${Object.keys(CATEGORY_FORMS).sort((a, b) => b.length - a.length).join('|')}|creams?|gels?|lotions?|products?)\\b`
);

// ============================================================================
// Patterns
// ============================================================================

const CURRENCY = String.raw`(?:₹|rs\.?|inr|\$|usd)`;
const AMOUNT = String.raw`(\d+(?:\.\d+)?)(?:\s*(k)\b)?`;
const AMOUNT_SUFFIX = String.raw`(?:\s*(?:rupees|rs\.?|inr|dollars|bucks))?`;
/** Amounts of time, frequency, strength or volume are not prices. */
const NOT_A_PRICE = String.raw`(?!\d|\.\d|\s*(?:%|percent\b|x\b|times?\b|seconds?\b|secs?\b|minutes?\b|mins?\b|hours?\b|hrs?\b|days?\b|nights?\b|weeks?\b|months?\b|years?\b|yrs?\b|spf\b|ml\b|g\b|grams?\b|oz\b|drops?\b|pumps?\b|layers?\b|steps?\b))`;
const PRICED = String.raw`${CURRENCY}?\s*${AMOUNT}${AMOUNT_SUFFIX}${NOT_A_PRICE}`;

const BETWEEN_RE = new RegExp(String.raw`\bbetween\s+${PRICED}\s*(?:and|to|-)\s*${PRICED}`);
const DASH_RANGE_RE = new RegExp(
  String.raw`${CURRENCY}\s*${AMOUNT}\s*(?:-|to)\s*${CURRENCY}?\s*${AMOUNT}|\b${AMOUNT}\s*(?:-|to)\s*${AMOUNT}\s*(?:rupees|rs\.?|inr|dollars)\b`
);
const CEILING_RE = new RegExp(
  String.raw`\b(?:under|below|less than|within|up to|upto|max(?:imum)?|cheaper than|no more than|at most)\s+${PRICED}`
);
const FLOOR_RE = new RegExp(
  String.raw`\b(?:above|over|more than|at least|min(?:imum)?|starting (?:at|from))\s+${PRICED}`
);
const BUDGET_RE = /\b(?:affordable|budget|cheap|inexpensive|low[- ]cost)\b/;

const RATING_RES: readonly RegExp[] = [
  /\brated\s+(?:above\s+|over\s+|at least\s+)?(\d(?:\.\d)?)(?:\s*\+|\s*stars?|\s*\/\s*5)?/,
  /\brating\s+(?:of\s+|above\s+|over\s+|at least\s+)?(\d(?:\.\d)?)(?:\s*\+|\s*stars?|\s*\/\s*5)?/,
  /\b(\d(?:\.\d)?)\s*\+?\s*stars?\b/,
];

const SKIN_TYPE_TOKEN = String.raw`(?:oily|dry|combination|sensitive|normal|acne[- ]prone)`;
const SKIN_LIST_RE = new RegExp(
  String.raw`(${SKIN_TYPE_TOKEN}(?:\s*(?:,|\/|&|\band\b|\bor\b|\bto\b)\s*${SKIN_TYPE_TOKEN})*)[\s-]+skin(?:ned)?\b`,
  'g'
);
const SKIN_LABEL_RE = new RegExp(String.raw`\bskin\s*type\s*(?::|=|is)?\s*(${SKIN_TYPE_TOKEN})`, 'g');
const ACNE_PRONE_RE = /\bacne[- ]prone\b/;

const CATEGORY_ALTERNATION = Object.keys(CATEGORY_FORMS)
  .sort((a, b) => b.length - a.length)
  .join('|');
const CATEGORY_RES: readonly RegExp[] = [
  new RegExp(String.raw`\bonly\s+(${CATEGORY_ALTERNATION})\b`),
  new RegExp(String.raw`\bcategory\s*(?::|=|is)?\s*(${CATEGORY_ALTERNATION})\b`),
  new RegExp(String.raw`\bin\s+the\s+(${CATEGORY_ALTERNATION})\s+category\b`),
];

const BRAND_RE = /\bbrand\s*(?::|=|is)\s*([a-z0-9][a-z0-9&'. -]*?)(?=\s*(?:$|[,;!?]|\bfor\b|\bunder\b|\bwith\b|\band\b))/;
const AUTHOR_RE = /\bauthor\s*(?::|=|is)\s*([a-z][a-z'. -]*?)(?=\s*(?:$|[,;!?]|\babout\b|\bon\b|\band\b))/;

// ============================================================================
// Extraction
// ============================================================================

export interface ExtractionOptions {
  /** Price ceiling implied by "affordable", "budget", "cheap" (default: 1000) */
  affordablePriceCeiling?: number;
}

export const DEFAULT_AFFORDABLE_PRICE_CEILING = 1000;

function toAmount(digits: string | undefined, thousands: string | undefined): number | undefined {
  if (digits === undefined) return undefined;
  const value = Number.parseFloat(digits);
  if (!Number.isFinite(value)) return undefined;
  return thousands ? value * 1000 : value;
}

/** Remove a matched span so later patterns don't see it again. */
function consume(text: string, match: RegExpMatchArray): string {
  const start = match.index ?? 0;
  return `${text.slice(0, start)} ${text.slice(start + match[0].length)}`;
}

function normalizeQuery(queryText: string): string {
  return queryText
    .toLowerCase()
    .replace(/(\d),(?=\d{3}\b)/g, '$1')
    .replace(/\s+/g, ' ')
    .trim();
}

interface PriceResult {
  range?: { min?: number; max?: number };
  rest: string;
}

function extractPrice(text: string, affordableCeiling: number): PriceResult {
  let rest = text;
  let min: number | undefined;
  let max: number | undefined;

  const between = rest.match(BETWEEN_RE);
  if (between) {
    min = toAmount(between[1], between[2]);
    max = toAmount(between[3], between[4]);
    rest = consume(rest, between);
  } else {
    const dash = rest.match(DASH_RANGE_RE);
    if (dash) {
      min = toAmount(dash[1] ?? dash[5], dash[2] ?? dash[6]);
      max = toAmount(dash[3] ?? dash[7], dash[4] ?? dash[8]);
      rest = consume(rest, dash);
    }
  }

  if (max === undefined) {
    const ceiling = rest.match(CEILING_RE);
    if (ceiling) {
      max = toAmount(ceiling[1], ceiling[2]);
      rest = consume(rest, ceiling);
    }
  }
  if (min === undefined) {
    const floor = rest.match(FLOOR_RE);
    if (floor) {
      min = toAmount(floor[1], floor[2]);
      rest = consume(rest, floor);
    }
  }

  if (max === undefined && BUDGET_RE.test(rest)) {
    max = affordableCeiling;
  }

  if (min !== undefined && max !== undefined && min > max) {
    [min, max] = [max, min];
  }

  if (min === undefined && max === undefined) return { rest };
  return {
    range: { ...(min !== undefined ? { min } : {}), ...(max !== undefined ? { max } : {}) },
    rest,
  };
}

function extractRating(text: string): { min?: number; rest: string } {
  for (const pattern of RATING_RES) {
    const match = text.match(pattern);
    const value = match ? Number.parseFloat(match[1] ?? '') : Number.NaN;
    if (match && value >= 0 && value <= 5) {
      return { min: value, rest: consume(text, match) };
    }
  }
  return { rest: text };
}

function canonicalSkinType(token: string): string {
  return token.replace(/\s+/, '-');
}

function extractSkinTypes(text: string): string[] {
  const found = new Set<string>();
  const tokenRe = new RegExp(SKIN_TYPE_TOKEN, 'g');

  for (const match of text.matchAll(SKIN_LIST_RE)) {
    for (const token of (match[1] ?? '').match(tokenRe) ?? []) {
      found.add(canonicalSkinType(token));
    }
  }
  for (const match of text.matchAll(SKIN_LABEL_RE)) {
    if (match[1]) found.add(canonicalSkinType(match[1]));
  }
  if (ACNE_PRONE_RE.test(text)) found.add('acne-prone');

  return SKIN_TYPES.filter((type) => found.has(type));
}

function collect(text: string, vocabulary: ReadonlyArray<[RegExp, string]>): string[] {
  const values: string[] = [];
  for (const [pattern, canonical] of vocabulary) {
    if (pattern.test(text) && !values.includes(canonical)) values.push(canonical);
  }
  return values;
}

function extractCategory(text: string): string | undefined {
  for (const pattern of CATEGORY_RES) {
    const form = text.match(pattern)?.[1];
    if (form) return CATEGORY_FORMS[form];
  }
  return undefined;
}

/**
 * Extract constraints from a query. Mentions that can't be parsed are
 * left out.
 */
export function extractConstraints(queryText: string, options: ExtractionOptions = {}): Constraints {
  const affordableCeiling = options.affordablePriceCeiling ?? DEFAULT_AFFORDABLE_PRICE_CEILING;
  const constraints: Record<string, ConstraintPredicate> = {};

  let text = normalizeQuery(queryText);

  const rating = extractRating(text);
  text = rating.rest;

  const price = extractPrice(text, affordableCeiling);
  text = price.rest;

  if (price.range) {
    constraints.price = { kind: 'range', ...price.range };
  }

  const category = extractCategory(text);
  if (category) {
    constraints.category = { kind: 'oneOf', values: [category] };
  }

  const skinTypes = extractSkinTypes(text);
  if (skinTypes.length > 0) {
    constraints.skin_type = { kind: 'contains', values: skinTypes };
  }

  const ingredients = collect(text, INGREDIENTS);
  if (ingredients.length > 0) {
    constraints.key_ingredients = { kind: 'contains', values: ingredients };
  }

  const brand = text.match(BRAND_RE)?.[1]?.trim();
  if (brand) {
    constraints.brand = { kind: 'oneOf', values: [brand] };
  }

  if (rating.min !== undefined) {
    constraints.rating = { kind: 'range', min: rating.min };
  }

  const tags = collect(text, CONCERNS);
  if (tags.length > 0) {
    constraints.tags = { kind: 'contains', values: tags };
  }

  const author = text.match(AUTHOR_RE)?.[1]?.trim();
  if (author) {
    constraints.author = { kind: 'oneOf', values: [author] };
  }

  return constraints;
}

/**
 * Merge constraints from an earlier turn under new ones. New attributes
 * replace old ones wholesale.
 */
export function mergeConstraints(previous: Constraints, next: Constraints): Constraints {
  return { ...previous, ...next };
}
