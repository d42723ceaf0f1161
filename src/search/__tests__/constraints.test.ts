/**
 * Constraint Tests
 *
 * Schema validation and predicate evaluation shared by index filtering
 * and post-filtering.
 */

import { describe, it, expect, vi } from 'vitest';

import {
  compareIds,
  describeConstraints,
  isUnconstrained,
  matchesConstraints,
  validateConstraints,
} from '../constraints.js';
import { CATALOG_SCHEMA } from '../catalog.js';
import type { ConstraintPredicate, Constraints } from '../types.js';

describe('validateConstraints', () => {
  it('should keep constraints that fit the schema', () => {
    const constraints: Constraints = {
      price: { kind: 'range', max: 1200 },
      skin_type: { kind: 'contains', values: ['oily'] },
    };

    const { valid, dropped } = validateConstraints(constraints, CATALOG_SCHEMA);

    expect(valid).toEqual(constraints);
    expect(dropped).toEqual([]);
  });

  it('should drop unknown attributes and log them at debug level', () => {
    const logger = { warn: vi.fn(), debug: vi.fn() };

    const { valid, dropped } = validateConstraints(
      { colour: { kind: 'oneOf', values: ['red'] } },
      CATALOG_SCHEMA,
      logger
    );

    expect(valid).toEqual({});
    expect(dropped).toEqual([{ attribute: 'colour', reason: 'unknown attribute' }]);
    expect(logger.debug).toHaveBeenCalledWith(
      'Dropping invalid constraint "colour": unknown attribute'
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should drop attributes named like built-in object properties', () => {
    const { valid, dropped } = validateConstraints(
      {
        toString: { kind: 'range', max: 5 } satisfies ConstraintPredicate,
        constructor: { kind: 'oneOf', values: ['x'] } satisfies ConstraintPredicate,
      },
      CATALOG_SCHEMA
    );

    expect(valid).toEqual({});
    expect(dropped).toEqual([
      { attribute: 'toString', reason: 'unknown attribute' },
      { attribute: 'constructor', reason: 'unknown attribute' },
    ]);
  });

  it('should drop predicates whose kind does not fit the attribute type', () => {
    const { valid, dropped } = validateConstraints(
      { price: { kind: 'oneOf', values: ['cheap'] } },
      CATALOG_SCHEMA
    );

    expect(valid).toEqual({});
    expect(dropped[0]?.reason).toBe('"oneOf" does not apply to number attributes');
  });

  it('should drop empty predicates', () => {
    const { valid, dropped } = validateConstraints(
      {
        price: { kind: 'range' },
        skin_type: { kind: 'contains', values: [] },
      },
      CATALOG_SCHEMA
    );

    expect(valid).toEqual({});
    expect(dropped.map((d) => d.attribute)).toEqual(['price', 'skin_type']);
  });
});

describe('matchesConstraints', () => {
  const product = {
    price: 1100,
    category: 'moisturizer',
    skin_type: ['oily', 'combination'],
  };

  it('should treat range bounds as inclusive', () => {
    expect(matchesConstraints(product, { price: { kind: 'range', max: 1100 } })).toBe(true);
    expect(matchesConstraints(product, { price: { kind: 'range', min: 1100 } })).toBe(true);
    expect(matchesConstraints(product, { price: { kind: 'range', max: 1099 } })).toBe(false);
  });

  it('should match oneOf case-insensitively', () => {
    expect(
      matchesConstraints(product, { category: { kind: 'oneOf', values: ['Moisturizer'] } })
    ).toBe(true);
    expect(matchesConstraints(product, { category: { kind: 'oneOf', values: ['serum'] } })).toBe(
      false
    );
  });

  it('should match contains when any value is present', () => {
    expect(
      matchesConstraints(product, { skin_type: { kind: 'contains', values: ['dry', 'OILY'] } })
    ).toBe(true);
    expect(
      matchesConstraints(product, { skin_type: { kind: 'contains', values: ['sensitive'] } })
    ).toBe(false);
  });

  it('should AND-combine constraints', () => {
    expect(
      matchesConstraints(product, {
        price: { kind: 'range', max: 1200 },
        skin_type: { kind: 'contains', values: ['dry'] },
      })
    ).toBe(false);
  });

  it('should never match a missing attribute', () => {
    expect(matchesConstraints(product, { rating: { kind: 'range', min: 4 } })).toBe(false);
  });

  it('should only read the record\'s own attributes', () => {
    expect(matchesConstraints(product, { toString: { kind: 'oneOf', values: ['x'] } satisfies ConstraintPredicate })).toBe(false);
    expect(matchesConstraints(product, { constructor: { kind: 'contains', values: ['x'] } satisfies ConstraintPredicate })).toBe(false);
  });

  it('should match everything when unconstrained', () => {
    expect(matchesConstraints(product, {})).toBe(true);
    expect(isUnconstrained({})).toBe(true);
  });
});

describe('describeConstraints', () => {
  it('should render each predicate kind', () => {
    expect(
      describeConstraints({
        price: { kind: 'range', max: 1200 },
        rating: { kind: 'range', min: 4 },
        category: { kind: 'oneOf', values: ['serum', 'toner'] },
        skin_type: { kind: 'contains', values: ['oily'] },
      })
    ).toBe('price <= 1200, rating >= 4, category in serum|toner, skin_type has oily');
  });

  it('should render a closed range and the empty set', () => {
    expect(describeConstraints({ price: { kind: 'range', min: 500, max: 1000 } })).toBe(
      'price 500-1000'
    );
    expect(describeConstraints({})).toBe('none');
  });
});

describe('compareIds', () => {
  it('should order by code unit', () => {
    expect(['b', 'a', 'B'].sort(compareIds)).toEqual(['B', 'a', 'b']);
  });
});
