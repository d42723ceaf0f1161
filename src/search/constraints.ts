/**
 * Constraint validation and evaluation.
 *
 * The same predicate semantics are used by the in-memory index (server-side
 * filtering) and by the adapters' post-filter path, so both produce the same
 * candidates for a fixed corpus.
 */

import type { Logger } from '../utils/logger.js';
import type { AttributeType, ConstraintPredicate, Constraints, SourceSchema } from './types.js';

// ============================================================================
// Validation
// ============================================================================

/** Predicate kinds each attribute type accepts. */
const ACCEPTED_KINDS: Record<AttributeType, ReadonlyArray<ConstraintPredicate['kind']>> = {
  number: ['range'],
  enum: ['oneOf'],
  string: ['oneOf'],
  set: ['contains'],
};

/** A constraint that was dropped, with the reason. */
export interface InvalidConstraint {
  attribute: string;
  reason: string;
}

export interface ConstraintValidation {
  valid: Constraints;
  dropped: InvalidConstraint[];
}

function isUsable(predicate: ConstraintPredicate): boolean {
  switch (predicate.kind) {
    case 'range':
      return (
        (predicate.min !== undefined || predicate.max !== undefined) &&
        (predicate.min === undefined || Number.isFinite(predicate.min)) &&
        (predicate.max === undefined || Number.isFinite(predicate.max))
      );
    case 'oneOf':
    case 'contains':
      return predicate.values.length > 0;
  }
}

/**
 * Keep only the constraints a source schema understands.
 *
 * Unknown attributes, predicate kinds that don't fit the attribute type and
 * empty predicates are dropped and reported through `logger.debug`.
 */
export function validateConstraints(
  constraints: Constraints,
  schema: SourceSchema,
  logger?: Logger
): ConstraintValidation {
  const valid: Record<string, ConstraintPredicate> = {};
  const dropped: InvalidConstraint[] = [];

  for (const [attribute, predicate] of Object.entries(constraints)) {
    const type = Object.hasOwn(schema, attribute) ? schema[attribute] : undefined;
    let reason: string | undefined;

    if (type === undefined) {
      reason = 'unknown attribute';
    } else if (!ACCEPTED_KINDS[type].includes(predicate.kind)) {
      reason = `"${predicate.kind}" does not apply to ${type} attributes`;
    } else if (!isUsable(predicate)) {
      reason = 'empty predicate';
    }

    if (reason) {
      dropped.push({ attribute, reason });
      logger?.debug?.(`Dropping invalid constraint "${attribute}": ${reason}`);
    } else {
      valid[attribute] = predicate;
    }
  }

  return { valid, dropped };
}

// ============================================================================
// Evaluation
// ============================================================================

function normalize(value: string): string {
  return value.trim().toLowerCase();
}

function matchesPredicate(value: unknown, predicate: ConstraintPredicate): boolean {
  switch (predicate.kind) {
    case 'range': {
      if (typeof value !== 'number' || Number.isNaN(value)) return false;
      if (predicate.min !== undefined && value < predicate.min) return false;
      if (predicate.max !== undefined && value > predicate.max) return false;
      return true;
    }
    case 'oneOf': {
      if (typeof value !== 'string') return false;
      const wanted = predicate.values.map(normalize);
      return wanted.includes(normalize(value));
    }
    case 'contains': {
      if (!Array.isArray(value)) return false;
      const held = new Set(
        value.filter((v): v is string => typeof v === 'string').map(normalize)
      );
      return predicate.values.some((v) => held.has(normalize(v)));
    }
  }
}

/**
 * Whether a record's metadata satisfies every constraint (AND).
 *
 * String comparison is case-insensitive. A missing attribute never matches;
 * only the record's own keys count.
 */
export function matchesConstraints(
  metadata: Readonly<Record<string, unknown>>,
  constraints: Constraints
): boolean {
  return Object.entries(constraints).every(([attribute, predicate]) =>
    matchesPredicate(Object.hasOwn(metadata, attribute) ? metadata[attribute] : undefined, predicate)
  );
}

/** Code-unit order, independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** True when no constraint is set. */
export function isUnconstrained(constraints: Constraints): boolean {
  return Object.keys(constraints).length === 0;
}

/** Human-readable rendering, e.g. `price <= 1200, skin_type has oily`. */
export function describeConstraints(constraints: Constraints): string {
  const parts = Object.entries(constraints).map(([attribute, predicate]) => {
    switch (predicate.kind) {
      case 'range':
        if (predicate.min !== undefined && predicate.max !== undefined) {
          return `${attribute} ${predicate.min}-${predicate.max}`;
        }
        return predicate.max !== undefined
          ? `${attribute} <= ${predicate.max}`
          : `${attribute} >= ${predicate.min ?? 0}`;
      case 'oneOf':
        return `${attribute} in ${predicate.values.join('|')}`;
      case 'contains':
        return `${attribute} has ${predicate.values.join('|')}`;
    }
  });
  return parts.length > 0 ? parts.join(', ') : 'none';
}
